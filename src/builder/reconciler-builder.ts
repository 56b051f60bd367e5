import type { ReconciliationConfig } from '../types'
import type { DocumentSource, StaySource } from '../adapters/types'
import type { SpecialtyMappingLoader } from '../core/specialty/loaders'
import { Reconciler } from '../core/reconciler'
import { ReconciliationEngine } from '../core/engine'
import { CriteriaBuilder } from './criteria-builder'
import { ConfigurationError, NotConfiguredError } from '../utils/errors'

/**
 * Fluent builder for configuring and creating a Reconciler instance.
 *
 * @example
 * ```typescript
 * const reconciler = DischargeMatch.create()
 *   .criteria(criteria => criteria
 *     .validationLookbackDays(3)
 *     .creationLookbackDays(5)
 *   )
 *   .boilerplate('Hôpital Nord')
 *   .staySource(new DrizzleStaySource(db))
 *   .documentSource(new DrizzleDocumentSource(db))
 *   .specialtyMapping(new CsvSpecialtyMappingLoader('data/specialty-mapping.csv'))
 *   .build()
 *
 * const run = await reconciler.run({ period })
 * ```
 */
export class ReconcilerBuilder {
  private criteriaConfiguration = new CriteriaBuilder().build()
  private extraBoilerplate: string[] = []
  private verboseLogging = false
  private stays?: StaySource
  private documents?: DocumentSource
  private specialtyLoader?: SpecialtyMappingLoader

  /**
   * Configure the eligibility criteria.
   *
   * @param configurator - Callback that receives a CriteriaBuilder
   * @returns This builder for chaining
   */
  criteria(configurator: (builder: CriteriaBuilder) => CriteriaBuilder | void): this {
    const builder = new CriteriaBuilder()
    const result = configurator(builder)
    this.criteriaConfiguration = (result ?? builder).build()
    return this
  }

  /**
   * Add phrases removed from document labels before the specialty lookup,
   * e.g. the institution's name.
   */
  boilerplate(...phrases: string[]): this {
    for (const phrase of phrases) {
      if (typeof phrase !== 'string' || phrase.trim().length === 0) {
        throw new ConfigurationError('Boilerplate phrases must not be empty', 'boilerplate', {
          phrase,
        })
      }
      this.extraBoilerplate.push(phrase)
    }
    return this
  }

  /**
   * Log one summary line per run.
   */
  verbose(enabled = true): this {
    this.verboseLogging = enabled
    return this
  }

  staySource(source: StaySource): this {
    this.stays = source
    return this
  }

  documentSource(source: DocumentSource): this {
    this.documents = source
    return this
  }

  specialtyMapping(loader: SpecialtyMappingLoader): this {
    this.specialtyLoader = loader
    return this
  }

  /**
   * Configure all three collaborators at once.
   */
  sources(dependencies: {
    staySource: StaySource
    documentSource: DocumentSource
    specialtyLoader: SpecialtyMappingLoader
  }): this {
    return this.staySource(dependencies.staySource)
      .documentSource(dependencies.documentSource)
      .specialtyMapping(dependencies.specialtyLoader)
  }

  /**
   * The configuration as it stands.
   */
  buildConfig(): ReconciliationConfig {
    return {
      criteria: {
        ...this.criteriaConfiguration,
        defaults: { ...this.criteriaConfiguration.defaults },
      },
      keyNormalizer:
        this.extraBoilerplate.length > 0 ? { extraBoilerplate: [...this.extraBoilerplate] } : {},
      verbose: this.verboseLogging,
    }
  }

  /**
   * A synchronous engine for callers that already hold both tables.
   * Sources are not required.
   */
  buildEngine(): ReconciliationEngine {
    return new ReconciliationEngine(this.buildConfig())
  }

  /**
   * Build the configured Reconciler.
   *
   * @throws {NotConfiguredError} If a source or the specialty mapping is missing
   */
  build(): Reconciler {
    if (!this.stays) {
      throw new NotConfiguredError('staySource', 'Call .staySource() before .build().')
    }
    if (!this.documents) {
      throw new NotConfiguredError('documentSource', 'Call .documentSource() before .build().')
    }
    if (!this.specialtyLoader) {
      throw new NotConfiguredError(
        'specialtyMapping',
        'Call .specialtyMapping() before .build().'
      )
    }

    return new Reconciler(this.buildConfig(), {
      staySource: this.stays,
      documentSource: this.documents,
      specialtyLoader: this.specialtyLoader,
    })
  }
}

/**
 * Main entry point for the discharge-match library.
 *
 * @example
 * ```typescript
 * import { DischargeMatch } from 'discharge-match'
 *
 * const engine = DischargeMatch.create().buildEngine()
 * const { results } = engine.reconcile(stays, documents, table)
 * ```
 */
export class DischargeMatch {
  static create(): ReconcilerBuilder {
    return new ReconcilerBuilder()
  }
}
