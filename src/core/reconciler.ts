import { v4 as uuidv4 } from 'uuid'
import type {
  CandidatePair,
  MatchResult,
  ReconcileOptions,
  ReconciliationConfig,
} from '../types'
import type { DocumentSource, SourceScope, StaySource } from '../adapters/types'
import type { SpecialtyMappingLoader } from './specialty/loaders'
import { SpecialtyTable } from './specialty/specialty-table'
import { ReconciliationEngine } from './engine'
import type { ConflictSummary } from './conflict/conflict-resolver'
import { StatsAggregator } from '../reporting/aggregator'
import type { AggregateOptions, ReconciliationStats } from '../reporting/types'
import { isPeriodScope } from '../adapters/base-source'

export type SpecialtyTableStatus = 'loaded' | 'degraded'

/**
 * Outcome of a complete reconciliation run.
 */
export interface ReconciliationRun {
  runId: string
  startedAt: Date
  completedAt: Date
  scope: SourceScope
  /** One frozen result per fetched stay */
  results: MatchResult[]
  stats: ReconciliationStats
  /** `degraded` when the reference mapping could not be loaded */
  specialtyTableStatus: SpecialtyTableStatus
  conflicts: ConflictSummary
  /** Ranked candidate pairs, present when requested */
  candidates?: CandidatePair[]
}

export interface ReconcilerDependencies {
  staySource: StaySource
  documentSource: DocumentSource
  specialtyLoader: SpecialtyMappingLoader
}

export interface ReconcilerRunOptions extends ReconcileOptions {
  /** Rounding of the aggregated figures */
  stats?: AggregateOptions
}

/**
 * Runs a reconciliation end to end: fetches both tables and the reference
 * mapping concurrently, then hands them to the synchronous engine.
 *
 * When the mapping cannot be loaded the run continues with an empty table
 * and every stay classifies as unmatched. Source failures propagate.
 *
 * @example
 * ```typescript
 * const reconciler = DischargeMatch.create()
 *   .sources({ staySource, documentSource, specialtyLoader })
 *   .build()
 *
 * const run = await reconciler.run({ period: previousMonthPeriod(new Date()) })
 * console.log(run.stats.global.onTimePct)
 * ```
 */
export class Reconciler {
  private readonly engine: ReconciliationEngine

  constructor(
    private readonly config: ReconciliationConfig,
    private readonly dependencies: ReconcilerDependencies
  ) {
    this.engine = new ReconciliationEngine(config)
  }

  getConfig(): ReconciliationConfig {
    return this.config
  }

  async run(scope: SourceScope, options: ReconcilerRunOptions = {}): Promise<ReconciliationRun> {
    const runId = uuidv4()
    const startedAt = new Date()

    const [stays, documents, loaded] = await Promise.all([
      this.dependencies.staySource.fetchStays(scope),
      this.dependencies.documentSource.fetchDocuments(scope),
      this.loadSpecialtyTable(),
    ])

    const outcome = this.engine.reconcile(stays, documents, loaded.table)
    const stats = StatsAggregator.aggregate(outcome.results, options.stats)

    const run: ReconciliationRun = {
      runId,
      startedAt,
      completedAt: new Date(),
      scope,
      results: outcome.results,
      stats,
      specialtyTableStatus: loaded.status,
      conflicts: outcome.conflicts,
    }
    if (options.includeCandidates) {
      run.candidates = outcome.candidates
    }

    if (this.config.verbose) {
      console.log(this.describe(run))
    }

    return run
  }

  private async loadSpecialtyTable(): Promise<{
    table: SpecialtyTable
    status: SpecialtyTableStatus
  }> {
    try {
      const rows = await this.dependencies.specialtyLoader.load()
      return {
        table: SpecialtyTable.fromRows(rows, this.config.keyNormalizer),
        status: 'loaded',
      }
    } catch (error) {
      console.warn(
        'Specialty mapping could not be loaded. Continuing with an empty table:',
        error instanceof Error ? error.message : error
      )
      return { table: SpecialtyTable.empty(), status: 'degraded' }
    }
  }

  private describe(run: ReconciliationRun): string {
    const { global } = run.stats
    const scope = isPeriodScope(run.scope)
      ? `${run.scope.period.start.toISOString()}..${run.scope.period.end.toISOString()}`
      : `${run.scope.stayIds.length} stay(s)`
    return (
      `Reconciliation ${run.runId} [${scope}]: ${global.total} stays, ` +
      `${global.onTime} on-time, ${global.late} late, ${global.unmatched} unmatched` +
      (run.specialtyTableStatus === 'degraded' ? ' (specialty table degraded)' : '')
    )
  }
}
