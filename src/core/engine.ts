import type {
  CandidatePair,
  ClinicalDocument,
  DocumentId,
  MatchResult,
  ReconciliationConfig,
  Stay,
} from '../types'
import { CandidateJoin } from './blocking/candidate-join'
import type { JoinStats } from './blocking/types'
import { CriteriaEvaluator, DEFAULT_CRITERIA_CONFIG } from './criteria/criteria-evaluator'
import { CandidateRanker } from './ranking/candidate-ranker'
import type { UnrankedCandidate } from './ranking/candidate-ranker'
import { ConflictResolver } from './conflict/conflict-resolver'
import type { ConflictSummary } from './conflict/conflict-resolver'
import { OutcomeClassifier } from './scoring/outcome-classifier'
import { SpecialtyTable } from './specialty/specialty-table'
import { createDocumentKeyNormalizer } from './normalizers/document-key'
import { validateDocuments, validateStays } from './validation'

export const DEFAULT_RECONCILIATION_CONFIG: Readonly<ReconciliationConfig> = Object.freeze({
  criteria: DEFAULT_CRITERIA_CONFIG,
  keyNormalizer: Object.freeze({}),
  verbose: false,
})

/**
 * Everything a single engine pass produces.
 */
export interface ReconciliationOutcome {
  /** One frozen result per stay, in input stay order */
  results: MatchResult[]
  /** Every ranked candidate pair, grouped by stay */
  candidates: CandidatePair[]
  /** Documents claimed by several stays during the pass */
  conflicts: ConflictSummary
  /** Size of the candidate join */
  join: JoinStats
}

/**
 * Synchronous reconciliation pipeline.
 *
 * Joins stays to the documents of their patient, evaluates the criteria
 * and the specialty of every pair, ranks each stay's candidates, settles
 * documents claimed by several stays and classifies every stay. Both
 * tables are validated before any matching starts.
 *
 * @example
 * ```typescript
 * const engine = new ReconciliationEngine()
 * const { results } = engine.reconcile(stays, documents, table)
 * ```
 */
export class ReconciliationEngine {
  private readonly join: CandidateJoin
  private readonly evaluator: CriteriaEvaluator
  private readonly ranker: CandidateRanker
  private readonly resolver: ConflictResolver
  private readonly classifier: OutcomeClassifier
  private readonly normalizeKey: (label: string | null | undefined) => string

  constructor(private readonly config: ReconciliationConfig = DEFAULT_RECONCILIATION_CONFIG) {
    this.join = new CandidateJoin()
    this.evaluator = new CriteriaEvaluator(config.criteria)
    this.ranker = new CandidateRanker()
    this.resolver = new ConflictResolver()
    this.classifier = new OutcomeClassifier()
    this.normalizeKey = createDocumentKeyNormalizer(config.keyNormalizer)
  }

  getConfig(): ReconciliationConfig {
    return this.config
  }

  /**
   * Runs the full pipeline over materialized inputs.
   *
   * @throws {MissingColumnError} When a row lacks a required field
   * @throws {InvalidRecordError} When a row breaks the input contract
   */
  reconcile(
    stays: ReadonlyArray<Stay>,
    documents: ReadonlyArray<ClinicalDocument>,
    specialtyTable: SpecialtyTable = SpecialtyTable.empty()
  ): ReconciliationOutcome {
    validateStays(stays)
    validateDocuments(documents)

    const keys = new Map<DocumentId, string>()
    for (const document of documents) {
      keys.set(document.documentId, this.normalizeKey(document.label))
    }

    const unranked: UnrankedCandidate[] = this.join
      .join(stays, documents)
      .map(({ stay, document }) => {
        const documentKey = keys.get(document.documentId) ?? ''
        const { flags, eligible, rawDelay } = this.evaluator.assess(stay, document)
        return {
          stayId: stay.stayId,
          patientId: stay.patientId,
          documentId: document.documentId,
          documentKey,
          specialty: specialtyTable.resolve(stay.unitCode, documentKey),
          ...flags,
          eligible,
          rawDelay,
        }
      })

    const candidates = this.ranker.rank(unranked)
    const provisional = this.ranker.select(stays, candidates)
    const settled = this.resolver.resolve(provisional)

    const documentsById = new Map<DocumentId, ClinicalDocument>()
    for (const document of documents) {
      documentsById.set(document.documentId, document)
    }

    const results = settled.map((match) =>
      this.classifier.finalize(
        match,
        match.selectedDocumentId === null
          ? undefined
          : documentsById.get(match.selectedDocumentId)
      )
    )

    return {
      results,
      candidates,
      conflicts: this.resolver.summarize(provisional),
      join: this.join.calculateStats(stays, documents),
    }
  }
}
