/**
 * A string identifier for a block.
 * Stays and documents with the same block key are paired with each other.
 */
export type BlockKey = string

/**
 * A map of block keys to the records within that block.
 */
export type BlockSet<T = unknown> = Map<BlockKey, Array<T>>

/**
 * Interface that all blocking strategies must implement.
 * A blocking strategy determines how records are grouped into blocks.
 */
export interface BlockingStrategy<T = unknown> {
  /** Unique name for this blocking strategy */
  readonly name: string

  /**
   * Returns the block key of a record, or null when the record cannot be
   * placed in any block.
   */
  blockKey(record: T): BlockKey | null

  /**
   * Groups records by block key. Records keep their input order within a
   * block; records without a key are left out.
   */
  generateBlocks(records: ReadonlyArray<T>): BlockSet<T>
}

/**
 * Statistics about a candidate join.
 */
export interface JoinStats {
  /** Stays processed */
  totalStays: number
  /** Documents processed */
  totalDocuments: number
  /** Distinct document blocks (patients with at least one document) */
  totalBlocks: number
  /** Stays paired with at least one document */
  staysWithCandidates: number
  /** Candidate pairs produced */
  totalPairs: number
  /** Largest number of candidates for a single stay */
  maxCandidatesPerStay: number
}
