export { ConflictResolver, claimantOrder } from './conflict-resolver'
export type { ConflictSummary } from './conflict-resolver'
