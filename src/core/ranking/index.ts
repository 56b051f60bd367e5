export { CandidateRanker, closenessOrder, selectionOrder } from './candidate-ranker'
export type { UnrankedCandidate } from './candidate-ranker'
export { compareBy, trueFirst, ascendingNullsLast, ascending } from './sort-keys'
export type { Comparator } from './sort-keys'
