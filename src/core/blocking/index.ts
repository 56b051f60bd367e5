export type { BlockKey, BlockSet, BlockingStrategy, JoinStats } from './types'
export { PatientBlockingStrategy } from './strategies/patient-blocking'
export type { PatientKeyed } from './strategies/patient-blocking'
export { CandidateJoin } from './candidate-join'
export type { JoinedPair } from './candidate-join'
