export { loadEnvironmentConfig, environmentSchema } from './env'
export type { EnvironmentConfig } from './env'
