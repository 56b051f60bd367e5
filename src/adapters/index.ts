export type { SourceScope, StaySource, DocumentSource } from './types'

export {
  AdapterError,
  ConnectionError,
  QueryError,
  ValidationError,
} from './adapter-error'

export { BaseSource, isPeriodScope } from './base-source'

export { InMemoryStaySource, InMemoryDocumentSource } from './memory'
