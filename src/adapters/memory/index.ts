export { InMemoryStaySource, InMemoryDocumentSource } from './in-memory-sources'
