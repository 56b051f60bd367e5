export { DrizzleStaySource, DrizzleDocumentSource } from './drizzle-sources'
export type { DrizzleSourceOptions, DrizzleStaySourceOptions } from './drizzle-sources'
export { hospitalStays, clinicalDocuments } from './schema'
export type { HospitalStayRow, ClinicalDocumentRow } from './schema'
