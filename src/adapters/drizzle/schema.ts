import { pgTable, text, timestamp, varchar } from 'drizzle-orm/pg-core'

/**
 * Hospital stays, one row per hospitalization.
 */
export const hospitalStays = pgTable('hospital_stays', {
  stayId: varchar('stay_id', { length: 32 }).primaryKey(),
  patientId: varchar('patient_id', { length: 32 }).notNull(),
  admissionTs: timestamp('admission_ts', { withTimezone: true, mode: 'date' }).notNull(),
  dischargeTs: timestamp('discharge_ts', { withTimezone: true, mode: 'date' }).notNull(),
  unitCode: varchar('unit_code', { length: 16 }).notNull(),
})

/**
 * Clinical documents that may serve as discharge letters.
 */
export const clinicalDocuments = pgTable('clinical_documents', {
  documentId: varchar('document_id', { length: 64 }).primaryKey(),
  patientId: varchar('patient_id', { length: 32 }).notNull(),
  label: text('label'),
  createdTs: timestamp('created_ts', { withTimezone: true, mode: 'date' }).notNull(),
  validatedTs: timestamp('validated_ts', { withTimezone: true, mode: 'date' }),
  venueNumber: varchar('venue_number', { length: 32 }),
  parentCreatedTs: timestamp('parent_created_ts', { withTimezone: true, mode: 'date' }),
  parentModifiedTs: timestamp('parent_modified_ts', { withTimezone: true, mode: 'date' }),
  dispatchTs: timestamp('dispatch_ts', { withTimezone: true, mode: 'date' }),
})

export type HospitalStayRow = typeof hospitalStays.$inferSelect
export type ClinicalDocumentRow = typeof clinicalDocuments.$inferSelect
