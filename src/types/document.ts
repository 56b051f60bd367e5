import type { DocumentId, PatientId } from './stay'

/**
 * A clinical discharge-letter record from the document source.
 *
 * Optional fields may be absent or null when the source does not carry them;
 * both mean "not known" and the criteria fall back to their configured defaults.
 */
export interface ClinicalDocument {
  /** Unique identifier of the document */
  documentId: DocumentId
  /** Owning patient */
  patientId: PatientId
  /** Free-text form label, e.g. "CR Lettre de liaison Cardiologie" */
  label: string | null
  /** Creation instant */
  createdTs: Date
  /** Validation instant, null when the document was never validated */
  validatedTs: Date | null
  /** Stay (venue/encounter) number the document was written for */
  venueNumber?: string | null
  /** Creation instant of the parent document this one revises */
  parentCreatedTs?: Date | null
  /** Last modification instant of the parent document */
  parentModifiedTs?: Date | null
  /** Instant the letter was dispatched to its recipients */
  dispatchTs?: Date | null
}
