/**
 * Identifier types shared by stays and documents.
 * Source systems hand out numeric or string ids; the library keeps them as strings.
 */
export type PatientId = string
export type StayId = string
export type DocumentId = string

/**
 * One hospitalization episode, as delivered by the stay source.
 * Immutable input to a reconciliation run.
 */
export interface Stay {
  /** Patient identity shared with the document source */
  patientId: PatientId
  /** Unique identifier of the stay (also the venue number documents may quote) */
  stayId: StayId
  /** Admission instant */
  admissionTs: Date
  /** Discharge instant, never before admission */
  dischargeTs: Date
  /** Organizational unit the patient was discharged from */
  unitCode: string
}
