/**
 * Structural checks run on both input tables before any matching.
 * @module core/validation
 */

import type { Stay } from '../types/stay'
import type { ClinicalDocument } from '../types/document'
import { isValidInstant } from '../utils/dates'
import { InvalidRecordError, MissingColumnError } from '../utils/errors'

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0
}

function isOptionalInstant(value: unknown): boolean {
  return value === null || value === undefined || isValidInstant(value)
}

/**
 * Ensures every stay carries its required columns, that discharge does not
 * precede admission and that stay ids are unique.
 *
 * @throws {MissingColumnError} When a required field is absent or invalid
 * @throws {InvalidRecordError} When a row breaks the input contract
 */
export function validateStays(stays: ReadonlyArray<Stay>): void {
  const seen = new Set<string>()

  stays.forEach((stay, rowIndex) => {
    if (!isNonEmptyString(stay.patientId)) {
      throw new MissingColumnError('stays', 'patientId', rowIndex)
    }
    if (!isNonEmptyString(stay.stayId)) {
      throw new MissingColumnError('stays', 'stayId', rowIndex)
    }
    if (!isValidInstant(stay.admissionTs)) {
      throw new MissingColumnError('stays', 'admissionTs', rowIndex, {
        stayId: stay.stayId,
      })
    }
    if (!isValidInstant(stay.dischargeTs)) {
      throw new MissingColumnError('stays', 'dischargeTs', rowIndex, {
        stayId: stay.stayId,
      })
    }
    if (typeof stay.unitCode !== 'string') {
      throw new MissingColumnError('stays', 'unitCode', rowIndex, {
        stayId: stay.stayId,
      })
    }
    if (stay.dischargeTs.getTime() < stay.admissionTs.getTime()) {
      throw new InvalidRecordError('stays', rowIndex, 'discharge precedes admission', {
        stayId: stay.stayId,
        admissionTs: stay.admissionTs.toISOString(),
        dischargeTs: stay.dischargeTs.toISOString(),
      })
    }
    if (seen.has(stay.stayId)) {
      throw new InvalidRecordError('stays', rowIndex, `duplicate stay id '${stay.stayId}'`, {
        stayId: stay.stayId,
      })
    }
    seen.add(stay.stayId)
  })
}

const OPTIONAL_DOCUMENT_INSTANTS = [
  'validatedTs',
  'parentCreatedTs',
  'parentModifiedTs',
  'dispatchTs',
] as const

/**
 * Ensures every document carries its required columns, that optional
 * instants are either absent or valid and that document ids are unique.
 *
 * @throws {MissingColumnError} When a required field is absent or invalid
 * @throws {InvalidRecordError} When a document id repeats
 */
export function validateDocuments(documents: ReadonlyArray<ClinicalDocument>): void {
  const seen = new Set<string>()

  documents.forEach((document, rowIndex) => {
    if (!isNonEmptyString(document.documentId)) {
      throw new MissingColumnError('documents', 'documentId', rowIndex)
    }
    if (!isNonEmptyString(document.patientId)) {
      throw new MissingColumnError('documents', 'patientId', rowIndex, {
        documentId: document.documentId,
      })
    }
    if (document.label !== null && typeof document.label !== 'string') {
      throw new MissingColumnError('documents', 'label', rowIndex, {
        documentId: document.documentId,
      })
    }
    if (!isValidInstant(document.createdTs)) {
      throw new MissingColumnError('documents', 'createdTs', rowIndex, {
        documentId: document.documentId,
      })
    }
    for (const column of OPTIONAL_DOCUMENT_INSTANTS) {
      if (!isOptionalInstant(document[column])) {
        throw new MissingColumnError('documents', column, rowIndex, {
          documentId: document.documentId,
        })
      }
    }
    if (document.venueNumber != null && typeof document.venueNumber !== 'string') {
      throw new MissingColumnError('documents', 'venueNumber', rowIndex, {
        documentId: document.documentId,
      })
    }
    if (seen.has(document.documentId)) {
      throw new InvalidRecordError(
        'documents',
        rowIndex,
        `duplicate document id '${document.documentId}'`,
        { documentId: document.documentId }
      )
    }
    seen.add(document.documentId)
  })
}
