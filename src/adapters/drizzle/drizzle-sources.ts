import { and, asc, gte, inArray, lte } from 'drizzle-orm'
import type { SQL } from 'drizzle-orm'
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core'
import type { Stay } from '../../types/stay'
import type { ClinicalDocument } from '../../types/document'
import type { DocumentSource, SourceScope, StaySource } from '../types'
import { BaseSource, isPeriodScope } from '../base-source'
import { QueryError, ValidationError } from '../adapter-error'
import {
  UNIDENTIFIED_PATIENT_ID,
  normalizePatientId,
} from '../../core/normalizers/document-key'
import { clinicalDocuments, hospitalStays } from './schema'
import type { ClinicalDocumentRow, HospitalStayRow } from './schema'

export interface DrizzleSourceOptions {
  /**
   * Accepted patient identifier shape. Documents that do not match are
   * dropped; stays are kept under {@link UNIDENTIFIED_PATIENT_ID}.
   */
  patientIdPattern?: RegExp
}

export interface DrizzleStaySourceOptions extends DrizzleSourceOptions {
  /** Keep only the first N characters of unit codes */
  unitCodeLength?: number
}

function describeScope(scope: SourceScope): Record<string, unknown> {
  return isPeriodScope(scope)
    ? {
        scope: 'period',
        start: scope.period.start.toISOString(),
        end: scope.period.end.toISOString(),
      }
    : { scope: 'stayIds', count: scope.stayIds.length }
}

function wrapQueryFailure(
  error: unknown,
  table: string,
  scope: SourceScope
): QueryError {
  return new QueryError(`Failed to read ${table}`, {
    table,
    ...describeScope(scope),
    cause: error instanceof Error ? error.message : String(error),
  })
}

function warnDropped(count: number, table: string): void {
  if (count > 0) {
    console.warn(`Dropped ${count} ${table} row(s) with an invalid patient id.`)
  }
}

function warnUnidentified(count: number, table: string): void {
  if (count > 0) {
    console.warn(
      `Kept ${count} ${table} row(s) with an invalid patient id as '${UNIDENTIFIED_PATIENT_ID}'.`
    )
  }
}

/**
 * Reads stays from the `hospital_stays` table.
 *
 * Stays with a missing or malformed patient id are kept with
 * {@link UNIDENTIFIED_PATIENT_ID}, so they match no document and count as
 * unmatched.
 *
 * @example
 * ```typescript
 * import { drizzle } from 'drizzle-orm/node-postgres'
 * import { Pool } from 'pg'
 *
 * const db = drizzle(new Pool({ connectionString: process.env.DATABASE_URL }))
 * const stays = new DrizzleStaySource(db, { unitCodeLength: 4 })
 * ```
 */
export class DrizzleStaySource<TQueryResult extends PgQueryResultHKT>
  extends BaseSource
  implements StaySource
{
  private readonly options: DrizzleStaySourceOptions

  constructor(
    private readonly db: PgDatabase<TQueryResult>,
    options: DrizzleStaySourceOptions = {}
  ) {
    super()
    if (
      options.unitCodeLength !== undefined &&
      (!Number.isInteger(options.unitCodeLength) || options.unitCodeLength <= 0)
    ) {
      throw new ValidationError('unitCodeLength must be a positive integer', {
        unitCodeLength: options.unitCodeLength,
      })
    }
    this.options = options
  }

  async fetchStays(scope: SourceScope): Promise<Stay[]> {
    this.validateScope(scope)
    if (!isPeriodScope(scope) && scope.stayIds.length === 0) {
      return []
    }

    const condition: SQL | undefined = isPeriodScope(scope)
      ? and(
          gte(hospitalStays.dischargeTs, scope.period.start),
          lte(hospitalStays.dischargeTs, scope.period.end)
        )
      : inArray(hospitalStays.stayId, scope.stayIds)

    let rows: HospitalStayRow[]
    try {
      rows = await this.db
        .select()
        .from(hospitalStays)
        .where(condition)
        .orderBy(asc(hospitalStays.stayId))
    } catch (error) {
      throw wrapQueryFailure(error, 'hospital_stays', scope)
    }

    const stays = rows.map((row) => this.toStay(row))
    warnUnidentified(
      stays.filter((stay) => stay.patientId === UNIDENTIFIED_PATIENT_ID).length,
      'hospital_stays'
    )
    return stays
  }

  private toStay(row: HospitalStayRow): Stay {
    const patientId = normalizePatientId(row.patientId, {
      pattern: this.options.patientIdPattern,
    })

    const unitCode = row.unitCode.trim()
    return {
      patientId: patientId ?? UNIDENTIFIED_PATIENT_ID,
      stayId: row.stayId.trim(),
      admissionTs: row.admissionTs,
      dischargeTs: row.dischargeTs,
      unitCode:
        this.options.unitCodeLength === undefined
          ? unitCode
          : unitCode.slice(0, this.options.unitCodeLength),
    }
  }
}

/**
 * Reads documents from the `clinical_documents` table.
 *
 * A period scope selects documents validated within the period. A stay-list
 * scope selects every document of the patients of those stays.
 */
export class DrizzleDocumentSource<TQueryResult extends PgQueryResultHKT>
  extends BaseSource
  implements DocumentSource
{
  constructor(
    private readonly db: PgDatabase<TQueryResult>,
    private readonly options: DrizzleSourceOptions = {}
  ) {
    super()
  }

  async fetchDocuments(scope: SourceScope): Promise<ClinicalDocument[]> {
    this.validateScope(scope)
    if (!isPeriodScope(scope) && scope.stayIds.length === 0) {
      return []
    }

    const condition: SQL | undefined = isPeriodScope(scope)
      ? and(
          gte(clinicalDocuments.validatedTs, scope.period.start),
          lte(clinicalDocuments.validatedTs, scope.period.end)
        )
      : inArray(
          clinicalDocuments.patientId,
          this.db
            .select({ patientId: hospitalStays.patientId })
            .from(hospitalStays)
            .where(inArray(hospitalStays.stayId, scope.stayIds))
        )

    let rows: ClinicalDocumentRow[]
    try {
      rows = await this.db
        .select()
        .from(clinicalDocuments)
        .where(condition)
        .orderBy(asc(clinicalDocuments.documentId))
    } catch (error) {
      throw wrapQueryFailure(error, 'clinical_documents', scope)
    }

    const documents: ClinicalDocument[] = []
    for (const row of rows) {
      const document = this.toDocument(row)
      if (document) documents.push(document)
    }
    warnDropped(rows.length - documents.length, 'clinical_documents')
    return documents
  }

  private toDocument(row: ClinicalDocumentRow): ClinicalDocument | null {
    const patientId = normalizePatientId(row.patientId, {
      pattern: this.options.patientIdPattern,
    })
    if (patientId === null || patientId === UNIDENTIFIED_PATIENT_ID) return null

    return {
      documentId: row.documentId.trim(),
      patientId,
      label: row.label,
      createdTs: row.createdTs,
      validatedTs: row.validatedTs,
      venueNumber: row.venueNumber,
      parentCreatedTs: row.parentCreatedTs,
      parentModifiedTs: row.parentModifiedTs,
      dispatchTs: row.dispatchTs,
    }
  }
}
