/**
 * PostgreSQL Example
 *
 * Reads stays and documents through Drizzle ORM and the specialty mapping
 * from a CSV file, then prints the per-specialty indicators of last month.
 *
 * Expects DATABASE_URL to point at a database holding the
 * `hospital_stays` and `clinical_documents` tables.
 */

import { drizzle } from 'drizzle-orm/node-postgres'
import { Pool } from 'pg'
import {
  CsvSpecialtyMappingLoader,
  DischargeMatch,
  previousMonthPeriod,
} from '../src'
import { DrizzleDocumentSource, DrizzleStaySource } from '../src/adapters/drizzle'

async function postgresExample(): Promise<void> {
  const pool = new Pool({ connectionString: process.env.DATABASE_URL })
  const db = drizzle(pool)

  try {
    const reconciler = DischargeMatch.create()
      .boilerplate('Hôpital Nord')
      .verbose()
      .staySource(new DrizzleStaySource(db, { unitCodeLength: 4 }))
      .documentSource(new DrizzleDocumentSource(db))
      .specialtyMapping(new CsvSpecialtyMappingLoader('data/specialty-mapping.csv'))
      .build()

    const run = await reconciler.run({ period: previousMonthPeriod(new Date()) })

    for (const row of run.stats.bySpecialty) {
      console.log(
        `${row.specialty}: ${row.total} stays, ${row.onTimePct}% validated on discharge day`
      )
    }
  } catch (error) {
    console.log('Note: This example requires a configured PostgreSQL database')
    console.log(`Error: ${error instanceof Error ? error.message : String(error)}`)
  } finally {
    await pool.end()
  }
}

postgresExample().catch(console.error)
