#!/usr/bin/env npx tsx
/**
 * Reconcile Period Script
 *
 * Reconciles the stays discharged in a period against the clinical documents
 * stored in PostgreSQL and prints the aggregated indicators.
 *
 * Usage:
 *   npx tsx scripts/reconcile-period.ts
 *
 * Or for an explicit period:
 *   npx tsx scripts/reconcile-period.ts --start=2025-03-01 --end=2025-03-31
 *
 * Settings are read from the environment (see .env.example).
 */

import 'dotenv/config'
import { drizzle } from 'drizzle-orm/node-postgres'
import { Pool } from 'pg'
import {
  ConnectionError,
  CsvSpecialtyMappingLoader,
  DischargeMatch,
  loadEnvironmentConfig,
  previousMonthPeriod,
} from '../src'
import type { ReportingPeriod } from '../src'
import { DrizzleDocumentSource, DrizzleStaySource } from '../src/adapters/drizzle'

function parsePeriod(args: string[]): ReportingPeriod {
  const option = (name: string): string | undefined =>
    args.find((arg) => arg.startsWith(`--${name}=`))?.slice(name.length + 3)

  const start = option('start')
  const end = option('end')
  if (!start || !end) {
    return previousMonthPeriod(new Date())
  }
  return {
    start: new Date(`${start}T00:00:00.000Z`),
    end: new Date(`${end}T23:59:59.999Z`),
  }
}

async function main(): Promise<void> {
  const config = loadEnvironmentConfig(process.env)
  const period = parsePeriod(process.argv.slice(2))

  const pool = new Pool({ connectionString: config.databaseUrl })
  try {
    const client = await pool.connect().catch((error: unknown) => {
      throw new ConnectionError('Failed to connect to database', {
        cause: error instanceof Error ? error.message : String(error),
      })
    })
    client.release()

    const db = drizzle(pool)
    const reconciler = DischargeMatch.create()
      .criteria((criteria) =>
        criteria
          .validationLookbackDays(config.criteria.validationLookbackDays)
          .creationLookbackDays(config.criteria.creationLookbackDays)
          .compositeThreshold(config.criteria.compositeThreshold)
      )
      .boilerplate(...config.extraBoilerplate)
      .verbose(config.verbose)
      .staySource(new DrizzleStaySource(db, { unitCodeLength: config.unitCodeLength }))
      .documentSource(new DrizzleDocumentSource(db))
      .specialtyMapping(
        new CsvSpecialtyMappingLoader(config.specialtyMappingPath, {
          delimiter: config.specialtyMappingDelimiter,
        })
      )
      .build()

    const run = await reconciler.run({ period })
    const { global, bySpecialty } = run.stats

    console.log(
      `Period ${period.start.toISOString().slice(0, 10)} to ${period.end.toISOString().slice(0, 10)}`
    )
    console.log(`Run ${run.runId} (specialty table ${run.specialtyTableStatus})`)
    console.log('')
    console.log(`Stays:            ${global.total}`)
    console.log(`Letter found:     ${global.matched} (${global.matchedPct}%)`)
    console.log(`Validated day 0:  ${global.onTime} (${global.onTimePct}%)`)
    console.log(`Validated late:   ${global.late} (${global.latePct}%)`)
    console.log(`Mean delay:       ${global.meanDelay} d`)
    console.log(`Dispatched:       ${global.dispatched} (${global.dispatchedPct}% of found)`)
    console.log('')
    console.log('By specialty:')
    for (const row of bySpecialty) {
      console.log(
        `  ${row.specialty.padEnd(30)} ${String(row.total).padStart(5)}  ` +
          `found ${row.matchedPct}%  day 0 ${row.onTimePct}%  mean ${row.meanDelay} d`
      )
    }
  } finally {
    await pool.end()
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error)
  process.exitCode = 1
})
