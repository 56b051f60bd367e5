import { readFile } from 'node:fs/promises'
import type { SpecialtyMappingRow } from './specialty-table'
import { ConfigurationError, requireNonEmptyString } from '../../utils/errors'

/**
 * Source of the reference mapping. Implementations throw when the mapping
 * cannot be produced; the reconciler decides how to recover.
 */
export interface SpecialtyMappingLoader {
  load(): Promise<SpecialtyMappingRow[]>
}

/**
 * Serves rows already held in memory.
 */
export class InMemorySpecialtyMappingLoader implements SpecialtyMappingLoader {
  constructor(private readonly rows: readonly SpecialtyMappingRow[]) {}

  async load(): Promise<SpecialtyMappingRow[]> {
    return this.rows.map((row) => ({ ...row }))
  }
}

export interface CsvSpecialtyMappingLoaderOptions {
  /** Column separator (default: `;`) */
  delimiter?: string
  /** File encoding (default: `utf8`) */
  encoding?: BufferEncoding
}

export const SPECIALTY_MAPPING_COLUMNS = [
  'unit_code',
  'normalized_label',
  'specialty',
] as const

/**
 * Reads the mapping from a delimited text file whose header names the
 * columns `unit_code`, `normalized_label` and `specialty` in any order.
 * Extra columns are ignored, blank lines are skipped and rows without a
 * specialty are dropped. Cells may be double-quoted to hold the delimiter.
 *
 * @example
 * ```typescript
 * const loader = new CsvSpecialtyMappingLoader('data/specialty-mapping.csv')
 * const rows = await loader.load()
 * ```
 */
export class CsvSpecialtyMappingLoader implements SpecialtyMappingLoader {
  private readonly delimiter: string
  private readonly encoding: BufferEncoding

  constructor(
    private readonly path: string,
    options: CsvSpecialtyMappingLoaderOptions = {}
  ) {
    requireNonEmptyString(path, 'path')
    this.delimiter = options.delimiter ?? ';'
    this.encoding = options.encoding ?? 'utf8'
    if (this.delimiter.length === 0) {
      throw new ConfigurationError('Delimiter must not be empty', 'delimiter')
    }
  }

  async load(): Promise<SpecialtyMappingRow[]> {
    const content = await readFile(this.path, { encoding: this.encoding })
    return parseSpecialtyMapping(content, this.delimiter, this.path)
  }
}

/**
 * Parses delimited mapping text. Exported for callers that already hold the
 * file content.
 */
export function parseSpecialtyMapping(
  content: string,
  delimiter = ';',
  origin = 'specialty mapping'
): SpecialtyMappingRow[] {
  const lines = content
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)

  const header = lines.shift()
  if (header === undefined) {
    throw new ConfigurationError(`${origin} is empty`, 'specialtyMapping', {
      origin,
    })
  }

  const columns = parseMappingLine(header, delimiter).map((name) => name.toLowerCase())
  const [unitIndex, labelIndex, specialtyIndex] = SPECIALTY_MAPPING_COLUMNS.map(
    (name) => {
      const index = columns.indexOf(name)
      if (index === -1) {
        throw new ConfigurationError(
          `${origin} has no '${name}' column`,
          'specialtyMapping',
          { origin, columns }
        )
      }
      return index
    }
  )

  const rows: SpecialtyMappingRow[] = []
  for (const line of lines) {
    const cells = parseMappingLine(line, delimiter)
    const specialty = cells[specialtyIndex] ?? ''
    if (specialty.length === 0) continue
    rows.push({
      unitCode: cells[unitIndex] ?? '',
      normalizedLabel: cells[labelIndex] ?? '',
      specialty,
    })
  }
  return rows
}

/**
 * Splits one line into trimmed cells. Double-quoted cells may hold the
 * delimiter, and `""` inside them stands for a literal quote.
 */
function parseMappingLine(line: string, delimiter: string): string[] {
  const cells: string[] = []
  let current = ''
  let inQuotes = false

  for (let i = 0; i < line.length; i++) {
    const char = line[i]

    if (char === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"'
        i++
      } else {
        inQuotes = !inQuotes
      }
    } else if (!inQuotes && line.startsWith(delimiter, i)) {
      cells.push(current.trim())
      current = ''
      i += delimiter.length - 1
    } else {
      current += char
    }
  }

  cells.push(current.trim())
  return cells
}
