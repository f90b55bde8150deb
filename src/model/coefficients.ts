/**
 * Coefficient tables and an exact-match provider over them.
 *
 * Tables are CSV with a header row:
 *   regression.csv    region, species, bark, reg4_a, reg4_b, reg17_a, reg17_b
 *   segmentation.csv  species, bark, butt_r, butt_c, butt_e, lstem_p, ustem_b, ustem_a
 *   weight.csv        species, tons_per_cubic_foot
 *
 * bark is 1 for inside bark, 0 for outside bark.
 */

import { promises as fs } from 'fs'
import { join } from 'path'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import { CoefficientTableError } from './errors'
import type {
  BarkIndicator,
  CoefficientProvider,
  RegressionCoefficients,
  SegmentationCoefficients,
  WeightCoefficient,
} from './types'

export const DEFAULT_DATA_DIR = fileURLToPath(new URL('../../data', import.meta.url))

// ── Schemas ───────────────────────────────────────────────────────────────────

const coefficient = z.number().finite()

export const barkIndicatorSchema = z.union([z.literal(0), z.literal(1)])

export const regressionCoefficientsSchema = z.object({
  reg4_a: coefficient,
  reg4_b: coefficient,
  reg17_a: coefficient,
  reg17_b: coefficient,
})

export const segmentationCoefficientsSchema = z.object({
  butt_r: coefficient,
  butt_c: coefficient,
  butt_e: coefficient,
  lstem_p: coefficient,
  ustem_b: coefficient,
  ustem_a: coefficient,
})

export const weightCoefficientSchema = z.object({
  tonsPerCubicFoot: coefficient.positive(),
})

const csvText = z.string().trim().min(1, 'empty value')
const csvNumber = csvText.pipe(z.coerce.number().finite())
const csvBark = z.enum(['0', '1']).transform(Number).pipe(barkIndicatorSchema)

const regressionRowSchema = z.object({
  region: csvText,
  species: csvText,
  bark: csvBark,
  reg4_a: csvNumber,
  reg4_b: csvNumber,
  reg17_a: csvNumber,
  reg17_b: csvNumber,
})

const segmentationRowSchema = z.object({
  species: csvText,
  bark: csvBark,
  butt_r: csvNumber,
  butt_c: csvNumber,
  butt_e: csvNumber,
  lstem_p: csvNumber,
  ustem_b: csvNumber,
  ustem_a: csvNumber,
})

const weightRowSchema = z.object({
  species: csvText,
  tons_per_cubic_foot: csvNumber.pipe(z.number().positive()),
})

// ── Table rows ────────────────────────────────────────────────────────────────

export interface RegressionRow extends RegressionCoefficients {
  region: string
  species: string
  barkIndicator: BarkIndicator
}

export interface SegmentationRow extends SegmentationCoefficients {
  species: string
  barkIndicator: BarkIndicator
}

export interface WeightRow extends WeightCoefficient {
  species: string
}

export interface CoefficientTables {
  regression: RegressionRow[]
  segmentation: SegmentationRow[]
  weight: WeightRow[]
}

// ── CSV ───────────────────────────────────────────────────────────────────────

/** Parse a CSV row, handling quoted fields */
function parseCSVRow(line: string): string[] {
  const fields: string[] = []
  let current = ''
  let inQuotes = false
  for (const ch of line) {
    if (ch === '"') { inQuotes = !inQuotes; continue }
    if (ch === ',' && !inQuotes) { fields.push(current); current = ''; continue }
    current += ch
  }
  fields.push(current)
  return fields
}

export interface CsvRecord {
  /** 1-based line number in the source text */
  line: number
  values: Record<string, string>
}

/** Splits CSV text into records keyed by the header row. Blank lines are skipped. */
export function parseCsv(text: string): CsvRecord[] {
  const lines = text.replace(/\r/g, '').split('\n')
  const headerIndex = lines.findIndex(l => l.trim() !== '')
  if (headerIndex < 0) return []

  const header = parseCSVRow(lines[headerIndex]).map(h => h.trim())
  const records: CsvRecord[] = []
  for (let i = headerIndex + 1; i < lines.length; i++) {
    if (lines[i].trim() === '') continue
    const fields = parseCSVRow(lines[i])
    const values: Record<string, string> = {}
    header.forEach((name, col) => { values[name] = fields[col] ?? '' })
    records.push({ line: i + 1, values })
  }
  return records
}

function parseRows<S extends z.ZodTypeAny>(table: string, text: string, schema: S): Array<z.output<S>> {
  return parseCsv(text).map(record => {
    const parsed = schema.safeParse(record.values)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      throw new CoefficientTableError(table, record.line, `${issue.path.join('.') || 'row'}: ${issue.message}`)
    }
    return parsed.data
  })
}

export function parseRegressionTable(text: string): RegressionRow[] {
  return parseRows('regression', text, regressionRowSchema).map(({ bark, ...row }) => ({ ...row, barkIndicator: bark }))
}

export function parseSegmentationTable(text: string): SegmentationRow[] {
  return parseRows('segmentation', text, segmentationRowSchema).map(({ bark, ...row }) => ({ ...row, barkIndicator: bark }))
}

export function parseWeightTable(text: string): WeightRow[] {
  return parseRows('weight', text, weightRowSchema).map(row => ({
    species: row.species,
    tonsPerCubicFoot: row.tons_per_cubic_foot,
  }))
}

export async function loadCoefficientTables(dir: string = DEFAULT_DATA_DIR): Promise<CoefficientTables> {
  const [regression, segmentation, weight] = await Promise.all([
    fs.readFile(join(dir, 'regression.csv'), 'utf8'),
    fs.readFile(join(dir, 'segmentation.csv'), 'utf8'),
    fs.readFile(join(dir, 'weight.csv'), 'utf8'),
  ])
  return {
    regression: parseRegressionTable(regression),
    segmentation: parseSegmentationTable(segmentation),
    weight: parseWeightTable(weight),
  }
}

// ── Provider ──────────────────────────────────────────────────────────────────

/** Exact, case-sensitive matching; the first matching row wins */
export function createTableProvider(tables: CoefficientTables): CoefficientProvider {
  return {
    findRegression(region, species, barkIndicator) {
      const row = tables.regression.find(r =>
        r.region === region && r.species === species && r.barkIndicator === barkIndicator)
      if (!row) return undefined
      return { reg4_a: row.reg4_a, reg4_b: row.reg4_b, reg17_a: row.reg17_a, reg17_b: row.reg17_b }
    },

    findSegmentation(species, barkIndicator) {
      const row = tables.segmentation.find(r => r.species === species && r.barkIndicator === barkIndicator)
      if (!row) return undefined
      return {
        butt_r: row.butt_r,
        butt_c: row.butt_c,
        butt_e: row.butt_e,
        lstem_p: row.lstem_p,
        ustem_b: row.ustem_b,
        ustem_a: row.ustem_a,
      }
    },

    findWeight(species) {
      const row = tables.weight.find(r => r.species === species)
      return row ? { tonsPerCubicFoot: row.tonsPerCubicFoot } : undefined
    },
  }
}
