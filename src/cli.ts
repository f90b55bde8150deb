import { createTableProvider, type CoefficientTables } from './model/coefficients'
import { DEFAULT_STEM, StemModel } from './model/stem'

// ── Args ─────────────────────────────────────────────────────────────────────
// key=value pairs, e.g.  dbh=14 height=80 species="slash pine" bark=0
export function parseArgs(argv: string[]): Record<string, string> {
  const pairs: Record<string, string> = {}
  for (const part of argv) {
    const eq = part.indexOf('=')
    if (eq <= 0) continue
    const k = part.slice(0, eq).trim()
    const v = part.slice(eq + 1).trim()
    if (k && v) pairs[k] = v
  }
  return pairs
}

export function argFloat(args: Record<string, string>, key: string, fallback: number): number {
  const v = parseFloat(args[key])
  return Number.isFinite(v) ? v : fallback
}

// ── Report ───────────────────────────────────────────────────────────────────
export interface DemoQueries {
  height: number
  diameter: number
  lower: number
  upper: number
}

export const DEMO_QUERIES: DemoQueries = { height: 50, diameter: 9, lower: 1, upper: 50 }

export function report(model: StemModel, q: DemoQueries): string[] {
  return [
    String(model),
    `Diameter at ${q.height} ft: ${model.estimateDiameterAtHeight(q.height)} in`,
    `Height at diameter ${q.diameter} in: ${model.estimateHeightAtDiameter(q.diameter)} ft`,
    `Volume between ${q.lower} and ${q.upper} ft: ${model.estimateVolume(q.lower, q.upper)} ft³`,
    `Weight between ${q.lower} and ${q.upper} ft: ${model.estimateWeight(q.lower, q.upper)} tons`,
  ]
}

/** Builds and resolves a model from CLI arguments; returns the report lines or the lookup error */
export function run(argv: string[], tables: CoefficientTables): { ok: true, lines: string[] } | { ok: false, message: string } {
  const args = parseArgs(argv)

  const model = StemModel.create({
    region: args.region ?? DEFAULT_STEM.region,
    species: args.species ?? DEFAULT_STEM.species,
    dbh: argFloat(args, 'dbh', DEFAULT_STEM.dbh),
    height: argFloat(args, 'height', DEFAULT_STEM.height),
    barkIndicator: argFloat(args, 'bark', DEFAULT_STEM.barkIndicator),
  })

  const resolved = model.resolve(createTableProvider(tables))
  if (!resolved.ok) {
    return { ok: false, message: resolved.error.message }
  }

  const queries: DemoQueries = {
    height: argFloat(args, 'h', DEMO_QUERIES.height),
    diameter: argFloat(args, 'd', DEMO_QUERIES.diameter),
    lower: argFloat(args, 'lower', DEMO_QUERIES.lower),
    upper: argFloat(args, 'upper', DEMO_QUERIES.upper),
  }
  return { ok: true, lines: report(model, queries) }
}
