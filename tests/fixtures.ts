import { createTableProvider, type CoefficientTables } from '../src/model/coefficients'
import { DEFAULT_STEM, StemModel, type StemInput } from '../src/model/stem'
import { BarkIndicator } from '../src/model/types'

// Deep-south loblolly pine rows match data/*.csv; shortleaf pine has no weight row.
export const tables: CoefficientTables = {
  regression: [
    { region: 'deep south', species: 'loblolly pine', barkIndicator: BarkIndicator.InsideBark, reg4_a: -0.3, reg4_b: 0.92, reg17_a: 0.833, reg17_b: -0.3 },
    { region: 'deep south', species: 'loblolly pine', barkIndicator: BarkIndicator.OutsideBark, reg4_a: 0, reg4_b: 1, reg17_a: 0.86, reg17_b: -0.3 },
    { region: 'piedmont', species: 'shortleaf pine', barkIndicator: BarkIndicator.InsideBark, reg4_a: -0.32, reg4_b: 0.905, reg17_a: 0.818, reg17_b: -0.29 },
  ],
  segmentation: [
    { species: 'loblolly pine', barkIndicator: BarkIndicator.InsideBark, butt_r: 31.6725, butt_c: 0.18, butt_e: 15.0, lstem_p: 3.2593, ustem_b: 1.8634, ustem_a: 0.5 },
    { species: 'loblolly pine', barkIndicator: BarkIndicator.OutsideBark, butt_r: 31.6725, butt_c: 0.2, butt_e: 18.0, lstem_p: 3.1, ustem_b: 1.8, ustem_a: 0.5 },
    { species: 'shortleaf pine', barkIndicator: BarkIndicator.InsideBark, butt_r: 29.8, butt_c: 0.15, butt_e: 13.0, lstem_p: 3.05, ustem_b: 1.72, ustem_a: 0.5 },
  ],
  weight: [
    { species: 'loblolly pine', tonsPerCubicFoot: 0.0275 },
  ],
}

export const provider = createTableProvider(tables)

/** Reference stem (deep south loblolly pine, 16 in, 90 ft, inside bark), resolved */
export function referenceModel(overrides: Partial<StemInput> = {}): StemModel {
  const model = StemModel.create({ ...DEFAULT_STEM, ...overrides })
  const result = model.resolve(provider)
  if (!result.ok) throw result.error
  return model
}
