// Diameters in inches, heights in feet, volume in ft³, weight in tons.

export const BarkIndicator = {
  OutsideBark: 0,
  InsideBark: 1,
} as const

export type BarkIndicator = typeof BarkIndicator[keyof typeof BarkIndicator]

export interface StemDimensions {
  /** Diameter at breast height, outside bark (in) */
  dbh: number
  /** Total stem height (ft) */
  height: number
}

export interface StemDescriptors extends StemDimensions {
  /** Geographic region, e.g. "deep south". Key into the regression table */
  region: string
  species: string
  barkIndicator: BarkIndicator
}

export interface RegressionCoefficients {
  /** Intercept of DBH inside bark on DBH outside bark */
  reg4_a: number
  /** Slope of DBH inside bark on DBH outside bark */
  reg4_b: number
  /** Girard form class intercept */
  reg17_a: number
  /** Girard form class coefficient on (17.3 / H)² */
  reg17_b: number
}

export interface SegmentationCoefficients {
  butt_r: number   // butt section
  butt_c: number
  butt_e: number
  lstem_p: number  // lower stem section
  ustem_b: number  // upper stem section
  /** Join point of the upper stem, as a fraction of H - 17.3 */
  ustem_a: number
}

export interface WeightCoefficient {
  tonsPerCubicFoot: number
}

export type CoefficientGroup = 'regression' | 'segmentation'

export interface ParameterSet {
  regression: Readonly<RegressionCoefficients> | null
  segmentation: Readonly<SegmentationCoefficients> | null
  weight: Readonly<WeightCoefficient>
}

export interface CoefficientProvider {
  findRegression(region: string, species: string, barkIndicator: BarkIndicator): RegressionCoefficients | undefined
  findSegmentation(species: string, barkIndicator: BarkIndicator): SegmentationCoefficients | undefined
  findWeight(species: string): WeightCoefficient | undefined
}

/** Dimensions and coefficients as seen by the taper engine */
export interface StemState extends StemDimensions {
  barkIndicator: BarkIndicator
  parameters: ParameterSet | null
}
