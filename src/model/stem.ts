import { InvalidDimensionError, LookupError, type LookupFailure } from './errors'
import {
  regressionCoefficientsSchema,
  segmentationCoefficientsSchema,
  weightCoefficientSchema,
} from './coefficients'
import {
  DEFAULT_TONS_PER_CUBIC_FOOT,
  GIRARD_HEIGHT,
  dbhInsideBark,
  diameterAtGirardHeight,
  estimateDiameterAtHeight,
  estimateHeightAtDiameter,
  estimateVolume,
  estimateWeight,
  profileBasis,
  type HeightOptions,
  type ProfileBasis,
} from './taper'
import { sampleProfile, type ProfileSample, type SampleOptions } from './profile'
import {
  BarkIndicator,
  type CoefficientProvider,
  type ParameterSet,
  type StemDescriptors,
  type StemDimensions,
  type StemState,
} from './types'

export const DEFAULT_STEM: StemDescriptors = {
  region: 'deep south',
  species: 'loblolly pine',
  dbh: 16.0,
  height: 90.0,
  barkIndicator: BarkIndicator.InsideBark,
}

export type StemInput = Omit<StemDescriptors, 'barkIndicator'> & { barkIndicator: number }

export type ResolveResult = { ok: true } | { ok: false, error: LookupError }

interface DerivedCache {
  dbhInsideBark?: number
  girardDiameter?: number
  basis?: ProfileBasis
}

/**
 * A stem described by region, species, bark indicator and dimensions.
 * Coefficients are attached by resolve(); derived diameters are cached until
 * the dimensions change.
 */
export class StemModel implements StemState {
  readonly region: string
  readonly species: string
  readonly barkIndicator: BarkIndicator

  private _dbh: number
  private _height: number
  private _parameters: ParameterSet | null = null
  private cache: DerivedCache = {}

  private constructor(descriptors: StemDescriptors) {
    this.region = descriptors.region
    this.species = descriptors.species
    this.barkIndicator = descriptors.barkIndicator
    this._dbh = descriptors.dbh
    this._height = descriptors.height
  }

  /** Rejects any bark indicator other than 0 or 1 */
  static create(input: StemInput): StemModel {
    validateText('region', input.region)
    validateText('species', input.species)
    validateDimensions(input)
    const { barkIndicator } = input
    if (!isBarkIndicator(barkIndicator)) {
      throw new InvalidDimensionError('barkIndicator', barkIndicator, 'must be 1 (inside bark) or 0 (outside bark)')
    }
    return new StemModel({ ...input, barkIndicator })
  }

  get dbh(): number { return this._dbh }
  get height(): number { return this._height }
  get parameters(): ParameterSet | null { return this._parameters }

  get isResolved(): boolean {
    return this._parameters?.regression != null && this._parameters.segmentation != null
  }

  setDimensions(dimensions: Partial<StemDimensions>): void {
    const next = { dbh: dimensions.dbh ?? this._dbh, height: dimensions.height ?? this._height }
    validateDimensions(next)
    this._dbh = next.dbh
    this._height = next.height
    this.cache = {}
  }

  /**
   * Looks up coefficients for this stem. Groups already resolved are kept;
   * only missing groups are requested again.
   */
  resolve(provider: CoefficientProvider): ResolveResult {
    if (this.isResolved) return { ok: true }

    const failures: LookupFailure[] = []
    const current = this._parameters

    let regression = current?.regression ?? null
    if (!regression) {
      const found = provider.findRegression(this.region, this.species, this.barkIndicator)
      const parsed = found === undefined ? null : regressionCoefficientsSchema.safeParse(found)
      if (parsed?.success) regression = Object.freeze(parsed.data)
      else failures.push({ group: 'regression', reason: parsed ? 'invalid' : 'missing' })
    }

    let segmentation = current?.segmentation ?? null
    if (!segmentation) {
      const found = provider.findSegmentation(this.species, this.barkIndicator)
      const parsed = found === undefined ? null : segmentationCoefficientsSchema.safeParse(found)
      if (parsed?.success) segmentation = Object.freeze(parsed.data)
      else failures.push({ group: 'segmentation', reason: parsed ? 'invalid' : 'missing' })
    }

    let weight = current?.weight
    if (!weight) {
      const parsed = weightCoefficientSchema.safeParse(provider.findWeight(this.species))
      weight = Object.freeze(parsed.success ? parsed.data : { tonsPerCubicFoot: DEFAULT_TONS_PER_CUBIC_FOOT })
    }

    this._parameters = Object.freeze({ regression, segmentation, weight })
    this.cache = {}

    if (failures.length > 0) {
      return {
        ok: false,
        error: new LookupError(failures, { region: this.region, species: this.species, barkIndicator: this.barkIndicator }),
      }
    }
    return { ok: true }
  }

  // ── Derived values ──────────────────────────────────────────────────────────

  dbhInsideBark(): number {
    if (this.cache.dbhInsideBark === undefined) this.cache.dbhInsideBark = dbhInsideBark(this)
    return this.cache.dbhInsideBark
  }

  diameterAtGirardHeight(): number {
    if (this.cache.girardDiameter === undefined) this.cache.girardDiameter = diameterAtGirardHeight(this)
    return this.cache.girardDiameter
  }

  private basis(): ProfileBasis {
    if (!this.cache.basis) this.cache.basis = profileBasis(this)
    return this.cache.basis
  }

  // ── Estimators ──────────────────────────────────────────────────────────────

  estimateDiameterAtHeight(h: number): number {
    return estimateDiameterAtHeight(this.basis(), h)
  }

  estimateHeightAtDiameter(d: number, options?: HeightOptions): number {
    return estimateHeightAtDiameter(this.basis(), d, options)
  }

  estimateVolume(lower: number, upper: number): number {
    return estimateVolume(this.basis(), lower, upper)
  }

  estimateWeight(lower: number, upper: number): number {
    return estimateWeight(this.basis(), lower, upper)
  }

  sampleProfile(options?: SampleOptions): ProfileSample[] {
    return sampleProfile(this.basis(), options)
  }

  toString(): string {
    const groups = [
      this._parameters?.regression ? 'regression' : null,
      this._parameters?.segmentation ? 'segmentation' : null,
    ].filter(g => g !== null)
    return `StemModel(region="${this.region}", species="${this.species}", dbh=${this._dbh}, ` +
      `height=${this._height}, bark=${this.barkIndicator}, resolved=[${groups.join(', ')}])`
  }
}

// ── Validation ────────────────────────────────────────────────────────────────

export function isBarkIndicator(value: number): value is BarkIndicator {
  return value === BarkIndicator.InsideBark || value === BarkIndicator.OutsideBark
}

function validateText(field: string, value: string): void {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidDimensionError(field, value, 'must be a non-empty string')
  }
}

function validateDimensions({ dbh, height }: StemDimensions): void {
  if (!Number.isFinite(dbh) || dbh <= 0) {
    throw new InvalidDimensionError('dbh', dbh, 'must be a positive number of inches')
  }
  // Every section formula divides by H - 17.3
  if (!Number.isFinite(height) || height <= GIRARD_HEIGHT) {
    throw new InvalidDimensionError('height', height, `must be greater than ${GIRARD_HEIGHT} ft`)
  }
}
