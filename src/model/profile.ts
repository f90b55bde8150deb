import { InvalidDimensionError } from './errors'
import {
  BREAST_HEIGHT,
  GIRARD_HEIGHT,
  estimateDiameterAtHeight,
  estimateVolume,
  roundTo,
  type ProfileBasis,
} from './taper'

export interface SampleOptions {
  /** Spacing between samples (ft). Default: 1 */
  step?: number
  /** Also report the volume from the ground up to each sample */
  cumulativeVolume?: boolean
}

export interface ProfileSample {
  /** Height above ground (ft) */
  height: number
  /** Diameter (in), inside or outside bark as the model is */
  diameter: number
  /** Volume from 0 to height (ft³), when requested */
  volume?: number
}

/**
 * Samples the stem from the ground to the tip, always including both ends.
 * The section breakpoints (4.5 and 17.3 ft) are skipped: every section indicator
 * is off there and the equations give 0.
 */
export function sampleProfile(basis: ProfileBasis, options: SampleOptions = {}): ProfileSample[] {
  const step = options.step ?? 1
  if (!Number.isFinite(step) || step <= 0) {
    throw new InvalidDimensionError('step', step, 'must be a positive number of feet')
  }

  const heights: number[] = []
  for (let i = 0; i * step < basis.H; i++) {
    const h = roundTo(i * step, 6)
    if (h >= basis.H) break
    if (h === BREAST_HEIGHT || h === GIRARD_HEIGHT) continue
    heights.push(h)
  }
  heights.push(basis.H)

  return heights.map(height => {
    const sample: ProfileSample = { height, diameter: estimateDiameterAtHeight(basis, height) }
    if (options.cumulativeVolume) sample.volume = estimateVolume(basis, 0, height)
    return sample
  })
}
