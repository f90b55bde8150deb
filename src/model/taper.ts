/**
 * Segmented stem-profile equations.
 * Source: Clark, A. III, Souter, R. A., Schlaegel, B. E. (1991)
 *         Stem Profile Equations for Southern Tree Species.
 *
 * Notation follows the paper:
 *   D  diameter at breast height (inside bark when the model is inside bark)
 *   H  total height
 *   F  diameter at Girard height (17.3 ft)
 *   r, c, e   butt section (h < 4.5)
 *   p         lower stem (4.5 < h < 17.3)
 *   b, a      upper stem (h > 17.3); a locates the join point as a fraction of H - 17.3
 *
 * Section indicators use strict comparisons, so at exactly 4.5 and 17.3 ft every
 * section is switched off and the diameter evaluates to 0.
 */

import { DomainError, UnresolvedParametersError } from './errors'
import {
  BarkIndicator,
  type CoefficientGroup,
  type RegressionCoefficients,
  type SegmentationCoefficients,
  type StemState,
} from './types'

export const BREAST_HEIGHT = 4.5
export const GIRARD_HEIGHT = 17.3

/** π / (4 · 144): converts in²·ft to ft³ */
export const CUBIC_FEET_FACTOR = 0.005454154

/** Weight factor (tons/ft³) used when a species has no entry of its own */
export const DEFAULT_TONS_PER_CUBIC_FOOT = 0.022

/** Everything the estimators need, gathered once per set of dimensions */
export interface ProfileBasis {
  D: number
  H: number
  F: number
  seg: Readonly<SegmentationCoefficients>
  tonsPerCubicFoot: number
}

export type HeightExponentMode = 'inverse' | 'legacy'

export interface HeightOptions {
  /**
   * 'inverse' (default) raises to 1/r and 1/p, the true inverse of the butt and
   * lower stem terms. 'legacy' reproduces the historical `x**1/r` reading,
   * i.e. x / r, for comparison with older outputs.
   */
  exponent?: HeightExponentMode
}

/**
 * Rounds half away from zero to a fixed number of decimals, never returning -0.
 * Ties are decided on `value * 10^decimals`, so 1.115 (stored just below) still
 * gives 1.12 because the scaled product lands on 111.5.
 */
export function roundTo(value: number, decimals: number): number {
  const f = 10 ** decimals
  const rounded = Math.sign(value) * Math.round(Math.abs(value) * f) / f
  return rounded === 0 ? 0 : rounded
}

// ── Derived diameters ─────────────────────────────────────────────────────────

/** Eq. 7: DBH inside bark from DBH outside bark */
export function dbhInsideBark(stem: StemState): number {
  const reg = requireRegression(stem, 'dbhInsideBark')
  return roundTo(reg.reg4_a + reg.reg4_b * stem.dbh, 2)
}

/** Eq. 10: diameter at 17.3 ft */
export function diameterAtGirardHeight(stem: StemState): number {
  const reg = requireRegression(stem, 'diameterAtGirardHeight')
  const result = stem.dbh * (reg.reg17_a + reg.reg17_b * (GIRARD_HEIGHT / stem.height) ** 2)
  return finite(roundTo(result, 2), 'diameterAtGirardHeight')
}

export function profileBasis(stem: StemState): ProfileBasis {
  const params = stem.parameters
  if (!params?.regression || !params.segmentation) {
    const missing: CoefficientGroup[] = []
    if (!params?.regression) missing.push('regression')
    if (!params?.segmentation) missing.push('segmentation')
    throw new UnresolvedParametersError(missing, 'profileBasis')
  }

  const D = stem.barkIndicator === BarkIndicator.InsideBark ? dbhInsideBark(stem) : stem.dbh
  return {
    D,
    H: stem.height,
    F: diameterAtGirardHeight(stem),
    seg: params.segmentation,
    tonsPerCubicFoot: params.weight.tonsPerCubicFoot,
  }
}

// ── Estimators ────────────────────────────────────────────────────────────────

/** Eq. 1: stem diameter (in) at height h (ft), for 0 ≤ h ≤ H */
export function estimateDiameterAtHeight(basis: ProfileBasis, h: number): number {
  const op = 'estimateDiameterAtHeight'
  const { D, H, F } = basis
  requireFinite(h, 'h', op)
  if (h < 0 || h > H) throw new DomainError(op, `h=${h} ft is outside the stem (0 to ${H} ft)`)
  const { butt_r: r, butt_c: c, butt_e: e, lstem_p: p, ustem_b: b, ustem_a: a } = basis.seg
  const upperSpan = nonZero(H - GIRARD_HEIGHT, 'H - 17.3', op)
  nonZero(H - BREAST_HEIGHT, 'H - 4.5', op)

  const idS = h < BREAST_HEIGHT ? 1 : 0
  const idB = h > BREAST_HEIGHT && h < GIRARD_HEIGHT ? 1 : 0
  const idT = h > GIRARD_HEIGHT ? 1 : 0
  const idM = h < GIRARD_HEIGHT + a * upperSpan ? 1 : 0

  const G = (1 - BREAST_HEIGHT / H) ** r
  const X = (1 - BREAST_HEIGHT / H) ** p
  const Y = (1 - GIRARD_HEIGHT / H) ** p
  const t = (h - GIRARD_HEIGHT) / upperSpan

  const d1 = idS === 0 ? 0 :
    D ** 2 * (1 + (c + e / D ** 3) * ((1 - h / H) ** r - G) / nonZero(1 - G, '1 - (1 - 4.5/H)^r', op))
  const d2 = idB === 0 ? 0 :
    D ** 2 - (D ** 2 - F ** 2) * (X - (1 - h / H) ** p) / nonZero(X - Y, '(1 - 4.5/H)^p - (1 - 17.3/H)^p', op)
  const d3 = idT === 0 ? 0 :
    F ** 2 * (b * (t - 1) ** 2 + idM * ((1 - b) / nonZero(a, 'a', op) ** 2) * (a - t) ** 2)

  const squared = finite(d1 + d2 + d3, op)
  if (squared < 0) {
    throw new DomainError(op, `negative squared diameter ${squared} at h=${h}`)
  }
  return roundTo(Math.sqrt(squared), 2)
}

/** Eq. 2: stem height (ft) at which the diameter equals d (in) */
export function estimateHeightAtDiameter(basis: ProfileBasis, d: number, options: HeightOptions = {}): number {
  const op = 'estimateHeightAtDiameter'
  const legacy = options.exponent === 'legacy'
  const { D, H, F } = basis
  const { butt_r: r, butt_c: c, butt_e: e, lstem_p: p, ustem_b: b, ustem_a: a } = basis.seg
  requireFinite(d, 'd', op)
  if (d < 0) throw new DomainError(op, `negative diameter d=${d}`)
  const d2 = d ** 2

  const idS = d2 >= D ** 2 ? 1 : 0
  const idB = D ** 2 > d2 && d2 >= F ** 2 ? 1 : 0
  const idT = F ** 2 > d2 ? 1 : 0
  const idM = d2 > b * (a - 1) ** 2 * F ** 2 ? 1 : 0

  const G = (1 - BREAST_HEIGHT / H) ** r
  const W = (c + e / D ** 3) / nonZero(1 - G, '1 - G', op)
  const X = (1 - BREAST_HEIGHT / H) ** p
  const Y = (1 - GIRARD_HEIGHT / H) ** p
  const Z = (D ** 2 - F ** 2) / nonZero(X - Y, 'X - Y', op)

  const root = (x: number, n: number): number => legacy ? x ** 1 / n : x ** (1 / n)

  const h1 = idS === 0 ? 0 :
    H * (1 - root((d2 / D ** 2 - 1) / nonZero(W, 'W', op) + G, r))
  const h2 = idB === 0 ? 0 :
    H * (1 - root(X - (D ** 2 - d2) / nonZero(Z, 'Z', op), p))

  let h3 = 0
  if (idT === 1) {
    const aSquared = nonZero(a, 'a', op) ** 2
    const Qa = b + idM * (1 - b) / aSquared
    const Qb = -2 * b - idM * 2 * (1 - b) / a
    const Qc = b + (1 - b) * idM - d2 / nonZero(F, 'F', op) ** 2
    h3 = GIRARD_HEIGHT + (H - GIRARD_HEIGHT) * stableQuadraticRoot(Qa, Qb, Qc)
  }

  const height = roundTo(finite(h1 + h2 + h3, op), 2)
  if (height < 0 || height > H) {
    throw new DomainError(op, `d=${d} in is not reached on the stem (solved height ${height} ft, stem 0 to ${H} ft)`)
  }
  return height
}

/**
 * Eq. 3: volume (ft³) between lower and upper heights (ft), to the nearest ft³.
 * Bounds outside the stem are truncated to [0, H].
 */
export function estimateVolume(basis: ProfileBasis, lower: number, upper: number): number {
  const op = 'estimateVolume'
  const { D, H, F } = basis
  requireFinite(lower, 'lower', op)
  requireFinite(upper, 'upper', op)
  if (lower > upper) throw new DomainError(op, `lower=${lower} is above upper=${upper}`)
  const { butt_r: r, butt_c: c, butt_e: e, lstem_p: p, ustem_b: b, ustem_a: a } = basis.seg
  const span = nonZero(H - GIRARD_HEIGHT, 'H - 17.3', op)
  nonZero(H - BREAST_HEIGHT, 'H - 4.5', op)

  const G = (1 - BREAST_HEIGHT / H) ** r
  const W = (c + e / D ** 3) / nonZero(1 - G, '1 - G', op)
  const X = (1 - BREAST_HEIGHT / H) ** p
  const Y = (1 - GIRARD_HEIGHT / H) ** p
  const Z = (D ** 2 - F ** 2) / nonZero(X - Y, 'X - Y', op)
  const T = D ** 2 - Z * X

  // Sub-interval bounds, clamped to each section
  const L1 = Math.max(lower, 0)
  const U1 = Math.min(upper, BREAST_HEIGHT)
  const L2 = Math.max(lower, BREAST_HEIGHT)
  const U2 = Math.min(upper, GIRARD_HEIGHT)
  const L3 = Math.max(lower, GIRARD_HEIGHT)
  const U3 = Math.min(upper, H)

  // A section contributes only when its sub-interval is non-empty
  const i1 = U1 > L1 ? 1 : 0
  const i2 = U2 > L2 ? 1 : 0
  const i3 = U3 > L3 ? 1 : 0
  const i4 = L3 - GIRARD_HEIGHT < a * span ? 1 : 0
  const i5 = U3 - GIRARD_HEIGHT < a * span ? 1 : 0

  const v1 = i1 === 0 ? 0 :
    D ** 2 * ((1 - G * W) * (U1 - L1) + W * ((1 - L1 / H) ** r * (H - L1) - (1 - U1 / H) ** r * (H - U1)) / (r + 1))
  const v2 = i2 === 0 ? 0 :
    T * (U2 - L2) + Z * ((1 - L2 / H) ** p * (H - L2) - (1 - U2 / H) ** p * (H - U2)) / (p + 1)

  let v3 = 0
  if (i3 === 1) {
    const lo = L3 - GIRARD_HEIGHT
    const hi = U3 - GIRARD_HEIGHT
    const k = (1 / 3) * ((1 - b) / nonZero(a, 'a', op) ** 2)
    v3 = F ** 2 * (
      b * (U3 - L3)
      - b * (hi ** 2 - lo ** 2) / span
      + (b / 3) * (hi ** 3 - lo ** 3) / span ** 2
      + i4 * k * (a * span - lo) ** 3 / span ** 2
      - i5 * k * (a * span - hi) ** 3 / span ** 2
    )
  }

  return roundTo(finite(CUBIC_FEET_FACTOR * (v1 + v2 + v3), op), 0)
}

/** Weight (tons) between two heights, from the rounded volume */
export function estimateWeight(basis: ProfileBasis, lower: number, upper: number): number {
  return roundTo(estimateVolume(basis, lower, upper) * basis.tonsPerCubicFoot, 2)
}

/**
 * Root of qa·t² + qb·t + qc = 0 taken by the upper stem section:
 * t = (-qb - √(qb² - 4·qa·qc)) / (2·qa)
 */
export function stableQuadraticRoot(qa: number, qb: number, qc: number): number {
  const op = 'stableQuadraticRoot'
  const discriminant = qb ** 2 - 4 * qa * qc
  if (discriminant < 0) {
    throw new DomainError(op, `negative discriminant ${discriminant}`)
  }
  return finite((-qb - Math.sqrt(discriminant)) / (2 * nonZero(qa, 'qa', op)), op)
}

// ── Helpers ───────────────────────────────────────────────────────────────────

function requireRegression(stem: StemState, operation: string): Readonly<RegressionCoefficients> {
  const reg = stem.parameters?.regression
  if (!reg) throw new UnresolvedParametersError(['regression'], operation)
  return reg
}

function nonZero(value: number, label: string, operation: string): number {
  if (value === 0) throw new DomainError(operation, `division by zero (${label} = 0)`)
  return value
}

function requireFinite(value: number, label: string, operation: string): void {
  if (!Number.isFinite(value)) throw new DomainError(operation, `${label} must be a finite number, got ${value}`)
}

function finite(value: number, operation: string): number {
  if (!Number.isFinite(value)) throw new DomainError(operation, `non-finite result (${value})`)
  return value
}
