/**
 * Builds a Three.js mesh of the stem by revolving the taper profile around
 * the vertical axis. One scene unit is one foot.
 *
 * Profile points run from the ground to the tip:
 *   (0, 0)            closes the butt
 *   (d/24, h) ...     radius in feet from each sampled diameter in inches
 *   (0, H)            tip
 */

import * as THREE from 'three'
import type { StemModel } from '../model/stem'
import type { ProfileSample } from '../model/profile'
import { BarkIndicator } from '../model/types'

const MAT = {
  wood: new THREE.MeshLambertMaterial({ color: 0x9b6840 }),
  bark: new THREE.MeshLambertMaterial({ color: 0x5a3a1a }),
}

export interface StemRenderOptions {
  /** Radial segments around the stem. Default: 24 */
  segments?: number
  /** Vertical spacing between profile samples (ft). Default: 1 */
  step?: number
}

/** Inches of diameter to feet of radius */
export function radiusFeet(diameterInches: number): number {
  return diameterInches / 24
}

export function stemProfilePoints(samples: ProfileSample[]): THREE.Vector2[] {
  const points = [new THREE.Vector2(0, 0)]
  for (const s of samples) points.push(new THREE.Vector2(radiusFeet(s.diameter), s.height))
  const top = samples[samples.length - 1]
  if (top && top.diameter > 0) points.push(new THREE.Vector2(0, top.height))
  return points
}

export function buildStemMesh(model: StemModel, options?: StemRenderOptions): THREE.Mesh {
  const samples = model.sampleProfile({ step: options?.step ?? 1 })
  const geo = new THREE.LatheGeometry(stemProfilePoints(samples), options?.segments ?? 24)
  const mesh = new THREE.Mesh(geo, model.barkIndicator === BarkIndicator.InsideBark ? MAT.wood : MAT.bark)
  mesh.name = `${model.species} (${model.dbh} in × ${model.height} ft)`
  mesh.castShadow = true
  mesh.receiveShadow = true
  return mesh
}

export function disposeMaterials(): void {
  for (const mat of Object.values(MAT)) mat.dispose()
}
