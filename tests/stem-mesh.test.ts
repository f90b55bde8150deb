import { describe, it, expect, vi } from 'vitest'
import * as THREE from 'three'
import { buildStemMesh, disposeMaterials, radiusFeet, stemProfilePoints } from '../src/renderer/stem'
import { referenceModel } from './fixtures'

/**
 * LatheGeometry lays out (segments + 1) rings of profile points.
 * Ring 0 sits at phi = 0, where x = 0 and z = radius.
 */
function ringZeroVertex(mesh: THREE.Mesh, j: number): { x: number, y: number, z: number } {
  const pos = mesh.geometry.attributes.position
  return { x: pos.getX(j), y: pos.getY(j), z: pos.getZ(j) }
}

describe('stemProfilePoints', () => {
  it('starts at the axis and converts diameter (in) to radius (ft)', () => {
    const points = stemProfilePoints([
      { height: 0, diameter: 12 },
      { height: 10, diameter: 6 },
      { height: 20, diameter: 0 },
    ])
    expect(points.map(p => [p.x, p.y])).toEqual([[0, 0], [0.5, 0], [0.25, 10], [0, 20]])
  })

  it('closes the top when the last diameter is not zero', () => {
    const points = stemProfilePoints([{ height: 0, diameter: 12 }, { height: 10, diameter: 6 }])
    expect(points[points.length - 1].x).toBe(0)
    expect(points[points.length - 1].y).toBe(10)
    expect(points.length).toBe(4)
  })

  it('radiusFeet', () => {
    expect(radiusFeet(24)).toBe(1)
  })
})

describe('buildStemMesh', () => {
  const model = referenceModel()

  it('one ring of profile points per segment boundary', () => {
    // step 10 → 10 samples + butt centre = 11 profile points
    const mesh = buildStemMesh(model, { step: 10, segments: 8 })
    expect(mesh.geometry.attributes.position.count).toBe(9 * 11)
  })

  it('ring 0 follows the taper profile', () => {
    const mesh = buildStemMesh(model, { step: 10, segments: 8 })
    const butt = ringZeroVertex(mesh, 1)
    expect(butt.y).toBeCloseTo(0, 6)
    expect(butt.z).toBeCloseTo(15.7 / 24, 5)
    expect(butt.x).toBeCloseTo(0, 6)

    const at50 = ringZeroVertex(mesh, 6)
    expect(at50.y).toBeCloseTo(50, 5)
    expect(at50.z).toBeCloseTo(9.8 / 24, 5)

    const tip = ringZeroVertex(mesh, 10)
    expect(tip.y).toBeCloseTo(90, 5)
    expect(tip.z).toBeCloseTo(0, 6)
  })

  it('stem height spans the bounding box', () => {
    const mesh = buildStemMesh(model, { step: 5 })
    mesh.geometry.computeBoundingBox()
    const box = mesh.geometry.boundingBox
    expect(box).not.toBeNull()
    if (box) {
      expect(box.min.y).toBeCloseTo(0, 6)
      expect(box.max.y).toBeCloseTo(90, 6)
      expect(box.max.z).toBeCloseTo(15.7 / 24, 5)
    }
  })

  it('inside bark stems use the wood material and are named after the stem', () => {
    const mesh = buildStemMesh(model)
    expect(mesh.name).toBe('loblolly pine (16 in × 90 ft)')
    const mat = mesh.material
    expect(mat).toBeInstanceOf(THREE.MeshLambertMaterial)
    if (mat instanceof THREE.MeshLambertMaterial) expect(mat.color.getHex()).toBe(0x9b6840)
  })

  it('outside bark stems use the bark material', () => {
    const mat = buildStemMesh(referenceModel({ barkIndicator: 0 })).material
    if (mat instanceof THREE.MeshLambertMaterial) expect(mat.color.getHex()).toBe(0x5a3a1a)
    else expect.unreachable()
  })

  it('disposeMaterials releases the shared materials', () => {
    const mat = buildStemMesh(model).material
    const onDispose = vi.fn()
    if (mat instanceof THREE.Material) mat.addEventListener('dispose', onDispose)
    else expect.unreachable()
    disposeMaterials()
    expect(onDispose).toHaveBeenCalledTimes(1)
  })
})
