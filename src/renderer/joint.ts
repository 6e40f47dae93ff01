/**
 * Builds Three.js meshes from a LapJointDesign. Scene units are mm.
 *
 *   X: along the load axis, origin at the centre of the overlap
 *   Y: through the thickness, plate 1 bottom face at y = 0
 *   Z: across the plate width, centreline at z = 0
 *
 * Plate 1 runs out towards -x, plate 2 towards +x; both cover the overlap.
 */

import * as THREE from 'three'
import type { LapJointDesign, LapJointInput } from '../model/types'
import { boltLayout } from '../model/joint'

/** Plate length drawn beyond the overlap (mm) */
export const PLATE_TAIL = 100

const BOLT_RADIAL_SEGMENTS = 24

const MAT: Record<'plate1' | 'plate2' | 'bolt', THREE.MeshLambertMaterial> = {
  plate1: new THREE.MeshLambertMaterial({ color: 0x8a9199 }),
  plate2: new THREE.MeshLambertMaterial({ color: 0x6d757d }),
  bolt:   new THREE.MeshLambertMaterial({ color: 0x3a3f44 }),
}

export function buildJointMeshes(design: LapJointDesign, input: LapJointInput): THREE.Group {
  const group = new THREE.Group()
  const { width, thickness1: t1, thickness2: t2 } = input
  const L = design.connectionLength

  group.add(plateMesh(-L / 2 - PLATE_TAIL, L / 2, 0, t1, width, MAT.plate1))
  group.add(plateMesh(-L / 2, L / 2 + PLATE_TAIL, t1, t2, width, MAT.plate2))

  for (const pos of boltLayout(design, width)) {
    group.add(boltMesh(pos.x, pos.z, design.boltDiameter, t1 + t2))
  }

  return group
}

export function disposeMaterials(): void {
  for (const mat of Object.values(MAT)) mat.dispose()
}

// ── Per-element mesh builders ─────────────────────────────────────────────────

function plateMesh(
  xStart: number,
  xEnd: number,
  yBottom: number,
  thickness: number,
  width: number,
  material: THREE.Material,
): THREE.Mesh {
  const geo = new THREE.BoxGeometry(xEnd - xStart, thickness, width)
  const mesh = new THREE.Mesh(geo, material)
  mesh.position.set((xStart + xEnd) / 2, yBottom + thickness / 2, 0)
  mesh.castShadow = true
  mesh.receiveShadow = true
  return mesh
}

// Shank only, through the full plate stack
function boltMesh(x: number, z: number, diameter: number, grip: number): THREE.Mesh {
  const geo = new THREE.CylinderGeometry(diameter / 2, diameter / 2, grip, BOLT_RADIAL_SEGMENTS)
  const mesh = new THREE.Mesh(geo, MAT.bolt)
  mesh.position.set(x, grip / 2, z)
  mesh.castShadow = true
  return mesh
}
