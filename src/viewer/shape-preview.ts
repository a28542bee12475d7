/**
 * Rigid-body shape preview — a mesh of the selected shape spinning about
 * the axis its moment of inertia is taken about (Three.js +Y).
 *
 * Meshes are built at true size (meters) and the pivot group is scaled so
 * the body always fills roughly the same part of the viewport.
 * Rods lie along X; the end-axis rod is offset so the pivot is at one tip.
 */

import * as THREE from 'three'
import type { ShapeKind } from '../energy/inertia.ts'

export interface ShapeDims {
  radius: number  // m
  length: number  // m
}

export type ShapeMesh = THREE.Mesh<THREE.BufferGeometry, THREE.MeshPhongMaterial>

export interface ShapePreview {
  /** Spin pivot — add this to the scene */
  group: THREE.Group
  body: ShapeMesh | null
  key: string
  angularVelocity: number  // rad/s
}

const BODY_COLOR = 0x45b7d1
const ROD_THICKNESS = 0.03   // rod radius as a fraction of its length
const DISK_THICKNESS = 0.1   // disk height as a fraction of its radius
const CUSTOM_SIZE = 0.5
/** Target extent of the scaled body in scene units */
export const PREVIEW_SIZE = 2

function material(hollow: boolean): THREE.MeshPhongMaterial {
  return new THREE.MeshPhongMaterial({
    color: BODY_COLOR,
    specular: 0x222222,
    shininess: 40,
    transparent: hollow,
    opacity: hollow ? 0.45 : 1,
    side: hollow ? THREE.DoubleSide : THREE.FrontSide,
  })
}

/**
 * Build the mesh for one shape at true size.
 */
export function createShapeMesh(kind: ShapeKind, dims: ShapeDims): ShapeMesh {
  const { radius: r, length: L } = dims
  switch (kind) {
    case 'solid-sphere':
      return new THREE.Mesh(new THREE.SphereGeometry(r, 32, 16), material(false))
    case 'hollow-sphere':
      return new THREE.Mesh(new THREE.SphereGeometry(r, 32, 16), material(true))
    case 'solid-cylinder':
      return new THREE.Mesh(new THREE.CylinderGeometry(r, r, 2 * r, 32), material(false))
    case 'hollow-cylinder':
      return new THREE.Mesh(new THREE.CylinderGeometry(r, r, 2 * r, 32, 1, true), material(true))
    case 'disk':
      return new THREE.Mesh(new THREE.CylinderGeometry(r, r, DISK_THICKNESS * r, 32), material(false))
    case 'rod-center':
    case 'rod-end': {
      const rod = new THREE.Mesh(new THREE.CylinderGeometry(ROD_THICKNESS * L, ROD_THICKNESS * L, L, 16), material(false))
      rod.rotation.z = Math.PI / 2
      if (kind === 'rod-end') rod.position.x = L / 2
      return rod
    }
    case 'custom': {
      const blob = new THREE.Mesh(new THREE.IcosahedronGeometry(CUSTOM_SIZE, 0), material(false))
      blob.material.wireframe = true
      return blob
    }
  }
}

/** Largest true-size dimension of the shape [m]. */
export function shapeExtent(kind: ShapeKind, dims: ShapeDims): number {
  switch (kind) {
    case 'rod-center':
      return dims.length
    case 'rod-end':
      return 2 * dims.length   // spans −L … +L while spinning about the tip
    case 'custom':
      return 2 * CUSTOM_SIZE
    default:
      return 2 * dims.radius
  }
}

/** Uniform scale mapping the shape's extent to PREVIEW_SIZE. */
export function fitScale(kind: ShapeKind, dims: ShapeDims): number {
  const extent = shapeExtent(kind, dims)
  return extent > 0 ? PREVIEW_SIZE / extent : 1
}

export function createShapePreview(): ShapePreview {
  const group = new THREE.Group()
  group.name = 'shape-preview'
  return { group, body: null, key: '', angularVelocity: 0 }
}

function disposeBody(body: ShapeMesh): void {
  body.geometry.dispose()
  body.material.dispose()
}

/**
 * Swap the mesh when shape or size changed; always take the new ω.
 */
export function updateShapePreview(
  preview: ShapePreview,
  kind: ShapeKind,
  dims: ShapeDims,
  angularVelocity: number
): void {
  preview.angularVelocity = angularVelocity
  const key = `${kind}|${dims.radius}|${dims.length}`
  if (key === preview.key) return
  preview.key = key

  if (preview.body) {
    preview.group.remove(preview.body)
    disposeBody(preview.body)
  }
  preview.body = createShapeMesh(kind, dims)
  preview.group.add(preview.body)
  preview.group.scale.setScalar(fitScale(kind, dims))
}

/** Advance the spin by dt seconds. */
export function spinShape(preview: ShapePreview, dt: number): void {
  preview.group.rotation.y = (preview.group.rotation.y + preview.angularVelocity * dt) % (2 * Math.PI)
}
