/**
 * Three.js scene for the shape preview.
 *
 * The body is scaled to PREVIEW_SIZE and spins about +Y at the origin, so
 * the floor, axis marker and camera distance are all derived from that size.
 */

import * as THREE from 'three'
import { OrbitControls } from 'three/examples/jsm/controls/OrbitControls.js'
import { PREVIEW_SIZE } from './shape-preview.ts'

export interface SceneContext {
  scene: THREE.Scene
  camera: THREE.PerspectiveCamera
  renderer: THREE.WebGLRenderer
  controls: OrbitControls
  clock: THREE.Clock
}

export interface Stage {
  scene: THREE.Scene
  camera: THREE.PerspectiveCamera
  /** Camera distance that fits the preview */
  distance: number
}

const FOV = 45   // deg, vertical
/** Visible height as a multiple of PREVIEW_SIZE */
const FRAME_MARGIN = 1.6
const FLOOR_GAP = 0.2
/** Floor sits just below the scaled body */
export const FLOOR_Y = -(PREVIEW_SIZE / 2 + FLOOR_GAP)
const VIEW_DIRECTION = new THREE.Vector3(1, 0.7, 1.3).normalize()

/** Distance at which a PREVIEW_SIZE·FRAME_MARGIN tall view fills the FOV. */
export function previewDistance(fovDeg: number = FOV): number {
  const halfHeight = PREVIEW_SIZE * FRAME_MARGIN / 2
  return halfHeight / Math.tan(THREE.MathUtils.degToRad(fovDeg) / 2)
}

/**
 * Scene contents and camera; no renderer, so this runs without WebGL.
 */
export function createStage(): Stage {
  const scene = new THREE.Scene()

  const distance = previewDistance()
  const camera = new THREE.PerspectiveCamera(FOV, 1, distance / 20, distance * 10)
  camera.position.copy(VIEW_DIRECTION).multiplyScalar(distance)
  camera.lookAt(0, 0, 0)

  // Sky/ground fill plus one key light from the camera side
  scene.add(new THREE.HemisphereLight(0xddddff, 0x222244, 1.2))
  const key = new THREE.DirectionalLight(0xffffff, 1.4)
  key.position.copy(VIEW_DIRECTION).multiplyScalar(distance).add(new THREE.Vector3(0, distance, 0))
  scene.add(key)

  const floor = new THREE.GridHelper(3 * PREVIEW_SIZE, 12, 0x333355, 0x222244)
  floor.position.y = FLOOR_Y
  scene.add(floor)

  // Spin axis, floor to just above the body
  const axisLength = 2 * -FLOOR_Y + FLOOR_GAP
  scene.add(new THREE.ArrowHelper(new THREE.Vector3(0, 1, 0), new THREE.Vector3(0, FLOOR_Y, 0), axisLength, 0xe94560, 0.15, 0.08))

  return { scene, camera, distance }
}

export function createScene(canvas: HTMLCanvasElement): SceneContext {
  const renderer = new THREE.WebGLRenderer({ canvas, antialias: true })
  renderer.setPixelRatio(window.devicePixelRatio)
  renderer.setClearColor(0x1a1a2e)

  const { scene, camera, distance } = createStage()

  // Orbit around the spin axis only; zoom stays within a useful range
  const controls = new OrbitControls(camera, canvas)
  controls.enableDamping = true
  controls.enablePan = false
  controls.minDistance = distance / 2
  controls.maxDistance = distance * 3

  return { scene, camera, renderer, controls, clock: new THREE.Clock() }
}

export function resizeRenderer(ctx: SceneContext, container: HTMLElement): void {
  const w = container.clientWidth
  const h = container.clientHeight
  if (w === 0 || h === 0) return
  ctx.renderer.setSize(w, h)
  ctx.camera.aspect = w / h
  ctx.camera.updateProjectionMatrix()
}
