/**
 * Complete energy analysis of a single rigid body.
 *
 * Combines translational KE, rotational KE and gravitational PE for one
 * state, then re-expresses the total as the equivalent pure speed, height
 * and spin rate.
 */

import {
  kineticEnergyTranslational,
  kineticEnergyRotational,
  potentialEnergyGravitational,
  STANDARD_GRAVITY,
} from './formulas.ts'
import { momentOfInertia, type ShapeSpec } from './inertia.ts'

export interface RigidBodyState {
  mass: number             // kg
  shape: ShapeSpec
  velocity: number         // m/s
  angularVelocity: number  // rad/s
  height: number           // m
  g?: number               // m/s²
}

export interface EnergyAnalysis {
  inertia: number               // kg·m²
  kineticTranslational: number  // J
  kineticRotational: number     // J
  potentialGravitational: number
  kineticTotal: number
  total: number
  translationalShare: number    // % of total
  rotationalShare: number       // % of total
  equivalentVelocity: number    // m/s, all of E as ½mv²
  equivalentHeight: number      // m, all of E as mgh
  equivalentAngularVelocity: number // rad/s, all of E as ½Iω²
}

/** a / b, or 0 when b is 0 */
function ratio(a: number, b: number): number {
  return b !== 0 ? a / b : 0
}

/** √(2E/k) with the same zero convention; negative radicands give 0 */
function speedFromEnergy(energy: number, k: number): number {
  const r = ratio(2 * energy, k)
  return r > 0 ? Math.sqrt(r) : 0
}

export function analyzeRigidBody(state: RigidBodyState): EnergyAnalysis {
  const g = state.g ?? STANDARD_GRAVITY
  const inertia = momentOfInertia(state.shape)

  const kineticTranslational = kineticEnergyTranslational(state.mass, state.velocity)
  const kineticRotational = kineticEnergyRotational(inertia, state.angularVelocity)
  const potentialGravitational = potentialEnergyGravitational(state.mass, state.height, g)

  const kineticTotal = kineticTranslational + kineticRotational
  const total = kineticTotal + potentialGravitational

  return {
    inertia,
    kineticTranslational,
    kineticRotational,
    potentialGravitational,
    kineticTotal,
    total,
    translationalShare: ratio(kineticTranslational, total) * 100,
    rotationalShare: ratio(kineticRotational, total) * 100,
    equivalentVelocity: speedFromEnergy(total, state.mass),
    equivalentHeight: ratio(total, state.mass * g),
    equivalentAngularVelocity: speedFromEnergy(total, inertia),
  }
}

/**
 * Translational, rotational and combined KE, in chart order.
 */
export function kineticTotals(kineticTranslational: number, kineticRotational: number): [number, number, number] {
  return [kineticTranslational, kineticRotational, kineticTranslational + kineticRotational]
}
