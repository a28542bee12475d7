/**
 * Work & energy formulas — closed-form SI relations for a rigid body.
 *
 * Pure math.  No DOM or rendering dependencies.
 */

import { InvalidArgumentError } from './errors.ts'

/** Default gravitational acceleration [m/s²] */
export const STANDARD_GRAVITY = 9.81

const DEG = Math.PI / 180

// ─── Kinetic Energy ──────────────────────────────────────────────────────────

/** E = ½·m·v² */
export function kineticEnergyTranslational(mass: number, velocity: number): number {
  return 0.5 * mass * velocity * velocity
}

/** E = ½·I·ω² */
export function kineticEnergyRotational(inertia: number, angularVelocity: number): number {
  return 0.5 * inertia * angularVelocity * angularVelocity
}

// ─── Potential Energy ────────────────────────────────────────────────────────

/** E = m·g·h */
export function potentialEnergyGravitational(
  mass: number,
  height: number,
  g: number = STANDARD_GRAVITY
): number {
  return mass * g * height
}

/** E = ½·k·x² */
export function potentialEnergyElastic(springConstant: number, displacement: number): number {
  return 0.5 * springConstant * displacement * displacement
}

// ─── Work ────────────────────────────────────────────────────────────────────

/**
 * W = F·d·cos(θ), θ in degrees between force and displacement.
 */
export function workConstantForce(force: number, displacement: number, angle_deg: number = 0): number {
  return force * displacement * Math.cos(angle_deg * DEG)
}

/**
 * Composite trapezoidal rule ∫y dx over (possibly unevenly spaced) samples.
 *
 * Samples are taken in the order given; a decreasing x step contributes
 * negative area.
 */
export function trapezoid(ys: readonly number[], xs: readonly number[]): number {
  if (ys.length !== xs.length) {
    throw new InvalidArgumentError(
      'LENGTH_MISMATCH',
      `Expected matching sample counts, got ${ys.length} values and ${xs.length} positions`
    )
  }
  if (ys.length < 2) {
    throw new InvalidArgumentError(
      'TOO_FEW_SAMPLES',
      `At least 2 samples are needed to integrate, got ${ys.length}`
    )
  }

  let area = 0
  for (let i = 0; i < ys.length - 1; i++) {
    area += 0.5 * (ys[i] + ys[i + 1]) * (xs[i + 1] - xs[i])
  }
  return area
}

/** W = ∫F dx over a sampled force curve. */
export function workVariableForce(forces: readonly number[], displacements: readonly number[]): number {
  return trapezoid(forces, displacements)
}

// ─── Power ───────────────────────────────────────────────────────────────────

/** P = W / t.  Zero elapsed time yields 0. */
export function power(work: number, time: number): number {
  return time !== 0 ? work / time : 0
}
