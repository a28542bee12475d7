/**
 * Force curves — sampled F(x) inputs for variable-force work.
 *
 * Linear and quadratic curves are sampled uniformly from x = 0 to xMax;
 * custom curves keep the user's points in entry order.
 */

import { InvalidArgumentError } from './errors.ts'

export interface ForceCurve {
  displacements: number[]   // m
  forces: number[]          // N
}

export interface LinearForce {
  kind: 'linear'
  a: number      // N/m
  b: number      // N
  xMax: number   // m
}

export interface QuadraticForce {
  kind: 'quadratic'
  a: number      // N/m²
  b: number      // N/m
  c: number      // N
  xMax: number   // m
}

export interface ForcePoint {
  x: number
  force: number
}

export type AnalyticForce = LinearForce | QuadraticForce

/** Default sample count for generated curves */
export const CURVE_SAMPLES = 100

/**
 * n evenly spaced values from start to stop, both ends included.
 */
export function linspace(start: number, stop: number, n: number): number[] {
  if (n < 2) {
    throw new InvalidArgumentError('TOO_FEW_SAMPLES', `linspace needs at least 2 points, got ${n}`)
  }
  const step = (stop - start) / (n - 1)
  const values: number[] = []
  for (let i = 0; i < n; i++) {
    values.push(i === n - 1 ? stop : start + step * i)
  }
  return values
}

/** F = a·x + b */
export function linearForceCurve(def: Omit<LinearForce, 'kind'>, samples: number = CURVE_SAMPLES): ForceCurve {
  const displacements = linspace(0, def.xMax, samples)
  return {
    displacements,
    forces: displacements.map(x => def.a * x + def.b),
  }
}

/** F = a·x² + b·x + c */
export function quadraticForceCurve(def: Omit<QuadraticForce, 'kind'>, samples: number = CURVE_SAMPLES): ForceCurve {
  const displacements = linspace(0, def.xMax, samples)
  return {
    displacements,
    forces: displacements.map(x => def.a * x * x + def.b * x + def.c),
  }
}

/** User-entered (x, F) pairs.  Order is preserved; x is not required to increase. */
export function customForceCurve(points: readonly ForcePoint[]): ForceCurve {
  return {
    displacements: points.map(p => p.x),
    forces: points.map(p => p.force),
  }
}

export function sampleForceCurve(def: AnalyticForce, samples: number = CURVE_SAMPLES): ForceCurve {
  return def.kind === 'linear'
    ? linearForceCurve(def, samples)
    : quadraticForceCurve(def, samples)
}

/**
 * Closed-form ∫₀^xMax F dx.
 */
export function analyticWork(def: AnalyticForce): number {
  const x = def.xMax
  if (def.kind === 'linear') {
    return def.a * x * x / 2 + def.b * x
  }
  return def.a * x * x * x / 3 + def.b * x * x / 2 + def.c * x
}
