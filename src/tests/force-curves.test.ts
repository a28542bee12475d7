/**
 * Force-curve sampling tests — linspace, generated curves, and the
 * trapezoidal work they feed against the closed-form integrals.
 */

import { describe, it, expect } from 'vitest'
import {
  CURVE_SAMPLES,
  linspace,
  linearForceCurve,
  quadraticForceCurve,
  customForceCurve,
  sampleForceCurve,
  analyticWork,
} from '../energy/force-curves.ts'
import { workVariableForce } from '../energy/formulas.ts'
import { InvalidArgumentError } from '../energy/errors.ts'

describe('linspace', () => {
  it('includes both ends', () => {
    expect(linspace(0, 5, 6)).toEqual([0, 1, 2, 3, 4, 5])
    expect(linspace(0, 1, 3)).toEqual([0, 0.5, 1])
  })

  it('ends exactly on stop', () => {
    const xs = linspace(0, 0.7, 100)
    expect(xs).toHaveLength(100)
    expect(xs[99]).toBe(0.7)
  })

  it('needs at least two points', () => {
    expect(() => linspace(0, 1, 1)).toThrow(InvalidArgumentError)
  })
})

describe('generated curves', () => {
  it('linear curve samples F = a·x + b on [0, xMax]', () => {
    const curve = linearForceCurve({ a: 10, b: 0, xMax: 5 })
    expect(curve.displacements).toHaveLength(CURVE_SAMPLES)
    expect(curve.forces).toHaveLength(CURVE_SAMPLES)
    expect(curve.displacements[0]).toBe(0)
    expect(curve.forces[0]).toBe(0)
    expect(curve.displacements[CURVE_SAMPLES - 1]).toBe(5)
    expect(curve.forces[CURVE_SAMPLES - 1]).toBe(50)
  })

  it('quadratic curve samples F = a·x² + b·x + c', () => {
    const curve = quadraticForceCurve({ a: 1, b: 2, c: 3, xMax: 2 }, 3)
    expect(curve.displacements).toEqual([0, 1, 2])
    expect(curve.forces).toEqual([3, 6, 11])
  })

  it('sampleForceCurve dispatches on kind', () => {
    expect(sampleForceCurve({ kind: 'linear', a: 2, b: 1, xMax: 1 }, 2).forces).toEqual([1, 3])
    expect(sampleForceCurve({ kind: 'quadratic', a: 2, b: 0, c: 1, xMax: 1 }, 2).forces).toEqual([1, 3])
  })

  it('custom curve keeps entry order', () => {
    const curve = customForceCurve([
      { x: 2, force: 5 },
      { x: 0, force: 1 },
      { x: 1, force: 3 },
    ])
    expect(curve.displacements).toEqual([2, 0, 1])
    expect(curve.forces).toEqual([5, 1, 3])
  })
})

describe('trapezoidal work vs closed form', () => {
  it('linear F = 10x on [0, 5] is exact: 125 J', () => {
    const def = { kind: 'linear', a: 10, b: 0, xMax: 5 } as const
    const curve = sampleForceCurve(def)
    expect(analyticWork(def)).toBe(125)
    expect(workVariableForce(curve.forces, curve.displacements)).toBeCloseTo(125, 9)
  })

  it('constant 10 N on [0, 5] → 50 J', () => {
    const curve = linearForceCurve({ a: 0, b: 10, xMax: 5 })
    expect(workVariableForce(curve.forces, curve.displacements)).toBeCloseTo(50, 9)
  })

  it('quadratic F = x² on [0, 5] is within 1% of 125/3', () => {
    const def = { kind: 'quadratic', a: 1, b: 0, c: 0, xMax: 5 } as const
    const exact = analyticWork(def)
    expect(exact).toBeCloseTo(125 / 3, 10)
    const curve = sampleForceCurve(def)
    const approx = workVariableForce(curve.forces, curve.displacements)
    expect(Math.abs(approx - exact) / exact).toBeLessThan(0.01)
    // convex integrand: trapezoids overestimate
    expect(approx).toBeGreaterThan(exact)
  })

  it('analyticWork includes every coefficient', () => {
    // 2·8/3 + 3·4/2 + 4·2
    expect(analyticWork({ kind: 'quadratic', a: 2, b: 3, c: 4, xMax: 2 })).toBeCloseTo(16 / 3 + 6 + 8, 10)
    expect(analyticWork({ kind: 'linear', a: 4, b: 3, xMax: 2 })).toBe(14)
  })
})
