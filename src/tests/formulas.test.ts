/**
 * Work & energy formula tests.
 *
 * Tests the pure-math functions in src/energy/formulas.ts:
 *   - kinetic (translational / rotational)
 *   - potential (gravitational / elastic)
 *   - work (constant force / trapezoidal variable force)
 *   - power
 */

import { describe, it, expect } from 'vitest'
import {
  STANDARD_GRAVITY,
  kineticEnergyTranslational,
  kineticEnergyRotational,
  potentialEnergyGravitational,
  potentialEnergyElastic,
  workConstantForce,
  workVariableForce,
  trapezoid,
  power,
} from '../energy/formulas.ts'
import { InvalidArgumentError } from '../energy/errors.ts'

function thrown(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  return undefined
}

// ─── Kinetic ─────────────────────────────────────────────────────────────────

describe('kineticEnergyTranslational', () => {
  it('2 kg at 5 m/s → 25 J', () => {
    expect(kineticEnergyTranslational(2, 5)).toBe(25)
  })

  it('zero velocity → zero energy', () => {
    expect(kineticEnergyTranslational(7, 0)).toBe(0)
  })

  it('direction of travel does not matter', () => {
    expect(kineticEnergyTranslational(3, -4)).toBe(kineticEnergyTranslational(3, 4))
  })
})

describe('kineticEnergyRotational', () => {
  it('I = 0.09 kg·m², ω = 3 rad/s → 0.405 J', () => {
    expect(kineticEnergyRotational(0.09, 3)).toBeCloseTo(0.405, 10)
  })

  it('is non-negative for negative ω', () => {
    expect(kineticEnergyRotational(2, -3)).toBe(9)
  })

  it('is zero when ω = 0 or I = 0', () => {
    expect(kineticEnergyRotational(5, 0)).toBe(0)
    expect(kineticEnergyRotational(0, 12)).toBe(0)
  })
})

// ─── Potential ───────────────────────────────────────────────────────────────

describe('potentialEnergyGravitational', () => {
  it('defaults to g = 9.81', () => {
    expect(STANDARD_GRAVITY).toBe(9.81)
    expect(potentialEnergyGravitational(2, 5)).toBeCloseTo(98.1, 10)
  })

  it('accepts a different g', () => {
    expect(potentialEnergyGravitational(1, 10, 1.62)).toBeCloseTo(16.2, 10)
  })

  it('is linear in mass, height and g independently', () => {
    const base = potentialEnergyGravitational(2, 3, 4)
    expect(potentialEnergyGravitational(6, 3, 4)).toBeCloseTo(3 * base, 10)
    expect(potentialEnergyGravitational(2, 6, 4)).toBeCloseTo(2 * base, 10)
    expect(potentialEnergyGravitational(2, 3, 2)).toBeCloseTo(base / 2, 10)
  })

  it('is negative below the reference height', () => {
    expect(potentialEnergyGravitational(1, -2, 10)).toBe(-20)
  })
})

describe('potentialEnergyElastic', () => {
  it('k = 100 N/m, x = 0.5 m → 12.5 J', () => {
    expect(potentialEnergyElastic(100, 0.5)).toBe(12.5)
  })

  it('compression and extension store the same energy', () => {
    expect(potentialEnergyElastic(100, -0.5)).toBe(12.5)
  })
})

// ─── Work ────────────────────────────────────────────────────────────────────

describe('workConstantForce', () => {
  it('aligned force: W = F·d', () => {
    expect(workConstantForce(50, 5)).toBe(250)
  })

  it('perpendicular force does no work', () => {
    expect(workConstantForce(10, 3, 90)).toBeCloseTo(0, 10)
    expect(workConstantForce(-250, 17, 90)).toBeCloseTo(0, 10)
  })

  it('60° halves the work', () => {
    expect(workConstantForce(10, 2, 60)).toBeCloseTo(10, 10)
  })

  it('opposing force does negative work', () => {
    expect(workConstantForce(10, 2, 180)).toBeCloseTo(-20, 10)
  })
})

describe('workVariableForce', () => {
  it('constant force over [0, 5] m: 10 N → 50 J', () => {
    expect(workVariableForce([10, 10, 10], [0, 2.5, 5])).toBe(50)
  })

  it('constant curve matches workConstantForce at 0°', () => {
    expect(workVariableForce([7, 7], [0, 3])).toBe(workConstantForce(7, 3, 0))
  })

  it('handles uneven spacing', () => {
    // 0.5·(0+2)·1 + 0.5·(2+2)·2
    expect(workVariableForce([0, 2, 2], [0, 1, 3])).toBe(5)
  })

  it('force against the motion gives negative work', () => {
    expect(workVariableForce([-4, -4], [0, 2])).toBe(-8)
  })

  it('decreasing displacement contributes negative area', () => {
    expect(workVariableForce([3, 3], [2, 0])).toBe(-6)
  })

  it('rejects sequences of different lengths', () => {
    const err = thrown(() => workVariableForce([1, 2, 3], [0, 1]))
    expect(err).toBeInstanceOf(InvalidArgumentError)
    expect(err instanceof InvalidArgumentError && err.code).toBe('LENGTH_MISMATCH')
  })

  it('rejects fewer than two samples', () => {
    const err = thrown(() => trapezoid([5], [0]))
    expect(err).toBeInstanceOf(InvalidArgumentError)
    expect(err instanceof InvalidArgumentError && err.code).toBe('TOO_FEW_SAMPLES')
  })
})

// ─── Power ───────────────────────────────────────────────────────────────────

describe('power', () => {
  it('W / t', () => {
    expect(power(100, 4)).toBe(25)
    expect(power(-50, 10)).toBe(-5)
  })

  it('zero time yields 0 instead of throwing', () => {
    expect(power(100, 0)).toBe(0)
  })
})
