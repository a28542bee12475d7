/**
 * Result readout — writes computed values into the [data-out] elements.
 */

import type { EnergyAnalysis } from '../energy/analysis.ts'
import type { ConstantWorkInput } from '../energy/inputs.ts'
import { formatJoules } from './chart-data.ts'
import type { FormKey } from './controls.ts'

/** Shown in place of a result whose inputs are invalid */
export const NO_RESULT = '—'

function setOutput(key: string, text: string): void {
  for (const el of Array.from(document.querySelectorAll(`[data-out="${key}"]`))) {
    el.textContent = text
  }
}

function orNone<T>(value: T | null, format: (value: T) => string): string {
  return value === null ? NO_RESULT : format(value)
}

export function fmt(n: number, digits = 2): string {
  return n.toFixed(digits)
}

const kgm2 = (n: number): string => `${fmt(n, 4)} kg·m²`

/**
 * Worked breakdown for W = F·d·cos(θ), one line per step.
 */
export function constantWorkBreakdown(input: ConstantWorkInput, work: number): string[] {
  const cos = fmt(Math.cos(input.angle * Math.PI / 180), 4)
  return [
    `Force: ${input.force} N`,
    `Displacement: ${input.displacement} m`,
    `Angle: ${input.angle}°`,
    `cos(${input.angle}°) = ${cos}`,
    `Work = ${input.force} × ${input.displacement} × ${cos} = ${formatJoules(work)}`,
  ]
}

// ─── Validation messages ─────────────────────────────────────────────────────

/** Show (or clear, with an empty list) the issue box under a form. */
export function showIssues(form: FormKey, issues: string[]): void {
  const box = document.querySelector<HTMLElement>(`[data-issues="${form}"]`)
  if (!box) return
  box.hidden = issues.length === 0
  box.textContent = issues.join('\n')
}

// ─── Sections ────────────────────────────────────────────────────────────────
// Every update takes null for "no valid result" and blanks its outputs.

export function updateTranslationalReadout(energy: number | null): void {
  setOutput('ek-trans', orNone(energy, formatJoules))
}

export interface RotationalResult {
  inertia: number
  energy: number
}

export function updateRotationalReadout(result: RotationalResult | null): void {
  setOutput('inertia', orNone(result, r => kgm2(r.inertia)))
  setOutput('ek-rot', orNone(result, r => formatJoules(r.energy)))
}

export function updateKineticTotalReadout(total: number | null): void {
  setOutput('ek-total', orNone(total, formatJoules))
}

export function updatePotentialReadout(gravitational: number | null, elastic: number | null): void {
  setOutput('ep-grav', orNone(gravitational, formatJoules))
  setOutput('ep-elastic', orNone(elastic, formatJoules))
}

export interface ConstantWorkResult {
  input: ConstantWorkInput
  work: number
}

export function updateConstantWorkReadout(result: ConstantWorkResult | null): void {
  setOutput('work-const', orNone(result, r => formatJoules(r.work)))
  setOutput('work-const-detail', orNone(result, r => constantWorkBreakdown(r.input, r.work).join('\n')))
}

export function updateVariableWorkReadout(work: number | null, analytic: number | null): void {
  setOutput('work-var', orNone(work, formatJoules))
  setOutput('work-var-exact', orNone(analytic, formatJoules))
}

export function updatePowerReadout(watts: number | null): void {
  setOutput('power', orNone(watts, w => `${fmt(w)} W`))
}

export function updateAnalysisReadout(a: EnergyAnalysis | null): void {
  const out = (key: string, format: (a: EnergyAnalysis) => string): void => setOutput(key, orNone(a, format))
  out('an-ek-trans', r => formatJoules(r.kineticTranslational))
  out('an-ek-rot', r => formatJoules(r.kineticRotational))
  out('an-ep-grav', r => formatJoules(r.potentialGravitational))
  out('an-total', r => formatJoules(r.total))
  out('an-inertia', r => kgm2(r.inertia))
  out('an-ek-total', r => formatJoules(r.kineticTotal))
  out('an-trans-share', r => `${fmt(r.translationalShare, 1)}%`)
  out('an-rot-share', r => `${fmt(r.rotationalShare, 1)}%`)
  out('an-eq-velocity', r => `${fmt(r.equivalentVelocity)} m/s`)
  out('an-eq-height', r => `${fmt(r.equivalentHeight)} m`)
  out('an-eq-omega', r => `${fmt(r.equivalentAngularVelocity)} rad/s`)
}
