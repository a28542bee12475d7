/**
 * Work & Energy Visualizer — main entry point.
 *
 * Wires together:
 * - Calculator forms (controls)
 * - Work & energy math
 * - Result readout
 * - Energy / force charts
 * - Three.js rigid-body preview
 *
 * Every form edit runs one full pass: validate → compute → render.
 */

import { setupControls, type CalculatorState, type FormKey, type ViewKey } from './ui/controls.ts'
import {
  showIssues,
  updateTranslationalReadout,
  updateRotationalReadout,
  updateKineticTotalReadout,
  updatePotentialReadout,
  updateConstantWorkReadout,
  updateVariableWorkReadout,
  updatePowerReadout,
  updateAnalysisReadout,
} from './ui/readout.ts'
import { energyDistributionChart, forceDisplacementChart } from './ui/chart-data.ts'
import { renderEnergyChart, renderForceChart, clearChart } from './ui/energy-charts.ts'
import {
  InvalidArgumentError,
  kineticEnergyTranslational,
  kineticEnergyRotational,
  potentialEnergyGravitational,
  potentialEnergyElastic,
  workConstantForce,
  workVariableForce,
  power,
  momentOfInertia,
  toShapeSpec,
  customForceCurve,
  sampleForceCurve,
  analyticWork,
  analyzeRigidBody,
  kineticTotals,
  parseInputs,
  kineticTranslationalSchema,
  kineticRotationalSchema,
  gravitationalSchema,
  elasticSchema,
  constantWorkSchema,
  variableWorkSchema,
  powerSchema,
  analysisSchema,
} from './energy/index.ts'
import type { ShapeKind } from './energy/index.ts'
import type { z } from 'zod'
import { createScene, resizeRenderer, type SceneContext } from './viewer/scene.ts'
import { createShapePreview, updateShapePreview, spinShape, type ShapePreview } from './viewer/shape-preview.ts'

// ─── App State ───────────────────────────────────────────────────────────────

let sceneCtx: SceneContext | null = null
let preview: ShapePreview | null = null

const VIEWS_WITH_PREVIEW: readonly ViewKey[] = ['kinetic', 'analysis']

// ─── Pass helpers ────────────────────────────────────────────────────────────

/**
 * Validate one form.  Invalid input is shown under the form and yields null.
 */
function validated<S extends z.ZodTypeAny>(form: FormKey, schema: S, raw: unknown): z.output<S> | null {
  const result = parseInputs(schema, raw)
  if (result.ok) {
    showIssues(form, [])
    return result.value
  }
  console.warn(`Invalid ${form} input:`, result.issues)
  showIssues(form, result.issues)
  return null
}

/**
 * Run a computation for one form.  Library argument errors are shown
 * like validation issues; anything else propagates.
 */
function guarded<T>(form: FormKey, compute: () => T): T | null {
  try {
    return compute()
  } catch (err) {
    if (!(err instanceof InvalidArgumentError)) throw err
    console.warn(`${form}: ${err.message}`)
    showIssues(form, [err.message])
    return null
  }
}

function showView(view: ViewKey): void {
  for (const panel of Array.from(document.querySelectorAll<HTMLElement>('[data-view]'))) {
    panel.hidden = panel.dataset.view !== view
  }
  const viewport = document.getElementById('viewport')
  if (viewport) viewport.hidden = !VIEWS_WITH_PREVIEW.includes(view)
}

function previewShape(kind: ShapeKind, radius: number, length: number, omega: number): void {
  if (preview) updateShapePreview(preview, kind, { radius, length }, omega)
}

// ─── Views ───────────────────────────────────────────────────────────────────

function updateKinetic(forms: CalculatorState['forms']): void {
  const trans = validated('kineticTranslational', kineticTranslationalSchema, forms.kineticTranslational)
  const ekTrans = trans ? kineticEnergyTranslational(trans.mass, trans.velocity) : null
  updateTranslationalReadout(ekTrans)

  const rot = validated('kineticRotational', kineticRotationalSchema, forms.kineticRotational)
  const rotation = rot ? guarded('kineticRotational', () => {
    const inertia = momentOfInertia(toShapeSpec(rot.shape, rot.mass, {
      radius: rot.radius,
      length: rot.length,
      customInertia: rot.customInertia,
    }))
    previewShape(rot.shape, rot.radius, rot.length, rot.angularVelocity)
    return { inertia, energy: kineticEnergyRotational(inertia, rot.angularVelocity) }
  }) : null
  updateRotationalReadout(rotation)
  const ekRot = rotation ? rotation.energy : null

  if (ekTrans === null || ekRot === null) {
    updateKineticTotalReadout(null)
    clearChart('kinetic-chart')
    return
  }
  const totals = kineticTotals(ekTrans, ekRot)
  updateKineticTotalReadout(totals[2])
  renderEnergyChart('kinetic-chart', energyDistributionChart(totals, ['Translational', 'Rotational', 'Total']))
}

function updatePotential(forms: CalculatorState['forms']): void {
  const grav = validated('gravitational', gravitationalSchema, forms.gravitational)
  const elastic = validated('elastic', elasticSchema, forms.elastic)
  updatePotentialReadout(
    grav ? potentialEnergyGravitational(grav.mass, grav.height, grav.g) : null,
    elastic ? potentialEnergyElastic(elastic.springConstant, elastic.displacement) : null,
  )
}

function updateWork(forms: CalculatorState['forms']): void {
  const constant = validated('constantWork', constantWorkSchema, forms.constantWork)
  updateConstantWorkReadout(constant ? {
    input: constant,
    work: workConstantForce(constant.force, constant.displacement, constant.angle),
  } : null)

  const variable = validated('variableWork', variableWorkSchema, forms.variableWork)
  const result = variable ? guarded('variableWork', () => {
    const curve = variable.kind === 'custom'
      ? customForceCurve(variable.points)
      : sampleForceCurve(variable)
    return {
      work: workVariableForce(curve.forces, curve.displacements),
      analytic: variable.kind === 'custom' ? null : analyticWork(variable),
      chart: forceDisplacementChart(curve.forces, curve.displacements),
    }
  }) : null

  updateVariableWorkReadout(result ? result.work : null, result ? result.analytic : null)
  if (result) renderForceChart('force-chart', result.chart)
  else clearChart('force-chart')
}

function updatePower(forms: CalculatorState['forms']): void {
  const input = validated('power', powerSchema, forms.power)
  updatePowerReadout(input ? power(input.work, input.time) : null)
}

function updateAnalysis(forms: CalculatorState['forms']): void {
  const input = validated('analysis', analysisSchema, forms.analysis)
  const analysis = input ? guarded('analysis', () => analyzeRigidBody({
    mass: input.mass,
    shape: toShapeSpec(input.shape, input.mass, { radius: input.radius, length: input.length }),
    velocity: input.velocity,
    angularVelocity: input.angularVelocity,
    height: input.height,
  })) : null

  updateAnalysisReadout(analysis)
  if (!input || !analysis) {
    clearChart('analysis-chart')
    return
  }
  previewShape(input.shape, input.radius, input.length, input.angularVelocity)
  renderEnergyChart('analysis-chart', energyDistributionChart(
    [analysis.kineticTranslational, analysis.kineticRotational, analysis.potentialGravitational],
    ['Translational KE', 'Rotational KE', 'Gravitational PE'],
  ))
}

// ─── Update Pass ─────────────────────────────────────────────────────────────

function updateCalculator(state: CalculatorState): void {
  showView(state.view)
  switch (state.view) {
    case 'kinetic':
      updateKinetic(state.forms)
      break
    case 'potential':
      updatePotential(state.forms)
      break
    case 'work':
      updateWork(state.forms)
      break
    case 'power':
      updatePower(state.forms)
      break
    case 'analysis':
      updateAnalysis(state.forms)
      break
  }
  if (sceneCtx) resizeRenderer(sceneCtx, sceneCtx.renderer.domElement.parentElement ?? document.body)
}

// ─── Initialization ──────────────────────────────────────────────────────────

function init(): void {
  const canvas = document.getElementById('three-canvas')
  const viewport = document.getElementById('viewport')

  if (canvas instanceof HTMLCanvasElement && viewport) {
    const ctx = createScene(canvas)
    const shapePreview = createShapePreview()
    ctx.scene.add(shapePreview.group)
    sceneCtx = ctx
    preview = shapePreview

    window.addEventListener('resize', () => resizeRenderer(ctx, viewport))

    // Render loop
    const animate = (): void => {
      requestAnimationFrame(animate)
      spinShape(shapePreview, ctx.clock.getDelta())
      ctx.controls.update()
      ctx.renderer.render(ctx.scene, ctx.camera)
    }
    animate()
  } else {
    console.warn('3D viewport not found — shape preview disabled')
  }

  // Setup UI controls — this returns the initial state
  const initial = setupControls(updateCalculator)
  updateCalculator(initial)
}

// ─── Start ───────────────────────────────────────────────────────────────────

try {
  init()
} catch (err) {
  console.error('Failed to initialize Work & Energy Visualizer:', err)
  const message = err instanceof Error ? err.message : String(err)
  document.body.innerHTML = `<div style="color:red;padding:2em;">Initialization failed: ${message}</div>`
}
