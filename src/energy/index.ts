/**
 * Energy module — public API.
 *
 * Barrel export for the work & energy math library.
 * Everything in this directory is UI-independent.
 */

export { InvalidArgumentError } from './errors.ts'
export type { InvalidArgumentCode } from './errors.ts'
export {
  STANDARD_GRAVITY,
  kineticEnergyTranslational, kineticEnergyRotational,
  potentialEnergyGravitational, potentialEnergyElastic,
  workConstantForce, workVariableForce, trapezoid, power,
} from './formulas.ts'
export { SHAPES, SHAPE_KINDS, isShapeKind, momentOfInertia, toShapeSpec, getMomentOfInertia } from './inertia.ts'
export type { ShapeKind, RadiusShapeKind, LengthShapeKind, ShapeSpec, ShapeInfo, GeometryParameter, InertiaParams } from './inertia.ts'
export { CURVE_SAMPLES, linspace, linearForceCurve, quadraticForceCurve, customForceCurve, sampleForceCurve, analyticWork } from './force-curves.ts'
export type { ForceCurve, ForcePoint, LinearForce, QuadraticForce, AnalyticForce } from './force-curves.ts'
export { analyzeRigidBody, kineticTotals } from './analysis.ts'
export type { RigidBodyState, EnergyAnalysis } from './analysis.ts'
export {
  kineticTranslationalSchema, kineticRotationalSchema, gravitationalSchema, elasticSchema,
  constantWorkSchema, variableWorkSchema, forcePointSchema, powerSchema, analysisSchema,
  ANALYSIS_SHAPE_KINDS, DEFAULT_CUSTOM_POINTS, MAX_CUSTOM_POINTS, parseInputs,
} from './inputs.ts'
export type {
  KineticTranslationalInput, KineticRotationalInput, GravitationalInput, ElasticInput,
  ConstantWorkInput, VariableWorkInput, PowerInput, AnalysisInput, ParseResult,
} from './inputs.ts'
