/**
 * Form input schemas — validation and defaults for every calculator view.
 *
 * Raw values arrive from the form as numbers (NaN for unparsable text) or
 * undefined for empty fields; empty fields take the defaults below.
 */

import { z } from 'zod'
import { SHAPE_KINDS, type ShapeKind } from './inertia.ts'

// ─── Field helpers ───────────────────────────────────────────────────────────

const value = (fallback: number) => z.number().finite().default(fallback)
const atLeast = (min: number, fallback: number) => z.number().finite().min(min).default(fallback)

/** Shapes offered by the complete-analysis form */
export const ANALYSIS_SHAPE_KINDS = ['solid-sphere', 'solid-cylinder', 'disk', 'rod-center'] as const satisfies readonly ShapeKind[]

// ─── Kinetic ─────────────────────────────────────────────────────────────────

export const kineticTranslationalSchema = z.object({
  mass: atLeast(0.1, 1),
  velocity: value(10),
})

export const kineticRotationalSchema = z.object({
  shape: z.enum(SHAPE_KINDS).default('solid-sphere'),
  mass: atLeast(0.1, 1),
  radius: atLeast(0.01, 0.5),
  length: atLeast(0.01, 1),
  customInertia: value(1),
  angularVelocity: value(5),
})

// ─── Potential ───────────────────────────────────────────────────────────────

export const gravitationalSchema = z.object({
  mass: atLeast(0.1, 1),
  height: value(10),
  g: value(9.81),
})

export const elasticSchema = z.object({
  springConstant: value(100),
  displacement: value(0.5),
})

// ─── Work & power ────────────────────────────────────────────────────────────

export const constantWorkSchema = z.object({
  force: value(50),
  displacement: value(5),
  angle: value(0),
})

export const forcePointSchema = z.object({
  x: z.number().finite(),
  force: z.number().finite(),
})

export const MAX_CUSTOM_POINTS = 20

/** Five points at x = 0…4 m, constant 10 N */
export const DEFAULT_CUSTOM_POINTS = Array.from({ length: 5 }, (_, i) => ({ x: i, force: 10 }))

export const variableWorkSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('linear'),
    a: value(10),
    b: value(0),
    xMax: value(5),
  }),
  z.object({
    kind: z.literal('quadratic'),
    a: value(1),
    b: value(0),
    c: value(0),
    xMax: value(5),
  }),
  z.object({
    kind: z.literal('custom'),
    points: z.array(forcePointSchema).min(2).max(MAX_CUSTOM_POINTS).default(DEFAULT_CUSTOM_POINTS),
  }),
])

export const powerSchema = z.object({
  work: value(100),
  time: atLeast(0, 10),
})

// ─── Complete analysis ───────────────────────────────────────────────────────

export const analysisSchema = z.object({
  mass: atLeast(0.1, 2),
  shape: z.enum(ANALYSIS_SHAPE_KINDS).default('solid-cylinder'),
  radius: value(0.3),
  length: value(1),
  velocity: value(5),
  angularVelocity: value(3),
  height: value(5),
})

export type KineticTranslationalInput = z.infer<typeof kineticTranslationalSchema>
export type KineticRotationalInput = z.infer<typeof kineticRotationalSchema>
export type GravitationalInput = z.infer<typeof gravitationalSchema>
export type ElasticInput = z.infer<typeof elasticSchema>
export type ConstantWorkInput = z.infer<typeof constantWorkSchema>
export type VariableWorkInput = z.infer<typeof variableWorkSchema>
export type PowerInput = z.infer<typeof powerSchema>
export type AnalysisInput = z.infer<typeof analysisSchema>

// ─── Parsing ─────────────────────────────────────────────────────────────────

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; issues: string[] }

/**
 * Validate raw form values, applying defaults.
 * Issues are flattened to "path: message" strings for display.
 */
export function parseInputs<S extends z.ZodTypeAny>(schema: S, raw: unknown): ParseResult<z.output<S>> {
  const result = schema.safeParse(raw)
  if (result.success) return { ok: true, value: result.data }
  return {
    ok: false,
    issues: result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    ),
  }
}
