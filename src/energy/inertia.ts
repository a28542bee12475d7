/**
 * Moment of inertia — closed-form I for the standard rigid bodies.
 *
 * Each shape carries exactly the geometry it needs (radius or length),
 * so a resolved ShapeSpec can never silently produce I = 0.
 * The string-keyed getMomentOfInertia() entry point validates the
 * parameter bag before building a ShapeSpec.
 */

import { InvalidArgumentError } from './errors.ts'

// ─── Shapes ──────────────────────────────────────────────────────────────────

/** Every supported shape, in menu order */
export const SHAPE_KINDS = [
  'solid-sphere', 'hollow-sphere', 'solid-cylinder', 'hollow-cylinder',
  'rod-center', 'rod-end', 'disk', 'custom',
] as const

export type ShapeKind = (typeof SHAPE_KINDS)[number]
export type LengthShapeKind = 'rod-center' | 'rod-end'
export type RadiusShapeKind = Exclude<ShapeKind, LengthShapeKind | 'custom'>

export type ShapeSpec =
  | { kind: RadiusShapeKind; mass: number; radius: number }
  | { kind: LengthShapeKind; mass: number; length: number }
  | { kind: 'custom'; inertia: number }

export type GeometryParameter = 'radius' | 'length'

export interface ShapeInfo {
  label: string
  /** Geometry field the formula needs; null for a directly entered I */
  parameter: GeometryParameter | null
  /** k in I = k·m·r² (or k·m·L²) */
  coefficient: number
  formula: string
}

export const SHAPES: Readonly<Record<ShapeKind, Readonly<ShapeInfo>>> = {
  'solid-sphere':    { label: 'Solid sphere',       parameter: 'radius', coefficient: 2 / 5,  formula: 'I = (2/5)·m·r²' },
  'hollow-sphere':   { label: 'Hollow sphere',      parameter: 'radius', coefficient: 2 / 3,  formula: 'I = (2/3)·m·r²' },
  'solid-cylinder':  { label: 'Solid cylinder',     parameter: 'radius', coefficient: 1 / 2,  formula: 'I = (1/2)·m·r²' },
  'hollow-cylinder': { label: 'Hollow cylinder',    parameter: 'radius', coefficient: 1,      formula: 'I = m·r²' },
  'rod-center':      { label: 'Rod (central axis)', parameter: 'length', coefficient: 1 / 12, formula: 'I = (1/12)·m·L²' },
  'rod-end':         { label: 'Rod (end axis)',     parameter: 'length', coefficient: 1 / 3,  formula: 'I = (1/3)·m·L²' },
  'disk':            { label: 'Disk',               parameter: 'radius', coefficient: 1 / 2,  formula: 'I = (1/2)·m·r²' },
  'custom':          { label: 'Custom',             parameter: null,     coefficient: 0,      formula: 'I entered directly' },
}

export function isShapeKind(value: string): value is ShapeKind {
  return SHAPE_KINDS.some(kind => kind === value)
}

function isRadiusShape(kind: ShapeKind): kind is RadiusShapeKind {
  return SHAPES[kind].parameter === 'radius'
}

// ─── Resolution ──────────────────────────────────────────────────────────────

/**
 * Moment of inertia [kg·m²] about the shape's reference axis.
 */
export function momentOfInertia(spec: ShapeSpec): number {
  switch (spec.kind) {
    case 'solid-sphere':
    case 'hollow-sphere':
    case 'solid-cylinder':
    case 'hollow-cylinder':
    case 'disk':
      return SHAPES[spec.kind].coefficient * spec.mass * spec.radius * spec.radius
    case 'rod-center':
    case 'rod-end':
      return SHAPES[spec.kind].coefficient * spec.mass * spec.length * spec.length
    case 'custom':
      return spec.inertia
    default: {
      const unreachable: never = spec
      return unreachable
    }
  }
}

export interface InertiaParams {
  radius?: number
  length?: number
  customInertia?: number
}

/**
 * Build a ShapeSpec from a shape key and a loose parameter bag.
 *
 * @throws InvalidArgumentError when the shape's radius/length is absent
 */
export function toShapeSpec(kind: ShapeKind, mass: number, params: InertiaParams): ShapeSpec {
  if (kind === 'custom') return { kind, inertia: params.customInertia ?? 0 }

  if (isRadiusShape(kind)) {
    if (params.radius === undefined) throw missingGeometry(kind, 'radius')
    return { kind, mass, radius: params.radius }
  }
  if (params.length === undefined) throw missingGeometry(kind, 'length')
  return { kind, mass, length: params.length }
}

/**
 * Keyword-style entry point.  Unknown shape names fall back to the
 * supplied custom inertia (0 when that is absent too).
 */
export function getMomentOfInertia(shape: string, mass: number, params: InertiaParams = {}): number {
  if (!isShapeKind(shape)) return params.customInertia ?? 0
  return momentOfInertia(toShapeSpec(shape, mass, params))
}

function missingGeometry(kind: ShapeKind, parameter: GeometryParameter): InvalidArgumentError {
  return new InvalidArgumentError('MISSING_GEOMETRY', `${SHAPES[kind].label} requires a ${parameter}`)
}
