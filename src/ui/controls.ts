/**
 * UI controls — reads the calculator forms into raw records and reports
 * every edit through a single callback.
 *
 * Each <form data-form="…"> holds named inputs.  Fieldsets that do not
 * apply to the current selection (other shape geometry, other force kind)
 * are disabled, and disabled fields are left out of the raw record so the
 * input schemas fall back to their defaults.
 */

import { SHAPES, SHAPE_KINDS, isShapeKind, type ShapeKind } from '../energy/inertia.ts'
import {
  ANALYSIS_SHAPE_KINDS,
  DEFAULT_CUSTOM_POINTS,
  MAX_CUSTOM_POINTS,
  analysisSchema,
  kineticRotationalSchema,
} from '../energy/inputs.ts'

export type ViewKey = 'kinetic' | 'potential' | 'work' | 'power' | 'analysis'

export type FormKey =
  | 'kineticTranslational'
  | 'kineticRotational'
  | 'gravitational'
  | 'elastic'
  | 'constantWork'
  | 'variableWork'
  | 'power'
  | 'analysis'

export const FORM_KEYS: readonly FormKey[] = [
  'kineticTranslational', 'kineticRotational', 'gravitational', 'elastic',
  'constantWork', 'variableWork', 'power', 'analysis',
]

const VIEW_KEYS: readonly ViewKey[] = ['kinetic', 'potential', 'work', 'power', 'analysis']

export type RawForm = Record<string, unknown>

export interface CalculatorState {
  view: ViewKey
  forms: Record<FormKey, RawForm>
}

export type StateChangeCallback = (state: CalculatorState) => void

function isViewKey(value: string): value is ViewKey {
  return VIEW_KEYS.some(key => key === value)
}

// ─── Field reading ───────────────────────────────────────────────────────────

/** Empty number fields read as undefined so schema defaults apply. */
function readNumber(input: HTMLInputElement): number | undefined {
  return input.value.trim() === '' ? undefined : Number(input.value)
}

function readPoints(form: HTMLFormElement): { x: number | undefined; force: number | undefined }[] {
  const rows = form.querySelectorAll<HTMLElement>('[data-point]')
  return Array.from(rows, row => {
    const x = row.querySelector<HTMLInputElement>('input[data-point-field="x"]')
    const force = row.querySelector<HTMLInputElement>('input[data-point-field="force"]')
    return {
      x: x ? readNumber(x) : undefined,
      force: force ? readNumber(force) : undefined,
    }
  })
}

export function readForm(form: HTMLFormElement): RawForm {
  const raw: RawForm = {}
  for (const el of Array.from(form.elements)) {
    if (!(el instanceof HTMLInputElement || el instanceof HTMLSelectElement)) continue
    if (!el.name || el.matches(':disabled')) continue
    raw[el.name] = el instanceof HTMLInputElement && el.type === 'number' ? readNumber(el) : el.value
  }
  const pointsHost = form.querySelector<HTMLElement>('[data-points]')
  if (pointsHost && !pointsHost.closest('fieldset:disabled')) {
    raw.points = readPoints(form)
  }
  return raw
}

// ─── Conditional fieldsets ───────────────────────────────────────────────────

function setFieldsetEnabled(fieldset: HTMLFieldSetElement, enabled: boolean): void {
  fieldset.disabled = !enabled
  fieldset.hidden = !enabled
}

/** Show the radius, length or custom-I fields the selected shape needs. */
function syncShapeFields(form: HTMLFormElement): void {
  const select = form.querySelector<HTMLSelectElement>('select[name="shape"]')
  if (!select || !isShapeKind(select.value)) return
  const parameter = SHAPES[select.value].parameter ?? 'custom'
  for (const fs of Array.from(form.querySelectorAll<HTMLFieldSetElement>('fieldset[data-param]'))) {
    setFieldsetEnabled(fs, fs.dataset.param === parameter)
  }
  // Mass is meaningless for a directly entered inertia
  const massField = form.querySelector<HTMLFieldSetElement>('fieldset[data-mass]')
  if (massField) setFieldsetEnabled(massField, parameter !== 'custom')
}

/** Show the coefficient fields of the selected force kind. */
function syncForceKindFields(form: HTMLFormElement): void {
  const select = form.querySelector<HTMLSelectElement>('select[name="kind"]')
  if (!select) return
  for (const fs of Array.from(form.querySelectorAll<HTMLFieldSetElement>('fieldset[data-kind]'))) {
    setFieldsetEnabled(fs, fs.dataset.kind === select.value)
  }
}

// ─── Shape menus ─────────────────────────────────────────────────────────────

export interface ShapeOption {
  value: ShapeKind
  label: string
}

export function shapeOptions(kinds: readonly ShapeKind[]): ShapeOption[] {
  return kinds.map(kind => ({ value: kind, label: SHAPES[kind].label }))
}

interface ShapeMenu {
  kinds: readonly ShapeKind[]
  selected: ShapeKind
}

// Initial selection is the schema default
const SHAPE_MENUS: Partial<Record<FormKey, ShapeMenu>> = {
  kineticRotational: { kinds: SHAPE_KINDS, selected: kineticRotationalSchema.parse({}).shape },
  analysis: { kinds: ANALYSIS_SHAPE_KINDS, selected: analysisSchema.parse({}).shape },
}

function fillShapeSelect(select: HTMLSelectElement, menu: ShapeMenu): void {
  select.replaceChildren(...shapeOptions(menu.kinds).map(({ value, label }) =>
    new Option(label, value, value === menu.selected, value === menu.selected)
  ))
}

// ─── Custom force points ─────────────────────────────────────────────────────

const CUSTOM_POINT_FORCE = 10  // N

function numberInput(field: string, value: number, label: string): HTMLLabelElement {
  const wrapper = document.createElement('label')
  wrapper.textContent = label
  const input = document.createElement('input')
  input.type = 'number'
  input.step = 'any'
  input.value = String(value)
  input.dataset.pointField = field
  wrapper.appendChild(input)
  return wrapper
}

/**
 * Grow or shrink the point table to n rows, keeping existing values.
 * New rows take x = i, F = 10 N like the initial table.
 */
function rebuildPointRows(host: HTMLElement, n: number): void {
  const count = Math.max(2, Math.min(MAX_CUSTOM_POINTS, Math.round(n)))
  const rows = host.querySelectorAll<HTMLElement>('[data-point]')
  for (let i = rows.length - 1; i >= count; i--) rows[i].remove()
  for (let i = rows.length; i < count; i++) {
    const row = document.createElement('div')
    row.className = 'point-row'
    row.dataset.point = String(i)
    row.appendChild(numberInput('x', i, `x${i + 1} (m) `))
    row.appendChild(numberInput('force', CUSTOM_POINT_FORCE, `F${i + 1} (N) `))
    host.appendChild(row)
  }
}

// ─── Setup ───────────────────────────────────────────────────────────────────

function requireSelect(id: string): HTMLSelectElement {
  const el = document.getElementById(id)
  if (!(el instanceof HTMLSelectElement)) {
    throw new Error(`Calculator markup is missing <select id="${id}">`)
  }
  return el
}

export function setupControls(onChange: StateChangeCallback): CalculatorState {
  const viewSelect = requireSelect('view-select')

  const forms = new Map<FormKey, HTMLFormElement>()
  for (const key of FORM_KEYS) {
    const form = document.querySelector<HTMLFormElement>(`form[data-form="${key}"]`)
    if (form) forms.set(key, form)
    else console.warn(`Form "${key}" not found — using defaults`)
  }

  for (const [key, form] of forms) {
    const menu = SHAPE_MENUS[key]
    const select = form.querySelector<HTMLSelectElement>('select[name="shape"]')
    if (menu && select) fillShapeSelect(select, menu)
  }

  const pointCount = document.querySelector<HTMLInputElement>('input[data-role="point-count"]')
  const pointsHost = document.querySelector<HTMLElement>('[data-points]')
  if (pointCount && pointsHost) {
    rebuildPointRows(pointsHost, Number(pointCount.value) || DEFAULT_CUSTOM_POINTS.length)
    pointCount.addEventListener('change', () => {
      rebuildPointRows(pointsHost, Number(pointCount.value) || DEFAULT_CUSTOM_POINTS.length)
      onInput()
    })
  }

  function read(key: FormKey): RawForm {
    const form = forms.get(key)
    if (!form) return {}
    syncShapeFields(form)
    syncForceKindFields(form)
    return readForm(form)
  }

  function readState(): CalculatorState {
    const view = isViewKey(viewSelect.value) ? viewSelect.value : 'kinetic'
    return {
      view,
      forms: {
        kineticTranslational: read('kineticTranslational'),
        kineticRotational: read('kineticRotational'),
        gravitational: read('gravitational'),
        elastic: read('elastic'),
        constantWork: read('constantWork'),
        variableWork: read('variableWork'),
        power: read('power'),
        analysis: read('analysis'),
      },
    }
  }

  function onInput(): void {
    onChange(readState())
  }

  viewSelect.addEventListener('change', onInput)
  for (const form of forms.values()) {
    form.addEventListener('input', onInput)
    form.addEventListener('submit', e => e.preventDefault())
  }

  // Return initial state
  return readState()
}
