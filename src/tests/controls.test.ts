/**
 * Control helper tests — shape menus built from the shape table.
 */

import { describe, it, expect } from 'vitest'
import { shapeOptions } from '../ui/controls.ts'
import { SHAPE_KINDS } from '../energy/inertia.ts'
import { ANALYSIS_SHAPE_KINDS } from '../energy/inputs.ts'

describe('shapeOptions', () => {
  it('labels the analysis shapes from the table', () => {
    expect(shapeOptions(ANALYSIS_SHAPE_KINDS)).toEqual([
      { value: 'solid-sphere', label: 'Solid sphere' },
      { value: 'solid-cylinder', label: 'Solid cylinder' },
      { value: 'disk', label: 'Disk' },
      { value: 'rod-center', label: 'Rod (central axis)' },
    ])
  })

  it('offers every shape on the rotational form, in table order', () => {
    expect(shapeOptions(SHAPE_KINDS).map(o => o.value)).toEqual([...SHAPE_KINDS])
    expect(shapeOptions(SHAPE_KINDS).at(-1)).toEqual({ value: 'custom', label: 'Custom' })
  })
})
