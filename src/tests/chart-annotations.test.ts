/**
 * Chart annotation drawing tests — placement against a recording context.
 */

import { describe, it, expect } from 'vitest'
import {
  drawBarValueLabels,
  drawWorkAnnotation,
  type AnnotationContext,
} from '../ui/chart-annotations.ts'

interface DrawCall {
  op: 'fillText' | 'fillRect'
  args: (string | number)[]
  fillStyle: string | CanvasGradient | CanvasPattern
}

class RecordingContext implements AnnotationContext {
  font = ''
  fillStyle: string | CanvasGradient | CanvasPattern = ''
  textAlign: CanvasTextAlign = 'start'
  textBaseline: CanvasTextBaseline = 'alphabetic'
  calls: DrawCall[] = []
  saves = 0

  constructor(private readonly textWidth: number) {}

  save(): void { this.saves++ }
  restore(): void {}
  fillText(text: string, x: number, y: number): void {
    this.calls.push({ op: 'fillText', args: [text, x, y], fillStyle: this.fillStyle })
  }
  fillRect(x: number, y: number, w: number, h: number): void {
    this.calls.push({ op: 'fillRect', args: [x, y, w, h], fillStyle: this.fillStyle })
  }
  measureText(): { width: number } {
    return { width: this.textWidth }
  }
}

// y pixel = 100 − 10·value
const toPixelY = (value: number): number => 100 - 10 * value

describe('drawBarValueLabels', () => {
  it('draws nothing for charts without labels', () => {
    const ctx = new RecordingContext(0)
    drawBarValueLabels(ctx, [{ x: 10, value: 1 }], {}, toPixelY)
    expect(ctx.calls).toEqual([])
    expect(ctx.saves).toBe(0)
  })

  it('centers each label offset above its bar', () => {
    const ctx = new RecordingContext(0)
    drawBarValueLabels(
      ctx,
      [{ x: 10, value: 1 }, { x: 30, value: 2 }],
      { labels: ['1.00 J', '2.00 J'], offset: 0.5, color: '#e0e0f0' },
      toPixelY,
    )
    expect(ctx.calls.map(c => c.args)).toEqual([
      ['1.00 J', 10, 85],
      ['2.00 J', 30, 75],
    ])
    expect(ctx.calls[0].fillStyle).toBe('#e0e0f0')
    expect(ctx.textAlign).toBe('center')
    expect(ctx.textBaseline).toBe('bottom')
  })

  it('skips non-numeric bars and bars without a label', () => {
    const ctx = new RecordingContext(0)
    drawBarValueLabels(
      ctx,
      [{ x: 10, value: null }, { x: 30, value: 2 }, { x: 50, value: 3 }],
      { labels: ['a', 'b'] },
      toPixelY,
    )
    expect(ctx.calls.map(c => c.args)).toEqual([['b', 30, 80]])
  })
})

describe('drawWorkAnnotation', () => {
  const area = { left: 0, right: 200, top: 0, bottom: 100 }

  it('draws nothing without text', () => {
    const ctx = new RecordingContext(80)
    drawWorkAnnotation(ctx, area, { x: 0.7, y: 0.8 })
    expect(ctx.calls).toEqual([])
  })

  it('boxes the text at the fractional anchor', () => {
    const ctx = new RecordingContext(80)
    drawWorkAnnotation(ctx, area, {
      text: 'Work = 50.00 J',
      x: 0.7,
      y: 0.8,
      background: 'rgba(255, 235, 59, 0.8)',
      color: '#1a1a2e',
    })
    // anchor (140, 20); box padded 6 px around an 80 × 20 text cell
    expect(ctx.calls).toEqual([
      { op: 'fillRect', args: [134, 4, 92, 32], fillStyle: 'rgba(255, 235, 59, 0.8)' },
      { op: 'fillText', args: ['Work = 50.00 J', 140, 20], fillStyle: '#1a1a2e' },
    ])
  })

  it('anchors relative to an offset plot area', () => {
    const ctx = new RecordingContext(10)
    drawWorkAnnotation(ctx, { left: 50, right: 150, top: 20, bottom: 220 }, { text: 'W', x: 0.5, y: 0.5 })
    expect(ctx.calls[1].args).toEqual(['W', 100, 120])
  })
})
