/**
 * Annotation drawing for the energy charts.
 *
 * Plain canvas calls, kept apart from the Chart.js plugin objects so the
 * placement math runs against any 2D context.
 */

import type { BarValueLabelOptions, WorkAnnotationOptions } from './chart-data.ts'

/** The slice of CanvasRenderingContext2D the annotations use. */
export interface AnnotationContext {
  font: string
  fillStyle: string | CanvasGradient | CanvasPattern
  textAlign: CanvasTextAlign
  textBaseline: CanvasTextBaseline
  save(): void
  restore(): void
  fillText(text: string, x: number, y: number): void
  fillRect(x: number, y: number, w: number, h: number): void
  measureText(text: string): { width: number }
}

export interface BarTop {
  /** Bar center [px] */
  x: number
  /** Data value, null for non-numeric entries */
  value: number | null
}

export interface PlotArea {
  left: number
  right: number
  top: number
  bottom: number
}

const ANNOTATION_PAD = 6   // px
const ANNOTATION_HALF_HEIGHT = 10   // px

/**
 * Write labels[i] centered over bar i, `offset` data units above its top.
 */
export function drawBarValueLabels(
  ctx: AnnotationContext,
  bars: readonly BarTop[],
  opts: Partial<BarValueLabelOptions>,
  toPixelY: (value: number) => number
): void {
  const labels = opts.labels
  if (!labels) return
  const offset = opts.offset ?? 0

  ctx.save()
  ctx.font = 'bold 12px sans-serif'
  ctx.fillStyle = opts.color ?? '#ffffff'
  ctx.textAlign = 'center'
  ctx.textBaseline = 'bottom'
  bars.forEach((bar, i) => {
    const label = labels[i]
    if (bar.value === null || label === undefined) return
    ctx.fillText(label, bar.x, toPixelY(bar.value + offset))
  })
  ctx.restore()
}

/**
 * Boxed text anchored at (x, y) as fractions of the plot area,
 * measured from its bottom-left corner.
 */
export function drawWorkAnnotation(
  ctx: AnnotationContext,
  area: PlotArea,
  opts: Partial<WorkAnnotationOptions>
): void {
  const text = opts.text
  if (!text) return
  const x = area.left + (opts.x ?? 0.7) * (area.right - area.left)
  const y = area.bottom - (opts.y ?? 0.8) * (area.bottom - area.top)

  ctx.save()
  ctx.font = 'bold 13px sans-serif'
  ctx.textAlign = 'left'
  ctx.textBaseline = 'middle'
  const width = ctx.measureText(text).width
  ctx.fillStyle = opts.background ?? '#ffeb3b'
  ctx.fillRect(
    x - ANNOTATION_PAD,
    y - ANNOTATION_HALF_HEIGHT - ANNOTATION_PAD,
    width + 2 * ANNOTATION_PAD,
    2 * ANNOTATION_HALF_HEIGHT + 2 * ANNOTATION_PAD
  )
  ctx.fillStyle = opts.color ?? '#000000'
  ctx.fillText(text, x, y)
  ctx.restore()
}
