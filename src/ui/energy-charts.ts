/**
 * Energy charts — Chart.js rendering for the configurations built in
 * chart-data.ts.
 *
 * Two custom plugins draw the annotations:
 *   barValueLabels  — "12.50 J" text just above each bar
 *   workAnnotation  — boxed "Work = … J" text in the plot area
 *
 * Every render destroys the previous chart on the same canvas; the newest
 * pass always wins.
 */

import {
  Chart,
  BarController,
  BarElement,
  CategoryScale,
  ScatterController,
  LineElement,
  PointElement,
  LinearScale,
  Filler,
  Title,
  Tooltip,
  Legend,
  type ChartConfiguration,
  type ChartType,
  type Plugin,
} from 'chart.js'
import type { BarValueLabelOptions, WorkAnnotationOptions, XY } from './chart-data.ts'
import { drawBarValueLabels, drawWorkAnnotation } from './chart-annotations.ts'

// ─── Annotation plugins ──────────────────────────────────────────────────────

// Plugins are registered globally, so each one sees every chart and must
// skip charts that carry no options for it.

const barValueLabelsPlugin: Plugin<'bar', Partial<BarValueLabelOptions>> = {
  id: 'barValueLabels',
  afterDatasetsDraw(chart, _args, opts) {
    const yScale = chart.scales['y']
    const dataset = chart.data.datasets[0]
    if (!yScale || !dataset) return
    const bars = chart.getDatasetMeta(0).data.map((bar, i) => {
      const value = dataset.data[i]
      return { x: bar.x, value: typeof value === 'number' ? value : null }
    })
    drawBarValueLabels(chart.ctx, bars, opts, value => yScale.getPixelForValue(value))
  },
}

const workAnnotationPlugin: Plugin<'scatter', Partial<WorkAnnotationOptions>> = {
  id: 'workAnnotation',
  afterDraw(chart, _args, opts) {
    drawWorkAnnotation(chart.ctx, chart.chartArea, opts)
  },
}

Chart.register(
  BarController, BarElement, CategoryScale,
  ScatterController, LineElement, PointElement, LinearScale,
  Filler, Title, Tooltip, Legend,
  barValueLabelsPlugin, workAnnotationPlugin,
)

// ─── Mounting ────────────────────────────────────────────────────────────────

const charts = new Map<string, { destroy(): void }>()

function mount<TType extends ChartType, TData, TLabel>(
  canvasId: string,
  config: ChartConfiguration<TType, TData, TLabel>
): void {
  const canvas = document.getElementById(canvasId)
  if (!(canvas instanceof HTMLCanvasElement)) {
    console.warn(`Chart canvas #${canvasId} not found — skipping render`)
    return
  }
  clearChart(canvasId)
  charts.set(canvasId, new Chart(canvas, config))
}

export function renderEnergyChart(canvasId: string, config: ChartConfiguration<'bar', number[], string>): void {
  mount(canvasId, config)
}

export function renderForceChart(canvasId: string, config: ChartConfiguration<'scatter', XY[]>): void {
  mount(canvasId, config)
}

/** Drop the chart on a canvas, e.g. after its inputs became invalid. */
export function clearChart(canvasId: string): void {
  charts.get(canvasId)?.destroy()
  charts.delete(canvasId)
}
