/**
 * Chart data generation — builds Chart.js configurations for the
 * energy-distribution bar chart and the force–displacement area chart.
 *
 * Pure: no canvas or Chart instance is touched here, so every pass can
 * rebuild its configuration from scratch.  Annotations are carried as
 * options for the custom plugins registered in energy-charts.ts.
 */

import type { ChartConfiguration, ChartType } from 'chart.js'
import { workVariableForce } from '../energy/formulas.ts'
import { InvalidArgumentError } from '../energy/errors.ts'

// ─── Plugin options ──────────────────────────────────────────────────────────

/** Value labels drawn just above each bar. */
export interface BarValueLabelOptions {
  labels: string[]
  /** Vertical offset above the bar top, in data units */
  offset: number
  color: string
}

/** Boxed text placed at a fraction of the plot area (0,0 = bottom-left). */
export interface WorkAnnotationOptions {
  text: string
  x: number
  y: number
  background: string
  color: string
}

declare module 'chart.js' {
  interface PluginOptionsByType<TType extends ChartType> {
    barValueLabels?: BarValueLabelOptions
    workAnnotation?: WorkAnnotationOptions
  }
}

// ─── Theme ───────────────────────────────────────────────────────────────────

export const ENERGY_PALETTE = ['#FF6B6B', '#4ECDC4', '#45B7D1', '#96CEB4', '#FECA57'] as const

const GRID_COLOR = 'rgba(255, 255, 255, 0.08)'
const TICK_COLOR = '#8888aa'
const TITLE_COLOR = '#e94560'
const LABEL_COLOR = '#e0e0f0'
const CURVE_COLOR = '#4c7dff'
const AREA_COLOR = 'rgba(173, 216, 230, 0.3)'
const ANNOTATION_BG = 'rgba(255, 235, 59, 0.8)'

/** Palette color for bar i; cycles after the fifth bar. */
export function energyPalette(index: number): string {
  return ENERGY_PALETTE[index % ENERGY_PALETTE.length]
}

export function formatJoules(energy: number): string {
  return `${energy.toFixed(2)} J`
}

function baseScaleOptions(label: string) {
  return {
    grid: { color: GRID_COLOR },
    ticks: { color: TICK_COLOR, font: { size: 10 } },
    title: { display: label !== '', text: label, color: TICK_COLOR, font: { size: 12 } },
  }
}

function titleOptions(text: string) {
  return { display: true, text, color: TITLE_COLOR, font: { size: 14, weight: 'bold' as const } }
}

// ─── Energy distribution ─────────────────────────────────────────────────────

/**
 * One bar per energy term, labeled with its value in joules.
 */
export function energyDistributionChart(
  energies: readonly number[],
  labels: readonly string[]
): ChartConfiguration<'bar', number[], string> {
  if (energies.length !== labels.length) {
    throw new InvalidArgumentError(
      'LENGTH_MISMATCH',
      `Expected one label per energy, got ${energies.length} energies and ${labels.length} labels`
    )
  }

  const peak = energies.length > 0 ? Math.max(...energies) : 0

  return {
    type: 'bar',
    data: {
      labels: [...labels],
      datasets: [{
        label: 'Energy',
        data: [...energies],
        backgroundColor: energies.map((_, i) => energyPalette(i)),
      }],
    },
    options: {
      responsive: true,
      maintainAspectRatio: false,
      animation: false,
      plugins: {
        legend: { display: false },
        title: titleOptions('Energy Distribution'),
        barValueLabels: {
          labels: energies.map(formatJoules),
          offset: peak * 0.01,
          color: LABEL_COLOR,
        },
      },
      scales: {
        x: baseScaleOptions(''),
        y: baseScaleOptions('Energy (J)'),
      },
    },
  }
}

// ─── Force vs displacement ───────────────────────────────────────────────────

export interface XY {
  x: number
  y: number
}

/**
 * F(x) line with markers, the area under it shaded, and the
 * integrated work written in the upper-right of the plot.
 */
export function forceDisplacementChart(
  forces: readonly number[],
  displacements: readonly number[]
): ChartConfiguration<'scatter', XY[]> {
  const work = workVariableForce(forces, displacements)
  const points = forces.map((force, i) => ({ x: displacements[i], y: force }))

  return {
    type: 'scatter',
    data: {
      datasets: [{
        label: 'Force',
        data: points,
        showLine: true,
        borderColor: CURVE_COLOR,
        borderWidth: 2,
        pointRadius: 3,
        pointBackgroundColor: CURVE_COLOR,
        pointBorderColor: CURVE_COLOR,
        backgroundColor: AREA_COLOR,
        fill: 'origin',
      }],
    },
    options: {
      responsive: true,
      maintainAspectRatio: false,
      animation: false,
      plugins: {
        legend: { display: false },
        title: titleOptions('Force vs Displacement'),
        workAnnotation: {
          text: `Work = ${formatJoules(work)}`,
          x: 0.7,
          y: 0.8,
          background: ANNOTATION_BG,
          color: '#1a1a2e',
        },
      },
      scales: {
        x: baseScaleOptions('Displacement (m)'),
        y: baseScaleOptions('Force (N)'),
      },
    },
  }
}
