import { describe, it, expect } from 'vitest'
import { buildGrowthChart, CHART_TITLE, GROWTH_TRACE_NAME } from '../chart-builder'
import { parseReferenceCurves } from '../reference-curves'
import { REFERENCE_TABLE } from './fixtures/growth-fixtures'

const curves = parseReferenceCurves(REFERENCE_TABLE)

const records = [
  { date: '2024-01-15', ageDays: 14, weightKg: 4.2 },
  { date: '2024-01-08', ageDays: 7, weightKg: 3.7 },
]

describe('buildGrowthChart', () => {
  it('draws two bands and five percentile lines without records', () => {
    const chart = buildGrowthChart(curves, [])
    expect(chart.traces).toHaveLength(7)
  })

  it('closes the outer band from the 95th curve back along the 5th', () => {
    const [outer] = buildGrowthChart(curves, []).traces

    expect(outer).toEqual({
      type: 'scatter',
      x: [0, 7, 14, 14, 7, 0],
      y: [4.1, 4.2, 4.6, 2.9, 2.6, 2.5],
      fill: 'toself',
      fillcolor: 'rgba(200,200,200,0.3)',
      line: { color: 'rgba(255,255,255,0)' },
      hoverinfo: 'skip',
      showlegend: false,
    })
  })

  it('shades the 90th to 10th band darker', () => {
    const inner = buildGrowthChart(curves, []).traces[1]

    expect(inner.x).toEqual([0, 7, 14, 14, 7, 0])
    expect(inner.y).toEqual([3.9, 4.0, 4.3, 3.0, 2.8, 2.6])
    expect(inner.fillcolor).toBe('rgba(150,150,150,0.3)')
    expect(inner.showlegend).toBe(false)
  })

  it('adds one thin line per percentile, lowest first', () => {
    const lines = buildGrowthChart(curves, []).traces.slice(2)

    expect(lines.map((t) => t.name)).toEqual([
      '5th Percentile',
      '10th Percentile',
      '50th Percentile',
      '90th Percentile',
      '95th Percentile',
    ])
    expect(lines[2]).toEqual({
      type: 'scatter',
      x: [0, 7, 14],
      y: [3.2, 3.3, 3.6],
      mode: 'lines',
      name: '50th Percentile',
      line: { color: 'rgba(0,0,0,0.5)', width: 1 },
    })
  })

  it('plots the records last, in store order', () => {
    const chart = buildGrowthChart(curves, records)

    expect(chart.traces).toHaveLength(8)
    expect(chart.traces[7]).toEqual({
      type: 'scatter',
      x: [14, 7],
      y: [4.2, 3.7],
      mode: 'lines+markers',
      name: GROWTH_TRACE_NAME,
      line: { color: 'red', width: 2 },
      marker: { size: 6 },
    })
  })

  it('keeps gaps in the reference curves', () => {
    const gappy = parseReferenceCurves(
      ['Week;P5;P10;P50;P90;P95', '0;2,5;2,6;3,2;3,9;4,1', '1;;2,8;3,3;4,0;4,2'].join('\n')
    )
    const [outer] = buildGrowthChart(gappy, []).traces
    expect(outer.y).toEqual([4.1, 4.2, null, 2.5])
  })

  it('sets the title, axis labels, reversed legend and unified hover', () => {
    expect(buildGrowthChart(curves, []).layout).toEqual({
      title: { text: CHART_TITLE },
      xaxis: { title: { text: 'Age (days)' } },
      yaxis: { title: { text: 'Weight (kg)' } },
      legend: { y: 0.5, traceorder: 'reversed', font: { size: 16 } },
      hovermode: 'x unified',
    })
  })

  it('returns identical output for identical input', () => {
    expect(buildGrowthChart(curves, records)).toEqual(buildGrowthChart(curves, records))
    expect(curves.ageDays).toEqual([0, 7, 14])
  })
})
