import {
  PERCENTILE_KEYS,
  type GrowthChartLayout,
  type GrowthChartSpec,
  type GrowthChartTrace,
  type GrowthRecord,
  type PercentileKey,
  type ReferenceCurveSet,
} from '@/types/growth';

export const CHART_TITLE = 'Baby Growth Chart for Female Infants (WHO Standards)';
export const GROWTH_TRACE_NAME = "Baby's Growth";

const OUTER_BAND_FILL = 'rgba(200,200,200,0.3)';
const INNER_BAND_FILL = 'rgba(150,150,150,0.3)';
const INVISIBLE_LINE = 'rgba(255,255,255,0)';
const PERCENTILE_LINE = 'rgba(0,0,0,0.5)';
const GROWTH_LINE = 'red';

// Closed polygon: upper curve left to right, then lower curve right to left
function percentileBand(
  curves: ReferenceCurveSet,
  upper: PercentileKey,
  lower: PercentileKey,
  fillcolor: string
): GrowthChartTrace {
  return {
    type: 'scatter',
    x: [...curves.ageDays, ...[...curves.ageDays].reverse()],
    y: [...curves.percentiles[upper], ...[...curves.percentiles[lower]].reverse()],
    fill: 'toself',
    fillcolor,
    line: { color: INVISIBLE_LINE },
    hoverinfo: 'skip',
    showlegend: false,
  };
}

function percentileLine(curves: ReferenceCurveSet, key: PercentileKey): GrowthChartTrace {
  return {
    type: 'scatter',
    x: [...curves.ageDays],
    y: [...curves.percentiles[key]],
    mode: 'lines',
    name: `${key} Percentile`,
    line: { color: PERCENTILE_LINE, width: 1 },
  };
}

function growthLine(records: readonly GrowthRecord[]): GrowthChartTrace {
  return {
    type: 'scatter',
    x: records.map((record) => record.ageDays),
    y: records.map((record) => record.weightKg),
    mode: 'lines+markers',
    name: GROWTH_TRACE_NAME,
    line: { color: GROWTH_LINE, width: 2 },
    marker: { size: 6 },
  };
}

function chartLayout(): GrowthChartLayout {
  return {
    title: { text: CHART_TITLE },
    xaxis: { title: { text: 'Age (days)' } },
    yaxis: { title: { text: 'Weight (kg)' } },
    legend: { y: 0.5, traceorder: 'reversed', font: { size: 16 } },
    hovermode: 'x unified',
  };
}

/**
 * Reference bands and percentile lines, plus the recorded weights when there
 * are any. Traces are drawn in order, so the records sit above the bands.
 */
export function buildGrowthChart(
  curves: ReferenceCurveSet,
  records: readonly GrowthRecord[]
): GrowthChartSpec {
  const traces: GrowthChartTrace[] = [
    percentileBand(curves, '95th', '5th', OUTER_BAND_FILL),
    percentileBand(curves, '90th', '10th', INNER_BAND_FILL),
    ...PERCENTILE_KEYS.map((key) => percentileLine(curves, key)),
  ];

  if (records.length > 0) {
    traces.push(growthLine(records));
  }

  return { traces, layout: chartLayout() };
}
