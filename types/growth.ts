export interface GrowthRecord {
  date: string;           // "2024-01-15" format
  ageDays: number;        // days since birth when the record was added
  weightKg: number;
}

// Row shape shared by the table and the persisted CSV
export interface GrowthTableRow {
  Date: string;
  Age_Days: number | string | null;
  Weight_kg: number | string | null;
}

export const GROWTH_CSV_COLUMNS = ['Date', 'Age_Days', 'Weight_kg'] as const;

export type PercentileKey = '5th' | '10th' | '50th' | '90th' | '95th';

export const PERCENTILE_KEYS: readonly PercentileKey[] = ['5th', '10th', '50th', '90th', '95th'];

export interface ReferenceCurveSet {
  ageDays: readonly number[];
  percentiles: Readonly<Record<PercentileKey, readonly (number | null)[]>>;
}

export type GrowthEvent =
  | {
      type: 'add-requested';
      dateOfBirth: string | null;
      measurementDate: string | null;
      weightKg: number | null;
    }
  | { type: 'table-saved'; rows: GrowthTableRow[] }
  | { type: 'table-edited'; rows: GrowthTableRow[] }
  | { type: 'refresh' };

export interface GrowthChartTrace {
  type: 'scatter';
  x: (number | null)[];
  y: (number | null)[];
  mode?: 'lines' | 'lines+markers';
  name?: string;
  fill?: 'toself';
  fillcolor?: string;
  line: { color: string; width?: number };
  marker?: { size: number };
  hoverinfo?: 'skip';
  showlegend?: boolean;
}

export interface GrowthChartLayout {
  title: { text: string };
  xaxis: { title: { text: string } };
  yaxis: { title: { text: string } };
  legend: { y: number; traceorder: 'reversed'; font: { size: number } };
  hovermode: 'x unified';
}

export interface GrowthChartSpec {
  traces: GrowthChartTrace[];
  layout: GrowthChartLayout;
}

export interface GrowthUpdate {
  message: string;
  chart: GrowthChartSpec;
  rows: GrowthTableRow[];
}
