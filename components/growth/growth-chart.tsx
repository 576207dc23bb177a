'use client';

import dynamic from 'next/dynamic';
import { Card, CardContent } from '@/components/ui/card';
import type { GrowthChartSpec } from '@/types/growth';

// Plotly needs `window`, so the chart only renders in the browser
const Plot = dynamic(() => import('react-plotly.js'), {
  ssr: false,
  loading: () => (
    <div className="h-[480px] flex items-center justify-center text-muted-foreground text-sm">
      Loading chart...
    </div>
  ),
});

interface GrowthChartProps {
  chart: GrowthChartSpec;
}

export function GrowthChart({ chart }: GrowthChartProps) {
  return (
    <Card>
      <CardContent className="p-2">
        <Plot
          data={chart.traces}
          layout={{ ...chart.layout, autosize: true }}
          config={{ displaylogo: false, responsive: true }}
          useResizeHandler
          style={{ width: '100%', height: '480px' }}
        />
      </CardContent>
    </Card>
  );
}
