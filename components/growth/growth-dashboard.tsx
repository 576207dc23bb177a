'use client';

import { useEffect } from 'react';
import { useGrowthStore } from '@/lib/growth-store';
import { GrowthRecordForm } from './growth-record-form';
import { GrowthChart } from './growth-chart';
import { GrowthTable } from './growth-table';

export function GrowthDashboard() {
  const { rows, chart, message, error, isLoading, isSaving, loadGrowth, addRecord, editTable, saveTable } =
    useGrowthStore();

  useEffect(() => {
    void loadGrowth();
  }, [loadGrowth]);

  if (isLoading) {
    return (
      <div className="min-h-screen bg-background flex items-center justify-center">
        <div className="text-muted-foreground">Loading...</div>
      </div>
    );
  }

  return (
    <div className="min-h-screen bg-background">
      <div className="max-w-5xl mx-auto p-4 space-y-4">
        <h1 className="text-2xl font-semibold">Baby Growth Tracker for Female Infants (WHO Standards)</h1>

        <GrowthRecordForm disabled={isSaving} onAdd={(input) => void addRecord(input)} />

        {message && <div className="text-sm">{message}</div>}
        {error && <div className="text-sm text-destructive">{error}</div>}

        {chart && <GrowthChart chart={chart} />}

        <GrowthTable
          rows={rows}
          disabled={isSaving}
          onRowsChange={(next) => void editTable(next)}
          onSave={(next) => void saveTable(next)}
        />
      </div>
    </div>
  );
}
