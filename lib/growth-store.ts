'use client';

import { create } from 'zustand';
import type { GrowthChartSpec, GrowthEvent, GrowthTableRow, GrowthUpdate } from '@/types/growth';

export interface AddRecordInput {
  dateOfBirth: string;
  measurementDate: string;
  weight: string;
}

interface GrowthState {
  rows: GrowthTableRow[];
  chart: GrowthChartSpec | null;
  message: string;
  isLoading: boolean;
  isSaving: boolean;
  error: string | null;

  loadGrowth: () => Promise<void>;
  addRecord: (input: AddRecordInput) => Promise<void>;
  editTable: (rows: GrowthTableRow[]) => Promise<void>;
  saveTable: (rows: GrowthTableRow[]) => Promise<void>;
}

async function readError(res: Response): Promise<string> {
  try {
    const data: unknown = await res.json();
    if (typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string') {
      return data.error;
    }
  } catch (error) {
    console.error('Failed to read error response:', error);
  }
  return `Request failed (${res.status})`;
}

export function toAddEvent(input: AddRecordInput): GrowthEvent {
  const weight = input.weight.trim() === '' ? null : Number(input.weight);
  return {
    type: 'add-requested',
    dateOfBirth: input.dateOfBirth || null,
    measurementDate: input.measurementDate || null,
    weightKg: weight !== null && Number.isFinite(weight) ? weight : null,
  };
}

export const useGrowthStore = create<GrowthState>((set) => {
  const applyUpdate = (update: GrowthUpdate) => {
    set({ rows: update.rows, chart: update.chart, message: update.message, error: null });
  };

  // Republishes the last server rows so local table edits are discarded
  const rejectUpdate = (error: string) => {
    set((state) => ({ error, rows: [...state.rows] }));
  };

  const sendEvent = async (event: GrowthEvent) => {
    set({ isSaving: true });
    try {
      const res = await fetch('/api/growth', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(event),
      });

      if (res.ok) {
        const update: GrowthUpdate = await res.json();
        applyUpdate(update);
      } else {
        rejectUpdate(await readError(res));
      }
    } catch (error) {
      console.error('Failed to send growth event:', error);
      rejectUpdate('Could not reach the server');
    } finally {
      set({ isSaving: false });
    }
  };

  return {
    rows: [],
    chart: null,
    message: '',
    isLoading: true,
    isSaving: false,
    error: null,

    loadGrowth: async () => {
      try {
        const res = await fetch('/api/growth');
        if (res.ok) {
          const update: GrowthUpdate = await res.json();
          applyUpdate(update);
        } else {
          set({ error: await readError(res) });
        }
      } catch (error) {
        console.error('Failed to load growth records:', error);
        set({ error: 'Could not reach the server' });
      } finally {
        set({ isLoading: false });
      }
    },

    addRecord: (input) => sendEvent(toAddEvent(input)),

    editTable: (rows) => sendEvent({ type: 'table-edited', rows }),

    saveTable: (rows) => sendEvent({ type: 'table-saved', rows }),
  };
});
