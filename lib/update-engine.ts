import type { GrowthEvent, GrowthTableRow, GrowthUpdate, ReferenceCurveSet } from '@/types/growth';
import { buildGrowthChart } from './chart-builder';
import type { GrowthRecordStore } from './growth-records';

export const MESSAGES = {
  added: 'Record added successfully!',
  saved: 'Changes saved successfully!',
  unchanged: 'No changes made.',
} as const;

export type GrowthAction =
  | { kind: 'add'; dateOfBirth: string; measurementDate: string; weightKg: number; message: string }
  | { kind: 'replace'; rows: GrowthTableRow[]; message: string }
  | { kind: 'none'; message: string };

/**
 * Decides what an event does to the records. Pure: the same event always
 * yields the same action.
 */
export function resolveGrowthAction(event: GrowthEvent): GrowthAction {
  switch (event.type) {
    case 'add-requested': {
      const { dateOfBirth, measurementDate, weightKg } = event;
      if (dateOfBirth && measurementDate && weightKg !== null) {
        return { kind: 'add', dateOfBirth, measurementDate, weightKg, message: MESSAGES.added };
      }
      return { kind: 'none', message: MESSAGES.unchanged };
    }
    case 'table-saved':
    case 'table-edited':
      return { kind: 'replace', rows: event.rows, message: MESSAGES.saved };
    case 'refresh':
      return { kind: 'none', message: MESSAGES.unchanged };
  }
}

/**
 * Applies one event to the store and returns what the page shows next.
 * Chart and rows are always rebuilt from the store, whichever branch ran.
 * Storage and data errors propagate.
 */
export async function handleGrowthEvent(
  store: GrowthRecordStore,
  curves: ReferenceCurveSet,
  event: GrowthEvent
): Promise<GrowthUpdate> {
  const action = resolveGrowthAction(event);

  switch (action.kind) {
    case 'add':
      await store.addRecord(action.dateOfBirth, action.measurementDate, action.weightKg);
      break;
    case 'replace':
      await store.replaceAll(action.rows);
      break;
    case 'none':
      break;
  }

  return {
    message: action.message,
    chart: buildGrowthChart(curves, store.records),
    rows: store.toRows(),
  };
}
