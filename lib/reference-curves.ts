import { PERCENTILE_KEYS, type PercentileKey, type ReferenceCurveSet } from '@/types/growth';
import type { BlobStore } from './blob-store';
import { CsvFormatError, type CsvTable, parseDelimited, requireColumns } from './csv';
import { logger } from './logger';

// Source column for each reference percentile
export const PERCENTILE_COLUMNS: Record<PercentileKey, string> = {
  '5th': 'P5',
  '10th': 'P10',
  '50th': 'P50',
  '90th': 'P90',
  '95th': 'P95',
};

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export class ReferenceDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReferenceDataError';
  }
}

/**
 * Reads a comma-decimal cell ("3,2") as a number. Anything that is not a
 * plain decimal becomes null so the chart shows a gap instead of failing.
 */
export function parseCommaDecimal(value: string | undefined): number | null {
  if (value === undefined) return null;
  const normalized = value.trim().replace(/,/g, '.');
  if (!DECIMAL_PATTERN.test(normalized)) return null;
  return Number(normalized);
}

function readReferenceTable(text: string): CsvTable {
  try {
    const table = parseDelimited(text, ';');
    requireColumns(table, ['Week', ...PERCENTILE_KEYS.map((key) => PERCENTILE_COLUMNS[key])]);
    return table;
  } catch (error) {
    if (error instanceof CsvFormatError) {
      throw new ReferenceDataError(`Reference table is unreadable: ${error.message}`);
    }
    throw error;
  }
}

export function parseReferenceCurves(text: string): ReferenceCurveSet {
  const table = readReferenceTable(text);

  if (table.rows.length === 0) {
    throw new ReferenceDataError('Reference table has no rows');
  }

  const ageDays = table.rows.map((row, index) => {
    const week = parseCommaDecimal(row.Week);
    if (week === null) {
      throw new ReferenceDataError(`Reference table row ${index + 1} has no valid Week`);
    }
    return week * 7;
  });

  const curve = (key: PercentileKey) =>
    Object.freeze(table.rows.map((row) => parseCommaDecimal(row[PERCENTILE_COLUMNS[key]])));

  const percentiles: Record<PercentileKey, readonly (number | null)[]> = {
    '5th': curve('5th'),
    '10th': curve('10th'),
    '50th': curve('50th'),
    '90th': curve('90th'),
    '95th': curve('95th'),
  };

  return Object.freeze({
    ageDays: Object.freeze(ageDays),
    percentiles: Object.freeze(percentiles),
  });
}

export async function loadReferenceCurves(store: BlobStore, blobName: string): Promise<ReferenceCurveSet> {
  const text = await store.readText(blobName);
  if (text === null) {
    throw new ReferenceDataError(`Reference blob "${blobName}" was not found`);
  }

  const curves = parseReferenceCurves(text);
  logger.info('reference', `Loaded ${curves.ageDays.length} reference points`, { blob: blobName });
  return curves;
}
