import { GROWTH_CSV_COLUMNS, type GrowthRecord, type GrowthTableRow } from '@/types/growth';
import type { BlobStore } from './blob-store';
import { CsvFormatError, parseDelimited, requireColumns, serializeCsv } from './csv';
import { logger } from './logger';
import { daysBetween, parseCalendarDate } from './utils';

export class GrowthDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GrowthDataError';
  }
}

export type LoadOutcome =
  | { status: 'loaded'; count: number }
  | { status: 'empty'; reason: 'missing' | 'unreadable' | 'malformed'; detail?: string };

function requireDate(value: string, label: string): string {
  const date = parseCalendarDate(value);
  if (date === null) {
    throw new GrowthDataError(`${label} "${value}" is not a valid date`);
  }
  return date;
}

function coerceNumber(value: number | string | null, label: string): number {
  const coerced = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof coerced !== 'number' || !Number.isFinite(coerced)) {
    throw new GrowthDataError(`${label} "${value ?? ''}" is not a number`);
  }
  return coerced;
}

/**
 * Builds a record for a measurement. Age is the whole-day difference between
 * the two dates and may be negative; weight is taken as given.
 */
export function createGrowthRecord(dateOfBirth: string, measurementDate: string, weightKg: number): GrowthRecord {
  const birth = requireDate(dateOfBirth, 'Date of birth');
  const date = requireDate(measurementDate, 'Measurement date');
  return {
    date,
    ageDays: daysBetween(birth, date),
    weightKg,
  };
}

// Age_Days is carried over from the row, never recomputed from Date
export function rowsToRecords(rows: readonly GrowthTableRow[]): GrowthRecord[] {
  return rows.map((row, index) => {
    const label = (column: string) => `Row ${index + 1} ${column}`;
    return {
      date: requireDate(row.Date, label('Date')),
      ageDays: coerceNumber(row.Age_Days, label('Age_Days')),
      weightKg: coerceNumber(row.Weight_kg, label('Weight_kg')),
    };
  });
}

export function recordsToRows(records: readonly GrowthRecord[]): GrowthTableRow[] {
  return records.map((record) => ({
    Date: record.date,
    Age_Days: record.ageDays,
    Weight_kg: record.weightKg,
  }));
}

export function serializeGrowthCsv(records: readonly GrowthRecord[]): string {
  return serializeCsv(
    GROWTH_CSV_COLUMNS,
    records.map((record) => [record.date, record.ageDays, record.weightKg])
  );
}

function isBlankRow(row: GrowthTableRow): boolean {
  return [row.Date, row.Age_Days, row.Weight_kg].every((cell) => cell === null || String(cell).trim() === '');
}

export function parseGrowthCsv(text: string): GrowthRecord[] {
  const table = parseDelimited(text, ',');
  requireColumns(table, GROWTH_CSV_COLUMNS);
  const rows = table.rows
    .map((row) => ({
      Date: row.Date ?? '',
      Age_Days: row.Age_Days ?? null,
      Weight_kg: row.Weight_kg ?? null,
    }))
    .filter((row) => !isBlankRow(row));
  return rowsToRecords(rows);
}

/**
 * Insertion-ordered growth records mirrored to a CSV blob.
 *
 * Every mutation rewrites the whole blob. The in-memory records only change
 * once the write has succeeded, so a failed write leaves the store equal to
 * the last persisted snapshot.
 */
export class GrowthRecordStore {
  private current: GrowthRecord[] = [];

  constructor(
    private readonly blobStore: BlobStore,
    readonly blobName: string
  ) {}

  get records(): readonly GrowthRecord[] {
    return this.current;
  }

  get size(): number {
    return this.current.length;
  }

  /**
   * Replaces the in-memory records with the persisted ones. Any failure
   * leaves the store empty; the outcome says why.
   */
  async load(): Promise<LoadOutcome> {
    const context = { blob: this.blobName };
    let text: string | null;
    try {
      text = await this.blobStore.readText(this.blobName);
    } catch (error) {
      this.current = [];
      logger.warn('records', 'Growth records unreadable, starting empty', context, { error });
      return { status: 'empty', reason: 'unreadable', detail: describe(error) };
    }

    if (text === null) {
      this.current = [];
      logger.info('records', 'No growth records stored yet, starting empty', context);
      return { status: 'empty', reason: 'missing' };
    }

    try {
      this.current = parseGrowthCsv(text);
    } catch (error) {
      if (!(error instanceof CsvFormatError || error instanceof GrowthDataError)) {
        throw error;
      }
      this.current = [];
      logger.warn('records', 'Growth records malformed, starting empty', context, { error });
      return { status: 'empty', reason: 'malformed', detail: error.message };
    }

    logger.info('records', `Loaded ${this.current.length} growth records`, context);
    return { status: 'loaded', count: this.current.length };
  }

  async addRecord(dateOfBirth: string, measurementDate: string, weightKg: number): Promise<GrowthRecord> {
    const record = createGrowthRecord(dateOfBirth, measurementDate, weightKg);
    await this.commit([...this.current, record]);
    return record;
  }

  async replaceAll(rows: readonly GrowthTableRow[]): Promise<void> {
    await this.commit(rowsToRecords(rows));
  }

  toRows(): GrowthTableRow[] {
    return recordsToRows(this.current);
  }

  private async commit(next: GrowthRecord[]): Promise<void> {
    await this.blobStore.writeText(this.blobName, serializeGrowthCsv(next));
    this.current = next;
    logger.debug('records', `Persisted ${next.length} growth records`, { blob: this.blobName });
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
