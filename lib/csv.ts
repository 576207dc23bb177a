import * as Papa from 'papaparse';

export type CsvRow = Record<string, string>;

export interface CsvTable {
  columns: string[];
  rows: CsvRow[];
}

export class CsvFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CsvFormatError';
  }
}

/**
 * Parses delimited text with a header row. Lines holding only delimiters or
 * whitespace are skipped and header names are trimmed; cell values are
 * returned untouched.
 */
export function parseDelimited(text: string, delimiter = ','): CsvTable {
  const parsed = Papa.parse<CsvRow>(text, {
    header: true,
    delimiter,
    skipEmptyLines: 'greedy',
    transformHeader: (header) => header.trim(),
  });

  if (parsed.errors.length > 0) {
    const first = parsed.errors[0];
    const where = first.row !== undefined ? ` (row ${first.row + 1})` : '';
    throw new CsvFormatError(`${first.message}${where}`);
  }

  return {
    columns: parsed.meta.fields ?? [],
    rows: parsed.data,
  };
}

export function requireColumns(table: CsvTable, required: readonly string[]): void {
  const missing = required.filter((column) => !table.columns.includes(column));
  if (missing.length > 0) {
    throw new CsvFormatError(`Missing column(s): ${missing.join(', ')}`);
  }
}

/**
 * Writes a header row and data rows with \n line endings and a trailing newline.
 */
export function serializeCsv(
  columns: readonly string[],
  rows: readonly (readonly (string | number)[])[]
): string {
  const lines: (string | number)[][] = [[...columns], ...rows.map((row) => [...row])];
  return Papa.unparse(lines, { newline: '\n' }) + '\n';
}
