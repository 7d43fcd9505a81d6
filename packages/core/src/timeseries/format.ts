/**
 * Time-Series File Format
 *
 * One self-describing, pipe-delimited text file per product:
 *
 * ```
 * # Daily Entity Stats
 * #
 * # Do not edit me! This file is generated.
 * #
 * # fields: DATE|NEW|ASSIGNED|...|FIXED|...
 * # Product: Widgets
 * # Created: 2024-03-01T00:05:00.000Z
 * 20240301|12|3|...
 * ```
 *
 * Only the `# fields:` line is read back; the other comments are
 * informational. A blank cell means "not tracked that day" and is kept
 * distinct from a zero count.
 *
 * @module @trailstats/core/timeseries/format
 */

import type { DataIntegrityWarning } from '../errors/index.js';

export const DATE_COLUMN = 'DATE';

const FIELDS_LINE = /^#\s*fields?:\s*(.+?)\s*$/;
const CREATED_LINE = /^#\s*Created:\s*(.+?)\s*$/;
const PRODUCT_LINE = /^#\s*Product:\s*(.+?)\s*$/;
const DATE_CELL = /^\d{8}$/;
const COUNT_CELL = /^\d+$/;

/**
 * A count, or null for a blank cell
 */
export type CountCell = number | null;

/**
 * One day of counts
 */
export interface TimeSeriesRow {
  /** YYYYMMDD */
  date: string;
  /** category -> count, in schema order */
  counts: ReadonlyMap<string, CountCell>;
}

export interface TimeSeriesHeader {
  productName: string;
  /** Value of the `# Created:` comment */
  createdAt: string;
}

/**
 * Result of parsing a time-series file
 */
export interface ParsedTimeSeries {
  /** Category columns from the fields line; null when the file has none */
  schema: string[] | null;
  rows: TimeSeriesRow[];
  productName?: string;
  createdAt?: string;
  warnings: DataIntegrityWarning[];
  /** Whether the text ends with a line break (safe to append to) */
  endsWithNewline: boolean;
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse the text of a time-series file. Malformed rows are read on a
 * best-effort basis and reported as warnings.
 */
export function parseTimeSeries(text: string): ParsedTimeSeries {
  const lines = text.split('\n');
  const result: ParsedTimeSeries = {
    schema: null,
    rows: [],
    warnings: [],
    endsWithNewline: text.length === 0 || text.endsWith('\n'),
  };

  let schema: string[] | null = null;

  lines.forEach((rawLine, index) => {
    const line = rawLine.replace(/\r$/, '');
    const lineNumber = index + 1;
    if (line === '') return;

    if (line.startsWith('#')) {
      const fields = FIELDS_LINE.exec(line);
      if (fields && !schema) {
        // First column is the date; its name is not significant
        schema = fields[1].split('|').slice(1);
        result.schema = schema;
        return;
      }
      const product = PRODUCT_LINE.exec(line);
      if (product) result.productName = product[1];
      const created = CREATED_LINE.exec(line);
      if (created) result.createdAt = created[1];
      return;
    }

    // Rows before the fields line cannot be mapped to columns
    if (!schema) return;

    const row = parseRow(line, schema, lineNumber, result.warnings);
    if (row) result.rows.push(row);
  });

  return result;
}

function parseRow(
  line: string,
  schema: string[],
  lineNumber: number,
  warnings: DataIntegrityWarning[]
): TimeSeriesRow | null {
  const [date, ...cells] = line.split('|');

  if (!DATE_CELL.test(date)) {
    warnings.push({
      line: lineNumber,
      kind: 'invalid_date',
      message: `Row date "${date}" is not YYYYMMDD; row dropped`,
    });
    return null;
  }

  if (cells.length < schema.length) {
    warnings.push({
      line: lineNumber,
      kind: 'missing_fields',
      message: `Row has ${cells.length} of ${schema.length} fields; missing fields left blank`,
    });
  } else if (cells.length > schema.length) {
    warnings.push({
      line: lineNumber,
      kind: 'extra_fields',
      message: `Row has ${cells.length} fields, schema declares ${schema.length}; extra fields dropped`,
    });
  }

  const counts = new Map<string, CountCell>();
  schema.forEach((column, i) => {
    const cell = i < cells.length ? cells[i] : '';
    if (cell === '') {
      counts.set(column, null);
    } else if (COUNT_CELL.test(cell)) {
      counts.set(column, parseInt(cell, 10));
    } else {
      warnings.push({
        line: lineNumber,
        kind: 'invalid_count',
        message: `Column ${column} holds "${cell}", not a count; left blank`,
      });
      counts.set(column, null);
    }
  });

  return { date, counts };
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * Positional schema comparison: same columns, same order, same count
 */
export function schemasEqual(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((column, i) => column === b[i]);
}

export function formatHeader(schema: readonly string[], header: TimeSeriesHeader): string {
  const fields = [DATE_COLUMN, ...schema].join('|');
  return [
    '# Daily Entity Stats',
    '#',
    '# Do not edit me! This file is generated.',
    '#',
    `# fields: ${fields}`,
    `# Product: ${header.productName}`,
    `# Created: ${header.createdAt}`,
  ].join('\n') + '\n';
}

/**
 * One data line (without line break). Categories the row does not carry
 * are written blank.
 */
export function formatRow(row: TimeSeriesRow, schema: readonly string[]): string {
  const cells = schema.map(column => {
    const value = row.counts.get(column);
    return value === undefined || value === null ? '' : String(value);
  });
  return [row.date, ...cells].join('|');
}

/**
 * Full file content: header then every row
 */
export function formatTimeSeries(
  schema: readonly string[],
  rows: readonly TimeSeriesRow[],
  header: TimeSeriesHeader
): string {
  return formatHeader(schema, header) + rows.map(row => formatRow(row, schema) + '\n').join('');
}
