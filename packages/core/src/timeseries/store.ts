/**
 * Time-Series Store
 *
 * Owns the per-product files under the mining directory. Appends write a
 * single line; rewrites assemble the whole content in memory, write it to a
 * sibling temp file and rename it over the original, so an interrupted run
 * never leaves a truncated file behind.
 *
 * @module @trailstats/core/timeseries/store
 */

import fs from 'fs/promises';
import path from 'path';
import { StorageIOError, errorMessage } from '../errors/index.js';
import {
  formatRow,
  formatTimeSeries,
  parseTimeSeries,
  type ParsedTimeSeries,
  type TimeSeriesHeader,
  type TimeSeriesRow,
} from './format.js';

/** Files stay world-readable: charts are served from them */
export const TIME_SERIES_FILE_MODE = 0o644;
export const DATA_DIR_MODE = 0o755;

export type WriteMode = 'append' | 'rewrite';

export interface TimeSeriesContent {
  schema: readonly string[];
  rows: readonly TimeSeriesRow[];
  header: TimeSeriesHeader;
}

/**
 * File name of a product's series. Path separators in the product name
 * are replaced so every product maps to a file directly inside the directory.
 */
export function productFileName(productName: string): string {
  return productName.replace(/[/\\\0]/g, '-');
}

export class TimeSeriesStore {
  constructor(private readonly dir: string) {}

  get directory(): string {
    return this.dir;
  }

  pathFor(productName: string): string {
    return path.join(this.dir, productFileName(productName));
  }

  /**
   * Create the data directory if needed
   */
  async ensureDirectory(): Promise<void> {
    try {
      await fs.mkdir(this.dir, { recursive: true, mode: DATA_DIR_MODE });
    } catch (error) {
      throw new StorageIOError(`Cannot create data directory ${this.dir}`, this.dir, error);
    }
  }

  /**
   * Read and parse a product's file; null when it does not exist yet
   */
  async read(productName: string): Promise<ParsedTimeSeries | null> {
    const file = this.pathFor(productName);
    let text: string;

    try {
      text = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw new StorageIOError(`Cannot read ${file}`, file, error);
    }

    return parseTimeSeries(text);
  }

  /**
   * Write a product's file.
   *
   * `append` adds exactly one row (the content's only row) to the end of the
   * existing file; `rewrite` replaces the file with header and every row.
   */
  async write(productName: string, content: TimeSeriesContent, mode: WriteMode): Promise<void> {
    const file = this.pathFor(productName);

    if (mode === 'append') {
      if (content.rows.length !== 1) {
        throw new RangeError(`Append writes exactly one row, got ${content.rows.length}`);
      }
      await this.appendLine(file, formatRow(content.rows[0], content.schema));
      return;
    }

    await this.replace(file, formatTimeSeries(content.schema, content.rows, content.header));
  }

  private async appendLine(file: string, line: string): Promise<void> {
    try {
      await fs.appendFile(file, line + '\n', 'utf-8');
      await fs.chmod(file, TIME_SERIES_FILE_MODE);
    } catch (error) {
      throw new StorageIOError(`Cannot append to ${file}`, file, error);
    }
  }

  private async replace(file: string, text: string): Promise<void> {
    const temp = `${file}.${process.pid}.tmp`;

    try {
      await fs.writeFile(temp, text, 'utf-8');
      await fs.chmod(temp, TIME_SERIES_FILE_MODE);
      await fs.rename(temp, file);
    } catch (error) {
      const leftover = await removeTemp(temp);
      throw new StorageIOError(
        `Cannot write ${file}`,
        file,
        error,
        leftover === null ? undefined : { tempFile: temp, tempCleanupError: leftover }
      );
    }
  }
}

/**
 * Delete a failed rewrite's temp file; the failure message if it stays
 */
async function removeTemp(temp: string): Promise<string | null> {
  try {
    await fs.rm(temp, { force: true });
    return null;
  } catch (error) {
    return errorMessage(error);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
