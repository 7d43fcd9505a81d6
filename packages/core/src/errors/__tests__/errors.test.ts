/**
 * Error Taxonomy Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  QueryCompilationError,
  STATS_ERROR_CODES,
  StatsError,
  StorageIOError,
  errorMessage,
  isStatsError,
} from '../index.js';

describe('StatsError', () => {
  it('serializes for logging', () => {
    const cause = new Error('EACCES');
    const error = new StorageIOError('Cannot write /data/mining/Widgets', '/data/mining/Widgets', cause);

    expect(error).toBeInstanceOf(StatsError);
    expect(error.name).toBe('StorageIOError');
    expect(error.filePath).toBe('/data/mining/Widgets');

    const json = error.toJSON();
    expect(json).toMatchObject({
      name: 'StorageIOError',
      code: 'STORAGE_IO_ERROR',
      message: 'Cannot write /data/mining/Widgets',
      context: { filePath: '/data/mining/Widgets' },
      cause: 'EACCES',
    });
    expect(typeof json.timestamp).toBe('string');
  });

  it('keeps the offending query parameter', () => {
    const error = new QueryCompilationError('Unknown product: Gone', { parameter: 'product' });

    expect(error.code).toBe('QUERY_COMPILATION_ERROR');
    expect(error.parameter).toBe('product');
    expect(error.context).toEqual({ parameter: 'product' });
  });

  it('lists configuration issues', () => {
    const error = new ConfigurationError('Invalid stats configuration', ['dataDir: Required']);

    expect(error.issues).toEqual(['dataDir: Required']);
    expect(error.context).toEqual({ issues: ['dataDir: Required'] });
  });
});

describe('STATS_ERROR_CODES', () => {
  it('has exactly one code per error class', () => {
    const raised = [
      new StorageIOError('x', '/tmp/x'),
      new QueryCompilationError('x'),
      new ConfigurationError('x'),
    ].map(e => e.code);

    expect(raised).toEqual([...STATS_ERROR_CODES]);
  });
});

describe('helpers', () => {
  it('identifies stats errors', () => {
    expect(isStatsError(new ConfigurationError('x'))).toBe(true);
    expect(isStatsError(new Error('x'))).toBe(false);
    expect(isStatsError('x')).toBe(false);
  });

  it('extracts messages from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
