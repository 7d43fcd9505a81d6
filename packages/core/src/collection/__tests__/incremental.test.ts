/**
 * Incremental Collector Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadCategoryDomain } from '../../categories/registry.js';
import { SQLiteEntityStore } from '../../storage/sqlite.js';
import { TrackerFixture, fixedClock, quietLogger } from '../../testing/fixtures.js';
import { formatHeader } from '../../timeseries/format.js';
import { TimeSeriesStore } from '../../timeseries/store.js';
import { IncrementalCollector, compareSchema } from '../incremental.js';

const NOW = '2024-01-10T06:00:00.000Z';
const CREATED = '2023-12-01T00:00:00.000Z';
const SCHEMA = ['NEW', 'ASSIGNED', 'FIXED'];

function header(schema: string[]): string {
  return formatHeader(schema, { productName: 'Widgets', createdAt: CREATED });
}

describe('IncrementalCollector', () => {
  let tracker: TrackerFixture;
  let tempDir: string;
  let files: TimeSeriesStore;
  let collector: IncrementalCollector;
  let widgets: number;

  function seedFile(text: string): void {
    fs.writeFileSync(files.pathFor('Widgets'), text);
  }

  function fileText(): string {
    return fs.readFileSync(files.pathFor('Widgets'), 'utf-8');
  }

  beforeEach(async () => {
    tracker = new TrackerFixture();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'trailstats-collect-test-'));
    files = new TimeSeriesStore(tempDir);

    tracker.addLegalValues('status', ['NEW', 'ASSIGNED']);
    tracker.addLegalValues('resolution', ['FIXED']);
    widgets = tracker.addProduct('Widgets');
    tracker.addEntity({ productId: widgets, status: 'NEW', createdAt: '2024-01-01T00:00:00Z' });
    tracker.addEntity({ productId: widgets, status: 'NEW', createdAt: '2024-01-02T00:00:00Z' });
    tracker.addEntity({
      productId: widgets,
      status: 'ASSIGNED',
      resolution: 'FIXED',
      createdAt: '2024-01-09T23:00:00Z',
    });

    const store = new SQLiteEntityStore(tracker.db);
    collector = new IncrementalCollector({
      entities: store,
      files,
      domain: await loadCategoryDomain(store),
      now: fixedClock(NOW),
      logger: quietLogger(),
    });
  });

  afterEach(() => {
    tracker.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('creates a missing file with today as its only row', async () => {
    const result = await collector.collectToday({ name: 'Widgets', productId: widgets });

    expect(result).toEqual({
      product: 'Widgets',
      mode: 'rewrite',
      schema: { state: 'absent' },
      carriedRows: 0,
      warnings: 0,
    });
    expect(fileText()).toBe(
      formatHeader(SCHEMA, { productName: 'Widgets', createdAt: NOW }) + '20240110|2|1|1\n'
    );
  });

  it('appends when the schema is unchanged', async () => {
    const before = header(SCHEMA) + '20240109|1|1|0\n';
    seedFile(before);

    const result = await collector.collectToday({ name: 'Widgets', productId: widgets });

    expect(result.mode).toBe('append');
    expect(result.schema).toEqual({ state: 'identical' });
    expect(fileText()).toBe(before + '20240110|2|1|1\n');
  });

  it('replaces the row of a second run on the same day', async () => {
    seedFile(header(SCHEMA) + '20240109|1|1|0\n20240110|9|9|9\n');

    const result = await collector.collectToday({ name: 'Widgets', productId: widgets });

    expect(result.mode).toBe('rewrite');
    expect(result.carriedRows).toBe(1);
    expect(fileText()).toBe(header(SCHEMA) + '20240109|1|1|0\n20240110|2|1|1\n');
  });

  it('counts a status and a resolution of the same name together', async () => {
    tracker.addLegalValue('status', 'DUPLICATE', { sortkey: 30 });
    tracker.addLegalValue('resolution', 'DUPLICATE', { sortkey: 20 });
    tracker.addEntity({
      productId: widgets,
      status: 'NEW',
      resolution: 'DUPLICATE',
      createdAt: '2024-01-05T00:00:00Z',
    });
    const store = new SQLiteEntityStore(tracker.db);
    const shared = new IncrementalCollector({
      entities: store,
      files,
      domain: await loadCategoryDomain(store),
      now: fixedClock(NOW),
      logger: quietLogger(),
    });

    await shared.collectToday({ name: 'Widgets', productId: widgets });

    const schema = ['NEW', 'ASSIGNED', 'DUPLICATE', 'FIXED', 'DUPLICATE'];
    expect(fileText()).toBe(
      formatHeader(schema, { productName: 'Widgets', createdAt: NOW }) + '20240110|3|1|1|1|1\n'
    );
  });

  it('rewrites under the new schema when the columns drift', async () => {
    seedFile(header(['NEW', 'OLD', 'FIXED']) + '20240108|4|1|2\n20240109|5|7|2\n');

    const result = await collector.collectToday({ name: 'Widgets', productId: widgets });

    expect(result.mode).toBe('rewrite');
    expect(result.schema).toEqual({
      state: 'drift',
      added: ['ASSIGNED'],
      removed: ['OLD'],
      reordered: false,
    });
    expect(fileText()).toBe(header(SCHEMA) + '20240108|4||2\n20240109|5||2\n20240110|2|1|1\n');
  });

  it('rewrites a file that does not end with a line break', async () => {
    seedFile(header(SCHEMA) + '20240109|1|1|0');

    const result = await collector.collectToday({ name: 'Widgets', productId: widgets });

    expect(result.mode).toBe('rewrite');
    expect(fileText()).toBe(header(SCHEMA) + '20240109|1|1|0\n20240110|2|1|1\n');
  });

  it('starts over when the file has no fields line', async () => {
    seedFile('# Daily Entity Stats\n# Created: ' + CREATED + '\n20240109|1|1|0\n');

    const result = await collector.collectToday({ name: 'Widgets', productId: widgets });

    expect(result.mode).toBe('rewrite');
    expect(result.carriedRows).toBe(0);
    expect(fileText()).toBe(header(SCHEMA) + '20240110|2|1|1\n');
  });

  it('reports integrity warnings and still appends', async () => {
    seedFile(header(SCHEMA) + '20240109|1\n');

    const result = await collector.collectToday({ name: 'Widgets', productId: widgets });

    expect(result.warnings).toBe(1);
    expect(result.mode).toBe('append');
  });

  it('counts across every product for the all-entities target', async () => {
    const gadgets = tracker.addProduct('Gadgets');
    tracker.addEntity({ productId: gadgets, status: 'NEW', createdAt: '2024-01-05T00:00:00Z' });

    await collector.collectToday({ name: '-All-', productId: null });

    const parsed = await files.read('-All-');
    expect(parsed?.rows.map(r => [...r.counts.values()])).toEqual([[3, 1, 1]]);
  });
});

describe('compareSchema', () => {
  it('treats a missing fields line as drift', () => {
    expect(compareSchema(null, ['A'])).toEqual({
      state: 'drift',
      added: ['A'],
      removed: [],
      reordered: false,
    });
  });

  it('detects pure reordering', () => {
    expect(compareSchema(['B', 'A'], ['A', 'B'])).toEqual({
      state: 'drift',
      added: [],
      removed: [],
      reordered: true,
    });
  });

  it('accepts identical schemas', () => {
    expect(compareSchema(['A', 'B'], ['A', 'B'])).toEqual({ state: 'identical' });
  });
});
