/**
 * Category Domain Registry Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SQLiteEntityStore } from '../../storage/sqlite.js';
import { TrackerFixture } from '../../testing/fixtures.js';
import { CategoryDomain, loadCategoryDomain, loadFieldDomain } from '../registry.js';

describe('loadCategoryDomain', () => {
  let tracker: TrackerFixture;
  let store: SQLiteEntityStore;

  beforeEach(() => {
    tracker = new TrackerFixture();
    store = new SQLiteEntityStore(tracker.db);

    tracker.addLegalValues('status', ['NEW', 'ASSIGNED', 'RESOLVED']);
    tracker.addLegalValues('resolution', ['FIXED', 'WONTFIX']);

    const product = tracker.addProduct('Widgets');
    const entity = tracker.addEntity({
      productId: product,
      status: 'RESOLVED',
      resolution: 'FIXED',
      createdAt: '2024-01-01T00:00:00Z',
    });
    tracker.addChange(entity, 'status', 'NEW', 'REOPENED', '2024-01-02T00:00:00Z');
    tracker.addChange(entity, 'resolution', '', 'LATER', '2024-01-03T00:00:00Z');
    tracker.addChange(entity, 'status', 'REOPENED', 'VERIFIED', '2024-01-04T00:00:00Z');
    tracker.addChange(entity, 'status', 'VERIFIED', 'RESOLVED', '2024-01-05T00:00:00Z');
    tracker.addChange(entity, 'resolution', 'LATER', 'FIXED', '2024-01-05T00:00:00Z');
  });

  afterEach(() => {
    tracker.close();
  });

  it('puts legal values first, then historical ones in first-seen order', async () => {
    const domain = await loadCategoryDomain(store);

    expect(domain.columns()).toEqual([
      'NEW',
      'ASSIGNED',
      'RESOLVED',
      'REOPENED',
      'VERIFIED',
      'FIXED',
      'WONTFIX',
      'LATER',
    ]);
    expect(domain.statuses.map(c => c.active)).toEqual([true, true, true, false, false]);
    expect(domain.categories('resolution').map(c => c.kind)).toEqual([
      'resolution',
      'resolution',
      'resolution',
    ]);
  });

  it('folds renamed values into their target', async () => {
    const domain = await loadCategoryDomain(store, {
      status: { REOPENED: 'NEW', VERIFIED: 'CONFIRMED' },
      resolution: {},
    });

    expect(domain.columns()).toEqual([
      'NEW',
      'ASSIGNED',
      'RESOLVED',
      'CONFIRMED',
      'FIXED',
      'WONTFIX',
      'LATER',
    ]);
    expect(domain.canonicalize('status', 'REOPENED')).toBe('NEW');
    expect(domain.canonicalize('status', 'ASSIGNED')).toBe('ASSIGNED');
    expect(domain.canonicalize('resolution', 'REOPENED')).toBe('REOPENED');
  });

  it('folds a renamed legal value and lists the raw values counted under each column', async () => {
    const domain = await loadCategoryDomain(store, {
      status: { ASSIGNED: 'IN_PROGRESS', REOPENED: 'IN_PROGRESS' },
      resolution: {},
    });

    expect(domain.categories('status').map(c => c.name)).toEqual([
      'NEW',
      'IN_PROGRESS',
      'RESOLVED',
      'VERIFIED',
    ]);
    expect(domain.sourceValues('status', 'IN_PROGRESS')).toEqual(['IN_PROGRESS', 'ASSIGNED', 'REOPENED']);
    expect(domain.sourceValues('status', 'NEW')).toEqual(['NEW']);
  });

  it('loads a single field', async () => {
    const resolutions = await loadFieldDomain(store, 'resolution');

    expect(resolutions).toEqual([
      { name: 'FIXED', kind: 'resolution', active: true },
      { name: 'WONTFIX', kind: 'resolution', active: true },
      { name: 'LATER', kind: 'resolution', active: false },
    ]);
  });
});

describe('CategoryDomain', () => {
  const domain = new CategoryDomain(
    [
      { name: 'NEW', kind: 'status', active: true },
      { name: 'GONE', kind: 'status', active: false },
    ],
    [{ name: 'FIXED', kind: 'resolution', active: true }],
    { status: {}, resolution: {} }
  );

  it('knows which values belong to which field', () => {
    expect(domain.has('status', 'NEW')).toBe(true);
    expect(domain.has('status', 'GONE')).toBe(true);
    expect(domain.has('status', 'FIXED')).toBe(false);
    expect(domain.has('resolution', 'FIXED')).toBe(true);
  });

  it('exposes an immutable category list', () => {
    expect(Object.isFrozen(domain.statuses)).toBe(true);
  });
});
