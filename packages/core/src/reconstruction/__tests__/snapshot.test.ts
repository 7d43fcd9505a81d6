/**
 * Snapshot Reconstructor Tests
 */

import { describe, it, expect } from 'vitest';
import type { AuditEvent, EntityCurrentState, FieldHistory } from '../../storage/interfaces.js';
import { SnapshotReconstructor } from '../snapshot.js';

function entity(overrides: Partial<EntityCurrentState> = {}): EntityCurrentState {
  return {
    entityId: 1,
    productId: 1,
    creationDay: 100,
    status: 'NEW',
    resolution: '',
    ...overrides,
  };
}

function change(
  entityId: number,
  field: AuditEvent['field'],
  removed: string,
  added: string,
  dayNumber: number,
  sequence = dayNumber
): AuditEvent {
  return { entityId, field, removed, added, dayNumber, sequence };
}

function history(...events: AuditEvent[]): FieldHistory {
  const map: FieldHistory = new Map();
  for (const event of events) {
    map.set(event.entityId, [...(map.get(event.entityId) ?? []), event]);
  }
  return map;
}

describe('SnapshotReconstructor', () => {
  it('attributes a change to the day after it happened', () => {
    const e = entity({ status: 'RESOLVED' });
    const reconstructor = new SnapshotReconstructor({
      status: history(change(1, 'status', 'NEW', 'RESOLVED', 105)),
      resolution: new Map(),
    });

    expect(reconstructor.valueAt(e, 'status', 100)).toBe('NEW');
    expect(reconstructor.valueAt(e, 'status', 104)).toBe('NEW');
    expect(reconstructor.valueAt(e, 'status', 105)).toBe('NEW');
    expect(reconstructor.valueAt(e, 'status', 106)).toBe('RESOLVED');
  });

  it('walks a chain of changes', () => {
    const e = entity({ status: 'CLOSED' });
    const reconstructor = new SnapshotReconstructor({
      status: history(
        change(1, 'status', 'NEW', 'ASSIGNED', 102),
        change(1, 'status', 'ASSIGNED', 'RESOLVED', 102, 103),
        change(1, 'status', 'RESOLVED', 'CLOSED', 110)
      ),
      resolution: new Map(),
    });

    expect(reconstructor.valueAt(e, 'status', 101)).toBe('NEW');
    expect(reconstructor.valueAt(e, 'status', 102)).toBe('NEW');
    expect(reconstructor.valueAt(e, 'status', 103)).toBe('RESOLVED');
    expect(reconstructor.valueAt(e, 'status', 110)).toBe('RESOLVED');
    expect(reconstructor.valueAt(e, 'status', 111)).toBe('CLOSED');
  });

  it('uses the current value when nothing ever changed', () => {
    const reconstructor = new SnapshotReconstructor({ status: new Map(), resolution: new Map() });

    expect(reconstructor.valueAt(entity({ status: 'ASSIGNED' }), 'status', 50)).toBe('ASSIGNED');
  });

  it('reports empty values as unknown', () => {
    const e = entity({ status: 'RESOLVED', resolution: 'FIXED' });
    const reconstructor = new SnapshotReconstructor({
      status: new Map(),
      resolution: history(change(1, 'resolution', '', 'FIXED', 104)),
    });

    expect(reconstructor.valueAt(e, 'resolution', 103)).toBeNull();
    expect(reconstructor.valueAt(e, 'resolution', 105)).toBe('FIXED');
    expect(reconstructor.valueAt(entity(), 'status', 103)).toBe('NEW');
  });

  it('restarts the scan when asked about an earlier day', () => {
    const e = entity({ status: 'RESOLVED' });
    const reconstructor = new SnapshotReconstructor({
      status: history(change(1, 'status', 'NEW', 'RESOLVED', 105)),
      resolution: new Map(),
    });

    expect(reconstructor.valueAt(e, 'status', 106)).toBe('RESOLVED');
    expect(reconstructor.valueAt(e, 'status', 101)).toBe('NEW');
    expect(reconstructor.valueAt(e, 'status', 107)).toBe('RESOLVED');
  });

  it('keeps separate cursors per entity and field', () => {
    const a = entity({ entityId: 1, status: 'RESOLVED', resolution: 'FIXED' });
    const b = entity({ entityId: 2, status: 'ASSIGNED' });
    const reconstructor = new SnapshotReconstructor({
      status: history(
        change(1, 'status', 'NEW', 'RESOLVED', 103),
        change(2, 'status', 'NEW', 'ASSIGNED', 106)
      ),
      resolution: history(change(1, 'resolution', '', 'FIXED', 103)),
    });

    expect(reconstructor.valueAt(a, 'status', 104)).toBe('RESOLVED');
    expect(reconstructor.valueAt(b, 'status', 104)).toBe('NEW');
    expect(reconstructor.valueAt(a, 'resolution', 103)).toBeNull();
    expect(reconstructor.valueAt(a, 'resolution', 104)).toBe('FIXED');
    expect(reconstructor.valueAt(b, 'status', 107)).toBe('ASSIGNED');
  });
});
