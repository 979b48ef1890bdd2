import { describe, it, expect } from 'vitest';
import { toRoamBatchActions } from './translate.js';
import { generateBlockUid } from '../utils/uid.js';
import type { PlanAction } from './types.js';

function sequentialUids(): () => string {
  let n = 0;
  return () => `gen${String(++n).padStart(6, '0')}`;
}

describe('toRoamBatchActions', () => {
  it('replaces pending references with generated UIDs', () => {
    const plan: PlanAction[] = [
      { action: 'create-page', ref: 'new-1', title: 'Project' },
      {
        action: 'create-block',
        ref: 'new-2',
        parent: { kind: 'pending', ref: 'new-1' },
        order: 0,
        string: 'Overview',
        attributes: { heading: 2 },
      },
      {
        action: 'create-block',
        ref: 'new-3',
        parent: { kind: 'pending', ref: 'new-2' },
        order: 0,
        string: 'Details',
        attributes: {},
      },
    ];

    const { actions, uidMap } = toRoamBatchActions(plan, sequentialUids());

    expect(uidMap).toEqual({ 'new-1': 'gen000001', 'new-2': 'gen000002', 'new-3': 'gen000003' });
    expect(actions).toEqual([
      { action: 'create-page', page: { title: 'Project', uid: 'gen000001' } },
      {
        action: 'create-block',
        location: { 'parent-uid': 'gen000001', order: 0 },
        block: { uid: 'gen000002', string: 'Overview', heading: 2 },
      },
      {
        action: 'create-block',
        location: { 'parent-uid': 'gen000002', order: 0 },
        block: { uid: 'gen000003', string: 'Details' },
      },
    ]);
  });

  it('translates updates, moves and deletes of persisted blocks', () => {
    const plan: PlanAction[] = [
      { action: 'update-block', uid: 'uid000001', string: 'New text', attributes: { heading: null } },
      { action: 'update-block', uid: 'uid000002', attributes: { 'children-view-type': null, open: false } },
      { action: 'move-block', uid: 'uid000001', parentUid: 'page00001', order: 3 },
      { action: 'delete-block', uid: 'uid000003' },
    ];

    const { actions, uidMap } = toRoamBatchActions(plan, sequentialUids());

    expect(uidMap).toEqual({});
    expect(actions).toEqual([
      { action: 'update-block', block: { uid: 'uid000001', heading: 0, string: 'New text' } },
      { action: 'update-block', block: { uid: 'uid000002', open: false, 'children-view-type': 'bullet' } },
      { action: 'move-block', block: { uid: 'uid000001' }, location: { 'parent-uid': 'page00001', order: 3 } },
      { action: 'delete-block', block: { uid: 'uid000003' } },
    ]);
  });

  it('drops attributes Roam has no field for', () => {
    const plan: PlanAction[] = [
      {
        action: 'create-block',
        ref: 'new-1',
        parent: { kind: 'uid', uid: 'page00001' },
        order: 0,
        string: 'Tagged',
        attributes: { color: 'red', 'children-view-type': 'numbered' },
      },
    ];

    const { actions } = toRoamBatchActions(plan, sequentialUids());

    expect(actions[0]).toEqual({
      action: 'create-block',
      location: { 'parent-uid': 'page00001', order: 0 },
      block: { uid: 'gen000001', string: 'Tagged', 'children-view-type': 'numbered' },
    });
  });

  it('rejects a pending parent that was never created', () => {
    const plan: PlanAction[] = [
      {
        action: 'create-block',
        ref: 'new-2',
        parent: { kind: 'pending', ref: 'new-9' },
        order: 0,
        string: 'Lost',
        attributes: {},
      },
    ];

    expect(() => toRoamBatchActions(plan, sequentialUids())).toThrow(
      'Pending reference "new-9" is used before it is created'
    );
  });
});

describe('generateBlockUid', () => {
  it('generates 9-character Roam UIDs', () => {
    const uid = generateBlockUid();
    expect(uid).toMatch(/^[a-zA-Z0-9_-]{9}$/);
  });

  it('generates distinct UIDs', () => {
    const uids = new Set(Array.from({ length: 50 }, () => generateBlockUid()));
    expect(uids.size).toBe(50);
  });
});
