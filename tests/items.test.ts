import { describe, it, expect, beforeEach } from 'vitest';

import { WorkPlanError } from '../src/errors.js';
import { AuditLog } from '../src/storage/changelog.js';
import { ItemStore } from '../src/storage/items.js';
import { MemoryBackend } from '../src/storage/backend.js';
import type { ProjectSnapshot } from '../src/storage/backend.js';
import { rejectionOf } from './helpers.js';

const P = 'L2hvbWUvZGV2L3dpZGdldHM=';
const Q = 'L2hvbWUvZGV2L2dhZGdldHM=';

function tickingClock() {
  let sec = 0;
  return () => new Date(Date.UTC(2024, 0, 1, 0, 0, sec++));
}

class FlakyBackend extends MemoryBackend {
  failNext = false;

  override async save(snapshot: ProjectSnapshot): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('disk full');
    }
    await super.save(snapshot);
  }
}

let backend: FlakyBackend;
let store: ItemStore;
let audit: AuditLog;

beforeEach(() => {
  backend = new FlakyBackend();
  store = new ItemStore(backend, { clock: tickingClock() });
  audit = new AuditLog(store);
});

describe('ItemStore.create', () => {
  it('assigns ids, default status and sibling order', async () => {
    const p = await store.create({ projectId: P, type: 'project', title: 'P' });
    const research = await store.create({ projectId: P, type: 'phase', title: 'Research', parentId: p.id });
    const build = await store.create({ projectId: P, type: 'phase', title: 'Build', parentId: p.id, notes: 'later' });
    const draft = await store.create({ projectId: P, type: 'task', title: 'Draft', parentId: research.id, description: 'first pass' });

    expect(p).toEqual({
      id: 1,
      projectId: P,
      type: 'project',
      title: 'P',
      status: 'not_started',
      orderIndex: 1,
      createdAt: '2024-01-01T00:00:00.000Z',
      updatedAt: '2024-01-01T00:00:00.000Z',
    });
    expect([research.orderIndex, build.orderIndex, draft.orderIndex]).toEqual([1, 11, 1]);
    expect(build.notes).toBe('later');
    expect(draft).toMatchObject({ id: 4, parentId: 2, description: 'first pass' });
    expect(backend.saves).toBe(4);
  });

  it('orders new roots after existing roots of the same project only', async () => {
    await store.create({ projectId: Q, type: 'project', title: 'Other' });
    const first = await store.create({ projectId: P, type: 'project', title: 'A' });
    const second = await store.create({ projectId: P, type: 'project', title: 'B' });
    expect(first.orderIndex).toBe(1);
    expect(second.orderIndex).toBe(11);
  });

  it('writes one create entry per item', async () => {
    const p = await store.create({ projectId: P, type: 'project', title: 'P' });
    await store.create({ projectId: P, type: 'task', title: 'Draft', parentId: p.id, description: 'd' });

    const entries = await audit.listForProject(P);
    expect(entries).toEqual([
      {
        id: 1,
        workItemId: 1,
        projectId: P,
        action: 'create',
        details: { type: 'project', title: 'P', parentId: null, description: null },
        createdAt: '2024-01-01T00:00:00.000Z',
      },
      {
        id: 2,
        workItemId: 2,
        projectId: P,
        action: 'create',
        details: { type: 'task', title: 'Draft', parentId: 1, description: 'd' },
        createdAt: '2024-01-01T00:00:01.000Z',
      },
    ]);
  });

  it('rejects a subtask directly under a project without writing anything', async () => {
    const p = await store.create({ projectId: P, type: 'project', title: 'P' });
    const e = await rejectionOf(store.create({ projectId: P, type: 'subtask', title: 'Nope', parentId: p.id }));
    expect(e).toBeInstanceOf(WorkPlanError);
    expect(e).toMatchObject({ kind: 'InvalidHierarchy', reason: 'bad-nesting' });
    expect(backend.saves).toBe(1);
    expect(await store.listByProject(P)).toHaveLength(1);
    expect(await audit.listForProject(P)).toHaveLength(1);
  });

  it('maps an unknown parent to NotFound and a foreign parent to InvalidHierarchy', async () => {
    const other = await store.create({ projectId: Q, type: 'project', title: 'Other' });
    expect(await rejectionOf(store.create({ projectId: P, type: 'task', title: 'T', parentId: 99 }))).toMatchObject({
      kind: 'NotFound',
      reason: 'missing-parent',
      message: 'parent item 99 does not exist',
    });
    expect(await rejectionOf(store.create({ projectId: P, type: 'task', title: 'T', parentId: other.id }))).toMatchObject({
      kind: 'InvalidHierarchy',
      reason: 'cross-project',
    });
  });

  it('rejects malformed input', async () => {
    expect(await rejectionOf(store.create({ projectId: P, type: 'project', title: '   ' }))).toMatchObject({
      kind: 'InvalidArgument',
      message: 'title must not be empty',
    });
    expect(await rejectionOf(store.create({ projectId: ' ', type: 'project', title: 'P' }))).toMatchObject({ kind: 'InvalidArgument' });
    expect(await rejectionOf(store.create({ projectId: P, type: 'task', title: 'T', parentId: 0 }))).toMatchObject({ kind: 'InvalidArgument' });
  });

  it('trims titles', async () => {
    const p = await store.create({ projectId: P, type: 'project', title: '  P  ' });
    expect(p.title).toBe('P');
  });

  it('hands out distinct ids to concurrent creates', async () => {
    const p = await store.create({ projectId: P, type: 'project', title: 'P' });
    const tasks = await Promise.all(
      ['a', 'b', 'c', 'd'].map((title) => store.create({ projectId: P, type: 'task', title, parentId: p.id })),
    );
    expect(tasks.map((t) => t.id)).toEqual([2, 3, 4, 5]);
    expect(tasks.map((t) => t.orderIndex)).toEqual([1, 11, 21, 31]);
  });
});

describe('ItemStore.update', () => {
  it('writes one field-change entry per changed field', async () => {
    const p = await store.create({ projectId: P, type: 'project', title: 'P' });
    const t = await store.create({ projectId: P, type: 'task', title: 'Draft', parentId: p.id });

    const updated = await store.update(t.id, P, { title: 'Draft v2', notes: 'see review', status: 'in_progress' });
    expect(updated).toMatchObject({ id: t.id, projectId: P, type: 'task', title: 'Draft v2', notes: 'see review', status: 'in_progress' });
    expect(updated.updatedAt).toBe('2024-01-01T00:00:02.000Z');

    const entries = await audit.listForItem(t.id);
    expect(entries.map((e) => [e.action, e.details])).toEqual([
      ['create', { type: 'task', title: 'Draft', parentId: 1, description: null }],
      ['field-change', { field: 'title', old: 'Draft', new: 'Draft v2' }],
      ['field-change', { field: 'status', old: 'not_started', new: 'in_progress' }],
      ['field-change', { field: 'notes', old: null, new: 'see review' }],
    ]);
  });

  it('skips unchanged fields and does not save when nothing changed', async () => {
    const p = await store.create({ projectId: P, type: 'project', title: 'P', notes: 'n' });
    const same = await store.update(p.id, P, { title: 'P', notes: 'n' });
    expect(same.updatedAt).toBe(p.updatedAt);
    expect(backend.saves).toBe(1);
    expect(await audit.listForItem(p.id)).toHaveLength(1);

    await store.update(p.id, P, { title: 'P', notes: null });
    const entries = await audit.listForItem(p.id);
    expect(entries).toHaveLength(2);
    expect(entries[1].details).toEqual({ field: 'notes', old: 'n', new: null });
    expect((await store.get(p.id, P)).notes).toBeUndefined();
  });

  it('trims titles the same way create does', async () => {
    const p = await store.create({ projectId: P, type: 'project', title: '  P  ' });
    const renamed = await store.update(p.id, P, { title: '  Q  ' });
    expect(renamed.title).toBe('Q');
    // padding alone is not a change
    await store.update(p.id, P, { title: ' Q ' });
    expect((await audit.listForItem(p.id)).map((e) => e.details)).toEqual([
      { type: 'project', title: 'P', parentId: null, description: null },
      { field: 'title', old: 'P', new: 'Q' },
    ]);
  });

  it('rejects an empty patch, a blank title and disallowed transitions', async () => {
    const p = await store.create({ projectId: P, type: 'project', title: 'P' });
    expect(await rejectionOf(store.update(p.id, P, {}))).toMatchObject({ kind: 'InvalidArgument', message: 'no updatable fields provided' });
    expect(await rejectionOf(store.update(p.id, P, { title: ' ' }))).toMatchObject({ kind: 'InvalidArgument' });

    await store.complete(p.id, P);
    expect(await rejectionOf(store.update(p.id, P, { status: 'not_started' }))).toMatchObject({
      kind: 'InvalidArgument',
      message: "invalid status transition from 'completed' to 'not_started' (allowed: in_progress)",
    });
    const reopened = await store.update(p.id, P, { status: 'in_progress' });
    expect(reopened.status).toBe('in_progress');
  });

  it('hides items of other projects', async () => {
    const p = await store.create({ projectId: P, type: 'project', title: 'P' });
    expect(await rejectionOf(store.update(p.id, Q, { title: 'X' }))).toMatchObject({
      kind: 'NotFound',
      message: `work item 1 not found in project ${Q}`,
    });
    expect(await rejectionOf(store.get(p.id, Q))).toMatchObject({ kind: 'NotFound' });
    expect(await rejectionOf(store.get(42, P))).toMatchObject({ kind: 'NotFound' });
  });

  it('re-validates the hierarchy when the parent changes', async () => {
    const p = await store.create({ projectId: P, type: 'project', title: 'P' });
    const a = await store.create({ projectId: P, type: 'phase', title: 'A', parentId: p.id });
    const b = await store.create({ projectId: P, type: 'phase', title: 'B', parentId: p.id });
    const t = await store.create({ projectId: P, type: 'task', title: 'T', parentId: a.id });
    const s = await store.create({ projectId: P, type: 'subtask', title: 'S', parentId: t.id });

    const moved = await store.update(t.id, P, { parentId: b.id });
    expect(moved.parentId).toBe(b.id);
    expect((await audit.listForItem(t.id)).at(-1)?.details).toEqual({ field: 'parentId', old: a.id, new: b.id });

    expect(await rejectionOf(store.update(s.id, P, { parentId: p.id }))).toMatchObject({ kind: 'InvalidHierarchy', reason: 'bad-nesting' });
    expect(await rejectionOf(store.update(t.id, P, { parentId: 77 }))).toMatchObject({ kind: 'NotFound', reason: 'missing-parent' });
    expect(await rejectionOf(store.update(t.id, P, { parentId: null }))).toMatchObject({ kind: 'InvalidHierarchy', reason: 'bad-nesting' });
    expect((await store.get(t.id, P)).parentId).toBe(b.id);
  });
});

describe('ItemStore.complete', () => {
  it('records a status change and a complete entry, once', async () => {
    const p = await store.create({ projectId: P, type: 'project', title: 'P' });
    const done = await store.complete(p.id, P);
    expect(done.status).toBe('completed');
    expect(done.updatedAt).toBe('2024-01-01T00:00:01.000Z');

    const again = await store.complete(p.id, P);
    expect(again).toEqual(done);

    const entries = await audit.listForItem(p.id);
    expect(entries.map((e) => e.action)).toEqual(['create', 'field-change', 'complete']);
    expect(entries[1].details).toEqual({ field: 'status', old: 'not_started', new: 'completed' });
    expect(entries[2].details).toEqual({ title: 'P', previousStatus: 'not_started' });
    expect(backend.saves).toBe(2);
  });
});

describe('ItemStore transactions', () => {
  it('rolls back the item and its changelog when the save fails', async () => {
    const p = await store.create({ projectId: P, type: 'project', title: 'P' });
    backend.failNext = true;

    const e = await rejectionOf(store.update(p.id, P, { title: 'Renamed' }));
    expect(e).toMatchObject({ kind: 'StorageFailure', message: 'update failed to persist: disk full' });
    expect((await store.get(p.id, P)).title).toBe('P');
    expect(await audit.listForItem(p.id)).toHaveLength(1);

    // the queue keeps going after a failure
    const renamed = await store.update(p.id, P, { title: 'Renamed' });
    expect(renamed.title).toBe('Renamed');
    expect(await audit.listForItem(p.id)).toHaveLength(2);
  });

  it('leaves no trace of a create whose save failed', async () => {
    await store.create({ projectId: P, type: 'project', title: 'P' });
    backend.failNext = true;
    expect(await rejectionOf(store.create({ projectId: P, type: 'project', title: 'Lost' }))).toMatchObject({ kind: 'StorageFailure' });
    const next = await store.create({ projectId: P, type: 'project', title: 'Kept' });
    expect(next).toMatchObject({ id: 2, orderIndex: 11 });
    expect((await store.listByProject(P)).map((i) => i.title).sort()).toEqual(['Kept', 'P']);
    expect((await audit.listForProject(P)).map((e) => e.workItemId)).toEqual([1, 2]);
  });

  it('keeps a failed create out of the live state of every project', async () => {
    await store.create({ projectId: P, type: 'project', title: 'P' });
    backend.failNext = true;
    await rejectionOf(store.create({ projectId: Q, type: 'project', title: 'Q' }));
    expect(await store.listProjectIds()).toEqual([P]);
    expect(await store.listByProject(Q)).toEqual([]);
    expect(await rejectionOf(store.get(2, Q))).toMatchObject({ kind: 'NotFound' });
  });

  it('filters by status', async () => {
    const p = await store.create({ projectId: P, type: 'project', title: 'P' });
    const a = await store.create({ projectId: P, type: 'task', title: 'A', parentId: p.id });
    await store.create({ projectId: P, type: 'task', title: 'B', parentId: p.id });
    await store.complete(a.id, P);
    expect((await store.listByProject(P, { status: 'completed' })).map((i) => i.title)).toEqual(['A']);
    expect((await store.listByProject(P, { status: 'not_started' })).map((i) => i.title).sort()).toEqual(['B', 'P']);
  });
});
