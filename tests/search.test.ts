import { describe, it, expect, beforeEach } from 'vitest';

import { breadcrumbFor, search, searchItems } from '../src/search/index.js';
import { ItemStore } from '../src/storage/items.js';
import { MemoryBackend } from '../src/storage/backend.js';
import type { WorkItem } from '../src/types.js';
import { rejectionOf } from './helpers.js';

const P = 'L2hvbWUvZGV2L3dpZGdldHM=';
const Q = 'L2hvbWUvZGV2L2dhZGdldHM=';

describe('search', () => {
  let store: ItemStore;

  beforeEach(async () => {
    store = new ItemStore(new MemoryBackend());
    const p = await store.create({ projectId: P, type: 'project', title: 'P' });
    const research = await store.create({ projectId: P, type: 'phase', title: 'Research', parentId: p.id });
    const draft = await store.create({ projectId: P, type: 'task', title: 'Draft', parentId: research.id });
    await store.create({ projectId: P, type: 'subtask', title: 'Outline', parentId: draft.id, description: 'rough DRAFT structure' });
    await store.create({ projectId: P, type: 'phase', title: 'Review', parentId: p.id, description: 'read the draft aloud' });
    const other = await store.create({ projectId: Q, type: 'project', title: 'Q' });
    await store.create({ projectId: Q, type: 'task', title: 'Draft elsewhere', parentId: other.id });
  });

  it('returns the ancestor breadcrumb from the root down', async () => {
    const res = await search(store, P, 'Draft');
    expect(res.map((m) => [m.item.title, m.breadcrumb])).toEqual([
      ['Review', ['P']],
      ['Draft', ['P', 'Research']],
      ['Outline', ['P', 'Research', 'Draft']],
    ]);
  });

  it('matches case-insensitively on the trimmed query, within one project', async () => {
    const res = await search(store, P, '  ROUGH ');
    expect(res.map((m) => m.item.title)).toEqual(['Outline']);
    expect(await search(store, P, 'elsewhere')).toEqual([]);
    expect((await search(store, Q, 'draft')).map((m) => m.breadcrumb)).toEqual([['Q']]);
  });

  it('rejects an empty query', async () => {
    expect(await rejectionOf(search(store, P, '   '))).toMatchObject({ kind: 'InvalidArgument', message: 'search query must not be empty' });
  });
});

describe('breadcrumbFor', () => {
  const base = { projectId: P, status: 'not_started', orderIndex: 1, createdAt: '', updatedAt: '' } as const;

  it('stops at a broken link and keeps what it found', () => {
    const mid: WorkItem = { ...base, id: 2, type: 'phase', title: 'Mid', parentId: 1 };
    const leaf: WorkItem = { ...base, id: 3, type: 'task', title: 'Leaf', parentId: 2 };
    const byId = new Map([mid, leaf].map((i) => [i.id, i] as const));
    expect(breadcrumbFor(leaf, byId)).toEqual(['Mid']);
    expect(searchItems([mid, leaf], P, 'leaf')[0].breadcrumb).toEqual(['Mid']);
  });
});
