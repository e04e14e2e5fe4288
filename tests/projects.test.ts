import { describe, it, expect } from 'vitest';

import { decodeProjectId, identify, listProjects } from '../src/projects.js';
import { WorkPlanError } from '../src/errors.js';
import { ItemStore } from '../src/storage/items.js';
import { MemoryBackend } from '../src/storage/backend.js';
import { thrownBy } from './helpers.js';

describe('identify()', () => {
  it('encodes the descriptor as standard base64 of its UTF-8 bytes', () => {
    expect(identify('https://example.com/acme/widgets.git')).toEqual({
      projectId: 'aHR0cHM6Ly9leGFtcGxlLmNvbS9hY21lL3dpZGdldHMuZ2l0',
      rawValue: 'https://example.com/acme/widgets.git',
    });
    expect(identify('héllo').projectId).toBe('aMOpbGxv');
  });

  it('is deterministic and distinguishes descriptors', () => {
    const a1 = identify('/home/dev/widgets').projectId;
    const a2 = identify('/home/dev/widgets').projectId;
    const b = identify('/home/dev/gadgets').projectId;
    expect(a1).toBe('L2hvbWUvZGV2L3dpZGdldHM=');
    expect(a2).toBe(a1);
    expect(b).toBe('L2hvbWUvZGV2L2dhZGdldHM=');
  });

  it('accepts any non-empty descriptor, whitespace included', () => {
    const blank = identify('   ');
    expect(blank).toEqual({ projectId: 'ICAg', rawValue: '   ' });
    expect(decodeProjectId(blank.projectId)).toBe('   ');
  });

  it('rejects the empty descriptor', () => {
    const e = thrownBy(() => identify(''));
    expect(e).toBeInstanceOf(WorkPlanError);
    expect(e).toMatchObject({ kind: 'InvalidArgument', message: 'project descriptor must be a non-empty string' });
  });
});

describe('decodeProjectId()', () => {
  it('recovers the descriptor, accepting url-safe ids without padding', () => {
    expect(decodeProjectId('L2hvbWUvZGV2L3dpZGdldHM=')).toBe('/home/dev/widgets');
    expect(decodeProjectId('L3Nydi9hcHA/Pw==')).toBe('/srv/app??');
    expect(decodeProjectId('L3Nydi9hcHA_Pw')).toBe('/srv/app??');
  });

  it('rejects strings that are not project ids', () => {
    expect(() => decodeProjectId('not base64!')).toThrow(/not a project id/);
    // decodes, but not to valid UTF-8 that encodes back to the same id
    expect(() => decodeProjectId('abc')).toThrow(/not a project id/);
  });
});

describe('listProjects()', () => {
  it('lists every project with counts, sorted by id', async () => {
    const store = new ItemStore(new MemoryBackend());
    const widgets = identify('/home/dev/widgets').projectId;
    const gadgets = identify('/home/dev/gadgets').projectId;

    const w = await store.create({ projectId: widgets, type: 'project', title: 'Widgets' });
    const t = await store.create({ projectId: widgets, type: 'task', title: 'Ship', parentId: w.id });
    await store.complete(t.id, widgets);
    await store.create({ projectId: gadgets, type: 'project', title: 'Gadgets' });
    await store.create({ projectId: 'opaque id', type: 'project', title: 'Opaque' });

    const res = await listProjects(store);
    expect(res.count).toBe(3);
    expect(res.projects).toEqual([
      { projectId: gadgets, rawValue: '/home/dev/gadgets', items: 1, active: 1 },
      { projectId: widgets, rawValue: '/home/dev/widgets', items: 2, active: 1 },
      { projectId: 'opaque id', rawValue: null, items: 1, active: 1 },
    ]);
  });
});
