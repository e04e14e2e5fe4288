import path from 'node:path';
import fs from 'node:fs/promises';
import { z } from 'zod';
import { pathExists, readJson, writeJsonAtomic } from '../fs.js';
import { CHANGELOG_ACTIONS, ITEM_TYPES, STATUSES } from '../types.js';
import type { ChangelogEntry, WorkItem } from '../types.js';

// One project's items and changelog, plus the global id counters as of the commit that wrote it
export interface ProjectSnapshot {
  version: 1;
  projectId: string;
  nextItemId: number;
  nextChangeId: number;
  items: WorkItem[];
  changelog: ChangelogEntry[];
}

export interface StorageBackend {
  readonly description: string;
  load(): Promise<ProjectSnapshot[]>;
  save(snapshot: ProjectSnapshot): Promise<void>;
}

const workItemSchema = z.object({
  id: z.number().int().positive(),
  projectId: z.string().min(1),
  type: z.enum(ITEM_TYPES),
  title: z.string(),
  description: z.string().optional(),
  status: z.enum(STATUSES),
  parentId: z.number().int().positive().optional(),
  notes: z.string().optional(),
  orderIndex: z.number(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const changelogEntrySchema = z.object({
  id: z.number().int().positive(),
  workItemId: z.number().int(),
  projectId: z.string(),
  action: z.enum(CHANGELOG_ACTIONS),
  details: z.record(z.union([z.string(), z.number(), z.null()])),
  createdAt: z.string(),
});

export const projectSnapshotSchema = z.object({
  version: z.literal(1),
  projectId: z.string().min(1),
  nextItemId: z.number().int().positive(),
  nextChangeId: z.number().int().positive(),
  items: z.array(workItemSchema),
  changelog: z.array(changelogEntrySchema),
});

export function parseProjectSnapshot(data: unknown): ProjectSnapshot {
  return projectSnapshotSchema.parse(data);
}

// Volatile backend for tests and WORK_PLAN_STORE=memory
export class MemoryBackend implements StorageBackend {
  readonly description = 'memory';
  private readonly docs = new Map<string, string>();
  saves = 0;

  async load(): Promise<ProjectSnapshot[]> {
    return Array.from(this.docs.values(), (raw) => parseProjectSnapshot(JSON.parse(raw)));
  }

  async save(snapshot: ProjectSnapshot): Promise<void> {
    this.docs.set(snapshot.projectId, JSON.stringify(snapshot));
    this.saves += 1;
  }
}

const DOC_SUFFIX = '.json';

// File name for a project id; ids are base64 and may contain '/'
export function projectFileName(projectId: string): string {
  return Buffer.from(projectId, 'utf8').toString('base64url') + DOC_SUFFIX;
}

// One JSON document per project under `dir`, each replaced atomically on commit
export class JsonDirectoryBackend implements StorageBackend {
  readonly description: string;

  constructor(private readonly dir: string) {
    this.description = `dir:${dir}`;
  }

  async load(): Promise<ProjectSnapshot[]> {
    if (!(await pathExists(this.dir))) return [];
    const names = (await fs.readdir(this.dir)).filter((n) => n.endsWith(DOC_SUFFIX)).sort();
    const parts: ProjectSnapshot[] = [];
    for (const name of names) {
      const res = projectSnapshotSchema.safeParse(await readJson(path.join(this.dir, name)));
      if (!res.success) {
        throw new Error(`${name}: ${res.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
      }
      if (projectFileName(res.data.projectId) !== name) {
        throw new Error(`${name} holds project ${res.data.projectId}`);
      }
      parts.push(res.data);
    }
    return parts;
  }

  async save(snapshot: ProjectSnapshot): Promise<void> {
    await writeJsonAtomic(path.join(this.dir, projectFileName(snapshot.projectId)), snapshot);
  }
}

export function createBackend(cfg: { store: 'file' | 'memory'; storeDir?: string }): StorageBackend {
  if (cfg.store === 'memory' || !cfg.storeDir) return new MemoryBackend();
  return new JsonDirectoryBackend(cfg.storeDir);
}
