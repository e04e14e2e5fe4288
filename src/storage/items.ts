import { InvalidArgumentError, InvalidHierarchyError, NotFoundError, StorageFailureError, describeError } from '../errors.js';
import { validateHierarchy } from '../hierarchy.js';
import { ITEM_TYPES } from '../types.js';
import type { CreateWorkItemInput, Status, WorkItem, WorkItemPatch } from '../types.js';
import { silentLogger } from '../utils/log.js';
import type { Logger } from '../utils/log.js';
import type { StorageBackend } from './backend.js';
import { appendEntry } from './changelog.js';
import { applyFieldChange, assertStatusTransition, currentValue, toFieldChanges } from './patch.js';
import { StoreState } from './state.js';

// Gap between auto-assigned siblings, leaves room for fractional reordering
export const ORDER_GAP = 10;
export const FIRST_ORDER_INDEX = 1.0;

export interface ItemStoreOptions {
  logger?: Logger;
  clock?: () => Date;
}

function requireProjectId(projectId: string) {
  if (typeof projectId !== 'string' || projectId.trim().length === 0) {
    throw new InvalidArgumentError('projectId must be a non-empty string');
  }
}

function requireItemId(id: number) {
  if (!Number.isInteger(id) || id <= 0) {
    throw new InvalidArgumentError(`item id must be a positive integer, got ${id}`);
  }
}

function assertPlacement(draft: StoreState, candidate: { id?: number; projectId: string; type: WorkItem['type']; parentId?: number }) {
  const verdict = validateHierarchy(candidate, (id) => draft.get(id));
  if (verdict.ok) return;
  if (verdict.reason === 'missing-parent') throw new NotFoundError(verdict.message, verdict.reason);
  throw new InvalidHierarchyError(verdict.reason, verdict.message);
}

/**
 * Owns work items and their changelog. Every mutation runs as one
 * transaction: validate, apply to a copy of the state together with its
 * changelog entries, save the copy, then make it the live state.
 */
export class ItemStore {
  private state: StoreState | undefined;
  private loading: Promise<StoreState> | undefined;
  private tail: Promise<unknown> = Promise.resolve();
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(private readonly backend: StorageBackend, options: ItemStoreOptions = {}) {
    this.log = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  // Last committed state. Callers must not mutate it.
  async snapshot(): Promise<StoreState> {
    if (this.state) return this.state;
    if (!this.loading) {
      this.loading = this.backend.load().then(
        (parts) => StoreState.fromProjects(parts),
        (e: unknown) => {
          this.loading = undefined;
          throw new StorageFailureError(`failed to load ${this.backend.description}: ${describeError(e)}`, e);
        },
      );
    }
    const loaded = await this.loading;
    this.state ??= loaded;
    return this.state;
  }

  private transaction<T>(label: string, fn: (draft: StoreState, now: string) => T): Promise<T> {
    const run = async (): Promise<T> => {
      const base = await this.snapshot();
      const draft = base.fork();
      const result = fn(draft, this.clock().toISOString());
      if (!draft.isDirty) return result;
      try {
        // Every mutation stays inside one project, so this is a single document
        for (const projectId of draft.touchedProjects()) {
          await this.backend.save(draft.toProjectSnapshot(projectId));
        }
      } catch (e) {
        this.log.error(`${label} rolled back`, describeError(e));
        throw new StorageFailureError(`${label} failed to persist: ${describeError(e)}`, e);
      }
      draft.publish();
      this.state = draft;
      return result;
    };
    const next = this.tail.then(run, run);
    // A failed transaction must not stall the ones queued behind it
    this.tail = next.catch(() => undefined);
    return next;
  }

  async create(input: CreateWorkItemInput): Promise<WorkItem> {
    requireProjectId(input.projectId);
    if (!ITEM_TYPES.includes(input.type)) {
      throw new InvalidArgumentError(`unknown item type '${String(input.type)}' (expected one of: ${ITEM_TYPES.join(', ')})`);
    }
    const title = typeof input.title === 'string' ? input.title.trim() : '';
    if (title.length === 0) throw new InvalidArgumentError('title must not be empty');
    if (input.parentId !== undefined) requireItemId(input.parentId);

    const created = await this.transaction('create', (draft, now) => {
      assertPlacement(draft, { projectId: input.projectId, type: input.type, parentId: input.parentId });

      const siblings = draft.siblingsOf(input.projectId, input.parentId);
      const orderIndex = siblings.length
        ? Math.max(...siblings.map((s) => s.orderIndex)) + ORDER_GAP
        : FIRST_ORDER_INDEX;

      const item: WorkItem = {
        id: draft.allocateItemId(),
        projectId: input.projectId,
        type: input.type,
        title,
        status: 'not_started',
        orderIndex,
        createdAt: now,
        updatedAt: now,
      };
      if (input.description !== undefined) item.description = input.description;
      if (input.parentId !== undefined) item.parentId = input.parentId;
      if (input.notes !== undefined) item.notes = input.notes;
      draft.insert(item);

      appendEntry(draft, {
        workItemId: item.id,
        projectId: item.projectId,
        action: 'create',
        details: { type: item.type, title: item.title, parentId: item.parentId ?? null, description: item.description ?? null },
        createdAt: now,
      });
      return item;
    });
    this.log.info(`created ${created.type} ${created.id} '${created.title}'`, { projectId: created.projectId });
    return { ...created };
  }

  async update(id: number, projectId: string, patch: WorkItemPatch): Promise<WorkItem> {
    requireProjectId(projectId);
    requireItemId(id);
    if (patch.title !== undefined) {
      const title = patch.title.trim();
      if (title.length === 0) throw new InvalidArgumentError('title must not be empty');
      patch = { ...patch, title };
    }
    const changes = toFieldChanges(patch);
    if (changes.length === 0) {
      throw new InvalidArgumentError('no updatable fields provided');
    }
    if (patch.orderIndex !== undefined && !Number.isFinite(patch.orderIndex)) {
      throw new InvalidArgumentError('orderIndex must be a finite number');
    }

    const { item: updated, fields } = await this.transaction('update', (draft, now) => {
      const existing = this.requireInProject(draft, id, projectId);
      const effective = changes.filter((c) => currentValue(existing, c.field) !== c.value);
      const fields = effective.map((c) => c.field);
      if (effective.length === 0) return { item: existing, fields };

      let next = existing;
      for (const change of effective) {
        if (change.field === 'status') assertStatusTransition(existing.status, change.value);
        next = applyFieldChange(next, change);
      }
      if (effective.some((c) => c.field === 'parentId')) {
        assertPlacement(draft, { id: next.id, projectId: next.projectId, type: next.type, parentId: next.parentId });
      }
      next = { ...next, updatedAt: now };
      draft.replace(next);

      for (const change of effective) {
        appendEntry(draft, {
          workItemId: id,
          projectId,
          action: 'field-change',
          details: { field: change.field, old: currentValue(existing, change.field), new: change.value },
          createdAt: now,
        });
      }
      return { item: next, fields };
    });
    if (fields.length) {
      this.log.info(`updated ${updated.type} ${id}: ${fields.join(', ')}`, { projectId });
    }
    return { ...updated };
  }

  async complete(id: number, projectId: string): Promise<WorkItem> {
    requireProjectId(projectId);
    requireItemId(id);
    const { item: completed, changed } = await this.transaction('complete', (draft, now) => {
      const existing = this.requireInProject(draft, id, projectId);
      if (existing.status === 'completed') return { item: existing, changed: false };

      const next: WorkItem = { ...existing, status: 'completed', updatedAt: now };
      draft.replace(next);
      appendEntry(draft, {
        workItemId: id,
        projectId,
        action: 'field-change',
        details: { field: 'status', old: existing.status, new: 'completed' },
        createdAt: now,
      });
      appendEntry(draft, {
        workItemId: id,
        projectId,
        action: 'complete',
        details: { title: existing.title, previousStatus: existing.status },
        createdAt: now,
      });
      return { item: next, changed: true };
    });
    if (changed) {
      this.log.info(`completed ${completed.type} ${id} '${completed.title}'`, { projectId });
    } else {
      this.log.debug(`item ${id} already completed`, { projectId });
    }
    return { ...completed };
  }

  async get(id: number, projectId: string): Promise<WorkItem> {
    requireProjectId(projectId);
    requireItemId(id);
    return { ...this.requireInProject(await this.snapshot(), id, projectId) };
  }

  async listByProject(projectId: string, filter?: { status?: Status }): Promise<WorkItem[]> {
    requireProjectId(projectId);
    const state = await this.snapshot();
    return state.listByProject(projectId, filter?.status).map((i) => ({ ...i }));
  }

  async listProjectIds(): Promise<string[]> {
    return (await this.snapshot()).projectIds();
  }

  // Same error for "absent" and "other project": ids from another project are not visible
  private requireInProject(state: StoreState, id: number, projectId: string): WorkItem {
    const item = state.get(id);
    if (!item || item.projectId !== projectId) {
      throw new NotFoundError(`work item ${id} not found in project ${projectId}`);
    }
    return item;
  }
}
