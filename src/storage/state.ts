import type { ChangelogAction, ChangelogDetails, ChangelogEntry, Status, WorkItem } from '../types.js';
import type { ProjectSnapshot } from './backend.js';

function addTo<K>(index: Map<K, Set<number>>, key: K, id: number) {
  let bucket = index.get(key);
  if (!bucket) {
    bucket = new Set();
    index.set(key, bucket);
  }
  bucket.add(id);
}

function removeFrom<K>(index: Map<K, Set<number>>, key: K, id: number) {
  const bucket = index.get(key);
  if (!bucket) return;
  bucket.delete(id);
  if (bucket.size === 0) index.delete(key);
}

function copyIndex<K>(index: Map<K, Set<number>>): Map<K, Set<number>> {
  return new Map(Array.from(index, ([k, ids]) => [k, new Set(ids)] as const));
}

const ROOTS = 0;

/** Items and changelog of one project, with lookups by parent and by status. */
class ProjectPartition {
  readonly items = new Map<number, WorkItem>();
  // parent id -> child ids; ROOTS holds items without a parent
  private byParent = new Map<number, Set<number>>();
  private byStatus = new Map<Status, Set<number>>();
  changelog: ChangelogEntry[] = [];

  clone(): ProjectPartition {
    const copy = new ProjectPartition();
    for (const [id, item] of this.items) copy.items.set(id, item);
    copy.byParent = copyIndex(this.byParent);
    copy.byStatus = copyIndex(this.byStatus);
    // Entries are frozen once appended, sharing them is safe
    copy.changelog = [...this.changelog];
    return copy;
  }

  list(status?: Status): WorkItem[] {
    const ids = status ? this.byStatus.get(status) : this.items.keys();
    return this.resolve(ids);
  }

  childrenOf(parentId: number | undefined): WorkItem[] {
    return this.resolve(this.byParent.get(parentId ?? ROOTS));
  }

  index(item: WorkItem) {
    this.items.set(item.id, item);
    addTo(this.byStatus, item.status, item.id);
    addTo(this.byParent, item.parentId ?? ROOTS, item.id);
  }

  unindex(item: WorkItem) {
    this.items.delete(item.id);
    removeFrom(this.byStatus, item.status, item.id);
    removeFrom(this.byParent, item.parentId ?? ROOTS, item.id);
  }

  private resolve(ids: Iterable<number> | undefined): WorkItem[] {
    const out: WorkItem[] = [];
    if (!ids) return out;
    for (const id of ids) {
      const item = this.items.get(id);
      if (item) out.push(item);
    }
    return out;
  }
}

/**
 * In-memory image of the store, partitioned by project.
 *
 * A committed state is never mutated. A transaction works on a fork, which
 * shares every partition with its base and copies a partition only when it
 * first writes to it, so the cost of a write is bounded by that project.
 */
export class StoreState {
  private partitions = new Map<string, ProjectPartition>();
  // item id -> project id; grows only, shared between a state and its forks
  private owners = new Map<number, string>();
  private pendingOwners = new Map<number, string>();
  private readonly touched = new Set<string>();
  private nextItemId = 1;
  private nextChangeId = 1;

  static fromProjects(parts: readonly ProjectSnapshot[]): StoreState {
    const state = new StoreState();
    for (const part of parts) {
      const partition = new ProjectPartition();
      for (const item of part.items) {
        partition.index({ ...item });
        state.owners.set(item.id, part.projectId);
        state.nextItemId = Math.max(state.nextItemId, item.id + 1);
      }
      for (const entry of part.changelog) {
        partition.changelog.push(Object.freeze({ ...entry, details: Object.freeze({ ...entry.details }) }));
        state.nextChangeId = Math.max(state.nextChangeId, entry.id + 1);
      }
      // Each document carries the counters as of its last commit; the newest wins
      state.nextItemId = Math.max(state.nextItemId, part.nextItemId);
      state.nextChangeId = Math.max(state.nextChangeId, part.nextChangeId);
      state.partitions.set(part.projectId, partition);
    }
    return state;
  }

  fork(): StoreState {
    const draft = new StoreState();
    draft.partitions = new Map(this.partitions);
    draft.owners = this.owners;
    draft.nextItemId = this.nextItemId;
    draft.nextChangeId = this.nextChangeId;
    return draft;
  }

  // Called once the fork has been saved and becomes the live state
  publish() {
    for (const [id, projectId] of this.pendingOwners) this.owners.set(id, projectId);
    this.pendingOwners.clear();
  }

  get isDirty(): boolean {
    return this.touched.size > 0;
  }

  // Projects written by this fork
  touchedProjects(): string[] {
    return Array.from(this.touched);
  }

  toProjectSnapshot(projectId: string): ProjectSnapshot {
    const partition = this.partitions.get(projectId);
    return {
      version: 1,
      projectId,
      nextItemId: this.nextItemId,
      nextChangeId: this.nextChangeId,
      items: partition ? Array.from(partition.items.values(), (item) => ({ ...item })) : [],
      changelog: partition ? [...partition.changelog] : [],
    };
  }

  projectOf(id: number): string | undefined {
    return this.pendingOwners.get(id) ?? this.owners.get(id);
  }

  get(id: number): WorkItem | undefined {
    const projectId = this.projectOf(id);
    return projectId === undefined ? undefined : this.partitions.get(projectId)?.items.get(id);
  }

  listByProject(projectId: string, status?: Status): WorkItem[] {
    return this.partitions.get(projectId)?.list(status) ?? [];
  }

  // Items of a project sharing a parent; roots when parentId is undefined
  siblingsOf(projectId: string, parentId: number | undefined): WorkItem[] {
    return this.partitions.get(projectId)?.childrenOf(parentId) ?? [];
  }

  projectIds(): string[] {
    return Array.from(this.partitions.keys()).filter((id) => (this.partitions.get(id)?.items.size ?? 0) > 0);
  }

  changesFor(projectId: string): readonly ChangelogEntry[] {
    return this.partitions.get(projectId)?.changelog ?? [];
  }

  allocateItemId(): number {
    const id = this.nextItemId;
    this.nextItemId += 1;
    return id;
  }

  insert(item: WorkItem) {
    if (this.projectOf(item.id) !== undefined) {
      throw new Error(`duplicate work item id ${item.id}`);
    }
    this.writable(item.projectId).index(item);
    this.pendingOwners.set(item.id, item.projectId);
  }

  replace(item: WorkItem) {
    const previous = this.get(item.id);
    if (!previous || previous.projectId !== item.projectId) {
      throw new Error(`unknown work item id ${item.id}`);
    }
    const partition = this.writable(item.projectId);
    partition.unindex(previous);
    partition.index(item);
  }

  appendChange(input: { workItemId: number; projectId: string; action: ChangelogAction; details: ChangelogDetails; createdAt: string }): ChangelogEntry {
    const entry: ChangelogEntry = Object.freeze({ id: this.nextChangeId, ...input, details: Object.freeze({ ...input.details }) });
    this.nextChangeId += 1;
    this.writable(input.projectId).changelog.push(entry);
    return entry;
  }

  private writable(projectId: string): ProjectPartition {
    if (this.touched.has(projectId)) {
      const own = this.partitions.get(projectId);
      if (own) return own;
    }
    const copy = this.partitions.get(projectId)?.clone() ?? new ProjectPartition();
    this.partitions.set(projectId, copy);
    this.touched.add(projectId);
    return copy;
  }
}
