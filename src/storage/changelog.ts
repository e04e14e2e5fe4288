import type { ChangelogAction, ChangelogDetails, ChangelogEntry } from '../types.js';
import type { StoreState } from './state.js';

export function compareEntries(a: ChangelogEntry, b: ChangelogEntry): number {
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  return a.id - b.id;
}

// Only the item store calls this, inside its transaction
export function appendEntry(
  draft: StoreState,
  entry: { workItemId: number; projectId: string; action: ChangelogAction; details: ChangelogDetails; createdAt: string },
): ChangelogEntry {
  return draft.appendChange(entry);
}

export interface ChangelogSource {
  snapshot(): Promise<StoreState>;
}

/** Read side of the audit trail. */
export class AuditLog {
  constructor(private readonly source: ChangelogSource) {}

  async listForItem(workItemId: number): Promise<ChangelogEntry[]> {
    const state = await this.source.snapshot();
    const projectId = state.projectOf(workItemId);
    if (projectId === undefined) return [];
    return state
      .changesFor(projectId)
      .filter((e) => e.workItemId === workItemId)
      .sort(compareEntries);
  }

  async listForProject(projectId: string, opts?: { limit?: number }): Promise<ChangelogEntry[]> {
    const state = await this.source.snapshot();
    const entries = [...state.changesFor(projectId)].sort(compareEntries);
    const limit = opts?.limit;
    // Most recent `limit` entries, still oldest first
    return limit !== undefined && limit < entries.length ? entries.slice(entries.length - limit) : entries;
  }
}
