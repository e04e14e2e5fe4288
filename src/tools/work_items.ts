import { isWorkPlanError } from '../errors.js';
import { getCurrentWorkPlan } from '../plan/rolling.js';
import type { WorkPlan } from '../plan/rolling.js';
import { identify, listProjects } from '../projects.js';
import type { ProjectInfo } from '../projects.js';
import { search } from '../search/index.js';
import type { AuditLog } from '../storage/changelog.js';
import type { ItemStore } from '../storage/items.js';
import { parseWorkItemPatch } from '../storage/patch.js';
import type { ChangelogEntry, ItemType, ProjectIdentity, SearchMatch, WorkItem } from '../types.js';
import type { Logger } from '../utils/log.js';
import type { Envelope } from '../utils/respond.js';

export interface ToolContext {
  store: ItemStore;
  audit: AuditLog;
  log: Logger;
}

// Taxonomy errors become error envelopes; anything else is a bug and propagates
async function guarded<T>(ctx: ToolContext, tool: string, op: () => T | Promise<T>): Promise<Envelope<T>> {
  try {
    return { ok: true, data: await op() };
  } catch (e) {
    if (!isWorkPlanError(e)) throw e;
    ctx.log.warn(`${tool} failed: ${e.kind}: ${e.message}`);
    return { ok: false, error: e.toPayload() };
  }
}

export function handleGetProjectId(ctx: ToolContext, { projectInfo }: { projectInfo: string }): Promise<Envelope<ProjectIdentity>> {
  return guarded(ctx, 'get_project_id', () => identify(projectInfo));
}

export function handleGetCurrentWorkPlan(ctx: ToolContext, { projectId }: { projectId: string }): Promise<Envelope<WorkPlan>> {
  return guarded(ctx, 'get_current_work_plan', () => getCurrentWorkPlan(ctx.store, projectId));
}

export function handleCreateWorkItem(
  ctx: ToolContext,
  args: { projectId: string; type: ItemType; title: string; description?: string; parentId?: number; notes?: string },
): Promise<Envelope<WorkItem>> {
  return guarded(ctx, 'create_work_item', () => ctx.store.create(args));
}

export function handleUpdateWorkItem(
  ctx: ToolContext,
  { projectId, id, fields }: { projectId: string; id: number; fields: unknown },
): Promise<Envelope<WorkItem>> {
  return guarded(ctx, 'update_work_item', () => ctx.store.update(id, projectId, parseWorkItemPatch(fields)));
}

export function handleCompleteItem(ctx: ToolContext, { projectId, id }: { projectId: string; id: number }): Promise<Envelope<WorkItem>> {
  return guarded(ctx, 'complete_item', () => ctx.store.complete(id, projectId));
}

export function handleSearchItems(ctx: ToolContext, { projectId, query }: { projectId: string; query: string }): Promise<Envelope<SearchMatch[]>> {
  return guarded(ctx, 'search_items', () => search(ctx.store, projectId, query));
}

export function handleGetWorkItem(ctx: ToolContext, { projectId, id }: { projectId: string; id: number }): Promise<Envelope<WorkItem>> {
  return guarded(ctx, 'get_work_item', () => ctx.store.get(id, projectId));
}

export function handleGetChangelog(
  ctx: ToolContext,
  { projectId, itemId, limit }: { projectId: string; itemId?: number; limit?: number },
): Promise<Envelope<ChangelogEntry[]>> {
  return guarded(ctx, 'get_changelog', async () => {
    if (itemId === undefined) return ctx.audit.listForProject(projectId, { limit });
    // Resolves within the project first so foreign item ids read as not found
    await ctx.store.get(itemId, projectId);
    const entries = await ctx.audit.listForItem(itemId);
    return limit !== undefined && limit < entries.length ? entries.slice(entries.length - limit) : entries;
  });
}

export function handleListProjects(ctx: ToolContext): Promise<Envelope<{ count: number; projects: ProjectInfo[] }>> {
  return guarded(ctx, 'list_projects', () => listProjects(ctx.store));
}
