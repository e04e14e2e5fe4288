import type { ItemType, Status, WorkItem } from '../types.js';

export interface PlanProgress {
  completed: number;
  total: number;
}

export interface ExpandedPlanNode {
  kind: 'expanded';
  id: number;
  type: ItemType;
  title: string;
  description?: string;
  status: Status;
  notes?: string;
  orderIndex: number;
  // Direct children only
  progress: PlanProgress;
  children: PlanNode[];
}

// Stands in for a completed subtree with no open work left
export interface SummaryPlanNode {
  kind: 'summary';
  id: number;
  title: string;
  type: ItemType;
  status: Status;
  summaryText: string;
}

export type PlanNode = ExpandedPlanNode | SummaryPlanNode;

export interface UnassignedBucket {
  title: 'Unassigned';
  items: PlanNode[];
}

export interface WorkPlan {
  projectId: string;
  projects: PlanNode[];
  unassigned?: UnassignedBucket;
  totals: { items: number; active: number; completed: number };
}

export const COMPLETED_MARKER = 'completed';

const PLURAL: Record<ItemType, string> = {
  project: 'projects',
  phase: 'phases',
  task: 'tasks',
  subtask: 'subtasks',
};

export function compareSiblings(a: WorkItem, b: WorkItem): number {
  if (a.orderIndex !== b.orderIndex) return a.orderIndex - b.orderIndex;
  return a.id - b.id;
}

export function summaryText(children: readonly WorkItem[]): string {
  if (children.length === 0) return COMPLETED_MARKER;
  const done = children.filter((c) => c.status === 'completed').length;
  const types = new Set(children.map((c) => c.type));
  const noun = types.size === 1 ? PLURAL[children[0].type] : 'items';
  return `${done} of ${children.length} ${noun} completed`;
}

/**
 * Derives the rolling work plan from a project's raw items.
 *
 * Open items are expanded; a completed item is collapsed into a summary
 * unless something underneath it is still open, in which case it stays
 * expanded so the open work stays visible. Items whose parent is missing
 * from `items` are kept under the Unassigned bucket.
 */
export function buildWorkPlan(projectId: string, items: readonly WorkItem[]): WorkPlan {
  const byId = new Map<number, WorkItem>();
  for (const item of items) byId.set(item.id, item);

  const children = new Map<number, WorkItem[]>();
  const roots: WorkItem[] = [];
  const orphans: WorkItem[] = [];
  for (const item of items) {
    if (item.parentId === undefined) {
      (item.type === 'project' ? roots : orphans).push(item);
    } else if (item.parentId !== item.id && byId.has(item.parentId)) {
      const list = children.get(item.parentId);
      if (list) list.push(item);
      else children.set(item.parentId, [item]);
    } else {
      orphans.push(item);
    }
  }
  for (const list of children.values()) list.sort(compareSiblings);
  roots.sort(compareSiblings);
  orphans.sort(compareSiblings);

  const kids = (id: number) => children.get(id) ?? [];

  // id -> has a non-completed descendant; `pending` guards corrupted cycles
  const openBelow = new Map<number, boolean>();
  const pending = new Set<number>();
  const hasOpenDescendant = (id: number): boolean => {
    const known = openBelow.get(id);
    if (known !== undefined) return known;
    if (pending.has(id)) return false;
    pending.add(id);
    let open = false;
    for (const child of kids(id)) {
      if (child.status !== 'completed' || hasOpenDescendant(child.id)) {
        open = true;
        break;
      }
    }
    pending.delete(id);
    openBelow.set(id, open);
    return open;
  };

  const seen = new Set<number>();
  const markSubtree = (id: number) => {
    for (const child of kids(id)) {
      if (seen.has(child.id)) continue;
      seen.add(child.id);
      markSubtree(child.id);
    }
  };

  const render = (item: WorkItem): PlanNode | undefined => {
    if (seen.has(item.id)) return undefined;
    seen.add(item.id);
    const below = kids(item.id);

    if (item.status === 'completed' && !hasOpenDescendant(item.id)) {
      markSubtree(item.id);
      return {
        kind: 'summary',
        id: item.id,
        title: item.title,
        type: item.type,
        status: item.status,
        summaryText: summaryText(below),
      };
    }

    const node: ExpandedPlanNode = {
      kind: 'expanded',
      id: item.id,
      type: item.type,
      title: item.title,
      status: item.status,
      orderIndex: item.orderIndex,
      progress: { completed: below.filter((c) => c.status === 'completed').length, total: below.length },
      children: [],
    };
    if (item.description !== undefined) node.description = item.description;
    if (item.notes !== undefined) node.notes = item.notes;
    for (const child of below) {
      const rendered = render(child);
      if (rendered) node.children.push(rendered);
    }
    return node;
  };

  const renderAll = (list: readonly WorkItem[]) => {
    const out: PlanNode[] = [];
    for (const item of list) {
      const rendered = render(item);
      if (rendered) out.push(rendered);
    }
    return out;
  };

  const projects = renderAll(roots);
  const unassigned = renderAll(orphans);
  // Whatever is still unseen hangs off a parent cycle; surface it rather than drop it
  unassigned.push(...renderAll(items.filter((i) => !seen.has(i.id)).sort(compareSiblings)));

  const completed = items.filter((i) => i.status === 'completed').length;
  const plan: WorkPlan = {
    projectId,
    projects,
    totals: { items: items.length, active: items.length - completed, completed },
  };
  if (unassigned.length) plan.unassigned = { title: 'Unassigned', items: unassigned };
  return plan;
}

export interface WorkItemSource {
  listByProject(projectId: string): Promise<WorkItem[]>;
}

export async function getCurrentWorkPlan(source: WorkItemSource, projectId: string): Promise<WorkPlan> {
  return buildWorkPlan(projectId, await source.listByProject(projectId));
}
