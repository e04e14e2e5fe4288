import { InvalidArgumentError } from '../errors.js';
import { MAX_DEPTH } from '../hierarchy.js';
import { ITEM_TYPES } from '../types.js';
import type { SearchMatch, WorkItem } from '../types.js';

export function buildTextForItem(item: WorkItem): string {
  return [item.title, item.description || ''].join('\n').toLowerCase();
}

function typeRank(item: WorkItem): number {
  return ITEM_TYPES.indexOf(item.type);
}

/**
 * Ancestor titles from the root project down to the item's parent. Stops
 * early (partial breadcrumb) when a parent cannot be resolved in `byId`.
 */
export function breadcrumbFor(item: WorkItem, byId: ReadonlyMap<number, WorkItem>): string[] {
  const titles: string[] = [];
  const visited = new Set<number>([item.id]);
  let parentId = item.parentId;
  while (parentId !== undefined && titles.length < MAX_DEPTH) {
    const parent = byId.get(parentId);
    if (!parent || visited.has(parent.id)) break;
    visited.add(parent.id);
    titles.push(parent.title);
    parentId = parent.parentId;
  }
  return titles.reverse();
}

// Case-insensitive substring match on title and description, one project only
export function searchItems(items: readonly WorkItem[], projectId: string, query: string): SearchMatch[] {
  const needle = typeof query === 'string' ? query.trim().toLowerCase() : '';
  if (needle.length === 0) {
    throw new InvalidArgumentError('search query must not be empty');
  }
  const scoped = items.filter((i) => i.projectId === projectId);
  const byId = new Map(scoped.map((i) => [i.id, i] as const));
  return scoped
    .filter((i) => buildTextForItem(i).includes(needle))
    .sort((a, b) => typeRank(a) - typeRank(b) || a.orderIndex - b.orderIndex || a.id - b.id)
    .map((item) => ({ item, breadcrumb: breadcrumbFor(item, byId) }));
}

export interface SearchSource {
  listByProject(projectId: string): Promise<WorkItem[]>;
}

export async function search(source: SearchSource, projectId: string, query: string): Promise<SearchMatch[]> {
  if (typeof query !== 'string' || query.trim().length === 0) {
    throw new InvalidArgumentError('search query must not be empty');
  }
  return searchItems(await source.listByProject(projectId), projectId, query);
}
