import type { HierarchyReason } from './errors.js';
import type { ItemType, WorkItem } from './types.js';

export const MAX_DEPTH = 4;

// parent type -> child types it may hold
export const ALLOWED_CHILDREN: Readonly<Record<ItemType, readonly ItemType[]>> = {
  project: ['phase', 'task'],
  phase: ['task', 'subtask'],
  task: ['subtask'],
  subtask: [],
};

export interface HierarchyCandidate {
  id?: number; // absent while creating
  projectId: string;
  type: ItemType;
  parentId?: number;
}

export type HierarchyVerdict = { ok: true; depth: number } | { ok: false; reason: HierarchyReason; message: string };

export type ItemLookup = (id: number) => WorkItem | undefined;

function reject(reason: HierarchyReason, message: string): HierarchyVerdict {
  return { ok: false, reason, message };
}

/**
 * Checks a proposed (type, parent) placement against the current tree.
 *
 * Order matters: nesting, then parent scope, then the bounded walk to the
 * root. The walk is what keeps the tree acyclic; there is no separate cycle
 * detector.
 */
export function validateHierarchy(candidate: HierarchyCandidate, lookup: ItemLookup): HierarchyVerdict {
  const { type, parentId, projectId } = candidate;

  if (parentId === undefined) {
    if (type !== 'project') {
      return reject('bad-nesting', `${type} items must have a parent`);
    }
    return { ok: true, depth: 1 };
  }
  if (type === 'project') {
    return reject('bad-nesting', 'project items cannot have a parent');
  }

  const parent = lookup(parentId);
  if (!parent) {
    return reject('missing-parent', `parent item ${parentId} does not exist`);
  }
  if (!ALLOWED_CHILDREN[parent.type].includes(type)) {
    const allowed = ALLOWED_CHILDREN[parent.type];
    return reject(
      'bad-nesting',
      `${type} items cannot be children of ${parent.type}` + (allowed.length ? ` (allowed: ${allowed.join(', ')})` : ''),
    );
  }
  if (parent.projectId !== projectId) {
    return reject('cross-project', `parent item ${parentId} belongs to a different project`);
  }

  // Walk up from the candidate. When the walk meets the candidate itself it
  // follows the proposed parent, so a cycle keeps going until the bound trips.
  let depth = 1;
  let current: { type: ItemType; parentId?: number } = candidate;
  while (current.parentId !== undefined) {
    depth += 1;
    if (depth > MAX_DEPTH) {
      return reject('depth-exceeded', `hierarchy deeper than ${MAX_DEPTH} levels`);
    }
    const nextId: number = current.parentId;
    const next = nextId === candidate.id ? candidate : lookup(nextId);
    if (!next) {
      return reject('missing-parent', `ancestor item ${nextId} does not exist`);
    }
    current = next;
  }
  if (current.type !== 'project') {
    return reject('bad-nesting', `hierarchy root is a ${current.type}, not a project`);
  }
  return { ok: true, depth };
}
