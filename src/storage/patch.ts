import { z } from 'zod';
import { InvalidArgumentError } from '../errors.js';
import { STATUSES, UPDATABLE_FIELDS } from '../types.js';
import type { Status, WorkItem, WorkItemPatch } from '../types.js';

/**
 * One variant per kind of updatable field. Built from a WorkItemPatch by
 * walking UPDATABLE_FIELDS, so keys outside that list never reach the store.
 */
export type FieldChange =
  | { field: 'title'; value: string }
  | { field: 'description' | 'notes'; value: string | null }
  | { field: 'status'; value: Status }
  | { field: 'parentId'; value: number | null }
  | { field: 'orderIndex'; value: number };

export const workItemPatchSchema = z
  .object({
    title: z.string().trim().min(1, 'title must not be empty'),
    description: z.string().nullable(),
    status: z.enum(STATUSES),
    notes: z.string().nullable(),
    parentId: z.number().int().positive().nullable(),
    orderIndex: z.number().finite(),
  })
  .partial()
  .strict();

export function parseWorkItemPatch(input: unknown): WorkItemPatch {
  const res = workItemPatchSchema.safeParse(input);
  if (!res.success) {
    const issues = res.error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
    throw new InvalidArgumentError(`invalid update fields: ${issues.join('; ')} (updatable: ${UPDATABLE_FIELDS.join(', ')})`);
  }
  return res.data;
}

export function toFieldChanges(patch: WorkItemPatch): FieldChange[] {
  const changes: FieldChange[] = [];
  for (const field of UPDATABLE_FIELDS) {
    switch (field) {
      case 'title':
        if (patch.title !== undefined) changes.push({ field, value: patch.title });
        break;
      case 'description':
        if (patch.description !== undefined) changes.push({ field, value: patch.description });
        break;
      case 'notes':
        if (patch.notes !== undefined) changes.push({ field, value: patch.notes });
        break;
      case 'status':
        if (patch.status !== undefined) changes.push({ field, value: patch.status });
        break;
      case 'parentId':
        if (patch.parentId !== undefined) changes.push({ field, value: patch.parentId });
        break;
      case 'orderIndex':
        if (patch.orderIndex !== undefined) changes.push({ field, value: patch.orderIndex });
        break;
    }
  }
  return changes;
}

export function currentValue(item: WorkItem, field: FieldChange['field']): string | number | null {
  const v = item[field];
  return v === undefined ? null : v;
}

export function applyFieldChange(item: WorkItem, change: FieldChange): WorkItem {
  switch (change.field) {
    case 'title':
      return { ...item, title: change.value };
    case 'description':
    case 'notes': {
      const next = { ...item };
      if (change.value === null) delete next[change.field];
      else next[change.field] = change.value;
      return next;
    }
    case 'status':
      return { ...item, status: change.value };
    case 'parentId': {
      const next = { ...item };
      if (change.value === null) delete next.parentId;
      else next.parentId = change.value;
      return next;
    }
    case 'orderIndex':
      return { ...item, orderIndex: change.value };
  }
}

const STATUS_TRANSITIONS: Readonly<Record<Status, readonly Status[]>> = {
  not_started: ['in_progress', 'completed'],
  in_progress: ['not_started', 'completed'],
  completed: ['in_progress'],
};

export function assertStatusTransition(from: Status, to: Status) {
  if (from === to) return;
  if (!STATUS_TRANSITIONS[from].includes(to)) {
    throw new InvalidArgumentError(`invalid status transition from '${from}' to '${to}' (allowed: ${STATUS_TRANSITIONS[from].join(', ')})`);
  }
}
