export const ITEM_TYPES = ['project', 'phase', 'task', 'subtask'] as const;
export type ItemType = (typeof ITEM_TYPES)[number];

export const STATUSES = ['not_started', 'in_progress', 'completed'] as const;
export type Status = (typeof STATUSES)[number];

export interface WorkItem {
  id: number;
  projectId: string; // opaque project identifier, see projects.ts
  type: ItemType;
  title: string;
  description?: string;
  status: Status;
  // Absent only for project roots
  parentId?: number;
  notes?: string;
  orderIndex: number;
  createdAt: string; // ISO
  updatedAt: string; // ISO
}

export const CHANGELOG_ACTIONS = ['create', 'update', 'complete', 'field-change'] as const;
export type ChangelogAction = (typeof CHANGELOG_ACTIONS)[number];

export type ChangelogDetails = Record<string, string | number | null>;

export interface ChangelogEntry {
  id: number;
  workItemId: number;
  projectId: string;
  action: ChangelogAction;
  details: ChangelogDetails;
  createdAt: string; // ISO
}

// Fields a caller may change after creation. projectId, type and id are not here on purpose.
export const UPDATABLE_FIELDS = ['title', 'description', 'status', 'notes', 'parentId', 'orderIndex'] as const;
export type UpdatableField = (typeof UPDATABLE_FIELDS)[number];

export interface WorkItemPatch {
  title?: string;
  description?: string | null;
  status?: Status;
  notes?: string | null;
  parentId?: number | null;
  orderIndex?: number;
}

export interface CreateWorkItemInput {
  projectId: string;
  type: ItemType;
  title: string;
  description?: string;
  parentId?: number;
  notes?: string;
}

export interface SearchMatch {
  item: WorkItem;
  // Ancestor titles, root project first, immediate parent last
  breadcrumb: string[];
}

export interface ProjectIdentity {
  projectId: string;
  rawValue: string;
}
