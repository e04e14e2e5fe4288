import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { AuditLog } from './storage/changelog.js';
import type { ItemStore } from './storage/items.js';
import {
  handleCompleteItem,
  handleCreateWorkItem,
  handleGetChangelog,
  handleGetCurrentWorkPlan,
  handleGetProjectId,
  handleGetWorkItem,
  handleListProjects,
  handleSearchItems,
  handleUpdateWorkItem,
} from './tools/work_items.js';
import type { ToolContext } from './tools/work_items.js';
import { ITEM_TYPES, UPDATABLE_FIELDS } from './types.js';
import type { Logger } from './utils/log.js';
import { json } from './utils/respond.js';

export const SERVER_NAME = 'mcp-work-plan';

export interface ServerDeps {
  store: ItemStore;
  audit: AuditLog;
  log: Logger;
  version: string;
}

const projectId = z.string().min(1).describe('Project id returned by get_project_id');
const itemId = z.number().int().positive();

export function createServer({ store, audit, log, version }: ServerDeps): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version });
  const ctx: ToolContext = { store, audit, log };

  server.registerTool(
    'get_project_id',
    {
      title: 'Get Project Id',
      description: 'Derive the stable project id from a git remote URL or an absolute project path',
      inputSchema: { projectInfo: z.string().describe('Git remote URL or absolute path of the project') },
    },
    async (args) => json(await handleGetProjectId(ctx, args)),
  );

  server.registerTool(
    'get_current_work_plan',
    {
      title: 'Get Current Work Plan',
      description: 'Rolling view of the project: open work expanded, finished subtrees collapsed into summaries',
      inputSchema: { projectId },
    },
    async (args) => json(await handleGetCurrentWorkPlan(ctx, args)),
  );

  server.registerTool(
    'create_work_item',
    {
      title: 'Create Work Item',
      description: 'Create a project, phase, task or subtask. Everything except a project needs a parentId',
      inputSchema: {
        projectId,
        type: z.enum(ITEM_TYPES),
        title: z.string(),
        description: z.string().optional(),
        parentId: itemId.optional(),
        notes: z.string().optional(),
      },
    },
    async (args) => json(await handleCreateWorkItem(ctx, args)),
  );

  server.registerTool(
    'update_work_item',
    {
      title: 'Update Work Item',
      description: `Patch a work item. Updatable fields: ${UPDATABLE_FIELDS.join(', ')}; null clears description, notes or parentId`,
      inputSchema: {
        projectId,
        id: itemId,
        fields: z.record(z.unknown()),
      },
    },
    async (args) => json(await handleUpdateWorkItem(ctx, args)),
  );

  server.registerTool(
    'complete_item',
    {
      title: 'Complete Item',
      description: 'Mark a work item completed (no-op when it already is)',
      inputSchema: { projectId, id: itemId },
    },
    async (args) => json(await handleCompleteItem(ctx, args)),
  );

  server.registerTool(
    'search_items',
    {
      title: 'Search Items',
      description: 'Case-insensitive search over titles and descriptions, with the ancestor breadcrumb of each match',
      inputSchema: { projectId, query: z.string() },
    },
    async (args) => json(await handleSearchItems(ctx, args)),
  );

  server.registerTool(
    'get_work_item',
    {
      title: 'Get Work Item',
      description: 'Fetch one work item by id',
      inputSchema: { projectId, id: itemId },
    },
    async (args) => json(await handleGetWorkItem(ctx, args)),
  );

  server.registerTool(
    'get_changelog',
    {
      title: 'Get Changelog',
      description: 'Audit trail of a project, or of one item when itemId is given; oldest first',
      inputSchema: {
        projectId,
        itemId: itemId.optional(),
        limit: z.number().int().min(1).max(1000).optional(),
      },
    },
    async (args) => json(await handleGetChangelog(ctx, args)),
  );

  server.registerTool(
    'list_projects',
    {
      title: 'List Projects',
      description: 'Projects that have at least one work item, with item counts',
      inputSchema: {},
    },
    async () => json(await handleListProjects(ctx)),
  );

  return server;
}
