import { InvalidArgumentError } from './errors.js';
import type { ProjectIdentity, WorkItem } from './types.js';

// Project ids are the base64 of the descriptor (git remote URL or absolute path),
// so they are stable across sessions and can be decoded back for display.
export function identify(descriptor: string): ProjectIdentity {
  if (typeof descriptor !== 'string' || descriptor.length === 0) {
    throw new InvalidArgumentError('project descriptor must be a non-empty string');
  }
  const projectId = Buffer.from(descriptor, 'utf8').toString('base64');
  return { projectId, rawValue: descriptor };
}

function normalizeBase64(input: string): string {
  const normalized = input.replace(/-/g, '+').replace(/_/g, '/');
  const padding = (4 - (normalized.length % 4)) % 4;
  return normalized + '='.repeat(padding);
}

export function decodeProjectId(projectId: string): string {
  const normalized = normalizeBase64(projectId.trim());
  if (!/^[A-Za-z0-9+/]+=*$/.test(normalized)) {
    throw new InvalidArgumentError(`not a project id: ${projectId}`);
  }
  const raw = Buffer.from(normalized, 'base64').toString('utf8');
  // Buffer decoding is lenient; only accept ids that round-trip
  if (raw.length === 0 || Buffer.from(raw, 'utf8').toString('base64') !== normalized) {
    throw new InvalidArgumentError(`not a project id: ${projectId}`);
  }
  return raw;
}

export type ProjectInfo = {
  projectId: string;
  rawValue: string | null;
  items: number;
  active: number;
};

export interface ProjectSource {
  listProjectIds(): Promise<string[]>;
  listByProject(projectId: string): Promise<WorkItem[]>;
}

export async function listProjects(source: ProjectSource): Promise<{ count: number; projects: ProjectInfo[] }> {
  const ids = (await source.listProjectIds()).sort();
  const projects: ProjectInfo[] = [];
  for (const projectId of ids) {
    const items = await source.listByProject(projectId);
    let rawValue: string | null;
    try {
      rawValue = decodeProjectId(projectId);
    } catch {
      rawValue = null;
    }
    projects.push({
      projectId,
      rawValue,
      items: items.length,
      active: items.filter((i) => i.status !== 'completed').length,
    });
  }
  return { count: projects.length, projects };
}
