#!/usr/bin/env node
import path from 'node:path';
import fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import type { ServerConfig } from './config.js';
import { createServer, SERVER_NAME } from './server.js';
import { createBackend } from './storage/backend.js';
import { AuditLog } from './storage/changelog.js';
import { ItemStore } from './storage/items.js';
import { createLogger } from './utils/log.js';
import { describeError } from './errors.js';

const HERE_DIR = path.dirname(fileURLToPath(import.meta.url));
const REPO_ROOT = path.resolve(HERE_DIR, '..');

async function getPackageVersion(): Promise<string> {
  // Prefer npm-provided env when available
  const vEnv = process.env.npm_package_version;
  if (vEnv) return vEnv;
  try {
    const raw = await fs.readFile(path.join(REPO_ROOT, 'package.json'), 'utf8');
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (e) {
    console.warn('[startup] could not read package version:', describeError(e));
  }
  return '0.0.0';
}

async function main() {
  let cfg: ServerConfig;
  try {
    cfg = loadConfig();
  } catch (e) {
    console.error('[startup][config] loadConfig failed. Set DATA_DIR or WORK_PLAN_STORE_DIR. Error:', describeError(e));
    throw e;
  }
  const log = createLogger('startup', cfg.logLevel);
  const version = await getPackageVersion();
  const backend = createBackend(cfg);
  log.info(`${SERVER_NAME} ${version} starting`, { store: backend.description, logLevel: cfg.logLevel, pid: process.pid });

  const store = new ItemStore(backend, { logger: createLogger('store', cfg.logLevel) });
  // Fail fast on a corrupt database instead of on the first tool call
  await store.snapshot();
  const audit = new AuditLog(store);
  const server = createServer({ store, audit, log: createLogger('tools', cfg.logLevel), version });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info('connected over stdio');
}

main().catch((e: unknown) => {
  console.error('[startup] fatal:', e);
  process.exit(1);
});
