import path from 'node:path';
import fs from 'node:fs';
import { z } from 'zod';
import { LOG_LEVELS, isLogLevel } from './utils/log.js';
import type { LogLevel } from './utils/log.js';

export type StoreKind = 'file' | 'memory';

export interface ServerConfig {
  store: StoreKind;
  dataDir?: string;
  // Directory of per-project JSON documents; only meaningful for the file store
  storeDir?: string;
  logLevel: LogLevel;
}

export const DEFAULT_STORE_DIR = 'work-plan';

const fileConfigSchema = z
  .object({
    dataDir: z.string().min(1).optional(),
    store: z.enum(['file', 'memory']).optional(),
    storeDir: z.string().min(1).optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
  })
  .passthrough();

type FileConfig = z.infer<typeof fileConfigSchema>;

// Helper: read JSON config from path
function readJsonConfig(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, 'utf8');
  return JSON.parse(raw);
}

function getCliArg(argv: readonly string[], name: string): string | undefined {
  const idx = argv.indexOf(name);
  if (idx >= 0 && idx + 1 < argv.length) return argv[idx + 1];
  return undefined;
}

// Resolve base config source: CLI --config path, MCP_CONFIG_JSON, then nothing
function readFileConfig(argv: readonly string[], env: NodeJS.ProcessEnv): FileConfig {
  let data: unknown = {};
  const cliConfigPath = getCliArg(argv, '--config');
  if (cliConfigPath) {
    try {
      data = readJsonConfig(cliConfigPath);
    } catch (e) {
      console.warn(`[config] Failed to read --config ${cliConfigPath}:`, e);
    }
  } else if (env.MCP_CONFIG_JSON) {
    try {
      data = JSON.parse(env.MCP_CONFIG_JSON);
    } catch (e) {
      console.warn('[config] Failed to parse MCP_CONFIG_JSON:', e);
    }
  }
  const parsed = fileConfigSchema.safeParse(data);
  if (!parsed.success) {
    console.warn('[config] Ignoring invalid config:', parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
    return {};
  }
  return parsed.data;
}

function parseStoreKind(v: string | undefined): StoreKind | undefined {
  if (v === undefined || v.trim() === '') return undefined;
  const s = v.trim().toLowerCase();
  if (s === 'file' || s === 'memory') return s;
  console.warn(`[config] Unknown WORK_PLAN_STORE=${v}; using file`);
  return undefined;
}

function parseLogLevel(v: string | undefined): LogLevel | undefined {
  if (v === undefined) return undefined;
  const s = v.trim().toLowerCase();
  return isLogLevel(s) ? s : undefined;
}

// Source order per key: file/JSON config -> environment -> default
export function loadConfig(argv: readonly string[] = process.argv, env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const fc = readFileConfig(argv, env);

  const store: StoreKind = fc.store ?? parseStoreKind(env.WORK_PLAN_STORE) ?? 'file';
  const dataDir = fc.dataDir || env.DATA_DIR || undefined;
  const logLevel: LogLevel = fc.logLevel ?? parseLogLevel(env.LOG_LEVEL) ?? 'warn';

  if (store === 'memory') {
    return { store, dataDir, logLevel };
  }

  const explicitDir = fc.storeDir || env.WORK_PLAN_STORE_DIR || undefined;
  if (!explicitDir && !dataDir) {
    throw new Error('DATA_DIR must be set (via config file dataDir or environment) unless WORK_PLAN_STORE_DIR is given');
  }
  const storeDir = explicitDir
    ? path.resolve(dataDir ?? '.', explicitDir)
    : path.join(dataDir ?? '.', DEFAULT_STORE_DIR);
  return { store, dataDir, storeDir, logLevel };
}
