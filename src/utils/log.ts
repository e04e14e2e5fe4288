// Console logging for a stdio MCP server: everything goes to stderr,
// stdout carries the protocol.
export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  error(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  debug(msg: string, meta?: unknown): void;
}

const RANK: Record<LogLevel, number> = { silent: 0, error: 1, warn: 2, info: 3, debug: 4 };

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === 'string' && (LOG_LEVELS as readonly string[]).includes(v);
}

export function createLogger(scope: string, level: LogLevel): Logger {
  const emit = (at: Exclude<LogLevel, 'silent'>, msg: string, meta?: unknown) => {
    if (RANK[at] > RANK[level]) return;
    const line = `[${scope}] ${msg}`;
    const write = at === 'warn' ? console.warn : console.error;
    if (meta === undefined) write(line);
    else write(line, meta);
  };
  return {
    error: (msg, meta) => emit('error', msg, meta),
    warn: (msg, meta) => emit('warn', msg, meta),
    info: (msg, meta) => emit('info', msg, meta),
    debug: (msg, meta) => emit('debug', msg, meta),
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
