export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const ORDER: Record<Exclude<LogLevel, 'silent'>, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  error(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  debug(msg: string, meta?: unknown): void;
}

const SECRET_KEY = /password|token|secret|cookie|authorization/i;

function redact(key: string, value: unknown): unknown {
  return key && SECRET_KEY.test(key) && value !== undefined ? '[redacted]' : value;
}

function fmtMeta(meta: unknown) {
  if (meta === undefined) return '';
  if (typeof meta === 'string') return ` ${meta}`;
  if (meta instanceof Error) return ` ${meta.name}: ${meta.message}`;
  try {
    return ` ${JSON.stringify(meta, redact)}`;
  } catch {
    return ' [meta-unserializable]';
  }
}

export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
};

/**
 * Leveled logger. Every level writes to stderr: stdout belongs to the MCP
 * stdio transport when the server is running. Meta values under credential-like
 * keys are masked.
 */
export function createLogger(level: LogLevel = 'info', write: (line: string) => void = (line) => console.error(line)): Logger {
  if (level === 'silent') return silentLogger;

  const threshold = ORDER[level];
  const prefix = (lvl: string) => `${new Date().toISOString()} ${lvl.toUpperCase()} `;

  const can = (lvl: Exclude<LogLevel, 'silent'>) => ORDER[lvl] <= threshold;
  const emit = (lvl: Exclude<LogLevel, 'silent'>, msg: string, meta: unknown) => {
    if (can(lvl)) write(prefix(lvl) + msg + fmtMeta(meta));
  };

  return {
    error: (msg, meta) => emit('error', msg, meta),
    warn: (msg, meta) => emit('warn', msg, meta),
    info: (msg, meta) => emit('info', msg, meta),
    debug: (msg, meta) => emit('debug', msg, meta),
  };
}
