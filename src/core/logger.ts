/**
 * Structured JSON logging for dwn.
 *
 * Provides component-scoped loggers with level filtering and injectable
 * sinks for testing. Every entry is a JSON object with level, ts,
 * component and msg fields; plan, session and container context is
 * promoted to top-level fields.
 *
 * @example
 * ```ts
 * const logger = createLogger('orchestrator');
 * logger.info('primary started', { plan: 'nginx', container: 'dwn_1a2b3c4d_nginx' });
 * // → {"level":"info","ts":"...","component":"orchestrator","msg":"primary started","plan":"nginx","container":"dwn_1a2b3c4d_nginx"}
 * ```
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Log severity levels in ascending order. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** A structured log entry. */
export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  plan?: string;
  session?: string;
  container?: string;
  duration_ms?: number;
  error_code?: string;
  meta?: Record<string, unknown>;
}

/** A function that consumes a log entry (output destination). */
export type LogSink = (entry: LogEntry) => void;

/** Context fields that are automatically promoted to every log entry. */
export interface LogContext {
  plan?: string;
  session?: string;
  container?: string;
}

/** A structured logger scoped to a component. */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(subComponent: string): Logger;
  withContext(ctx: LogContext): Logger;
}

// ---------------------------------------------------------------------------
// Level ordering
// ---------------------------------------------------------------------------

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

// ---------------------------------------------------------------------------
// Sinks
// ---------------------------------------------------------------------------

/** Writes one JSON line per entry to stdout. */
export function stdoutSink(entry: LogEntry): void {
  process.stdout.write(JSON.stringify(entry) + '\n');
}

/** Writes one JSON line per entry to stderr (keeps command output clean). */
export function stderrSink(entry: LogEntry): void {
  process.stderr.write(JSON.stringify(entry) + '\n');
}

// ---------------------------------------------------------------------------
// Global state
// ---------------------------------------------------------------------------

let globalLevel: LogLevel = 'info';
let globalSink: LogSink = stdoutSink;

/** Configure the global logging level and/or sink. */
export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  if (options.level !== undefined) {
    globalLevel = options.level;
  }
  if (options.sink !== undefined) {
    globalSink = options.sink;
  }
}

/** Reset logging to defaults (level: info, sink: stdout JSON). */
export function resetLogging(): void {
  globalLevel = 'info';
  globalSink = stdoutSink;
}

// ---------------------------------------------------------------------------
// NEVER_LOG_FIELDS: deny-listed metadata keys
// ---------------------------------------------------------------------------

/**
 * Metadata keys that must never appear in log output. Plan environments
 * routinely carry credentials, so the whole environment map is denied too.
 */
export const NEVER_LOG_FIELDS = new Set([
  'environment',
  'env',
  'password',
  'secret',
  'token',
  'credential',
  'authorization',
]);

/** Maximum length for string values in metadata before truncation. */
export const META_STRING_MAX_LENGTH = 1024;

// ---------------------------------------------------------------------------
// Metadata sanitization
// ---------------------------------------------------------------------------

const PROMOTED_KEYS = new Set(['plan', 'session', 'container', 'duration_ms', 'error_code']);

function sanitizeMeta(meta?: Record<string, unknown>): Record<string, unknown> | undefined {
  if (!meta) return undefined;

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (NEVER_LOG_FIELDS.has(key) || PROMOTED_KEYS.has(key)) continue;

    if (value instanceof Error) {
      result[key] = {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    } else if (typeof value === 'string' && value.length > META_STRING_MAX_LENGTH) {
      result[key] = value.slice(0, META_STRING_MAX_LENGTH) + '...[truncated]';
    } else {
      result[key] = value;
    }
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

function promoteString(meta: Record<string, unknown>, key: string): string | undefined {
  const value = meta[key];
  return typeof value === 'string' ? value : undefined;
}

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

/**
 * Create a structured logger scoped to a component.
 *
 * @param component - Component name (e.g. `'orchestrator'`, `'engine:docker'`).
 * @param boundContext - Optional context fields promoted to every entry.
 */
export function createLogger(component: string, boundContext?: LogContext): Logger {
  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const entry: LogEntry = {
      level,
      ts: new Date().toISOString(),
      component,
      msg: message,
    };

    if (boundContext) {
      if (boundContext.plan) entry.plan = boundContext.plan;
      if (boundContext.session) entry.session = boundContext.session;
      if (boundContext.container) entry.container = boundContext.container;
    }

    if (meta) {
      const plan = promoteString(meta, 'plan');
      const session = promoteString(meta, 'session');
      const container = promoteString(meta, 'container');
      const errorCode = promoteString(meta, 'error_code');
      if (plan !== undefined) entry.plan = plan;
      if (session !== undefined) entry.session = session;
      if (container !== undefined) entry.container = container;
      if (errorCode !== undefined) entry.error_code = errorCode;
      if (typeof meta['duration_ms'] === 'number') entry.duration_ms = meta['duration_ms'];
    }

    const sanitized = sanitizeMeta(meta);
    if (sanitized !== undefined) {
      entry.meta = sanitized;
    }

    globalSink(entry);
  }

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (subComponent) => createLogger(`${component}:${subComponent}`, boundContext),
    withContext: (ctx) => {
      const merged: LogContext = { ...boundContext, ...ctx };
      return createLogger(component, merged);
    },
  };
}
