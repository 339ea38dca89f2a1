/**
 * Leveled logger.
 *
 * Everything goes to stderr; stdout may be carrying raw printer bytes
 * (the stdio: transport) and must not be interleaved with diagnostics.
 */

// ── Levels ───────────────────────────────────────────────────────

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

const SEVERITY: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in SEVERITY;
}

// ── Logger ───────────────────────────────────────────────────────

export interface Logger {
  readonly level: LogLevel;
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

/** Receives each emitted line. Defaults to console.error. */
export type LogSink = (line: string, ...details: unknown[]) => void;

const stderrSink: LogSink = (line, ...details) => {
  console.error(line, ...details);
};

/**
 * Create a logger that drops messages below `level`.
 * Lines are prefixed `[slipline] <level>:`.
 */
export function createLogger(level: LogLevel = 'warn', sink: LogSink = stderrSink): Logger {
  const threshold = SEVERITY[level];

  const emit = (at: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]): void => {
    if (SEVERITY[at] > threshold) return;
    sink(`[slipline] ${at}: ${message}`, ...details);
  };

  return {
    level,
    error: (message, ...details) => emit('error', message, details),
    warn: (message, ...details) => emit('warn', message, details),
    info: (message, ...details) => emit('info', message, details),
    debug: (message, ...details) => emit('debug', message, details),
  };
}

/** A logger that discards everything. */
export const silentLogger: Logger = createLogger('silent');
