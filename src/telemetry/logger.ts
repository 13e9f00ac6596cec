type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isThresholdName(value: string): value is LogLevel | 'silent' {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error' || value === 'silent';
}

// Read on every call so tests and operators can change verbosity at runtime.
function threshold(): number {
  const raw = process.env.RAG_LOG_LEVEL?.trim().toLowerCase() ?? '';
  return isThresholdName(raw) ? LEVEL_RANK[raw] : LEVEL_RANK.info;
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  if (LEVEL_RANK[level] < threshold()) return;
  // stdout may carry protocol traffic (stdio transports, piped JSON); logs stay on stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(message, context);
    return;
  }
  logger(message);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);

export interface ScopedLogger {
  info: LoggerFn;
  warn: LoggerFn;
  error: LoggerFn;
  debug: LoggerFn;
}

/** Logger whose messages are prefixed with `[scope]`. */
export function createScopedLogger(scope: string): ScopedLogger {
  const prefix = `[${scope}] `;
  return {
    info: (message, context) => emit('info', prefix + message, context),
    warn: (message, context) => emit('warn', prefix + message, context),
    error: (message, context) => emit('error', prefix + message, context),
    debug: (message, context) => emit('debug', prefix + message, context),
  };
}
