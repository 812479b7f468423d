import pino from 'pino';
import type { Logger as PinoLogger, LoggerOptions } from 'pino';

// Lightweight logger wrapper around pino with a safe fallback to console.
// Configure via env:
// - LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error' (default: 'info')
// - LOG_PRETTY: 'false' to disable the pino-pretty transport
// - USE_PINO: 'false' to force console fallback, 'true' to force pino outside production

type LogFields = Record<string, unknown>;

export type Logger = {
  info: (obj: LogFields, msg?: string) => void;
  warn: (obj: LogFields, msg?: string) => void;
  error: (obj: LogFields, msg?: string) => void;
  debug: (obj: LogFields, msg?: string) => void;
  child: (bindings: LogFields) => Logger;
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function getLevelOrder(level: LogLevel): number {
  switch (level) {
    case 'debug': return 10;
    case 'info': return 20;
    case 'warn': return 30;
    case 'error': return 40;
  }
}

function levelFromEnv(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  return isLogLevel(configured) ? configured : 'info';
}

// Global dynamic level controlled by setLogLevel
let currentLevel: LogLevel = levelFromEnv();

function should(method: LogLevel): boolean {
  return getLevelOrder(method) >= getLevelOrder(currentLevel);
}

function createConsoleWrapper(bindings: LogFields = {}): Logger {
  const prefix = Object.keys(bindings).length > 0
    ? `[${Object.entries(bindings).map(([k, v]) => `${k}=${String(v)}`).join(' ')}]`
    : '';
  return {
    info: (obj, msg) => { if (should('info')) console.log(prefix, msg || '', obj); },
    warn: (obj, msg) => { if (should('warn')) console.warn(prefix, msg || '', obj); },
    error: (obj, msg) => { if (should('error')) console.error(prefix, msg || '', obj); },
    debug: (obj, msg) => { if (should('debug')) console.debug(prefix, msg || '', obj); },
    child: (more) => createConsoleWrapper({ ...bindings, ...more }),
  };
}

// pino runs at debug; the dynamic level is applied here so child loggers follow setLogLevel.
// A failing transport degrades to the console wrapper for that call.
function wrapPino(base: PinoLogger, bindings: LogFields): Logger {
  const fallback = createConsoleWrapper(bindings);
  return {
    info: (obj, msg) => { if (!should('info')) return; try { base.info(obj, msg); } catch { fallback.info(obj, msg); } },
    warn: (obj, msg) => { if (!should('warn')) return; try { base.warn(obj, msg); } catch { fallback.warn(obj, msg); } },
    error: (obj, msg) => { if (!should('error')) return; try { base.error(obj, msg); } catch { fallback.error(obj, msg); } },
    debug: (obj, msg) => { if (!should('debug')) return; try { base.debug(obj, msg); } catch { fallback.debug(obj, msg); } },
    child: (more) => {
      try {
        return wrapPino(base.child(more), { ...bindings, ...more });
      } catch {
        return createConsoleWrapper({ ...bindings, ...more });
      }
    },
  };
}

function createBaseLogger(): Logger {
  const pretty = process.env.LOG_PRETTY !== 'false';
  const usePino = process.env.USE_PINO !== 'false';
  const isDev = process.env.NODE_ENV !== 'production';

  // Pretty transports run in a worker thread; outside production stay on the console
  // wrapper unless USE_PINO=true asks for pino explicitly.
  if (!usePino || (isDev && process.env.USE_PINO !== 'true')) {
    return createConsoleWrapper();
  }

  try {
    const options: LoggerOptions = { level: 'debug' };
    if (pretty) {
      options.transport = {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard' },
      };
    }
    return wrapPino(pino(options), {});
  } catch {
    return createConsoleWrapper();
  }
}

const baseLogger: Logger = createBaseLogger();

export function setLogLevel(level: LogLevel): void {
  if (!isLogLevel(level)) return;
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function getLogger(bindings?: LogFields): Logger {
  if (bindings && Object.keys(bindings).length > 0) {
    return baseLogger.child(bindings);
  }
  return baseLogger;
}
