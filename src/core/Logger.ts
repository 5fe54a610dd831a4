/**
 * Logger configuration using Pino
 * Provides structured logging with configurable levels and user-friendly output
 */
import pino from 'pino';
import pretty from 'pino-pretty';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

interface LoggerOptions {
  level: LogLevel;
  pretty: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

// Emoji symbols for pretty logging
const levelSymbols: Record<string, string> = {
  fatal: '💀',
  error: '❌',
  warn: '⚠️',
  info: 'ℹ️',
  debug: '🔍',
  trace: '📝',
};

export const symbols = {
  success: '✅',
  error: '❌',
  warning: '⚠️',
  dns: '🌐',
  provider: '🔌',
  sync: '🔄',
  startup: '🚀',
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

const defaultOptions: LoggerOptions = {
  level: parseLogLevel(process.env['LOG_LEVEL']),
  pretty: process.env['LOG_PRETTY'] !== 'false', // Default to pretty output
};

/**
 * Format a value for clean inline display
 */
function formatValue(value: unknown, maxLen: number = 40): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') {
    return value.length > maxLen ? value.substring(0, maxLen) + '...' : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    if (value.length <= 3) {
      return value.map((v) => formatValue(v, 30)).join(', ');
    }
    return `${value.length} items`;
  }

  if (typeof value === 'object') {
    const keys = Object.keys(value);
    if (keys.length === 0) return '{}';
    return `{${keys.length} fields}`;
  }

  return String(value);
}

// Keys that contain opaque IDs, truncated to short form
const ID_KEYS = new Set(['zoneId', 'recordSetId', 'id']);

/**
 * Format context data in a clean, readable way
 * Prioritizes DNS fields and keeps output short
 */
function formatContext(log: Record<string, unknown>, excludeKeys: string[]): string {
  const contextKeys = Object.keys(log).filter((k) => !excludeKeys.includes(k));
  if (contextKeys.length === 0) return '';

  const priorityKeys = ['dnsName', 'recordType', 'records', 'zone', 'zoneId', 'count', 'method'];

  const sortedKeys = contextKeys.sort((a, b) => {
    const aIdx = priorityKeys.indexOf(a);
    const bIdx = priorityKeys.indexOf(b);
    if (aIdx >= 0 && bIdx >= 0) return aIdx - bIdx;
    if (aIdx >= 0) return -1;
    if (bIdx >= 0) return 1;
    return 0;
  });

  const contextParts: string[] = [];
  for (const key of sortedKeys.slice(0, 5)) {
    const maxLen = ID_KEYS.has(key) ? 12 : 40;
    const formatted = formatValue(log[key], maxLen);
    if (formatted) {
      contextParts.push(`${key}=${formatted}`);
    }
  }

  return contextParts.length > 0 ? ` (${contextParts.join(', ')})` : '';
}

function createPrettyStream(): pino.DestinationStream {
  return pretty({
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'app',
    hideObject: true,
    messageFormat: (log: Record<string, unknown>, messageKey: string) => {
      const level = typeof log['level'] === 'string' ? log['level'] : 'info';
      const service = typeof log['service'] === 'string' ? log['service'] : undefined;
      const msg = String(log[messageKey] ?? '');
      const symbol = levelSymbols[level] ?? 'ℹ️';

      let output = service ? `[${service}] ${msg}` : msg;

      const excludeKeys = ['level', 'time', 'pid', 'app', 'service', 'provider', messageKey, 'err', 'error', 'stack'];
      output += formatContext(log, excludeKeys);

      return `${symbol} ${output}`;
    },
    // Hide the default level label since we're using emojis
    customPrettifiers: {
      level: () => '',
    },
  });
}

function createLogger(options: LoggerOptions = defaultOptions): pino.Logger {
  const baseConfig: pino.LoggerOptions = {
    level: options.level,
    base: {
      app: 'designate-webhook',
      pid: undefined,
      hostname: undefined,
    },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (options.pretty) {
    return pino(baseConfig, createPrettyStream());
  }

  // Production mode - structured JSON logging
  return pino(baseConfig);
}

export const logger = createLogger();

/**
 * Set the log level at runtime
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(bindings: Record<string, unknown>): pino.Logger {
  return logger.child(bindings);
}

export default logger;
