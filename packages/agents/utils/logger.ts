// Structured stderr logger. stdout stays free for CLI output and the MCP stdio transport.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

function isLevelName(value: string): value is LogLevel | 'silent' {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

function threshold(): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  return configured && isLevelName(configured) ? LEVEL_RANK[configured] : LEVEL_RANK.info;
}

function log(scope: string, level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (LEVEL_RANK[level] < threshold()) return;
  const prefix = `[${scope}:${level.toUpperCase()}]`;
  if (data) {
    console.error(`${prefix} ${message}`, JSON.stringify(data));
  } else {
    console.error(`${prefix} ${message}`);
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, data) => log(scope, 'debug', message, data),
    info: (message, data) => log(scope, 'info', message, data),
    warn: (message, data) => log(scope, 'warn', message, data),
    error: (message, data) => log(scope, 'error', message, data),
  };
}
