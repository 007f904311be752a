/**
 * Structured JSON logging.
 * Every line goes to stderr: stdout carries the MCP stdio protocol.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface StructuredLog {
  ts: string;
  level: LogLevel;
  scope: string;
  event: string;
  [key: string]: unknown;
}

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

let debugEnabled = false;
let sink: (line: string) => void = (line) => console.error(line);

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

/**
 * Replace the output sink (tests capture lines through this)
 */
export function setLogSink(next: (line: string) => void): void {
  sink = next;
}

function serializeError(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function logStructured(level: LogLevel, scope: string, event: string, fields: LogFields = {}): void {
  if (level === 'debug' && !debugEnabled) {
    return;
  }

  const log: StructuredLog = { ts: new Date().toISOString(), level, scope, event };
  for (const [key, value] of Object.entries(fields)) {
    log[key] = serializeError(value);
  }

  sink(JSON.stringify(log));
}

export function createLogger(scope: string): Logger {
  return {
    debug: (event, fields) => logStructured('debug', scope, event, fields),
    info: (event, fields) => logStructured('info', scope, event, fields),
    warn: (event, fields) => logStructured('warn', scope, event, fields),
    error: (event, fields) => logStructured('error', scope, event, fields),
    child: (childScope) => createLogger(`${scope}.${childScope}`),
  };
}
