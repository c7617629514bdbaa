export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minimumLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

function ts(): string {
  return new Date().toISOString();
}

function write(level: LogLevel, sink: (...args: unknown[]) => void, message: string, meta?: unknown): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[minimumLevel]) {
    return;
  }
  const line = `[${ts()}] ${level.toUpperCase()} ${message}`;
  if (meta !== undefined) {
    sink(line, meta);
    return;
  }
  sink(line);
}

export function logDebug(message: string, meta?: unknown): void {
  write('debug', console.log, message, meta);
}

export function logInfo(message: string, meta?: unknown): void {
  write('info', console.log, message, meta);
}

export function logWarn(message: string, meta?: unknown): void {
  write('warn', console.warn, message, meta);
}

export function logError(message: string, meta?: unknown): void {
  write('error', console.error, message, meta);
}
