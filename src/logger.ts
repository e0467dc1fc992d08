type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

function ts(): string {
  return new Date().toISOString();
}

function emit(write: (...args: unknown[]) => void, level: LogLevel, message: string, meta?: unknown): void {
  if (meta !== undefined) {
    write(`[${ts()}] ${level} ${message}`, meta);
    return;
  }
  write(`[${ts()}] ${level} ${message}`);
}

export function logInfo(message: string, meta?: unknown): void {
  emit(console.log, 'INFO', message, meta);
}

export function logWarn(message: string, meta?: unknown): void {
  emit(console.warn, 'WARN', message, meta);
}

export function logError(message: string, meta?: unknown): void {
  emit(console.error, 'ERROR', message, meta);
}

// Reserved for outcomes where re-running would send duplicates.
export function logFatal(message: string, meta?: unknown): void {
  emit(console.error, 'FATAL', message, meta);
}
