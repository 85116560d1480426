export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function threshold(): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (configured === 'debug' || configured === 'info' || configured === 'warn' || configured === 'error') {
    return LEVEL_ORDER[configured];
  }
  return LEVEL_ORDER.info;
}

function write(level: LogLevel, message: string, meta?: LogMeta): void {
  if (process.env.LOG_SILENT === 'true') return;
  if (LEVEL_ORDER[level] < threshold()) return;

  const line = JSON.stringify({
    level,
    time: new Date().toISOString(),
    message,
    ...meta,
  });

  if (level === 'error') {
    console.error(line);
    return;
  }
  if (level === 'warn') {
    console.warn(line);
    return;
  }
  console.log(line);
}

export function logDebug(message: string, meta?: LogMeta): void {
  write('debug', message, meta);
}

export function logInfo(message: string, meta?: LogMeta): void {
  write('info', message, meta);
}

export function logWarn(message: string, meta?: LogMeta): void {
  write('warn', message, meta);
}

export function logError(message: string, meta?: LogMeta): void {
  write('error', message, meta);
}
