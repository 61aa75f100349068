export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVELS;
}

const envLevel = process.env.PPACTL_LOG_LEVEL;
const initialLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'warn';

function fmt(level: LogLevel, msg: string, extra?: unknown) {
  const time = new Date().toISOString();
  if (extra === undefined) { return `[ppactl] ${time} ${level.toUpperCase()} ${msg}`; }
  return `[ppactl] ${time} ${level.toUpperCase()} ${msg} ${JSON.stringify(extra)}`;
}

export const logger = {
  level: initialLevel,
  debug(msg: string, extra?: unknown) {
    if (LEVELS[this.level] <= LEVELS.debug) { console.debug(fmt('debug', msg, extra)); }
  },
  info(msg: string, extra?: unknown) {
    if (LEVELS[this.level] <= LEVELS.info) { console.info(fmt('info', msg, extra)); }
  },
  warn(msg: string, extra?: unknown) {
    if (LEVELS[this.level] <= LEVELS.warn) { console.warn(fmt('warn', msg, extra)); }
  },
  error(msg: string, extra?: unknown) {
    console.error(fmt('error', msg, extra));
  },
};

export function setLogLevel(level: LogLevel) {
  logger.level = level;
}
