/**
 * Simple structured logger. Set LOG_LEVEL=debug|info|warn|error (default: info).
 */
const LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;

type Level = keyof typeof LEVELS;

function isLevel(value: string | undefined): value is Level {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function threshold(): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  return isLevel(configured) ? LEVELS[configured] : LEVELS.info;
}

function log(level: Level, ...args: unknown[]) {
  if (LEVELS[level] < threshold()) return;
  const prefix = `[${level.toUpperCase()}]`;
  if (level === 'error') console.error(prefix, ...args);
  else if (level === 'warn') console.warn(prefix, ...args);
  else console.info(prefix, ...args);
}

export const logger = {
  debug: (...args: unknown[]) => log('debug', ...args),
  info: (...args: unknown[]) => log('info', ...args),
  warn: (...args: unknown[]) => log('warn', ...args),
  error: (...args: unknown[]) => log('error', ...args),
};
