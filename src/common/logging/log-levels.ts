import { LogLevel } from '@nestjs/common';

const ORDERED_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Expands LOG_LEVEL into the list Nest expects: every level at or above the
 * given one. `info` is accepted as an alias of `log`; unknown values fall back to `log`.
 */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const normalized = (level ?? '').trim().toLowerCase();
  const wanted = normalized === 'info' ? 'log' : normalized;
  const index = ORDERED_LEVELS.findIndex((l) => l === wanted);
  return ORDERED_LEVELS.slice(0, (index === -1 ? ORDERED_LEVELS.indexOf('log') : index) + 1);
}
