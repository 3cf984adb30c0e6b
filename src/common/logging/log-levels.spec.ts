import { resolveLogLevels } from './log-levels';

describe('resolveLogLevels', () => {
  it('enables the given level and everything more severe', () => {
    expect(resolveLogLevels('warn')).toEqual(['fatal', 'error', 'warn']);
    expect(resolveLogLevels('debug')).toEqual(['fatal', 'error', 'warn', 'log', 'debug']);
  });

  it('accepts info as an alias of log and ignores case', () => {
    expect(resolveLogLevels('INFO')).toEqual(['fatal', 'error', 'warn', 'log']);
  });

  it('falls back to log for unknown or missing values', () => {
    expect(resolveLogLevels('chatty')).toEqual(['fatal', 'error', 'warn', 'log']);
    expect(resolveLogLevels(undefined)).toEqual(['fatal', 'error', 'warn', 'log']);
  });
});
