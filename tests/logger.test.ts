import { describe, it, expect } from 'vitest';
import { createAppLogger } from '../src/config/logger';

describe('createAppLogger', () => {
  it('logs to a single console transport at the configured level', () => {
    const instance = createAppLogger({ LOG_LEVEL: 'debug', NODE_ENV: 'development' });

    expect(instance.level).toBe('debug');
    expect(instance.transports).toHaveLength(1);
    expect(instance.transports[0]?.silent).toBeFalsy();
  });

  it('writes no log files in production', () => {
    const instance = createAppLogger({ LOG_LEVEL: 'info', NODE_ENV: 'production' });

    expect(instance.transports).toHaveLength(1);
  });

  it('stays silent under test', () => {
    const instance = createAppLogger({ LOG_LEVEL: 'info', NODE_ENV: 'test' });

    expect(instance.transports.every((t) => t.silent === true)).toBe(true);
  });
});
