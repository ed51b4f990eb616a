import { setupLogger } from '@shared/utils/logger';

describe('setupLogger', () => {
  let originalEnv: string | undefined;

  beforeEach(() => {
    originalEnv = process.env.LOG_LEVEL;
  });

  afterEach(() => {
    if (originalEnv !== undefined) {
      process.env.LOG_LEVEL = originalEnv;
    } else {
      delete process.env.LOG_LEVEL;
    }
  });

  it('defaults to info when LOG_LEVEL is not set', () => {
    delete process.env.LOG_LEVEL;

    expect(setupLogger().level).toBe('info');
  });

  it('respects an explicit level', () => {
    expect(setupLogger('test', 'debug').level).toBe('debug');
  });

  it('reads LOG_LEVEL regardless of case', () => {
    process.env.LOG_LEVEL = 'WARN';

    expect(setupLogger('env-test').level).toBe('warn');
  });

  it('prefers the explicit level over LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'error';

    expect(setupLogger('override', 'trace').level).toBe('trace');
  });

  it('falls back to info for an unknown level', () => {
    process.env.LOG_LEVEL = 'verbose';

    expect(setupLogger('unknown', 'loud').level).toBe('info');
  });

  it('suppresses levels below the configured one', () => {
    const logger = setupLogger('filter-test', 'warn');

    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(logger.isLevelEnabled('error')).toBe(true);
  });
});
