import * as os from 'os';
import * as path from 'path';

import { validateEnv } from './configuration';

describe('validateEnv', () => {
  it('should apply defaults for an empty environment', () => {
    const env = validateEnv({});

    expect(env.MIQAT_CONFIG_PATH).toBe(path.join(os.homedir(), '.config', 'miqat', 'config.json'));
    expect(env.MIQAT_CACHE_PATH).toBe(path.join(os.homedir(), '.cache', 'miqat', 'prayer_cache.json'));
    expect(env.MIQAT_HTTP_TIMEOUT_MS).toBe(20000);
    expect(env.MIQAT_NOTIFIER).toBe('auto');
    expect(env.LOG_LEVEL).toBe('warn');
  });

  it('should accept overrides', () => {
    const env = validateEnv({
      MIQAT_CONFIG_PATH: '/tmp/miqat/config.json',
      MIQAT_ALADHAN_URL: 'http://localhost:8080/v1',
      MIQAT_HTTP_TIMEOUT_MS: '5000',
      MIQAT_NOTIFIER: 'none',
      LOG_LEVEL: 'debug',
    });

    expect(env.MIQAT_CONFIG_PATH).toBe('/tmp/miqat/config.json');
    expect(env.MIQAT_ALADHAN_URL).toBe('http://localhost:8080/v1');
    expect(env.MIQAT_HTTP_TIMEOUT_MS).toBe(5000);
    expect(env.MIQAT_NOTIFIER).toBe('none');
    expect(env.LOG_LEVEL).toBe('debug');
  });

  it('should fail fast on invalid values', () => {
    expect(() => validateEnv({ MIQAT_HTTP_TIMEOUT_MS: 'soon', MIQAT_NOTIFIER: 'growl' })).toThrow(
      /Environment validation failed:\n {2}- MIQAT_HTTP_TIMEOUT_MS: must be a whole number of milliseconds\n {2}- MIQAT_NOTIFIER: /,
    );
  });
});
