import { loadConfig } from './config';
import { DEFAULT_REQUEST_TIMEOUT_MS } from './constants';

describe('loadConfig', () => {
  it('reads settings from the environment', () => {
    expect(
      loadConfig({
        OPENML_API_KEY: 'test-secret',
        ENVIRONMENTS_CACHE_DIR: '/tmp/datasets',
        ENVIRONMENTS_REQUEST_TIMEOUT_MS: '5000',
      }),
    ).toEqual({ openmlApiKey: 'test-secret', cacheDirectory: '/tmp/datasets', requestTimeoutMs: 5000 });
  });

  it('falls back to defaults for missing or unusable values', () => {
    const config = loadConfig({ OPENML_API_KEY: '', ENVIRONMENTS_REQUEST_TIMEOUT_MS: 'soon' });
    expect(config.openmlApiKey).toBeUndefined();
    expect(config.cacheDirectory).toBeUndefined();
    expect(config.requestTimeoutMs).toBe(DEFAULT_REQUEST_TIMEOUT_MS);
  });
});
