import { AuthError } from '@record-tree/core';

import { DEFAULT_API_URL, EnvConfigError, loadAppConfig } from './env-config';

describe('loadAppConfig', () => {
  const env = { CLOUDFLARE_API_TOKEN: 'test-token' };

  it('applies the defaults', () => {
    expect(loadAppConfig({}, env)).toEqual({
      apiToken: 'test-token',
      apiUrl: DEFAULT_API_URL,
      timeoutMs: 15_000,
      logLevel: 'info',
      logFile: undefined,
    });
  });

  it('reads the environment', () => {
    const config = loadAppConfig(
      {},
      {
        ...env,
        CLOUDFLARE_API_URL: 'http://127.0.0.1:8787/client/v4',
        RECORD_TREE_HTTP_TIMEOUT_MS: '2500',
        RECORD_TREE_LOG_LEVEL: 'debug',
        RECORD_TREE_LOG_FILE: '/tmp/record-tree.log',
      },
    );

    expect(config).toMatchObject({
      apiUrl: 'http://127.0.0.1:8787/client/v4',
      timeoutMs: 2500,
      logLevel: 'debug',
      logFile: '/tmp/record-tree.log',
    });
  });

  it('prefers command line values', () => {
    const config = loadAppConfig(
      { apiUrl: 'http://localhost:9000', timeout: '100', logLevel: 'warn' },
      { ...env, CLOUDFLARE_API_URL: 'http://127.0.0.1:8787', RECORD_TREE_LOG_LEVEL: 'debug' },
    );

    expect(config).toMatchObject({ apiUrl: 'http://localhost:9000', timeoutMs: 100, logLevel: 'warn' });
  });

  it('treats blank values as unset', () => {
    expect(loadAppConfig({}, { ...env, CLOUDFLARE_API_URL: '  ', RECORD_TREE_LOG_FILE: '' })).toMatchObject({
      apiUrl: DEFAULT_API_URL,
      logFile: undefined,
    });
  });

  it('reads the token from another variable when asked', () => {
    expect(loadAppConfig({ tokenEnv: 'DNS_TOKEN' }, { DNS_TOKEN: ' other-token ' }).apiToken).toBe(
      'other-token',
    );
  });

  it('fails with an AuthError without a token', () => {
    expect(() => loadAppConfig({}, {})).toThrow(AuthError);
    expect(() => loadAppConfig({}, { CLOUDFLARE_API_TOKEN: '   ' })).toThrow(
      'CLOUDFLARE_API_TOKEN is not set',
    );
    expect(() => loadAppConfig({ tokenEnv: 'DNS_TOKEN' }, env)).toThrow('DNS_TOKEN is not set');
  });

  it('lists every invalid value', () => {
    let error: unknown;
    try {
      loadAppConfig({}, { ...env, RECORD_TREE_HTTP_TIMEOUT_MS: '-5', RECORD_TREE_LOG_LEVEL: 'loud' });
    } catch (caught) {
      error = caught;
    }

    expect(error).toBeInstanceOf(EnvConfigError);
    expect(error instanceof Error && error.message.split('\n').slice(0, 1)).toEqual([
      '[record-tree] Invalid configuration',
    ]);
    expect(error instanceof Error && error.message.split('\n').length).toBe(3);
    expect(error instanceof Error && error.message).toContain('  • timeoutMs: ');
    expect(error instanceof Error && error.message).toContain('  • logLevel: ');
  });
});
