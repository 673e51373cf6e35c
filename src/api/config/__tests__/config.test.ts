/**
 * Auth Configuration Tests
 */

import { loadAuthConfig } from '../index';

describe('loadAuthConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadAuthConfig({})).toEqual({
      apiBaseUrl: 'http://localhost:8000',
      timeoutMs: 30000,
      storageDir: './.auth-storage',
      oauthClientId: null,
      logLevel: 'info',
    });
  });

  it('should read and normalize provided values', () => {
    const config = loadAuthConfig({
      AUTH_API_URL: 'https://api.example.com/',
      AUTH_API_TIMEOUT_MS: '5000',
      AUTH_STORAGE_DIR: '/tmp/auth',
      OAUTH_CLIENT_ID: 'test-client-id',
      LOG_LEVEL: 'debug',
    });

    expect(config).toEqual({
      apiBaseUrl: 'https://api.example.com',
      timeoutMs: 5000,
      storageDir: '/tmp/auth',
      oauthClientId: 'test-client-id',
      logLevel: 'debug',
    });
  });

  it('should treat an empty client ID as unset', () => {
    expect(loadAuthConfig({ OAUTH_CLIENT_ID: '' }).oauthClientId).toBeNull();
  });

  it('should throw on invalid values', () => {
    expect(() => loadAuthConfig({ AUTH_API_URL: 'localhost' })).toThrow(
      '[AuthConfig] Invalid environment: AUTH_API_URL'
    );
    expect(() => loadAuthConfig({ AUTH_API_TIMEOUT_MS: '-5' })).toThrow('AUTH_API_TIMEOUT_MS');
    expect(() => loadAuthConfig({ LOG_LEVEL: 'verbose' })).toThrow('LOG_LEVEL');
  });
});
