import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      apiBaseUrl: 'http://localhost:3005/api',
      requestTimeoutMs: 30000,
      passwordMinLength: 8,
      sessionFile: '.session/session.json',
      logLevel: 'info',
    });
  });

  it('should read and coerce the environment', () => {
    const config = loadConfig({
      AUTH_API_BASE_URL: 'https://auth.example.com/v1/',
      AUTH_REQUEST_TIMEOUT_MS: '5000',
      AUTH_PASSWORD_MIN_LENGTH: '12',
      AUTH_SESSION_FILE: '/var/lib/app/session.json',
      LOG_LEVEL: 'debug',
    });

    expect(config).toEqual({
      apiBaseUrl: 'https://auth.example.com/v1',
      requestTimeoutMs: 5000,
      passwordMinLength: 12,
      sessionFile: '/var/lib/app/session.json',
      logLevel: 'debug',
    });
  });

  it('should treat blank variables as unset', () => {
    expect(loadConfig({ AUTH_REQUEST_TIMEOUT_MS: '' }).requestTimeoutMs).toBe(30000);
  });

  it('should reject invalid values with every issue listed', () => {
    const load = () =>
      loadConfig({ AUTH_API_BASE_URL: 'not a url', AUTH_REQUEST_TIMEOUT_MS: '-1', LOG_LEVEL: 'loud' });

    expect(load).toThrow(ConfigError);

    let caught: unknown;
    try {
      load();
    } catch (error) {
      caught = error;
    }
    const fields = caught instanceof ConfigError ? caught.issues.map((i) => i.split(':')[0]) : [];
    expect(fields).toEqual(['AUTH_API_BASE_URL', 'AUTH_REQUEST_TIMEOUT_MS', 'LOG_LEVEL']);
  });
});
