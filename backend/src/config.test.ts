import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('falls back to local defaults', () => {
    const config = loadConfig({});
    expect(config).toEqual({
      port: 5001,
      host: '127.0.0.1',
      databasePath: 'data/carbon-log.db',
      sessionSecret: 'development_secret_key',
      sessionTtlMs: 1000 * 60 * 60 * 24 * 7,
      nodeEnv: 'development',
      secureCookies: false,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      HOST: '0.0.0.0',
      DATABASE_PATH: ':memory:',
      SESSION_SECRET: 'test-secret',
      NODE_ENV: 'production',
    });
    expect(config.port).toBe(8080);
    expect(config.host).toBe('0.0.0.0');
    expect(config.databasePath).toBe(':memory:');
    expect(config.sessionSecret).toBe('test-secret');
    expect(config.secureCookies).toBe(true);
  });

  it('warns about an invalid port and keeps the default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(loadConfig({ PORT: 'eighty' }).port).toBe(5001);
    expect(warn).toHaveBeenCalledWith('PORT="eighty" is invalid; using 5001.');
  });

  it('warns when a production-like environment has no session secret', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    loadConfig({ NODE_ENV: 'staging' });
    expect(warn).toHaveBeenCalledWith('SESSION_SECRET is not set. Sessions are signed with the development secret.');
  });

  it('lets SESSION_COOKIE_SECURE override the environment default', () => {
    expect(loadConfig({ NODE_ENV: 'production', SESSION_SECRET: 'test-secret', SESSION_COOKIE_SECURE: 'false' }).secureCookies).toBe(false);
  });
});
