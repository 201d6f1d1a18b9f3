import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AuthConfig, DEFAULT_SCOPE, loadConfigFromEnv, loadConfigFromFile } from './config.js';
import { ConfigurationError } from './errors.js';

const ENV = {
  AUTH_ISSUER: 'https://auth.example.com',
  AUTH_CLIENT_ID: 'test-client',
  AUTH_REDIRECT_URI: 'http://127.0.0.1:3000/auth/callback',
  AUTH_POST_LOGOUT_REDIRECT_URI: 'http://127.0.0.1:3000/',
};

describe('AuthConfig', () => {
  it('returns null for malformed URLs', () => {
    const config = new AuthConfig({
      issuer: 'not a url',
      clientId: 'test-client',
      redirectUri: '',
      postLogoutRedirectUri: 'http://127.0.0.1:3000/',
      scope: DEFAULT_SCOPE,
    });

    expect(config.getIssuerUrl()).toBeNull();
    expect(config.getRedirectUrl()).toBeNull();
    expect(config.getPostLogoutRedirectUrl()?.href).toBe('http://127.0.0.1:3000/');
  });
});

describe('loadConfigFromEnv', () => {
  it('reads AUTH_* variables and defaults the scope', () => {
    const config = loadConfigFromEnv(ENV);

    expect(config.issuer).toBe('https://auth.example.com');
    expect(config.clientId).toBe('test-client');
    expect(config.redirectUri).toBe('http://127.0.0.1:3000/auth/callback');
    expect(config.postLogoutRedirectUri).toBe('http://127.0.0.1:3000/');
    expect(config.scope).toBe('openid profile email offline');
    expect(config.audience).toBeUndefined();
  });

  it('reads the optional scope and audience', () => {
    const config = loadConfigFromEnv({ ...ENV, AUTH_SCOPE: 'openid', AUTH_AUDIENCE: 'https://api.example.com' });

    expect(config.scope).toBe('openid');
    expect(config.audience).toBe('https://api.example.com');
  });

  it('names the missing field', () => {
    const { AUTH_CLIENT_ID: _omitted, ...env } = ENV;

    expect(() => loadConfigFromEnv(env)).toThrow(ConfigurationError);
    expect(() => loadConfigFromEnv(env)).toThrow('Invalid auth environment: clientId Required');
  });

  it('rejects a redirect URI that is not a URL', () => {
    expect(() => loadConfigFromEnv({ ...ENV, AUTH_REDIRECT_URI: 'callback' })).toThrow(ConfigurationError);
  });
});

describe('loadConfigFromFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'authsession-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads a JSON config file', async () => {
    const path = join(dir, 'auth.json');
    await writeFile(
      path,
      JSON.stringify({
        issuer: 'https://auth.example.com',
        clientId: 'test-client',
        redirectUri: 'http://127.0.0.1:3000/auth/callback',
        postLogoutRedirectUri: 'http://127.0.0.1:3000/',
        scope: 'openid email',
        audience: 'https://api.example.com',
      }),
    );

    const config = await loadConfigFromFile(path);

    expect(config.scope).toBe('openid email');
    expect(config.audience).toBe('https://api.example.com');
    expect(config.getIssuerUrl()?.hostname).toBe('auth.example.com');
  });

  it('wraps a missing file in ConfigurationError', async () => {
    await expect(loadConfigFromFile(join(dir, 'missing.json'))).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects invalid JSON content', async () => {
    const path = join(dir, 'auth.json');
    await writeFile(path, '{ "issuer": ');

    await expect(loadConfigFromFile(path)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
