import { describe, expect, it, vi } from 'vitest';
import { AuthorizationRequestBuilder, createAuthorizationRequest } from './authorization-request.js';
import { ConfigurationError } from './errors.js';
import { TEST_METADATA, testConfig } from './test-helpers.js';

describe('createAuthorizationRequest', () => {
  it('builds a login request with PKCE and a forced fresh login', async () => {
    const request = await createAuthorizationRequest({}, TEST_METADATA, testConfig());
    const url = new URL(request.url);

    expect(`${url.origin}${url.pathname}`).toBe('https://auth.example.com/oauth2/auth');
    expect(url.searchParams.get('response_type')).toBe('code');
    expect(url.searchParams.get('client_id')).toBe('test-client');
    expect(url.searchParams.get('redirect_uri')).toBe('http://127.0.0.1:3000/auth/callback');
    expect(url.searchParams.get('scope')).toBe('openid profile email offline');
    expect(url.searchParams.get('state')).toBe(request.state);
    expect(url.searchParams.get('code_challenge')).toBe(request.codeChallenge);
    expect(url.searchParams.get('code_challenge_method')).toBe('S256');
    expect(url.searchParams.get('start_page')).toBe('login');
    expect(url.searchParams.get('prompt')).toBe('login');
    expect(url.searchParams.has('nonce')).toBe(false);
    expect(request.parameters).toEqual({ start_page: 'login', prompt: 'login' });
    expect(request.codeVerifier).toMatch(/^[A-Za-z0-9_-]{43}$/);
  });

  it('adds registration and organization parameters', async () => {
    const request = await createAuthorizationRequest(
      { signUp: true, createOrg: true, orgName: 'Acme' },
      TEST_METADATA,
      testConfig(),
    );

    expect(request.parameters).toEqual({
      start_page: 'registration',
      prompt: 'login',
      is_create_org: 'true',
      org_name: 'Acme',
    });
  });

  it('omits optional parameters that are empty', async () => {
    const request = await createAuthorizationRequest(
      { orgCode: '', loginHint: '', planInterest: 'pro', pricingTableKey: '' },
      TEST_METADATA,
      testConfig({ audience: '' }),
    );
    const search = new URL(request.url).searchParams;

    expect(search.has('org_code')).toBe(false);
    expect(search.has('login_hint')).toBe(false);
    expect(search.has('pricing_table_key')).toBe(false);
    expect(search.has('audience')).toBe(false);
    expect(search.get('plan_interest')).toBe('pro');
  });

  it('sends the configured audience', async () => {
    const request = await createAuthorizationRequest({}, TEST_METADATA, testConfig({ audience: 'https://api.example.com' }));
    expect(request.parameters.audience).toBe('https://api.example.com');
  });

  it('leaves out both verifier and challenge without PKCE', async () => {
    const request = await createAuthorizationRequest({}, TEST_METADATA, testConfig(), { usePkce: false });

    expect(request.codeVerifier).toBeUndefined();
    expect(request.codeChallenge).toBeUndefined();
    expect(request.codeChallengeMethod).toBeUndefined();
    expect(new URL(request.url).searchParams.has('code_challenge')).toBe(false);
    expect(request.state).not.toBe('');
  });

  it('adds a nonce only when asked to', async () => {
    const request = await createAuthorizationRequest({}, TEST_METADATA, testConfig(), { useNonce: true });
    expect(request.nonce).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(new URL(request.url).searchParams.get('nonce')).toBe(request.nonce);
  });

  it('generates a distinct state for each of 10,000 requests', async () => {
    const states = new Set<string>();
    for (let i = 0; i < 10_000; i++) {
      const request = await createAuthorizationRequest({}, TEST_METADATA, testConfig(), { usePkce: false });
      states.add(request.state);
    }
    expect(states.size).toBe(10_000);
  });

  it('rejects a malformed redirect URI', async () => {
    await expect(
      createAuthorizationRequest({}, TEST_METADATA, testConfig({ redirectUri: 'not a url' })),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects an authorization endpoint that is not http(s)', async () => {
    await expect(
      createAuthorizationRequest({}, { ...TEST_METADATA, authorizationEndpoint: 'ftp://auth.example.com/auth' }, testConfig()),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('AuthorizationRequestBuilder', () => {
  it('reports a discovery network failure as ConfigurationError', async () => {
    const discovery = vi.fn(async (_issuer: URL) => {
      throw new TypeError('fetch failed');
    });
    const builder = new AuthorizationRequestBuilder({ config: testConfig(), discovery });

    const error = await builder.build({}).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ message: 'Failed to discover OpenID configuration' });
  });

  it('retries discovery after a failure and caches it after a success', async () => {
    const discovery = vi
      .fn(async (_issuer: URL) => TEST_METADATA)
      .mockRejectedValueOnce(new Error('temporarily unavailable'));
    const builder = new AuthorizationRequestBuilder({ config: testConfig(), discovery });

    await expect(builder.build({})).rejects.toBeInstanceOf(ConfigurationError);
    await builder.build({});
    await builder.build({ signUp: true });

    expect(discovery).toHaveBeenCalledTimes(2);
    expect(discovery.mock.calls[1]?.[0].href).toBe('https://auth.example.com/');
  });

  it('fails without calling discovery when the issuer is malformed', async () => {
    const discovery = vi.fn(async (_issuer: URL) => TEST_METADATA);
    const builder = new AuthorizationRequestBuilder({ config: testConfig({ issuer: '' }), discovery });

    await expect(builder.build({})).rejects.toBeInstanceOf(ConfigurationError);
    expect(discovery).not.toHaveBeenCalled();
  });
});
