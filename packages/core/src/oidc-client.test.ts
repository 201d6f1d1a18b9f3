import { describe, expect, it, vi } from 'vitest';
import { OAuthTokenError } from './errors.js';
import { OidcClient, credentialFromTokenResponse } from './oidc-client.js';
import { TEST_METADATA, jsonResponse, makeJwt, testConfig } from './test-helpers.js';
import type { AuthorizationRequest, CredentialState } from './types.js';

const REQUEST: AuthorizationRequest = {
  url: 'https://auth.example.com/oauth2/auth?state=state-1',
  clientId: 'test-client',
  redirectUri: 'http://127.0.0.1:3000/auth/callback',
  scope: 'openid offline',
  state: 'state-1',
  codeVerifier: 'verifier-1',
  codeChallenge: 'challenge-1',
  codeChallengeMethod: 'S256',
  parameters: {},
};

function clientWith(respond: () => Response) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => respond());
  const client = new OidcClient({
    config: testConfig(),
    metadata: async () => TEST_METADATA,
    fetch: fetchMock,
  });
  return { client, fetchMock };
}

function sentForm(fetchMock: ReturnType<typeof clientWith>['fetchMock']): URLSearchParams {
  const body = fetchMock.mock.calls[0]?.[1]?.body;
  return new URLSearchParams(typeof body === 'string' ? body : '');
}

describe('OidcClient', () => {
  it('exchanges a code with the PKCE verifier', async () => {
    const { client, fetchMock } = clientWith(() =>
      jsonResponse({
        access_token: 'access-1',
        token_type: 'Bearer',
        id_token: 'id-1',
        refresh_token: 'refresh-1',
        expires_in: 3600,
        scope: 'openid offline',
      }),
    );

    const before = Date.now();
    const state = await client.exchangeCode('code-1', REQUEST);

    expect(String(fetchMock.mock.calls[0]?.[0])).toBe('https://auth.example.com/oauth2/token');
    expect(Object.fromEntries(sentForm(fetchMock))).toEqual({
      grant_type: 'authorization_code',
      code: 'code-1',
      redirect_uri: 'http://127.0.0.1:3000/auth/callback',
      client_id: 'test-client',
      code_verifier: 'verifier-1',
    });
    expect(state).toMatchObject({
      accessToken: 'access-1',
      idToken: 'id-1',
      refreshToken: 'refresh-1',
      scope: 'openid offline',
      isAuthorized: true,
    });
    expect(state.accessTokenExpiresAt).toBeGreaterThanOrEqual(before + 3_600_000);
  });

  it('refreshes with the caller parameters and keeps tokens the response omits', async () => {
    const { client, fetchMock } = clientWith(() =>
      jsonResponse({ access_token: 'access-2', token_type: 'Bearer', expires_in: 60 }),
    );
    const previous: CredentialState = {
      accessToken: 'access-1',
      idToken: 'id-1',
      refreshToken: 'refresh-1',
      isAuthorized: true,
    };

    const next = await client.refresh(previous, { client_sdk: 'authsession-node/test' });

    expect(Object.fromEntries(sentForm(fetchMock))).toEqual({
      client_sdk: 'authsession-node/test',
      grant_type: 'refresh_token',
      client_id: 'test-client',
      refresh_token: 'refresh-1',
    });
    expect(next.accessToken).toBe('access-2');
    expect(next.idToken).toBe('id-1');
    expect(next.refreshToken).toBe('refresh-1');
  });

  it('reports a rejected grant with its status and error code', async () => {
    const { client } = clientWith(() => jsonResponse({ error: 'invalid_grant' }, 400));

    const error = await client
      .refresh({ refreshToken: 'refresh-1', isAuthorized: true })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OAuthTokenError);
    expect(error).toMatchObject({ statusCode: 400, code: 'invalid_grant' });
  });

  it('refuses to refresh without a refresh token', async () => {
    const { client, fetchMock } = clientWith(() => jsonResponse({}));

    await expect(client.refresh({ isAuthorized: true })).rejects.toBeInstanceOf(OAuthTokenError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('rejects a response without an access token', async () => {
    const { client } = clientWith(() => jsonResponse({ token_type: 'Bearer' }));

    await expect(client.exchangeCode('code-1', REQUEST)).rejects.toThrow(
      'Token exchange failed: response has no access_token',
    );
  });

  it('rejects a malformed expires_in', async () => {
    const { client } = clientWith(() =>
      jsonResponse({ access_token: 'access-1', token_type: 'Bearer', expires_in: 'soon' }),
    );

    const error = await client.exchangeCode('code-1', REQUEST).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OAuthTokenError);
    expect(error).toMatchObject({ statusCode: 200 });
    expect(String(error)).toContain('Token exchange failed: invalid token response (expires_in:');
  });

  it('rejects an empty id_token', async () => {
    const { client } = clientWith(() => jsonResponse({ access_token: 'access-1', token_type: 'Bearer', id_token: '' }));

    await expect(client.exchangeCode('code-1', REQUEST)).rejects.toThrow(
      'Token exchange failed: invalid token response (id_token:',
    );
  });

  it('builds the logout URL from the end-session endpoint', async () => {
    const { client } = clientWith(() => jsonResponse({}));

    const logoutUrl = new URL((await client.getLogoutUrl('id-1')) ?? '');

    expect(`${logoutUrl.origin}${logoutUrl.pathname}`).toBe('https://auth.example.com/logout');
    expect(logoutUrl.searchParams.get('id_token_hint')).toBe('id-1');
    expect(logoutUrl.searchParams.get('post_logout_redirect_uri')).toBe('http://127.0.0.1:3000/');
    expect(logoutUrl.searchParams.get('client_id')).toBe('test-client');
  });

  it('has no logout URL when the provider has no end-session endpoint', async () => {
    const client = new OidcClient({
      config: testConfig(),
      metadata: async () => ({ ...TEST_METADATA, endSessionEndpoint: undefined }),
      fetch: async () => jsonResponse({}),
    });

    expect(await client.getLogoutUrl()).toBeNull();
  });
});

describe('credentialFromTokenResponse', () => {
  it('computes expiry from expires_in', () => {
    const state = credentialFromTokenResponse({ access_token: 'a', token_type: 'Bearer', expires_in: 120 }, undefined, 1_000);
    expect(state.accessTokenExpiresAt).toBe(121_000);
  });

  it('falls back to the exp claim of a JWT access token', () => {
    const accessToken = makeJwt({ sub: 'user-1', exp: 1_700_000_000 });
    const state = credentialFromTokenResponse({ access_token: accessToken, token_type: 'Bearer' });
    expect(state.accessTokenExpiresAt).toBe(1_700_000_000_000);
  });

  it('leaves expiry unset for an opaque token without expires_in', () => {
    const state = credentialFromTokenResponse({ access_token: 'opaque', token_type: 'Bearer' });
    expect(state.accessTokenExpiresAt).toBeUndefined();
  });
});
