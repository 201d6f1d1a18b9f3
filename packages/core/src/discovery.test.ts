import { describe, expect, it, vi } from 'vitest';
import { createDiscovery, discoveryDocumentUrl } from './discovery.js';
import { jsonResponse } from './test-helpers.js';

const DOCUMENT = {
  issuer: 'https://auth.example.com',
  authorization_endpoint: 'https://auth.example.com/oauth2/auth',
  token_endpoint: 'https://auth.example.com/oauth2/token',
  end_session_endpoint: 'https://auth.example.com/logout',
  jwks_uri: 'https://auth.example.com/.well-known/jwks.json',
};

describe('discoveryDocumentUrl', () => {
  it('appends the well-known path to the issuer', () => {
    expect(discoveryDocumentUrl(new URL('https://auth.example.com')).href).toBe(
      'https://auth.example.com/.well-known/openid-configuration',
    );
  });

  it('keeps an issuer path', () => {
    expect(discoveryDocumentUrl(new URL('https://auth.example.com/tenant')).href).toBe(
      'https://auth.example.com/tenant/.well-known/openid-configuration',
    );
  });
});

describe('createDiscovery', () => {
  it('maps the discovery document to provider metadata', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse(DOCUMENT));
    const discover = createDiscovery({ fetch: fetchMock });

    const metadata = await discover(new URL('https://auth.example.com'));

    expect(metadata).toEqual({
      issuer: 'https://auth.example.com',
      authorizationEndpoint: 'https://auth.example.com/oauth2/auth',
      tokenEndpoint: 'https://auth.example.com/oauth2/token',
      endSessionEndpoint: 'https://auth.example.com/logout',
      userinfoEndpoint: undefined,
    });
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe('https://auth.example.com/.well-known/openid-configuration');
  });

  it('rejects on a non-success status', async () => {
    const discover = createDiscovery({
      fetch: async () => jsonResponse({ error: 'unavailable' }, 503),
    });

    await expect(discover(new URL('https://auth.example.com'))).rejects.toThrow(
      'Discovery failed: HTTP 503 from https://auth.example.com/.well-known/openid-configuration',
    );
  });

  it('rejects a document without a token endpoint', async () => {
    const { token_endpoint: _omitted, ...incomplete } = DOCUMENT;
    const discover = createDiscovery({ fetch: async () => jsonResponse(incomplete) });

    await expect(discover(new URL('https://auth.example.com'))).rejects.toThrow(/Invalid discovery document/);
  });
});
