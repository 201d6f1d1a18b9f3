import { describe, expect, it, vi } from 'vitest';
import { EntitlementsClient } from './entitlements-api.js';
import {
  DecodingError,
  InvalidResponseError,
  InvalidUrlError,
  NotAuthenticatedError,
  ServerError,
} from './errors.js';
import { jsonResponse, testConfig } from './test-helpers.js';

function page(keys: string[], hasMore: boolean, next: string | null) {
  return {
    data: {
      org_code: 'org_123',
      plans: [{ code: 'pro', name: 'Pro' }],
      entitlements: keys.map((key) => ({ key, value: true, type: 'boolean' })),
    },
    metadata: { has_more: hasMore, next_page_starting_after: next },
  };
}

const tokens = { getToken: async () => 'token-1' };

function clientWith(respond: (url: URL) => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, _init?: RequestInit) =>
    respond(new URL(String(input))),
  );
  const client = new EntitlementsClient({ config: testConfig(), tokens, fetch: fetchMock });
  return { client, fetchMock };
}

describe('EntitlementsClient', () => {
  it('follows the cursor across pages and keeps arrival order', async () => {
    const { client, fetchMock } = clientWith((url) =>
      url.searchParams.get('starting_after') === 'abc'
        ? jsonResponse(page(['c'], false, null))
        : jsonResponse(page(['a', 'b'], true, 'abc')),
    );

    const entitlements = await client.getAllEntitlements();

    expect(entitlements.map((entitlement) => entitlement.key)).toEqual(['a', 'b', 'c']);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe('https://auth.example.com/account_api/v1/entitlements');
    expect(String(fetchMock.mock.calls[1]?.[0])).toBe(
      'https://auth.example.com/account_api/v1/entitlements?starting_after=abc',
    );
  });

  it('sends the bearer token and page size', async () => {
    const { client, fetchMock } = clientWith(() => jsonResponse(page(['a'], false, null)));

    const result = await client.fetchEntitlements({ pageSize: 10 });

    expect(String(fetchMock.mock.calls[0]?.[0])).toBe(
      'https://auth.example.com/account_api/v1/entitlements?page_size=10',
    );
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
      Authorization: 'Bearer token-1',
      Accept: 'application/json',
    });
    expect(result).toEqual({
      data: {
        orgCode: 'org_123',
        plans: [{ code: 'pro', name: 'Pro', description: undefined }],
        entitlements: [{ key: 'a', value: true, type: 'boolean' }],
      },
      metadata: { hasMore: false, nextPageStartingAfter: undefined },
    });
  });

  it('aborts the aggregation when a later page fails', async () => {
    const { client } = clientWith((url) =>
      url.searchParams.has('starting_after')
        ? jsonResponse({ error: 'boom' }, 502)
        : jsonResponse(page(['a'], true, 'abc')),
    );

    await expect(client.getAllEntitlements()).rejects.toBeInstanceOf(ServerError);
  });

  it('maps a 500 to ServerError, not DecodingError', async () => {
    const { client } = clientWith(() => jsonResponse({ error: 'internal' }, 500));

    const error = await client.fetchEntitlements().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ServerError);
    expect(error).not.toBeInstanceOf(DecodingError);
    expect(error).toMatchObject({ status: 500 });
  });

  it('maps a malformed body to DecodingError', async () => {
    const { client } = clientWith(() => jsonResponse({ data: { org_code: 'org_123' } }));
    await expect(client.fetchEntitlements()).rejects.toBeInstanceOf(DecodingError);
  });

  it('maps a body that is not JSON to DecodingError', async () => {
    const { client } = clientWith(() => new Response('<html>', { status: 200 }));
    await expect(client.fetchEntitlement()).rejects.toBeInstanceOf(DecodingError);
  });

  it('maps a transport failure to InvalidResponseError', async () => {
    const { client } = clientWith(() => {
      throw new TypeError('fetch failed');
    });
    await expect(client.fetchEntitlements()).rejects.toBeInstanceOf(InvalidResponseError);
  });

  it('fetches a single entitlement', async () => {
    const { client, fetchMock } = clientWith(() =>
      jsonResponse({ data: { key: 'seats', value: 10, type: 'number' } }),
    );

    expect(await client.fetchEntitlement()).toEqual({ key: 'seats', value: 10, type: 'number' });
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe('https://auth.example.com/account_api/v1/entitlement');
  });

  it('requires a session', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({}));
    const client = new EntitlementsClient({
      config: testConfig(),
      tokens: {
        getToken: async () => {
          throw new NotAuthenticatedError();
        },
      },
      fetch: fetchMock,
    });

    await expect(client.fetchEntitlements()).rejects.toBeInstanceOf(NotAuthenticatedError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('rejects an issuer that is not a URL', async () => {
    const client = new EntitlementsClient({ config: testConfig({ issuer: 'auth' }), tokens, fetch: async () => jsonResponse({}) });
    await expect(client.fetchEntitlements()).rejects.toBeInstanceOf(InvalidUrlError);
  });
});
