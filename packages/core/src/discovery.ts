import { z } from 'zod';
import type { ProviderMetadata } from './types.js';

/** Timeout for the discovery request. */
export const DISCOVERY_TIMEOUT_MS = 10_000;

/**
 * Resolves provider metadata for an issuer. Any failure rejects.
 */
export type Discovery = (issuerUrl: URL) => Promise<ProviderMetadata>;

export interface DiscoveryOptions {
  fetch?: typeof fetch;
  timeoutMs?: number;
}

/** Wire format of the discovery document (only the fields used here). */
const DiscoveryDocumentSchema = z.object({
  issuer: z.string().min(1),
  authorization_endpoint: z.string().url(),
  token_endpoint: z.string().url(),
  end_session_endpoint: z.string().url().optional(),
  userinfo_endpoint: z.string().url().optional(),
});

export function discoveryDocumentUrl(issuerUrl: URL): URL {
  const base = issuerUrl.href.endsWith('/') ? issuerUrl.href : `${issuerUrl.href}/`;
  return new URL('.well-known/openid-configuration', base);
}

/**
 * Discovery over HTTP: GET {issuer}/.well-known/openid-configuration.
 */
export function createDiscovery(options: DiscoveryOptions = {}): Discovery {
  const fetchImpl = options.fetch ?? fetch;
  const timeoutMs = options.timeoutMs ?? DISCOVERY_TIMEOUT_MS;

  return async function discover(issuerUrl: URL): Promise<ProviderMetadata> {
    const url = discoveryDocumentUrl(issuerUrl);
    const response = await fetchImpl(url, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Discovery failed: HTTP ${response.status} from ${url.href}`);
    }

    const parsed = DiscoveryDocumentSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Invalid discovery document from ${url.href}: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    const document = parsed.data;
    return {
      issuer: document.issuer,
      authorizationEndpoint: document.authorization_endpoint,
      tokenEndpoint: document.token_endpoint,
      endSessionEndpoint: document.end_session_endpoint,
      userinfoEndpoint: document.userinfo_endpoint,
    };
  };
}
