/**
 * Builders shared by the test suites. Not exported from the package.
 */

import { AuthConfig } from './config.js';
import type { AuthConfigInit } from './config.js';
import type { CredentialState, ProviderMetadata } from './types.js';

function encodeSegment(value: object): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

/** An unsigned JWT carrying `payload`. Only ever decoded, never verified. */
export function makeJwt(payload: Record<string, unknown>): string {
  return `${encodeSegment({ alg: 'none', typ: 'JWT' })}.${encodeSegment(payload)}.signature`;
}

export const TEST_METADATA: ProviderMetadata = {
  issuer: 'https://auth.example.com',
  authorizationEndpoint: 'https://auth.example.com/oauth2/auth',
  tokenEndpoint: 'https://auth.example.com/oauth2/token',
  endSessionEndpoint: 'https://auth.example.com/logout',
};

export function testConfig(overrides: Partial<AuthConfigInit> = {}): AuthConfig {
  return new AuthConfig({
    issuer: 'https://auth.example.com',
    clientId: 'test-client',
    redirectUri: 'http://127.0.0.1:3000/auth/callback',
    postLogoutRedirectUri: 'http://127.0.0.1:3000/',
    scope: 'openid profile email offline',
    ...overrides,
  });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** An authorized state whose access token expires `ttlMs` after `nowMs`. */
export function authorizedState(options: {
  email?: string;
  claims?: Record<string, unknown>;
  idClaims?: Record<string, unknown>;
  nowMs?: number;
  ttlMs?: number;
  accessToken?: string;
  refreshToken?: string;
} = {}): CredentialState {
  const nowMs = options.nowMs ?? Date.now();
  return {
    accessToken: options.accessToken ?? makeJwt({ sub: 'user-1', ...options.claims }),
    idToken: makeJwt({ sub: 'user-1', email: options.email ?? 'user@example.com', ...options.idClaims }),
    accessTokenExpiresAt: nowMs + (options.ttlMs ?? 3_600_000),
    refreshToken: options.refreshToken ?? 'refresh-1',
    isAuthorized: true,
  };
}
