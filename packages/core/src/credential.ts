import { z } from 'zod';
import type { CredentialState } from './types.js';

export const CREDENTIAL_STATE_VERSION = 1;

export const EMPTY_CREDENTIAL_STATE: CredentialState = Object.freeze({ isAuthorized: false });

const StoredCredentialStateSchema = z
  .object({
    version: z.literal(CREDENTIAL_STATE_VERSION),
    accessToken: z.string().min(1).optional(),
    idToken: z.string().min(1).optional(),
    accessTokenExpiresAt: z.number().finite().optional(),
    refreshToken: z.string().min(1).optional(),
    scope: z.string().optional(),
    isAuthorized: z.boolean(),
  })
  .strict();

export function serializeCredentialState(state: CredentialState): string {
  return JSON.stringify({ version: CREDENTIAL_STATE_VERSION, ...state });
}

/**
 * Parse a stored blob. Throws when it is not JSON or not a credential state
 * of the current version.
 */
export function deserializeCredentialState(serialized: string): CredentialState {
  const parsed = StoredCredentialStateSchema.parse(JSON.parse(serialized));
  const { version: _version, ...state } = parsed;
  return Object.freeze(state);
}

/**
 * Authorized, holding an access token, and that token's expiry is strictly
 * in the future. A point-in-time check; nothing is refreshed.
 */
export function isCredentialAuthenticated(state: CredentialState | null, nowMs = Date.now()): boolean {
  if (!state?.isAuthorized || !state.accessToken) {
    return false;
  }
  return state.accessTokenExpiresAt !== undefined && state.accessTokenExpiresAt > nowMs;
}
