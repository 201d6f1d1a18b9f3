import { decodeJwt } from 'jose';
import { isJsonObject, toJsonValue } from './json.js';
import type { JsonObject } from './json.js';

/**
 * Decode a JWT payload without verification. Null when the token is not a
 * well-formed JWT.
 */
export function decodeClaims(token: string | undefined): JsonObject | null {
  if (!token) return null;
  try {
    const payload = toJsonValue(decodeJwt(token));
    return isJsonObject(payload) ? payload : null;
  } catch {
    return null;
  }
}
