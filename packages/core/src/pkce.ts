/**
 * Random values and PKCE (RFC 7636) for authorization requests.
 */

import { webcrypto } from 'node:crypto';

export const CODE_CHALLENGE_METHOD = 'S256';

/** Bytes of entropy for state, nonce and code verifier values. */
export const RANDOM_VALUE_BYTES = 32;

export interface PkcePair {
  codeVerifier: string;
  codeChallenge: string;
  codeChallengeMethod: typeof CODE_CHALLENGE_METHOD;
}

export function base64UrlEncode(buffer: Uint8Array): string {
  const base64 = btoa(String.fromCharCode(...buffer));
  return base64.replace(/\+/g, '-').replace(/\//g, '_').replace(/=/g, '');
}

/**
 * URL-safe random string carrying `byteLength` bytes of entropy.
 */
export function randomUrlSafeString(byteLength = RANDOM_VALUE_BYTES): string {
  const bytes = new Uint8Array(byteLength);
  webcrypto.getRandomValues(bytes);
  return base64UrlEncode(bytes);
}

/** BASE64URL(SHA256(verifier)), unpadded. */
export async function deriveCodeChallenge(codeVerifier: string): Promise<string> {
  const encoder = new TextEncoder();
  const hashBuffer = await webcrypto.subtle.digest('SHA-256', encoder.encode(codeVerifier));
  return base64UrlEncode(new Uint8Array(hashBuffer));
}

export async function generatePkcePair(): Promise<PkcePair> {
  const codeVerifier = randomUrlSafeString();
  return {
    codeVerifier,
    codeChallenge: await deriveCodeChallenge(codeVerifier),
    codeChallengeMethod: CODE_CHALLENGE_METHOD,
  };
}
