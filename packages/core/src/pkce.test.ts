import { createHash } from 'node:crypto';
import { describe, expect, it } from 'vitest';
import { base64UrlEncode, deriveCodeChallenge, generatePkcePair, randomUrlSafeString } from './pkce.js';

describe('pkce', () => {
  it('derives the challenge as unpadded base64url of the SHA-256 of the verifier', async () => {
    for (let i = 0; i < 20; i++) {
      const pair = await generatePkcePair();
      const expected = createHash('sha256').update(pair.codeVerifier).digest('base64url');
      expect(pair.codeChallenge).toBe(expected);
      expect(pair.codeChallengeMethod).toBe('S256');
    }
  });

  it('matches the RFC 7636 appendix B example', async () => {
    await expect(deriveCodeChallenge('dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk')).resolves.toBe(
      'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM',
    );
  });

  it('encodes 32 random bytes as 43 url-safe characters', () => {
    const value = randomUrlSafeString();
    expect(value).toMatch(/^[A-Za-z0-9_-]{43}$/);
  });

  it('strips padding and swaps the url-unsafe characters', () => {
    expect(base64UrlEncode(new Uint8Array([0xfb, 0xff]))).toBe('-_8');
  });
});
