/**
 * OIDC token client
 *
 * Code exchange, refresh and RP-initiated logout against the discovered
 * provider endpoints. Public client: no client secret is sent.
 */

import { decodeJwt } from 'jose';
import { z } from 'zod';
import type { AuthConfig } from './config.js';
import { OAuthTokenError } from './errors.js';
import type { AuthorizationRequest, CredentialState, ProviderMetadata, TokenResponse } from './types.js';

/** Wire format of a successful token endpoint response. */
const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  id_token: z.string().min(1).optional(),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.number().finite().nonnegative().optional(),
  scope: z.string().optional(),
});

export interface OidcClientOptions {
  config: AuthConfig;
  /** Resolves (and may cache) the provider metadata */
  metadata: () => Promise<ProviderMetadata>;
  fetch?: typeof fetch;
}

export class OidcClient {
  private readonly config: AuthConfig;
  private readonly metadata: () => Promise<ProviderMetadata>;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OidcClientOptions) {
    this.config = options.config;
    this.metadata = options.metadata;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Exchange the authorization code from a callback for a credential state.
   */
  async exchangeCode(code: string, request: AuthorizationRequest): Promise<CredentialState> {
    const body = new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      redirect_uri: request.redirectUri,
      client_id: request.clientId,
    });
    if (request.codeVerifier) {
      body.set('code_verifier', request.codeVerifier);
    }

    const tokens = await this.requestTokens(body, 'Token exchange');
    return credentialFromTokenResponse(tokens);
  }

  /**
   * Exchange a refresh token for a new credential state. Tokens the response
   * omits are carried over from `previous`.
   */
  async refresh(
    previous: CredentialState,
    additionalParameters: Record<string, string> = {},
  ): Promise<CredentialState> {
    if (!previous.refreshToken) {
      throw new OAuthTokenError('No refresh token is available', 400, 'invalid_grant');
    }

    const body = new URLSearchParams({
      ...additionalParameters,
      grant_type: 'refresh_token',
      client_id: this.config.clientId,
      refresh_token: previous.refreshToken,
    });

    const tokens = await this.requestTokens(body, 'Token refresh');
    return credentialFromTokenResponse(tokens, previous);
  }

  /**
   * Build the RP-initiated logout URL, or null when the provider has no
   * end-session endpoint.
   */
  async getLogoutUrl(idTokenHint?: string): Promise<string | null> {
    const { endSessionEndpoint } = await this.metadata();
    if (!endSessionEndpoint) {
      return null;
    }

    const logoutUrl = new URL(endSessionEndpoint);
    if (idTokenHint) {
      logoutUrl.searchParams.set('id_token_hint', idTokenHint);
    }
    const postLogoutRedirectUrl = this.config.getPostLogoutRedirectUrl();
    if (postLogoutRedirectUrl) {
      logoutUrl.searchParams.set('post_logout_redirect_uri', postLogoutRedirectUrl.href);
    }
    logoutUrl.searchParams.set('client_id', this.config.clientId);
    return logoutUrl.toString();
  }

  private async requestTokens(body: URLSearchParams, label: string): Promise<TokenResponse> {
    const { tokenEndpoint } = await this.metadata();

    const response = await this.fetchImpl(tokenEndpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      },
      body: body.toString(),
    });

    if (!response.ok) {
      const errorBody = await response.text();
      throw new OAuthTokenError(
        `${label} failed: ${response.status} - ${errorBody}`,
        response.status,
        readOAuthErrorCode(errorBody),
      );
    }

    const parsed = TokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const detail =
        issue?.path[0] === 'access_token'
          ? 'response has no access_token'
          : `invalid token response (${issue?.path.join('.') ?? 'body'}: ${issue?.message ?? 'unknown'})`;
      throw new OAuthTokenError(`${label} failed: ${detail}`, response.status);
    }
    return parsed.data;
  }
}

function readOAuthErrorCode(body: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === 'object' && parsed !== null && 'error' in parsed && typeof parsed.error === 'string') {
      return parsed.error;
    }
  } catch {
    return undefined;
  }
  return undefined;
}

/** The `exp` claim of a JWT access token, in Unix ms. */
function accessTokenExpiry(accessToken: string): number | undefined {
  try {
    const { exp } = decodeJwt(accessToken);
    return typeof exp === 'number' && Number.isFinite(exp) ? exp * 1000 : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Turn a token endpoint response into a credential state.
 *
 * Expiry comes from `expires_in`, else from the access token's `exp` claim.
 * Refresh and ID tokens absent from a refresh response are kept from
 * `previous`.
 */
export function credentialFromTokenResponse(
  tokens: TokenResponse,
  previous?: CredentialState,
  nowMs = Date.now(),
): CredentialState {
  const expiresAt =
    typeof tokens.expires_in === 'number' ? nowMs + tokens.expires_in * 1000 : accessTokenExpiry(tokens.access_token);

  return Object.freeze({
    accessToken: tokens.access_token,
    idToken: tokens.id_token ?? previous?.idToken,
    accessTokenExpiresAt: expiresAt,
    refreshToken: tokens.refresh_token ?? previous?.refreshToken,
    scope: tokens.scope ?? previous?.scope,
    isAuthorized: true,
  });
}
