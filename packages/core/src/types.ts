import type { JWTPayload } from 'jose';
import type { JsonValue } from './json.js';

/**
 * Credential state held by the repository. Treated as an immutable
 * snapshot: every refresh or login replaces it wholesale.
 */
export interface CredentialState {
  readonly accessToken?: string;
  readonly idToken?: string;
  /** Unix ms */
  readonly accessTokenExpiresAt?: number;
  readonly refreshToken?: string;
  readonly scope?: string;
  /** At least one authorization round-trip succeeded. Says nothing about expiry. */
  readonly isAuthorized: boolean;
}

/**
 * Standard and provider claims read from ID tokens.
 */
export interface IdTokenClaims extends JWTPayload {
  email?: string;
  given_name?: string;
  family_name?: string;
  picture?: string;
  org_codes?: string[];
}

/**
 * OIDC provider metadata, mapped from the discovery document.
 */
export interface ProviderMetadata {
  issuer: string;
  authorizationEndpoint: string;
  tokenEndpoint: string;
  endSessionEndpoint?: string;
  userinfoEndpoint?: string;
}

/**
 * What the user is trying to do with the interactive flow.
 */
export interface AuthorizationIntent {
  signUp?: boolean;
  createOrg?: boolean;
  orgCode?: string;
  orgName?: string;
  loginHint?: string;
  planInterest?: string;
  pricingTableKey?: string;
}

/**
 * One authorization attempt. Lives until its flow resolves; never persisted.
 * `codeVerifier` and `codeChallenge` are both present or both absent.
 */
export interface AuthorizationRequest {
  url: string;
  clientId: string;
  redirectUri: string;
  scope: string;
  state: string;
  nonce?: string;
  codeVerifier?: string;
  codeChallenge?: string;
  codeChallengeMethod?: 'S256';
  /** Flow-intent parameters appended to the authorize URL */
  parameters: Record<string, string>;
}

/**
 * Terminal redirect received from the provider.
 */
export type AuthorizationCallback =
  | { code: string; state?: string }
  | { error: string; errorDescription?: string; state?: string };

export interface PresentOptions {
  /** Do not reuse browser session state across presentations. */
  ephemeral: boolean;
}

/**
 * Shows the authorization request to the user and resolves with the
 * provider's redirect.
 */
export interface PresentationSurface {
  present(request: AuthorizationRequest, options: PresentOptions): Promise<AuthorizationCallback>;
}

/**
 * Raw token endpoint response.
 */
export interface TokenResponse {
  access_token: string;
  token_type: string;
  id_token?: string;
  refresh_token?: string;
  expires_in?: number;
  scope?: string;
}

export type TokenKind = 'access' | 'id';

export interface Tokens {
  accessToken: string;
  idToken?: string;
}

export interface Claim {
  name: string;
  value: JsonValue;
}

/** Flag value types as encoded in the `feature_flags` claim. */
export type FlagType = 's' | 'i' | 'b';

export interface Flag {
  code: string;
  /** Absent when the default value was returned. */
  type?: FlagType;
  value: JsonValue;
  isDefault: boolean;
}

export interface Organization {
  code: string;
}

export interface Permissions {
  organization: Organization;
  permissions: string[];
}

export interface Permission {
  organization: Organization;
  isGranted: boolean;
}

export interface UserOrganizations {
  orgCodes: Organization[];
}

export interface UserDetails {
  id: string;
  email: string;
  givenName?: string;
  familyName?: string;
  picture?: string;
}

export interface Entitlement {
  key: string;
  value: JsonValue;
  type?: string;
}

export interface EntitlementPlan {
  code: string;
  name?: string;
  description?: string;
}

export interface Entitlements {
  orgCode: string;
  plans: EntitlementPlan[];
  entitlements: Entitlement[];
}

export interface EntitlementsMetadata {
  hasMore: boolean;
  nextPageStartingAfter?: string;
}

export interface EntitlementsPage {
  data: Entitlements;
  metadata: EntitlementsMetadata;
}
