/**
 * Builds authorization requests: flow-intent parameters, PKCE, state and
 * optional nonce, on top of the discovered authorization endpoint.
 */

import type { AuthConfig } from './config.js';
import type { Discovery } from './discovery.js';
import { ConfigurationError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { generatePkcePair, randomUrlSafeString } from './pkce.js';
import type { AuthorizationIntent, AuthorizationRequest, ProviderMetadata } from './types.js';

export interface AuthorizationRequestOptions {
  /** Default: true */
  usePkce?: boolean;
  /**
   * Bind the ID token to this request with a nonce. Off by default; the
   * provider does not validate nonces yet.
   */
  useNonce?: boolean;
}

function intentParameters(intent: AuthorizationIntent, config: AuthConfig): Record<string, string> {
  const parameters: Record<string, string> = {
    start_page: intent.signUp ? 'registration' : 'login',
    // Force fresh login
    prompt: 'login',
  };

  if (intent.createOrg) {
    parameters.is_create_org = 'true';
  }

  const optional: Array<[string, string | undefined]> = [
    ['audience', config.audience],
    ['org_code', intent.orgCode],
    ['org_name', intent.orgName],
    ['login_hint', intent.loginHint],
    ['plan_interest', intent.planInterest],
    ['pricing_table_key', intent.pricingTableKey],
  ];
  for (const [name, value] of optional) {
    if (value) {
      parameters[name] = value;
    }
  }

  return parameters;
}

function parseEndpoint(value: string): URL | null {
  try {
    const url = new URL(value);
    return url.protocol === 'https:' || url.protocol === 'http:' ? url : null;
  } catch {
    return null;
  }
}

/**
 * Create the request for one flow attempt from already discovered metadata.
 */
export async function createAuthorizationRequest(
  intent: AuthorizationIntent,
  metadata: ProviderMetadata,
  config: AuthConfig,
  options: AuthorizationRequestOptions = {},
): Promise<AuthorizationRequest> {
  const authorizationEndpoint = parseEndpoint(metadata.authorizationEndpoint);
  if (!authorizationEndpoint) {
    throw new ConfigurationError('Provider metadata has no usable authorization endpoint');
  }

  const redirectUrl = config.getRedirectUrl();
  if (!redirectUrl) {
    throw new ConfigurationError('Redirect URL is missing or malformed');
  }

  const usePkce = options.usePkce ?? true;
  const pkce = usePkce ? await generatePkcePair() : null;
  const state = randomUrlSafeString();
  const nonce = options.useNonce ? randomUrlSafeString() : undefined;
  const parameters = intentParameters(intent, config);

  const url = new URL(authorizationEndpoint);
  const search = url.searchParams;
  search.set('response_type', 'code');
  search.set('client_id', config.clientId);
  search.set('redirect_uri', redirectUrl.href);
  search.set('scope', config.scope);
  search.set('state', state);
  if (nonce) {
    search.set('nonce', nonce);
  }
  if (pkce) {
    search.set('code_challenge', pkce.codeChallenge);
    search.set('code_challenge_method', pkce.codeChallengeMethod);
  }
  for (const [name, value] of Object.entries(parameters)) {
    search.set(name, value);
  }

  return {
    url: url.toString(),
    clientId: config.clientId,
    redirectUri: redirectUrl.href,
    scope: config.scope,
    state,
    nonce,
    codeVerifier: pkce?.codeVerifier,
    codeChallenge: pkce?.codeChallenge,
    codeChallengeMethod: pkce?.codeChallengeMethod,
    parameters,
  };
}

export interface AuthorizationRequestBuilderOptions {
  config: AuthConfig;
  discovery: Discovery;
  logger?: Logger;
}

/**
 * Runs discovery for the configured issuer, then builds the request.
 * Every discovery failure surfaces as ConfigurationError. Metadata is cached
 * after the first success; a failed discovery is retried on the next call.
 */
export class AuthorizationRequestBuilder {
  private readonly config: AuthConfig;
  private readonly discovery: Discovery;
  private readonly logger: Logger;
  private metadata: Promise<ProviderMetadata> | null = null;

  constructor(options: AuthorizationRequestBuilderOptions) {
    this.config = options.config;
    this.discovery = options.discovery;
    this.logger = options.logger ?? silentLogger;
  }

  async build(intent: AuthorizationIntent, options: AuthorizationRequestOptions = {}): Promise<AuthorizationRequest> {
    const metadata = await this.discover();
    try {
      return await createAuthorizationRequest(intent, metadata, this.config, options);
    } catch (error) {
      this.logger.error('Failed to build authorization request', error);
      throw error;
    }
  }

  discover(): Promise<ProviderMetadata> {
    if (!this.metadata) {
      const pending = this.runDiscovery();
      this.metadata = pending;
      pending.catch(() => {
        if (this.metadata === pending) {
          this.metadata = null;
        }
      });
    }
    return this.metadata;
  }

  private async runDiscovery(): Promise<ProviderMetadata> {
    const issuerUrl = this.config.getIssuerUrl();
    if (!issuerUrl) {
      this.logger.error('Failed to get issuer URL');
      throw new ConfigurationError('Issuer URL is missing or malformed');
    }

    try {
      return await this.discovery(issuerUrl);
    } catch (error) {
      this.logger.error('Failed to discover OpenID configuration', error);
      throw new ConfigurationError('Failed to discover OpenID configuration', { cause: error });
    }
  }
}
