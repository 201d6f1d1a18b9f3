/**
 * AuthClient: the public surface of the library.
 *
 * Usage:
 *   const config = loadConfigFromEnv();
 *   const surface = new CallbackSurface({ logger });
 *   const auth = await createAuthClient({ config, surface, logger });
 *
 *   await auth.login({ loginHint: 'user@example.com' });
 *   const token = await auth.getToken();
 */

import { AuthorizationFlowController } from './authorization-flow.js';
import { AuthorizationRequestBuilder } from './authorization-request.js';
import type { AuthorizationRequestOptions } from './authorization-request.js';
import { CallbackSurface } from './callback-surface.js';
import { ClaimsResolver } from './claims.js';
import type { AuthConfig } from './config.js';
import { CredentialRepository } from './credential-repository.js';
import { createDiscovery } from './discovery.js';
import type { Discovery } from './discovery.js';
import { EntitlementsClient } from './entitlements-api.js';
import { FlowInProgressError, isUserCancellationError } from './errors.js';
import type { JsonValue } from './json.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { OidcClient } from './oidc-client.js';
import { createSecretStore } from './secret-store.js';
import type { SecretStore } from './secret-store.js';
import { ClaimsService, EntitlementsService, FeatureFlagsService } from './services.js';
import { TokenManager } from './token-manager.js';
import { TokenRefresher } from './token-refresher.js';
import type {
  AuthorizationIntent,
  Claim,
  Flag,
  FlagType,
  Organization,
  Permission,
  Permissions,
  PresentationSurface,
  TokenKind,
  Tokens,
  UserDetails,
  UserOrganizations,
} from './types.js';

/** Keytar service name and config directory used when no store is given. */
export const DEFAULT_SERVICE_NAME = 'authsession';

export interface LoginOptions {
  orgCode?: string;
  loginHint?: string;
}

export interface RegisterOptions extends LoginOptions {
  planInterest?: string;
  pricingTableKey?: string;
}

export interface CreateOrgOptions {
  orgName?: string;
}

export interface EndSessionResult {
  /** The local session was removed from the store */
  success: boolean;
  logoutUrl: string | null;
}

export interface AuthClientDependencies {
  repository: CredentialRepository;
  requests: AuthorizationRequestBuilder;
  flow: AuthorizationFlowController;
  tokens: TokenManager;
  oidc: OidcClient;
  resolver: ClaimsResolver;
  surface: PresentationSurface;
  entitlementsClient: EntitlementsClient;
  logger?: Logger;
  requestOptions?: AuthorizationRequestOptions;
}

export class AuthClient {
  readonly claims: ClaimsService;
  readonly featureFlags: FeatureFlagsService;
  readonly entitlements: EntitlementsService;
  readonly surface: PresentationSurface;

  private readonly repository: CredentialRepository;
  private readonly requests: AuthorizationRequestBuilder;
  private readonly flow: AuthorizationFlowController;
  private readonly tokens: TokenManager;
  private readonly oidc: OidcClient;
  private readonly resolver: ClaimsResolver;
  private readonly logger: Logger;
  private readonly requestOptions: AuthorizationRequestOptions;

  constructor(deps: AuthClientDependencies) {
    this.repository = deps.repository;
    this.requests = deps.requests;
    this.flow = deps.flow;
    this.tokens = deps.tokens;
    this.oidc = deps.oidc;
    this.resolver = deps.resolver;
    this.surface = deps.surface;
    this.logger = deps.logger ?? silentLogger;
    this.requestOptions = deps.requestOptions ?? {};

    this.claims = new ClaimsService(this.resolver);
    this.featureFlags = new FeatureFlagsService(this.resolver, this.logger);
    this.entitlements = new EntitlementsService(this.resolver, deps.entitlementsClient, this.logger);
  }

  // Interactive flows

  login(options: LoginOptions = {}): Promise<void> {
    return this.authorize({ signUp: false, ...options });
  }

  register(options: RegisterOptions = {}): Promise<void> {
    return this.authorize({ signUp: true, ...options });
  }

  createOrg(options: CreateOrgOptions = {}): Promise<void> {
    return this.authorize({ signUp: true, createOrg: true, orgName: options.orgName });
  }

  /**
   * Forget the local session. Resolves false when the stored copy could not
   * be removed; the in-memory session is gone either way.
   */
  async logout(): Promise<boolean> {
    try {
      await this.repository.clear();
      return true;
    } catch (error) {
      this.logger.error('Failed to clear credential state on logout', error);
      return false;
    }
  }

  /** Provider end-session URL for the current ID token, when the provider has one. */
  async getLogoutUrl(): Promise<string | null> {
    const state = await this.repository.current();
    return this.oidc.getLogoutUrl(state?.idToken);
  }

  /**
   * Log out locally, then build the provider logout URL for the session that
   * was just dropped. An unreachable provider leaves `logoutUrl` null; the
   * local session is gone either way.
   */
  async endSession(): Promise<EndSessionResult> {
    const state = await this.repository.current();
    const success = await this.logout();

    let logoutUrl: string | null = null;
    try {
      logoutUrl = await this.oidc.getLogoutUrl(state?.idToken);
    } catch (error) {
      this.logger.warn('Failed to build the provider logout URL', error);
    }
    return { success, logoutUrl };
  }

  enablePrivateAuthSession(enabled: boolean): void {
    this.flow.enablePrivateSession(enabled);
  }

  isUserCancellationError(error: unknown): boolean {
    return isUserCancellationError(error);
  }

  // Tokens

  getToken(kind: TokenKind = 'access'): Promise<string> {
    return this.tokens.getToken(kind);
  }

  getTokens(): Promise<Tokens> {
    return this.tokens.getTokens();
  }

  // Claims

  isAuthorized(): Promise<boolean> {
    return this.resolver.isAuthorized();
  }

  isAuthenticated(): Promise<boolean> {
    return this.resolver.isAuthenticated();
  }

  getUserDetails(): Promise<UserDetails | null> {
    return this.resolver.getUserDetails();
  }

  getClaim(key: string, token: TokenKind = 'access'): Promise<Claim | null> {
    return this.resolver.getClaim(key, token);
  }

  getPermissions(): Promise<Permissions | null> {
    return this.resolver.getPermissions();
  }

  getPermission(name: string): Promise<Permission | null> {
    return this.resolver.getPermission(name);
  }

  getOrganization(): Promise<Organization | null> {
    return this.resolver.getOrganization();
  }

  getUserOrganizations(): Promise<UserOrganizations | null> {
    return this.resolver.getUserOrganizations();
  }

  getFlag(code: string, defaultValue?: JsonValue, expectedType?: FlagType): Promise<Flag> {
    return this.resolver.getFlag(code, defaultValue, expectedType);
  }

  getBooleanFlag(code: string, defaultValue?: boolean): Promise<boolean> {
    return this.resolver.getBooleanFlag(code, defaultValue);
  }

  getStringFlag(code: string, defaultValue?: string): Promise<string> {
    return this.resolver.getStringFlag(code, defaultValue);
  }

  getIntegerFlag(code: string, defaultValue?: number): Promise<number> {
    return this.resolver.getIntegerFlag(code, defaultValue);
  }

  private async authorize(intent: AuthorizationIntent): Promise<void> {
    if (this.flow.isInProgress) {
      throw new FlowInProgressError();
    }
    const request = await this.requests.build(intent, this.requestOptions);
    await this.flow.start(request, this.surface);
  }
}

export interface CreateAuthClientOptions {
  config: AuthConfig;
  /** Default: OS credential vault, else ~/.config/authsession/credentials.json */
  store?: SecretStore;
  /** Default: a CallbackSurface that logs the authorization URL */
  surface?: PresentationSurface;
  discovery?: Discovery;
  fetch?: typeof fetch;
  logger?: Logger;
  /** Secret store key for the credential state */
  credentialKey?: string;
  requestOptions?: AuthorizationRequestOptions;
  now?: () => number;
}

/**
 * Wire one repository, refresher and surface into an AuthClient.
 */
export async function createAuthClient(options: CreateAuthClientOptions): Promise<AuthClient> {
  const { config } = options;
  const logger = options.logger ?? silentLogger;
  const fetchImpl = options.fetch ?? fetch;
  const now = options.now ?? Date.now;

  const store = options.store ?? (await createSecretStore({ service: DEFAULT_SERVICE_NAME, logger }));
  const requests = new AuthorizationRequestBuilder({
    config,
    discovery: options.discovery ?? createDiscovery({ fetch: fetchImpl }),
    logger,
  });
  const oidc = new OidcClient({ config, metadata: () => requests.discover(), fetch: fetchImpl });
  const refresher = new TokenRefresher({
    refresh: (previous, parameters) => oidc.refresh(previous, parameters),
    logger,
    now,
  });
  const repository = new CredentialRepository({ store, key: options.credentialKey, logger, changes: refresher });
  const tokens = new TokenManager({ repository, refresher, logger });

  return new AuthClient({
    repository,
    requests,
    flow: new AuthorizationFlowController({ repository, exchanger: oidc, logger, now }),
    tokens,
    oidc,
    resolver: new ClaimsResolver(repository, now),
    surface: options.surface ?? new CallbackSurface({ logger }),
    entitlementsClient: new EntitlementsClient({ config, tokens, fetch: fetchImpl, logger }),
    logger,
    requestOptions: options.requestOptions,
  });
}
