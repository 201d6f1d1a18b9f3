export { AuthClient, createAuthClient, DEFAULT_SERVICE_NAME } from './auth-client.js';
export type {
  AuthClientDependencies,
  CreateAuthClientOptions,
  CreateOrgOptions,
  EndSessionResult,
  LoginOptions,
  RegisterOptions,
} from './auth-client.js';
export { AuthConfig, DEFAULT_SCOPE, loadConfigFromEnv, loadConfigFromFile } from './config.js';
export type { AuthConfigInit } from './config.js';
export { createConsoleLogger, silentLogger } from './logger.js';
export type { ConsoleLoggerOptions, Logger } from './logger.js';
export {
  createSecretStore,
  FileSecretStore,
  KeytarSecretStore,
  MemorySecretStore,
} from './secret-store.js';
export type { CreateSecretStoreOptions, KeytarModule, SecretStore } from './secret-store.js';
export { CredentialRepository, DEFAULT_CREDENTIAL_KEY } from './credential-repository.js';
export type {
  CredentialChangeListener,
  CredentialChangeSource,
  CredentialRepositoryOptions,
} from './credential-repository.js';
export { isCredentialAuthenticated } from './credential.js';
export { CODE_CHALLENGE_METHOD, deriveCodeChallenge, generatePkcePair, randomUrlSafeString } from './pkce.js';
export type { PkcePair } from './pkce.js';
export { createDiscovery, discoveryDocumentUrl } from './discovery.js';
export type { Discovery, DiscoveryOptions } from './discovery.js';
export { AuthorizationRequestBuilder, createAuthorizationRequest } from './authorization-request.js';
export type { AuthorizationRequestOptions } from './authorization-request.js';
export { OidcClient } from './oidc-client.js';
export type { OidcClientOptions } from './oidc-client.js';
export { EXPIRY_TOLERANCE_MS, TokenRefresher } from './token-refresher.js';
export type { RefreshFunction, TokenRefresherOptions } from './token-refresher.js';
export { SDK_REFRESH_PARAMETERS, TokenManager } from './token-manager.js';
export type { TokenManagerOptions } from './token-manager.js';
export { AuthorizationFlowController } from './authorization-flow.js';
export type { CodeExchanger, FlowStatus } from './authorization-flow.js';
export { ClaimKey, ClaimsResolver } from './claims.js';
export { ClaimsService, EntitlementsService, FeatureFlagsService } from './services.js';
export { EntitlementsClient } from './entitlements-api.js';
export type { AccessTokenSource, EntitlementsClientOptions, FetchEntitlementsOptions } from './entitlements-api.js';
export { CallbackSurface, parseCallbackParams, renderCallbackPage } from './callback-surface.js';
export type { CallbackSurfaceOptions, OpenUrl } from './callback-surface.js';
export * from './errors.js';
export type { JsonObject, JsonPrimitive, JsonValue } from './json.js';
export type * from './types.js';
export { SDK_VERSION } from './version.js';
