import type { CredentialRepository } from './credential-repository.js';
import {
  CredentialStoreError,
  FailedToSaveStateError,
  NotAuthenticatedError,
  OAuthTokenError,
  StaleCredentialError,
} from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { TokenRefresher } from './token-refresher.js';
import type { CredentialState, TokenKind, Tokens } from './types.js';
import { SDK_VERSION } from './version.js';

/** Sent with every refresh so the provider can attribute the client. */
export const SDK_REFRESH_PARAMETERS: Readonly<Record<string, string>> = Object.freeze({
  client_sdk: `authsession-node/${SDK_VERSION}`,
});

export interface TokenManagerOptions {
  repository: CredentialRepository;
  refresher: TokenRefresher;
  logger?: Logger;
}

/**
 * Hands out tokens that are valid at the time of the call, refreshing behind
 * the scenes. Failures are reported as NotAuthenticatedError, except a
 * refresh whose result could not be persisted (FailedToSaveStateError).
 */
export class TokenManager {
  private readonly repository: CredentialRepository;
  private readonly refresher: TokenRefresher;
  private readonly logger: Logger;

  constructor(options: TokenManagerOptions) {
    this.repository = options.repository;
    this.refresher = options.refresher;
    this.logger = options.logger ?? silentLogger;
  }

  async getToken(kind: TokenKind = 'access'): Promise<string> {
    const tokens = await this.getTokens();
    const token = kind === 'access' ? tokens.accessToken : tokens.idToken;
    if (!token) {
      this.logger.error(`No ${kind} token in the current credential state`);
      throw new NotAuthenticatedError(`No ${kind} token available`);
    }
    return token;
  }

  async getTokens(): Promise<Tokens> {
    try {
      return await this.freshTokens();
    } catch (error) {
      if (!(error instanceof StaleCredentialError)) {
        throw error;
      }
    }

    // A login or logout landed during the refresh; answer for the state it left.
    this.logger.debug('Credential state changed during refresh, retrying');
    try {
      return await this.freshTokens();
    } catch (error) {
      if (error instanceof StaleCredentialError) {
        throw new NotAuthenticatedError('Failed to get a valid access token', { cause: error });
      }
      throw error;
    }
  }

  private async freshTokens(): Promise<Tokens> {
    const state = await this.repository.current();
    if (!state?.isAuthorized) {
      this.logger.error('Failed to get authentication state');
      throw new NotAuthenticatedError();
    }

    const refreshFrom = this.refresher.latest(state);
    try {
      return await this.refresher.freshTokens(state, { ...SDK_REFRESH_PARAMETERS });
    } catch (error) {
      if (error instanceof StaleCredentialError) {
        throw error;
      }
      if (error instanceof CredentialStoreError) {
        throw new FailedToSaveStateError('Refreshed credential state could not be saved', { cause: error });
      }
      this.logger.error('Failed to get authentication tokens', error);
      if (invalidatesSession(error)) {
        await this.clearQuietly(refreshFrom);
      }
      throw new NotAuthenticatedError('Failed to get a valid access token', { cause: error });
    }
  }

  /** Clears the session the failed refresh started from, never a newer one. */
  private async clearQuietly(refreshFrom: CredentialState): Promise<void> {
    try {
      await this.repository.clearIfCurrent(refreshFrom);
    } catch (error) {
      this.logger.error('Failed to clear credential state after refresh failure', error);
    }
  }
}

/**
 * The provider rejected the grant, or there is nothing to refresh with:
 * the stored session can never become valid again.
 */
function invalidatesSession(error: unknown): boolean {
  if (error instanceof OAuthTokenError) {
    return error.statusCode >= 400 && error.statusCode < 500;
  }
  return error instanceof NotAuthenticatedError;
}
