/**
 * TokenRefresher: refresh-on-demand for the cached credential.
 *
 * Returns the cached tokens while the access token is valid, otherwise runs
 * a refresh. Concurrent callers during a refresh share the same round-trip
 * and resolve with the same token generation. Each refreshed state is
 * reported to change listeners before callers resume; a result a listener
 * discards rejects with StaleCredentialError.
 */

import type { CredentialChangeListener, CredentialChangeSource } from './credential-repository.js';
import { NotAuthenticatedError, StaleCredentialError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { CredentialState, Tokens } from './types.js';

/** Access tokens expiring within this window are refreshed. */
export const EXPIRY_TOLERANCE_MS = 60_000;

export type RefreshFunction = (
  previous: CredentialState,
  additionalParameters: Record<string, string>,
) => Promise<CredentialState>;

export interface TokenRefresherOptions {
  refresh: RefreshFunction;
  logger?: Logger;
  now?: () => number;
}

export class TokenRefresher implements CredentialChangeSource {
  private readonly refreshFn: RefreshFunction;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly listeners = new Set<CredentialChangeListener>();
  private inFlight: Promise<Tokens> | null = null;
  /** The state the last refresh started from, and what it produced */
  private lastRefresh: { from: CredentialState; to: CredentialState } | null = null;

  constructor(options: TokenRefresherOptions) {
    this.refreshFn = options.refresh;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  onCredentialChange(listener: CredentialChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Whether the access token is missing or expires within the tolerance. */
  needsRefresh(state: CredentialState): boolean {
    if (!state.accessToken || state.accessTokenExpiresAt === undefined) {
      return true;
    }
    return state.accessTokenExpiresAt - this.now() <= EXPIRY_TOLERANCE_MS;
  }

  /**
   * The snapshot a refresh for `state` would start from: the result of an
   * earlier refresh of `state`, or `state` itself.
   */
  latest(state: CredentialState): CredentialState {
    return this.lastRefresh?.from === state ? this.lastRefresh.to : state;
  }

  /**
   * Fresh access and ID tokens for `state`, refreshing when needed.
   */
  async freshTokens(state: CredentialState, additionalParameters: Record<string, string> = {}): Promise<Tokens> {
    if (this.inFlight) {
      return this.inFlight;
    }

    // A caller holding the snapshot an earlier refresh replaced gets that refresh's result.
    state = this.latest(state);

    if (state.accessToken && !this.needsRefresh(state)) {
      return { accessToken: state.accessToken, idToken: state.idToken };
    }

    if (!state.refreshToken) {
      throw new NotAuthenticatedError('Access token expired and no refresh token is available');
    }

    const pending = this.runRefresh(state, additionalParameters);
    this.inFlight = pending;
    try {
      return await pending;
    } finally {
      this.inFlight = null;
    }
  }

  private async runRefresh(state: CredentialState, additionalParameters: Record<string, string>): Promise<Tokens> {
    this.logger.debug('Refreshing access token');
    const next = await this.refreshFn(state, additionalParameters);
    if (!next.accessToken) {
      throw new NotAuthenticatedError('Refresh returned no access token');
    }

    let accepted: boolean[];
    try {
      accepted = await Promise.all([...this.listeners].map((listener) => listener(next, state)));
    } catch (error) {
      // The listener took the new state; only persisting it failed.
      this.lastRefresh = { from: state, to: next };
      throw error;
    }
    if (accepted.includes(false)) {
      throw new StaleCredentialError();
    }

    this.lastRefresh = { from: state, to: next };
    return { accessToken: next.accessToken, idToken: next.idToken };
  }
}
