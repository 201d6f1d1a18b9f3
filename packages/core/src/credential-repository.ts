/**
 * CredentialRepository: the single owner of the current credential state.
 *
 * Keeps an in-memory cache in front of a SecretStore. The cache is the
 * source of truth for the rest of the process: it changes synchronously on
 * every mutation, before the durable write is attempted, and is never
 * re-read from the store once established. Durable writes are queued so the
 * store always ends up matching the last mutation.
 */

import { deserializeCredentialState, serializeCredentialState } from './credential.js';
import { CredentialStoreError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { SecretStore } from './secret-store.js';
import type { CredentialState } from './types.js';

export const DEFAULT_CREDENTIAL_KEY = 'authsession.credential-state';

/**
 * Receives a state derived from `previous`. Resolves false when the change is
 * discarded because `previous` is no longer current.
 */
export type CredentialChangeListener = (state: CredentialState, previous: CredentialState) => Promise<boolean>;

/**
 * Something that changes credential state outside the repository's own
 * mutation calls (a token refresh) and reports it.
 */
export interface CredentialChangeSource {
  onCredentialChange(listener: CredentialChangeListener): () => void;
}

export interface CredentialRepositoryOptions {
  store: SecretStore;
  key?: string;
  logger?: Logger;
  /** Subscribed once, at construction. */
  changes?: CredentialChangeSource;
}

export class CredentialRepository {
  private readonly store: SecretStore;
  private readonly key: string;
  private readonly logger: Logger;
  /** undefined: not hydrated yet; null: hydrated, nothing stored */
  private cached: CredentialState | null | undefined = undefined;
  private hydration: Promise<CredentialState | null> | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(options: CredentialRepositoryOptions) {
    this.store = options.store;
    this.key = options.key ?? DEFAULT_CREDENTIAL_KEY;
    this.logger = options.logger ?? silentLogger;

    options.changes?.onCredentialChange(async (state, previous) => {
      const replaced = await this.replaceIfCurrent(previous, state);
      if (replaced) {
        this.logger.debug('Updated credential state after refresh');
      } else {
        this.logger.warn('Discarded refreshed credential state: the session changed during the refresh');
      }
      return replaced;
    });
  }

  /**
   * The current credential state, hydrating it from the store on first use.
   */
  async current(): Promise<CredentialState | null> {
    if (this.cached !== undefined) {
      return this.cached;
    }
    if (!this.hydration) {
      this.hydration = this.hydrate();
    }
    return this.hydration;
  }

  /**
   * Replace the credential state. The cache reflects `state` as soon as this
   * is called; the returned promise rejects with CredentialStoreError when the
   * durable write fails.
   */
  async replace(state: CredentialState): Promise<void> {
    this.cached = state;
    const serialized = serializeCredentialState(state);

    await this.enqueue(async () => {
      let stored = false;
      try {
        stored = await this.store.put(this.key, serialized);
      } catch (error) {
        this.logger.error('Failed to persist credential state', error);
        throw new CredentialStoreError('Failed to persist credential state', { cause: error });
      }
      if (!stored) {
        this.logger.error('Failed to persist credential state');
        throw new CredentialStoreError('Failed to persist credential state');
      }
      this.logger.debug('Persisted credential state');
    });
  }

  /**
   * Replace the state only while `expected` is still the current snapshot.
   * Resolves false, writing nothing, when another login, refresh or logout
   * got there first.
   */
  async replaceIfCurrent(expected: CredentialState, state: CredentialState): Promise<boolean> {
    if (this.cached !== expected) {
      return false;
    }
    await this.replace(state);
    return true;
  }

  /**
   * Clear only while `expected` is still the current snapshot.
   */
  async clearIfCurrent(expected: CredentialState): Promise<boolean> {
    if (this.cached !== expected) {
      return false;
    }
    await this.clear();
    return true;
  }

  /**
   * Drop the cached and stored state. Clearing an empty repository succeeds.
   */
  async clear(): Promise<void> {
    this.cached = null;

    await this.enqueue(async () => {
      let removed = false;
      try {
        removed = await this.store.delete(this.key);
      } catch (error) {
        this.logger.error('Failed to remove credential state', error);
        throw new CredentialStoreError('Failed to remove credential state', { cause: error });
      }
      if (!removed) {
        this.logger.error('Failed to remove credential state');
        throw new CredentialStoreError('Failed to remove credential state');
      }
      this.logger.debug('Removed credential state');
    });
  }

  private async hydrate(): Promise<CredentialState | null> {
    let loaded: CredentialState | null = null;
    try {
      const serialized = await this.store.get(this.key);
      if (serialized) {
        loaded = deserializeCredentialState(serialized);
        this.logger.debug('Loaded credential state from the secret store');
      } else {
        this.logger.debug('No stored credential state');
      }
    } catch (error) {
      this.logger.error('Failed to load credential state from the secret store', error);
    }

    // A mutation made while the store was being read wins.
    if (this.cached === undefined) {
      this.cached = loaded;
    }
    return this.cached;
  }

  private enqueue(operation: () => Promise<void>): Promise<void> {
    const run = this.writeQueue.then(operation);
    // Later writes still run after a failed one.
    this.writeQueue = run.catch(() => undefined);
    return run;
  }
}
