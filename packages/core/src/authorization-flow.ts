/**
 * Authorization flow controller
 *
 * Drives one interactive authorization at a time:
 *
 *   idle -> awaiting_callback -> succeeded | cancelled | failed
 *
 * The request is handed to a presentation surface; whatever comes back
 * (code, provider error, or a failure of the surface itself) goes through
 * one completion path that decides what happens to the stored credential.
 */

import { isCredentialAuthenticated } from './credential.js';
import type { CredentialRepository } from './credential-repository.js';
import {
  AuthorizationFlowError,
  FailedToSaveStateError,
  FlowInProgressError,
  NotAuthenticatedError,
  isUserCancellationError,
} from './errors.js';
import { asString } from './json.js';
import { decodeClaims } from './jwt.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { AuthorizationCallback, AuthorizationRequest, CredentialState, PresentationSurface } from './types.js';

export type FlowStatus = 'idle' | 'awaiting_callback' | 'succeeded' | 'cancelled' | 'failed';

/** Redeems an authorization code. Satisfied by OidcClient. */
export interface CodeExchanger {
  exchangeCode(code: string, request: AuthorizationRequest): Promise<CredentialState>;
}

export interface AuthorizationFlowControllerOptions {
  repository: CredentialRepository;
  exchanger: CodeExchanger;
  logger?: Logger;
  now?: () => number;
}

type FlowOutcome = { ok: true; state: CredentialState | null } | { ok: false; error: unknown };

function emailOf(idToken: string | undefined): string | undefined {
  return asString(decodeClaims(idToken)?.email);
}

export class AuthorizationFlowController {
  private readonly repository: CredentialRepository;
  private readonly exchanger: CodeExchanger;
  private readonly logger: Logger;
  private readonly now: () => number;
  private inFlight: AuthorizationRequest | null = null;
  private currentStatus: FlowStatus = 'idle';
  private ephemeral = false;

  constructor(options: AuthorizationFlowControllerOptions) {
    this.repository = options.repository;
    this.exchanger = options.exchanger;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  get status(): FlowStatus {
    return this.currentStatus;
  }

  get isInProgress(): boolean {
    return this.inFlight !== null;
  }

  /** Ask surfaces not to reuse browser session state across presentations. */
  enablePrivateSession(enabled: boolean): void {
    this.ephemeral = enabled;
  }

  /**
   * Present `request` and settle the credential state from its callback.
   * Resolves once the new state is stored (or the current one kept).
   *
   * @throws FlowInProgressError when another flow is awaiting its callback
   */
  async start(request: AuthorizationRequest, surface: PresentationSurface): Promise<void> {
    if (this.inFlight) {
      throw new FlowInProgressError();
    }
    this.inFlight = request;
    this.currentStatus = 'awaiting_callback';

    let outcome: FlowOutcome;
    try {
      const callback = await surface.present(request, { ephemeral: this.ephemeral });
      outcome = { ok: true, state: await this.redeem(request, callback) };
    } catch (error) {
      outcome = { ok: false, error };
    }

    try {
      await this.complete(outcome);
    } finally {
      this.inFlight = null;
    }
  }

  private async redeem(request: AuthorizationRequest, callback: AuthorizationCallback): Promise<CredentialState | null> {
    if ('error' in callback) {
      throw new AuthorizationFlowError(callback.error, callback.errorDescription);
    }
    if (callback.state !== request.state) {
      throw new AuthorizationFlowError('state_mismatch', 'Callback state does not match the request');
    }
    if (!callback.code) {
      return null;
    }
    return this.exchanger.exchangeCode(callback.code, request);
  }

  private async complete(outcome: FlowOutcome): Promise<void> {
    if (!outcome.ok) {
      this.logger.error('Failed to finish authentication flow', outcome.error);
      await this.clearQuietly();
      this.currentStatus = isUserCancellationError(outcome.error) ? 'cancelled' : 'failed';
      throw outcome.error;
    }

    if (!outcome.state) {
      this.logger.error('Failed to get authentication state');
      await this.clearQuietly();
      this.currentStatus = 'failed';
      throw new NotAuthenticatedError();
    }

    if (await this.shouldPreserve(outcome.state)) {
      this.logger.debug('Keeping the current session for the same user');
    } else {
      try {
        await this.repository.replace(outcome.state);
      } catch (error) {
        this.currentStatus = 'failed';
        throw new FailedToSaveStateError('Failed to save credential state', { cause: error });
      }
    }
    this.currentStatus = 'succeeded';
  }

  /**
   * The current session is still authenticated and the new ID token names
   * the same email as the stored one.
   */
  private async shouldPreserve(next: CredentialState): Promise<boolean> {
    const current = await this.repository.current();
    if (!isCredentialAuthenticated(current, this.now())) {
      return false;
    }
    const nextEmail = emailOf(next.idToken);
    const currentEmail = emailOf(current?.idToken);
    return nextEmail !== undefined && nextEmail === currentEmail;
  }

  private async clearQuietly(): Promise<void> {
    try {
      await this.repository.clear();
    } catch (error) {
      this.logger.error('Failed to clear credential state after a failed flow', error);
    }
  }
}
