/**
 * Loopback presentation surface.
 *
 * The authorization URL is handed to an `open` hook (a browser launcher, or
 * a log line telling the user where to go). The provider then redirects to
 * a route served by this process, which passes the query string to
 * `handleCallback`. Pending presentations are keyed by `state`.
 */

import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { AuthorizationCallback, AuthorizationRequest, PresentOptions, PresentationSurface } from './types.js';

export type OpenUrl = (url: string, options: PresentOptions) => void | Promise<void>;

export interface CallbackSurfaceOptions {
  /** Default: log the URL at info level */
  open?: OpenUrl;
  logger?: Logger;
}

interface PendingPresentation {
  request: AuthorizationRequest;
  resolve: (callback: AuthorizationCallback) => void;
}

/**
 * Read `code`, `state`, `error` and `error_description` from a redirect
 * query. Null when it carries neither a code nor an error.
 */
export function parseCallbackParams(params: URLSearchParams): AuthorizationCallback | null {
  const state = params.get('state') ?? undefined;
  const error = params.get('error');
  if (error) {
    return { error, errorDescription: params.get('error_description') ?? undefined, state };
  }
  const code = params.get('code');
  if (code) {
    return { code, state };
  }
  return null;
}

/** Page shown in the browser once the redirect has been received. */
export function renderCallbackPage(callback: AuthorizationCallback | null): string {
  const message = callback && 'code' in callback ? 'Sign-in complete.' : 'Sign-in did not complete.';
  return `<!doctype html><html><head><title>${message}</title></head><body><p>${message} You can close this window.</p></body></html>`;
}

export class CallbackSurface implements PresentationSurface {
  private readonly open: OpenUrl;
  private readonly logger: Logger;
  private readonly pending = new Map<string, PendingPresentation>();

  constructor(options: CallbackSurfaceOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.open =
      options.open ??
      ((url) => {
        this.logger.info(`Open this URL to continue signing in: ${url}`);
      });
  }

  present(request: AuthorizationRequest, options: PresentOptions): Promise<AuthorizationCallback> {
    return new Promise<AuthorizationCallback>((resolve, reject) => {
      this.pending.set(request.state, { request, resolve });

      Promise.resolve()
        .then(() => this.open(request.url, options))
        .catch((error: unknown) => {
          this.pending.delete(request.state);
          reject(error);
        });
    });
  }

  /** URL of the most recent presentation still waiting for its redirect. */
  pendingUrl(): string | null {
    let url: string | null = null;
    for (const { request } of this.pending.values()) {
      url = request.url;
    }
    return url;
  }

  /**
   * Deliver a redirect query to the presentation it belongs to. Returns
   * false when the query is not a callback or matches no pending state.
   */
  handleCallback(params: URLSearchParams): boolean {
    const callback = parseCallbackParams(params);
    if (!callback) {
      this.logger.warn('Ignoring redirect without code or error');
      return false;
    }

    const entry = callback.state === undefined ? undefined : this.pending.get(callback.state);
    if (!entry) {
      this.logger.warn('Ignoring redirect for an unknown authorization state');
      return false;
    }

    this.pending.delete(entry.request.state);
    entry.resolve(callback);
    return true;
  }
}
