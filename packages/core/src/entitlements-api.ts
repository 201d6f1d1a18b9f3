/**
 * Account API client for entitlements.
 *
 * GET {issuer}/account_api/v1/entitlements?page_size=&starting_after=
 * GET {issuer}/account_api/v1/entitlement
 *
 * Both calls carry the current access token as a bearer credential and
 * therefore require an authenticated session.
 */

import { z } from 'zod';
import type { AuthConfig } from './config.js';
import { DecodingError, InvalidResponseError, InvalidUrlError, ServerError } from './errors.js';
import { toJsonValue } from './json.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { Entitlement, EntitlementsPage, TokenKind } from './types.js';

export const ENTITLEMENTS_PATH = '/account_api/v1/entitlements';
export const ENTITLEMENT_PATH = '/account_api/v1/entitlement';

/** Anything that hands out a currently valid access token. */
export interface AccessTokenSource {
  getToken(kind?: TokenKind): Promise<string>;
}

export interface FetchEntitlementsOptions {
  pageSize?: number;
  startingAfter?: string;
}

export interface EntitlementsClientOptions {
  config: AuthConfig;
  tokens: AccessTokenSource;
  fetch?: typeof fetch;
  logger?: Logger;
}

const EntitlementSchema = z
  .object({
    key: z.string(),
    value: z.unknown(),
    type: z.string().nullish(),
  })
  .transform(
    (entry): Entitlement => ({
      key: entry.key,
      value: toJsonValue(entry.value) ?? null,
      type: entry.type ?? undefined,
    }),
  );

const EntitlementsResponseSchema = z.object({
  data: z.object({
    org_code: z.string(),
    plans: z.array(
      z.object({
        code: z.string(),
        name: z.string().nullish(),
        description: z.string().nullish(),
      }),
    ),
    entitlements: z.array(EntitlementSchema),
  }),
  metadata: z.object({
    has_more: z.boolean(),
    next_page_starting_after: z.string().nullish(),
  }),
});

const EntitlementResponseSchema = z.object({
  data: EntitlementSchema,
});

export class EntitlementsClient {
  private readonly config: AuthConfig;
  private readonly tokens: AccessTokenSource;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: EntitlementsClientOptions) {
    this.config = options.config;
    this.tokens = options.tokens;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? silentLogger;
  }

  /** One page of entitlements plus the cursor for the next. */
  async fetchEntitlements(options: FetchEntitlementsOptions = {}): Promise<EntitlementsPage> {
    const url = this.buildUrl(ENTITLEMENTS_PATH);
    if (options.pageSize !== undefined) {
      url.searchParams.set('page_size', String(options.pageSize));
    }
    if (options.startingAfter !== undefined) {
      url.searchParams.set('starting_after', options.startingAfter);
    }

    const body = await this.get(url, 'entitlements');
    const parsed = EntitlementsResponseSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.error('Failed to decode entitlements response', parsed.error.issues);
      throw new DecodingError('Unexpected entitlements response shape');
    }

    const { data, metadata } = parsed.data;
    return {
      data: {
        orgCode: data.org_code,
        plans: data.plans.map((plan) => ({
          code: plan.code,
          name: plan.name ?? undefined,
          description: plan.description ?? undefined,
        })),
        entitlements: data.entitlements,
      },
      metadata: {
        hasMore: metadata.has_more,
        nextPageStartingAfter: metadata.next_page_starting_after ?? undefined,
      },
    };
  }

  async fetchEntitlement(): Promise<Entitlement> {
    const body = await this.get(this.buildUrl(ENTITLEMENT_PATH), 'entitlement');
    const parsed = EntitlementResponseSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.error('Failed to decode entitlement response', parsed.error.issues);
      throw new DecodingError('Unexpected entitlement response shape');
    }
    return parsed.data.data;
  }

  /**
   * Every entitlement across all pages, in arrival order. A failed page
   * fails the whole call.
   */
  async getAllEntitlements(): Promise<Entitlement[]> {
    const all: Entitlement[] = [];
    let startingAfter: string | undefined;

    for (;;) {
      const page = await this.fetchEntitlements({ startingAfter });
      all.push(...page.data.entitlements);
      if (!page.metadata.hasMore || !page.metadata.nextPageStartingAfter) {
        return all;
      }
      startingAfter = page.metadata.nextPageStartingAfter;
    }
  }

  private buildUrl(path: string): URL {
    const base = this.config.getIssuerUrl();
    if (!base) {
      throw new InvalidUrlError(`Cannot build ${path} URL from issuer "${this.config.issuer}"`);
    }
    return new URL(path, base);
  }

  private async get(url: URL, what: string): Promise<unknown> {
    const token = await this.tokens.getToken();

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: 'application/json',
        },
      });
    } catch (error) {
      throw new InvalidResponseError(`Request for ${what} failed`, { cause: error });
    }

    if (response.status !== 200) {
      this.logger.error(`Failed to fetch ${what}. Status: ${response.status}`);
      throw new ServerError(response.status);
    }

    try {
      return await response.json();
    } catch (error) {
      this.logger.error(`Failed to decode ${what} response`, error);
      throw new DecodingError(`Response for ${what} is not valid JSON`, { cause: error });
    }
  }
}
