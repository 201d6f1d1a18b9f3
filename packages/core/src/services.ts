import { ClaimKey } from './claims.js';
import type { ClaimsResolver } from './claims.js';
import type { EntitlementsClient, FetchEntitlementsOptions } from './entitlements-api.js';
import { asJsonObject, toDisplayString, toJsonValue, toLooseBoolean, toLooseInteger } from './json.js';
import type { JsonObject, JsonValue } from './json.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { Claim, Entitlement, EntitlementsPage } from './types.js';

/**
 * Read a mapping claim that may arrive either as a JSON-encoded string or
 * as an object. Anything else reads as an empty mapping.
 */
async function readMappingClaim(claims: ClaimsResolver, key: string, logger: Logger): Promise<JsonObject> {
  const claim = await claims.getClaim(key);
  const raw = claim?.value;

  if (typeof raw === 'string') {
    try {
      return asJsonObject(toJsonValue(JSON.parse(raw))) ?? {};
    } catch (error) {
      logger.error(`Failed to parse ${key} claim as JSON`, error);
      return {};
    }
  }
  return asJsonObject(raw) ?? {};
}

export class ClaimsService {
  constructor(private readonly claims: ClaimsResolver) {}

  getClaim(key: string): Promise<Claim | null> {
    return this.claims.getClaim(key);
  }

  /** Whether `name` is granted. False when the claims are unavailable. */
  async getPermission(name: string): Promise<boolean> {
    const permission = await this.claims.getPermission(name);
    return permission?.isGranted ?? false;
  }
}

export class FeatureFlagsService {
  constructor(
    private readonly claims: ClaimsResolver,
    private readonly logger: Logger = silentLogger,
  ) {}

  getFeatureFlags(): Promise<JsonObject> {
    return readMappingClaim(this.claims, ClaimKey.featureFlags, this.logger);
  }

  async getFeatureFlag(code: string): Promise<JsonValue | undefined> {
    const flags = await this.getFeatureFlags();
    return flags[code];
  }

  /**
   * Boolean view of a flag. Accepts both the `{ t, v }` claim encoding and
   * a bare value, including the strings "true" and "false".
   */
  async isFeatureEnabled(code: string, defaultValue = false): Promise<boolean> {
    const flag = await this.getFeatureFlag(code);
    if (flag === undefined) {
      return defaultValue;
    }
    const encoded = asJsonObject(flag);
    const value = encoded && 'v' in encoded ? encoded.v : flag;
    return toLooseBoolean(value) ?? defaultValue;
  }
}

/**
 * Entitlements from two sources: the `entitlements` token claim (cheap,
 * possibly stale) and the account API (authoritative, paginated).
 */
export class EntitlementsService {
  constructor(
    private readonly claims: ClaimsResolver,
    private readonly client: EntitlementsClient,
    private readonly logger: Logger = silentLogger,
  ) {}

  getEntitlements(): Promise<JsonObject> {
    return readMappingClaim(this.claims, ClaimKey.entitlements, this.logger);
  }

  async getEntitlement(featureKey: string): Promise<JsonValue | undefined> {
    const entitlements = await this.getEntitlements();
    return entitlements[featureKey];
  }

  async hasEntitlement(featureKey: string): Promise<boolean> {
    const value = await this.getEntitlement(featureKey);
    return value !== undefined && value !== null;
  }

  async getBooleanEntitlement(featureKey: string, defaultValue = false): Promise<boolean> {
    const value = await this.getEntitlement(featureKey);
    return toLooseBoolean(value) ?? defaultValue;
  }

  async getStringEntitlement(featureKey: string, defaultValue = ''): Promise<string> {
    const value = await this.getEntitlement(featureKey);
    return value === undefined || value === null ? defaultValue : toDisplayString(value);
  }

  async getNumericEntitlement(featureKey: string, defaultValue = 0): Promise<number> {
    const value = await this.getEntitlement(featureKey);
    return toLooseInteger(value) ?? defaultValue;
  }

  /**
   * Run `validate` and fall back to `fallback` when it yields nothing.
   * Never throws on a missing value.
   */
  performHardCheck<T>(checkName: string, validate: () => T | null | undefined, fallback: T): T {
    const result = validate();
    if (result === null || result === undefined) {
      this.logger.warn(`Hard check '${checkName}' failed, using fallback`, fallback);
      return fallback;
    }
    return result;
  }

  fetchEntitlements(options?: FetchEntitlementsOptions): Promise<EntitlementsPage> {
    return this.client.fetchEntitlements(options);
  }

  fetchEntitlement(): Promise<Entitlement> {
    return this.client.fetchEntitlement();
  }

  getAllEntitlements(): Promise<Entitlement[]> {
    return this.client.getAllEntitlements();
  }

  /** Every remote entitlement keyed by `key`; later pages win on duplicates. */
  async getEntitlementsDictionary(): Promise<Record<string, JsonValue>> {
    const entitlements = await this.client.getAllEntitlements();
    const dictionary: Record<string, JsonValue> = {};
    for (const entitlement of entitlements) {
      dictionary[entitlement.key] = entitlement.value;
    }
    return dictionary;
  }
}
