/**
 * Authorization facts read from the current tokens.
 *
 * Payloads are decoded on every call so results always follow the latest
 * refresh. Presence queries (claims, permissions, organizations) fail soft
 * to null; typed flag lookups reject with FlagError.
 */

import { isCredentialAuthenticated } from './credential.js';
import type { CredentialRepository } from './credential-repository.js';
import { FlagIncorrectTypeError, FlagNotFoundError, FlagUnknownError } from './errors.js';
import { asBoolean, asInteger, asJsonObject, asString, asStringArray } from './json.js';
import type { JsonValue } from './json.js';
import { decodeClaims } from './jwt.js';
import type {
  Claim,
  Flag,
  FlagType,
  Organization,
  Permission,
  Permissions,
  TokenKind,
  UserDetails,
  UserOrganizations,
} from './types.js';

export const ClaimKey = {
  permissions: 'permissions',
  organizationCode: 'org_code',
  organizationCodes: 'org_codes',
  featureFlags: 'feature_flags',
  entitlements: 'entitlements',
} as const;

const FLAG_TYPES: Record<FlagType, string> = {
  s: 'string',
  i: 'integer',
  b: 'boolean',
};

function isFlagType(value: string): value is FlagType {
  return value in FLAG_TYPES;
}

export class ClaimsResolver {
  constructor(
    private readonly repository: CredentialRepository,
    private readonly now: () => number = Date.now,
  ) {}

  /** Last known authorization result, regardless of token expiry. */
  async isAuthorized(): Promise<boolean> {
    const state = await this.repository.current();
    return state?.isAuthorized ?? false;
  }

  /** Authorized with an access token that has not yet expired. */
  async isAuthenticated(): Promise<boolean> {
    return isCredentialAuthenticated(await this.repository.current(), this.now());
  }

  async getClaim(key: string, token: TokenKind = 'access'): Promise<Claim | null> {
    const state = await this.repository.current();
    const claims = decodeClaims(token === 'access' ? state?.accessToken : state?.idToken);
    const value = claims?.[key];
    if (value === undefined || value === null) {
      return null;
    }
    return { name: key, value };
  }

  async getUserDetails(): Promise<UserDetails | null> {
    const state = await this.repository.current();
    const claims = decodeClaims(state?.idToken);
    const id = asString(claims?.sub);
    const email = asString(claims?.email);
    if (!claims || !id || !email) {
      return null;
    }
    return {
      id,
      email,
      givenName: asString(claims.given_name),
      familyName: asString(claims.family_name),
      picture: asString(claims.picture),
    };
  }

  async getPermissions(): Promise<Permissions | null> {
    const [permissions, organization] = await Promise.all([this.readPermissions(), this.getOrganization()]);
    if (!permissions || !organization) {
      return null;
    }
    return { organization, permissions };
  }

  async getPermission(name: string): Promise<Permission | null> {
    const permissions = await this.getPermissions();
    if (!permissions) {
      return null;
    }
    return {
      organization: permissions.organization,
      isGranted: permissions.permissions.includes(name),
    };
  }

  async getOrganization(): Promise<Organization | null> {
    const claim = await this.getClaim(ClaimKey.organizationCode);
    const code = asString(claim?.value);
    return code ? { code } : null;
  }

  async getUserOrganizations(): Promise<UserOrganizations | null> {
    const claim = await this.getClaim(ClaimKey.organizationCodes, 'id');
    const codes = asStringArray(claim?.value);
    if (!codes) {
      return null;
    }
    return { orgCodes: codes.map((code) => ({ code })) };
  }

  /**
   * Look up a feature flag from the `feature_flags` claim
   * (`{ code: { t: "s" | "i" | "b", v: value } }`).
   *
   * @throws FlagUnknownError when the claim is missing or not a mapping
   * @throws FlagIncorrectTypeError when `expectedType` differs from the flag's declared type
   * @throws FlagNotFoundError when the code is absent and no default was given
   */
  async getFlag(code: string, defaultValue?: JsonValue, expectedType?: FlagType): Promise<Flag> {
    const claim = await this.getClaim(ClaimKey.featureFlags);
    const flags = asJsonObject(claim?.value);
    if (!flags) {
      throw new FlagUnknownError();
    }

    const entry = asJsonObject(flags[code]);
    const declaredType = asString(entry?.t);
    const value = entry?.v;

    if (declaredType && isFlagType(declaredType) && value !== undefined) {
      if (expectedType && expectedType !== declaredType) {
        throw new FlagIncorrectTypeError(
          `Flag "${code}" is type ${FLAG_TYPES[declaredType]} - requested type ${FLAG_TYPES[expectedType]}`,
        );
      }
      return { code, type: declaredType, value, isDefault: false };
    }

    if (defaultValue !== undefined) {
      return { code, value: defaultValue, isDefault: true };
    }
    throw new FlagNotFoundError(code);
  }

  async getBooleanFlag(code: string, defaultValue?: boolean): Promise<boolean> {
    const flag = await this.getFlag(code, defaultValue, 'b');
    return orDefault(code, asBoolean(flag.value), defaultValue);
  }

  async getStringFlag(code: string, defaultValue?: string): Promise<string> {
    const flag = await this.getFlag(code, defaultValue, 's');
    return orDefault(code, asString(flag.value), defaultValue);
  }

  async getIntegerFlag(code: string, defaultValue?: number): Promise<number> {
    const flag = await this.getFlag(code, defaultValue, 'i');
    return orDefault(code, asInteger(flag.value), defaultValue);
  }

  private async readPermissions(): Promise<string[] | null> {
    const claim = await this.getClaim(ClaimKey.permissions);
    return asStringArray(claim?.value) ?? null;
  }
}

function orDefault<T>(code: string, value: T | undefined, defaultValue: T | undefined): T {
  if (value !== undefined) return value;
  if (defaultValue !== undefined) return defaultValue;
  throw new FlagNotFoundError(code);
}
