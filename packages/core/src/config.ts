import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { readJson } from './fs-utils.js';

export const DEFAULT_SCOPE = 'openid profile email offline';

export interface AuthConfigInit {
  issuer: string;
  clientId: string;
  redirectUri: string;
  postLogoutRedirectUri: string;
  scope: string;
  /** Requested API audience, sent only when non-empty */
  audience?: string;
}

/**
 * Issuer, client and redirect settings. Values are kept as given; the URL
 * accessors return null for anything missing or malformed.
 */
export class AuthConfig {
  readonly issuer: string;
  readonly clientId: string;
  readonly redirectUri: string;
  readonly postLogoutRedirectUri: string;
  readonly scope: string;
  readonly audience?: string;

  constructor(init: AuthConfigInit) {
    this.issuer = init.issuer;
    this.clientId = init.clientId;
    this.redirectUri = init.redirectUri;
    this.postLogoutRedirectUri = init.postLogoutRedirectUri;
    this.scope = init.scope;
    this.audience = init.audience;
    Object.freeze(this);
  }

  getIssuerUrl(): URL | null {
    return parseUrl(this.issuer);
  }

  getRedirectUrl(): URL | null {
    return parseUrl(this.redirectUri);
  }

  getPostLogoutRedirectUrl(): URL | null {
    return parseUrl(this.postLogoutRedirectUri);
  }
}

function parseUrl(value: string): URL | null {
  if (!value) return null;
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

const absoluteUrl = z.string().trim().url();

const ConfigFileSchema = z.object({
  issuer: absoluteUrl,
  clientId: z.string().trim().min(1),
  redirectUri: absoluteUrl,
  postLogoutRedirectUri: absoluteUrl,
  scope: z.string().trim().min(1).default(DEFAULT_SCOPE),
  audience: z.string().trim().optional(),
});

function parseConfig(value: unknown, source: string): AuthConfig {
  const parsed = ConfigFileSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'config';
    throw new ConfigurationError(`Invalid ${source}: ${field} ${issue?.message ?? 'is invalid'}`);
  }

  const { audience, ...rest } = parsed.data;
  return new AuthConfig({ ...rest, audience: audience || undefined });
}

/**
 * Load configuration from a JSON file with `issuer`, `clientId`,
 * `redirectUri`, `postLogoutRedirectUri`, `scope` and optional `audience`.
 */
export async function loadConfigFromFile(path: string): Promise<AuthConfig> {
  let value: unknown;
  try {
    value = await readJson(path);
  } catch (error) {
    throw new ConfigurationError(`Unable to read auth config from ${path}`, { cause: error });
  }
  return parseConfig(value, `auth config ${path}`);
}

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Load configuration from AUTH_* environment variables.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AuthConfig {
  return parseConfig(
    {
      issuer: readEnv(env, 'AUTH_ISSUER'),
      clientId: readEnv(env, 'AUTH_CLIENT_ID'),
      redirectUri: readEnv(env, 'AUTH_REDIRECT_URI'),
      postLogoutRedirectUri: readEnv(env, 'AUTH_POST_LOGOUT_REDIRECT_URI'),
      scope: readEnv(env, 'AUTH_SCOPE'),
      audience: readEnv(env, 'AUTH_AUDIENCE'),
    },
    'auth environment',
  );
}
