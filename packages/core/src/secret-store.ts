/**
 * Opaque key/value secret persistence.
 *
 * The credential repository serializes its state to a string and keeps it
 * under a single key; stores know nothing about its contents.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { exists, readJson, removeFile, writeTextAtomic } from './fs-utils.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

export interface SecretStore {
  get(key: string): Promise<string | null>;
  /** Returns false when the value could not be stored. */
  put(key: string, value: string): Promise<boolean>;
  /** Returns false when the value could not be removed. Removing a missing key succeeds. */
  delete(key: string): Promise<boolean>;
  exists(key: string): Promise<boolean>;
}

export class MemorySecretStore implements SecretStore {
  private readonly values = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async put(key: string, value: string): Promise<boolean> {
    this.values.set(key, value);
    return true;
  }

  async delete(key: string): Promise<boolean> {
    this.values.delete(key);
    return true;
  }

  async exists(key: string): Promise<boolean> {
    return this.values.has(key);
  }
}

const SECRET_FILE_MODE = 0o600;

const SecretFileSchema = z.record(z.string());

/**
 * JSON map on disk, readable only by the owner. The file is removed once
 * it holds no secrets.
 */
export class FileSecretStore implements SecretStore {
  constructor(
    readonly path: string,
    private readonly logger: Logger = silentLogger,
  ) {}

  async get(key: string): Promise<string | null> {
    const secrets = await this.read();
    return secrets[key] ?? null;
  }

  async put(key: string, value: string): Promise<boolean> {
    try {
      const secrets = await this.read();
      await this.write({ ...secrets, [key]: value });
      return true;
    } catch (error) {
      this.logger.error(`Failed to write secret file ${this.path}`, error);
      return false;
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      const secrets = await this.read();
      if (!(key in secrets)) return true;
      const { [key]: _removed, ...rest } = secrets;
      await this.write(rest);
      return true;
    } catch (error) {
      this.logger.error(`Failed to update secret file ${this.path}`, error);
      return false;
    }
  }

  async exists(key: string): Promise<boolean> {
    const secrets = await this.read();
    return key in secrets;
  }

  private async read(): Promise<Record<string, string>> {
    if (!(await exists(this.path))) {
      return {};
    }
    const parsed = SecretFileSchema.safeParse(await readJson(this.path));
    if (!parsed.success) {
      throw new Error(`Secret file ${this.path} is not a string map`);
    }
    return parsed.data;
  }

  private async write(secrets: Record<string, string>): Promise<void> {
    if (Object.keys(secrets).length === 0) {
      await removeFile(this.path);
      return;
    }
    await writeTextAtomic(this.path, `${JSON.stringify(secrets, null, 2)}\n`, SECRET_FILE_MODE);
  }
}

/** The subset of the optional `keytar` module used here. */
export interface KeytarModule {
  getPassword(service: string, account: string): Promise<string | null>;
  setPassword(service: string, account: string, password: string): Promise<void>;
  deletePassword(service: string, account: string): Promise<boolean>;
}

/**
 * OS credential vault (Keychain, libsecret, Credential Manager) via keytar.
 */
export class KeytarSecretStore implements SecretStore {
  constructor(
    private readonly keytar: KeytarModule,
    private readonly service: string,
    private readonly logger: Logger = silentLogger,
  ) {}

  async get(key: string): Promise<string | null> {
    return this.keytar.getPassword(this.service, key);
  }

  async put(key: string, value: string): Promise<boolean> {
    try {
      await this.keytar.setPassword(this.service, key, value);
      return true;
    } catch (error) {
      this.logger.error(`Failed to store ${key} in the OS credential vault`, error);
      return false;
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      // deletePassword resolves false when nothing was stored, which is still a successful removal
      await this.keytar.deletePassword(this.service, key);
      return true;
    } catch (error) {
      this.logger.error(`Failed to remove ${key} from the OS credential vault`, error);
      return false;
    }
  }

  async exists(key: string): Promise<boolean> {
    return (await this.keytar.getPassword(this.service, key)) !== null;
  }
}

function isKeytarModule(value: unknown): value is KeytarModule {
  return (
    typeof value === 'object' &&
    value !== null &&
    'getPassword' in value &&
    typeof value.getPassword === 'function' &&
    'setPassword' in value &&
    typeof value.setPassword === 'function' &&
    'deletePassword' in value &&
    typeof value.deletePassword === 'function'
  );
}

async function loadKeytar(): Promise<KeytarModule | null> {
  // Kept in a variable so bundlers and tsc do not try to resolve the optional module.
  const specifier = 'keytar';
  try {
    const imported: unknown = await import(specifier);
    const candidate =
      typeof imported === 'object' && imported !== null && 'default' in imported ? imported.default : imported;
    return isKeytarModule(candidate) ? candidate : null;
  } catch {
    return null;
  }
}

export interface CreateSecretStoreOptions {
  /** Keytar service name and config directory name */
  service: string;
  /** Overrides ~/.config/<service>/credentials.json */
  filePath?: string;
  logger?: Logger;
}

/**
 * Prefer the OS credential vault; fall back to an owner-only file.
 */
export async function createSecretStore(options: CreateSecretStoreOptions): Promise<SecretStore> {
  const logger = options.logger ?? silentLogger;
  const keytar = await loadKeytar();
  if (keytar) {
    logger.debug('Using OS credential vault for secrets');
    return new KeytarSecretStore(keytar, options.service, logger);
  }

  const path = options.filePath ?? join(homedir(), '.config', options.service, 'credentials.json');
  logger.debug(`Using ${path} for secrets`);
  return new FileSecretStore(path, logger);
}
