import { access, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
import { dirname } from 'node:path';

function messageFromError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function withCause(message: string, error: unknown): Error {
  return error instanceof Error ? new Error(message, { cause: error }) : new Error(message);
}

export async function exists(path: string): Promise<boolean> {
  try {
    await access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    throw withCause(`Failed to read file '${path}': ${messageFromError(error)}`, error);
  }
}

export async function readJson(path: string): Promise<unknown> {
  const text = await readText(path);

  try {
    return JSON.parse(text);
  } catch (error) {
    throw withCause(`Invalid JSON in '${path}': ${messageFromError(error)}`, error);
  }
}

/**
 * Write through a temp file and rename, so readers never see a partial file.
 */
export async function writeTextAtomic(path: string, value: string, mode?: number): Promise<void> {
  const tempPath = `${path}.${process.pid}.${Date.now()}.tmp`;

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, value, { encoding: 'utf8', mode });
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw withCause(`Failed to write file '${path}': ${messageFromError(error)}`, error);
  }
}

export async function removeFile(path: string): Promise<void> {
  await rm(path, { force: true });
}
