import fs from 'node:fs';
import path from 'node:path';
import { fileSignature, isNodeError, isRecord } from './helpers.js';

export const ADMIN_USERNAME = 'admin';
export const ADMIN_FOLDER = '/';

interface FolderMapDocument {
  users: Record<string, string>;
}

function resolveFolderMapPath(rawPath: string | undefined): string {
  if (typeof rawPath === 'string' && rawPath.trim().length > 0) {
    return path.resolve(rawPath.trim());
  }
  return path.resolve(process.cwd(), 'vfs-folders.json');
}

function parseFolderMapDocument(raw: string, filePath: string): Map<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const text = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid folder map in ${filePath}: ${text}`);
  }

  const output = new Map<string, string>();
  if (!isRecord(parsed)) {
    throw new Error(`Invalid folder map in ${filePath}: expected an object`);
  }
  const users = parsed.users;
  if (!isRecord(users) || Array.isArray(users)) {
    return output;
  }
  for (const [username, folder] of Object.entries(users)) {
    if (username.length > 0 && typeof folder === 'string') {
      output.set(username, folder);
    }
  }
  return output;
}

/**
 * username -> sandbox subfolder table, persisted as one small JSON document.
 * Loaded and saved only when the owning gateway starts, stops or changes an account.
 */
export class FolderMapStore {
  private readonly filePath: string;
  private folders = new Map<string, string>([[ADMIN_USERNAME, ADMIN_FOLDER]]);
  private signature: string | null = null;
  private dirty = false;

  constructor(filePath?: string) {
    this.filePath = resolveFolderMapPath(filePath);
  }

  async load(): Promise<void> {
    const signature = fileSignature(this.filePath);
    let raw: string | null = null;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!isNodeError(error) || error.code !== 'ENOENT') {
        throw error;
      }
    }

    const next = raw === null ? new Map<string, string>() : parseFolderMapDocument(raw, this.filePath);
    if (!next.has(ADMIN_USERNAME)) {
      next.set(ADMIN_USERNAME, ADMIN_FOLDER);
    }
    this.folders = next;
    this.signature = signature;
    this.dirty = false;
  }

  /** Reloads when another process rewrote the file and nothing is pending here. */
  async refresh(): Promise<void> {
    if (this.dirty || fileSignature(this.filePath) === this.signature) {
      return;
    }
    await this.load();
  }

  /** True when `set`/`remove` changed the table since the last load or save. */
  isDirty(): boolean {
    return this.dirty;
  }

  async save(): Promise<void> {
    const users: Record<string, string> = {};
    for (const username of [...this.folders.keys()].sort()) {
      const folder = this.folders.get(username);
      if (folder !== undefined) {
        users[username] = folder;
      }
    }
    const document: FolderMapDocument = { users };
    const tmpPath = `${this.filePath}.tmp`;

    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.promises.writeFile(tmpPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
    await fs.promises.rename(tmpPath, this.filePath);
    this.signature = fileSignature(this.filePath);
    this.dirty = false;
  }

  /** Falls back to the username when no explicit mapping exists. */
  get(username: string): string {
    return this.folders.get(username) ?? username;
  }

  has(username: string): boolean {
    return this.folders.has(username);
  }

  set(username: string, folder: string): void {
    if (!username) {
      throw new Error('username is required');
    }
    this.folders.set(username, folder);
    this.dirty = true;
  }

  remove(username: string): boolean {
    if (username === ADMIN_USERNAME) {
      return false;
    }
    if (!this.folders.delete(username)) {
      return false;
    }
    this.dirty = true;
    return true;
  }

  entries(): Array<[string, string]> {
    return [...this.folders.entries()];
  }
}
