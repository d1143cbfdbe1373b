import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { fileSignature, isRecord } from './helpers.js';
import { LoginLockout } from './security.js';

const HASH_PREFIX = 'scrypt';
const SALT_BYTES = 16;
const KEY_BYTES = 64;

export type UserRole = 'admin' | 'file-user';

export interface UserRecord {
  username: string;
  passwordHash: string;
  role: UserRole;
  createdAt: string;
}

/** Password checks plus the failed-attempt bookkeeping that backs account lockout. */
export interface CredentialVerifier {
  hasUser(username: string): boolean;
  verify(username: string, password: string): Promise<boolean>;
  isLocked(username: string): boolean;
  recordFailure(username: string): void;
  resetFailures(username: string): void;
  /** Picks up changes made by another process; returns the accounts that disappeared. */
  refresh(): string[];
}

export interface UserRegistry {
  createAccount(username: string, password: string, role?: UserRole): Promise<void>;
  deleteAccount(username: string): Promise<boolean>;
}

export interface FileUserStoreOptions {
  filePath?: string;
  lockout?: LoginLockout;
}

function resolveUsersPath(rawPath: string | undefined): string {
  if (typeof rawPath === 'string' && rawPath.trim().length > 0) {
    return path.resolve(rawPath.trim());
  }
  return path.resolve(process.cwd(), '.vfs-users.json');
}

function normalizeRole(value: unknown): UserRole {
  return value === 'admin' ? 'admin' : 'file-user';
}

function toUserRecord(row: unknown): UserRecord | null {
  if (!isRecord(row)) {
    return null;
  }
  if (typeof row.username !== 'string' || row.username.length === 0) {
    return null;
  }
  if (typeof row.passwordHash !== 'string' || !row.passwordHash.startsWith(`${HASH_PREFIX}$`)) {
    return null;
  }
  return {
    username: row.username,
    passwordHash: row.passwordHash,
    role: normalizeRole(row.role),
    createdAt: typeof row.createdAt === 'string' ? row.createdAt : new Date(0).toISOString()
  };
}

function deriveKey(password: string, salt: Buffer, length: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, length, (error, key) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(key);
    });
  });
}

export function isValidUsername(username: string): boolean {
  return /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,63}$/.test(username) && !username.includes('..');
}

export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SALT_BYTES);
  const key = await deriveKey(password, salt, KEY_BYTES);
  return `${HASH_PREFIX}$${salt.toString('base64url')}$${key.toString('base64url')}`;
}

export async function verifyPasswordHash(password: string, stored: string): Promise<boolean> {
  const [prefix, saltText, keyText] = stored.split('$');
  if (prefix !== HASH_PREFIX || !saltText || !keyText) {
    return false;
  }
  const expected = Buffer.from(keyText, 'base64url');
  if (expected.length === 0) {
    return false;
  }
  const actual = await deriveKey(password, Buffer.from(saltText, 'base64url'), expected.length);
  return actual.length === expected.length && timingSafeEqual(actual, expected);
}

/**
 * Accounts kept in a small JSON file with scrypt password hashes.
 * The whole file is rewritten on every change.
 */
export class FileUserStore implements CredentialVerifier, UserRegistry {
  private readonly filePath: string;
  private readonly lockout: LoginLockout;
  private users = new Map<string, UserRecord>();
  private signature: string | null = null;

  constructor(options: FileUserStoreOptions = {}) {
    this.filePath = resolveUsersPath(options.filePath);
    this.lockout = options.lockout ?? new LoginLockout({ maxFailures: 5, lockMs: 15 * 60_000 });
    this.loadSync();
  }

  refresh(): string[] {
    if (fileSignature(this.filePath) === this.signature) {
      return [];
    }
    const before = [...this.users.keys()];
    this.loadSync();
    const removed = before.filter((username) => !this.users.has(username));
    for (const username of removed) {
      this.lockout.reset(username);
    }
    return removed;
  }

  hasUser(username: string): boolean {
    return this.users.has(username);
  }

  listUsers(): Array<Omit<UserRecord, 'passwordHash'>> {
    return [...this.users.values()].map((record) => ({
      username: record.username,
      role: record.role,
      createdAt: record.createdAt
    }));
  }

  async verify(username: string, password: string): Promise<boolean> {
    const record = this.users.get(username);
    if (!record) {
      return false;
    }
    return verifyPasswordHash(password, record.passwordHash);
  }

  isLocked(username: string): boolean {
    return this.lockout.isLocked(username);
  }

  recordFailure(username: string): void {
    this.lockout.recordFailure(username);
  }

  resetFailures(username: string): void {
    this.lockout.reset(username);
  }

  async createAccount(username: string, password: string, role: UserRole = 'file-user'): Promise<void> {
    this.refresh();
    if (!isValidUsername(username)) {
      throw new Error(`invalid username: ${username}`);
    }
    if (!password) {
      throw new Error('password is required');
    }
    if (this.users.has(username)) {
      throw new Error(`user already exists: ${username}`);
    }
    this.users.set(username, {
      username,
      passwordHash: await hashPassword(password),
      role,
      createdAt: new Date().toISOString()
    });
    await this.persist();
  }

  async deleteAccount(username: string): Promise<boolean> {
    this.refresh();
    if (!this.users.delete(username)) {
      return false;
    }
    this.lockout.reset(username);
    await this.persist();
    return true;
  }

  private loadSync(): void {
    const signature = fileSignature(this.filePath);
    if (signature === null) {
      this.users = new Map();
      this.signature = null;
      return;
    }
    const raw = fs.readFileSync(this.filePath, 'utf8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const text = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid users file ${this.filePath}: ${text}`);
    }
    const rows = isRecord(parsed) ? parsed.users : undefined;
    const next = new Map<string, UserRecord>();
    for (const row of Array.isArray(rows) ? rows : []) {
      const record = toUserRecord(row);
      if (record) {
        next.set(record.username, record);
      }
    }
    this.users = next;
    this.signature = signature;
  }

  private async persist(): Promise<void> {
    const payload = { users: [...this.users.values()] };
    const tmpPath = `${this.filePath}.tmp`;
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.promises.writeFile(tmpPath, `${JSON.stringify(payload, null, 2)}\n`, { encoding: 'utf8', mode: 0o600 });
    await fs.promises.rename(tmpPath, this.filePath);
    this.signature = fileSignature(this.filePath);
  }
}
