import { randomBytes } from 'node:crypto';
import type { IncomingMessage } from 'node:http';

const DEFAULT_SESSION_TTL_SECONDS = 2 * 60 * 60;
const MIN_SESSION_TTL_SECONDS = 60;
const MAX_SESSION_TTL_SECONDS = 7 * 24 * 60 * 60;

export interface Session {
  token: string;
  username: string;
  expiresAt: number;
}

export interface SessionIssueResult {
  token: string;
  expiresAt: string;
}

export interface SessionStoreOptions {
  ttlSeconds?: number;
  now?: () => number;
}

export function extractBearerToken(raw: unknown): string | null {
  if (typeof raw !== 'string') {
    return null;
  }
  const value = raw.trim();
  if (!value) {
    return null;
  }
  const prefix = 'bearer ';
  if (value.toLowerCase().startsWith(prefix)) {
    const token = value.slice(prefix.length).trim();
    return token || null;
  }
  return null;
}

function createSessionToken(): string {
  return randomBytes(24).toString('base64url');
}

export function normalizeSessionTtlSeconds(input: number | undefined): number {
  if (input === undefined || !Number.isFinite(input)) {
    return DEFAULT_SESSION_TTL_SECONDS;
  }
  return Math.max(MIN_SESSION_TTL_SECONDS, Math.min(Math.trunc(input), MAX_SESSION_TTL_SECONDS));
}

/**
 * In-memory bearer sessions. Tokens are opaque and unrelated to the password;
 * expiry is fixed at issue time and checked lazily on every lookup.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions = {}) {
    this.ttlMs = normalizeSessionTtlSeconds(options.ttlSeconds) * 1000;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  getTtlSeconds(): number {
    return this.ttlMs / 1000;
  }

  issue(username: string): SessionIssueResult {
    let token = createSessionToken();
    while (this.sessions.has(token)) {
      token = createSessionToken();
    }
    const expiresAt = this.now() + this.ttlMs;
    this.sessions.set(token, { token, username, expiresAt });
    return {
      token,
      expiresAt: new Date(expiresAt).toISOString()
    };
  }

  /** Returns the session's username, evicting the entry if it has expired. */
  validate(token: string | null | undefined): string | null {
    if (!token) {
      return null;
    }
    const session = this.sessions.get(token);
    if (!session) {
      return null;
    }
    if (session.expiresAt <= this.now()) {
      this.sessions.delete(token);
      return null;
    }
    return session.username;
  }

  revoke(token: string | null | undefined): Session | null {
    if (!token) {
      return null;
    }
    const session = this.sessions.get(token);
    if (!session) {
      return null;
    }
    this.sessions.delete(token);
    return session;
  }

  revokeUser(username: string): number {
    let removed = 0;
    for (const [token, session] of this.sessions.entries()) {
      if (session.username === username) {
        this.sessions.delete(token);
        removed += 1;
      }
    }
    return removed;
  }
}

export function readBearerTokenFromRequest(req: IncomingMessage): string | null {
  return extractBearerToken(req.headers.authorization);
}
