import fs from 'node:fs';
import path from 'node:path';
import type { SessionStore } from './auth.js';
import type { FolderMapStore } from './folder-map.js';
import { isNodeError } from './helpers.js';

export type ResolveFailure = 'unauthorized' | 'forbidden';

export type ResolveResult =
  | {
      ok: true;
      path: string;
      username: string;
      userBase: string;
    }
  | {
      ok: false;
      reason: ResolveFailure;
    };

export interface PathResolverOptions {
  rootDir: string;
  sessions: SessionStore;
  folders: FolderMapStore;
}

export function isWithinBase(baseDir: string, candidate: string): boolean {
  if (candidate === baseDir) {
    return true;
  }
  const baseWithSep = baseDir.endsWith(path.sep) ? baseDir : `${baseDir}${path.sep}`;
  return candidate.startsWith(baseWithSep);
}

/** Strips separators from both ends and unifies them; an empty result means the sandbox root. */
export function normalizeClientPath(rawPath: string | undefined): string {
  if (!rawPath) {
    return '';
  }
  return rawPath
    .trim()
    .replace(/\\/g, '/')
    .replace(/\/{2,}/g, '/')
    .replace(/^\/+|\/+$/g, '');
}

/**
 * Absolute, normalized form of `target` with symlinks resolved along the
 * longest prefix that exists on disk. Missing trailing segments are appended
 * unchanged, so paths that are about to be created canonicalize too.
 */
export async function canonicalize(target: string): Promise<string> {
  const absolute = path.resolve(target);
  const missing: string[] = [];
  let current = absolute;

  for (;;) {
    try {
      const real = await fs.promises.realpath(current);
      return missing.length > 0 ? path.join(real, ...missing.reverse()) : real;
    } catch (error) {
      if (!isNodeError(error) || (error.code !== 'ENOENT' && error.code !== 'ENOTDIR')) {
        throw error;
      }
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return absolute;
    }
    missing.push(path.basename(current));
    current = parent;
  }
}

export class PathResolver {
  private readonly rootDir: string;
  private readonly sessions: SessionStore;
  private readonly folders: FolderMapStore;

  constructor(options: PathResolverOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.sessions = options.sessions;
    this.folders = options.folders;
  }

  /** Canonical sandbox base for a user, or null when the mapping points outside the root. */
  async userBaseFor(username: string): Promise<string | null> {
    const subfolder = normalizeClientPath(this.folders.get(username));
    if (subfolder.split('/').includes('..')) {
      return null;
    }
    const root = await canonicalize(this.rootDir);
    const userBase = await canonicalize(path.join(root, subfolder));
    return isWithinBase(root, userBase) ? userBase : null;
  }

  async resolve(token: string | null | undefined, clientPath: string | undefined): Promise<ResolveResult> {
    const username = this.sessions.validate(token);
    if (!username) {
      return { ok: false, reason: 'unauthorized' };
    }

    // Checked on the raw input, before any normalization.
    if (clientPath !== undefined && (clientPath.includes('..') || clientPath.includes('\0'))) {
      return { ok: false, reason: 'forbidden' };
    }

    const userBase = await this.userBaseFor(username);
    if (!userBase) {
      return { ok: false, reason: 'forbidden' };
    }

    const normalized = normalizeClientPath(clientPath);
    const candidate = await canonicalize(path.join(userBase, normalized));
    if (!isWithinBase(userBase, candidate)) {
      return { ok: false, reason: 'forbidden' };
    }

    return { ok: true, path: candidate, username, userBase };
  }
}
