import fs from 'node:fs';
import path from 'node:path';
import type { AuditEvent, AuditLogger } from '../audit-log.js';
import { hasErrorCode, moveFileExclusive } from '../helpers.js';
import type { GatewayLogger } from '../logger.js';
import { errorMessage } from '../logger.js';
import { mimeTypeFor } from '../mime.js';
import { parseMultipartFile } from '../multipart.js';
import { normalizeClientPath, type PathResolver } from '../path-resolver.js';
import {
  badRequest,
  conflict,
  internal,
  notFound,
  ok,
  parseBooleanValue,
  readBodyField,
  readStringBodyField,
  unauthorized,
  type GatewayResult,
  type RequestContext,
  type RouteHandler
} from './result.js';

export interface FileRouteDeps {
  resolver: PathResolver;
  auditLogger: AuditLogger;
  logger: GatewayLogger;
}

export interface FileListItem {
  name: string;
  isDirectory: boolean;
  size: number;
  lastModified: string;
}

export type FileOperation = 'list' | 'upload' | 'download' | 'create' | 'delete' | 'save' | 'rename';

function toPortablePath(value: string): string {
  return value.split(path.sep).join('/');
}

function toSandboxPath(userBase: string, absolutePath: string): string {
  const relative = path.relative(userBase, absolutePath);
  return `/${toPortablePath(relative)}`;
}

function joinClientPath(parent: string, name: string): string {
  const normalizedParent = normalizeClientPath(parent);
  return normalizedParent ? `${normalizedParent}/${name}` : name;
}

function compareNames(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

function isSingleSegmentName(name: string): boolean {
  const trimmed = name.trim();
  return (
    trimmed.length > 0 &&
    trimmed === name &&
    !name.includes('/') &&
    !name.includes('\\') &&
    !name.includes('..') &&
    !name.includes('\0') &&
    name !== '.'
  );
}

async function statOrNull(targetPath: string): Promise<fs.Stats | null> {
  try {
    return await fs.promises.stat(targetPath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}

async function listDirectory(dir: string): Promise<FileListItem[] | null> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return [];
    }
    if (hasErrorCode(error, 'ENOTDIR')) {
      return null;
    }
    throw error;
  }

  const items = await Promise.all(
    entries.map(async (entry): Promise<FileListItem | null> => {
      try {
        const stat = await fs.promises.stat(path.join(dir, entry.name));
        const isDirectory = stat.isDirectory();
        return {
          name: entry.name,
          isDirectory,
          size: isDirectory ? 0 : stat.size,
          lastModified: stat.mtime.toISOString()
        };
      } catch {
        // entry vanished or is a dangling link
        return null;
      }
    })
  );

  return items
    .filter((item): item is FileListItem => item !== null)
    .sort((left, right) => {
      if (left.isDirectory !== right.isDirectory) {
        return left.isDirectory ? -1 : 1;
      }
      return compareNames(left.name, right.name);
    });
}

export function createFileRoutes(deps: FileRouteDeps): Record<FileOperation, RouteHandler> {
  const { resolver, auditLogger, logger } = deps;

  const auditFsEvent = (
    event: AuditEvent,
    username: string,
    resource: string,
    outcome: 'success' | 'failure',
    metadata: Record<string, unknown> = {}
  ): void => {
    auditLogger.log({
      event,
      actor: `user:${username}`,
      resource,
      outcome,
      metadata
    });
  };

  // Expected failures come back as results; anything thrown is an I/O fault.
  const guard = async (
    operation: FileOperation,
    ctx: RequestContext,
    attemptedPath: string | undefined,
    run: () => Promise<GatewayResult>
  ): Promise<GatewayResult> => {
    try {
      return await run();
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`${operation} failed (path=${attemptedPath ?? ''}, ip=${ctx.clientIp}): ${message}`);
      return internal(message);
    }
  };

  const list: RouteHandler = async (ctx) => {
    const requestPath = ctx.query('path') ?? '/';
    return guard('list', ctx, requestPath, async () => {
      const resolved = await resolver.resolve(ctx.token, requestPath);
      if (!resolved.ok) {
        return unauthorized();
      }
      const items = await listDirectory(resolved.path);
      if (!items) {
        return badRequest('Path is not a directory');
      }
      return ok({ path: toSandboxPath(resolved.userBase, resolved.path), items });
    });
  };

  const upload: RouteHandler = async (ctx) => {
    const requestPath = ctx.query('path') ?? '/';
    return guard('upload', ctx, requestPath, async () => {
      const dir = await resolver.resolve(ctx.token, requestPath);
      if (!dir.ok) {
        return unauthorized();
      }

      const rawBody = Buffer.isBuffer(ctx.body) ? ctx.body : Buffer.alloc(0);
      const file = parseMultipartFile(ctx.req.headers['content-type'], rawBody);
      if (!file) {
        return badRequest('No filename found');
      }

      const target = await resolver.resolve(ctx.token, joinClientPath(requestPath, file.filename));
      if (!target.ok) {
        return unauthorized();
      }

      await fs.promises.mkdir(dir.path, { recursive: true });
      await fs.promises.writeFile(target.path, file.content);
      const resource = toSandboxPath(target.userBase, target.path);
      auditFsEvent('fs.upload', target.username, resource, 'success', { bytes: file.content.length });
      logger.debug(`file uploaded by ${target.username}: ${resource} (${file.content.length} bytes)`);
      return ok({ filename: file.filename, size: file.content.length });
    });
  };

  const download: RouteHandler = async (ctx) => {
    const requestPath = ctx.query('path');
    return guard('download', ctx, requestPath, async () => {
      const resolved = await resolver.resolve(ctx.token, requestPath);
      if (!resolved.ok) {
        return unauthorized();
      }
      const stat = await statOrNull(resolved.path);
      if (!stat || !stat.isFile()) {
        return notFound('File not found');
      }
      return {
        kind: 'file',
        filePath: resolved.path,
        filename: path.basename(resolved.path),
        contentType: mimeTypeFor(resolved.path)
      };
    });
  };

  const create: RouteHandler = async (ctx) => {
    const queryPath = ctx.query('path');
    if (queryPath) {
      // Legacy form: the query string always names a directory.
      return guard('create', ctx, queryPath, async () => {
        const resolved = await resolver.resolve(ctx.token, queryPath);
        if (!resolved.ok) {
          return unauthorized();
        }
        await fs.promises.mkdir(resolved.path, { recursive: true });
        const resource = toSandboxPath(resolved.userBase, resolved.path);
        auditFsEvent('fs.create', resolved.username, resource, 'success', { isDirectory: true });
        logger.debug(`directory created by ${resolved.username}: ${resource}`);
        return ok({ message: 'Item created successfully.' });
      });
    }

    const bodyPath = readStringBodyField(ctx.body, 'path');
    if (!bodyPath) {
      return badRequest('Path is required.');
    }
    const isDirectory = parseBooleanValue(readBodyField(ctx.body, 'isDirectory')) ?? false;

    return guard('create', ctx, bodyPath, async () => {
      const resolved = await resolver.resolve(ctx.token, bodyPath);
      if (!resolved.ok) {
        return unauthorized();
      }
      const resource = toSandboxPath(resolved.userBase, resolved.path);

      if (isDirectory) {
        await fs.promises.mkdir(resolved.path, { recursive: true });
      } else {
        await fs.promises.mkdir(path.dirname(resolved.path), { recursive: true });
        try {
          await fs.promises.writeFile(resolved.path, '', { flag: 'wx' });
        } catch (error) {
          if (hasErrorCode(error, 'EEXIST')) {
            auditFsEvent('fs.create', resolved.username, resource, 'failure', { reason: 'exists' });
            return conflict('An item with this name already exists.');
          }
          throw error;
        }
      }

      auditFsEvent('fs.create', resolved.username, resource, 'success', { isDirectory });
      logger.debug(`${isDirectory ? 'directory' : 'file'} created by ${resolved.username}: ${resource}`);
      return ok({ message: 'Item created successfully.' });
    });
  };

  const remove: RouteHandler = async (ctx) => {
    const requestPath = ctx.query('path');
    if (!requestPath) {
      return badRequest('Path is required.');
    }
    const isDir = parseBooleanValue(ctx.query('isDir')) ?? false;

    return guard('delete', ctx, requestPath, async () => {
      const resolved = await resolver.resolve(ctx.token, requestPath);
      if (!resolved.ok) {
        return unauthorized();
      }
      if (resolved.path === resolved.userBase) {
        return badRequest('Cannot delete the root folder');
      }

      const resource = toSandboxPath(resolved.userBase, resolved.path);
      const stat = await statOrNull(resolved.path);
      if (!stat) {
        return notFound('Item not found');
      }
      if (isDir !== stat.isDirectory()) {
        return badRequest(isDir ? 'Path is not a directory' : 'Path is a directory');
      }

      if (isDir) {
        await fs.promises.rm(resolved.path, { recursive: true, force: false });
      } else {
        await fs.promises.unlink(resolved.path);
      }
      auditFsEvent('fs.delete', resolved.username, resource, 'success', { isDirectory: isDir });
      logger.debug(`${isDir ? 'directory' : 'file'} deleted by ${resolved.username}: ${resource}`);
      return ok();
    });
  };

  const save: RouteHandler = async (ctx) => {
    const requestPath = readStringBodyField(ctx.body, 'path');
    const content = readStringBodyField(ctx.body, 'content');
    if (!requestPath || content === undefined) {
      return badRequest('Path and content are required.');
    }

    return guard('save', ctx, requestPath, async () => {
      const resolved = await resolver.resolve(ctx.token, requestPath);
      if (!resolved.ok) {
        return unauthorized();
      }
      await fs.promises.mkdir(path.dirname(resolved.path), { recursive: true });
      await fs.promises.writeFile(resolved.path, content, 'utf8');

      const resource = toSandboxPath(resolved.userBase, resolved.path);
      const bytes = Buffer.byteLength(content, 'utf8');
      auditFsEvent('fs.save', resolved.username, resource, 'success', { bytes });
      logger.debug(`file saved by ${resolved.username}: ${resource}`);
      return ok({ message: 'File saved successfully.' });
    });
  };

  const rename: RouteHandler = async (ctx) => {
    const requestPath = readStringBodyField(ctx.body, 'path');
    const newName = readStringBodyField(ctx.body, 'newName');
    const isDirectory = parseBooleanValue(readBodyField(ctx.body, 'isDirectory'));
    if (!requestPath || newName === undefined || isDirectory === undefined) {
      return badRequest('Path, newName, and isDirectory are required.');
    }
    if (!isSingleSegmentName(newName)) {
      return badRequest('Invalid name.');
    }

    return guard('rename', ctx, requestPath, async () => {
      const source = await resolver.resolve(ctx.token, requestPath);
      if (!source.ok) {
        return unauthorized();
      }
      if (source.path === source.userBase) {
        return badRequest('Cannot rename the root folder');
      }

      const siblingClientPath = path.posix.join(path.posix.dirname(`/${normalizeClientPath(requestPath)}`), newName);
      const target = await resolver.resolve(ctx.token, siblingClientPath);
      if (!target.ok) {
        return unauthorized();
      }

      const resource = toSandboxPath(source.userBase, source.path);
      const stat = await statOrNull(source.path);
      if (!stat) {
        return notFound('Item not found');
      }
      if (stat.isDirectory() !== isDirectory) {
        return badRequest(isDirectory ? 'Path is not a directory' : 'Path is a directory');
      }

      const refuseExisting = (): GatewayResult => {
        auditFsEvent('fs.rename', source.username, resource, 'failure', { reason: 'exists', newName });
        return conflict('An item with this name already exists.');
      };

      // rename(2) silently replaces an existing file or empty directory.
      try {
        await fs.promises.lstat(target.path);
        return refuseExisting();
      } catch (error) {
        if (!hasErrorCode(error, 'ENOENT')) {
          throw error;
        }
      }

      try {
        if (isDirectory) {
          await fs.promises.rename(source.path, target.path);
        } else {
          await moveFileExclusive(source.path, target.path);
        }
      } catch (error) {
        if (hasErrorCode(error, 'EEXIST', 'ENOTEMPTY')) {
          return refuseExisting();
        }
        throw error;
      }
      auditFsEvent('fs.rename', source.username, resource, 'success', {
        to: toSandboxPath(target.userBase, target.path)
      });
      logger.debug(`item renamed by ${source.username}: ${resource} -> ${newName}`);
      return ok({ message: 'Item renamed successfully.' });
    });
  };

  return { list, upload, download, create, delete: remove, save, rename };
}
