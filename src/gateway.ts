import fs from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import http from 'node:http';
import type { AddressInfo } from 'node:net';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import type { AuditLogger } from './audit-log.js';
import { readBearerTokenFromRequest, type SessionStore } from './auth.js';
import { ADMIN_USERNAME, type FolderMapStore } from './folder-map.js';
import { errorMessage, type GatewayLogger } from './logger.js';
import { PathResolver } from './path-resolver.js';
import { createAuthRoutes } from './routes/auth.js';
import { createFileRoutes } from './routes/files.js';
import {
  readStringValue,
  statusFor,
  type GatewayResult,
  type RequestContext,
  type RouteHandler
} from './routes/result.js';
import { getClientIp, MemoryRateLimiter } from './security.js';
import type { CredentialVerifier, UserRegistry, UserRole } from './users.js';

type RouteMethod = 'GET' | 'POST';
type RouteBody = 'none' | 'json' | 'multipart';

interface RouteDefinition {
  method: RouteMethod;
  path: string;
  auth: boolean;
  body: RouteBody;
  operation: string;
}

/** Every path the gateway answers. Anything else is a 404. */
export const GATEWAY_ROUTES = [
  { method: 'GET', path: '/', auth: false, body: 'none', operation: 'landing' },
  { method: 'POST', path: '/api/login', auth: false, body: 'json', operation: 'login' },
  { method: 'POST', path: '/api/logout', auth: false, body: 'none', operation: 'logout' },
  { method: 'GET', path: '/api/files/list', auth: true, body: 'none', operation: 'list' },
  { method: 'POST', path: '/api/files/upload', auth: true, body: 'multipart', operation: 'upload' },
  { method: 'GET', path: '/api/files/download', auth: true, body: 'none', operation: 'download' },
  { method: 'POST', path: '/api/files/create', auth: true, body: 'json', operation: 'create' },
  { method: 'POST', path: '/api/files/delete', auth: true, body: 'none', operation: 'delete' },
  { method: 'POST', path: '/api/files/save', auth: true, body: 'json', operation: 'save' },
  { method: 'POST', path: '/api/files/rename', auth: true, body: 'json', operation: 'rename' }
] as const satisfies readonly RouteDefinition[];

type GatewayRoute = (typeof GATEWAY_ROUTES)[number];
export type GatewayOperation = GatewayRoute['operation'];

const CORS_ALLOW_METHODS = 'POST, GET, OPTIONS, DELETE';
const CORS_ALLOW_HEADERS = 'Content-Type, Authorization';
const JSON_BODY_LIMIT = '10mb';

export interface FileGatewayOptions {
  host: string;
  port: number;
  rootDir: string;
  publicDir: string;
  uploadLimitBytes: number;
  loginRateLimitPerMinute: number;
  sessions: SessionStore;
  folders: FolderMapStore;
  credentials: CredentialVerifier;
  users: UserRegistry;
  auditLogger: AuditLogger;
  logger: GatewayLogger;
}

interface HttpErrorLike {
  status: number;
  type?: string;
}

function isHttpErrorLike(error: unknown): error is HttpErrorLike {
  if (!error || typeof error !== 'object' || !('status' in error)) {
    return false;
  }
  return typeof error.status === 'number' && error.status >= 400 && error.status < 500;
}

function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]/g, '_').replace(/["\\]/g, '_');
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

export class FileGateway {
  private readonly options: FileGatewayOptions;
  private readonly logger: GatewayLogger;
  private readonly resolver: PathResolver;
  private readonly handlers: Record<GatewayOperation, RouteHandler>;
  private readonly app: express.Express;
  private server: http.Server | null = null;
  private stopping = false;

  constructor(options: FileGatewayOptions) {
    this.options = options;
    this.logger = options.logger;
    this.resolver = new PathResolver({
      rootDir: options.rootDir,
      sessions: options.sessions,
      folders: options.folders
    });

    const fileRoutes = createFileRoutes({
      resolver: this.resolver,
      auditLogger: options.auditLogger,
      logger: options.logger
    });
    const authRoutes = createAuthRoutes({
      sessions: options.sessions,
      credentials: options.credentials,
      resolver: this.resolver,
      loginLimiter: new MemoryRateLimiter({ windowMs: 60_000, max: options.loginRateLimitPerMinute }),
      auditLogger: options.auditLogger,
      logger: options.logger,
      publicDir: options.publicDir
    });
    this.handlers = { ...authRoutes, ...fileRoutes };
    this.app = this.createApp();
  }

  async start(): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('gateway already started');
    }
    await fs.promises.mkdir(path.resolve(this.options.rootDir), { recursive: true });
    await this.options.folders.load();
    this.stopping = false;

    const server = http.createServer(this.app);
    server.on('clientError', (error, socket) => {
      if (!this.stopping) {
        this.logger.error(`client error: ${error.message}`);
      }
      if (socket.writable) {
        socket.end('HTTP/1.1 400 Bad Request\r\nConnection: close\r\n\r\n');
        return;
      }
      socket.destroy();
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        server.off('listening', onListening);
        reject(error);
      };
      const onListening = (): void => {
        server.off('error', onError);
        resolve();
      };
      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(this.options.port, this.options.host);
    });

    server.on('error', (error) => {
      if (this.stopping) {
        return;
      }
      this.logger.error(`listener error: ${error.message}`);
    });
    this.server = server;

    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('gateway is not bound to a TCP address');
    }
    this.logger.info(`file gateway listening on ${address.address}:${address.port}, root ${this.options.rootDir}`);
    return address;
  }

  /**
   * Marks the gateway as stopping, persists the folder map and closes the
   * listener. Requests already in flight are allowed to finish.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.stopping = true;
    this.server = null;

    if (this.options.folders.isDirty()) {
      try {
        await this.options.folders.save();
      } catch (error) {
        this.logger.error(`folder map save failed: ${errorMessage(error)}`);
      }
    }

    await new Promise<void>((resolve) => {
      server.close((error) => {
        const code = error && 'code' in error ? error.code : undefined;
        if (error && code !== 'ERR_SERVER_NOT_RUNNING') {
          this.logger.error(`listener close failed: ${error.message}`);
        }
        resolve();
      });
      server.closeIdleConnections();
    });
    this.logger.info('file gateway stopped');
  }

  /**
   * Applies account changes written by another process (the CLI): removed
   * accounts lose their sessions and the folder map is reloaded.
   */
  async refreshAccounts(): Promise<void> {
    for (const username of this.options.credentials.refresh()) {
      const revoked = this.options.sessions.revokeUser(username);
      this.logger.info(`account removed: ${username}, ${revoked} session(s) revoked`);
    }
    await this.options.folders.refresh();
  }

  async createUser(username: string, password: string, role: UserRole = 'file-user'): Promise<void> {
    await this.options.folders.refresh();
    await this.options.users.createAccount(username, password, role);
    if (!this.options.folders.has(username)) {
      this.options.folders.set(username, username);
    }
    await this.options.folders.save();
    this.options.auditLogger.log({
      event: 'account.create',
      actor: 'system',
      resource: username,
      outcome: 'success',
      metadata: { role }
    });
    this.logger.info(`user created: ${username} (${role})`);
  }

  async deleteUser(username: string): Promise<boolean> {
    await this.options.folders.refresh();
    const removed = await this.options.users.deleteAccount(username);
    if (username !== ADMIN_USERNAME) {
      this.options.folders.remove(username);
    }
    this.options.sessions.revokeUser(username);
    await this.options.folders.save();
    this.options.auditLogger.log({
      event: 'account.delete',
      actor: 'system',
      resource: username,
      outcome: removed ? 'success' : 'failure'
    });
    if (removed) {
      this.logger.info(`user deleted: ${username}`);
    }
    return removed;
  }

  private createApp(): express.Express {
    const app = express();
    app.disable('x-powered-by');
    app.set('case sensitive routing', true);
    app.set('strict routing', true);

    app.use((req: Request, res: Response, next: NextFunction) => {
      res.setHeader('Access-Control-Allow-Origin', '*');
      if (req.method === 'OPTIONS') {
        res.setHeader('Access-Control-Allow-Methods', CORS_ALLOW_METHODS);
        res.setHeader('Access-Control-Allow-Headers', CORS_ALLOW_HEADERS);
        res.status(200).end();
        return;
      }
      next();
    });

    for (const route of GATEWAY_ROUTES) {
      app.all(
        route.path,
        this.methodGuard(route),
        (_req: Request, _res: Response, next: NextFunction) => {
          this.refreshAccounts().then(() => next(), next);
        },
        this.authGuard(route),
        ...this.bodyParsers(route),
        (req: Request, res: Response, next: NextFunction) => {
          this.dispatch(route, req, res).catch(next);
        }
      );
    }

    app.use((_req: Request, res: Response) => {
      res.status(404).json({ success: false, message: 'Not found' });
    });

    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (res.headersSent) {
        this.logger.error(`response failed on ${req.path}: ${errorMessage(error)}`);
        res.destroy();
        return;
      }
      if (isHttpErrorLike(error)) {
        if (error.status === 413) {
          this.sendResult(res, { kind: 'tooLarge', message: 'Request body too large' });
          return;
        }
        const message = error.type === 'entity.parse.failed' ? 'Invalid JSON body' : 'Bad request';
        this.sendResult(res, { kind: 'badRequest', message });
        return;
      }
      this.logger.error(`request failed on ${req.path}: ${errorMessage(error)}`);
      this.sendResult(res, { kind: 'internal', message: 'Internal server error' });
    });

    return app;
  }

  private methodGuard(route: GatewayRoute): RequestHandler {
    return (req, res, next) => {
      if (req.method === route.method || (route.method === 'GET' && req.method === 'HEAD')) {
        next();
        return;
      }
      this.sendResult(res, { kind: 'methodNotAllowed', message: `Only ${route.method} allowed` });
    };
  }

  private authGuard(route: GatewayRoute): RequestHandler {
    return (req, res, next) => {
      if (!route.auth || this.options.sessions.validate(readBearerTokenFromRequest(req))) {
        next();
        return;
      }
      this.sendResult(res, { kind: 'unauthorized', message: 'Unauthorized' });
    };
  }

  private bodyParsers(route: GatewayRoute): RequestHandler[] {
    switch (route.body) {
      case 'json':
        return [express.json({ limit: JSON_BODY_LIMIT, strict: false, type: () => true })];
      case 'multipart':
        return [express.raw({ limit: this.options.uploadLimitBytes, type: () => true })];
      case 'none':
        return [];
    }
  }

  private async dispatch(route: GatewayRoute, req: Request, res: Response): Promise<void> {
    const ctx: RequestContext = {
      req,
      token: readBearerTokenFromRequest(req),
      clientIp: getClientIp(req),
      body: req.body,
      query: (name) => readStringValue(req.query[name])
    };

    let result: GatewayResult;
    try {
      result = await this.handlers[route.operation](ctx);
    } catch (error) {
      this.logger.error(`${route.operation} failed (path=${ctx.query('path') ?? ''}): ${errorMessage(error)}`);
      result = { kind: 'internal', message: 'Internal server error' };
    }

    if (result.kind === 'file') {
      await this.sendFile(req, res, result);
      return;
    }
    this.sendResult(res, result);
  }

  private sendResult(res: Response, result: Exclude<GatewayResult, { kind: 'file' }>): void {
    if (result.kind === 'ok') {
      res.status(result.status ?? 200).json({ success: true, ...result.body });
      return;
    }
    if (result.kind === 'html') {
      res.status(result.status).type('html').send(result.html);
      return;
    }
    if (result.kind === 'unauthorized') {
      res.setHeader('WWW-Authenticate', 'Bearer');
    } else if (result.kind === 'tooManyRequests') {
      res.setHeader('Retry-After', String(result.retryAfterSec));
    }
    res.status(statusFor(result)).json({ success: false, message: result.message });
  }

  private async sendFile(
    req: Request,
    res: Response,
    result: Extract<GatewayResult, { kind: 'file' }>
  ): Promise<void> {
    let handle: FileHandle;
    try {
      handle = await fs.promises.open(result.filePath, 'r');
    } catch (error) {
      this.logger.error(`download failed (path=${result.filePath}): ${errorMessage(error)}`);
      this.sendResult(res, { kind: 'internal', message: errorMessage(error) });
      return;
    }

    try {
      const stat = await handle.stat();
      res.status(200);
      res.setHeader('Content-Type', result.contentType);
      res.setHeader('Content-Length', String(stat.size));
      res.setHeader('Content-Disposition', contentDisposition(result.filename));
      res.setHeader('Cache-Control', 'no-store');
      if (req.method === 'HEAD') {
        res.end();
        return;
      }
      await pipeline(handle.createReadStream({ highWaterMark: 64 * 1024, autoClose: false }), res);
    } finally {
      await handle.close();
    }
  }
}
