import fs from 'node:fs';
import path from 'node:path';
import type { AuditLogger } from '../audit-log.js';
import type { SessionStore } from '../auth.js';
import { hasErrorCode } from '../helpers.js';
import type { GatewayLogger } from '../logger.js';
import type { PathResolver } from '../path-resolver.js';
import type { MemoryRateLimiter } from '../security.js';
import type { CredentialVerifier } from '../users.js';
import {
  badRequest,
  internal,
  ok,
  readStringBodyField,
  unauthorized,
  type RouteHandler
} from './result.js';

export interface AuthRouteDeps {
  sessions: SessionStore;
  credentials: CredentialVerifier;
  resolver: PathResolver;
  loginLimiter: MemoryRateLimiter;
  auditLogger: AuditLogger;
  logger: GatewayLogger;
  publicDir: string;
}

export type AuthOperation = 'landing' | 'login' | 'logout';

const LANDING_PAGE = 'index.html';
const LANDING_NOT_FOUND_HTML =
  '<h1>404 - Landing Page Not Found</h1><p>Ensure index.html is in the public directory.</p>';

function readCredentialField(body: unknown, key: 'username' | 'password'): string | undefined {
  const capitalized = key === 'username' ? 'Username' : 'Password';
  return readStringBodyField(body, key) ?? readStringBodyField(body, capitalized);
}

export function createAuthRoutes(deps: AuthRouteDeps): Record<AuthOperation, RouteHandler> {
  const { sessions, credentials, resolver, loginLimiter, auditLogger, logger, publicDir } = deps;

  const landing: RouteHandler = async () => {
    const htmlPath = path.join(publicDir, LANDING_PAGE);
    try {
      const html = await fs.promises.readFile(htmlPath, 'utf8');
      return { kind: 'html', status: 200, html };
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        logger.error(`landing page not found at ${htmlPath}`);
        return { kind: 'html', status: 404, html: LANDING_NOT_FOUND_HTML };
      }
      throw error;
    }
  };

  const login: RouteHandler = async (ctx) => {
    const verdict = loginLimiter.hit(ctx.clientIp);
    if (!verdict.allowed) {
      logger.security(`login throttled for ${ctx.clientIp}`, { actor: `ip:${ctx.clientIp}` });
      return {
        kind: 'tooManyRequests',
        message: 'Too many login attempts',
        retryAfterSec: Math.max(1, Math.ceil(verdict.retryAfterMs / 1000))
      };
    }

    const username = readCredentialField(ctx.body, 'username');
    const password = readCredentialField(ctx.body, 'password');
    if (!username || password === undefined) {
      return badRequest('Invalid request format');
    }

    if (!credentials.hasUser(username)) {
      logger.security(`login failed for unknown user '${username}'`, { actor: `ip:${ctx.clientIp}` });
      return unauthorized('Invalid credentials');
    }

    if (credentials.isLocked(username)) {
      logger.security(`login refused for '${username}': too many tries`, { actor: `user:${username}` });
      auditLogger.log({
        event: 'auth.locked',
        actor: `user:${username}`,
        outcome: 'failure',
        metadata: { ip: ctx.clientIp }
      });
      return unauthorized('Too many tries');
    }

    if (!(await credentials.verify(username, password))) {
      credentials.recordFailure(username);
      logger.security(`login failed for '${username}': invalid credentials`, { actor: `user:${username}` });
      auditLogger.log({
        event: 'auth.login',
        actor: `user:${username}`,
        outcome: 'failure',
        metadata: { ip: ctx.clientIp }
      });
      return unauthorized('Invalid credentials');
    }

    credentials.resetFailures(username);
    const userBase = await resolver.userBaseFor(username);
    if (!userBase) {
      logger.error(`sandbox folder for '${username}' resolves outside the root`);
      return internal('Sandbox folder is not available');
    }
    await fs.promises.mkdir(userBase, { recursive: true });

    const issued = sessions.issue(username);
    auditLogger.log({
      event: 'auth.login',
      actor: `user:${username}`,
      outcome: 'success',
      metadata: { ip: ctx.clientIp, expiresAt: issued.expiresAt }
    });
    logger.debug(`user logged in: ${username}, folder: ${userBase}`);
    return ok({ token: issued.token, username, expiresAt: issued.expiresAt });
  };

  const logout: RouteHandler = async (ctx) => {
    const session = sessions.revoke(ctx.token);
    if (session) {
      auditLogger.log({
        event: 'auth.logout',
        actor: `user:${session.username}`,
        outcome: 'success'
      });
      logger.debug(`user logged out: ${session.username}`);
    }
    return ok();
  };

  return { landing, login, logout };
}
