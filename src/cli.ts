#!/usr/bin/env node
import 'dotenv/config';
import os from 'node:os';
import qrcode from 'qrcode-terminal';
import { AuditLogger } from './audit-log.js';
import { SessionStore } from './auth.js';
import { loadGatewayConfig, normalizePort, type ConfigOverrides, type GatewayConfig } from './config.js';
import { FolderMapStore } from './folder-map.js';
import { FileGateway } from './gateway.js';
import { createConsoleLogger, errorMessage } from './logger.js';
import { LoginLockout } from './security.js';
import { FileUserStore } from './users.js';

type CliCommand =
  | { name: 'serve'; overrides: ConfigOverrides }
  | { name: 'useradd'; username: string; password: string; admin: boolean }
  | { name: 'userdel'; username: string }
  | { name: 'users' }
  | { name: 'help'; error?: string };

const USAGE = `usage:
  vfs-gateway [serve] [--root DIR] [--port N]
  vfs-gateway useradd <username> <password> [--admin]
  vfs-gateway userdel <username>
  vfs-gateway users`;

function readFlagValue(args: string[], index: number, flag: string): string | undefined {
  const arg = args[index];
  if (arg === undefined) {
    return undefined;
  }
  if (arg.startsWith(`${flag}=`)) {
    return arg.slice(flag.length + 1);
  }
  const next = args[index + 1];
  if (arg === flag && next !== undefined && !next.startsWith('--')) {
    return next;
  }
  return undefined;
}

function parseCliArgs(args: string[]): CliCommand {
  const [first, ...rest] = args;
  if (first === 'help' || first === '--help' || first === '-h') {
    return { name: 'help' };
  }
  const command = first === undefined || first.startsWith('--') ? 'serve' : first;
  const params = command === 'serve' && first !== 'serve' ? args : rest;

  if (command === 'serve') {
    const overrides: ConfigOverrides = {};
    for (let i = 0; i < params.length; i += 1) {
      const arg = params[i] ?? '';
      if (arg === '--root' || arg.startsWith('--root=')) {
        const value = readFlagValue(params, i, '--root');
        if (value === undefined) {
          return { name: 'help', error: 'missing value for --root' };
        }
        overrides.rootDir = value;
        i += arg === '--root' ? 1 : 0;
        continue;
      }
      if (arg === '--port' || arg.startsWith('--port=')) {
        const value = readFlagValue(params, i, '--port');
        const port = normalizePort(value, -1);
        if (port < 0) {
          return { name: 'help', error: `invalid --port ${value ?? ''}`.trim() };
        }
        overrides.port = port;
        i += arg === '--port' ? 1 : 0;
        continue;
      }
      return { name: 'help', error: `unknown option ${arg}` };
    }
    return { name: 'serve', overrides };
  }

  if (command === 'useradd') {
    const positional = params.filter((arg) => !arg.startsWith('--'));
    const [username, password] = positional;
    if (!username || !password) {
      return { name: 'help', error: 'useradd needs <username> <password>' };
    }
    return { name: 'useradd', username, password, admin: params.includes('--admin') };
  }

  if (command === 'userdel') {
    const [username] = params;
    if (!username) {
      return { name: 'help', error: 'userdel needs <username>' };
    }
    return { name: 'userdel', username };
  }

  if (command === 'users') {
    return { name: 'users' };
  }

  return { name: 'help', error: `unknown command ${command}` };
}

function getLanAddress(): string | undefined {
  const nets = os.networkInterfaces();
  for (const net of Object.values(nets)) {
    if (!net) {
      continue;
    }
    for (const info of net) {
      if (info.family === 'IPv4' && !info.internal) {
        return info.address;
      }
    }
  }
  return undefined;
}

interface GatewayParts {
  gateway: FileGateway;
  users: FileUserStore;
  folders: FolderMapStore;
}

function buildGateway(config: GatewayConfig): GatewayParts {
  const auditLogger = new AuditLogger({ dir: config.auditDir });
  const logger = createConsoleLogger({ debug: config.debug, audit: auditLogger });
  const users = new FileUserStore({
    filePath: config.usersFilePath,
    lockout: new LoginLockout({
      maxFailures: config.maxFailedLogins,
      lockMs: config.lockoutMinutes * 60_000
    })
  });
  const folders = new FolderMapStore(config.folderMapPath);
  const gateway = new FileGateway({
    host: config.host,
    port: config.port,
    rootDir: config.rootDir,
    publicDir: config.publicDir,
    uploadLimitBytes: config.uploadLimitBytes,
    loginRateLimitPerMinute: config.loginRateLimitPerMinute,
    sessions: new SessionStore({ ttlSeconds: config.sessionTtlSeconds }),
    folders,
    credentials: users,
    users,
    auditLogger,
    logger
  });
  return { gateway, users, folders };
}

async function serve(config: GatewayConfig): Promise<void> {
  const { gateway, users } = buildGateway(config);
  const address = await gateway.start();

  if (users.listUsers().length === 0) {
    console.log('[vfs] no accounts yet, add one with: vfs-gateway useradd <username> <password>');
  }
  const localUrl = `http://localhost:${address.port}/`;
  const lan = getLanAddress();
  console.log(`[vfs] local: ${localUrl}`);
  if (lan) {
    const lanUrl = `http://${lan}:${address.port}/`;
    console.log(`[vfs] lan: ${lanUrl}`);
    if (config.showQr) {
      console.log('[vfs] scan to connect:');
      qrcode.generate(lanUrl, { small: true });
    }
  }

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`[vfs] ${signal} received, shutting down`);
    gateway
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error(`[vfs] shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

async function main(argv: string[]): Promise<number> {
  const command = parseCliArgs(argv);
  if (command.name === 'help') {
    if (command.error) {
      console.error(`[vfs] cli: ${command.error}`);
    }
    console.log(USAGE);
    return command.error ? 2 : 0;
  }

  const config = loadGatewayConfig(process.env, command.name === 'serve' ? command.overrides : {});
  if (command.name === 'serve') {
    await serve(config);
    return 0;
  }

  const { gateway, users, folders } = buildGateway(config);
  await folders.load();

  if (command.name === 'users') {
    for (const user of users.listUsers()) {
      console.log(`${user.username}\t${user.role}\t${folders.get(user.username)}`);
    }
    return 0;
  }

  if (command.name === 'useradd') {
    await gateway.createUser(command.username, command.password, command.admin ? 'admin' : 'file-user');
    return 0;
  }

  const removed = await gateway.deleteUser(command.username);
  if (!removed) {
    console.error(`[vfs] cli: no such user ${command.username}`);
    return 1;
  }
  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    if (code !== 0) {
      process.exitCode = code;
    }
  })
  .catch((error: unknown) => {
    console.error(`[vfs] fatal: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
