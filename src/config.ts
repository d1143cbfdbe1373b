import path from 'node:path';

export interface GatewayConfig {
  host: string;
  port: number;
  rootDir: string;
  folderMapPath: string;
  usersFilePath: string;
  publicDir: string;
  auditDir: string;
  sessionTtlSeconds: number;
  maxFailedLogins: number;
  lockoutMinutes: number;
  loginRateLimitPerMinute: number;
  uploadLimitBytes: number;
  debug: boolean;
  showQr: boolean;
}

export interface ConfigOverrides {
  rootDir?: string;
  port?: number;
}

type Env = Record<string, string | undefined>;

const DEFAULT_PORT = 11004;

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function readPositiveInt(env: Env, key: string, fallback: number, warn: (message: string) => void): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0 || String(parsed) !== raw) {
    warn(`config: invalid ${key}=${raw}, fallback to ${fallback}`);
    return fallback;
  }
  return parsed;
}

function readFlag(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  return /^(1|true|on|yes)$/i.test(raw);
}

export function normalizePort(value: unknown, fallback = DEFAULT_PORT): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num < 0 || num > 65_535) {
    return fallback;
  }
  return num;
}

export function loadGatewayConfig(
  env: Env = process.env,
  overrides: ConfigOverrides = {},
  warn: (message: string) => void = (message) => console.log(`[vfs] ${message}`)
): GatewayConfig {
  const cwd = process.cwd();
  const uploadLimitMb = readPositiveInt(env, 'VFS_UPLOAD_LIMIT_MB', 100, warn);

  return {
    host: readString(env, 'VFS_HOST', '0.0.0.0'),
    port: normalizePort(overrides.port ?? env.VFS_PORT ?? env.PORT ?? DEFAULT_PORT),
    rootDir: path.resolve(cwd, overrides.rootDir ?? readString(env, 'VFS_ROOT', 'www')),
    folderMapPath: path.resolve(cwd, readString(env, 'VFS_FOLDER_MAP', 'vfs-folders.json')),
    usersFilePath: path.resolve(cwd, readString(env, 'VFS_USERS_FILE', '.vfs-users.json')),
    publicDir: path.resolve(cwd, readString(env, 'VFS_PUBLIC_DIR', 'public')),
    auditDir: path.resolve(cwd, readString(env, 'VFS_AUDIT_DIR', '.vfs-audit')),
    sessionTtlSeconds: readPositiveInt(env, 'VFS_SESSION_TTL_SECONDS', 2 * 60 * 60, warn),
    maxFailedLogins: readPositiveInt(env, 'VFS_MAX_FAILED_LOGINS', 5, warn),
    lockoutMinutes: readPositiveInt(env, 'VFS_LOCKOUT_MINUTES', 15, warn),
    loginRateLimitPerMinute: readPositiveInt(env, 'VFS_LOGIN_RATE_LIMIT', 20, warn),
    uploadLimitBytes: uploadLimitMb * 1024 * 1024,
    debug: readFlag(env, 'VFS_DEBUG', false),
    showQr: readFlag(env, 'VFS_SHOW_QR', false)
  };
}
