import fs from 'node:fs';
import path from 'node:path';

export type AuditEvent =
  | 'auth.login'
  | 'auth.logout'
  | 'auth.locked'
  | 'account.create'
  | 'account.delete'
  | 'fs.upload'
  | 'fs.create'
  | 'fs.delete'
  | 'fs.save'
  | 'fs.rename'
  | 'security';

export interface AuditLogEntry {
  timestamp?: string;
  event: AuditEvent;
  actor: string;
  resource?: string;
  outcome: 'success' | 'failure';
  metadata?: Record<string, unknown>;
}

export interface AuditLoggerOptions {
  dir?: string;
  retentionDays?: number;
}

function resolveAuditDir(rawDir: string | undefined): string {
  if (typeof rawDir === 'string' && rawDir.trim().length > 0) {
    return path.resolve(rawDir.trim());
  }
  return path.resolve(process.cwd(), '.vfs-audit');
}

function toSafeDate(input: string): string {
  return /^\d{4}-\d{2}-\d{2}$/.test(input) ? input : new Date().toISOString().slice(0, 10);
}

/**
 * Append-only JSONL audit trail, one file per UTC day. Writes are queued so
 * lines from concurrent requests never interleave within a file.
 */
export class AuditLogger {
  private readonly dir: string;
  private readonly retentionDays: number;
  private lastCleanupAt = 0;
  private pending: Promise<void> = Promise.resolve();

  constructor(options: AuditLoggerOptions = {}) {
    this.dir = resolveAuditDir(options.dir);
    this.retentionDays = Math.max(1, Math.min(3650, options.retentionDays ?? 90));
    fs.mkdirSync(this.dir, { recursive: true });
    this.cleanupOldFiles();
  }

  log(entry: AuditLogEntry): void {
    const timestamp = entry.timestamp ?? new Date().toISOString();
    const day = toSafeDate(timestamp.slice(0, 10));
    const payload = {
      timestamp,
      event: entry.event,
      actor: entry.actor,
      resource: entry.resource ?? '',
      outcome: entry.outcome,
      metadata: entry.metadata ?? {}
    };

    const filePath = path.join(this.dir, `${day}.jsonl`);
    this.pending = this.pending
      .then(() => fs.promises.appendFile(filePath, `${JSON.stringify(payload)}\n`, { encoding: 'utf8', mode: 0o600 }))
      .catch((error: unknown) => {
        const text = error instanceof Error ? error.message : String(error);
        console.warn(`[vfs] audit: write failed (${text})`);
      });

    if (Date.now() - this.lastCleanupAt > 12 * 60 * 60 * 1000) {
      this.cleanupOldFiles();
    }
  }

  /** Resolves once every entry logged so far has reached the disk. */
  flush(): Promise<void> {
    return this.pending;
  }

  private cleanupOldFiles(): void {
    this.lastCleanupAt = Date.now();
    let files: string[] = [];
    try {
      files = fs.readdirSync(this.dir);
    } catch {
      return;
    }

    const cutoffMs = Date.now() - this.retentionDays * 24 * 60 * 60 * 1000;
    for (const file of files) {
      if (!/^\d{4}-\d{2}-\d{2}\.jsonl$/.test(file)) {
        continue;
      }
      const filePath = path.join(this.dir, file);
      try {
        const stat = fs.statSync(filePath);
        if (stat.mtimeMs < cutoffMs) {
          fs.unlinkSync(filePath);
        }
      } catch {
        // Ignore retention cleanup failures.
      }
    }
  }
}
