import type { AuditLogger } from './audit-log.js';

export interface GatewayLogger {
  info(message: string): void;
  /** Per-operation detail; only emitted in debug mode. */
  debug(message: string): void;
  error(message: string): void;
  security(message: string, metadata?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
  prefix?: string;
  debug?: boolean;
  audit?: AuditLogger;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): GatewayLogger {
  const prefix = options.prefix ?? '[vfs]';
  const debugEnabled = options.debug === true;
  return {
    info(message) {
      console.log(`${prefix} ${message}`);
    },
    debug(message) {
      if (debugEnabled) {
        console.log(`${prefix} ${message}`);
      }
    },
    error(message) {
      console.error(`${prefix} ${message}`);
    },
    security(message, metadata = {}) {
      console.warn(`${prefix} security: ${message}`);
      options.audit?.log({
        event: 'security',
        actor: typeof metadata.actor === 'string' ? metadata.actor : 'system',
        outcome: 'failure',
        metadata: { message, ...metadata }
      });
    }
  };
}

export const silentLogger: GatewayLogger = {
  info() {},
  debug() {},
  error() {},
  security() {}
};
