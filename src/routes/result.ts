import type { Request } from 'express';
import { isRecord } from '../helpers.js';

export type GatewayResult =
  | { kind: 'ok'; status?: number; body?: Record<string, unknown> }
  | { kind: 'file'; filePath: string; filename: string; contentType: string }
  | { kind: 'html'; status: number; html: string }
  | { kind: 'unauthorized'; message: string }
  | { kind: 'badRequest'; message: string }
  | { kind: 'notFound'; message: string }
  | { kind: 'conflict'; message: string }
  | { kind: 'methodNotAllowed'; message: string }
  | { kind: 'tooLarge'; message: string }
  | { kind: 'tooManyRequests'; message: string; retryAfterSec: number }
  | { kind: 'internal'; message: string };

export type FailureResult = Extract<GatewayResult, { message: string }>;

export interface RequestContext {
  req: Request;
  /** Bearer token from the Authorization header, if any. */
  token: string | null;
  clientIp: string;
  body: unknown;
  query(name: string): string | undefined;
}

export type RouteHandler = (ctx: RequestContext) => Promise<GatewayResult>;

export function ok(body: Record<string, unknown> = {}, status = 200): GatewayResult {
  return { kind: 'ok', status, body };
}

export function unauthorized(message = 'Unauthorized'): GatewayResult {
  return { kind: 'unauthorized', message };
}

export function badRequest(message: string): GatewayResult {
  return { kind: 'badRequest', message };
}

export function notFound(message: string): GatewayResult {
  return { kind: 'notFound', message };
}

export function conflict(message: string): GatewayResult {
  return { kind: 'conflict', message };
}

export function internal(message: string): GatewayResult {
  return { kind: 'internal', message };
}

export function statusFor(result: FailureResult): number {
  switch (result.kind) {
    case 'unauthorized':
      return 401;
    case 'badRequest':
      return 400;
    case 'notFound':
      return 404;
    case 'conflict':
      return 409;
    case 'methodNotAllowed':
      return 405;
    case 'tooLarge':
      return 413;
    case 'tooManyRequests':
      return 429;
    case 'internal':
      return 500;
  }
}

export function readStringValue(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return typeof value[0] === 'string' ? value[0] : undefined;
  }
  return undefined;
}

export function readStringBodyField(body: unknown, key: string): string | undefined {
  const candidate = readBodyField(body, key);
  return typeof candidate === 'string' ? candidate : undefined;
}

/** Accepts JSON booleans and the strings "true"/"false" (any case). */
export function parseBooleanValue(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') {
      return true;
    }
    if (normalized === 'false') {
      return false;
    }
  }
  return undefined;
}

export function readBodyField(body: unknown, key: string): unknown {
  return isRecord(body) ? body[key] : undefined;
}
