/**
 * Identifiers.
 * Sessions and traces are keyed by random v4 UUIDs, stored lower-case.
 */

import { randomUUID } from 'node:crypto';

export type SessionId = string;
export type TraceId = string;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-8][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

export function newSessionId(): SessionId {
  return randomUUID();
}

export function newTraceId(): TraceId {
  return randomUUID();
}

/** Normalizes an externally supplied id. Returns null when it is not a UUID. */
export function parseId(value: string): string | null {
  return isUuid(value) ? value.toLowerCase() : null;
}
