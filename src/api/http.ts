/**
 * Request parsing and response helpers shared by the endpoint modules.
 * validateBody has already checked field types by the time these run;
 * the readers narrow `unknown` to what the services take.
 */

import type { JsonValue } from '../types/index.js';
import { parseId } from '../types/index.js';
import { ValidationError } from '../errors.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export type Body = Record<string, unknown>;

export function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status, headers: JSON_HEADERS });
}

function isBody(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function readBody(req: Request): Promise<Body> {
  const parsed: unknown = await req.json();
  if (!isBody(parsed)) throw new ValidationError('Request body must be a JSON object');
  return parsed;
}

/**
 * Id segment of the path, counted from the end.
 * `/api/v1/traces/:id/merge` → pathId(req, 2).
 */
export function pathId(req: Request, fromEnd = 1): string {
  const parts = new URL(req.url).pathname.replace(/\/$/, '').split('/');
  const raw = parts[parts.length - fromEnd] ?? '';
  const id = parseId(raw);
  if (!id) throw new ValidationError(`"${raw}" is not a valid id`);
  return id;
}

export function readString(body: Body, field: string): string {
  const value = body[field];
  if (typeof value !== 'string') throw new ValidationError(`${field} must be a string`);
  return value;
}

export function readOptionalString(body: Body, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  return readString(body, field);
}

export function readNumber(body: Body, field: string): number {
  const value = body[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a number`);
  }
  return value;
}

export function readOptionalNumber(body: Body, field: string): number | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  return readNumber(body, field);
}

export function readBoolean(body: Body, field: string): boolean {
  const value = body[field];
  if (typeof value !== 'boolean') throw new ValidationError(`${field} must be a boolean`);
  return value;
}

export function readOptionalBoolean(body: Body, field: string): boolean | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  return readBoolean(body, field);
}

export function readOptionalId(body: Body, field: string): string | undefined {
  const raw = readOptionalString(body, field);
  if (raw === undefined) return undefined;
  const id = parseId(raw);
  if (!id) throw new ValidationError(`${field} must be a valid id`);
  return id;
}

export function readMatrix(body: Body, field: string): number[][] {
  const value = body[field];
  if (!Array.isArray(value)) throw new ValidationError(`${field} must be an array of rows`);
  return value.map((row, i) => {
    if (!Array.isArray(row)) throw new ValidationError(`${field}[${i}] must be an array`);
    return row.map((cell, j) => {
      if (typeof cell !== 'number') {
        throw new ValidationError(`${field}[${i}][${j}] must be a number`);
      }
      return cell;
    });
  });
}

export function readJson(body: Body, field: string): JsonValue {
  const value = toJsonValue(body[field]);
  if (value === undefined) throw new ValidationError(`${field} must be a JSON value`);
  return value;
}

export function readOptionalJson(body: Body, field: string): JsonValue | undefined {
  if (body[field] === undefined) return undefined;
  return readJson(body, field);
}

/** Narrow a parsed body value to JsonValue. Undefined when it is not one. */
function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const converted = toJsonValue(item);
      if (converted === undefined) return undefined;
      items.push(converted);
    }
    return items;
  }
  if (typeof value === 'object') {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toJsonValue(item);
      if (converted === undefined) return undefined;
      out[key] = converted;
    }
    return out;
  }
  return undefined;
}
