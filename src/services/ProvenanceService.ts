/**
 * Provenance service.
 * Appends audit records whose content hash is a deterministic function of
 * what was recorded, so a stored record can later be checked for tampering.
 */

import { createHash, randomUUID } from 'node:crypto';
import type { IProvenanceRepository } from '../repositories/IProvenanceRepository.js';
import type { JsonValue, Provenance, SessionId, TraceId } from '../types/index.js';
import { provenanceFromRow, provenanceToRow } from '../repositories/rows.js';
import { InvalidConfigError } from '../errors.js';

const MAX_OPERATION_LENGTH = 100;

export interface RecordProvenanceInput {
  operation: string;
  source?: string;
  rationale?: string | null;
  /** The content the operation acted on. */
  content: JsonValue;
}

export interface HashableProvenance {
  sessionId: SessionId;
  traceId: TraceId;
  operation: string;
  source: string;
  rationale: string | null;
  content: JsonValue;
}

/** JSON with object keys sorted at every level. */
export function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}

export function computeContentHash(input: HashableProvenance): string {
  return createHash('sha256')
    .update(
      canonicalJson({
        sessionId: input.sessionId,
        traceId: input.traceId,
        operation: input.operation,
        source: input.source,
        rationale: input.rationale,
        content: input.content,
      })
    )
    .digest('hex');
}

export class ProvenanceService {
  constructor(
    private readonly provenanceRepo: IProvenanceRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  async record(sessionId: SessionId, traceId: TraceId, input: RecordProvenanceInput): Promise<Provenance> {
    const operation = input.operation.trim();
    if (!operation || operation.length > MAX_OPERATION_LENGTH) {
      throw new InvalidConfigError(
        `operation must be 1-${MAX_OPERATION_LENGTH} characters`
      );
    }

    const source = input.source ?? 'unknown';
    const rationale = input.rationale ?? null;
    const record: Provenance = Object.freeze({
      id: randomUUID(),
      sessionId,
      traceId,
      operation,
      source,
      rationale,
      contentHash: computeContentHash({
        sessionId,
        traceId,
        operation,
        source,
        rationale,
        content: input.content,
      }),
      createdAt: this.now(),
    });

    await this.provenanceRepo.upsert(provenanceToRow(record));
    return record;
  }

  /** True when the record's hash matches the content it claims to cover. */
  verify(record: Provenance, content: JsonValue): boolean {
    return (
      computeContentHash({
        sessionId: record.sessionId,
        traceId: record.traceId,
        operation: record.operation,
        source: record.source,
        rationale: record.rationale,
        content,
      }) === record.contentHash
    );
  }

  async listForTrace(traceId: TraceId): Promise<Provenance[]> {
    const rows = await this.provenanceRepo.findByTrace(traceId);
    return rows.map(provenanceFromRow);
  }

  async hasProvenance(traceId: TraceId): Promise<boolean> {
    return this.provenanceRepo.existsForTrace(traceId);
  }
}
