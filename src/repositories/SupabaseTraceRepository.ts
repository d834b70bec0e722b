/**
 * Supabase implementation of ITraceRepository.
 * The payload column is text, not jsonb, so stored JSON keeps its exact bytes.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ITraceRepository } from './ITraceRepository.js';
import type { TraceRow } from '../types/database.js';
import { StorageFailureError } from '../errors.js';

export class SupabaseTraceRepository implements ITraceRepository {
  constructor(private readonly db: SupabaseClient) {}

  async upsert(row: TraceRow): Promise<void> {
    const { error } = await this.db
      .from('traces')
      .upsert(row, { onConflict: 'id', ignoreDuplicates: true });

    if (error) throw new StorageFailureError('persist trace', error.message);
  }

  async findById(id: string): Promise<TraceRow | null> {
    const { data, error } = await this.db
      .from('traces')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new StorageFailureError('fetch trace', error.message);
    return data ?? null;
  }

  async findBySession(sessionId: string): Promise<TraceRow[]> {
    const { data, error } = await this.db
      .from('traces')
      .select('*')
      .eq('session_id', sessionId)
      .order('created_at', { ascending: true });

    if (error) throw new StorageFailureError('fetch traces', error.message);
    return data ?? [];
  }
}
