/**
 * Supabase implementation of ICheckpointRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ICheckpointRepository } from './ICheckpointRepository.js';
import type { CheckpointRow } from '../types/database.js';
import { StorageFailureError } from '../errors.js';

export class SupabaseCheckpointRepository implements ICheckpointRepository {
  constructor(private readonly db: SupabaseClient) {}

  async upsert(row: CheckpointRow): Promise<void> {
    const { error } = await this.db
      .from('governance_checkpoints')
      .upsert(row, { onConflict: 'id', ignoreDuplicates: true });

    if (error) throw new StorageFailureError('persist checkpoint', error.message);
  }

  async findByTrace(traceId: string): Promise<CheckpointRow[]> {
    const { data, error } = await this.db
      .from('governance_checkpoints')
      .select('*')
      .eq('trace_id', traceId)
      .order('created_at', { ascending: true });

    if (error) throw new StorageFailureError('fetch checkpoints', error.message);
    return data ?? [];
  }
}
