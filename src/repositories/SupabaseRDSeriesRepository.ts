/**
 * Supabase implementation of IRDSeriesRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IRDSeriesRepository } from './IRDSeriesRepository.js';
import type { RDSeriesRow } from '../types/database.js';
import { StorageFailureError } from '../errors.js';

export class SupabaseRDSeriesRepository implements IRDSeriesRepository {
  constructor(private readonly db: SupabaseClient) {}

  async upsert(row: RDSeriesRow): Promise<void> {
    const { error } = await this.db
      .from('rd_series')
      .upsert(row, { onConflict: 'session_id' });

    if (error) throw new StorageFailureError('persist rd series', error.message);
  }

  async findBySession(sessionId: string): Promise<RDSeriesRow | null> {
    const { data, error } = await this.db
      .from('rd_series')
      .select('*')
      .eq('session_id', sessionId)
      .maybeSingle();

    if (error) throw new StorageFailureError('fetch rd series', error.message);
    return data ?? null;
  }
}
