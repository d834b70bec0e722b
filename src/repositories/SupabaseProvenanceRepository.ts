/**
 * Supabase implementation of IProvenanceRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IProvenanceRepository } from './IProvenanceRepository.js';
import type { ProvenanceRow } from '../types/database.js';
import { StorageFailureError } from '../errors.js';

export class SupabaseProvenanceRepository implements IProvenanceRepository {
  constructor(private readonly db: SupabaseClient) {}

  async upsert(row: ProvenanceRow): Promise<void> {
    const { error } = await this.db
      .from('provenance')
      .upsert(row, { onConflict: 'id', ignoreDuplicates: true });

    if (error) throw new StorageFailureError('persist provenance', error.message);
  }

  async findByTrace(traceId: string): Promise<ProvenanceRow[]> {
    const { data, error } = await this.db
      .from('provenance')
      .select('*')
      .eq('trace_id', traceId)
      .order('created_at', { ascending: true });

    if (error) throw new StorageFailureError('fetch provenance', error.message);
    return data ?? [];
  }

  async existsForTrace(traceId: string): Promise<boolean> {
    const { count, error } = await this.db
      .from('provenance')
      .select('id', { count: 'exact', head: true })
      .eq('trace_id', traceId);

    if (error) throw new StorageFailureError('count provenance', error.message);
    return (count ?? 0) > 0;
  }
}
