/**
 * Supabase implementation of ISessionRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ISessionRepository } from './ISessionRepository.js';
import type { SessionRow } from '../types/database.js';
import { StorageFailureError } from '../errors.js';

export class SupabaseSessionRepository implements ISessionRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: SessionRow): Promise<SessionRow> {
    const { data, error } = await this.db
      .from('sessions')
      .insert(row)
      .select()
      .single();

    if (error) throw new StorageFailureError('insert session', error.message);
    return data;
  }

  async findById(id: string): Promise<SessionRow | null> {
    const { data, error } = await this.db
      .from('sessions')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new StorageFailureError('fetch session', error.message);
    return data ?? null;
  }
}
