/**
 * Session data access interface.
 */

import type { SessionRow } from '../types/database.js';

export interface ISessionRepository {
  insert(row: SessionRow): Promise<SessionRow>;

  findById(id: string): Promise<SessionRow | null>;
}
