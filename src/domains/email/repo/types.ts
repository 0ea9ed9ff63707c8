/**
 * @fileoverview Document store contract for email records.
 *
 * The engine only needs search, get, partial update and bulk indexing.
 * Implementations surface every failure as StoreError and never retry.
 *
 * Note: Methods return Promises for interface flexibility, but the SQLite
 * implementation (better-sqlite3) is synchronous. The async signature
 * allows swapping to a remote index without changing callers.
 */

import type { EmailQuery } from '../service/query.js';
import type { EmailRecord, EmailRecordUpdate } from '../types.js';

export interface EmailStore {
  /**
   * Execute a query. Results are ordered by the query's sort and limited
   * to `query.size`.
   */
  search(query: EmailQuery): Promise<EmailRecord[]>;

  /** Fetch one record by id. */
  get(id: string): Promise<EmailRecord | null>;

  /**
   * Apply a partial update to one record atomically.
   * @returns false if no record has this id.
   */
  update(id: string, updates: EmailRecordUpdate): Promise<boolean>;

  /**
   * Insert or replace records (ingestion). A re-indexed record keeps the
   * thread id it was first stored with.
   */
  index(records: EmailRecord[]): Promise<{ indexed: number }>;

  /** Release resources. */
  close(): Promise<void>;
}
