/**
 * @fileoverview In-memory email store.
 *
 * Holds records in a Map and evaluates queries with the shared matcher.
 * Data is lost on process restart. Use for tests and local experiments.
 */

import { runQuery } from './matcher.js';
import { applyUpdate, cloneRecord, pinThread } from './records.js';
import type { EmailStore } from './types.js';
import type { EmailQuery } from '../service/query.js';
import type { EmailRecord, EmailRecordUpdate } from '../types.js';

export class MemoryEmailStore implements EmailStore {
  private records = new Map<string, EmailRecord>();

  constructor(seed: EmailRecord[] = []) {
    for (const record of seed) {
      this.records.set(record.id, pinThread(this.records.get(record.id), record));
    }
  }

  async search(query: EmailQuery): Promise<EmailRecord[]> {
    return runQuery(this.records.values(), query).map(cloneRecord);
  }

  async get(id: string): Promise<EmailRecord | null> {
    const record = this.records.get(id);
    return record ? cloneRecord(record) : null;
  }

  async update(id: string, updates: EmailRecordUpdate): Promise<boolean> {
    const record = this.records.get(id);
    if (!record) return false;
    this.records.set(id, applyUpdate(record, updates));
    return true;
  }

  async index(records: EmailRecord[]): Promise<{ indexed: number }> {
    for (const record of records) {
      this.records.set(record.id, pinThread(this.records.get(record.id), record));
    }
    return { indexed: records.length };
  }

  async close(): Promise<void> {
    this.records.clear();
  }

  /** Number of stored records. */
  get size(): number {
    return this.records.size;
  }
}
