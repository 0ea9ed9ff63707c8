/**
 * @fileoverview SQLite-backed email store.
 *
 * Records are stored as JSON documents keyed by id, with the thread id and
 * date in their own indexed columns. Queries are evaluated in process by
 * the shared matcher; the corpus is small enough that a full scan per
 * query is acceptable.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { StoreError, errorMessage } from '../../../utils/errors.js';
import { runQuery } from './matcher.js';
import { applyUpdate, pinThread } from './records.js';
import type { EmailStore } from './types.js';
import type { EmailQuery } from '../service/query.js';
import type { EmailRecord, EmailRecordUpdate } from '../types.js';

type EmailRow = {
  id: string;
  thread_id: string;
  date: string;
  document: string;
};

function isEmailDocument(value: unknown): value is EmailRecord {
  return typeof value === 'object' && value !== null
    && 'subject' in value && typeof value.subject === 'string'
    && 'attachments' in value && Array.isArray(value.attachments);
}

function rowToRecord(row: EmailRow): EmailRecord {
  const document: unknown = JSON.parse(row.document);
  if (!isEmailDocument(document)) {
    throw new StoreError(`Email store unavailable: corrupt document for ${row.id}`, { id: row.id });
  }
  return { ...document, id: row.id, threadId: row.thread_id };
}

export class SqliteEmailStore implements EmailStore {
  private db: Database.Database;

  /**
   * @param source - File path, ':memory:', or an open database handle
   */
  constructor(source: string | Database.Database) {
    if (typeof source === 'string') {
      if (source !== ':memory:') {
        const dir = path.dirname(source);
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true });
        }
      }
      this.db = new Database(source);
      this.db.pragma('journal_mode = WAL');
    } else {
      this.db = source;
    }
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS emails (
        id          TEXT PRIMARY KEY,
        thread_id   TEXT NOT NULL,
        date        TEXT NOT NULL,
        document    TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_emails_thread ON emails(thread_id);
      CREATE INDEX IF NOT EXISTS idx_emails_date ON emails(date);
    `);
  }

  /**
   * Run a database operation, converting driver failures to StoreError.
   * StoreErrors raised by query validation pass through unchanged.
   */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StoreError) throw error;
      throw new StoreError(`Email store unavailable: ${errorMessage(error)}`, { operation });
    }
  }

  private getRow(id: string): EmailRecord | null {
    const row = this.db
      .prepare<[string], EmailRow>('SELECT * FROM emails WHERE id = ?')
      .get(id);
    return row ? rowToRecord(row) : null;
  }

  private writeRecord(record: EmailRecord): void {
    this.db
      .prepare(
        `INSERT INTO emails (id, thread_id, date, document) VALUES (?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET date = excluded.date, document = excluded.document`
      )
      .run(record.id, record.threadId, record.date, JSON.stringify(record));
  }

  async search(query: EmailQuery): Promise<EmailRecord[]> {
    return this.guard('search', () => {
      const rows = this.db.prepare<[], EmailRow>('SELECT * FROM emails').all();
      return runQuery(rows.map(rowToRecord), query);
    });
  }

  async get(id: string): Promise<EmailRecord | null> {
    return this.guard('get', () => this.getRow(id));
  }

  async update(id: string, updates: EmailRecordUpdate): Promise<boolean> {
    return this.guard('update', () =>
      this.db.transaction(() => {
        const existing = this.getRow(id);
        if (!existing) return false;
        this.writeRecord(applyUpdate(existing, updates));
        return true;
      })()
    );
  }

  async index(records: EmailRecord[]): Promise<{ indexed: number }> {
    return this.guard('index', () =>
      this.db.transaction((batch: EmailRecord[]) => {
        for (const record of batch) {
          this.writeRecord(pinThread(this.getRow(record.id), record));
        }
        return { indexed: batch.length };
      })(records)
    );
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
