/**
 * Contract tests run against both email store implementations.
 */

import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MemoryEmailStore } from '../../../src/domains/email/repo/memory.js';
import { SqliteEmailStore } from '../../../src/domains/email/repo/sqlite.js';
import { createEmailStore, type EmailStore } from '../../../src/domains/email/repo/index.js';
import { buildSearchQuery } from '../../../src/domains/email/service/query.js';
import { StoreError } from '../../../src/utils/errors.js';
import { makeEmail } from '../../fixtures/emails.js';

const factories: Array<[string, () => EmailStore]> = [
  ['MemoryEmailStore', () => new MemoryEmailStore()],
  ['SqliteEmailStore', () => new SqliteEmailStore(':memory:')],
];

describe.each(factories)('%s', (_name, createStore) => {
  let store: EmailStore;

  beforeEach(async () => {
    store = createStore();
    await store.index([
      makeEmail({ id: 'a', subject: 'Invoice 17', date: '2024-03-01T09:00:00Z', sender: { name: 'Acme', email: 'billing@acme.test' } }),
      makeEmail({ id: 'b', subject: 'Lunch?', date: '2024-03-02T09:00:00Z' }),
      makeEmail({ id: 'c', subject: 'Invoice 18', date: '2024-03-03T09:00:00Z', sender: { name: 'Acme', email: 'billing@acme.test' } }),
    ]);
  });

  afterEach(async () => {
    await store.close();
  });

  it('searches with query semantics, newest first', async () => {
    const results = await store.search(buildSearchQuery({ sender: 'acme' }));
    expect(results.map((r) => r.id)).toEqual(['c', 'a']);
  });

  it('honors the query size', async () => {
    const results = await store.search(buildSearchQuery({ maxResults: 2 }));
    expect(results.map((r) => r.id)).toEqual(['c', 'b']);
  });

  it('gets a record by id', async () => {
    expect((await store.get('b'))?.subject).toBe('Lunch?');
    expect(await store.get('missing')).toBeNull();
  });

  it('applies partial updates and leaves other fields alone', async () => {
    const updated = await store.update('a', { isRead: false, labels: ['FOLLOW_UP'], category: 'payment_request_external' });
    expect(updated).toBe(true);

    const record = await store.get('a');
    expect(record?.isRead).toBe(false);
    expect(record?.labels).toEqual(['FOLLOW_UP']);
    expect(record?.category).toBe('payment_request_external');
    expect(record?.subject).toBe('Invoice 17');
    expect(record?.priority).toBeNull();
  });

  it('returns false when updating a missing record', async () => {
    expect(await store.update('missing', { isRead: true })).toBe(false);
  });

  it('makes updates visible to subsequent searches', async () => {
    await store.update('b', { category: 'service_request' });
    const results = await store.search(buildSearchQuery({ category: 'service_request' }));
    expect(results.map((r) => r.id)).toEqual(['b']);
  });

  it('keeps the original thread id when a record is re-indexed', async () => {
    const before = await store.get('a');
    const result = await store.index([makeEmail({ id: 'a', threadId: 'other-thread', subject: 'Invoice 17 (resent)' })]);

    expect(result).toEqual({ indexed: 1 });
    const after = await store.get('a');
    expect(after?.threadId).toBe(before?.threadId);
    expect(after?.subject).toBe('Invoice 17 (resent)');
  });

  it('returns copies that do not alias stored state', async () => {
    const record = await store.get('a');
    record?.labels.push('MUTATED');
    expect((await store.get('a'))?.labels).toEqual([]);
  });

  it('rejects a query with an invalid date bound as StoreError', async () => {
    const query = buildSearchQuery({ dateFrom: 'the other day' });
    await expect(store.search(query)).rejects.toBeInstanceOf(StoreError);
  });
});

describe('SqliteEmailStore failures', () => {
  it('reports an unavailable database as StoreError', async () => {
    const store = new SqliteEmailStore(':memory:');
    await store.close();

    await expect(store.search(buildSearchQuery({}))).rejects.toMatchObject({
      name: 'StoreError',
      code: 'STORE_UNAVAILABLE',
    });
    await expect(store.update('a', { isRead: true })).rejects.toBeInstanceOf(StoreError);
  });

  it('reports a stored document without the record shape as StoreError', async () => {
    const db = new Database(':memory:');
    const store = new SqliteEmailStore(db);
    await store.index([makeEmail({ id: 'good' })]);
    db.prepare('INSERT INTO emails (id, thread_id, date, document) VALUES (?, ?, ?, ?)')
      .run('broken', 'thread-broken', '2024-03-01T09:00:00Z', '{"subject": 42}');

    await expect(store.search(buildSearchQuery({}))).rejects.toMatchObject({
      name: 'StoreError',
      message: 'Email store unavailable: corrupt document for broken',
    });
    await expect(store.get('good')).resolves.toMatchObject({ id: 'good' });
    await store.close();
  });
});

describe('createEmailStore', () => {
  it('returns the configured implementation', async () => {
    const memory = createEmailStore({ provider: 'memory', sqlitePath: ':memory:' });
    const sqlite = createEmailStore({ provider: 'sqlite', sqlitePath: ':memory:' });

    expect(memory).toBeInstanceOf(MemoryEmailStore);
    expect(sqlite).toBeInstanceOf(SqliteEmailStore);
    await sqlite.close();
  });
});
