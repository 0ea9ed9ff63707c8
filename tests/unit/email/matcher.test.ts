import { describe, expect, it } from 'vitest';
import {
  autoFuzziness,
  boundedEditDistance,
  evaluate,
  runQuery,
  tokenize,
} from '../../../src/domains/email/repo/matcher.js';
import { StoreError } from '../../../src/utils/errors.js';
import { buildSearchQuery, type EmailQuery, type Predicate } from '../../../src/domains/email/service/query.js';
import { makeAttachment, makeEmail } from '../../fixtures/emails.js';

function query(predicate: Predicate, size = 10, order: 'asc' | 'desc' = 'desc'): EmailQuery {
  return { query: predicate, size, sort: { field: 'date', order } };
}

describe('text helpers', () => {
  it('tokenizes on letters and digits, lower-cased', () => {
    expect(tokenize('Invoice #INV-2024, due: NET-30!')).toEqual(['invoice', 'inv', '2024', 'due', 'net', '30']);
  });

  it('maps token length to AUTO fuzziness', () => {
    expect(autoFuzziness('ab')).toBe(0);
    expect(autoFuzziness('abc')).toBe(1);
    expect(autoFuzziness('abcde')).toBe(1);
    expect(autoFuzziness('abcdef')).toBe(2);
  });

  it('computes bounded edit distance', () => {
    expect(boundedEditDistance('invoice', 'invoice', 2)).toBe(0);
    expect(boundedEditDistance('invoice', 'invoise', 2)).toBe(1);
    expect(boundedEditDistance('invoice', 'invoces', 2)).toBe(2);
    expect(boundedEditDistance('invoice', 'receipt', 2)).toBe(3);
    expect(boundedEditDistance('ab', 'abcdef', 2)).toBe(3);
  });
});

describe('evaluate', () => {
  const record = makeEmail({
    subject: 'Quarterly invoice',
    bodyPlain: 'Please find the invoice attached.',
    snippet: 'Please find',
    sender: { name: 'Acme Billing', email: 'billing@acme.test' },
    recipients: ['me@example.com'],
    cc: ['boss@example.com'],
    labels: ['IMPORTANT'],
    attachments: [makeAttachment({ filename: 'contract.pdf', parsedContent: 'net 30 terms' })],
  });

  it('scores multi_match hits by field boost', () => {
    const result = evaluate(record, {
      type: 'multi_match',
      query: 'invoice',
      fields: [
        { field: 'subject', boost: 3 },
        { field: 'bodyPlain', boost: 2 },
        { field: 'snippet', boost: 1 },
      ],
      fuzzy: true,
    });
    expect(result).toEqual({ matched: true, score: 5 });
  });

  it('tolerates typos within AUTO fuzziness', () => {
    const fuzzy = evaluate(record, {
      type: 'multi_match',
      query: 'invoise',
      fields: [{ field: 'subject', boost: 1 }],
      fuzzy: true,
    });
    const exact = evaluate(record, {
      type: 'multi_match',
      query: 'invoise',
      fields: [{ field: 'subject', boost: 1 }],
      fuzzy: false,
    });
    expect(fuzzy.matched).toBe(true);
    expect(exact.matched).toBe(false);
  });

  it('matches wildcard as case-insensitive substring on any list element', () => {
    expect(evaluate(record, { type: 'wildcard', field: 'sender.email', value: 'ACME' }).matched).toBe(true);
    expect(evaluate(record, { type: 'wildcard', field: 'cc', value: 'boss@' }).matched).toBe(true);
    expect(evaluate(record, { type: 'wildcard', field: 'bcc', value: 'boss@' }).matched).toBe(false);
  });

  it('matches labels case-insensitively and other terms exactly', () => {
    expect(evaluate(record, { type: 'term', field: 'labels', value: 'important' }).matched).toBe(true);
    expect(evaluate(record, { type: 'term', field: 'hasAttachments', value: true }).matched).toBe(true);
    expect(evaluate(record, { type: 'term', field: 'isRead', value: false }).matched).toBe(false);
    expect(evaluate(record, { type: 'term', field: 'id', value: record.id.toUpperCase() }).matched).toBe(false);
  });

  it('requires minimumShouldMatch of the should clauses', () => {
    const predicate: Predicate = {
      type: 'bool',
      should: [
        { type: 'wildcard', field: 'sender.email', value: 'acme' },
        { type: 'wildcard', field: 'recipients', value: 'nobody' },
      ],
      minimumShouldMatch: 2,
    };
    expect(evaluate(record, predicate).matched).toBe(false);
    expect(evaluate(record, { ...predicate, minimumShouldMatch: 1 }).matched).toBe(true);
  });

  it('excludes mustNot matches', () => {
    expect(evaluate(record, {
      type: 'bool',
      must: [{ type: 'match_all' }],
      mustNot: [{ type: 'term', field: 'labels', value: 'IMPORTANT' }],
    }).matched).toBe(false);
  });
});

describe('range evaluation', () => {
  const early = makeEmail({ id: 'early', date: '2024-03-10T00:00:00.000Z' });
  const late = makeEmail({ id: 'late', date: '2024-03-10T23:59:59.000Z' });
  const next = makeEmail({ id: 'next', date: '2024-03-11T00:00:00.000Z' });

  it('treats date-only bounds as whole days', () => {
    const results = runQuery([early, late, next], query({ type: 'range', field: 'date', gte: '2024-03-10', lte: '2024-03-10' }));
    expect(results.map((r) => r.id)).toEqual(['late', 'early']);
  });

  it('resolves day bounds in the predicate timezone', () => {
    // March 10 in New York (DST starts that day) runs 05:00Z Mar 10 to 03:59Z Mar 11
    const results = runQuery(
      [early, late, next],
      query({ type: 'range', field: 'date', gte: '2024-03-10', lte: '2024-03-10', timeZone: 'America/New_York' })
    );
    expect(results.map((r) => r.id)).toEqual(['next', 'late']);
  });

  it('accepts full timestamps as bounds', () => {
    const results = runQuery([early, late, next], query({ type: 'range', field: 'date', gte: '2024-03-10T12:00:00Z' }));
    expect(results.map((r) => r.id)).toEqual(['next', 'late']);
  });

  it('rejects a query with an unparseable bound, even on an empty corpus', () => {
    const bad = query({ type: 'bool', must: [{ type: 'range', field: 'date', gte: 'next tuesday' }] });
    expect(() => runQuery([], bad)).toThrow(StoreError);
    expect(() => runQuery([early], bad)).toThrow('Query rejected: invalid date bound "next tuesday"');
  });

  it('never matches records with an invalid date', () => {
    const broken = makeEmail({ id: 'broken', date: 'not a date' });
    expect(runQuery([broken], query({ type: 'range', field: 'date', gte: '2000-01-01' }))).toEqual([]);
  });
});

describe('runQuery', () => {
  it('sorts by date, then relevance, then id, and applies size', () => {
    const a = makeEmail({ id: 'a', subject: 'invoice', date: '2024-03-01T10:00:00Z' });
    const b = makeEmail({ id: 'b', subject: 'invoice invoice', bodyPlain: 'invoice', date: '2024-03-01T10:00:00Z' });
    const c = makeEmail({ id: 'c', subject: 'invoice', date: '2024-03-01T10:00:00Z' });
    const d = makeEmail({ id: 'd', subject: 'invoice', date: '2024-03-05T10:00:00Z' });

    const q = buildSearchQuery({ searchText: 'invoice' });
    expect(runQuery([a, b, c, d], q).map((r) => r.id)).toEqual(['d', 'b', 'a', 'c']);
    expect(runQuery([a, b, c, d], { ...q, size: 2 }).map((r) => r.id)).toEqual(['d', 'b']);
    expect(runQuery([a, b, c, d], { ...q, sort: { field: 'date', order: 'asc' } }).map((r) => r.id))
      .toEqual(['b', 'a', 'c', 'd']);
  });
});
