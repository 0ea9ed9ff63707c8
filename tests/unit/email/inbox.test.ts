import { describe, expect, it, vi } from 'vitest';
import { categorizeEmails, getPriorityInbox } from '../../../src/domains/email/service/inbox.js';
import { MemoryEmailStore } from '../../../src/domains/email/repo/memory.js';
import { StoreError } from '../../../src/utils/errors.js';
import type { EmailRecord } from '../../../src/domains/email/types.js';
import { makeEmail } from '../../fixtures/emails.js';
import { createTestEngine, fakeClassifier } from '../../helpers/engine.js';

function answer(category: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    category,
    is_payment_request: false,
    is_from_own_org: false,
    urgency: 'medium',
    needs_response: false,
    summary: `Looks like ${category}.`,
    ...overrides,
  };
}

const answers = {
  'Boiler broken': answer('service_request', { urgency: 'high', needs_response: true }),
  'Invoice 9': answer('payment_request_external', { is_payment_request: true }),
  Sale: answer('promotional', { urgency: 'low' }),
  Win: answer('spam'),
};

function inboxRecords(): EmailRecord[] {
  return [
    makeEmail({ id: 'svc', subject: 'Boiler broken', date: '2024-03-11T09:00:00Z' }),
    makeEmail({ id: 'pay', subject: 'Invoice 9', date: '2024-03-09T09:00:00Z', isRead: false, labels: ['UNREAD'] }),
    makeEmail({ id: 'promo', subject: 'Sale', date: '2024-03-13T09:00:00Z' }),
    makeEmail({ id: 'spam', subject: 'Win', date: '2024-03-13T09:00:00Z' }),
    makeEmail({ id: 'gen-new', date: '2024-03-14T09:00:00Z' }),
    makeEmail({ id: 'gen-b', date: '2024-03-12T09:00:00Z' }),
    makeEmail({ id: 'gen-a', date: '2024-03-12T09:00:00Z' }),
    makeEmail({ id: 'gen-old', date: '2024-03-10T09:00:00Z' }),
  ];
}

class FailingUpdateStore extends MemoryEmailStore {
  async update(): Promise<boolean> {
    throw new StoreError('Email store unavailable: disk full');
  }
}

describe('getPriorityInbox', () => {
  it('ranks by score, then date, then id, without promotions or spam', async () => {
    const engine = createTestEngine({ records: inboxRecords(), classifier: fakeClassifier(answers) });
    const inbox = await getPriorityInbox(engine);

    expect(inbox.totalCandidates).toBe(8);
    expect(inbox.emails.map((e) => [e.email.id, e.score, e.level])).toEqual([
      ['svc', 100, 'critical'],
      ['pay', 75, 'high'],
      ['gen-new', 50, 'medium'],
      ['gen-a', 50, 'medium'],
      ['gen-b', 50, 'medium'],
      ['gen-old', 50, 'medium'],
    ]);
    expect(inbox.priorityCounts).toEqual({ critical: 1, high: 1, medium: 4, low: 0 });
    expect(inbox.emails[1].reasons).toEqual(['External payment request (+20)', 'Unread (+5)']);
    expect(inbox.emails[1].email.category).toBe('payment_request_external');
    expect(inbox.emails[1].email.priority).toBe('high');
  });

  it('keeps only entries at or above the minimum level', async () => {
    const engine = createTestEngine({ records: inboxRecords(), classifier: fakeClassifier(answers) });
    const inbox = await getPriorityInbox(engine, { minPriority: 'high' });
    expect(inbox.emails.map((e) => e.email.id)).toEqual(['svc', 'pay']);
  });

  it('limits candidates to unread mail when asked', async () => {
    const engine = createTestEngine({ records: inboxRecords(), classifier: fakeClassifier(answers) });
    const inbox = await getPriorityInbox(engine, { unreadOnly: true });
    expect(inbox.totalCandidates).toBe(1);
    expect(inbox.emails.map((e) => e.email.id)).toEqual(['pay']);
  });

  it('draws from a pool of maxResults times the over-fetch factor', async () => {
    const engine = createTestEngine({ records: inboxRecords(), classifier: fakeClassifier(answers) });
    // Pool of the 4 newest: gen-new, promo, spam, gen-a
    const inbox = await getPriorityInbox(engine, { maxResults: 2 });
    expect(inbox.totalCandidates).toBe(4);
    expect(inbox.emails.map((e) => e.email.id)).toEqual(['gen-new', 'gen-a']);
  });

  it('writes category and priority back to the store', async () => {
    const engine = createTestEngine({ records: inboxRecords(), classifier: fakeClassifier(answers) });
    await getPriorityInbox(engine);
    const stored = await engine.store.get('svc');
    expect(stored?.category).toBe('service_request');
    expect(stored?.priority).toBe('critical');
    expect((await engine.store.get('promo'))?.category).toBe('promotional');
  });

  it('skips the write when nothing changed', async () => {
    const store = new MemoryEmailStore([
      makeEmail({ id: 'svc', subject: 'Boiler broken', category: 'service_request', priority: 'critical' }),
    ]);
    const update = vi.spyOn(store, 'update');
    const engine = createTestEngine({ store, classifier: fakeClassifier(answers) });
    await getPriorityInbox(engine);
    expect(update).not.toHaveBeenCalled();
  });

  it('does not persist when disabled', async () => {
    const engine = createTestEngine({
      records: inboxRecords(),
      classifier: fakeClassifier(answers),
      settings: { persistAssignments: false },
    });
    await getPriorityInbox(engine);
    expect((await engine.store.get('svc'))?.category).toBeNull();
  });

  it('still returns the ranking when the write fails', async () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const store = new FailingUpdateStore(inboxRecords());
    const engine = createTestEngine({ store, classifier: fakeClassifier(answers) });
    const inbox = await getPriorityInbox(engine, { minPriority: 'critical' });
    expect(inbox.emails.map((e) => e.email.id)).toEqual(['svc']);

    const events = stderr.mock.calls.map(([line]) => JSON.parse(String(line)) as Record<string, unknown>);
    expect(events).toContainEqual(expect.objectContaining({
      event: 'operation_failed',
      operation: 'persist_assignment',
      code: 'STORE_UNAVAILABLE',
    }));
    stderr.mockRestore();
  });
});

describe('categorizeEmails', () => {
  it('counts every category and filters the listing', async () => {
    const engine = createTestEngine({ records: inboxRecords(), classifier: fakeClassifier(answers) });
    const result = await categorizeEmails(engine, { categoryFilter: 'promotional' });

    expect(result.totalEmails).toBe(8);
    expect(result.categoryCounts).toEqual({
      general_correspondence: 4,
      promotional: 1,
      spam: 1,
      service_request: 1,
      payment_request_external: 1,
    });
    expect(result.categoryFilter).toBe('promotional');
    expect(result.emails.map((e) => e.email.id)).toEqual(['promo']);
    expect(result.emails[0].email.category).toBe('promotional');
    expect(result.emails[0].categorization.source).toBe('classifier');
  });

  it('lists in store order without a filter', async () => {
    const engine = createTestEngine({ records: inboxRecords(), classifier: fakeClassifier(answers) });
    const result = await categorizeEmails(engine);
    expect(result.categoryFilter).toBeNull();
    expect(result.emails.map((e) => e.email.id)).toEqual([
      'gen-new', 'promo', 'spam', 'gen-a', 'gen-b', 'svc', 'gen-old', 'pay',
    ]);
  });

  it('categorizes by keywords without a classifier', async () => {
    const engine = createTestEngine({ records: [makeEmail({ id: 'k', subject: 'Overdue invoice' })] });
    const result = await categorizeEmails(engine);
    expect(result.emails[0].categorization).toMatchObject({
      category: 'payment_request_external',
      urgency: 'high',
      source: 'keywords',
    });
    expect((await engine.store.get('k'))?.category).toBe('payment_request_external');
  });
});
