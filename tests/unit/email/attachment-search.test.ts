import { describe, expect, it } from 'vitest';
import {
  buildAttachmentQuery,
  matchRecordAttachments,
  searchAttachments,
} from '../../../src/domains/email/service/attachment-search.js';
import { AppError } from '../../../src/utils/errors.js';
import { makeAttachment, makeEmail } from '../../fixtures/emails.js';
import { createTestEngine } from '../../helpers/engine.js';

const XLSX = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

const records = [
  makeEmail({
    id: 'contract-mail',
    subject: 'Signed paperwork',
    date: '2024-03-14T09:00:00Z',
    attachments: [
      makeAttachment({ filename: 'logo.png', mimeType: 'image/png', parsedContent: 'net 30' }),
      makeAttachment({ filename: 'contract.pdf', parsedContent: 'Payment terms: net 30 days.' }),
      makeAttachment({ filename: 'terms.xlsx', mimeType: XLSX, sizeBytes: 2048, parsedContent: 'net 30 schedule' }),
    ],
  }),
  makeEmail({
    id: 'filename-mail',
    subject: 'Paperwork',
    date: '2024-03-13T09:00:00Z',
    attachments: [makeAttachment({ filename: 'net 30 terms.pdf' })],
  }),
  makeEmail({
    id: 'body-mail',
    subject: 'Net 30 question',
    date: '2024-03-12T09:00:00Z',
    attachments: [makeAttachment({ filename: 'report.pdf' })],
  }),
  makeEmail({
    id: 'logo-only',
    subject: 'Branding',
    date: '2024-03-11T09:00:00Z',
    attachments: [makeAttachment({ filename: 'logo.png', mimeType: 'image/png', parsedContent: 'net 30' })],
  }),
  makeEmail({
    id: 'no-attachments',
    subject: 'Terms',
    bodyPlain: 'We agreed on net 30.',
    date: '2024-03-10T09:00:00Z',
  }),
  makeEmail({
    id: 'unrelated',
    subject: 'Quarterly report',
    date: '2024-03-09T09:00:00Z',
    attachments: [makeAttachment({ filename: 'q1.pdf', parsedContent: 'Revenue grew.' })],
  }),
];

describe('buildAttachmentQuery', () => {
  it('over-fetches by the configured factor', () => {
    expect(buildAttachmentQuery({ searchText: 'net 30' }).size).toBe(20);
    expect(buildAttachmentQuery({ searchText: 'net 30', maxResults: 5 }, { overFetchFactor: 3 }).size).toBe(15);
  });

  it('requires attachments and matches attachment or message text', () => {
    const { query } = buildAttachmentQuery({ searchText: 'net 30' });
    expect(query).toMatchObject({
      type: 'bool',
      must: [
        { type: 'term', field: 'hasAttachments', value: true },
        { type: 'bool', minimumShouldMatch: 1 },
      ],
    });
  });
});

describe('matchRecordAttachments', () => {
  it('trims long content to a window around the first match', () => {
    const content = `${'a'.repeat(150)}NET 30${'b'.repeat(150)}`;
    const record = makeEmail({ attachments: [makeAttachment({ parsedContent: content })] });
    const hit = matchRecordAttachments(record, 'net 30');
    expect(hit?.matchReason).toBe('content');
    expect(hit?.matchingAttachments[0].context).toBe(`...${'a'.repeat(100)}NET 30${'b'.repeat(100)}...`);
  });

  it('returns null when no relevant attachment remains', () => {
    const record = makeEmail({
      subject: 'net 30',
      attachments: [makeAttachment({ filename: 'signature.gif', mimeType: 'image/gif' })],
    });
    expect(matchRecordAttachments(record, 'net 30')).toBeNull();
  });
});

describe('searchAttachments', () => {
  it('reports content, filename and message-only matches, newest first', async () => {
    const engine = createTestEngine({ records });
    const result = await searchAttachments(engine, { searchText: ' net 30 ' });

    expect(result.searchText).toBe('net 30');
    expect(result.totalResults).toBe(3);
    expect(result.results.map((hit) => [hit.email.id, hit.matchReason])).toEqual([
      ['contract-mail', 'content'],
      ['filename-mail', 'filename'],
      ['body-mail', 'none'],
    ]);

    expect(result.results[0].matchingAttachments).toEqual([
      {
        filename: 'contract.pdf',
        mimeType: 'application/pdf',
        sizeBytes: 1024,
        matchType: 'content',
        context: 'Payment terms: net 30 days.',
      },
      {
        filename: 'terms.xlsx',
        mimeType: XLSX,
        sizeBytes: 2048,
        matchType: 'content',
        context: 'net 30 schedule',
      },
    ]);
    expect(result.results[1].matchingAttachments).toEqual([
      {
        filename: 'net 30 terms.pdf',
        mimeType: 'application/pdf',
        sizeBytes: 1024,
        matchType: 'filename',
        context: null,
      },
    ]);
    expect(result.results[2].matchingAttachments).toEqual([]);
  });

  it('applies the file type filter before matching', async () => {
    const engine = createTestEngine({ records });
    const result = await searchAttachments(engine, { searchText: 'net 30', fileType: '.xlsx' });
    expect(result.results.map((hit) => hit.email.id)).toEqual(['contract-mail']);
    expect(result.results[0].matchingAttachments.map((a) => a.filename)).toEqual(['terms.xlsx']);
  });

  it('stops once the requested number of results is reached', async () => {
    const engine = createTestEngine({ records });
    const result = await searchAttachments(engine, { searchText: 'net 30', maxResults: 1 });
    expect(result.totalResults).toBe(1);
    expect(result.results[0].email.id).toBe('contract-mail');
  });

  it('rejects an empty search phrase', async () => {
    const engine = createTestEngine({ records });
    await expect(searchAttachments(engine, { searchText: '   ' })).rejects.toBeInstanceOf(AppError);
  });
});
