/**
 * @fileoverview Search inside email attachments.
 *
 * The store query is deliberately loose (fuzzy, OR over attachment and
 * message text) and over-fetches by `overFetchFactor`; the exact phrase is
 * then checked here against relevant attachments only. The factor bounds
 * the candidate pool, so a result list may come back short when most
 * candidates are discarded.
 */

import { AppError } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import { extractContextWindow, matchesFileType, relevantAttachments } from './attachments.js';
import { toEmailSummary } from './format.js';
import {
  ATTACHMENT_TEXT_FIELDS,
  allOf,
  anyOf,
  clampMaxResults,
  dateRangePredicate,
  fuzzyText,
  senderPredicate,
  term,
  type EmailQuery,
  type Predicate,
  type WeightedField,
} from './query.js';
import type { EmailAttachment, EmailRecord, EmailSummary, EngineContext } from '../types.js';

const log = createLogger({ domain: 'attachment-search' });

export const DEFAULT_ATTACHMENT_MAX_RESULTS = 10;
export const DEFAULT_OVER_FETCH_FACTOR = 2;

export type AttachmentMatchType = 'content' | 'filename';

/** How a hit was found; 'none' means only the message subject or body matched. */
export type MatchReason = AttachmentMatchType | 'none';

export interface AttachmentSearchRequest {
  searchText: string;
  /** Extension ("pdf", ".xlsx") or MIME fragment */
  fileType?: string;
  sender?: string;
  dateFrom?: string;
  dateTo?: string;
  maxResults?: number;
}

export interface AttachmentMatch {
  filename: string;
  mimeType: string;
  sizeBytes: number;
  matchType: AttachmentMatchType;
  /** Text around the first content occurrence */
  context: string | null;
}

export interface AttachmentSearchHit {
  email: EmailSummary;
  matchReason: MatchReason;
  matchingAttachments: AttachmentMatch[];
}

export interface AttachmentSearchResult {
  searchText: string;
  totalResults: number;
  results: AttachmentSearchHit[];
}

export interface AttachmentQueryOptions {
  overFetchFactor?: number;
  timezone?: string;
  referenceDate?: Date;
}

/** Subject and body only; the snippet is derived from the body. */
const MESSAGE_FIELDS: WeightedField[] = [
  { field: 'subject', boost: 3 },
  { field: 'bodyPlain', boost: 2 },
];

export function buildAttachmentQuery(
  request: AttachmentSearchRequest,
  options: AttachmentQueryOptions = {}
): EmailQuery {
  const text = request.searchText.trim();
  const must: Predicate[] = [term('hasAttachments', true)];

  const sender = request.sender?.trim();
  if (sender) {
    must.push(senderPredicate(sender));
  }
  const range = dateRangePredicate(request.dateFrom, request.dateTo, options);
  if (range) {
    must.push(range);
  }
  must.push(anyOf([
    fuzzyText(text, ATTACHMENT_TEXT_FIELDS),
    fuzzyText(text, MESSAGE_FIELDS),
  ]));

  const factor = Math.max(1, Math.floor(options.overFetchFactor ?? DEFAULT_OVER_FETCH_FACTOR));
  return {
    query: allOf(must),
    size: clampMaxResults(request.maxResults, DEFAULT_ATTACHMENT_MAX_RESULTS) * factor,
    sort: { field: 'date', order: 'desc' },
  };
}

function matchAttachment(attachment: EmailAttachment, phrase: string): AttachmentMatch | null {
  const base = {
    filename: attachment.filename,
    mimeType: attachment.mimeType,
    sizeBytes: attachment.sizeBytes,
  };
  const context = attachment.parsedContent
    ? extractContextWindow(attachment.parsedContent, phrase)
    : null;
  if (context !== null) {
    return { ...base, matchType: 'content', context };
  }
  if (attachment.filename.toLowerCase().includes(phrase.toLowerCase())) {
    return { ...base, matchType: 'filename', context: null };
  }
  return null;
}

/**
 * Evaluate one candidate record. Returns null when the record has no
 * relevant attachment, or nothing about it contains the phrase.
 */
export function matchRecordAttachments(
  record: EmailRecord,
  phrase: string,
  fileType?: string
): AttachmentSearchHit | null {
  const relevant = relevantAttachments(record.attachments)
    .filter((attachment) => !fileType || matchesFileType(attachment, fileType));
  if (relevant.length === 0) return null;

  const matches = relevant
    .map((attachment) => matchAttachment(attachment, phrase))
    .filter((match): match is AttachmentMatch => match !== null);

  if (matches.length > 0) {
    return {
      email: toEmailSummary(record),
      matchReason: matches.some((match) => match.matchType === 'content') ? 'content' : 'filename',
      matchingAttachments: matches,
    };
  }

  const needle = phrase.toLowerCase();
  if (record.subject.toLowerCase().includes(needle) || record.bodyPlain.toLowerCase().includes(needle)) {
    return { email: toEmailSummary(record), matchReason: 'none', matchingAttachments: [] };
  }
  return null;
}

export async function searchAttachments(
  ctx: EngineContext,
  request: AttachmentSearchRequest
): Promise<AttachmentSearchResult> {
  const phrase = request.searchText.trim();
  if (!phrase) {
    throw new AppError('searchText must not be empty', 'INVALID_INPUT');
  }

  const maxResults = clampMaxResults(request.maxResults, DEFAULT_ATTACHMENT_MAX_RESULTS);
  const query = buildAttachmentQuery({ ...request, searchText: phrase, maxResults }, {
    overFetchFactor: ctx.settings.overFetchFactor,
    timezone: ctx.settings.timezone,
    referenceDate: ctx.now?.(),
  });
  const candidates = await ctx.store.search(query);

  const results: AttachmentSearchHit[] = [];
  for (const record of candidates) {
    if (results.length >= maxResults) break;
    const hit = matchRecordAttachments(record, phrase, request.fileType?.trim());
    if (hit) results.push(hit);
  }

  log.debug('attachment_search_completed', {
    candidateCount: candidates.length,
    resultCount: results.length,
    poolSize: query.size,
  });

  return { searchText: phrase, totalResults: results.length, results };
}
