/**
 * @fileoverview In-process evaluation of the email query DSL.
 *
 * Shared by the memory and SQLite stores. Semantics follow the search engine
 * the DSL is modelled on:
 * - multi_match tokenizes, lower-cases and matches any query token against
 *   any field token within AUTO fuzziness; boosts weight the relevance score
 * - wildcard is a case-insensitive substring test (any element for lists)
 * - term is exact equality (membership for lists; labels ignore case)
 * - range bounds without a time component cover the whole day
 * - bool: all `must`, no `mustNot`, at least `minimumShouldMatch` of `should`
 */

import { DateTime } from 'luxon';
import { StoreError } from '../../../utils/errors.js';
import type { EmailQuery, Predicate, TermField, TextField, WildcardField } from '../service/query.js';
import type { EmailRecord } from '../types.js';

type Evaluation = { matched: boolean; score: number };

const NO_MATCH: Evaluation = { matched: false, score: 0 };

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

// ---------------------------------------------------------------------------
// Field access
// ---------------------------------------------------------------------------

function textValues(record: EmailRecord, field: TextField | WildcardField): string[] {
  switch (field) {
    case 'subject':
      return [record.subject];
    case 'bodyPlain':
      return [record.bodyPlain];
    case 'snippet':
      return [record.snippet];
    case 'sender.name':
      return [record.sender.name];
    case 'sender.email':
      return [record.sender.email];
    case 'recipients':
      return record.recipients;
    case 'cc':
      return record.cc;
    case 'bcc':
      return record.bcc;
    case 'attachments.filename':
      return record.attachments.map((a) => a.filename);
    case 'attachments.parsedContent':
      return record.attachments.map((a) => a.parsedContent ?? '');
  }
}

function termValues(record: EmailRecord, field: TermField): Array<string | boolean | null> {
  switch (field) {
    case 'id':
      return [record.id];
    case 'threadId':
      return [record.threadId];
    case 'category':
      return [record.category];
    case 'priority':
      return [record.priority];
    case 'labels':
      return record.labels;
    case 'isRead':
      return [record.isRead];
    case 'isStarred':
      return [record.isStarred];
    case 'isImportant':
      return [record.isImportant];
    case 'hasAttachments':
      return [record.attachments.length > 0];
  }
}

// ---------------------------------------------------------------------------
// Fuzzy text matching
// ---------------------------------------------------------------------------

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/** Edit distance allowed for a token of this length (AUTO fuzziness). */
export function autoFuzziness(token: string): number {
  if (token.length <= 2) return 0;
  if (token.length <= 5) return 1;
  return 2;
}

/**
 * Levenshtein distance, giving up as soon as it must exceed `max`.
 * Returns max + 1 in that case.
 */
export function boundedEditDistance(a: string, b: string, max: number): number {
  if (Math.abs(a.length - b.length) > max) return max + 1;
  if (a === b) return 0;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    let rowMin = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      const value = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
      current.push(value);
      rowMin = Math.min(rowMin, value);
    }
    if (rowMin > max) return max + 1;
    previous = current;
  }
  const distance = previous[b.length];
  return distance > max ? max + 1 : distance;
}

function tokenMatches(queryToken: string, fieldTokens: Set<string>, fuzzy: boolean): boolean {
  if (fieldTokens.has(queryToken)) return true;
  if (!fuzzy) return false;
  const max = autoFuzziness(queryToken);
  if (max === 0) return false;
  for (const candidate of fieldTokens) {
    if (boundedEditDistance(queryToken, candidate, max) <= max) return true;
  }
  return false;
}

function evaluateMultiMatch(
  record: EmailRecord,
  predicate: Extract<Predicate, { type: 'multi_match' }>
): Evaluation {
  const queryTokens = tokenize(predicate.query);
  if (queryTokens.length === 0) return NO_MATCH;

  let score = 0;
  for (const { field, boost } of predicate.fields) {
    const fieldTokens = new Set(textValues(record, field).flatMap(tokenize));
    if (fieldTokens.size === 0) continue;
    const hits = queryTokens.filter((token) => tokenMatches(token, fieldTokens, predicate.fuzzy)).length;
    score += hits * boost;
  }
  return score > 0 ? { matched: true, score } : NO_MATCH;
}

// ---------------------------------------------------------------------------
// Range
// ---------------------------------------------------------------------------

function parseBound(value: string, edge: 'start' | 'end', timeZone: string): number {
  const zone = timeZone || 'utc';
  if (DATE_ONLY.test(value)) {
    const day = DateTime.fromISO(value, { zone });
    if (day.isValid) {
      return (edge === 'start' ? day.startOf('day') : day.endOf('day')).toMillis();
    }
  } else {
    const instant = DateTime.fromISO(value, { zone });
    if (instant.isValid) return instant.toMillis();
  }
  throw new StoreError(`Query rejected: invalid date bound "${value}"`, { reason: 'query_rejected' });
}

export function recordTimestamp(record: EmailRecord): number {
  const parsed = DateTime.fromISO(record.date, { zone: 'utc' });
  return parsed.isValid ? parsed.toMillis() : Number.NaN;
}

function evaluateRange(
  record: EmailRecord,
  predicate: Extract<Predicate, { type: 'range' }>
): Evaluation {
  const timestamp = recordTimestamp(record);
  if (Number.isNaN(timestamp)) return NO_MATCH;
  const zone = predicate.timeZone ?? 'utc';
  if (predicate.gte !== undefined && timestamp < parseBound(predicate.gte, 'start', zone)) return NO_MATCH;
  if (predicate.lte !== undefined && timestamp > parseBound(predicate.lte, 'end', zone)) return NO_MATCH;
  return { matched: true, score: 0 };
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

function evaluateBool(
  record: EmailRecord,
  predicate: Extract<Predicate, { type: 'bool' }>
): Evaluation {
  let score = 0;

  for (const clause of predicate.must ?? []) {
    const result = evaluate(record, clause);
    if (!result.matched) return NO_MATCH;
    score += result.score;
  }

  for (const clause of predicate.mustNot ?? []) {
    if (evaluate(record, clause).matched) return NO_MATCH;
  }

  const should = predicate.should ?? [];
  if (should.length > 0) {
    const required = predicate.minimumShouldMatch
      ?? ((predicate.must?.length ?? 0) === 0 ? 1 : 0);
    let matchedCount = 0;
    for (const clause of should) {
      const result = evaluate(record, clause);
      if (result.matched) {
        matchedCount++;
        score += result.score;
      }
    }
    if (matchedCount < required) return NO_MATCH;
  }

  return { matched: true, score };
}

/**
 * Evaluate a predicate against one record.
 * Throws StoreError when the predicate itself is invalid.
 */
export function evaluate(record: EmailRecord, predicate: Predicate): Evaluation {
  switch (predicate.type) {
    case 'match_all':
      return { matched: true, score: 0 };
    case 'multi_match':
      return evaluateMultiMatch(record, predicate);
    case 'wildcard': {
      const needle = predicate.value.toLowerCase();
      const matched = textValues(record, predicate.field)
        .some((value) => value.toLowerCase().includes(needle));
      return matched ? { matched: true, score: 0 } : NO_MATCH;
    }
    case 'term': {
      const values = termValues(record, predicate.field);
      const expected = predicate.value;
      const matched = predicate.field === 'labels' && typeof expected === 'string'
        ? values.some((value) => typeof value === 'string' && value.toLowerCase() === expected.toLowerCase())
        : values.some((value) => value === expected);
      return matched ? { matched: true, score: 0 } : NO_MATCH;
    }
    case 'range':
      return evaluateRange(record, predicate);
    case 'bool':
      return evaluateBool(record, predicate);
  }
}

/**
 * Reject queries whose range bounds cannot be parsed, before scanning any
 * record (an empty store must reject the same queries as a full one).
 */
export function validateQuery(predicate: Predicate): void {
  if (predicate.type === 'range') {
    const zone = predicate.timeZone ?? 'utc';
    if (predicate.gte !== undefined) parseBound(predicate.gte, 'start', zone);
    if (predicate.lte !== undefined) parseBound(predicate.lte, 'end', zone);
    return;
  }
  if (predicate.type === 'bool') {
    for (const clause of [...(predicate.must ?? []), ...(predicate.should ?? []), ...(predicate.mustNot ?? [])]) {
      validateQuery(clause);
    }
  }
}

/**
 * Filter, sort and limit records for a query.
 * Sort is by date, then relevance score (desc), then id, so equal inputs
 * always give the same order.
 */
export function runQuery(records: Iterable<EmailRecord>, query: EmailQuery): EmailRecord[] {
  validateQuery(query.query);

  const hits: Array<{ record: EmailRecord; score: number; timestamp: number }> = [];
  for (const record of records) {
    const result = evaluate(record, query.query);
    if (result.matched) {
      const timestamp = recordTimestamp(record);
      hits.push({ record, score: result.score, timestamp: Number.isNaN(timestamp) ? 0 : timestamp });
    }
  }

  const direction = query.sort.order === 'asc' ? 1 : -1;
  hits.sort((a, b) =>
    (a.timestamp - b.timestamp) * direction
    || b.score - a.score
    || (a.record.id < b.record.id ? -1 : a.record.id > b.record.id ? 1 : 0)
  );

  return hits.slice(0, query.size).map((hit) => hit.record);
}
