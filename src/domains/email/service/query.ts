/**
 * @fileoverview Query builder for the email document store.
 *
 * Translates a structured filter request into a small, store-agnostic query
 * DSL modelled on Elasticsearch's bool/term/range/multi_match vocabulary.
 * The output is plain data and fully deterministic, so identical filters
 * always produce identical queries.
 */

import { normalizeRelativeDate } from '../../../services/date/index.js';
import type { EmailCategory } from '../types.js';

// ---------------------------------------------------------------------------
// Query DSL
// ---------------------------------------------------------------------------

/** Analyzed text fields usable in multi_match. */
export type TextField =
  | 'subject'
  | 'bodyPlain'
  | 'snippet'
  | 'sender.name'
  | 'attachments.filename'
  | 'attachments.parsedContent';

/** Fields usable in wildcard (case-insensitive substring) predicates. */
export type WildcardField =
  | 'sender.email'
  | 'sender.name'
  | 'recipients'
  | 'cc'
  | 'bcc'
  | 'attachments.filename';

/** Exact-value fields. */
export type TermField =
  | 'id'
  | 'threadId'
  | 'category'
  | 'priority'
  | 'labels'
  | 'isRead'
  | 'isStarred'
  | 'isImportant'
  | 'hasAttachments';

export type WeightedField = { field: TextField; boost: number };

export type Predicate =
  | { type: 'match_all' }
  | { type: 'multi_match'; query: string; fields: WeightedField[]; fuzzy: boolean }
  | { type: 'wildcard'; field: WildcardField; value: string }
  | { type: 'term'; field: TermField; value: string | boolean }
  | { type: 'range'; field: 'date'; gte?: string; lte?: string; timeZone?: string }
  | {
      type: 'bool';
      must?: Predicate[];
      should?: Predicate[];
      mustNot?: Predicate[];
      minimumShouldMatch?: number;
    };

export type SortOrder = 'asc' | 'desc';

export interface EmailQuery {
  query: Predicate;
  size: number;
  sort: { field: 'date'; order: SortOrder };
}

// ---------------------------------------------------------------------------
// Filters
// ---------------------------------------------------------------------------

export interface SearchFilters {
  searchText?: string;
  sender?: string;
  recipient?: string;
  category?: EmailCategory;
  /** YYYY-MM-DD or a relative expression ("last week", "past 7 days") */
  dateFrom?: string;
  dateTo?: string;
  hasAttachments?: boolean;
  labels?: string[];
  isRead?: boolean;
  maxResults?: number;
}

export interface BuildQueryOptions {
  /** Default result bound when the filters carry none */
  defaultMaxResults?: number;
  /** IANA timezone for relative dates and day-granular bounds */
  timezone?: string;
  /** For testing relative dates */
  referenceDate?: Date;
  order?: SortOrder;
}

export const DEFAULT_MAX_RESULTS = 10;
export const MAX_RESULTS_CAP = 500;

/** Free-text fields, weighted subject > body > snippet. */
export const MESSAGE_TEXT_FIELDS: WeightedField[] = [
  { field: 'subject', boost: 3 },
  { field: 'bodyPlain', boost: 2 },
  { field: 'snippet', boost: 1 },
];

export const ATTACHMENT_TEXT_FIELDS: WeightedField[] = [
  { field: 'attachments.filename', boost: 2 },
  { field: 'attachments.parsedContent', boost: 1 },
];

// ---------------------------------------------------------------------------
// Predicate helpers
// ---------------------------------------------------------------------------

export function matchAll(): Predicate {
  return { type: 'match_all' };
}

export function term(field: TermField, value: string | boolean): Predicate {
  return { type: 'term', field, value };
}

export function wildcard(field: WildcardField, value: string): Predicate {
  return { type: 'wildcard', field, value };
}

export function fuzzyText(query: string, fields: WeightedField[]): Predicate {
  return { type: 'multi_match', query, fields, fuzzy: true };
}

/** At least one of `predicates` must match. */
export function anyOf(predicates: Predicate[]): Predicate {
  return { type: 'bool', should: predicates, minimumShouldMatch: 1 };
}

/** Combine predicates with AND; none → match everything. */
export function allOf(predicates: Predicate[]): Predicate {
  if (predicates.length === 0) return matchAll();
  return { type: 'bool', must: predicates };
}

/** Sender: substring on the address, or on the display name. */
export function senderPredicate(sender: string): Predicate {
  const value = sender.trim();
  return anyOf([
    wildcard('sender.email', value),
    wildcard('sender.name', value),
  ]);
}

export function recipientPredicate(recipient: string): Predicate {
  const value = recipient.trim();
  return anyOf([
    wildcard('recipients', value),
    wildcard('cc', value),
  ]);
}

/**
 * Inclusive date range. Relative expressions are normalized first; an
 * unrecognized value is passed through for the store to accept or reject.
 */
export function dateRangePredicate(
  dateFrom: string | undefined,
  dateTo: string | undefined,
  options: BuildQueryOptions = {}
): Predicate | null {
  const dateOptions = { timezone: options.timezone, referenceDate: options.referenceDate };
  const gte = normalizeRelativeDate(dateFrom, dateOptions);
  const lte = normalizeRelativeDate(dateTo, dateOptions);
  if (!gte && !lte) return null;

  return {
    type: 'range',
    field: 'date',
    ...(gte ? { gte } : {}),
    ...(lte ? { lte } : {}),
    ...(options.timezone ? { timeZone: options.timezone } : {}),
  };
}

export function clampMaxResults(value: number | undefined, fallback: number): number {
  const requested = value ?? fallback;
  if (!Number.isFinite(requested)) return fallback;
  return Math.min(Math.max(Math.floor(requested), 1), MAX_RESULTS_CAP);
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

/**
 * Build the filter predicates for a request, one per supplied filter, in a
 * fixed order.
 */
export function buildFilterPredicates(
  filters: SearchFilters,
  options: BuildQueryOptions = {}
): Predicate[] {
  const must: Predicate[] = [];

  const text = filters.searchText?.trim();
  if (text) {
    must.push(fuzzyText(text, MESSAGE_TEXT_FIELDS));
  }
  const sender = filters.sender?.trim();
  if (sender) {
    must.push(senderPredicate(sender));
  }
  const recipient = filters.recipient?.trim();
  if (recipient) {
    must.push(recipientPredicate(recipient));
  }
  if (filters.category) {
    must.push(term('category', filters.category));
  }

  const range = dateRangePredicate(filters.dateFrom, filters.dateTo, options);
  if (range) {
    must.push(range);
  }

  if (filters.hasAttachments !== undefined) {
    must.push(term('hasAttachments', filters.hasAttachments));
  }
  for (const label of filters.labels ?? []) {
    const value = label.trim();
    if (value) must.push(term('labels', value));
  }
  if (filters.isRead !== undefined) {
    must.push(term('isRead', filters.isRead));
  }

  return must;
}

/**
 * Build a store query from search filters. Results sort newest first unless
 * `options.order` says otherwise.
 */
export function buildSearchQuery(
  filters: SearchFilters,
  options: BuildQueryOptions = {}
): EmailQuery {
  return {
    query: allOf(buildFilterPredicates(filters, options)),
    size: clampMaxResults(filters.maxResults, options.defaultMaxResults ?? DEFAULT_MAX_RESULTS),
    sort: { field: 'date', order: options.order ?? 'desc' },
  };
}
