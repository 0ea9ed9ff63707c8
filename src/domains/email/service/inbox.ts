/**
 * @fileoverview Batch triage: categorize a result set, or rank it into a
 * priority inbox.
 *
 * Records are classified with bounded parallelism and joined back in input
 * order before any ranking, so output order never depends on which
 * classification finished first.
 */

import { mapWithConcurrency } from '../../../utils/async.js';
import { safeExecute } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import { categorizeEmail } from './categorizer.js';
import { toEmailSummary } from './format.js';
import { scorePriority } from './priority.js';
import { clampMaxResults } from './query.js';
import { searchEmails } from './search.js';
import {
  PRIORITY_LEVELS,
  type CategoryResult,
  type EmailCategory,
  type EmailRecord,
  type EmailRecordUpdate,
  type EmailSummary,
  type EngineContext,
  type PriorityLevel,
  type PriorityResult,
} from '../types.js';

const log = createLogger({ domain: 'email-triage' });

export const DEFAULT_CATEGORIZE_MAX_RESULTS = 50;
export const DEFAULT_PRIORITY_MAX_RESULTS = 20;

const EXCLUDED_FROM_INBOX: ReadonlySet<EmailCategory> = new Set(['promotional', 'spam']);

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CategorizeEmailsRequest {
  dateFrom?: string;
  dateTo?: string;
  categoryFilter?: EmailCategory;
  maxResults?: number;
}

export interface CategorizedEmail {
  email: EmailSummary;
  categorization: CategoryResult;
}

export interface CategorizeEmailsResult {
  totalEmails: number;
  categoryCounts: Partial<Record<EmailCategory, number>>;
  categoryFilter: EmailCategory | null;
  emails: CategorizedEmail[];
}

export interface PriorityInboxRequest {
  dateFrom?: string;
  unreadOnly?: boolean;
  minPriority?: PriorityLevel;
  maxResults?: number;
}

export interface PriorityInboxEntry {
  email: EmailSummary;
  score: number;
  level: PriorityLevel;
  reasons: string[];
  categorization: CategoryResult;
}

export interface PriorityInboxResult {
  totalCandidates: number;
  priorityCounts: Record<PriorityLevel, number>;
  emails: PriorityInboxEntry[];
}

export type ScoredRecord = {
  record: EmailRecord;
  categorization: CategoryResult;
  priority: PriorityResult;
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Write derived assignments back to the store. A failed write is logged;
 * the computed result is still returned to the caller.
 */
async function persistAssignment(ctx: EngineContext, record: EmailRecord, updates: EmailRecordUpdate): Promise<void> {
  if (!ctx.settings.persistAssignments) return;
  const changed = (updates.category !== undefined && updates.category !== record.category)
    || (updates.priority !== undefined && updates.priority !== record.priority);
  if (!changed) return;

  // A failed write never fails the listing.
  const result = await safeExecute(() => ctx.store.update(record.id, updates), 'persist_assignment');
  if (!result.success) {
    log.warn('assignment_persist_failed', { emailId: record.id, error: result.error });
  } else if (!result.data) {
    log.warn('assignment_target_missing', { emailId: record.id });
  }
}

function levelRank(level: PriorityLevel): number {
  return PRIORITY_LEVELS.indexOf(level);
}

/** Score desc, then newest first, then id. */
export function compareScored(a: ScoredRecord, b: ScoredRecord): number {
  return b.priority.score - a.priority.score
    || Date.parse(b.record.date) - Date.parse(a.record.date)
    || (a.record.id < b.record.id ? -1 : a.record.id > b.record.id ? 1 : 0);
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

export async function categorizeEmails(
  ctx: EngineContext,
  request: CategorizeEmailsRequest = {}
): Promise<CategorizeEmailsResult> {
  const records = await searchEmails(ctx, {
    dateFrom: request.dateFrom,
    dateTo: request.dateTo,
    maxResults: request.maxResults ?? DEFAULT_CATEGORIZE_MAX_RESULTS,
  });

  const categorized = await mapWithConcurrency(records, ctx.settings.classifier.concurrency, async (record) => {
    const categorization = await categorizeEmail(record, ctx);
    await persistAssignment(ctx, record, { category: categorization.category });
    return {
      email: toEmailSummary({ ...record, category: categorization.category }),
      categorization,
    };
  });

  const categoryCounts: Partial<Record<EmailCategory, number>> = {};
  for (const { categorization } of categorized) {
    categoryCounts[categorization.category] = (categoryCounts[categorization.category] ?? 0) + 1;
  }

  const filter = request.categoryFilter ?? null;
  return {
    totalEmails: records.length,
    categoryCounts,
    categoryFilter: filter,
    emails: filter ? categorized.filter((entry) => entry.categorization.category === filter) : categorized,
  };
}

export async function getPriorityInbox(
  ctx: EngineContext,
  request: PriorityInboxRequest = {}
): Promise<PriorityInboxResult> {
  const maxResults = clampMaxResults(request.maxResults, DEFAULT_PRIORITY_MAX_RESULTS);
  const records = await searchEmails(ctx, {
    dateFrom: request.dateFrom,
    isRead: request.unreadOnly ? false : undefined,
    maxResults: maxResults * Math.max(1, ctx.settings.overFetchFactor),
  });

  const { weights, thresholds } = ctx.settings.priority;
  const scored = await mapWithConcurrency(records, ctx.settings.classifier.concurrency, async (record): Promise<ScoredRecord> => {
    const categorization = await categorizeEmail(record, ctx);
    const priority = scorePriority(record, categorization, weights, thresholds);
    await persistAssignment(ctx, record, { category: categorization.category, priority: priority.level });
    return { record, categorization, priority };
  });

  const minRank = request.minPriority ? levelRank(request.minPriority) : levelRank('low');
  const ranked = scored
    .filter((entry) => !EXCLUDED_FROM_INBOX.has(entry.categorization.category))
    .filter((entry) => levelRank(entry.priority.level) <= minRank)
    .sort(compareScored)
    .slice(0, maxResults);

  const priorityCounts: Record<PriorityLevel, number> = { critical: 0, high: 0, medium: 0, low: 0 };
  for (const entry of ranked) {
    priorityCounts[entry.priority.level]++;
  }

  return {
    totalCandidates: records.length,
    priorityCounts,
    emails: ranked.map(({ record, categorization, priority }) => ({
      email: toEmailSummary({ ...record, category: categorization.category, priority: priority.level }),
      score: priority.score,
      level: priority.level,
      reasons: priority.reasons,
      categorization,
    })),
  };
}
