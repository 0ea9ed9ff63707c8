/**
 * @fileoverview Filtered email search.
 */

import { withErrorContext } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import { buildSearchQuery, type SearchFilters } from './query.js';
import type { EmailRecord, EngineContext } from '../types.js';

const log = createLogger({ domain: 'email-search' });

/**
 * Search the store with structured filters, newest first.
 * Store failures propagate as StoreError.
 */
export async function searchEmails(ctx: EngineContext, filters: SearchFilters): Promise<EmailRecord[]> {
  const query = buildSearchQuery(filters, {
    defaultMaxResults: ctx.settings.defaultMaxResults,
    timezone: ctx.settings.timezone,
    referenceDate: ctx.now?.(),
  });

  const startedAt = Date.now();
  const records = await withErrorContext(() => ctx.store.search(query), 'search_emails');
  log.debug('search_completed', {
    filters: Object.entries(filters).filter(([, value]) => value !== undefined).map(([key]) => key),
    size: query.size,
    resultCount: records.length,
    durationMs: Date.now() - startedAt,
  });
  return records;
}
