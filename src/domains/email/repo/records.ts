/**
 * @fileoverview Record helpers shared by the store implementations.
 */

import type { EmailRecord, EmailRecordUpdate } from '../types.js';

/** Deep copy so callers never hold a reference into store state. */
export function cloneRecord(record: EmailRecord): EmailRecord {
  return structuredClone(record);
}

/** Apply only the defined fields of a partial update. */
export function applyUpdate(record: EmailRecord, updates: EmailRecordUpdate): EmailRecord {
  const next = cloneRecord(record);
  if (updates.isRead !== undefined) next.isRead = updates.isRead;
  if (updates.isStarred !== undefined) next.isStarred = updates.isStarred;
  if (updates.isImportant !== undefined) next.isImportant = updates.isImportant;
  if (updates.labels !== undefined) next.labels = [...updates.labels];
  if (updates.category !== undefined) next.category = updates.category;
  if (updates.priority !== undefined) next.priority = updates.priority;
  return next;
}

/** Incoming record for re-indexing, pinned to the existing thread id. */
export function pinThread(existing: EmailRecord | null | undefined, incoming: EmailRecord): EmailRecord {
  const next = cloneRecord(incoming);
  if (existing) next.threadId = existing.threadId;
  return next;
}
