/**
 * @fileoverview Conversation history with a contact.
 *
 * Fetches every record the contact sent or received (sender, recipients,
 * cc, bcc), oldest first, and groups them into conversations by thread id.
 */

import { AppError } from '../../../utils/errors.js';
import { allOf, anyOf, clampMaxResults, term, wildcard, type EmailQuery } from './query.js';
import { toEmailSummary } from './format.js';
import type {
  Conversation,
  ConversationMessage,
  EmailRecord,
  EngineContext,
  MessageDirection,
} from '../types.js';

export const DEFAULT_HISTORY_MAX_RESULTS = 100;

export interface ConversationHistoryRequest {
  /** Address or address fragment */
  contact: string;
  threadId?: string;
  maxResults?: number;
}

export interface ConversationHistory {
  contact: string;
  totalEmails: number;
  threadCount: number;
  /** Thread id → messages, oldest first */
  threads: Record<string, ConversationMessage[]>;
  conversations: Conversation[];
  emails: ConversationMessage[];
}

export function buildConversationQuery(request: ConversationHistoryRequest): EmailQuery {
  const contact = request.contact.trim();
  const involvesContact = anyOf([
    wildcard('sender.email', contact),
    wildcard('recipients', contact),
    wildcard('cc', contact),
    wildcard('bcc', contact),
  ]);
  const threadId = request.threadId?.trim();

  return {
    query: allOf(threadId ? [involvesContact, term('threadId', threadId)] : [involvesContact]),
    size: clampMaxResults(request.maxResults, DEFAULT_HISTORY_MAX_RESULTS),
    sort: { field: 'date', order: 'asc' },
  };
}

export function messageDirection(record: EmailRecord, contact: string): MessageDirection {
  return record.sender.email.toLowerCase().includes(contact.trim().toLowerCase())
    ? 'from_contact'
    : 'to_contact';
}

function byDateAscending(a: ConversationMessage, b: ConversationMessage): number {
  return Date.parse(a.date) - Date.parse(b.date) || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

function participantsOf(records: EmailRecord[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    for (const address of [record.sender.email, ...record.recipients, ...record.cc, ...record.bcc]) {
      const normalized = address.trim().toLowerCase();
      if (normalized) seen.add(normalized);
    }
  }
  return [...seen];
}

/**
 * Group records by thread id, threads in order of first appearance, each
 * thread sorted oldest first.
 */
export function groupConversations(records: EmailRecord[], contact: string): Conversation[] {
  const groups = new Map<string, EmailRecord[]>();
  for (const record of records) {
    const group = groups.get(record.threadId);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.threadId, [record]);
    }
  }

  return [...groups.entries()].map(([threadId, members]) => {
    const messages = members
      .map((record) => ({ ...toEmailSummary(record), direction: messageDirection(record, contact) }))
      .sort(byDateAscending);
    return {
      threadId,
      subject: messages[0]?.subject ?? '',
      participants: participantsOf(members),
      messages,
    };
  });
}

export async function getConversationHistory(
  ctx: EngineContext,
  request: ConversationHistoryRequest
): Promise<ConversationHistory> {
  const contact = request.contact.trim();
  if (!contact) {
    throw new AppError('contact must not be empty', 'INVALID_INPUT');
  }

  const records = await ctx.store.search(buildConversationQuery({ ...request, contact }));
  const conversations = groupConversations(records, contact);

  return {
    contact,
    totalEmails: records.length,
    threadCount: conversations.length,
    threads: Object.fromEntries(conversations.map((c) => [c.threadId, c.messages])),
    conversations,
    emails: records.map((record) => ({ ...toEmailSummary(record), direction: messageDirection(record, contact) })),
  };
}
