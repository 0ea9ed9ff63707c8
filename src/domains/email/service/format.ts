/**
 * Output shaping for tool results. Bodies never leave the engine.
 */

import type { EmailAddress, EmailRecord, EmailSummary } from '../types.js';

/** "Name <email>", or the bare address when there is no display name. */
export function formatAddress(address: EmailAddress): string {
  const name = address.name.trim();
  return name ? `${name} <${address.email}>` : address.email;
}

export function toEmailSummary(record: EmailRecord): EmailSummary {
  return {
    id: record.id,
    threadId: record.threadId,
    from: formatAddress(record.sender),
    to: [...record.recipients],
    subject: record.subject,
    snippet: record.snippet,
    date: record.date,
    labels: [...record.labels],
    isRead: record.isRead,
    category: record.category,
    priority: record.priority,
    attachments: record.attachments.map((a) => a.filename),
  };
}
