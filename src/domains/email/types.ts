/**
 * @fileoverview Email domain type definitions.
 *
 * Shared by the query builder, store adapters, categorizer, priority scorer
 * and the tool surface.
 */

import type { EmailStore } from './repo/types.js';

/** Sender identity as parsed from the From header. */
export interface EmailAddress {
  name: string;
  email: string;
}

export interface EmailAttachment {
  filename: string;
  mimeType: string;
  sizeBytes: number;
  /** Text produced by the extraction collaborator, if any */
  parsedContent?: string | null;
}

/** Closed set of semantic categories. */
export const EMAIL_CATEGORIES = [
  'payment_request_external',
  'payment_request_internal',
  'service_request',
  'general_correspondence',
  'promotional',
  'spam',
  'automated_notification',
] as const;

export type EmailCategory = (typeof EMAIL_CATEGORIES)[number];

export const PRIORITY_LEVELS = ['critical', 'high', 'medium', 'low'] as const;

export type PriorityLevel = (typeof PRIORITY_LEVELS)[number];

export type Urgency = 'high' | 'medium' | 'low';

/** One stored email message. `id` and `threadId` never change once assigned. */
export interface EmailRecord {
  id: string;
  threadId: string;
  sender: EmailAddress;
  recipients: string[];
  cc: string[];
  bcc: string[];
  subject: string;
  bodyPlain: string;
  /** Kept for display only; never searched */
  bodyHtml?: string;
  snippet: string;
  /** ISO-8601 timestamp */
  date: string;
  labels: string[];
  isRead: boolean;
  isStarred: boolean;
  isImportant: boolean;
  attachments: EmailAttachment[];
  category: EmailCategory | null;
  priority: PriorityLevel | null;
}

/** Fields a partial update may touch. Everything else is immutable. */
export type EmailRecordUpdate = Partial<
  Pick<EmailRecord, 'isRead' | 'isStarred' | 'isImportant' | 'labels' | 'category' | 'priority'>
>;

export const UPDATABLE_FIELDS = [
  'isRead',
  'isStarred',
  'isImportant',
  'labels',
  'category',
  'priority',
] as const satisfies ReadonlyArray<keyof EmailRecordUpdate>;

/** Where a category came from. */
export type CategorySource = 'classifier' | 'fallback' | 'keywords';

export interface CategoryResult {
  category: EmailCategory;
  isPaymentRequest: boolean;
  isFromOwnOrganization: boolean;
  urgency: Urgency;
  needsResponse: boolean;
  /** One-sentence rationale */
  summary: string;
  source: CategorySource;
  /** Set when the classifier failed and the fallback was used */
  failureReason?: string;
}

export interface PriorityResult {
  score: number;
  level: PriorityLevel;
  reasons: string[];
}

/** How the user's own company is recognized. */
export interface OwnOrganization {
  /** Address fragments such as "example.com" */
  domains: string[];
  /** Company names as they appear in display names or subjects */
  names: string[];
}

/** Compact view of a record for tool output (no bodies). */
export interface EmailSummary {
  id: string;
  threadId: string;
  from: string;
  to: string[];
  subject: string;
  snippet: string;
  date: string;
  labels: string[];
  isRead: boolean;
  category: EmailCategory | null;
  priority: PriorityLevel | null;
  attachments: string[];
}

export type MessageDirection = 'from_contact' | 'to_contact';

export interface ConversationMessage extends EmailSummary {
  direction: MessageDirection;
}

export interface Conversation {
  threadId: string;
  subject: string;
  participants: string[];
  messages: ConversationMessage[];
}

// ---------------------------------------------------------------------------
// Collaborators and engine context
// ---------------------------------------------------------------------------

/** What the classification collaborator sees for one record. */
export interface ClassificationInput {
  /** "Name <email>" */
  sender: string;
  subject: string;
  snippet: string;
  bodyExcerpt: string;
}

export interface ClassifyOptions {
  signal: AbortSignal;
  timeoutMs: number;
}

/**
 * External natural-language classifier. The result is untrusted and is
 * schema-checked by the categorizer before use.
 */
export interface ClassificationService {
  classify(input: ClassificationInput, options: ClassifyOptions): Promise<unknown>;
}

export interface PriorityWeights {
  base: number;
  serviceRequest: number;
  externalPaymentRequest: number;
  highUrgency: number;
  lowUrgency: number;
  needsResponse: number;
  important: number;
  starred: number;
  unread: number;
  lowValue: number;
}

/** Minimum score for each level above `low`. */
export interface PriorityThresholds {
  critical: number;
  high: number;
  medium: number;
}

export interface EngineSettings {
  /** IANA timezone for relative dates */
  timezone: string;
  defaultMaxResults: number;
  /** Candidate multiplier for searches that post-filter their results */
  overFetchFactor: number;
  /** Write category and priority back to the store after triage */
  persistAssignments: boolean;
  ownOrganization: OwnOrganization;
  classifier: {
    timeoutMs: number;
    concurrency: number;
    bodyExcerptChars: number;
  };
  priority: {
    weights: PriorityWeights;
    thresholds: PriorityThresholds;
  };
}

/**
 * Everything an engine operation needs, passed explicitly.
 * `classifier` is null when no classification service is configured.
 */
export interface EngineContext {
  store: EmailStore;
  classifier: ClassificationService | null;
  settings: EngineSettings;
  /** Clock for relative dates; defaults to the current time */
  now?: () => Date;
}
