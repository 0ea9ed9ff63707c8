/**
 * @fileoverview Email categorization.
 *
 * Delegates to the classification collaborator under a timeout and
 * schema-checks its answer. Any failure degrades to a conservative
 * fallback result; categorizeEmail never throws.
 *
 * The keyword path is a deterministic, lower-precision alternative used
 * when no classifier is configured.
 */

import { ClassificationError, errorMessage } from '../../../utils/errors.js';
import { withTimeout } from '../../../utils/async.js';
import { createLogger } from '../../../utils/observability/index.js';
import { formatAddress } from './format.js';
import {
  EMAIL_CATEGORIES,
  type CategoryResult,
  type ClassificationInput,
  type ClassificationService,
  type EmailAddress,
  type EmailCategory,
  type EmailRecord,
  type EngineSettings,
  type OwnOrganization,
  type Urgency,
} from '../types.js';

const log = createLogger({ domain: 'email-categorizer' });

export const DEFAULT_BODY_EXCERPT_CHARS = 1500;

/** Lower-case phrases that mark a payment request. */
export const PAYMENT_KEYWORDS = [
  'invoice',
  'payment',
  'amount due',
  'balance due',
  'past due',
  'overdue',
  'remittance',
  'pay now',
  'billing statement',
  'outstanding balance',
  'accounts payable',
  'net 30',
] as const;

const URGENT_PAYMENT_KEYWORDS = ['past due', 'overdue', 'final notice'];

const PROMOTIONAL_KEYWORDS = [
  'unsubscribe',
  'newsletter',
  '% off',
  'limited time',
  'special offer',
  'exclusive deal',
  'promo code',
];

const SERVICE_REQUEST_KEYWORDS = [
  'service request',
  'request for quote',
  'can you',
  'could you',
  'please help',
  'need help',
  'work order',
];

const AUTOMATED_SENDER = /^(no-?reply|do-?not-?reply|notifications?|alerts?|mailer-daemon)@/;

const URGENCIES: readonly Urgency[] = ['high', 'medium', 'low'];

type ClassificationVerdict = Omit<CategoryResult, 'source' | 'failureReason'>;

export type CategorizeContext = {
  classifier: ClassificationService | null;
  settings: Pick<EngineSettings, 'ownOrganization' | 'classifier'>;
};

// ---------------------------------------------------------------------------
// Own organization
// ---------------------------------------------------------------------------

/** Sender address contains one of the organization's domain tokens. */
export function isOwnOrganizationAddress(email: string, ownOrg: OwnOrganization): boolean {
  const address = email.toLowerCase();
  return ownOrg.domains.some((domain) => {
    const token = domain.trim().toLowerCase();
    return token.length > 0 && address.includes(token);
  });
}

/** Address check, or a company name in the display name. */
export function isOwnOrganizationSender(sender: EmailAddress, ownOrg: OwnOrganization): boolean {
  if (isOwnOrganizationAddress(sender.email, ownOrg)) return true;
  const displayName = sender.name.toLowerCase();
  return ownOrg.names.some((name) => {
    const token = name.trim().toLowerCase();
    return token.length > 0 && displayName.includes(token);
  });
}

// ---------------------------------------------------------------------------
// Classification input and response validation
// ---------------------------------------------------------------------------

export function buildClassificationInput(
  record: EmailRecord,
  bodyExcerptChars: number = DEFAULT_BODY_EXCERPT_CHARS
): ClassificationInput {
  return {
    sender: formatAddress(record.sender),
    subject: record.subject,
    snippet: record.snippet,
    bodyExcerpt: record.bodyPlain.slice(0, bodyExcerptChars),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCategory(value: unknown): value is EmailCategory {
  return EMAIL_CATEGORIES.some((category) => category === value);
}

function isUrgency(value: unknown): value is Urgency {
  return URGENCIES.some((urgency) => urgency === value);
}

function paymentCategory(isFromOwnOrganization: boolean): EmailCategory {
  return isFromOwnOrganization ? 'payment_request_internal' : 'payment_request_external';
}

function isPaymentCategory(category: string): boolean {
  return category === 'payment_request' || category.startsWith('payment_request_');
}

/**
 * Validate a raw classifier answer and reconcile the payment category with
 * the payment and own-organization flags.
 *
 * @param senderIsOwnOrganization - Deterministic address check; a sender on
 *   an own-organization domain is never external, whatever the classifier says
 * @throws ClassificationError when the answer does not match the schema
 */
export function parseClassification(raw: unknown, senderIsOwnOrganization = false): ClassificationVerdict {
  if (!isRecord(raw)) {
    throw new ClassificationError('Classifier response is not an object');
  }

  const {
    category,
    is_payment_request: isPaymentRequest,
    is_from_own_org: isFromOwnOrg,
    urgency,
    needs_response: needsResponse,
    summary,
  } = raw;

  if (typeof category !== 'string' || !(isCategory(category) || category === 'payment_request')) {
    throw new ClassificationError(`Unknown category: ${String(category)}`);
  }
  if (typeof isPaymentRequest !== 'boolean') {
    throw new ClassificationError('is_payment_request must be a boolean');
  }
  if (typeof isFromOwnOrg !== 'boolean') {
    throw new ClassificationError('is_from_own_org must be a boolean');
  }
  if (!isUrgency(urgency)) {
    throw new ClassificationError(`Unknown urgency: ${String(urgency)}`);
  }
  if (typeof needsResponse !== 'boolean') {
    throw new ClassificationError('needs_response must be a boolean');
  }
  if (typeof summary !== 'string') {
    throw new ClassificationError('summary must be a string');
  }

  const isFromOwnOrganization = isFromOwnOrg || senderIsOwnOrganization;
  const paymentRequest = isPaymentRequest || isPaymentCategory(category);
  const resolved: EmailCategory = paymentRequest
    ? paymentCategory(isFromOwnOrganization)
    : isCategory(category) ? category : 'general_correspondence';

  return {
    category: resolved,
    isPaymentRequest: paymentRequest,
    isFromOwnOrganization,
    urgency,
    needsResponse,
    summary: summary.trim(),
  };
}

// ---------------------------------------------------------------------------
// Fallback and keyword paths
// ---------------------------------------------------------------------------

/**
 * Conservative default used whenever classification fails: never flags an
 * external payment request.
 */
export function fallbackCategory(
  record: EmailRecord,
  ownOrg: OwnOrganization,
  failureReason: string
): CategoryResult {
  return {
    category: 'general_correspondence',
    isPaymentRequest: false,
    isFromOwnOrganization: isOwnOrganizationAddress(record.sender.email, ownOrg),
    urgency: 'medium',
    needsResponse: false,
    summary: 'Classification unavailable; defaulted to general correspondence.',
    source: 'fallback',
    failureReason,
  };
}

function searchableText(record: EmailRecord): string {
  return `${record.subject}\n${record.bodyPlain}`.toLowerCase();
}

function firstKeyword(text: string, keywords: readonly string[]): string | undefined {
  return keywords.find((keyword) => text.includes(keyword));
}

/**
 * Subject or body contains a payment keyword. Lower precision than the
 * classifier: "payment received" confirmations match too.
 */
export function isPaymentRequestByKeywords(record: EmailRecord): boolean {
  return firstKeyword(searchableText(record), PAYMENT_KEYWORDS) !== undefined;
}

/**
 * Deterministic keyword categorization. Rules are checked in order:
 * payment, automated sender, promotional, service request.
 */
export function categorizeByKeywords(record: EmailRecord, ownOrg: OwnOrganization): CategoryResult {
  const text = searchableText(record);
  const isFromOwnOrganization = isOwnOrganizationSender(record.sender, ownOrg);
  const base: Pick<CategoryResult, 'isPaymentRequest' | 'isFromOwnOrganization' | 'urgency' | 'needsResponse' | 'source'> = {
    isPaymentRequest: false,
    isFromOwnOrganization,
    urgency: 'medium',
    needsResponse: false,
    source: 'keywords',
  };

  const payment = firstKeyword(text, PAYMENT_KEYWORDS);
  if (payment) {
    return {
      ...base,
      category: paymentCategory(isFromOwnOrganization),
      isPaymentRequest: true,
      urgency: firstKeyword(text, URGENT_PAYMENT_KEYWORDS) ? 'high' : 'medium',
      needsResponse: !isFromOwnOrganization,
      summary: `Matched payment keyword "${payment}".`,
    };
  }

  if (AUTOMATED_SENDER.test(record.sender.email.toLowerCase())) {
    return {
      ...base,
      category: 'automated_notification',
      urgency: 'low',
      summary: 'Sent from an automated address.',
    };
  }

  const promotional = firstKeyword(text, PROMOTIONAL_KEYWORDS);
  if (promotional) {
    return {
      ...base,
      category: 'promotional',
      urgency: 'low',
      summary: `Matched promotional keyword "${promotional}".`,
    };
  }

  const service = firstKeyword(text, SERVICE_REQUEST_KEYWORDS);
  if (service) {
    return {
      ...base,
      category: 'service_request',
      needsResponse: true,
      summary: `Matched service request keyword "${service}".`,
    };
  }

  return {
    ...base,
    category: 'general_correspondence',
    summary: 'No keyword rule matched.',
  };
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Categorize one record. Always resolves with a well-formed result.
 */
export async function categorizeEmail(record: EmailRecord, ctx: CategorizeContext): Promise<CategoryResult> {
  const { ownOrganization, classifier: limits } = ctx.settings;

  if (!ctx.classifier) {
    return categorizeByKeywords(record, ownOrganization);
  }

  const classifier = ctx.classifier;
  const input = buildClassificationInput(record, limits.bodyExcerptChars);

  try {
    const raw = await withTimeout(
      (signal) => classifier.classify(input, { signal, timeoutMs: limits.timeoutMs }),
      limits.timeoutMs,
      'classification'
    );
    const verdict = parseClassification(raw, isOwnOrganizationAddress(record.sender.email, ownOrganization));
    return { ...verdict, source: 'classifier' };
  } catch (error) {
    const reason = errorMessage(error);
    log.warn('classification_fallback', { emailId: record.id, reason });
    return fallbackCategory(record, ownOrganization, reason);
  }
}
