/**
 * @fileoverview Priority scoring.
 *
 * Starts from a base score, applies one additive adjustment per signal
 * (each recorded as a reason), clamps to [0, 100] and maps the score to a
 * level. Weights are empirical; both weights and thresholds can be
 * overridden from configuration.
 */

import type {
  CategoryResult,
  EmailCategory,
  EmailRecord,
  PriorityLevel,
  PriorityResult,
  PriorityThresholds,
  PriorityWeights,
} from '../types.js';

export const DEFAULT_PRIORITY_WEIGHTS: PriorityWeights = {
  base: 50,
  serviceRequest: 30,
  externalPaymentRequest: 20,
  highUrgency: 25,
  lowUrgency: -10,
  needsResponse: 15,
  important: 10,
  starred: 10,
  unread: 5,
  lowValue: -40,
};

export const DEFAULT_PRIORITY_THRESHOLDS: PriorityThresholds = {
  critical: 80,
  high: 65,
  medium: 40,
};

const LOW_VALUE_CATEGORIES: ReadonlySet<EmailCategory> = new Set([
  'promotional',
  'spam',
  'automated_notification',
]);

function hasLabel(record: EmailRecord, label: string): boolean {
  return record.labels.some((value) => value.toUpperCase() === label);
}

function formatAdjustment(label: string, delta: number): string {
  return `${label} (${delta >= 0 ? '+' : ''}${delta})`;
}

export function priorityLevel(
  score: number,
  thresholds: PriorityThresholds = DEFAULT_PRIORITY_THRESHOLDS
): PriorityLevel {
  if (score >= thresholds.critical) return 'critical';
  if (score >= thresholds.high) return 'high';
  if (score >= thresholds.medium) return 'medium';
  return 'low';
}

/**
 * Score a record given its category result.
 *
 * IMPORTANT, STARRED and UNREAD come from the record's labels only.
 */
export function scorePriority(
  record: EmailRecord,
  category: CategoryResult,
  weights: PriorityWeights = DEFAULT_PRIORITY_WEIGHTS,
  thresholds: PriorityThresholds = DEFAULT_PRIORITY_THRESHOLDS
): PriorityResult {
  let score = weights.base;
  const reasons: string[] = [];

  const apply = (applies: boolean, label: string, delta: number): void => {
    if (!applies) return;
    score += delta;
    reasons.push(formatAdjustment(label, delta));
  };

  apply(category.category === 'service_request', 'Service request', weights.serviceRequest);
  apply(
    category.isPaymentRequest && !category.isFromOwnOrganization,
    'External payment request',
    weights.externalPaymentRequest
  );
  apply(category.urgency === 'high', 'High urgency', weights.highUrgency);
  apply(category.urgency === 'low', 'Low urgency', weights.lowUrgency);
  apply(category.needsResponse, 'Needs response', weights.needsResponse);
  apply(hasLabel(record, 'IMPORTANT'), 'Marked important', weights.important);
  apply(hasLabel(record, 'STARRED'), 'Starred', weights.starred);
  apply(hasLabel(record, 'UNREAD'), 'Unread', weights.unread);
  apply(
    LOW_VALUE_CATEGORIES.has(category.category),
    `Low-value category: ${category.category}`,
    weights.lowValue
  );

  const clamped = Math.min(100, Math.max(0, Math.round(score)));
  return { score: clamped, level: priorityLevel(clamped, thresholds), reasons };
}
