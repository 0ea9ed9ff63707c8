/**
 * @fileoverview Classification prompt construction.
 *
 * The instructions are fixed apart from the own-organization identity, so
 * identical inputs always produce identical requests.
 */

import { EMAIL_CATEGORIES, type ClassificationInput, type OwnOrganization } from '../types.js';

function describeOwnOrganization(ownOrg: OwnOrganization): string {
  const parts: string[] = [];
  if (ownOrg.names.length > 0) parts.push(`Company names: ${ownOrg.names.join(', ')}`);
  if (ownOrg.domains.length > 0) parts.push(`Email domains: ${ownOrg.domains.join(', ')}`);
  return parts.length > 0 ? parts.join('\n') : '(No organization configured; treat every sender as external)';
}

/**
 * Build the system prompt for the classifier.
 */
export function buildClassificationPrompt(ownOrg: OwnOrganization): string {
  return `You are classifying a single email for an inbox triage system.

## User's Organization
${describeOwnOrganization(ownOrg)}

Payment requests or invoices sent FROM the user's organization are outgoing (payment_request_internal), not bills the user has to pay.

## Categories
${EMAIL_CATEGORIES.map((category) => `- ${category}`).join('\n')}

- payment_request_external: an invoice, bill or request for payment from another party
- payment_request_internal: an invoice or payment request from the user's own organization
- service_request: someone asks the user to do work, quote, fix or deliver something
- promotional: marketing, newsletters, offers
- spam: unsolicited or fraudulent mail
- automated_notification: receipts, alerts and system messages nobody needs to answer
- general_correspondence: anything else

## Response Format
Return ONLY a JSON object, no prose:
{
  "category": "<one of the categories above>",
  "is_payment_request": true | false,
  "is_from_own_org": true | false,
  "urgency": "high" | "medium" | "low",
  "needs_response": true | false,
  "summary": "One sentence explaining the classification"
}`;
}

/**
 * Render the email as the user message.
 */
export function buildClassificationMessage(input: ClassificationInput): string {
  return `From: ${input.sender}
Subject: ${input.subject}
Snippet: ${input.snippet}

${input.bodyExcerpt}`;
}
