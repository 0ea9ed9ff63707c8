/**
 * Anthropic client construction.
 */

import Anthropic from '@anthropic-ai/sdk';

/**
 * Create an Anthropic client. Retries are disabled: callers bound every
 * request with their own timeout and fall back on failure.
 */
export function createClient(apiKey: string): Anthropic {
  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY not configured');
  }
  return new Anthropic({ apiKey, maxRetries: 0 });
}
