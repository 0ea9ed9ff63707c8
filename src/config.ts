/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the engine requires.
 *
 * @see .env.example for the supported environment variables
 */

import 'dotenv/config';
import { isValidTimezone } from './services/date/index.js';

// ---------------------------------------------------------------------------
// Config helpers — make required vs optional intent explicit
// ---------------------------------------------------------------------------

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an optional boolean env var (defaults to `defaultValue`). */
function optionalBool(key: string, defaultValue: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return defaultValue;
  return raw !== (defaultValue ? 'false' : 'true') ? defaultValue : !defaultValue;
}

/** Read a comma-separated list env var. Empty entries are dropped. */
function optionalList(key: string, defaultValue: string[]): string[] {
  const raw = process.env[key];
  if (!raw) return defaultValue;
  return raw.split(',').map((item) => item.trim()).filter(Boolean);
}

/** Return a path that differs between dev and production. */
function dbPath(envKey: string, prodPath: string, devPath: string): string {
  return process.env[envKey] || (process.env.NODE_ENV === 'production' ? prodPath : devPath);
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  port: optionalInt('PORT', 3000),
  nodeEnv: optional('NODE_ENV', 'development'),
  /** Optional. When absent the keyword categorizer replaces the LLM classifier. */
  anthropicApiKey: process.env.ANTHROPIC_API_KEY,

  /** IANA timezone used to resolve "today" for relative dates */
  timezone: optional('TIMEZONE', 'UTC'),

  /** Natural-language classification collaborator */
  classifier: {
    modelId: optional('CLASSIFIER_MODEL_ID', 'claude-sonnet-4-5-20250929'),
    timeoutMs: optionalInt('CLASSIFIER_TIMEOUT_MS', 10000),
    concurrency: optionalInt('CLASSIFIER_CONCURRENCY', 4),
    bodyExcerptChars: optionalInt('CLASSIFIER_BODY_EXCERPT_CHARS', 1500),
  },

  /** Identity of the user's own organization (payment requests from it are outgoing) */
  ownOrganization: {
    domains: optionalList('OWN_ORG_DOMAINS', []),
    names: optionalList('OWN_ORG_NAMES', []),
  },

  /** Document store configuration */
  store: {
    provider: optional('EMAIL_STORE_PROVIDER', 'sqlite') as 'sqlite' | 'memory',
    sqlitePath: dbPath('EMAIL_STORE_SQLITE_PATH', '/app/data/emails.db', './data/emails.db'),
  },

  /** Search defaults */
  search: {
    defaultMaxResults: optionalInt('SEARCH_DEFAULT_MAX_RESULTS', 10),
    attachmentOverFetchFactor: optionalInt('ATTACHMENT_OVERFETCH_FACTOR', 2),
    persistAssignments: optionalBool('PERSIST_ASSIGNMENTS', true),
  },

  /** Priority scoring weights (empirical; override to recalibrate) */
  priority: {
    weights: {
      base: optionalInt('PRIORITY_WEIGHT_BASE', 50),
      serviceRequest: optionalInt('PRIORITY_WEIGHT_SERVICE_REQUEST', 30),
      externalPaymentRequest: optionalInt('PRIORITY_WEIGHT_EXTERNAL_PAYMENT', 20),
      highUrgency: optionalInt('PRIORITY_WEIGHT_HIGH_URGENCY', 25),
      lowUrgency: optionalInt('PRIORITY_WEIGHT_LOW_URGENCY', -10),
      needsResponse: optionalInt('PRIORITY_WEIGHT_NEEDS_RESPONSE', 15),
      important: optionalInt('PRIORITY_WEIGHT_IMPORTANT', 10),
      starred: optionalInt('PRIORITY_WEIGHT_STARRED', 10),
      unread: optionalInt('PRIORITY_WEIGHT_UNREAD', 5),
      lowValue: optionalInt('PRIORITY_WEIGHT_LOW_VALUE', -40),
    },
    thresholds: {
      critical: optionalInt('PRIORITY_THRESHOLD_CRITICAL', 80),
      high: optionalInt('PRIORITY_THRESHOLD_HIGH', 65),
      medium: optionalInt('PRIORITY_THRESHOLD_MEDIUM', 40),
    },
  },
};

export type AppConfig = typeof config;

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (config.port < 1 || config.port > 65535) {
    errors.push(`PORT must be 1-65535, got ${config.port}`);
  }
  if (config.store.provider !== 'sqlite' && config.store.provider !== 'memory') {
    errors.push(`EMAIL_STORE_PROVIDER must be "sqlite" or "memory", got ${config.store.provider}`);
  }
  if (!isValidTimezone(config.timezone)) {
    errors.push(`TIMEZONE must be an IANA timezone, got ${config.timezone}`);
  }
  if (Number.isNaN(config.classifier.timeoutMs) || config.classifier.timeoutMs < 100) {
    errors.push(`CLASSIFIER_TIMEOUT_MS must be >= 100, got ${config.classifier.timeoutMs}`);
  }
  if (Number.isNaN(config.classifier.concurrency) || config.classifier.concurrency < 1 || config.classifier.concurrency > 32) {
    errors.push(`CLASSIFIER_CONCURRENCY must be 1-32, got ${config.classifier.concurrency}`);
  }
  if (Number.isNaN(config.classifier.bodyExcerptChars) || config.classifier.bodyExcerptChars < 1) {
    errors.push(`CLASSIFIER_BODY_EXCERPT_CHARS must be >= 1, got ${config.classifier.bodyExcerptChars}`);
  }
  if (Number.isNaN(config.search.defaultMaxResults) || config.search.defaultMaxResults < 1) {
    errors.push(`SEARCH_DEFAULT_MAX_RESULTS must be >= 1, got ${config.search.defaultMaxResults}`);
  }
  if (Number.isNaN(config.search.attachmentOverFetchFactor) || config.search.attachmentOverFetchFactor < 1) {
    errors.push(`ATTACHMENT_OVERFETCH_FACTOR must be >= 1, got ${config.search.attachmentOverFetchFactor}`);
  }

  for (const [name, value] of Object.entries(config.priority.weights)) {
    if (Number.isNaN(value)) errors.push(`priority weight "${name}" must be an integer`);
  }
  const { critical, high, medium } = config.priority.thresholds;
  if (!(critical > high && high > medium && medium > 0 && critical <= 100)) {
    errors.push(`PRIORITY_THRESHOLD_* must satisfy 100 >= critical > high > medium > 0, got ${critical}/${high}/${medium}`);
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
