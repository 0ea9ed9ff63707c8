/**
 * @fileoverview Email engine wiring.
 *
 * Builds the explicit context every engine operation takes: the document
 * store, the classification service (or none) and the tuning settings.
 */

import type { AppConfig } from '../../../config.js';
import { createClient } from '../../../services/anthropic/client.js';
import { createLogger } from '../../../utils/observability/index.js';
import { AnthropicClassificationService } from '../providers/anthropic-classifier.js';
import { createEmailStore } from '../repo/index.js';
import type { EmailStore } from '../repo/types.js';
import type { ClassificationService, EngineContext, EngineSettings } from '../types.js';

// Re-export domain public API
export { searchEmails } from '../service/search.js';
export { getConversationHistory } from '../service/threads.js';
export { searchAttachments } from '../service/attachment-search.js';
export { categorizeEmail } from '../service/categorizer.js';
export { scorePriority } from '../service/priority.js';
export { categorizeEmails, getPriorityInbox } from '../service/inbox.js';
export { createEmailTools } from './tools.js';
export type * from '../types.js';

const log = createLogger({ domain: 'email-runtime' });

export function createEngineSettings(appConfig: AppConfig): EngineSettings {
  return {
    timezone: appConfig.timezone,
    defaultMaxResults: appConfig.search.defaultMaxResults,
    overFetchFactor: appConfig.search.attachmentOverFetchFactor,
    persistAssignments: appConfig.search.persistAssignments,
    ownOrganization: {
      domains: [...appConfig.ownOrganization.domains],
      names: [...appConfig.ownOrganization.names],
    },
    classifier: {
      timeoutMs: appConfig.classifier.timeoutMs,
      concurrency: appConfig.classifier.concurrency,
      bodyExcerptChars: appConfig.classifier.bodyExcerptChars,
    },
    priority: {
      weights: { ...appConfig.priority.weights },
      thresholds: { ...appConfig.priority.thresholds },
    },
  };
}

/**
 * The Anthropic classifier when an API key is configured, otherwise null
 * (the keyword categorizer takes over).
 */
export function createClassificationService(appConfig: AppConfig): ClassificationService | null {
  if (!appConfig.anthropicApiKey) {
    log.info('classifier_disabled', { reason: 'ANTHROPIC_API_KEY not set' });
    return null;
  }
  return new AnthropicClassificationService({
    client: createClient(appConfig.anthropicApiKey),
    modelId: appConfig.classifier.modelId,
    ownOrganization: appConfig.ownOrganization,
  });
}

export interface EngineOverrides {
  store?: EmailStore;
  classifier?: ClassificationService | null;
  now?: () => Date;
}

export function createEmailEngine(appConfig: AppConfig, overrides: EngineOverrides = {}): EngineContext {
  const store = overrides.store ?? createEmailStore(appConfig.store);
  const classifier = overrides.classifier !== undefined
    ? overrides.classifier
    : createClassificationService(appConfig);

  log.info('engine_created', {
    store: overrides.store ? 'injected' : appConfig.store.provider,
    classifier: classifier ? 'enabled' : 'keywords',
  });

  return {
    store,
    classifier,
    settings: createEngineSettings(appConfig),
    now: overrides.now,
  };
}
