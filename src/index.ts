/**
 * @fileoverview Server entry point for the inbox triage engine.
 *
 * Validates configuration, opens the email store, wires the engine into
 * the tool registry and serves it over HTTP.
 */

import config, { validateConfig } from './config.js';
import { createApp } from './app.js';
import { createEmailEngine, createEmailTools } from './domains/email/runtime/index.js';
import { createToolRegistry } from './tools/index.js';
import { errorMessage } from './utils/errors.js';
import { createLogger, initObservability } from './utils/observability/index.js';

// Fail fast if critical configuration is missing
validateConfig();
initObservability();

const log = createLogger({ domain: 'server' });

const engine = createEmailEngine(config);
const registry = createToolRegistry(createEmailTools(engine));
const app = createApp(registry);

const server = app.listen(config.port, () => {
  log.info('server_started', {
    port: config.port,
    env: config.nodeEnv,
    store: config.store.provider,
    classifier: engine.classifier ? 'anthropic' : 'keywords',
    tools: registry.tools.map(t => t.name),
  });
});

let isShuttingDown = false;

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  log.info('shutdown_signal_received', { signal });

  const forceExitTimer = setTimeout(() => {
    log.warn('force_exit_after_timeout');
    process.exit(1);
  }, 10000);

  server.close(() => {
    clearTimeout(forceExitTimer);
    engine.store.close().then(
      () => {
        log.info('server_closed');
        process.exit(0);
      },
      (error: unknown) => {
        log.error('store_close_failed', { error: errorMessage(error) });
        process.exit(1);
      }
    );
  });
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
