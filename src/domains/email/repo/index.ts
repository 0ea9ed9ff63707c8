/**
 * @fileoverview Email store factory.
 *
 * Returns the store selected by configuration:
 * - 'sqlite': better-sqlite3 file store (default, for dev and production)
 * - 'memory': in-memory store (for tests and experiments)
 */

import { SqliteEmailStore } from './sqlite.js';
import { MemoryEmailStore } from './memory.js';
import type { EmailStore } from './types.js';

export type { EmailStore } from './types.js';
export { SqliteEmailStore } from './sqlite.js';
export { MemoryEmailStore } from './memory.js';

export type EmailStoreOptions = {
  provider: 'sqlite' | 'memory';
  sqlitePath: string;
};

export function createEmailStore(options: EmailStoreOptions): EmailStore {
  switch (options.provider) {
    case 'sqlite':
      return new SqliteEmailStore(options.sqlitePath);
    case 'memory':
      return new MemoryEmailStore();
    default:
      throw new Error(
        `Invalid EMAIL_STORE_PROVIDER: ${String(options.provider)}. Expected 'sqlite' or 'memory'.`
      );
  }
}
