/**
 * Tool registry (canonical).
 */

import type { Tool } from '@anthropic-ai/sdk/resources/messages';
import type { ToolDefinition, ToolHandler, ToolContext } from './types.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';

const log = createLogger({ domain: 'tools' });

export interface ToolRegistry {
  /** Tool definitions for the Anthropic API. */
  tools: Tool[];
  has(name: string): boolean;
  /**
   * Execute a tool by name. Never throws: unknown tools and handler
   * failures come back as `{ success: false, error }`.
   */
  execute(name: string, input: Record<string, unknown>, context?: ToolContext): Promise<Record<string, unknown>>;
}

export function createToolRegistry(definitions: ToolDefinition[]): ToolRegistry {
  const handlers = new Map<string, ToolHandler>(
    definitions.map(t => [t.tool.name, t.handler])
  );

  return {
    tools: definitions.map(t => t.tool),

    has: (name) => handlers.has(name),

    async execute(name, input, context = {}) {
      const handler = handlers.get(name);
      if (!handler) {
        return { success: false, error: `Unknown tool: ${name}` };
      }

      const toolLog = log.child({ tool: name, requestId: context.requestId });
      toolLog.info('tool_call_received', { inputKeys: Object.keys(input) });

      const startedAt = Date.now();
      try {
        const result = await handler(input, context);
        toolLog.info('tool_call_completed', {
          success: result.success !== false,
          durationMs: Date.now() - startedAt,
          resultBytes: JSON.stringify(result).length,
        });
        return result;
      } catch (error) {
        toolLog.error('tool_call_failed', {
          durationMs: Date.now() - startedAt,
          error: errorMessage(error),
        });
        return { success: false, error: errorMessage(error) };
      }
    },
  };
}

export type { ToolDefinition, ToolHandler, ToolContext } from './types.js';
