/**
 * Tool type definitions (canonical location).
 */

import type { Tool } from '@anthropic-ai/sdk/resources/messages';

/**
 * Context passed to tool handlers.
 */
export interface ToolContext {
  /** Correlates log lines of one invocation */
  requestId?: string;
}

/**
 * Handler function type for tool execution.
 */
export type ToolHandler = (
  input: Record<string, unknown>,
  context: ToolContext
) => Promise<Record<string, unknown>>;

/**
 * Pairs a tool definition with its handler.
 */
export interface ToolDefinition {
  tool: Tool;
  handler: ToolHandler;
}
