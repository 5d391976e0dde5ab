// pattern: Functional Core (types only)

import type { ToolDefinition, ToolResult } from '../tool/types.js';

/**
 * ToolProvider represents an external source of tools that can be dynamically discovered and executed.
 * Examples: MCP servers, plugin systems, remote tool registries.
 *
 * Tools discovered via ToolProvider are registered with the ToolRegistry and become available
 * to the agent alongside built-in tools.
 */
export interface ToolProvider {
  readonly name: string;
  /** Launch or connect, then list the provider's tools. */
  discover(): Promise<Array<ToolDefinition>>;
  /** Never rejects: transport failures come back as failed results. */
  execute(tool: string, params: Record<string, unknown>): Promise<ToolResult>;
  /** Release the transport. Safe to call more than once, and after a failed discover. */
  close(): Promise<void>;
}
