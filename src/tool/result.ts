// pattern: Functional Core

import type { ToolOutput, ToolResult } from './types.js';

export function toolSuccess(output: ToolOutput): ToolResult {
  return Object.freeze({ success: true, output });
}

export function toolFailure(error: string, output: ToolOutput = ''): ToolResult {
  return Object.freeze({ success: false, output, error });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Render a tool result as the text fed back to the model.
 * Failures lead with the error so the model sees why the call did not work.
 */
export function formatToolResult(result: ToolResult): string {
  const output = typeof result.output === 'string'
    ? result.output
    : JSON.stringify(result.output, null, 2);

  if (result.success) {
    return output;
  }

  const error = `Error: ${result.error ?? 'tool failed'}`;
  return output ? `${error}\n${output}` : error;
}
