// pattern: Functional Core

/**
 * Conversation state and statistics for one agent.
 * Appends are checked so that every tool message answers an open request of
 * the latest assistant turn, and nothing else is appended while any remain open.
 */

import type { UsageStats } from '../model/types.js';
import type { ToolResult } from '../tool/types.js';
import type {
  AssistantMessage,
  ConversationMessage,
  Session,
  SessionStats,
  ToolCallRequest,
  ToolMessage,
  UserMessage,
} from './types.js';

export class ConversationInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConversationInvariantError';
  }
}

function emptyStats(): SessionStats {
  return {
    steps: 0,
    tool_calls: 0,
    failed_tool_calls: 0,
    model_calls: 0,
    input_tokens: 0,
    output_tokens: 0,
    total_tokens: 0,
    runs: 0,
  };
}

export function createSession(): Session {
  let messages: Array<ConversationMessage> = [];
  let pending: Array<string> = [];
  let stats = emptyStats();

  function assertNoPending(appending: string): void {
    if (pending.length > 0) {
      throw new ConversationInvariantError(
        `cannot append ${appending} message: ${pending.length} tool call(s) still unanswered (${pending.join(', ')})`,
      );
    }
  }

  return {
    appendUser(content: string): void {
      assertNoPending('user');
      const message: UserMessage = { role: 'user', content };
      messages.push(Object.freeze(message));
    },

    appendAssistant(content: string, toolCalls: ReadonlyArray<ToolCallRequest>): void {
      assertNoPending('assistant');

      const ids = toolCalls.map((call) => call.id);
      const duplicate = ids.find((id, index) => ids.indexOf(id) !== index);
      if (duplicate !== undefined) {
        throw new ConversationInvariantError(`duplicate tool call id in one turn: ${duplicate}`);
      }

      const message: AssistantMessage = {
        role: 'assistant',
        content,
        tool_calls: Object.freeze(toolCalls.map((call) => Object.freeze({ ...call }))),
      };
      messages.push(Object.freeze(message));
      pending = ids;
    },

    appendToolResult(toolCallId: string, name: string, result: ToolResult): void {
      const index = pending.indexOf(toolCallId);
      if (index === -1) {
        throw new ConversationInvariantError(`tool result does not answer an open tool call: ${toolCallId}`);
      }

      const message: ToolMessage = { role: 'tool', tool_call_id: toolCallId, name, result };
      messages.push(Object.freeze(message));
      pending = pending.filter((_, i) => i !== index);
    },

    pendingToolCalls(): Array<string> {
      return [...pending];
    },

    recordRun(): void {
      stats.runs++;
    },

    recordModelCall(usage: UsageStats): void {
      stats.steps++;
      stats.model_calls++;
      stats.input_tokens += usage.input_tokens;
      stats.output_tokens += usage.output_tokens;
      stats.total_tokens += usage.input_tokens + usage.output_tokens;
    },

    recordToolCall(result: ToolResult): void {
      stats.tool_calls++;
      if (!result.success) {
        stats.failed_tool_calls++;
      }
    },

    getHistory(): ReadonlyArray<ConversationMessage> {
      return [...messages];
    },

    getStats(): SessionStats {
      return { ...stats };
    },

    clear(): void {
      messages = [];
      pending = [];
      stats = emptyStats();
    },
  };
}
