// pattern: Functional Core

/**
 * Context building for the agent loop.
 * Converts the session's conversation into model-ready messages and assembles
 * the system prompt.
 */

import type { ContentBlock, Message } from '../model/types.js';
import { formatToolResult } from '../tool/result.js';
import type { ConversationMessage } from './types.js';

export const DEFAULT_SYSTEM_PROMPT = [
  'You are a capable assistant that completes tasks by calling tools.',
  'Think about what information you need, call tools to gather it or to act, and observe the results before continuing.',
  'When the task is complete, reply with a final answer and no tool calls.',
].join('\n');

const NOTES_INSTRUCTIONS = [
  '## Session Notes',
  'Use `record_note` to save facts, decisions and progress worth keeping across sessions,',
  'and `recall_notes` to review what earlier sessions recorded before starting related work.',
].join('\n');

export function buildSystemPrompt(base: string, workspaceDir: string): string {
  return [
    base.trim(),
    `## Current Workspace\nYou are working in \`${workspaceDir}\`. Relative file paths resolve against this directory.`,
    NOTES_INSTRUCTIONS,
  ].join('\n\n');
}

function toBlocks(content: Message['content']): Array<ContentBlock> {
  return typeof content === 'string' ? [{ type: 'text', text: content }] : content;
}

/**
 * Append a user-role message, merging with a preceding user-role message so
 * that tool results and a following user turn travel together.
 */
function pushUser(messages: Array<Message>, content: string | Array<ContentBlock>): void {
  const last = messages[messages.length - 1];
  if (last && last.role === 'user') {
    last.content = [...toBlocks(last.content), ...toBlocks(content)];
    return;
  }
  messages.push({ role: 'user', content });
}

/**
 * Convert the conversation to model messages. Tool messages become
 * `tool_result` blocks keyed by the request id, in conversation order.
 */
export function buildMessages(history: ReadonlyArray<ConversationMessage>): Array<Message> {
  const messages: Array<Message> = [];

  for (const msg of history) {
    if (msg.role === 'user') {
      pushUser(messages, msg.content);
    } else if (msg.role === 'assistant') {
      if (msg.tool_calls.length === 0) {
        // an empty answer is not a valid assistant turn for the model
        if (!msg.content.trim()) {
          continue;
        }
        messages.push({ role: 'assistant', content: msg.content });
        continue;
      }

      const contentBlocks: Array<ContentBlock> = [];
      if (msg.content) {
        contentBlocks.push({ type: 'text', text: msg.content });
      }
      for (const call of msg.tool_calls) {
        contentBlocks.push({ type: 'tool_use', id: call.id, name: call.name, input: call.input });
      }
      messages.push({ role: 'assistant', content: contentBlocks });
    } else {
      pushUser(messages, [{
        type: 'tool_result',
        tool_use_id: msg.tool_call_id,
        content: formatToolResult(msg.result),
        ...(!msg.result.success && { is_error: true }),
      }]);
    }
  }

  return messages;
}
