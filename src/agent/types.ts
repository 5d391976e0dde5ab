// pattern: Functional Core

/**
 * Agent types for the core agent loop.
 * These types define the conversation model, the session that owns it,
 * the agent's dependencies, and the public interface for the agent.
 */

import type { Logger } from '../logging/index.js';
import type { ModelProvider, UsageStats } from '../model/types.js';
import type { ToolRegistry, ToolResult } from '../tool/types.js';

export type AgentConfig = {
  max_steps: number;
  max_parallel_tools: number;
  model_name: string;
  max_tokens: number;
  temperature?: number;
};

export type ToolCallRequest = {
  readonly id: string;
  readonly name: string;
  readonly input: Record<string, unknown>;
};

export type UserMessage = {
  readonly role: 'user';
  readonly content: string;
};

export type AssistantMessage = {
  readonly role: 'assistant';
  readonly content: string;
  readonly tool_calls: ReadonlyArray<ToolCallRequest>;
};

export type ToolMessage = {
  readonly role: 'tool';
  readonly tool_call_id: string;
  readonly name: string;
  readonly result: ToolResult;
};

export type ConversationMessage = UserMessage | AssistantMessage | ToolMessage;

export type SessionStats = {
  steps: number;
  tool_calls: number;
  failed_tool_calls: number;
  model_calls: number;
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
  runs: number;
};

export interface Session {
  appendUser(content: string): void;
  appendAssistant(content: string, toolCalls: ReadonlyArray<ToolCallRequest>): void;
  appendToolResult(toolCallId: string, name: string, result: ToolResult): void;
  /** Ids of the latest assistant turn's requests that have no result yet. */
  pendingToolCalls(): Array<string>;
  recordRun(): void;
  recordModelCall(usage: UsageStats): void;
  recordToolCall(result: ToolResult): void;
  getHistory(): ReadonlyArray<ConversationMessage>;
  getStats(): SessionStats;
  /** Start a new conversation; statistics reset with it. */
  clear(): void;
}

export type AgentState = 'idle' | 'awaiting_model' | 'dispatching_tools' | 'done' | 'aborted';

export type AbortReason = 'step_budget' | 'model_error' | 'cancelled';

export type RunResult =
  | { readonly status: 'done'; readonly answer: string; readonly steps: number }
  | { readonly status: 'aborted'; readonly reason: AbortReason; readonly message: string; readonly steps: number };

export type AgentDependencies = {
  model: ModelProvider;
  registry: ToolRegistry;
  session: Session;
  config: AgentConfig;
  systemPrompt: string;
  logger: Logger;
};

export type Agent = {
  run(userMessage: string): Promise<RunResult>;
  /** Stop issuing model calls; an in-flight tool batch still completes. */
  cancel(): void;
  readonly state: AgentState;
  readonly running: boolean;
  readonly session: Session;
};
