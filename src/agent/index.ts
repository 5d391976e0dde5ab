// pattern: Functional Core

export type {
  AbortReason,
  Agent,
  AgentConfig,
  AgentDependencies,
  AgentState,
  AssistantMessage,
  ConversationMessage,
  RunResult,
  Session,
  SessionStats,
  ToolCallRequest,
  ToolMessage,
  UserMessage,
} from './types.js';
export { createAgent, budgetExhaustedMessage } from './agent.js';
export { createSession, ConversationInvariantError } from './session.js';
export { buildMessages, buildSystemPrompt, DEFAULT_SYSTEM_PROMPT } from './context.js';
export { dispatchBatch } from './dispatch.js';
