// pattern: Imperative Shell

/**
 * Core agent loop implementation.
 * Drives the model through think, call tools, observe steps until it answers
 * without tool calls, the step budget runs out, the model fails, or the run
 * is cancelled.
 */

import type { ModelResponse, TextBlock, ToolUseBlock } from '../model/types.js';
import { errorMessage } from '../tool/result.js';
import type { ToolResult } from '../tool/types.js';
import { buildMessages } from './context.js';
import { dispatchBatch } from './dispatch.js';
import type {
  AbortReason,
  Agent,
  AgentDependencies,
  AgentState,
  RunResult,
  ToolCallRequest,
} from './types.js';

export function budgetExhaustedMessage(maxSteps: number): string {
  return `Task couldn't be completed after ${maxSteps} steps.`;
}

function responseText(response: ModelResponse): string {
  return response.content
    .filter((block): block is TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join('');
}

function toolCallRequests(response: ModelResponse, step: number): Array<ToolCallRequest> {
  return response.content
    .filter((block): block is ToolUseBlock => block.type === 'tool_use')
    .map((block, index) => ({
      // some OpenAI-compatible servers omit call ids
      id: block.id || `call_${step}_${index}`,
      name: block.name,
      input: block.input,
    }));
}

function hasDuplicateIds(requests: ReadonlyArray<ToolCallRequest>): boolean {
  return new Set(requests.map((request) => request.id)).size !== requests.length;
}

/**
 * Create an agent over a session. The registry is sealed here and stays
 * read-only for the agent's lifetime.
 */
export function createAgent(deps: AgentDependencies): Agent {
  const { model, registry, session, config } = deps;
  const logger = deps.logger.child({ component: 'agent' });

  if (!registry.sealed) {
    registry.seal();
  }
  const tools = registry.toModelTools();
  const toolNames = tools.map((tool) => tool.name);

  let state: AgentState = 'idle';
  let running = false;
  let cancelRequested = false;
  let controller: AbortController | undefined;

  function transition(next: AgentState): void {
    if (state !== next) {
      logger.debug({ from: state, to: next }, 'agent state transition');
      state = next;
    }
  }

  function abort(reason: AbortReason, message: string, steps: number): RunResult {
    transition('aborted');
    logger.warn({ reason, steps }, message);
    return { status: 'aborted', reason, message, steps };
  }

  async function executeTool(request: ToolCallRequest): Promise<ToolResult> {
    const result = await registry.dispatch(request.name, request.input);
    logger.debug(
      {
        tool: request.name,
        id: request.id,
        input: request.input,
        success: result.success,
        ...(result.success ? { output: result.output } : { error: result.error }),
      },
      'tool result',
    );
    return result;
  }

  async function loop(userMessage: string, signal: AbortSignal): Promise<RunResult> {
    session.appendUser(userMessage);
    session.recordRun();
    let steps = 0;

    for (;;) {
      if (cancelRequested) {
        return abort('cancelled', 'Run cancelled.', steps);
      }

      transition('awaiting_model');
      const messages = buildMessages(session.getHistory());
      logger.debug({ step: steps + 1, messages: messages.length, tools: toolNames }, 'model request');

      let response: ModelResponse;
      try {
        response = await model.complete(
          {
            messages,
            system: deps.systemPrompt,
            tools,
            model: config.model_name,
            max_tokens: config.max_tokens,
            temperature: config.temperature,
          },
          { signal },
        );
      } catch (error) {
        if (cancelRequested) {
          return abort('cancelled', 'Run cancelled.', steps);
        }
        logger.error({ err: error }, 'model call failed');
        return abort('model_error', `Model call failed: ${errorMessage(error)}`, steps);
      }

      steps++;
      session.recordModelCall(response.usage);

      const text = responseText(response);
      const requests = toolCallRequests(response, steps);
      logger.debug(
        { step: steps, text, tool_calls: requests, stop_reason: response.stop_reason, usage: response.usage },
        'model response',
      );

      if (requests.length === 0) {
        session.appendAssistant(text, []);
        transition('done');
        logger.info({ steps }, 'run finished');
        return { status: 'done', answer: text, steps };
      }

      if (hasDuplicateIds(requests)) {
        return abort('model_error', 'Model call failed: response repeated a tool call id', steps);
      }

      session.appendAssistant(text, requests);
      transition('dispatching_tools');

      const outcomes = await dispatchBatch(requests, config.max_parallel_tools, async (request) => ({
        request,
        result: await executeTool(request),
      }));

      for (const { request, result } of outcomes) {
        session.appendToolResult(request.id, request.name, result);
        session.recordToolCall(result);
      }

      if (steps >= config.max_steps) {
        return abort('step_budget', budgetExhaustedMessage(config.max_steps), steps);
      }
    }
  }

  return {
    async run(userMessage: string): Promise<RunResult> {
      if (running) {
        throw new Error('agent is already running');
      }

      running = true;
      cancelRequested = false;
      controller = new AbortController();
      try {
        return await loop(userMessage, controller.signal);
      } finally {
        running = false;
        controller = undefined;
      }
    },

    cancel(): void {
      if (!running || cancelRequested) {
        return;
      }
      cancelRequested = true;
      logger.info({ state }, 'cancellation requested');
      controller?.abort();
    },

    get state(): AgentState {
      return state;
    },

    get running(): boolean {
      return running;
    },

    session,
  };
}
