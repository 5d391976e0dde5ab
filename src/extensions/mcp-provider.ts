// pattern: Imperative Shell

/**
 * ToolProvider backed by an MCP server launched as a child process over stdio.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { McpServerConfig } from '../config/schema.js';
import type { Logger } from '../logging/index.js';
import { parametersFromJsonSchema } from '../tool/schema.js';
import { errorMessage, toolFailure, toolSuccess } from '../tool/result.js';
import type { ToolDefinition, ToolResult } from '../tool/types.js';
import type { ToolProvider } from './tool-provider.js';

const CLIENT_INFO = { name: 'toolloop', version: '0.1.0' } as const;

export type McpToolProviderOptions = {
  callTimeoutMs: number;
  logger: Logger;
  /** Defaults to launching `config.command` over stdio. */
  createTransport?: (config: McpServerConfig, logger: Logger) => Transport;
};

type Connection = {
  client: Client;
  transport: Transport;
};

/**
 * Launch the server as a child process with the default safe environment plus
 * the configured variables. Its stderr goes to the debug log.
 */
export function createStdioTransport(config: McpServerConfig, logger: Logger): Transport {
  const transport = new StdioClientTransport({
    command: config.command,
    args: [...config.args],
    env: { ...getDefaultEnvironment(), ...config.env },
    stderr: 'pipe',
  });
  transport.stderr?.on('data', (chunk: unknown) => {
    logger.debug({ stderr: String(chunk).trimEnd() }, 'MCP server stderr');
  });
  return transport;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function contentText(content: ReadonlyArray<unknown>): string {
  return content
    .map((part) => {
      if (isRecord(part) && part['type'] === 'text' && typeof part['text'] === 'string') {
        return part['text'];
      }
      return JSON.stringify(part);
    })
    .join('\n');
}

/**
 * Map a `tools/call` response onto a ToolResult. Text parts are joined with
 * newlines; `isError` marks the call failed while keeping its text.
 */
export function mapCallToolResult(raw: unknown): ToolResult {
  if (!isRecord(raw)) {
    return toolFailure('MCP server returned a malformed result');
  }

  // protocol revisions before 2024-11-05 answer with a bare `toolResult`
  if (!('content' in raw) && 'toolResult' in raw) {
    return toolSuccess(JSON.stringify(raw['toolResult'] ?? null));
  }

  const content = Array.isArray(raw['content']) ? raw['content'] : [];
  const text = contentText(content);

  if (raw['isError'] === true) {
    return toolFailure('tool returned an error', text);
  }

  const structured = raw['structuredContent'];
  if (text === '' && isRecord(structured)) {
    return toolSuccess(structured);
  }

  return toolSuccess(text);
}

export function createMcpToolProvider(
  name: string,
  config: McpServerConfig,
  options: McpToolProviderOptions,
): ToolProvider {
  const logger = options.logger.child({ provider: name });
  const callTimeoutMs = config.call_timeout_ms ?? options.callTimeoutMs;
  const createTransport = options.createTransport ?? createStdioTransport;

  let connection: Connection | undefined;
  let available = false;
  let closed = false;

  function markUnavailable(reason: string): void {
    if (available && !closed) {
      logger.warn({ reason }, 'MCP provider became unavailable');
    }
    available = false;
  }

  async function listAllTools(client: Client): Promise<Array<ToolDefinition>> {
    const definitions: Array<ToolDefinition> = [];
    let cursor: string | undefined;

    do {
      const page = await client.listTools(cursor ? { cursor } : undefined);
      for (const tool of page.tools) {
        definitions.push({
          name: tool.name,
          description: tool.description ?? '',
          parameters: parametersFromJsonSchema(tool.inputSchema),
        });
      }
      cursor = page.nextCursor;
    } while (cursor);

    return definitions;
  }

  return {
    name,

    async discover(): Promise<Array<ToolDefinition>> {
      if (closed) {
        throw new Error(`provider '${name}' is closed`);
      }
      if (connection) {
        throw new Error(`provider '${name}' is already connected`);
      }

      const transport = createTransport(config, logger);
      const client = new Client(CLIENT_INFO);

      client.onclose = () => markUnavailable('connection closed');
      client.onerror = (error) => {
        logger.warn({ err: error }, 'MCP transport error');
        markUnavailable(errorMessage(error));
      };

      connection = { client, transport };
      logger.debug({ command: config.command, args: config.args }, 'launching MCP server');

      await client.connect(transport);
      const definitions = await listAllTools(client);
      available = !closed;

      logger.info({ tools: definitions.length }, 'MCP provider discovered tools');
      return definitions;
    },

    async execute(tool: string, params: Record<string, unknown>): Promise<ToolResult> {
      const current = connection;
      if (!current || !available) {
        return toolFailure(`provider '${name}' is currently unavailable`);
      }

      try {
        const result = await current.client.callTool(
          { name: tool, arguments: params },
          undefined,
          { timeout: callTimeoutMs },
        );
        return mapCallToolResult(result);
      } catch (error) {
        logger.debug({ tool, err: error }, 'MCP tool call failed');
        return toolFailure(`MCP tool execution failed: ${errorMessage(error)}`);
      }
    },

    async close(): Promise<void> {
      if (closed) {
        return;
      }
      closed = true;
      available = false;

      const current = connection;
      connection = undefined;
      if (current) {
        await current.client.close();
        logger.debug('MCP provider closed');
      }
    },
  };
}
