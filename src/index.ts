#!/usr/bin/env node
// pattern: Imperative Shell

/**
 * toolloop entry point.
 * Composition root that wires configuration, tools, external providers and the
 * model into an agent, then runs a one-shot task or the interactive REPL.
 */

import * as readline from 'node:readline';
import { realpathSync } from 'node:fs';
import { mkdir, readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { loadConfig, loadMcpConfig, resolveLogDir, resolveMemoryPath } from './config/config.js';
import type { AppConfig, McpConfig } from './config/config.js';
import { makeLogger, makeRunLogger } from './logging/index.js';
import type { Logger } from './logging/index.js';
import { createModelProvider } from './model/factory.js';
import type { ModelProvider } from './model/types.js';
import { createFileNoteStore } from './memory/index.js';
import type { NoteStore } from './memory/index.js';
import { createToolRegistry } from './tool/registry.js';
import { createFileTools } from './tool/builtin/files.js';
import { createNoteTools } from './tool/builtin/notes.js';
import { createShellTools } from './tool/builtin/shell.js';
import type { ShellTools, SpawnShell } from './tool/builtin/shell.js';
import { errorMessage } from './tool/result.js';
import type { ToolRegistry } from './tool/types.js';
import { connectToolProviders, createMcpToolProvider } from './extensions/index.js';
import type { ConnectedProviders, ToolProviderFactory } from './extensions/index.js';
import { createAgent, createSession, buildSystemPrompt, DEFAULT_SYSTEM_PROMPT } from './agent/index.js';
import type { Agent, ConversationMessage, RunResult, SessionStats } from './agent/index.js';

export const HELP_TEXT = [
  'Commands:',
  '  /help     Show this help',
  '  /clear    Start a new conversation (statistics reset)',
  '  /stats    Show session statistics',
  '  /history  Show message counts for this conversation',
  '  /exit     Quit',
  'Press Ctrl+C during a run to cancel it, or while idle to quit.',
].join('\n');

export type Print = (text: string) => void;

export type Application = {
  agent: Agent;
  registry: ToolRegistry;
  store: NoteStore;
  providers: ConnectedProviders;
  workspace: string;
  close(): Promise<void>;
};

export type ApplicationOptions = {
  logger: Logger;
  /** Overrides the configured model adapter. */
  model?: ModelProvider;
  /** Overrides how external tool providers are created. */
  providerFactory?: ToolProviderFactory;
  /** Overrides how the bash tool starts commands. */
  spawnShell?: SpawnShell;
};

export function formatStats(stats: SessionStats): string {
  return [
    'Session statistics:',
    `  runs: ${stats.runs}`,
    `  steps: ${stats.steps}`,
    `  model calls: ${stats.model_calls}`,
    `  tool calls: ${stats.tool_calls} (${stats.failed_tool_calls} failed)`,
    `  tokens: ${stats.total_tokens} (input ${stats.input_tokens}, output ${stats.output_tokens})`,
  ].join('\n');
}

export function formatHistorySummary(history: ReadonlyArray<ConversationMessage>): string {
  const count = (role: ConversationMessage['role']): number => history.filter((m) => m.role === role).length;
  return `Conversation: ${history.length} messages (user ${count('user')}, assistant ${count('assistant')}, tool ${count('tool')})`;
}

export function formatRunResult(result: RunResult): string {
  if (result.status === 'done') {
    return result.answer;
  }
  return `[${result.reason}] ${result.message}`;
}

/**
 * Read the base system prompt. A configured path that does not exist falls
 * back to the default prompt.
 */
export async function loadBasePrompt(path: string | undefined, logger: Logger): Promise<string> {
  if (!path) {
    return DEFAULT_SYSTEM_PROMPT;
  }
  try {
    return await readFile(resolve(path), 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.warn({ path }, 'system prompt file not found, using the default prompt');
      return DEFAULT_SYSTEM_PROMPT;
    }
    throw error;
  }
}

/**
 * Assemble the agent: built-in file, shell and note tools, external tool
 * providers and the model adapter. Providers are closed again if assembly
 * fails after they started; closing the application also stops background
 * shell commands.
 */
export async function createApplication(config: AppConfig, options: ApplicationOptions): Promise<Application> {
  const { logger } = options;
  const workspace = resolve(config.agent.workspace_dir);
  await mkdir(workspace, { recursive: true });

  const model = options.model ?? createModelProvider(config.model, config.retry);
  const basePrompt = await loadBasePrompt(config.agent.system_prompt_path, logger);

  // one store per location, shared by both note tools
  const store = createFileNoteStore(resolveMemoryPath(config));
  const shell: ShellTools | undefined = config.agent.enable_bash
    ? createShellTools(workspace, options.spawnShell)
    : undefined;
  const registry = createToolRegistry([
    ...createFileTools(workspace),
    ...(shell?.tools ?? []),
    ...createNoteTools(store),
  ]);

  const mcp: McpConfig = config.mcp.enabled
    ? loadMcpConfig(config.mcp.config_path, logger)
    : { mcpServers: {}, invalid: [] };
  const factory: ToolProviderFactory = options.providerFactory
    ?? ((name, server) => createMcpToolProvider(name, server, { callTimeoutMs: config.mcp.call_timeout_ms, logger }));

  const providers = await connectToolProviders(mcp.mcpServers, {
    factory,
    discoveryTimeoutMs: config.mcp.discovery_timeout_ms,
    logger,
    reservedNames: registry.getDefinitions().map((definition) => definition.name),
    invalid: mcp.invalid,
  });

  try {
    for (const tool of providers.tools) {
      registry.register(tool);
    }

    const agent = createAgent({
      model,
      registry,
      session: createSession(),
      config: {
        max_steps: config.agent.max_steps,
        max_parallel_tools: config.agent.max_parallel_tools,
        model_name: config.model.name,
        max_tokens: config.model.max_tokens,
        temperature: config.model.temperature,
      },
      systemPrompt: buildSystemPrompt(basePrompt, workspace),
      logger,
    });

    logger.info({ tools: registry.getDefinitions().length, workspace }, 'agent ready');
    const close = async (): Promise<void> => {
      await Promise.all([providers.close(), shell?.close()]);
    };
    return { agent, registry, store, providers, workspace, close };
  } catch (error) {
    await providers.close();
    throw error;
  }
}

/**
 * Handle one line of REPL input: a slash command or a message for the agent.
 * Lines may arrive while a run is in progress; `/clear` and `/exit` cancel it
 * and wait for it to settle before touching the conversation.
 */
export function createInteractionLoop(agent: Agent, print: Print): (line: string) => Promise<'continue' | 'exit'> {
  let active: Promise<void> | undefined;

  async function settle(): Promise<void> {
    if (active) {
      print('Cancelling current run...');
      agent.cancel();
      await active;
    }
  }

  async function runTask(input: string): Promise<void> {
    try {
      const result = await agent.run(input);
      print(`\n${formatRunResult(result)}\n`);
    } catch (error) {
      print(`error: ${errorMessage(error)}`);
    } finally {
      active = undefined;
    }
  }

  return async (line: string) => {
    const input = line.trim();
    if (!input) {
      return 'continue';
    }

    if (input.startsWith('/')) {
      const command = input.split(/\s+/)[0]?.toLowerCase();
      switch (command) {
        case '/help':
          print(HELP_TEXT);
          return 'continue';
        case '/clear':
          await settle();
          agent.session.clear();
          print('Conversation cleared.');
          return 'continue';
        case '/stats':
          print(formatStats(agent.session.getStats()));
          return 'continue';
        case '/history':
          print(formatHistorySummary(agent.session.getHistory()));
          return 'continue';
        case '/exit':
        case '/quit':
          await settle();
          return 'exit';
        default:
          print(`Unknown command: ${input}. Type /help for commands.`);
          return 'continue';
      }
    }

    if (active) {
      print('A run is in progress. Wait for it, or cancel it with /clear or Ctrl+C.');
      return 'continue';
    }

    active = runTask(input);
    await active;
    return 'continue';
  };
}

/**
 * Shutdown runs once however many times it is requested: close the prompt,
 * release every provider connection, then report the final statistics.
 */
export function createShutdownHandler(
  app: Pick<Application, 'agent' | 'close'>,
  print: Print,
  rl?: readline.Interface,
): () => Promise<void> {
  let shutdown: Promise<void> | undefined;

  return () => {
    shutdown ??= (async () => {
      print('\nShutting down...');
      rl?.close();
      await app.close();
      print(formatStats(app.agent.session.getStats()));
    })();
    return shutdown;
  };
}

/**
 * Ctrl+C cancels a running task; when idle it shuts down.
 */
export function createSigintHandler(agent: Agent, shutdown: () => Promise<void>, print: Print): () => void {
  return () => {
    if (agent.running) {
      print('\nCancelling current run...');
      agent.cancel();
      return;
    }
    shutdown().catch((error: unknown) => {
      print(`error during shutdown: ${errorMessage(error)}`);
    });
  };
}

type CliOptions = {
  config: string;
  workspace?: string;
  task?: string;
};

type SignalSource = {
  on(event: 'SIGINT' | 'SIGTERM', listener: () => void): unknown;
  off(event: 'SIGINT' | 'SIGTERM', listener: () => void): unknown;
};

/**
 * Route interrupts to one handler. On a terminal readline captures Ctrl+C
 * itself; otherwise it arrives as a process signal. Returns a detach function.
 */
export function attachInterruptHandler(
  rl: SignalSource,
  proc: SignalSource,
  terminal: boolean,
  handler: () => void,
): () => void {
  const sigint = terminal ? rl : proc;
  sigint.on('SIGINT', handler);
  proc.on('SIGTERM', handler);
  return () => {
    sigint.off('SIGINT', handler);
    proc.off('SIGTERM', handler);
  };
}

async function repl(app: Application, print: Print): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const handleLine = createInteractionLoop(app.agent, print);
  const shutdown = createShutdownHandler(app, print, rl);
  const onSigint = createSigintHandler(app.agent, shutdown, print);
  const detach = attachInterruptHandler(rl, process, process.stdin.isTTY === true, onSigint);

  print(`Workspace: ${app.workspace}`);
  print(`Tools: ${app.registry.getDefinitions().map((d) => d.name).join(', ')}`);
  print('Type your message, or /help for commands.\n');

  let closed = false;
  try {
    await new Promise<void>((resolvePromise, reject) => {
      // lines are handled as they arrive so commands can reach a running task
      rl.on('line', (line) => {
        handleLine(line)
          .then((next) => {
            if (next === 'exit') {
              return shutdown();
            }
            if (!closed) {
              rl.prompt();
            }
            return undefined;
          })
          .catch(reject);
      });
      rl.on('close', () => {
        closed = true;
        app.agent.cancel();
        shutdown().then(resolvePromise, reject);
      });

      rl.setPrompt('> ');
      rl.prompt();
    });
  } finally {
    detach();
  }
}

/**
 * Main entry point: parses arguments, loads configuration and runs.
 */
export async function main(argv: ReadonlyArray<string> = process.argv): Promise<void> {
  const program = new Command()
    .name('toolloop')
    .description('Tool-using agent with file, note and MCP tools')
    .version('0.1.0')
    .option('-c, --config <path>', 'Path to config.toml', 'config.toml')
    .option('-w, --workspace <dir>', 'Workspace directory (overrides agent.workspace_dir)')
    .option('-t, --task <text>', 'Run a single task and exit');
  program.parse([...argv]);
  const options = program.opts<CliOptions>();

  const loaded = loadConfig(options.config);
  const config: AppConfig = options.workspace
    ? { ...loaded, agent: { ...loaded.agent, workspace_dir: options.workspace } }
    : loaded;

  let logger: Logger;
  if (config.logging.run_log) {
    const run = makeRunLogger(resolveLogDir(config), config.logging.level);
    logger = run.logger;
    logger.info({ file: run.file }, 'run log opened');
  } else {
    logger = makeLogger(config.logging.level);
  }

  const print: Print = (text) => console.log(text);
  const app = await createApplication(config, { logger });

  if (options.task) {
    const result = await app.agent.run(options.task);
    print(formatRunResult(result));
    await createShutdownHandler(app, print)();
    process.exitCode = result.status === 'done' ? 0 : 1;
    return;
  }

  await repl(app, print);
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

// Run main entry point only when file is executed directly
if (isEntryPoint()) {
  main().catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
