// pattern: Imperative Shell

/**
 * Built-in shell tools: bash, bash_output, bash_kill.
 * Commands run through bash in the workspace directory. Background commands
 * belong to the tool set that started them and are killed when it is closed.
 */

import { spawn } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import type { EventEmitter } from 'node:events';
import { resolve } from 'node:path';
import type { Readable } from 'node:stream';
import { optionalBoolean, optionalInteger, optionalString, requireString } from '../input.js';
import { errorMessage, toolFailure, toolSuccess } from '../result.js';
import type { Tool, ToolResult } from '../types.js';
import { truncateMiddle } from './files.js';

export const DEFAULT_TIMEOUT_SECONDS = 120;
export const MAX_TIMEOUT_SECONDS = 600;
const MAX_OUTPUT_TOKENS = 32000;
const KILL_GRACE_MS = 5000;

export type ShellProcess = EventEmitter & {
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
};

export type SpawnShell = (command: string, cwd: string) => ShellProcess;

export type ShellTools = {
  tools: Array<Tool>;
  /** Kill every background command that is still running. */
  close(): Promise<void>;
};

type Exit = {
  code: number | null;
  signal: NodeJS.Signals | null;
};

type BackgroundShell = {
  id: string;
  child: ShellProcess;
  output: string;
  read: number;
  status: 'running' | 'completed' | 'failed' | 'killed';
  exit: Exit | undefined;
  exited: Promise<void>;
};

export const spawnBash: SpawnShell = (command, cwd) =>
  spawn('bash', ['-c', command], { cwd, stdio: ['ignore', 'pipe', 'pipe'] });

export function clampTimeout(seconds: number | undefined): number {
  if (seconds === undefined || seconds < 1) {
    return DEFAULT_TIMEOUT_SECONDS;
  }
  return Math.min(seconds, MAX_TIMEOUT_SECONDS);
}

export function formatCommandOutput(stdout: string, stderr: string): string {
  const parts: Array<string> = [];
  if (stdout.trimEnd()) {
    parts.push(stdout.trimEnd());
  }
  if (stderr.trimEnd()) {
    parts.push(`[stderr]\n${stderr.trimEnd()}`);
  }
  return parts.length > 0 ? parts.join('\n') : '(no output)';
}

function capture(stream: Readable, onData: (chunk: string) => void): void {
  stream.setEncoding('utf8');
  stream.on('data', (chunk: string) => onData(chunk));
}

function waitForExit(child: ShellProcess): Promise<Exit> {
  return new Promise((resolveExit, reject) => {
    child.once('error', reject);
    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      resolveExit({ code, signal });
    });
  });
}

/**
 * Compile a line filter, or return the error message for an invalid one.
 */
function compileFilter(filter: string): RegExp | string {
  try {
    return new RegExp(filter);
  } catch (error) {
    return `Invalid filter pattern: ${errorMessage(error)}`;
  }
}

function describeStatus(shell: BackgroundShell): string {
  if (shell.exit?.code !== undefined && shell.exit.code !== null) {
    return `${shell.status} (exit code ${shell.exit.code})`;
  }
  if (shell.exit?.signal) {
    return `${shell.status} (${shell.exit.signal})`;
  }
  return shell.status;
}

export function createShellTools(workspaceDir: string, spawnShell: SpawnShell = spawnBash): ShellTools {
  const root = resolve(workspaceDir);
  const shells = new Map<string, BackgroundShell>();

  async function terminate(shell: BackgroundShell): Promise<void> {
    if (shell.status === 'running') {
      shell.status = 'killed';
      shell.child.kill('SIGTERM');
    }
    const escalate = setTimeout(() => shell.child.kill('SIGKILL'), KILL_GRACE_MS);
    try {
      await shell.exited;
    } finally {
      clearTimeout(escalate);
    }
  }

  async function runForeground(command: string, timeoutSeconds: number): Promise<ToolResult> {
    const child = spawnShell(command, root);
    let stdout = '';
    let stderr = '';
    capture(child.stdout, (chunk) => {
      stdout += chunk;
    });
    capture(child.stderr, (chunk) => {
      stderr += chunk;
    });

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, timeoutSeconds * 1000);

    let exit: Exit;
    try {
      exit = await waitForExit(child);
    } finally {
      clearTimeout(timer);
    }

    const output = truncateMiddle(formatCommandOutput(stdout, stderr), MAX_OUTPUT_TOKENS);
    if (timedOut) {
      return toolFailure(`Command timed out after ${timeoutSeconds} seconds`, output);
    }
    if (exit.code === 0) {
      return toolSuccess(output);
    }
    if (exit.code === null) {
      return toolFailure(`Command terminated by ${exit.signal ?? 'signal'}`, output);
    }
    return toolFailure(`Command failed with exit code ${exit.code}`, output);
  }

  function startBackground(command: string): ToolResult {
    const child = spawnShell(command, root);
    const shell: BackgroundShell = {
      id: randomUUID().slice(0, 8),
      child,
      output: '',
      read: 0,
      status: 'running',
      exit: undefined,
      exited: Promise.resolve(),
    };
    capture(child.stdout, (chunk) => {
      shell.output += chunk;
    });
    capture(child.stderr, (chunk) => {
      shell.output += chunk;
    });
    shell.exited = waitForExit(child).then(
      (exit) => {
        shell.exit = exit;
        if (shell.status === 'running') {
          shell.status = exit.code === 0 ? 'completed' : 'failed';
        }
      },
      (error: unknown) => {
        shell.output += `\n${errorMessage(error)}`;
        shell.status = 'failed';
      },
    );
    shells.set(shell.id, shell);

    return toolSuccess(
      `Background command started with ID: ${shell.id}\nUse bash_output to read its output and bash_kill to stop it.`,
    );
  }

  const bash: Tool = {
    definition: {
      name: 'bash',
      description:
        'Execute a bash command in the workspace directory. Returns stdout and stderr; a non-zero exit code is reported as an error. Set run_in_background for long-running commands such as servers, then use bash_output and bash_kill.',
      parameters: [
        { name: 'command', type: 'string', description: 'The bash command to execute', required: true },
        {
          name: 'timeout',
          type: 'integer',
          description: `Timeout in seconds (default ${DEFAULT_TIMEOUT_SECONDS}, max ${MAX_TIMEOUT_SECONDS}); ignored for background commands`,
          required: false,
          default: DEFAULT_TIMEOUT_SECONDS,
        },
        {
          name: 'run_in_background',
          type: 'boolean',
          description: 'Run the command in the background and return its ID immediately',
          required: false,
          default: false,
        },
      ],
    },
    execute: async (input) => {
      try {
        const command = requireString(input, 'command');
        const timeoutSeconds = clampTimeout(optionalInteger(input, 'timeout'));

        if (optionalBoolean(input, 'run_in_background')) {
          return startBackground(command);
        }
        return await runForeground(command, timeoutSeconds);
      } catch (error) {
        return toolFailure(`Failed to run command: ${errorMessage(error)}`);
      }
    },
  };

  const bash_output: Tool = {
    definition: {
      name: 'bash_output',
      description:
        'Read output produced by a background command since the last read, with its current status. Optionally keep only lines matching a regular expression.',
      parameters: [
        { name: 'bash_id', type: 'string', description: 'ID returned when the command was started', required: true },
        { name: 'filter_str', type: 'string', description: 'Regular expression that output lines must match', required: false },
      ],
    },
    execute: async (input) => {
      try {
        const id = requireString(input, 'bash_id');
        const filter = optionalString(input, 'filter_str');
        const shell = shells.get(id);
        if (!shell) {
          return toolFailure(`Background process not found: ${id}`);
        }

        const pattern = filter ? compileFilter(filter) : undefined;
        if (typeof pattern === 'string') {
          return toolFailure(pattern);
        }

        const fresh = shell.output.slice(shell.read);
        shell.read = shell.output.length;
        const text = pattern
          ? fresh.split('\n').filter((line) => pattern.test(line)).join('\n')
          : fresh;

        const body = text.trimEnd() || '(no new output)';
        return toolSuccess(`[${id}] status: ${describeStatus(shell)}\n${truncateMiddle(body, MAX_OUTPUT_TOKENS)}`);
      } catch (error) {
        return toolFailure(errorMessage(error));
      }
    },
  };

  const bash_kill: Tool = {
    definition: {
      name: 'bash_kill',
      description: 'Stop a background command and return any output not yet read.',
      parameters: [
        { name: 'bash_id', type: 'string', description: 'ID returned when the command was started', required: true },
      ],
    },
    execute: async (input) => {
      try {
        const id = requireString(input, 'bash_id');
        const shell = shells.get(id);
        if (!shell) {
          return toolFailure(`Background process not found: ${id}`);
        }

        await terminate(shell);
        shells.delete(id);

        const remaining = shell.output.slice(shell.read).trimEnd();
        return toolSuccess(`[${id}] ${describeStatus(shell)}${remaining ? `\n${remaining}` : ''}`);
      } catch (error) {
        return toolFailure(errorMessage(error));
      }
    },
  };

  return {
    tools: [bash, bash_output, bash_kill],
    async close(): Promise<void> {
      const running = [...shells.values()];
      shells.clear();
      await Promise.all(running.map((shell) => terminate(shell)));
    },
  };
}
