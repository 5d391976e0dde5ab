// pattern: Imperative Shell

/**
 * Built-in workspace file tools: read_file, write_file, edit_file.
 * Relative paths resolve against the workspace directory.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { optionalInteger, requireString } from '../input.js';
import { errorMessage, toolFailure, toolSuccess } from '../result.js';
import type { Tool } from '../types.js';

const MAX_READ_TOKENS = 32000;
const CHARS_PER_TOKEN = 4;

/**
 * Keep the head and tail of oversized text, cutting on line boundaries.
 */
export function truncateMiddle(text: string, maxTokens: number): string {
  const estimated = Math.ceil(text.length / CHARS_PER_TOKEN);
  if (estimated <= maxTokens) {
    return text;
  }

  const charsPerHalf = Math.floor((maxTokens / 2) * CHARS_PER_TOKEN * 0.95);

  let head = text.slice(0, charsPerHalf);
  const lastNewline = head.lastIndexOf('\n');
  if (lastNewline > 0) {
    head = head.slice(0, lastNewline);
  }

  let tail = text.slice(-charsPerHalf);
  const firstNewline = tail.indexOf('\n');
  if (firstNewline > 0) {
    tail = tail.slice(firstNewline + 1);
  }

  return `${head}\n\n... [Content truncated: ~${estimated} tokens -> ~${maxTokens} tokens limit] ...\n\n${tail}`;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function createFileTools(workspaceDir: string): Array<Tool> {
  const root = resolve(workspaceDir);
  const toAbsolute = (path: string): string => (isAbsolute(path) ? path : resolve(root, path));

  const read_file: Tool = {
    definition: {
      name: 'read_file',
      description:
        "Read file contents from the filesystem. Output always includes line numbers in format 'LINE_NUMBER|LINE_CONTENT' (1-indexed). Supports reading partial content by specifying line offset and limit for large files.",
      parameters: [
        { name: 'path', type: 'string', description: 'Absolute or relative path to the file', required: true },
        { name: 'offset', type: 'integer', description: 'Starting line number (1-indexed)', required: false },
        { name: 'limit', type: 'integer', description: 'Number of lines to read', required: false },
      ],
    },
    execute: async (input) => {
      let path = '';
      try {
        path = requireString(input, 'path');
        const offset = optionalInteger(input, 'offset');
        const limit = optionalInteger(input, 'limit');

        const content = await readFile(toAbsolute(path), 'utf-8');
        const lines = content.split('\n');
        if (lines.length > 0 && lines[lines.length - 1] === '') {
          lines.pop();
        }

        const start = Math.max(0, offset ? offset - 1 : 0);
        const end = Math.min(lines.length, limit ? start + limit : lines.length);

        const numbered = lines
          .slice(start, end)
          .map((line, i) => `${String(start + i + 1).padStart(6, ' ')}|${line}`);

        return toolSuccess(truncateMiddle(numbered.join('\n'), MAX_READ_TOKENS));
      } catch (error) {
        if (isMissingFile(error)) {
          return toolFailure(`File not found: ${path}`);
        }
        return toolFailure(errorMessage(error));
      }
    },
  };

  const write_file: Tool = {
    definition: {
      name: 'write_file',
      description:
        'Write content to a file. Will overwrite existing files completely. For existing files, read the file first using read_file.',
      parameters: [
        { name: 'path', type: 'string', description: 'Absolute or relative path to the file', required: true },
        { name: 'content', type: 'string', description: 'Complete content to write', required: true },
      ],
    },
    execute: async (input) => {
      try {
        const target = toAbsolute(requireString(input, 'path'));
        const content = requireString(input, 'content');

        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, content, 'utf-8');

        return toolSuccess(`Successfully wrote to ${target}`);
      } catch (error) {
        return toolFailure(errorMessage(error));
      }
    },
  };

  const edit_file: Tool = {
    definition: {
      name: 'edit_file',
      description:
        'Perform exact string replacement in a file. The old_str must match exactly and appear exactly once in the file, otherwise the operation fails.',
      parameters: [
        { name: 'path', type: 'string', description: 'Absolute or relative path to the file', required: true },
        { name: 'old_str', type: 'string', description: 'Exact string to find (must be unique in file)', required: true },
        { name: 'new_str', type: 'string', description: 'Replacement string', required: true },
      ],
    },
    execute: async (input) => {
      let path = '';
      try {
        path = requireString(input, 'path');
        const oldStr = requireString(input, 'old_str');
        const newStr = requireString(input, 'new_str');
        const target = toAbsolute(path);

        const content = await readFile(target, 'utf-8');
        const first = content.indexOf(oldStr);
        if (oldStr === '' || first === -1) {
          return toolFailure(`Text not found in file: ${oldStr}`);
        }
        if (content.indexOf(oldStr, first + oldStr.length) !== -1) {
          return toolFailure(`Text appears more than once in file: ${oldStr}`);
        }

        await writeFile(target, content.slice(0, first) + newStr + content.slice(first + oldStr.length), 'utf-8');

        return toolSuccess(`Successfully edited ${target}`);
      } catch (error) {
        if (isMissingFile(error)) {
          return toolFailure(`File not found: ${path}`);
        }
        return toolFailure(errorMessage(error));
      }
    },
  };

  return [read_file, write_file, edit_file];
}
