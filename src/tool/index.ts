// pattern: Functional Core

export type {
  ToolParameterType,
  ToolParameter,
  ToolDefinition,
  ToolOutput,
  ToolResult,
  Tool,
  ToolRegistry,
  ModelToolSchema,
} from './types.js';

export { createToolRegistry } from './registry.js';
export { toolSuccess, toolFailure, formatToolResult, errorMessage } from './result.js';
export { parametersFromJsonSchema, parametersToJsonSchema } from './schema.js';
export { ToolInputError } from './input.js';
export { createNoteTools } from './builtin/notes.js';
export { createFileTools } from './builtin/files.js';
