// pattern: Functional Core

/**
 * Tool system types for registration, dispatch, and model integration.
 * These types define the contract every capability satisfies, whether it is
 * a native tool or an adapter over an external tool provider.
 */

export type ToolParameterType =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'object'
  | 'array'
  | 'any';

export type ToolParameter = {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
  enum_values?: ReadonlyArray<string>;
  default?: unknown;
  /** JSON-schema fragment as published by an external provider; sent to the model verbatim. */
  schema?: Record<string, unknown>;
};

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: ReadonlyArray<ToolParameter>;
};

export type ToolOutput = string | Record<string, unknown> | ReadonlyArray<unknown>;

export type ToolResult = {
  readonly success: boolean;
  readonly output: ToolOutput;
  readonly error?: string;
};

/**
 * A named capability. `execute` is the only side-effecting entry point and
 * reports failures as `{ success: false }` instead of throwing.
 */
export type Tool = {
  definition: ToolDefinition;
  execute(input: Record<string, unknown>): Promise<ToolResult>;
};

export type ModelToolSchema = {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
};

export interface ToolRegistry {
  register(tool: Tool): void;
  seal(): void;
  readonly sealed: boolean;
  get(name: string): Tool | undefined;
  getDefinitions(): Array<ToolDefinition>;
  dispatch(name: string, input: Record<string, unknown>): Promise<ToolResult>;
  toModelTools(): Array<ModelToolSchema>;
}
