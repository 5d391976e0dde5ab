// pattern: Imperative Shell

/**
 * ToolRegistry implementation.
 * Manages tool registration, parameter validation, and dispatch. Lookup misses,
 * validation failures and thrown errors all come back as failed ToolResults.
 */

import { errorMessage, toolFailure } from './result.js';
import { parametersToJsonSchema } from './schema.js';
import type {
  ModelToolSchema,
  Tool,
  ToolDefinition,
  ToolParameterType,
  ToolResult,
  ToolRegistry,
} from './types.js';

function validateParameterType(
  value: unknown,
  expectedType: ToolParameterType,
): boolean {
  switch (expectedType) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    case 'array':
      return Array.isArray(value);
    case 'any':
      return true;
    default:
      return false;
  }
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Check input against the declared parameters and fill in defaults.
 * Returns the prepared input, or the error message for the model.
 */
function prepareInput(
  definition: ToolDefinition,
  input: Record<string, unknown>,
): { input: Record<string, unknown> } | { error: string } {
  const prepared: Record<string, unknown> = { ...input };

  for (const param of definition.parameters) {
    const raw = prepared[param.name];
    // models often send null for an optional parameter they mean to omit
    const present = raw !== undefined && (param.required || raw !== null);

    if (!present) {
      if (param.required) {
        return { error: `missing required parameter: ${param.name}` };
      }
      delete prepared[param.name];
      if (param.default !== undefined) {
        prepared[param.name] = param.default;
      }
      continue;
    }

    const value = prepared[param.name];
    if (!validateParameterType(value, param.type)) {
      return {
        error: `invalid type for parameter ${param.name}: expected ${param.type}, got ${describeValue(value)}`,
      };
    }

    if (param.enum_values && !param.enum_values.includes(String(value))) {
      return {
        error: `invalid value for parameter ${param.name}: expected one of ${param.enum_values.join(', ')}`,
      };
    }
  }

  return { input: prepared };
}

export function createToolRegistry(initialTools: ReadonlyArray<Tool> = []): ToolRegistry {
  const tools = new Map<string, Tool>();
  let sealed = false;

  const registry: ToolRegistry = {
    register(tool: Tool): void {
      if (sealed) {
        throw new Error(`tool registry is sealed: cannot register ${tool.definition.name}`);
      }
      if (tools.has(tool.definition.name)) {
        throw new Error(
          `tool already registered: ${tool.definition.name}`,
        );
      }
      tools.set(tool.definition.name, tool);
    },

    seal(): void {
      sealed = true;
    },

    get sealed(): boolean {
      return sealed;
    },

    get(name: string): Tool | undefined {
      return tools.get(name);
    },

    getDefinitions(): Array<ToolDefinition> {
      return Array.from(tools.values()).map((tool) => tool.definition);
    },

    async dispatch(
      name: string,
      input: Record<string, unknown>,
    ): Promise<ToolResult> {
      const tool = tools.get(name);
      if (!tool) {
        return toolFailure(`unknown tool: ${name}`);
      }

      const prepared = prepareInput(tool.definition, input);
      if ('error' in prepared) {
        return toolFailure(prepared.error);
      }

      try {
        return await tool.execute(prepared.input);
      } catch (error) {
        return toolFailure(`handler error: ${errorMessage(error)}`);
      }
    },

    toModelTools(): Array<ModelToolSchema> {
      return Array.from(tools.values()).map((tool) => ({
        name: tool.definition.name,
        description: tool.definition.description,
        input_schema: parametersToJsonSchema(tool.definition.parameters),
      }));
    },
  };

  for (const tool of initialTools) {
    registry.register(tool);
  }

  return registry;
}
