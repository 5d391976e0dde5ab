// pattern: Functional Core

/**
 * Conversion between the registry's parameter list and JSON Schema.
 * External providers publish JSON Schema; the model expects it back.
 */

import type { ToolParameter, ToolParameterType } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toParameterType(type: unknown): ToolParameterType {
  if (
    type === 'string'
    || type === 'number'
    || type === 'integer'
    || type === 'boolean'
    || type === 'object'
    || type === 'array'
  ) {
    return type;
  }
  // unions ("string" | "null"), refs and missing types are left to the provider
  return 'any';
}

/**
 * Flatten the top level of an object schema into registry parameters.
 * Nested structure is preserved in `schema` and only checked by the provider.
 */
export function parametersFromJsonSchema(inputSchema: unknown): Array<ToolParameter> {
  if (!isRecord(inputSchema) || !isRecord(inputSchema['properties'])) {
    return [];
  }

  const requiredList = Array.isArray(inputSchema['required'])
    ? inputSchema['required'].filter((name): name is string => typeof name === 'string')
    : [];
  const required = new Set(requiredList);

  return Object.entries(inputSchema['properties']).map(([name, property]) => {
    const fragment = isRecord(property) ? property : {};
    const rawEnum: unknown = fragment['enum'];
    const enumValues = Array.isArray(rawEnum)
      ? rawEnum.filter((value): value is string => typeof value === 'string')
      : undefined;

    return {
      name,
      type: toParameterType(fragment['type']),
      description: typeof fragment['description'] === 'string' ? fragment['description'] : '',
      required: required.has(name),
      ...(enumValues && enumValues.length > 0 && { enum_values: enumValues }),
      ...('default' in fragment && { default: fragment['default'] }),
      schema: fragment,
    };
  });
}

export function parametersToJsonSchema(params: ReadonlyArray<ToolParameter>): Record<string, unknown> {
  const properties: Record<string, unknown> = {};
  const required: Array<string> = [];

  for (const param of params) {
    if (param.schema) {
      properties[param.name] = param.schema;
    } else {
      properties[param.name] = {
        ...(param.type !== 'any' && { type: param.type }),
        description: param.description,
        ...(param.enum_values && { enum: param.enum_values }),
        ...(param.default !== undefined && { default: param.default }),
      };
    }

    if (param.required) {
      required.push(param.name);
    }
  }

  return {
    type: 'object',
    properties,
    required,
  };
}
