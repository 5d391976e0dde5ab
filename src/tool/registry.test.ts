// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { createToolRegistry } from './registry.js';
import { toolSuccess } from './result.js';
import type { Tool, ToolParameter } from './types.js';

function createTool(
  name: string,
  parameters: ReadonlyArray<ToolParameter> = [],
  execute: Tool['execute'] = async () => toolSuccess('ok'),
): Tool {
  return {
    definition: {
      name,
      description: `${name} description`,
      parameters,
    },
    execute,
  };
}

describe('ToolRegistry', () => {
  describe('registration', () => {
    it('should register a tool and include it in getDefinitions', () => {
      const registry = createToolRegistry();

      registry.register(
        createTool('test_tool', [
          {
            name: 'query',
            type: 'string',
            description: 'A query string',
            required: true,
          },
        ]),
      );

      const definitions = registry.getDefinitions();
      expect(definitions.length).toBe(1);
      expect(definitions[0]?.name).toBe('test_tool');
    });

    it('should throw when registering duplicate tool name', () => {
      const registry = createToolRegistry();
      const mockTool = createTool('test_tool');

      registry.register(mockTool);

      expect(() => {
        registry.register(mockTool);
      }).toThrow('tool already registered: test_tool');
    });

    it('should fail at construction when the initial list has a duplicate', () => {
      expect(() => createToolRegistry([createTool('a'), createTool('b'), createTool('a')])).toThrow(
        'tool already registered: a',
      );
    });

    it('should refuse registration after seal', () => {
      const registry = createToolRegistry([createTool('a')]);
      registry.seal();

      expect(registry.sealed).toBe(true);
      expect(() => registry.register(createTool('b'))).toThrow('tool registry is sealed: cannot register b');
      expect(registry.getDefinitions().map((d) => d.name)).toEqual(['a']);
    });

    it('should look up tools by name', () => {
      const tool = createTool('lookup');
      const registry = createToolRegistry([tool]);

      expect(registry.get('lookup')).toBe(tool);
      expect(registry.get('missing')).toBeUndefined();
    });
  });

  describe('dispatch', () => {
    it('should call execute with valid params and return result', async () => {
      const received: Array<Record<string, unknown>> = [];
      const registry = createToolRegistry([
        createTool(
          'test_tool',
          [{ name: 'input', type: 'string', description: 'An input', required: true }],
          async (input) => {
            received.push(input);
            return toolSuccess('processed');
          },
        ),
      ]);

      const result = await registry.dispatch('test_tool', { input: 'hello' });

      expect(received).toEqual([{ input: 'hello' }]);
      expect(result.success).toBe(true);
      expect(result.output).toBe('processed');
    });

    it('should return error for unknown tool', async () => {
      const registry = createToolRegistry();

      const result = await registry.dispatch('does_not_exist', {});

      expect(result.success).toBe(false);
      expect(result.error).toBe('unknown tool: does_not_exist');
    });

    it('should return error for missing required parameter', async () => {
      const registry = createToolRegistry([
        createTool('test_tool', [
          { name: 'required_param', type: 'string', description: 'Required', required: true },
        ]),
      ]);

      const result = await registry.dispatch('test_tool', {});

      expect(result.success).toBe(false);
      expect(result.error).toBe('missing required parameter: required_param');
    });

    it('should return error for invalid parameter type', async () => {
      const registry = createToolRegistry([
        createTool('test_tool', [
          { name: 'number_param', type: 'number', description: 'A number', required: true },
        ]),
      ]);

      const result = await registry.dispatch('test_tool', { number_param: 'not a number' });

      expect(result.success).toBe(false);
      expect(result.error).toBe('invalid type for parameter number_param: expected number, got string');
    });

    it('should distinguish integers from other numbers', async () => {
      const registry = createToolRegistry([
        createTool('test_tool', [
          { name: 'offset', type: 'integer', description: 'Line offset', required: true },
        ]),
      ]);

      const fractional = await registry.dispatch('test_tool', { offset: 1.5 });
      const whole = await registry.dispatch('test_tool', { offset: 3 });

      expect(fractional.success).toBe(false);
      expect(whole.success).toBe(true);
    });

    it('should report arrays passed for object parameters', async () => {
      const registry = createToolRegistry([
        createTool('test_tool', [{ name: 'options', type: 'object', description: 'Options', required: true }]),
      ]);

      const result = await registry.dispatch('test_tool', { options: [1, 2] });

      expect(result.error).toBe('invalid type for parameter options: expected object, got array');
    });

    it('should catch execute errors and wrap in ToolResult', async () => {
      const registry = createToolRegistry([
        createTool('test_tool', [], async () => {
          throw new Error('handler crashed');
        }),
      ]);

      const result = await registry.dispatch('test_tool', {});

      expect(result.success).toBe(false);
      expect(result.error).toBe('handler error: handler crashed');
    });

    it('should allow optional parameters to be omitted', async () => {
      const registry = createToolRegistry([
        createTool('test_tool', [
          { name: 'required_param', type: 'string', description: 'Required', required: true },
          { name: 'optional_param', type: 'string', description: 'Optional', required: false },
        ]),
      ]);

      const result = await registry.dispatch('test_tool', { required_param: 'hello' });

      expect(result.success).toBe(true);
    });

    it('should apply declared defaults for omitted parameters', async () => {
      const received: Array<Record<string, unknown>> = [];
      const registry = createToolRegistry([
        createTool(
          'test_tool',
          [{ name: 'category', type: 'string', description: 'Category', required: false, default: 'general' }],
          async (input) => {
            received.push(input);
            return toolSuccess('ok');
          },
        ),
      ]);

      await registry.dispatch('test_tool', {});
      await registry.dispatch('test_tool', { category: 'decision' });

      expect(received).toEqual([{ category: 'general' }, { category: 'decision' }]);
    });

    it('should treat null optional parameters as omitted', async () => {
      const received: Array<Record<string, unknown>> = [];
      const registry = createToolRegistry([
        createTool(
          'test_tool',
          [
            { name: 'category', type: 'string', description: 'Category', required: false, default: 'general' },
            { name: 'limit', type: 'integer', description: 'Limit', required: false },
            { name: 'path', type: 'string', description: 'Path', required: true },
          ],
          async (input) => {
            received.push(input);
            return toolSuccess('ok');
          },
        ),
      ]);

      const accepted = await registry.dispatch('test_tool', { category: null, limit: null, path: 'a.txt' });
      const rejected = await registry.dispatch('test_tool', { path: null });

      expect(accepted.success).toBe(true);
      expect(received).toEqual([{ category: 'general', path: 'a.txt' }]);
      expect(rejected.error).toBe('invalid type for parameter path: expected string, got null');
    });

    it('should return error for invalid enum value', async () => {
      const registry = createToolRegistry([
        createTool('test_tool', [
          {
            name: 'order',
            type: 'string',
            description: 'Order',
            required: true,
            enum_values: ['oldest_first', 'newest_first'],
          },
        ]),
      ]);

      const invalid = await registry.dispatch('test_tool', { order: 'random' });
      const valid = await registry.dispatch('test_tool', { order: 'newest_first' });

      expect(invalid.success).toBe(false);
      expect(invalid.error).toBe('invalid value for parameter order: expected one of oldest_first, newest_first');
      expect(valid.success).toBe(true);
    });

    it('should skip type checks for untyped parameters', async () => {
      const registry = createToolRegistry([
        createTool('test_tool', [{ name: 'value', type: 'any', description: 'Anything', required: true }]),
      ]);

      const result = await registry.dispatch('test_tool', { value: null });

      expect(result.success).toBe(true);
    });
  });

  describe('toModelTools', () => {
    it('should convert tools to model format with JSON Schema', () => {
      const registry = createToolRegistry([
        createTool('test_tool', [
          { name: 'str_param', type: 'string', description: 'String param', required: true },
          {
            name: 'enum_param',
            type: 'string',
            description: 'Enum param',
            required: false,
            enum_values: ['a', 'b'],
          },
        ]),
      ]);

      const modelTools = registry.toModelTools();

      expect(modelTools).toEqual([
        {
          name: 'test_tool',
          description: 'test_tool description',
          input_schema: {
            type: 'object',
            properties: {
              str_param: { type: 'string', description: 'String param' },
              enum_param: { type: 'string', description: 'Enum param', enum: ['a', 'b'] },
            },
            required: ['str_param'],
          },
        },
      ]);
    });

    it('should pass through schema fragments from external providers', () => {
      const fragment = {
        type: 'object',
        properties: { depth: { type: 'integer' } },
      };
      const registry = createToolRegistry([
        createTool('external', [
          { name: 'filter', type: 'object', description: '', required: true, schema: fragment },
        ]),
      ]);

      const [modelTool] = registry.toModelTools();

      expect(modelTool?.input_schema).toEqual({
        type: 'object',
        properties: { filter: fragment },
        required: ['filter'],
      });
    });
  });
});
