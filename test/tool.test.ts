import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { SchemaError } from '../src/core/errors.js';
import { ToolRegistry, defineTool } from '../src/core/tool.js';
import { addTool } from './helpers.js';

const greet = defineTool(function greet({ name, excited }) {
  return `Hello, ${name}${excited ? '!' : '.'}`;
}, {
  doc: 'Greet someone.\n\nArguments:\n  name: Who to greet\n  excited: End with an exclamation mark',
  parameters: z.object({ name: z.string(), excited: z.boolean().default(false) }),
});

describe('defineTool', () => {
  it('names the tool after the function', () => {
    expect(greet.name).toBe('greet');
  });

  it('validates and defaults arguments on invoke', async () => {
    expect(await greet.invoke({ name: 'Ada' })).toBe('Hello, Ada.');
    expect(await greet.invoke({ name: 'Ada', excited: true })).toBe('Hello, Ada!');
    expect(() => greet.invoke({})).toThrow(z.ZodError);
  });
});

describe('ToolRegistry', () => {
  it('resolves tools by name', () => {
    const registry = new ToolRegistry([addTool, greet]);
    expect(registry.size).toBe(2);
    expect(registry.resolve('greet')?.tool).toBe(greet);
    expect(registry.resolve('greet')?.descriptor.parameters.excited).toEqual({
      kind: 'boolean', description: 'End with an exclamation mark', required: false,
    });
    expect(registry.resolve('missing')).toBeUndefined();
  });

  it('lists descriptors in registration order', () => {
    const registry = new ToolRegistry([greet, addTool]);
    expect(registry.descriptors().map((d) => d.name)).toEqual(['greet', 'add']);
    expect(Object.isFrozen(registry.descriptors())).toBe(true);
  });

  it('freezes descriptors all the way down', () => {
    const [descriptor] = new ToolRegistry([addTool]).descriptors();
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.parameters)).toBe(true);
    expect(Object.isFrozen(descriptor.parameters.a)).toBe(true);
    expect(() => {
      descriptor.parameters.a.required = false;
    }).toThrow(TypeError);
    expect(descriptor.parameters.a.required).toBe(true);
  });

  it('is empty without tools', () => {
    const registry = new ToolRegistry();
    expect(registry.size).toBe(0);
    expect(registry.descriptors()).toEqual([]);
  });

  it('rejects duplicate names', () => {
    const other = defineTool(function other() {
      return 0;
    }, { name: 'add', doc: 'Another add.', parameters: z.object({}) });
    expect(() => new ToolRegistry([addTool, other])).toThrow(new SchemaError('Duplicate tool name: add'));
  });
});
