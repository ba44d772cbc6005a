import type { z } from 'zod';
import { SchemaError } from './errors.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { generateToolDescriptor } from './schema.js';
import type { Tool, ToolDescriptor } from './types.js';

export type { Tool };

export interface ToolOptions<Shape extends z.ZodRawShape> {
  /** Defaults to the implementing function's name. */
  name?: string;
  doc: string;
  parameters: z.ZodObject<Shape>;
}

/**
 * Wraps a function as a tool. The function receives the decoded argument
 * object (defaults applied) and may return a value or a promise.
 *
 * ```ts
 * const add = defineTool(function add({ a, b }) { return a + b; }, {
 *   doc: 'Add two integers.\n\nArguments:\n  a: First addend\n  b: Second addend',
 *   parameters: z.object({ a: z.number().int(), b: z.number().int() }),
 * });
 * ```
 */
export function defineTool<Shape extends z.ZodRawShape, Result>(
  fn: (args: z.infer<z.ZodObject<Shape>>) => Result | Promise<Result>,
  options: ToolOptions<Shape>,
): Tool {
  const { parameters } = options;
  return {
    name: options.name ?? fn.name,
    doc: options.doc,
    parameters,
    invoke: (args: unknown) => fn(parameters.parse(args)),
  };
}

export interface RegistryEntry {
  readonly descriptor: ToolDescriptor;
  readonly tool: Tool;
}

/** Read-only after construction, so forks share one instance. */
export class ToolRegistry {
  private readonly entries: ReadonlyMap<string, RegistryEntry>;
  private readonly descriptorList: readonly ToolDescriptor[];

  constructor(tools: readonly Tool[] = [], log: Logger = rootLogger) {
    const entries = new Map<string, RegistryEntry>();
    for (const tool of tools) {
      const descriptor = freezeDescriptor(generateToolDescriptor(tool, log));
      if (entries.has(descriptor.name)) {
        throw new SchemaError(`Duplicate tool name: ${descriptor.name}`);
      }
      entries.set(descriptor.name, { descriptor, tool });
      log.debug({ tool: descriptor.name }, 'Generated tool descriptor');
    }
    this.entries = entries;
    this.descriptorList = Object.freeze([...entries.values()].map((e) => e.descriptor));
  }

  get size(): number {
    return this.entries.size;
  }

  resolve(name: string): RegistryEntry | undefined {
    return this.entries.get(name);
  }

  descriptors(): readonly ToolDescriptor[] {
    return this.descriptorList;
  }
}

/** Descriptors are shared by every fork, so nothing below the list may change either. */
function freezeDescriptor(descriptor: ToolDescriptor): ToolDescriptor {
  for (const param of Object.values(descriptor.parameters)) Object.freeze(param);
  Object.freeze(descriptor.parameters);
  return Object.freeze(descriptor);
}
