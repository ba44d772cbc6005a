import { z } from 'zod';
import { SchemaError } from './errors.js';
import { logger as rootLogger, type Logger } from './logger.js';
import type { ParameterDescriptor, ParameterKind, Tool, ToolDescriptor } from './types.js';

const TOOL_NAME = /^[a-zA-Z0-9_-]{1,64}$/;
const SECTION_HEADERS = new Set(['args:', 'arguments:', 'parameters:']);
const ENTRY = /^([A-Za-z_$][\w$]*)\s*(?:\([^)]*\))?\s*:\s*(.*)$/;

/**
 * Builds the descriptor the LLM sees for a tool. The output depends only on
 * the tool's name, doc and parameter schema, so repeated calls produce the
 * same JSON.
 */
export function generateToolDescriptor(tool: Tool, log: Logger = rootLogger): ToolDescriptor {
  const name = tool.name.trim();
  if (!name) {
    throw new SchemaError('Tool name is required');
  }
  if (!TOOL_NAME.test(name)) {
    throw new SchemaError(`Invalid tool name "${name}": use letters, digits, "_" or "-" (max 64)`);
  }

  const doc = tool.doc ?? '';
  const description = firstLine(doc);
  if (!description) {
    throw new SchemaError(`Tool "${name}" has no description`);
  }

  const argDocs = parseArgumentDocs(doc);
  const parameters: Record<string, ParameterDescriptor> = {};
  const shape: z.ZodRawShape = tool.parameters.shape;

  for (const [param, schema] of Object.entries(shape)) {
    const inner = unwrap(schema);
    const kind = kindOf(inner);
    if (kind === 'any') {
      log.warn({ tool: name, parameter: param }, 'Unsupported parameter type, using "any"');
    }

    const descriptor: ParameterDescriptor = {
      kind,
      description: argDocs.get(param) ?? schema.description ?? inner.description ?? '',
      required: isRequired(schema),
    };
    if (inner instanceof z.ZodArray) {
      descriptor.items = kindOf(unwrap(inner.element));
    }
    parameters[param] = descriptor;
  }

  return { name, description, parameters };
}

/** The JSON Schema object providers put on the wire. */
export function toJsonSchema(descriptor: ToolDescriptor): {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required: string[];
} {
  const properties: Record<string, Record<string, unknown>> = {};
  const required: string[] = [];

  for (const [name, param] of Object.entries(descriptor.parameters)) {
    const prop: Record<string, unknown> = param.kind === 'any' ? {} : { type: param.kind };
    if (param.kind === 'array') {
      prop.items = param.items && param.items !== 'any' ? { type: param.items } : {};
    }
    if (param.description) prop.description = param.description;
    properties[name] = prop;
    if (param.required) required.push(name);
  }

  return { type: 'object', properties, required };
}

export function parseArgumentDocs(doc: string): Map<string, string> {
  const docs = new Map<string, string>();
  const lines = doc.split('\n');

  let headerIndent = -1;
  let entryIndent = -1;
  let current: string | undefined;

  for (const line of lines) {
    const trimmed = line.trim();
    const indent = line.length - line.trimStart().length;

    if (headerIndent < 0) {
      if (SECTION_HEADERS.has(trimmed.toLowerCase())) headerIndent = indent;
      continue;
    }

    if (!trimmed) continue;

    const match = ENTRY.exec(trimmed);
    if (indent <= headerIndent) {
      // Entries may sit at the header's own indent, unless earlier ones were nested.
      const flushEntry = indent === headerIndent && entryIndent <= headerIndent && match && match[2].trim();
      if (!flushEntry) break;
    }

    if (match && (entryIndent < 0 || indent <= entryIndent)) {
      entryIndent = indent;
      current = match[1];
      docs.set(current, match[2].trim());
    } else if (current !== undefined) {
      const previous = docs.get(current) ?? '';
      docs.set(current, previous ? `${previous} ${trimmed}` : trimmed);
    }
  }

  return docs;
}

function firstLine(doc: string): string {
  for (const line of doc.split('\n')) {
    const trimmed = line.trim();
    if (trimmed) return trimmed;
  }
  return '';
}

/** Only an explicit optional or default makes a parameter optional; nullable still needs a value. */
function isRequired(schema: z.ZodTypeAny): boolean {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodDefault) return false;
  if (schema instanceof z.ZodNullable) return isRequired(schema.unwrap());
  return true;
}

function unwrap(schema: z.ZodTypeAny): z.ZodTypeAny {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return unwrap(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return unwrap(schema.removeDefault());
  }
  return schema;
}

function kindOf(schema: z.ZodTypeAny): ParameterKind {
  if (schema instanceof z.ZodString || schema instanceof z.ZodEnum) return 'string';
  if (schema instanceof z.ZodNumber) return schema.isInt ? 'integer' : 'number';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodObject || schema instanceof z.ZodRecord) return 'object';
  if (schema instanceof z.ZodArray) return 'array';
  if (schema instanceof z.ZodLiteral) {
    const value: unknown = schema.value;
    if (typeof value === 'string') return 'string';
    if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
    if (typeof value === 'boolean') return 'boolean';
  }
  return 'any';
}
