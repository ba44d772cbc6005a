import { errorMessage } from './errors.js';
import type { Tool, ToolExecutionResult } from './types.js';

export const DEFAULT_MAX_RESULT_LENGTH = 50_000;

export interface ExecuteOptions {
  /** Cap on the serialized output; undefined means no cap. */
  maxLength?: number;
}

type Decoded =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; error: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function decodeArguments(raw: string): Decoded {
  if (!raw.trim()) return { ok: true, value: {} };

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return { ok: false, error: `Invalid tool arguments JSON: ${errorMessage(err)}` };
  }
  if (!isRecord(parsed)) {
    return { ok: false, error: 'Tool arguments must be a JSON object' };
  }
  return { ok: true, value: parsed };
}

/**
 * Runs one tool call. Never throws: decode errors, validation errors, thrown
 * exceptions and unserializable results all come back as success = false.
 */
export async function executeTool(
  tool: Tool,
  rawArguments: string,
  options: ExecuteOptions = {},
): Promise<ToolExecutionResult> {
  const decoded = decodeArguments(rawArguments);
  if (!decoded.ok) {
    return failure(tool.name, {}, decoded.error);
  }
  const args = decoded.value;

  const checked = tool.parameters.safeParse(args);
  if (!checked.success) {
    const issues = checked.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return failure(tool.name, args, `Invalid arguments for ${tool.name}: ${issues}`);
  }

  let result: unknown;
  try {
    result = await tool.invoke(checked.data);
  } catch (err) {
    return failure(tool.name, args, errorMessage(err));
  }

  let output: string;
  try {
    output = formatToolResult(result, options.maxLength);
  } catch (err) {
    return failure(tool.name, args, `Failed to serialize result: ${errorMessage(err)}`);
  }

  return { tool: tool.name, success: true, result, output, arguments: args };
}

export function unknownToolResult(name: string, rawArguments: string): ToolExecutionResult {
  const decoded = decodeArguments(rawArguments);
  return failure(name, decoded.ok ? decoded.value : {}, `Unknown tool: ${name}`);
}

/** Canonical text for a tool result, optionally truncated. */
export function formatToolResult(result: unknown, maxLength?: number): string {
  let formatted: string;
  if (typeof result === 'string') {
    formatted = result;
  } else if (result === undefined) {
    formatted = '';
  } else {
    formatted = JSON.stringify(result, replacer, 2) ?? String(result);
  }

  if (maxLength !== undefined && formatted.length > maxLength) {
    formatted = `${formatted.slice(0, maxLength)}\n\n... [TRUNCATED - Original length: ${formatted.length} chars, showing first ${maxLength} chars]`;
  }
  return formatted;
}

function replacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

function failure(tool: string, args: Record<string, unknown>, error: string): ToolExecutionResult {
  return {
    tool,
    success: false,
    error,
    output: JSON.stringify({ error }),
    arguments: args,
  };
}
