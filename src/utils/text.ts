import { isRecord } from '../core/executor.js';
import type { ToolCallRecord } from '../core/types.js';

/**
 * Pulls a JSON object out of free-form model output. Tries the whole text,
 * then a fenced code block, then each balanced `{...}` span in order.
 */
export function extractJson(text: string): Record<string, unknown> | undefined {
  if (!text) return undefined;

  const direct = parseObject(text.trim());
  if (direct) return direct;

  const fenced = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/.exec(text);
  if (fenced) {
    const parsed = parseObject(fenced[1]);
    if (parsed) return parsed;
  }

  for (const candidate of balancedObjects(text)) {
    const parsed = parseObject(candidate);
    if (parsed) return parsed;
  }
  return undefined;
}

export function extractHtml(text: string): string | undefined {
  if (!text) return undefined;

  const trimmed = text.trim();
  if (trimmed.startsWith('<') && trimmed.toLowerCase().includes('html')) return trimmed;

  const fenced = /```(?:html)?\s*(<!DOCTYPE[\s\S]*?<\/html>)\s*```/i.exec(text);
  if (fenced) return fenced[1];

  const bare = /(<!DOCTYPE[\s\S]*?<\/html>)/i.exec(text);
  return bare ? bare[1] : undefined;
}

export function truncateForLogging(text: string, maxLength = 500): string {
  return text.length <= maxLength ? text : `${text.slice(0, maxLength)}...`;
}

/** Rough count at ~4 characters per token. */
export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

export function formatError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return `Error: ${String(err)}`;
}

export interface MergedToolResults {
  toolsCalled: string[];
  successes: number;
  failures: number;
  results: Record<string, ToolCallRecord>;
}

/** Later calls to the same tool overwrite earlier ones in `results`. */
export function mergeToolResults(records: readonly ToolCallRecord[]): MergedToolResults {
  const merged: MergedToolResults = { toolsCalled: [], successes: 0, failures: 0, results: {} };
  for (const record of records) {
    merged.toolsCalled.push(record.tool);
    if (record.success) merged.successes++;
    else merged.failures++;
    merged.results[record.tool] = record;
  }
  return merged;
}

function parseObject(text: string): Record<string, unknown> | undefined {
  try {
    const value: unknown = JSON.parse(text);
    return isRecord(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

function* balancedObjects(text: string): Generator<string> {
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    let depth = 0;
    let inString = false;
    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (ch === '\\') i++;
        else if (ch === '"') inString = false;
      } else if (ch === '"') {
        inString = true;
      } else if (ch === '{') {
        depth++;
      } else if (ch === '}' && --depth === 0) {
        yield text.slice(start, i + 1);
        break;
      }
    }
  }
}
