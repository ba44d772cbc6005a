import { z } from 'zod';
import { defineTool } from '../src/core/tool.js';
import type {
  Completion, CompletionOptions, CompletionProvider, Message, TokenUsage, ToolCall,
} from '../src/core/types.js';

export interface ScriptedTurn {
  content?: string | null;
  toolCalls?: ToolCall[];
  usage?: TokenUsage;
}

export type Script = Array<ScriptedTurn | Error> | ((call: number) => ScriptedTurn | Error);

export interface ScriptedProvider extends CompletionProvider {
  calls: Array<{ messages: readonly Message[]; options: CompletionOptions }>;
}

export const TURN_USAGE: TokenUsage = { promptTokens: 10, completionTokens: 20, totalTokens: 30 };

/** Replays canned completions in order; an Error entry is thrown instead. */
export function scriptedProvider(script: Script, name = 'scripted'): ScriptedProvider {
  const calls: ScriptedProvider['calls'] = [];
  return {
    name,
    calls,
    async createCompletion(messages, options): Promise<Completion> {
      const index = calls.length;
      calls.push({ messages, options });
      const turn = typeof script === 'function' ? script(index) : script[index];
      if (turn === undefined) throw new Error(`no scripted turn #${index}`);
      if (turn instanceof Error) throw turn;

      const toolCalls = turn.toolCalls ?? [];
      return {
        message: { content: turn.content ?? null, toolCalls },
        finishReason: toolCalls.length ? 'tool_calls' : 'stop',
        usage: turn.usage ?? TURN_USAGE,
      };
    },
  };
}

export function call(id: string, name: string, args: Record<string, unknown> | string): ToolCall {
  return { id, name, arguments: typeof args === 'string' ? args : JSON.stringify(args) };
}

export const ADD_DOC = `Add two integers.

Arguments:
  a: First addend
  b: Second addend`;

export const addTool = defineTool(function add({ a, b }) {
  return a + b;
}, {
  doc: ADD_DOC,
  parameters: z.object({ a: z.number().int(), b: z.number().int() }),
});

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
