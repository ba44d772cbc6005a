// Core types for toolloop

import type { Logger } from 'pino';
import type { z } from 'zod';
import type { ErrorCode } from './errors.js';

export type Role = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCall {
  readonly id: string;
  readonly name: string;
  readonly arguments: string; // JSON string
}

export interface Message {
  readonly id: string;
  readonly role: Role;
  readonly content: string | null;
  /** Present only on assistant turns that request tools. */
  readonly toolCalls?: readonly ToolCall[];
  /** Present only on tool turns. */
  readonly toolCallId?: string;
  readonly name?: string;
  readonly timestamp: number;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

// ─── Tools ───

export type ParameterKind = 'string' | 'integer' | 'number' | 'boolean' | 'object' | 'array' | 'any';

export interface ParameterDescriptor {
  kind: ParameterKind;
  description: string;
  required: boolean;
  /** Element kind, only for `array`. */
  items?: ParameterKind;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  parameters: Record<string, ParameterDescriptor>;
}

export interface Tool {
  readonly name: string;
  /** First line is the description; an `Arguments:` section documents parameters. */
  readonly doc?: string;
  readonly parameters: z.AnyZodObject;
  invoke(args: unknown): unknown;
}

export interface ToolExecutionResult {
  tool: string;
  success: boolean;
  result?: unknown;
  error?: string;
  /** Text placed in the tool message. */
  output: string;
  arguments: Record<string, unknown>;
}

export interface ToolCallRecord {
  tool: string;
  arguments: Record<string, unknown>;
  success: boolean;
  result?: unknown;
  error?: string;
}

// ─── Provider ───

export type ToolChoice = 'auto' | 'required' | 'none';

export type FinishReason = 'stop' | 'tool_calls' | 'length' | 'content_filter';

export interface CompletionOptions {
  model: string;
  tools: readonly ToolDescriptor[];
  temperature: number;
  maxTokens?: number;
  toolChoice: ToolChoice;
}

export interface Completion {
  message: {
    content: string | null;
    toolCalls: ToolCall[];
  };
  finishReason: FinishReason;
  usage: TokenUsage;
}

export interface CompletionProvider {
  readonly name: string;
  /** Must not mutate its inputs; throws ProviderError on failure. */
  createCompletion(messages: readonly Message[], options: CompletionOptions): Promise<Completion>;
}

// ─── Agent ───

interface RunResultBase {
  messages: Message[];
  toolCalls: ToolCallRecord[];
  iterations: number;
  usage: TokenUsage;
}

export type RunResult =
  | (RunResultBase & { success: true; content: string })
  | (RunResultBase & { success: false; error: string; errorCode: ErrorCode });

export type AgentEvent =
  | { type: 'iteration'; agent: string; iteration: number }
  | { type: 'message'; agent: string; message: Message }
  | { type: 'toolCall'; agent: string; toolCall: ToolCall }
  | { type: 'toolResult'; agent: string; toolCallId: string; result: ToolExecutionResult }
  | { type: 'done'; agent: string; result: RunResult };

export type AgentEventType = AgentEvent['type'];

export interface AgentConfig {
  name: string;
  systemPrompt: string;
  provider: CompletionProvider;
  tools?: Tool[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
  maxIterations?: number;
  toolChoice?: ToolChoice;
  /** true caps tool output at 50 000 chars, a number sets the cap, false disables it. */
  truncateToolResults?: boolean | number;
  /** Clear the usage totals on reset(). Off by default: usage is agent-lifetime. */
  resetUsageOnReset?: boolean;
  logger?: Logger;
  onEvent?: (event: AgentEvent) => void;
}
