import Anthropic from '@anthropic-ai/sdk';
import { ProviderError, errorMessage } from '../core/errors.js';
import { decodeArguments } from '../core/executor.js';
import { toJsonSchema } from '../core/schema.js';
import type {
  Completion, CompletionOptions, CompletionProvider, FinishReason,
  Message, ToolCall, ToolChoice,
} from '../core/types.js';

type MessageParams = Anthropic.Messages.MessageCreateParamsNonStreaming;

export const DEFAULT_ANTHROPIC_MAX_TOKENS = 4096;

export interface MessagesClient {
  messages: {
    create(body: MessageParams): Promise<Anthropic.Messages.Message>;
  };
}

export interface AnthropicProviderOptions {
  apiKey?: string;
  baseUrl?: string;
  client?: MessagesClient;
}

export class AnthropicProvider implements CompletionProvider {
  readonly name = 'anthropic';
  private client: MessagesClient;

  constructor(options: AnthropicProviderOptions = {}) {
    this.client = options.client ?? new Anthropic({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
    });
  }

  async createCompletion(messages: readonly Message[], options: CompletionOptions): Promise<Completion> {
    const params = toAnthropicRequest(messages, options);

    let response: Anthropic.Messages.Message;
    try {
      response = await this.client.messages.create(params);
    } catch (err) {
      throw new ProviderError(this.name, `Anthropic request failed: ${errorMessage(err)}`, { cause: err });
    }

    let text = '';
    const toolCalls: ToolCall[] = [];
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      } else if (block.type === 'tool_use') {
        toolCalls.push({ id: block.id, name: block.name, arguments: JSON.stringify(block.input ?? {}) });
      }
    }

    const promptTokens = response.usage.input_tokens;
    const completionTokens = response.usage.output_tokens;
    return {
      message: { content: text || null, toolCalls },
      finishReason: mapStopReason(response.stop_reason),
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
    };
  }
}

export function toAnthropicRequest(messages: readonly Message[], options: CompletionOptions): MessageParams {
  const system = messages
    .filter((m) => m.role === 'system' && m.content)
    .map((m) => m.content)
    .join('\n\n');

  // tool_choice "none" sends no tools, unless the history already holds tool
  // blocks: the API then needs the definitions, and no tool_choice is sent.
  const historyUsesTools = messages.some((m) => m.role === 'tool' || Boolean(m.toolCalls?.length));
  const tools = options.toolChoice === 'none' && !historyUsesTools
    ? []
    : options.tools.map((t) => ({
        name: t.name,
        description: t.description,
        input_schema: toJsonSchema(t),
      }));

  return {
    model: options.model,
    max_tokens: options.maxTokens ?? DEFAULT_ANTHROPIC_MAX_TOKENS,
    messages: toAnthropicMessages(messages),
    temperature: options.temperature,
    ...(system ? { system } : {}),
    ...(tools.length ? { tools } : {}),
    ...(tools.length && options.toolChoice !== 'none' ? { tool_choice: mapToolChoice(options.toolChoice) } : {}),
  };
}

/** Tool turns become user turns of tool_result blocks; consecutive ones are merged. */
export function toAnthropicMessages(messages: readonly Message[]): Anthropic.Messages.MessageParam[] {
  const result: Anthropic.Messages.MessageParam[] = [];
  let pendingResults: Anthropic.Messages.ToolResultBlockParam[] = [];

  const flush = () => {
    if (pendingResults.length) {
      result.push({ role: 'user', content: pendingResults });
      pendingResults = [];
    }
  };

  for (const msg of messages) {
    if (msg.role === 'system') continue;

    if (msg.role === 'tool') {
      pendingResults.push({
        type: 'tool_result',
        tool_use_id: msg.toolCallId ?? '',
        content: msg.content ?? '',
      });
      continue;
    }
    flush();

    if (msg.role === 'assistant') {
      const blocks: Anthropic.Messages.ContentBlockParam[] = [];
      if (msg.content) blocks.push({ type: 'text', text: msg.content });
      for (const tc of msg.toolCalls ?? []) {
        const decoded = decodeArguments(tc.arguments);
        blocks.push({ type: 'tool_use', id: tc.id, name: tc.name, input: decoded.ok ? decoded.value : {} });
      }
      result.push({ role: 'assistant', content: blocks.length ? blocks : (msg.content ?? '') });
      continue;
    }

    result.push({ role: 'user', content: msg.content ?? '' });
  }
  flush();

  return result;
}

function mapToolChoice(choice: ToolChoice): Anthropic.Messages.ToolChoice {
  return choice === 'required' ? { type: 'any' } : { type: 'auto' };
}

function mapStopReason(reason: string | null): FinishReason {
  switch (reason) {
    case 'tool_use': return 'tool_calls';
    case 'max_tokens': return 'length';
    default: return 'stop';
  }
}
