import OpenAI from 'openai';
import { ProviderError, errorMessage } from '../core/errors.js';
import { toJsonSchema } from '../core/schema.js';
import type {
  Completion, CompletionOptions, CompletionProvider, FinishReason,
  Message, ToolCall, ToolDescriptor,
} from '../core/types.js';

type ChatParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;
type ChatCompletion = OpenAI.Chat.Completions.ChatCompletion;

/** The slice of the SDK client this provider calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatParams): Promise<ChatCompletion>;
    };
  };
}

export interface OpenAIProviderOptions {
  apiKey?: string;
  baseUrl?: string;
  client?: ChatCompletionsClient;
}

export class OpenAIProvider implements CompletionProvider {
  readonly name = 'openai';
  private client: ChatCompletionsClient;

  constructor(options: OpenAIProviderOptions = {}) {
    this.client = options.client ?? new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
    });
  }

  async createCompletion(messages: readonly Message[], options: CompletionOptions): Promise<Completion> {
    const params = toOpenAIRequest(messages, options);

    let response: ChatCompletion;
    try {
      response = await this.client.chat.completions.create(params);
    } catch (err) {
      throw new ProviderError(this.name, `OpenAI request failed: ${errorMessage(err)}`, { cause: err });
    }
    return fromOpenAICompletion(response);
  }
}

export function toOpenAIRequest(messages: readonly Message[], options: CompletionOptions): ChatParams {
  const tools = options.tools.map(toOpenAITool);
  return {
    model: options.model,
    messages: messages.map(toOpenAIMessage),
    temperature: options.temperature,
    ...(options.maxTokens != null ? { max_tokens: options.maxTokens } : {}),
    ...(tools.length ? { tools, tool_choice: options.toolChoice } : {}),
  };
}

export function toOpenAITool(descriptor: ToolDescriptor): OpenAI.Chat.Completions.ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: descriptor.name,
      description: descriptor.description,
      parameters: toJsonSchema(descriptor),
    },
  };
}

function toOpenAIMessage(msg: Message): OpenAI.Chat.Completions.ChatCompletionMessageParam {
  switch (msg.role) {
    case 'system':
      return { role: 'system', content: msg.content ?? '' };
    case 'user':
      return { role: 'user', content: msg.content ?? '' };
    case 'tool':
      return { role: 'tool', content: msg.content ?? '', tool_call_id: msg.toolCallId ?? '' };
    case 'assistant':
      return {
        role: 'assistant',
        content: msg.content,
        ...(msg.toolCalls?.length
          ? {
              tool_calls: msg.toolCalls.map((tc) => ({
                id: tc.id,
                type: 'function' as const,
                function: { name: tc.name, arguments: tc.arguments },
              })),
            }
          : {}),
      };
  }
}

export function fromOpenAICompletion(response: ChatCompletion): Completion {
  const choice = response.choices[0];
  if (!choice) {
    throw new ProviderError('openai', 'OpenAI response contained no choices');
  }

  const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map((tc) => ({
    id: tc.id,
    name: tc.function.name,
    arguments: tc.function.arguments,
  }));

  const promptTokens = response.usage?.prompt_tokens ?? 0;
  const completionTokens = response.usage?.completion_tokens ?? 0;

  return {
    message: { content: choice.message.content, toolCalls },
    finishReason: mapFinishReason(choice.finish_reason),
    usage: {
      promptTokens,
      completionTokens,
      totalTokens: response.usage?.total_tokens ?? promptTokens + completionTokens,
    },
  };
}

function mapFinishReason(reason: string): FinishReason {
  switch (reason) {
    case 'tool_calls':
    case 'function_call':
      return 'tool_calls';
    case 'length': return 'length';
    case 'content_filter': return 'content_filter';
    default: return 'stop';
  }
}
