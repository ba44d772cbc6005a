import type { RuntimeConfig } from '../core/config.js';
import type { CompletionProvider } from '../core/types.js';
import { AnthropicProvider } from './anthropic.js';
import { OpenAIProvider } from './openai.js';

export { AnthropicProvider, toAnthropicMessages, toAnthropicRequest } from './anthropic.js';
export type { AnthropicProviderOptions, MessagesClient } from './anthropic.js';
export { OpenAIProvider, fromOpenAICompletion, toOpenAIRequest, toOpenAITool } from './openai.js';
export type { ChatCompletionsClient, OpenAIProviderOptions } from './openai.js';

export type ProviderKind = 'openai' | 'anthropic';

export function createProvider(kind: ProviderKind, config: RuntimeConfig): CompletionProvider {
  switch (kind) {
    case 'openai':
      return new OpenAIProvider({ apiKey: config.openai.apiKey, baseUrl: config.openai.baseUrl });
    case 'anthropic':
      return new AnthropicProvider({ apiKey: config.anthropic.apiKey });
  }
}
