// Core
export { Agent, DEFAULT_MAX_ITERATIONS, DEFAULT_MODEL, DEFAULT_TEMPERATURE, DEFAULT_TOOL_CHOICE } from './core/agent.js';
export { defineTool, ToolRegistry } from './core/tool.js';
export type { RegistryEntry, ToolOptions } from './core/tool.js';
export { generateToolDescriptor, parseArgumentDocs, toJsonSchema } from './core/schema.js';
export {
  DEFAULT_MAX_RESULT_LENGTH,
  decodeArguments,
  executeTool,
  formatToolResult,
  unknownToolResult,
} from './core/executor.js';
export type { ExecuteOptions } from './core/executor.js';
export { Conversation, UsageAccumulator, createMessage, emptyUsage } from './core/history.js';
export type { MessageInit } from './core/history.js';
export { EventBus } from './core/events.js';
export {
  AgentError,
  ConfigError,
  MaxIterationsError,
  ProviderError,
  SchemaError,
} from './core/errors.js';
export type { ErrorCode } from './core/errors.js';
export { loadConfig } from './core/config.js';
export type { RuntimeConfig } from './core/config.js';
export { createLogger, logger } from './core/logger.js';
export type { Logger } from './core/logger.js';
export type {
  AgentConfig,
  AgentEvent,
  AgentEventType,
  Completion,
  CompletionOptions,
  CompletionProvider,
  FinishReason,
  Message,
  ParameterDescriptor,
  ParameterKind,
  Role,
  RunResult,
  TokenUsage,
  Tool,
  ToolCall,
  ToolCallRecord,
  ToolChoice,
  ToolDescriptor,
  ToolExecutionResult,
} from './core/types.js';

// Providers
export * from './providers/index.js';

// Utilities
export {
  estimateTokens,
  extractHtml,
  extractJson,
  formatError,
  mergeToolResults,
  truncateForLogging,
} from './utils/text.js';
export type { MergedToolResults } from './utils/text.js';
