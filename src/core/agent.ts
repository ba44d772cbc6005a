import { z } from 'zod';
import { validateAgentSettings } from './config.js';
import { AgentError, MaxIterationsError, ProviderError, errorMessage } from './errors.js';
import { EventBus } from './events.js';
import { DEFAULT_MAX_RESULT_LENGTH, decodeArguments, executeTool, unknownToolResult } from './executor.js';
import { Conversation, UsageAccumulator } from './history.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { ToolRegistry, defineTool } from './tool.js';
import type {
  AgentConfig,
  AgentEvent,
  AgentEventType,
  Completion,
  Message,
  RunResult,
  TokenUsage,
  Tool,
  ToolCall,
  ToolCallRecord,
  ToolChoice,
  ToolDescriptor,
  ToolExecutionResult,
} from './types.js';

export const DEFAULT_MODEL = 'gpt-4o';
export const DEFAULT_TEMPERATURE = 0;
export const DEFAULT_MAX_ITERATIONS = 20;
export const DEFAULT_TOOL_CHOICE: ToolChoice = 'auto';

interface RunState {
  iterations: number;
  toolCalls: ToolCallRecord[];
}

export class Agent {
  readonly name: string;
  readonly systemPrompt: string;
  private readonly config: AgentConfig;
  private readonly log: Logger;
  private readonly bus: EventBus<AgentEvent>;
  private registry: ToolRegistry;
  private conversation = new Conversation();
  private usage = new UsageAccumulator();

  constructor(config: AgentConfig) {
    this.name = config.name;
    this.systemPrompt = config.systemPrompt;
    // The iteration ceiling must be a finite integer for the loop to end.
    validateAgentSettings(config);
    this.config = config;
    this.log = (config.logger ?? rootLogger).child({ agent: config.name });
    this.bus = new EventBus<AgentEvent>((err, event) => {
      this.log.error({ err, event: event.type }, 'Event handler failed');
    });
    if (config.onEvent) this.bus.on('*', config.onEvent);
    // Throws SchemaError before the agent exists, so no half-built registry.
    this.registry = new ToolRegistry(config.tools ?? [], this.log);
  }

  get model(): string {
    return this.config.model ?? DEFAULT_MODEL;
  }

  get maxIterations(): number {
    return this.config.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  }

  on<K extends AgentEventType>(type: K, handler: (event: Extract<AgentEvent, { type: K }>) => void): () => void;
  on(type: '*', handler: (event: AgentEvent) => void): () => void;
  on(type: string, handler: (event: AgentEvent) => void): () => void {
    return this.bus.subscribe(type, handler);
  }

  async run(task: string): Promise<RunResult> {
    const state: RunState = { iterations: 0, toolCalls: [] };

    this.appendUser(task);

    try {
      for (;;) {
        state.iterations++;
        if (state.iterations > this.maxIterations) {
          state.iterations = this.maxIterations;
          this.log.warn({ maxIterations: this.maxIterations }, 'Max iterations reached');
          return this.finish(state, new MaxIterationsError(this.maxIterations));
        }

        this.log.info(`Iteration ${state.iterations}/${this.maxIterations}`);
        this.bus.emit({ type: 'iteration', agent: this.name, iteration: state.iterations });

        const completion = await this.requestCompletion();
        this.usage.add(completion.usage);

        const { content, toolCalls } = completion.message;
        this.append({ role: 'assistant', content, toolCalls });
        this.log.debug({ finishReason: completion.finishReason }, 'Completion received');

        if (toolCalls.length === 0) {
          this.log.info(`Completed in ${state.iterations} iterations`);
          return this.finish(state, content ?? '');
        }

        await this.dispatchToolCalls(toolCalls, state);
      }
    } catch (err) {
      this.log.error({ err }, 'Run failed');
      const error = err instanceof AgentError
        ? err
        : new ProviderError('unknown', errorMessage(err), { cause: err });
      return this.finish(state, error);
    }
  }

  reset(): void {
    this.conversation.clear();
    if (this.config.resetUsageOnReset) this.usage.reset();
    this.log.debug('Conversation history reset');
  }

  addUserMessage(content: string): void {
    this.appendUser(content);
  }

  getMessages(): Message[] {
    return this.conversation.getMessages();
  }

  getLastResponse(): string | undefined {
    const messages = this.conversation.getMessages();
    for (let i = messages.length - 1; i >= 0; i--) {
      const msg = messages[i];
      if (msg.role === 'assistant' && msg.content) return msg.content;
    }
    return undefined;
  }

  getUsage(): TokenUsage {
    return this.usage.snapshot();
  }

  getToolDescriptors(): readonly ToolDescriptor[] {
    return this.registry.descriptors();
  }

  /** Independent history and usage; configuration and tool registry are shared. */
  fork(): Agent {
    const forked = new Agent({ ...this.config, name: `${this.name}_fork`, tools: [] });
    forked.registry = this.registry;
    forked.conversation = this.conversation.clone();
    forked.usage = this.usage.clone();
    this.log.debug({ messages: this.conversation.length }, 'Created fork');
    return forked;
  }

  /**
   * Exposes this agent as a single-parameter tool. Each call runs on a fresh
   * fork, so nothing the sub-agent does reaches this agent's history.
   */
  asTool(description?: string): Tool {
    const summary = description ?? `Delegate a task to the ${this.name} agent: ${firstSentence(this.systemPrompt)}`;
    const toolName = this.name.toLowerCase().replace(/[^a-z0-9_-]+/g, '_');

    return defineTool(
      async ({ task }) => {
        this.log.info({ task: task.slice(0, 100) }, 'Invoked as tool');
        const result = await this.fork().run(task);
        if (!result.success) {
          throw new Error(`${this.name} agent failed: ${result.error}`);
        }
        return result.content;
      },
      {
        name: toolName,
        doc: `${summary}\n\nArguments:\n  task: The task or question to delegate to the ${this.name} agent`,
        parameters: z.object({ task: z.string() }),
      },
    );
  }

  private async requestCompletion(): Promise<Completion> {
    this.log.debug({ model: this.model, messages: this.conversation.length }, 'Calling provider');
    try {
      return await this.config.provider.createCompletion(this.conversation.getMessages(), {
        model: this.model,
        tools: this.registry.descriptors(),
        temperature: this.config.temperature ?? DEFAULT_TEMPERATURE,
        maxTokens: this.config.maxTokens,
        toolChoice: this.config.toolChoice ?? DEFAULT_TOOL_CHOICE,
      });
    } catch (err) {
      if (err instanceof ProviderError) throw err;
      throw new ProviderError(this.config.provider.name, errorMessage(err), { cause: err });
    }
  }

  private async dispatchToolCalls(toolCalls: readonly ToolCall[], state: RunState): Promise<void> {
    if (toolCalls.length > 1) {
      this.log.info({ tools: toolCalls.map((tc) => tc.name) }, `Executing ${toolCalls.length} tools in parallel`);
    }

    // Completion order is free; appending below follows request order.
    const results = await Promise.all(toolCalls.map((tc) => this.executeToolCall(tc)));

    toolCalls.forEach((tc, i) => {
      const result = results[i];
      state.toolCalls.push({
        tool: result.tool,
        arguments: result.arguments,
        success: result.success,
        ...(result.success ? { result: result.result } : { error: result.error }),
      });
      this.append({ role: 'tool', content: result.output, toolCallId: tc.id, name: tc.name });
      this.bus.emit({ type: 'toolResult', agent: this.name, toolCallId: tc.id, result });
    });
  }

  private async executeToolCall(tc: ToolCall): Promise<ToolExecutionResult> {
    this.bus.emit({ type: 'toolCall', agent: this.name, toolCall: tc });

    const entry = this.registry.resolve(tc.name);
    if (!entry) {
      this.log.error({ tool: tc.name }, 'Unknown tool');
      return unknownToolResult(tc.name, tc.arguments);
    }

    const decoded = decodeArguments(tc.arguments);
    this.log.info({ tool: tc.name, args: decoded.ok ? Object.keys(decoded.value) : [] }, 'Executing tool');

    const result = await executeTool(entry.tool, tc.arguments, { maxLength: this.maxResultLength() });
    if (result.success) {
      this.log.debug({ tool: tc.name }, 'Tool completed');
    } else {
      this.log.error({ tool: tc.name, error: result.error }, 'Tool failed');
    }
    return result;
  }

  private maxResultLength(): number | undefined {
    const setting = this.config.truncateToolResults ?? true;
    if (setting === false) return undefined;
    return setting === true ? DEFAULT_MAX_RESULT_LENGTH : setting;
  }

  /** The system turn always opens the history, whichever call adds the first user turn. */
  private appendUser(content: string): void {
    if (this.conversation.length === 0) {
      this.append({ role: 'system', content: this.systemPrompt });
    }
    this.append({ role: 'user', content });
  }

  private append(init: Parameters<Conversation['append']>[0]): Message {
    const message = this.conversation.append(init);
    this.bus.emit({ type: 'message', agent: this.name, message });
    return message;
  }

  private finish(state: RunState, outcome: string | AgentError): RunResult {
    const base = {
      messages: this.conversation.getMessages(),
      toolCalls: state.toolCalls,
      iterations: state.iterations,
      usage: this.usage.snapshot(),
    };
    const result: RunResult = typeof outcome === 'string'
      ? { ...base, success: true, content: outcome }
      : { ...base, success: false, error: outcome.message, errorCode: outcome.code };
    this.bus.emit({ type: 'done', agent: this.name, result });
    return result;
  }
}

function firstSentence(text: string): string {
  const sentence = text.split('.')[0].trim();
  return sentence ? `${sentence}.` : '';
}
