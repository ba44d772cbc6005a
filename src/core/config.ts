import { z } from 'zod';
import { ConfigError } from './errors.js';

const envSchema = z.object({
  TOOLLOOP_MODEL: z.string().min(1).default('gpt-4o'),
  TOOLLOOP_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  TOOLLOOP_MAX_TOKENS: z.coerce.number().int().positive().optional(),
  TOOLLOOP_MAX_ITERATIONS: z.coerce.number().int().positive().default(20),
  TOOLLOOP_TOOL_CHOICE: z.enum(['auto', 'required', 'none']).default('auto'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export interface RuntimeConfig {
  model: string;
  temperature: number;
  maxTokens?: number;
  maxIterations: number;
  toolChoice: 'auto' | 'required' | 'none';
  logLevel: Env['LOG_LEVEL'];
  openai: { apiKey?: string; baseUrl?: string };
  anthropic: { apiKey?: string };
}

/** Reads generation defaults and credentials from the environment. */
export function loadConfig(env: Record<string, string | undefined> = process.env): RuntimeConfig {
  // Empty strings count as unset.
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    model: e.TOOLLOOP_MODEL,
    temperature: e.TOOLLOOP_TEMPERATURE,
    maxTokens: e.TOOLLOOP_MAX_TOKENS,
    maxIterations: e.TOOLLOOP_MAX_ITERATIONS,
    toolChoice: e.TOOLLOOP_TOOL_CHOICE,
    logLevel: e.LOG_LEVEL,
    openai: { apiKey: e.OPENAI_API_KEY, baseUrl: e.OPENAI_BASE_URL },
    anthropic: { apiKey: e.ANTHROPIC_API_KEY },
  };
}

const agentSettingsSchema = z.object({
  maxIterations: z.number().int().nonnegative().optional(),
  maxTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  truncateToolResults: z.union([z.boolean(), z.number().int().nonnegative()]).optional(),
});

export type AgentSettings = z.input<typeof agentSettingsSchema>;

/** Rejects numeric agent settings the loop cannot honor. */
export function validateAgentSettings(settings: AgentSettings): void {
  const parsed = agentSettingsSchema.safeParse({
    maxIterations: settings.maxIterations,
    maxTokens: settings.maxTokens,
    temperature: settings.temperature,
    truncateToolResults: settings.truncateToolResults,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid agent configuration: ${issues}`);
  }
}
