export type ErrorCode =
  | 'SCHEMA_ERROR'
  | 'PROVIDER_ERROR'
  | 'MAX_ITERATIONS'
  | 'CONFIG_ERROR';

export class AgentError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AgentError';
    this.code = code;
  }
}

/** Tool cannot be described: missing doc, missing name, duplicate name. */
export class SchemaError extends AgentError {
  constructor(message: string) {
    super('SCHEMA_ERROR', message);
    this.name = 'SchemaError';
  }
}

export class ProviderError extends AgentError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super('PROVIDER_ERROR', message, options);
    this.name = 'ProviderError';
    this.provider = provider;
  }
}

export class MaxIterationsError extends AgentError {
  readonly maxIterations: number;

  constructor(maxIterations: number) {
    super('MAX_ITERATIONS', `Max iterations (${maxIterations}) reached`);
    this.name = 'MaxIterationsError';
    this.maxIterations = maxIterations;
  }
}

export class ConfigError extends AgentError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
