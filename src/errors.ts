/**
 * Base error for everything the SDK throws.
 */
export class GagiteckError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'GAGITECK_ERROR',
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'GagiteckError';
  }
}

export class ConfigError extends GagiteckError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends GagiteckError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class AuthenticationError extends GagiteckError {
  constructor(message: string) {
    super(message, 'AUTHENTICATION_ERROR');
    this.name = 'AuthenticationError';
  }
}

/**
 * Error returned by the Gagiteck REST API.
 * A status code of 0 means the request never got a response.
 */
export class ApiError extends GagiteckError {
  constructor(
    public readonly statusCode: number,
    public readonly detail: string,
    cause?: unknown
  ) {
    super(`API Error ${statusCode}: ${detail}`, 'API_ERROR', cause);
    this.name = 'ApiError';
  }
}

export class RateLimitError extends ApiError {
  constructor(
    detail: string,
    public readonly retryAfter: number = 60
  ) {
    super(429, detail);
    this.name = 'RateLimitError';
  }
}

/**
 * Network or authentication failure talking to a model endpoint.
 */
export class TransportError extends GagiteckError {
  public readonly timeout: boolean;

  constructor(message: string, options: { timeout?: boolean; cause?: unknown } = {}) {
    super(message, 'TRANSPORT_ERROR', options.cause);
    this.name = 'TransportError';
    this.timeout = options.timeout ?? false;
  }
}

/**
 * The model endpoint answered, but with an error (rate limit, bad request, outage).
 */
export class ProviderError extends GagiteckError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly statusCode?: number,
    public readonly retryAfter?: number,
    cause?: unknown
  ) {
    super(message, 'PROVIDER_ERROR', cause);
    this.name = 'ProviderError';
  }
}

export class DuplicateToolError extends GagiteckError {
  constructor(public readonly toolName: string) {
    super(`Tool "${toolName}" is already registered`, 'DUPLICATE_TOOL');
    this.name = 'DuplicateToolError';
  }
}

export class UnknownToolError extends GagiteckError {
  constructor(
    public readonly toolName: string,
    available: string[] = []
  ) {
    super(
      `Unknown tool "${toolName}". Available tools: ${available.length > 0 ? available.join(', ') : '(none)'}`,
      'UNKNOWN_TOOL'
    );
    this.name = 'UnknownToolError';
  }
}

export class ToolExecutionError extends GagiteckError {
  constructor(
    public readonly toolName: string,
    detail: string,
    cause?: unknown
  ) {
    super(`Tool '${toolName}' failed: ${detail}`, 'TOOL_EXECUTION_ERROR', cause);
    this.name = 'ToolExecutionError';
  }
}

export class MaxTurnsExceededError extends GagiteckError {
  constructor(public readonly maxTurns: number) {
    super(`Agent run exceeded ${maxTurns} turns without a final answer`, 'MAX_TURNS_EXCEEDED');
    this.name = 'MaxTurnsExceededError';
  }
}

/**
 * A model invocation failed during a run. The original failure is kept in `cause`.
 */
export class AgentRunError extends GagiteckError {
  constructor(
    public readonly agentName: string,
    public readonly turn: number,
    cause: unknown
  ) {
    super(
      `Agent '${agentName}' failed on turn ${turn}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'AGENT_RUN_ERROR',
      cause
    );
    this.name = 'AgentRunError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
