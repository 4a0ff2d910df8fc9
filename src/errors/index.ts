export type ErrorCode =
  | 'not_configured'
  | 'invalid_provider'
  | 'api_error'
  | 'network_error'
  | 'invalid_response'
  | 'invalid_tool'
  | 'invalid_callback'
  | 'invalid_arguments'
  | 'tool_error'
  | 'tool_loop_exceeded'
  | 'validation_error'
  | 'confirmation_expired';

export class AssistantError extends Error {
  constructor(message: string, public readonly code: ErrorCode, public readonly cause?: Error) {
    super(message);
    this.name = 'AssistantError';
  }
}

export class NotConfiguredError extends AssistantError {
  constructor(public readonly provider: string, message?: string) {
    super(message ?? `${provider} provider is not configured. Please add your API key.`, 'not_configured');
    this.name = 'NotConfiguredError';
  }
}

export class InvalidProviderError extends AssistantError {
  constructor(public readonly provider: string) {
    super(`Invalid AI provider: ${provider}`, 'invalid_provider');
    this.name = 'InvalidProviderError';
  }
}

export class ApiError extends AssistantError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly statusCode: number,
    public readonly rawBody: unknown
  ) {
    super(message, 'api_error');
    this.name = 'ApiError';
  }
}

export class NetworkError extends AssistantError {
  constructor(message: string, public readonly provider: string, cause?: Error) {
    super(message, 'network_error', cause);
    this.name = 'NetworkError';
  }
}

export class InvalidResponseError extends AssistantError {
  constructor(public readonly provider: string, public readonly rawBody?: unknown) {
    super(`Invalid response from ${provider} API.`, 'invalid_response');
    this.name = 'InvalidResponseError';
  }
}

export type ProviderError = NotConfiguredError | ApiError | NetworkError | InvalidResponseError;

export class InvalidToolError extends AssistantError {
  constructor(public readonly toolName: string) {
    super(`Tool "${toolName}" not found.`, 'invalid_tool');
    this.name = 'InvalidToolError';
  }
}

export class InvalidCallbackError extends AssistantError {
  constructor(public readonly toolName: string) {
    super(`Tool "${toolName}" has no valid callback.`, 'invalid_callback');
    this.name = 'InvalidCallbackError';
  }
}

export class InvalidArgumentsError extends AssistantError {
  constructor(public readonly toolName: string, message: string) {
    super(message, 'invalid_arguments');
    this.name = 'InvalidArgumentsError';
  }
}

export class ToolExecutionError extends AssistantError {
  constructor(public readonly toolName: string, message: string, cause?: Error) {
    super(message, 'tool_error', cause);
    this.name = 'ToolExecutionError';
  }
}

export type ToolError = InvalidToolError | InvalidCallbackError | InvalidArgumentsError | ToolExecutionError;

export class ToolLoopExceededError extends AssistantError {
  constructor(public readonly iterations: number) {
    super(`Tool loop did not finish after ${iterations} model calls.`, 'tool_loop_exceeded');
    this.name = 'ToolLoopExceededError';
  }
}

export class ValidationError extends AssistantError {
  constructor(message: string, public readonly field: string) {
    super(message, 'validation_error');
    this.name = 'ValidationError';
  }
}

export class ConfirmationExpiredError extends AssistantError {
  constructor() {
    super('This confirmation has expired. Please try again.', 'confirmation_expired');
    this.name = 'ConfirmationExpiredError';
  }
}
