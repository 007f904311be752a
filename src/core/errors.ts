/**
 * Error taxonomy for the chat service.
 * `code` is what the transports map to HTTP statuses and MCP error results.
 */
export type ChatErrorCode =
  | 'invalid_argument'
  | 'not_found'
  | 'deadline_exceeded'
  | 'internal';

export class ChatError extends Error {
  constructor(
    message: string,
    public readonly code: ChatErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends ChatError {
  constructor(public readonly argument: string, message = `${argument} is required`) {
    super(message, 'invalid_argument');
  }
}

export class NotFoundError extends ChatError {
  constructor(message: string) {
    super(message, 'not_found');
  }
}

export class DeadlineExceededError extends ChatError {
  constructor(message = 'deadline exceeded') {
    super(message, 'deadline_exceeded');
  }
}

export class UnknownToolError extends ChatError {
  constructor(public readonly toolName: string) {
    super(`unknown tool call: ${toolName}`, 'internal');
  }
}

export class ToolLoopExhaustedError extends ChatError {
  constructor(public readonly rounds: number) {
    super('too many tool calls, unable to generate reply', 'internal');
  }
}

export class ModelResponseError extends ChatError {
  constructor(message: string) {
    super(message, 'internal');
  }
}

/**
 * Single opaque failure surfaced to the caller when the reply path fails.
 */
export class TurnFailedError extends ChatError {
  constructor(cause: unknown) {
    super(
      `failed to generate reply: ${cause instanceof Error ? cause.message : String(cause)}`,
      cause instanceof DeadlineExceededError ? 'deadline_exceeded' : 'internal',
      { cause }
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
