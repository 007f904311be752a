import fetch from 'node-fetch';
import { IOllamaClient } from '../../core/interfaces/IOllamaClient.js';
import {
  ChatCompletion,
  ChatMessage,
  ChatOptions,
  ModelChoice,
  OllamaChatResponse,
} from '../../core/entities/Model.js';
import {
  withRetry,
  CircuitBreaker,
  DEFAULT_RETRY_CONFIG,
  RetryConfig,
  isRetryableError,
} from '../../utils/retry.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('ollama');

/**
 * Ollama API client for non-streaming /api/chat calls.
 * Every call is wrapped in the circuit breaker and retried with backoff;
 * the caller's abort signal reaches the HTTP request.
 */
export class OllamaApiClient implements IOllamaClient {
  private circuitBreaker: CircuitBreaker;
  private retryConfig: RetryConfig;

  constructor(
    private apiUrl: string,
    circuitBreaker?: CircuitBreaker,
    retryConfig?: RetryConfig
  ) {
    this.circuitBreaker = circuitBreaker ?? new CircuitBreaker(5, 60000);
    this.retryConfig = retryConfig ?? DEFAULT_RETRY_CONFIG;
  }

  async chat(model: string, messages: ChatMessage[], options: ChatOptions = {}): Promise<ChatCompletion> {
    const { tools, signal } = options;

    // A cancelled call says nothing about the provider's health
    const countsAsFailure = () => !signal?.aborted;

    const data = await this.circuitBreaker.execute(
      () =>
        withRetry(
          async () => {
            const res = await fetch(`${this.apiUrl}/api/chat`, {
              method: 'POST',
              headers: {
                'Content-Type': 'application/json',
              },
              body: JSON.stringify({
                model,
                messages,
                tools: tools && tools.length > 0 ? tools : undefined,
                stream: false,
                options: {
                  temperature: 0.7,
                  num_ctx: 8192,
                },
                keep_alive: '10m',
              }),
              signal,
            });

            if (!res.ok) {
              const body = await res.text();
              throw new Error(`HTTP error! status: ${res.status} ${body}`.trim());
            }

            return (await res.json()) as OllamaChatResponse;
          },
          this.retryConfig,
          {
            signal,
            shouldRetry: isRetryableError,
            onLog: (entry) => {
              if (!entry.success) {
                log.warn('chat_attempt_failed', {
                  model,
                  attempt: entry.attempt,
                  error: entry.error,
                  next_retry_in_ms: entry.nextRetryInMs,
                });
              }
            },
          }
        ),
      countsAsFailure
    );

    return toCompletion(data);
  }

  async listModels(): Promise<{ models: Array<{ name: string }> }> {
    const response = await withRetry(
      async () => {
        const res = await fetch(`${this.apiUrl}/api/tags`, {
          method: 'GET',
          headers: { 'Content-Type': 'application/json' },
        });
        if (!res.ok) throw new Error(`HTTP error! status: ${res.status}`);
        return res;
      },
      { ...this.retryConfig, maxAttempts: 2 },
      { shouldRetry: isRetryableError }
    );

    const data = (await response.json()) as { models?: Array<{ name: string }> };
    return { models: data.models ?? [] };
  }
}

/**
 * Map the Ollama response onto provider-neutral choices.
 * A response without a message has zero choices.
 */
export function toCompletion(data: OllamaChatResponse): ChatCompletion {
  if (!data.message) {
    return { model: data.model, choices: [] };
  }

  const choice: ModelChoice = {
    message: {
      content: data.message.content ?? '',
      toolCalls: (data.message.tool_calls ?? []).map((call, index) => ({
        id: call.id ?? `call_${index}`,
        function: {
          name: call.function.name,
          arguments: call.function.arguments ?? {},
        },
      })),
    },
    finishReason: data.done_reason,
  };

  return { model: data.model, choices: [choice] };
}
