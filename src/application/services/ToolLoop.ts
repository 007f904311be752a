import { ChatMessage, ToolCall } from '../../core/entities/Model.js';
import { IOllamaClient } from '../../core/interfaces/IOllamaClient.js';
import { ModelResponseError, ToolLoopExhaustedError } from '../../core/errors.js';
import { Logger, createLogger } from '../../utils/logger.js';
import { CapabilityRegistry } from './CapabilityRegistry.js';

export const DEFAULT_MAX_TOOL_ROUNDS = 15;

export type ToolLoopState =
  | { kind: 'awaiting_model'; round: number }
  | { kind: 'dispatching_tools'; round: number; calls: ToolCall[] }
  | { kind: 'done'; round: number; answer: string }
  | { kind: 'failed'; round: number; error: unknown };

export interface ToolLoopOptions {
  maxRounds?: number;
  logger?: Logger;
}

/**
 * Drives the model to a final text answer, executing the tool calls it asks
 * for in between. Every round sends the full history and the tool
 * declarations; a round that asks for tools appends the assistant tool-call
 * message and one tool message per call.
 */
export class ToolLoop {
  private readonly maxRounds: number;
  private readonly log: Logger;

  constructor(
    private readonly ollama: IOllamaClient,
    private readonly registry: CapabilityRegistry,
    private readonly model: string,
    options: ToolLoopOptions = {}
  ) {
    this.maxRounds = options.maxRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
    this.log = options.logger ?? createLogger('tool-loop');
  }

  /**
   * Run until the model answers without tool calls. `messages` is extended
   * in place with the tool exchange.
   */
  async run(messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
    let state: ToolLoopState = { kind: 'awaiting_model', round: 0 };

    while (state.kind !== 'done' && state.kind !== 'failed') {
      try {
        state = await this.step(state, messages, signal);
      } catch (error) {
        state = { kind: 'failed', round: state.round, error };
      }
    }

    if (state.kind === 'failed') {
      this.log.warn('tool_loop_failed', { round: state.round, error: state.error });
      throw state.error;
    }

    this.log.debug('tool_loop_done', { rounds: state.round });
    return state.answer;
  }

  private async step(
    state: ToolLoopState,
    messages: ChatMessage[],
    signal?: AbortSignal
  ): Promise<ToolLoopState> {
    switch (state.kind) {
      case 'awaiting_model':
        return this.awaitModel(state.round, messages, signal);
      case 'dispatching_tools':
        return this.dispatchTools(state.round, state.calls, messages, signal);
      default:
        return state;
    }
  }

  private async awaitModel(
    round: number,
    messages: ChatMessage[],
    signal?: AbortSignal
  ): Promise<ToolLoopState> {
    if (round >= this.maxRounds) {
      throw new ToolLoopExhaustedError(round);
    }
    signal?.throwIfAborted();

    const completion = await this.ollama.chat(this.model, messages, {
      tools: this.registry.declarations(),
      signal,
    });

    const choice = completion.choices[0];
    if (!choice) {
      throw new ModelResponseError('no choices returned by model');
    }

    const { content, toolCalls } = choice.message;
    if (toolCalls.length === 0) {
      return { kind: 'done', round: round + 1, answer: content };
    }

    this.log.debug('tool_calls_requested', {
      round: round + 1,
      tools: toolCalls.map((call) => call.function.name),
    });

    messages.push({ role: 'assistant', content, tool_calls: toolCalls });
    return { kind: 'dispatching_tools', round: round + 1, calls: toolCalls };
  }

  private async dispatchTools(
    round: number,
    calls: ToolCall[],
    messages: ChatMessage[],
    signal?: AbortSignal
  ): Promise<ToolLoopState> {
    for (const call of calls) {
      const result = await this.registry.invoke(call, signal);
      messages.push({
        role: 'tool',
        content: result.content,
        tool_call_id: result.callId,
        tool_name: result.toolName,
      });
    }

    return { kind: 'awaiting_model', round };
  }
}
