import { randomUUID } from 'crypto';
import { IConversationRepository } from '../../core/interfaces/IConversationRepository.js';
import {
  Conversation,
  ConversationSummary,
  DEFAULT_CONVERSATION_TITLE,
  Message,
  MessageRole,
} from '../../core/entities/Conversation.js';
import { IClock, systemClock } from '../../core/interfaces/ICapabilities.js';
import { ChatError, NotFoundError, TurnFailedError, ValidationError, errorMessage } from '../../core/errors.js';
import { DeadlineScope, adaptiveBudget } from '../../utils/deadline.js';
import { Logger, createLogger } from '../../utils/logger.js';
import { IAssistant } from './AssistantService.js';
import { TitleCache, makeTitleKey } from './TitleCache.js';

export interface StartConversationRequest {
  message: string;
}

export interface StartConversationResult {
  conversationId: string;
  title: string;
  reply: string;
}

export interface ContinueConversationRequest {
  conversationId: string;
  message: string;
}

export interface ContinueConversationResult {
  reply: string;
}

export interface ConversationServiceOptions {
  /** Model name and prompt version that make up the title cache key */
  titleModel: string;
  titlePromptVersion: string;
  turnTimeoutMs?: number;
  titleTimeoutMs?: number;
  titleSafetyMarginMs?: number;
  clock?: IClock;
  newId?: () => string;
  logger?: Logger;
  /** Called after a turn has been written, e.g. to notify WebSocket clients */
  onConversationUpdated?: (conversation: Conversation) => void;
}

export const DEFAULT_TURN_TIMEOUT_MS = 30_000;
export const DEFAULT_TITLE_TIMEOUT_MS = 15_000;
export const DEFAULT_TITLE_SAFETY_MARGIN_MS = 500;

/**
 * Service for conversation turns.
 *
 * A new conversation generates its title and its reply at the same time
 * under one deadline. A failed reply fails the turn and cancels the title;
 * a failed title only leaves the default title in place.
 */
export class ConversationService {
  private readonly turnTimeoutMs: number;
  private readonly titleTimeoutMs: number;
  private readonly titleSafetyMarginMs: number;
  private readonly clock: IClock;
  private readonly newId: () => string;
  private readonly log: Logger;

  constructor(
    private readonly repository: IConversationRepository,
    private readonly assistant: IAssistant,
    private readonly titleCache: TitleCache,
    private readonly options: ConversationServiceOptions
  ) {
    this.turnTimeoutMs = options.turnTimeoutMs ?? DEFAULT_TURN_TIMEOUT_MS;
    this.titleTimeoutMs = options.titleTimeoutMs ?? DEFAULT_TITLE_TIMEOUT_MS;
    this.titleSafetyMarginMs = options.titleSafetyMarginMs ?? DEFAULT_TITLE_SAFETY_MARGIN_MS;
    this.clock = options.clock ?? systemClock;
    this.newId = options.newId ?? randomUUID;
    this.log = options.logger ?? createLogger('conversations');
  }

  async startConversation(
    request: StartConversationRequest,
    signal?: AbortSignal
  ): Promise<StartConversationResult> {
    const content = requireText('message', request.message);
    signal?.throwIfAborted();

    const now = this.clock.now();
    const conversation: Conversation = {
      id: this.newId(),
      title: DEFAULT_CONVERSATION_TITLE,
      messages: [this.newMessage('user', content)],
      createdAt: now,
      updatedAt: now,
    };

    // The user message is durable before any generation starts
    try {
      await this.repository.create(conversation, signal);
    } catch (error) {
      throw new ChatError(`failed to store conversation: ${errorMessage(error)}`, 'internal', {
        cause: error,
      });
    }

    this.log.info('conversation_started', { conversation_id: conversation.id });

    const [title, reply] = await this.withTurnScope(signal, (scope) => {
      const snapshot = snapshotOf(conversation);
      return Promise.all([this.generateTitle(snapshot, scope), this.generateReply(snapshot, scope)]);
    });

    conversation.messages.push(this.newMessage('assistant', reply));
    if (title.trim() !== '') {
      conversation.title = title;
    }
    conversation.updatedAt = this.clock.now();
    await this.persistTurn(conversation);

    return { conversationId: conversation.id, title: conversation.title, reply };
  }

  async continueConversation(
    request: ContinueConversationRequest,
    signal?: AbortSignal
  ): Promise<ContinueConversationResult> {
    const conversationId = requireText('conversation_id', request.conversationId);
    const content = requireText('message', request.message);

    const conversation = await this.repository.describe(conversationId, signal);
    if (!conversation) {
      throw new NotFoundError(`conversation ${conversationId} not found`);
    }

    const userMessage = this.newMessage('user', content);
    try {
      await this.repository.appendMessage(conversation.id, userMessage, signal);
    } catch (error) {
      throw new ChatError(`failed to store message: ${errorMessage(error)}`, 'internal', { cause: error });
    }
    conversation.messages.push(userMessage);

    const reply = await this.withTurnScope(signal, (scope) =>
      this.generateReply(snapshotOf(conversation), scope)
    );

    conversation.messages.push(this.newMessage('assistant', reply));
    conversation.updatedAt = this.clock.now();
    await this.persistTurn(conversation);

    return { reply };
  }

  async listConversations(signal?: AbortSignal): Promise<ConversationSummary[]> {
    return this.repository.list(signal);
  }

  async describeConversation(conversationId: string, signal?: AbortSignal): Promise<Conversation> {
    const id = requireText('conversation_id', conversationId);
    const conversation = await this.repository.describe(id, signal);
    if (!conversation) {
      throw new NotFoundError(`conversation ${id} not found`);
    }
    return conversation;
  }

  getTitleCacheStats() {
    return this.titleCache.stats();
  }

  /**
   * Run `work` under a fresh turn deadline that also follows the caller's signal
   */
  private async withTurnScope<T>(
    signal: AbortSignal | undefined,
    work: (scope: DeadlineScope) => Promise<T>
  ): Promise<T> {
    signal?.throwIfAborted();
    const scope = new DeadlineScope(this.turnTimeoutMs);
    const onCallerAbort = () => scope.abort(signal?.reason);
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      return await work(scope);
    } finally {
      signal?.removeEventListener('abort', onCallerAbort);
      scope.dispose();
    }
  }

  /**
   * Never rejects: a failed, timed out or cancelled title resolves to ''
   */
  private async generateTitle(conversation: Conversation, turn: DeadlineScope): Promise<string> {
    const budget = adaptiveBudget(turn.remainingMs(), this.titleTimeoutMs, this.titleSafetyMarginMs);
    const scope = turn.child(budget);
    const firstMessage = conversation.messages[0]?.content ?? '';
    const key = makeTitleKey(firstMessage, this.options.titleModel, this.options.titlePromptVersion);

    try {
      const title = await scope.run((signal) =>
        this.titleCache.getOrCompute(key, () => this.assistant.title(conversation, signal))
      );
      if (title.trim() === '') {
        this.log.warn('title_empty', { conversation_id: conversation.id });
      }
      return title;
    } catch (error) {
      this.log.warn('title_generation_failed', {
        conversation_id: conversation.id,
        budget_ms: budget,
        error,
      });
      return '';
    } finally {
      scope.dispose();
    }
  }

  /**
   * A failed reply aborts the whole turn scope before surfacing
   */
  private async generateReply(conversation: Conversation, turn: DeadlineScope): Promise<string> {
    try {
      return await turn.run((signal) => this.assistant.reply(conversation, signal));
    } catch (error) {
      turn.abort(error);
      this.log.error('reply_generation_failed', { conversation_id: conversation.id, error });
      throw new TurnFailedError(error);
    }
  }

  private async persistTurn(conversation: Conversation): Promise<void> {
    try {
      await this.repository.update(conversation);
    } catch (error) {
      this.log.error('conversation_update_failed', { conversation_id: conversation.id, error });
      return;
    }
    this.options.onConversationUpdated?.(conversation);
  }

  private newMessage(role: MessageRole, content: string): Message {
    const now = this.clock.now();
    return { id: this.newId(), role, content, createdAt: now, updatedAt: now };
  }
}

function requireText(argument: string, value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(argument);
  }
  return value;
}

function snapshotOf(conversation: Conversation): Conversation {
  return { ...conversation, messages: [...conversation.messages] };
}
