/**
 * Tests for conversation turns: concurrency, deadlines and failure policy
 */

import { ConversationService, ConversationServiceOptions } from '../src/application/services/ConversationService.js';
import { IAssistant } from '../src/application/services/AssistantService.js';
import { TitleCache } from '../src/application/services/TitleCache.js';
import { Conversation, DEFAULT_CONVERSATION_TITLE } from '../src/core/entities/Conversation.js';
import {
  ChatError,
  DeadlineExceededError,
  NotFoundError,
  TurnFailedError,
  ValidationError,
} from '../src/core/errors.js';
import { InMemoryConversationRepository, captureLogs, delay } from './helpers.js';

type AssistantMock = jest.Mock<Promise<string>, [Conversation, AbortSignal | undefined]>;

/**
 * Resolves after `ms`, or rejects with the abort reason first
 */
function sleepUnlessAborted(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(signal.reason);
      },
      { once: true }
    );
  });
}

describe('ConversationService', () => {
  let repository: InMemoryConversationRepository;
  let title: AssistantMock;
  let reply: AssistantMock;
  let logs: Array<Record<string, unknown>>;

  const createService = (options: Partial<ConversationServiceOptions> = {}) => {
    const assistant: IAssistant = { title, reply };
    return new ConversationService(repository, assistant, new TitleCache(100), {
      titleModel: 'test-model',
      titlePromptVersion: 'v1',
      ...options,
    });
  };

  beforeEach(() => {
    logs = captureLogs();
    repository = new InMemoryConversationRepository();
    title = jest.fn<Promise<string>, [Conversation, AbortSignal | undefined]>();
    reply = jest.fn<Promise<string>, [Conversation, AbortSignal | undefined]>();
  });

  describe('startConversation', () => {
    it('should return the generated title and reply and store both messages', async () => {
      title.mockResolvedValue('Weather in Barcelona');
      reply.mockResolvedValue("It's sunny!");

      const result = await createService().startConversation({
        message: 'What is the weather like in Barcelona?',
      });

      expect(result.title).toBe('Weather in Barcelona');
      expect(result.reply).toBe("It's sunny!");

      const stored = await repository.describe(result.conversationId);
      expect(stored?.title).toBe('Weather in Barcelona');
      expect(stored?.messages.map((msg) => [msg.role, msg.content])).toEqual([
        ['user', 'What is the weather like in Barcelona?'],
        ['assistant', "It's sunny!"],
      ]);
    });

    it('should keep the default title when title generation fails', async () => {
      title.mockRejectedValue(new Error('title model unavailable'));
      reply.mockResolvedValue('ok');

      const result = await createService().startConversation({ message: 'hello' });

      expect(result.title).toBe(DEFAULT_CONVERSATION_TITLE);
      expect(result.reply).toBe('ok');
      expect(logs.find((log) => log.event === 'title_generation_failed')).toMatchObject({
        level: 'warn',
        error: { name: 'Error', message: 'title model unavailable' },
      });
    });

    it('should keep the default title when the model returns an empty title', async () => {
      title.mockResolvedValue('   ');
      reply.mockResolvedValue('ok');

      const result = await createService().startConversation({ message: 'hello' });
      expect(result.title).toBe(DEFAULT_CONVERSATION_TITLE);
    });

    it('should generate title and reply concurrently', async () => {
      title.mockImplementation(async () => {
        await delay(150);
        return 'Parallel title';
      });
      reply.mockImplementation(async () => {
        await delay(150);
        return 'Parallel reply';
      });

      const started = Date.now();
      const result = await createService().startConversation({ message: 'how fast?' });
      const elapsed = Date.now() - started;

      expect(result).toMatchObject({ title: 'Parallel title', reply: 'Parallel reply' });
      expect(elapsed).toBeLessThan(280);
    });

    it('should store the user message before generation starts', async () => {
      let storedDuringReply: string[] = [];
      title.mockResolvedValue('Title');
      reply.mockImplementation(async (conversation) => {
        const stored = await repository.describe(conversation.id);
        storedDuringReply = stored?.messages.map((msg) => msg.content) ?? [];
        return 'reply';
      });

      await createService().startConversation({ message: 'persist me first' });
      expect(storedDuringReply).toEqual(['persist me first']);
    });

    it('should fail the turn and cancel the title when the reply fails', async () => {
      let titleSignal: AbortSignal | undefined;
      title.mockImplementation(async (_conversation, signal) => {
        titleSignal = signal;
        await sleepUnlessAborted(5_000, signal);
        return 'never';
      });
      reply.mockImplementation(async () => {
        await delay(20);
        throw new Error('model down');
      });

      const turn = createService().startConversation({ message: 'hello' });
      await expect(turn).rejects.toBeInstanceOf(TurnFailedError);
      await expect(turn).rejects.toThrow('failed to generate reply: model down');
      expect(titleSignal?.aborted).toBe(true);

      // Only the user message was written
      const [summary] = await repository.list();
      expect(summary.messageCount).toBe(1);
    });

    it('should fail with deadline_exceeded when the reply outlives the turn deadline', async () => {
      title.mockResolvedValue('Title');
      reply.mockImplementation(async (_conversation, signal) => {
        await sleepUnlessAborted(5_000, signal);
        return 'too late';
      });

      const turn = createService({ turnTimeoutMs: 50 }).startConversation({ message: 'slow' });
      await expect(turn).rejects.toMatchObject({ code: 'deadline_exceeded' });
      await expect(turn).rejects.toHaveProperty('cause', expect.any(DeadlineExceededError));
    });

    it('should bound the title by the remaining turn time minus the safety margin', async () => {
      title.mockImplementation(async (_conversation, signal) => {
        await sleepUnlessAborted(5_000, signal);
        return 'never';
      });
      reply.mockImplementation(async () => {
        await delay(700);
        return 'reply within the deadline';
      });

      const result = await createService({
        turnTimeoutMs: 1_000,
        titleTimeoutMs: 15_000,
        titleSafetyMarginMs: 500,
      }).startConversation({ message: 'budget' });

      expect(result).toMatchObject({ title: DEFAULT_CONVERSATION_TITLE, reply: 'reply within the deadline' });
      const failure = logs.find((log) => log.event === 'title_generation_failed');
      expect(failure?.budget_ms).toBeLessThanOrEqual(500);
      expect(failure?.budget_ms).toBeGreaterThan(400);
      expect(failure?.error).toMatchObject({ name: 'DeadlineExceededError' });
    });

    it('should reuse a cached title for the same first message', async () => {
      title.mockResolvedValue('Greetings');
      reply.mockResolvedValue('hi');
      const service = createService();

      const first = await service.startConversation({ message: 'Hello there' });
      const second = await service.startConversation({ message: '  hello   THERE ' });

      expect(second.title).toBe(first.title);
      expect(title).toHaveBeenCalledTimes(1);
      expect(service.getTitleCacheStats()).toMatchObject({ hits: 1, misses: 1 });
    });

    it('should still return the reply when the final write fails', async () => {
      title.mockResolvedValue('Title');
      reply.mockResolvedValue('reply');
      repository.failUpdate = new Error('disk full');
      const onConversationUpdated = jest.fn();

      const result = await createService({ onConversationUpdated }).startConversation({ message: 'hello' });

      expect(result.reply).toBe('reply');
      expect(onConversationUpdated).not.toHaveBeenCalled();
      expect(logs.find((log) => log.event === 'conversation_update_failed')).toMatchObject({
        level: 'error',
        conversation_id: result.conversationId,
      });
    });

    it('should not generate anything when the conversation cannot be stored', async () => {
      repository.failCreate = new Error('disk full');

      const turn = createService().startConversation({ message: 'hello' });
      await expect(turn).rejects.toBeInstanceOf(ChatError);
      await expect(turn).rejects.toThrow('failed to store conversation: disk full');
      expect(title).not.toHaveBeenCalled();
      expect(reply).not.toHaveBeenCalled();
    });

    it('should reject a blank message', async () => {
      const turn = createService().startConversation({ message: '   ' });
      await expect(turn).rejects.toBeInstanceOf(ValidationError);
      await expect(turn).rejects.toThrow('message is required');
    });

    it('should notify after the turn is stored', async () => {
      title.mockResolvedValue('Title');
      reply.mockResolvedValue('reply');
      const onConversationUpdated = jest.fn();

      const result = await createService({ onConversationUpdated }).startConversation({ message: 'hello' });

      expect(onConversationUpdated).toHaveBeenCalledTimes(1);
      expect(onConversationUpdated.mock.calls[0][0]).toMatchObject({ id: result.conversationId, title: 'Title' });
    });
  });

  describe('continueConversation', () => {
    it('should append the user message and the reply in order', async () => {
      title.mockResolvedValue('Trip');
      reply.mockResolvedValueOnce('Where to?').mockResolvedValueOnce('Barcelona is lovely');
      const service = createService();

      const { conversationId } = await service.startConversation({ message: 'Plan a trip' });
      const result = await service.continueConversation({ conversationId, message: 'Barcelona' });

      expect(result).toEqual({ reply: 'Barcelona is lovely' });
      expect(title).toHaveBeenCalledTimes(1);

      const stored = await service.describeConversation(conversationId);
      expect(stored.messages.map((msg) => [msg.role, msg.content])).toEqual([
        ['user', 'Plan a trip'],
        ['assistant', 'Where to?'],
        ['user', 'Barcelona'],
        ['assistant', 'Barcelona is lovely'],
      ]);
      expect(stored.title).toBe('Trip');
    });

    it('should send the full history to the assistant', async () => {
      title.mockResolvedValue('Trip');
      reply.mockResolvedValue('ok');
      const service = createService();

      const { conversationId } = await service.startConversation({ message: 'first' });
      await service.continueConversation({ conversationId, message: 'second' });

      const history = reply.mock.calls[1][0].messages.map((msg) => msg.content);
      expect(history).toEqual(['first', 'ok', 'second']);
    });

    it('should fail for an unknown conversation', async () => {
      const turn = createService().continueConversation({ conversationId: 'missing', message: 'hi' });
      await expect(turn).rejects.toBeInstanceOf(NotFoundError);
      await expect(turn).rejects.toThrow('conversation missing not found');
    });

    it('should validate its arguments', async () => {
      const service = createService();
      await expect(service.continueConversation({ conversationId: '', message: 'hi' })).rejects.toThrow(
        'conversation_id is required'
      );
      await expect(service.continueConversation({ conversationId: 'x', message: '' })).rejects.toThrow(
        'message is required'
      );
    });

    it('should keep the user message when the reply fails', async () => {
      title.mockResolvedValue('Title');
      reply.mockResolvedValueOnce('first reply').mockRejectedValueOnce(new Error('model down'));
      const service = createService();

      const { conversationId } = await service.startConversation({ message: 'one' });
      await expect(service.continueConversation({ conversationId, message: 'two' })).rejects.toBeInstanceOf(
        TurnFailedError
      );

      const stored = await service.describeConversation(conversationId);
      expect(stored.messages.map((msg) => msg.content)).toEqual(['one', 'first reply', 'two']);
    });
  });

  describe('listConversations and describeConversation', () => {
    it('should list summaries and describe by id', async () => {
      title.mockResolvedValue('Listed');
      reply.mockResolvedValue('reply');
      const service = createService();

      const { conversationId } = await service.startConversation({ message: 'hello' });

      const summaries = await service.listConversations();
      expect(summaries).toHaveLength(1);
      expect(summaries[0]).toMatchObject({ id: conversationId, title: 'Listed', messageCount: 2 });

      await expect(service.describeConversation('nope')).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
