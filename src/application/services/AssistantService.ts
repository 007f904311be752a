import { Conversation } from '../../core/entities/Conversation.js';
import { IOllamaClient } from '../../core/interfaces/IOllamaClient.js';
import { ModelResponseError } from '../../core/errors.js';
import {
  EMPTY_CONVERSATION_TITLE,
  PromptTemplate,
  ReplyTemplate,
  TitleTemplate,
  VersionedPromptTemplate,
} from '../../core/templates/index.js';
import { ToolLoop } from './ToolLoop.js';

export interface IAssistant {
  title(conversation: Conversation, signal?: AbortSignal): Promise<string>;
  reply(conversation: Conversation, signal?: AbortSignal): Promise<string>;
}

/**
 * Model-backed assistant: one plain model call for titles, the tool loop
 * for replies
 */
export class AssistantService implements IAssistant {
  constructor(
    private readonly ollama: IOllamaClient,
    private readonly model: string,
    private readonly toolLoop: ToolLoop,
    private readonly titleTemplate: VersionedPromptTemplate = new TitleTemplate(),
    private readonly replyTemplate: PromptTemplate = new ReplyTemplate()
  ) {}

  async title(conversation: Conversation, signal?: AbortSignal): Promise<string> {
    if (conversation.messages.length === 0) {
      return EMPTY_CONVERSATION_TITLE;
    }

    const completion = await this.ollama.chat(
      this.model,
      this.titleTemplate.formatMessages(conversation.messages),
      { signal }
    );

    const choice = completion.choices[0];
    if (!choice) {
      throw new ModelResponseError('no choices returned by model');
    }
    return choice.message.content;
  }

  async reply(conversation: Conversation, signal?: AbortSignal): Promise<string> {
    if (conversation.messages.length === 0) {
      throw new ModelResponseError('cannot reply to an empty conversation');
    }

    const history = this.replyTemplate.formatMessages(conversation.messages);
    return this.toolLoop.run(history, signal);
  }

  getModel(): string {
    return this.model;
  }

  getTitlePromptVersion(): string {
    return this.titleTemplate.getVersion();
  }
}
