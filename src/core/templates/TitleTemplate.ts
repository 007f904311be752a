import { Message } from '../entities/Conversation.js';
import { ChatMessage } from '../entities/Model.js';
import { VersionedPromptTemplate } from './types.js';

export const EMPTY_CONVERSATION_TITLE = 'An empty conversation';

const TITLE_SYSTEM_PROMPT = `You write titles for chat conversations.

TASK
- Reply with a short, descriptive title for the topic of the conversation and nothing else.

FORMAT
- A single line of plain text. No quotes, no code fences, no prefixes such as "Title:".
- At most 80 characters.
- No emojis.
- Never answer or explain the user's question.

If the conversation is empty, reply: ${EMPTY_CONVERSATION_TITLE}

EXAMPLES
User: What is the weather like in Barcelona?
You: Weather in Barcelona

User: How do I add items to a list in Python?
You: Python list methods

User: Tell me the steps to set up a Postgres replica
You: Setting up a PostgreSQL replica`;

/**
 * Title template: fixed instruction followed by the conversation so far.
 * Sent without tool declarations.
 */
export class TitleTemplate implements VersionedPromptTemplate {
  constructor(private readonly version: string = 'v1') {}

  formatMessages(messages: Message[]): ChatMessage[] {
    const chatMessages: ChatMessage[] = [{ role: 'system', content: TITLE_SYSTEM_PROMPT }];

    for (const msg of messages) {
      chatMessages.push({ role: msg.role, content: msg.content });
    }

    return chatMessages;
  }

  getVersion(): string {
    return this.version;
  }
}
