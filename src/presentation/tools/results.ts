import { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { Conversation, ConversationSummary } from '../../core/entities/Conversation.js';
import { errorMessage } from '../../core/errors.js';

export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(action: string, error: unknown): CallToolResult {
  return {
    isError: true,
    content: [{ type: 'text', text: `Error ${action}: ${errorMessage(error)}` }],
  };
}

export function formatConversation(conversation: Conversation): string {
  const history = conversation.messages
    .map((msg, idx) => {
      const role = msg.role === 'user' ? '👤 User' : '🤖 Assistant';
      return `${idx + 1}. **${role}** (${msg.createdAt.toISOString()})\n${msg.content}\n`;
    })
    .join('\n---\n\n');

  return `# ${conversation.title}\n\n**Conversation ID**: \`${conversation.id}\`\n\n${history}`;
}

export function formatConversationList(conversations: ConversationSummary[]): string {
  if (conversations.length === 0) {
    return 'No conversations found.';
  }

  const lines = conversations.map(
    (conv) =>
      `- **${conv.title}** (\`${conv.id}\`): ${conv.messageCount} messages, updated ${conv.updatedAt.toISOString()}`
  );
  return `# Conversations\n\n${lines.join('\n')}`;
}
