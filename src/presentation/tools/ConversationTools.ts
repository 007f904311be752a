import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ConversationService } from '../../application/services/ConversationService.js';
import { Logger } from '../../utils/logger.js';
import { errorResult, formatConversation, formatConversationList, textResult } from './results.js';

/**
 * Register start-conversation, continue-conversation, list-conversations
 * and describe-conversation
 */
export function registerConversationTools(
  server: McpServer,
  conversationService: ConversationService,
  log: Logger
) {
  server.tool(
    'start-conversation',
    'Start a new conversation with the assistant. Returns the conversation ID, a generated title and the reply.',
    {
      message: z.string().describe('The first user message'),
    },
    async ({ message }) => {
      try {
        const result = await conversationService.startConversation({ message });
        return textResult(
          `# ${result.title}\n\n**Conversation ID**: \`${result.conversationId}\`\n(Use this ID to continue the conversation)\n\n${result.reply}`
        );
      } catch (error) {
        log.error('start_conversation_failed', { error });
        return errorResult('starting conversation', error);
      }
    }
  );

  server.tool(
    'continue-conversation',
    'Send another message in an existing conversation and get the reply',
    {
      conversation_id: z.string().describe('ID returned by start-conversation'),
      message: z.string().describe('The next user message'),
    },
    async ({ conversation_id, message }) => {
      try {
        const result = await conversationService.continueConversation({
          conversationId: conversation_id,
          message,
        });
        return textResult(result.reply);
      } catch (error) {
        log.error('continue_conversation_failed', { conversation_id, error });
        return errorResult('continuing conversation', error);
      }
    }
  );

  server.tool('list-conversations', 'List all conversations, most recently updated first', {}, async () => {
    try {
      return textResult(formatConversationList(await conversationService.listConversations()));
    } catch (error) {
      log.error('list_conversations_failed', { error });
      return errorResult('listing conversations', error);
    }
  });

  server.tool(
    'describe-conversation',
    'Show a conversation with all of its messages',
    {
      conversation_id: z.string().describe('The conversation ID'),
    },
    async ({ conversation_id }) => {
      try {
        return textResult(formatConversation(await conversationService.describeConversation(conversation_id)));
      } catch (error) {
        return errorResult('describing conversation', error);
      }
    }
  );
}
