/**
 * Tests for transport-level error mapping and tool output formatting
 */

import { statusForError } from '../src/infrastructure/web/WebServer.js';
import {
  errorResult,
  formatConversation,
  formatConversationList,
} from '../src/presentation/tools/results.js';
import {
  DeadlineExceededError,
  NotFoundError,
  ToolLoopExhaustedError,
  TurnFailedError,
  ValidationError,
} from '../src/core/errors.js';

describe('statusForError', () => {
  it('should map error codes to HTTP statuses', () => {
    expect(statusForError(new ValidationError('message'))).toBe(400);
    expect(statusForError(new NotFoundError('conversation x not found'))).toBe(404);
    expect(statusForError(new TurnFailedError(new DeadlineExceededError()))).toBe(504);
    expect(statusForError(new TurnFailedError(new ToolLoopExhaustedError(15)))).toBe(500);
    expect(statusForError(new Error('boom'))).toBe(500);
  });

  it('should keep client error statuses set by middleware', () => {
    const malformedJson = Object.assign(new SyntaxError('Unexpected token } in JSON at position 12'), {
      status: 400,
      type: 'entity.parse.failed',
    });
    const tooLarge = Object.assign(new Error('request entity too large'), { statusCode: 413 });
    const upstream = Object.assign(new Error('bad gateway'), { status: 502 });

    expect(statusForError(malformedJson)).toBe(400);
    expect(statusForError(tooLarge)).toBe(413);
    expect(statusForError(upstream)).toBe(500);
  });
});

describe('TurnFailedError', () => {
  it('should carry the cause in its message', () => {
    const error = new TurnFailedError(new ToolLoopExhaustedError(15));
    expect(error.message).toBe('failed to generate reply: too many tool calls, unable to generate reply');
    expect(error.code).toBe('internal');
    expect(error.name).toBe('TurnFailedError');
  });
});

describe('conversation tool output', () => {
  const at = new Date('2024-05-01T10:00:00.000Z');

  it('should format a conversation transcript', () => {
    const text = formatConversation({
      id: 'c1',
      title: 'Weather in Barcelona',
      createdAt: at,
      updatedAt: at,
      messages: [
        { id: 'm1', role: 'user', content: 'Weather?', createdAt: at, updatedAt: at },
        { id: 'm2', role: 'assistant', content: 'Sunny', createdAt: at, updatedAt: at },
      ],
    });

    expect(text).toBe(
      '# Weather in Barcelona\n\n**Conversation ID**: `c1`\n\n' +
        '1. **👤 User** (2024-05-01T10:00:00.000Z)\nWeather?\n' +
        '\n---\n\n' +
        '2. **🤖 Assistant** (2024-05-01T10:00:00.000Z)\nSunny\n'
    );
  });

  it('should format the conversation list', () => {
    expect(formatConversationList([])).toBe('No conversations found.');
    expect(
      formatConversationList([{ id: 'c1', title: 'Trip', messageCount: 4, createdAt: at, updatedAt: at }])
    ).toBe('# Conversations\n\n- **Trip** (`c1`): 4 messages, updated 2024-05-01T10:00:00.000Z');
  });

  it('should flag errors for MCP clients', () => {
    expect(errorResult('continuing conversation', new NotFoundError('conversation c9 not found'))).toEqual({
      isError: true,
      content: [{ type: 'text', text: 'Error continuing conversation: conversation c9 not found' }],
    });
  });
});
