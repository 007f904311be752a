/**
 * Model exchange entities (Ollama /api/chat wire shapes)
 */
export interface ToolCall {
  id: string;
  function: {
    name: string;
    /** Decoded object from Ollama, or a JSON string from OpenAI-compatible servers */
    arguments: unknown;
  };
}

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; tool_calls?: ToolCall[] }
  | { role: 'tool'; content: string; tool_call_id: string; tool_name: string };

export interface ToolDeclaration {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface ModelChoice {
  message: {
    content: string;
    toolCalls: ToolCall[];
  };
  finishReason?: string;
}

export interface ChatCompletion {
  model: string;
  choices: ModelChoice[];
}

export interface ChatOptions {
  tools?: ToolDeclaration[];
  signal?: AbortSignal;
}

export interface OllamaChatResponse {
  model: string;
  created_at: string;
  message?: {
    role: string;
    content?: string;
    tool_calls?: Array<{
      id?: string;
      function: { name: string; arguments?: unknown };
    }>;
  };
  done: boolean;
  done_reason?: string;
}
