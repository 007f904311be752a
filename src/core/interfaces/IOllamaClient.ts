import { ChatCompletion, ChatMessage, ChatOptions } from '../entities/Model.js';

/**
 * Interface for the model provider
 */
export interface IOllamaClient {
  /**
   * Chat with a model using structured messages, optionally declaring tools
   */
  chat(model: string, messages: ChatMessage[], options?: ChatOptions): Promise<ChatCompletion>;

  /**
   * List available models
   */
  listModels(): Promise<{ models: Array<{ name: string }> }>;
}
