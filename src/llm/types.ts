/**
 * LLM Type Definitions
 *
 * Provider contract used by the intent resolver and the agent adapters.
 * Keeps the rest of the system independent of the Ollama client so tests
 * can substitute a scripted provider.
 */

export interface Message {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

export interface ChatOptions {
  model: string;
  messages: Message[];
  systemPrompt?: string;
  /** Ask the model for a JSON document instead of free text. */
  format?: 'json';
  temperature?: number;
  /** Aborting it cancels the HTTP request. */
  signal?: AbortSignal;
}

export interface ChatResponse {
  message: Message;
  done: boolean;
  done_reason?: 'stop' | 'length';
}

export interface LLMProvider {
  chat(options: ChatOptions): Promise<ChatResponse>;
}
