/**
 * Ollama LLM Provider
 *
 * LLM provider implementation for Ollama. Handles non-streaming chat
 * completions with optional JSON mode and system prompts. Connects to a
 * local Ollama instance (default: localhost:11434). A call with a signal gets
 * its own client whose fetch carries that signal, so aborting it cancels the
 * HTTP request.
 *
 * Dependencies:
 * - ollama: Official Ollama JavaScript client for local LLM inference
 */
import { Ollama } from 'ollama';
import type { ChatOptions, ChatResponse, LLMProvider, Message } from './types.js';

export class OllamaProvider implements LLMProvider {
  private readonly host: string;
  private client: Ollama;

  constructor(host: string = 'http://localhost:11434') {
    this.host = host;
    this.client = new Ollama({ host });
  }

  async chat(options: ChatOptions): Promise<ChatResponse> {
    const messages = this.prepareMessages(options.messages, options.systemPrompt);
    const client = options.signal ? this.clientFor(options.signal) : this.client;

    const response = await client.chat({
      model: options.model,
      messages,
      format: options.format,
      stream: false,
      options: {
        temperature: options.temperature,
      },
    });

    return {
      message: {
        role: 'assistant',
        content: response.message.content,
      },
      done: true,
      done_reason: response.done_reason === 'length' ? 'length' : 'stop',
    };
  }

  private clientFor(signal: AbortSignal): Ollama {
    return new Ollama({
      host: this.host,
      fetch: (input, init) => fetch(input, { ...init, signal }),
    });
  }

  private prepareMessages(messages: Message[], systemPrompt?: string): Message[] {
    const result: Message[] = [];

    if (systemPrompt) {
      result.push({ role: 'system', content: systemPrompt });
    }

    for (const msg of messages) {
      if (msg.role === 'system' && systemPrompt) {
        continue;
      }
      result.push(msg);
    }

    return result;
  }
}

let defaultProvider: OllamaProvider | null = null;

export function getOllamaProvider(host?: string): OllamaProvider {
  if (!defaultProvider) {
    defaultProvider = new OllamaProvider(host);
  }
  return defaultProvider;
}
