/**
 * LLM Types
 *
 * The model backend is an opaque text-completion service: messages in,
 * raw text out. Tool calls are read from that text, not from a native
 * function-calling channel.
 */

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  temperature?: number;
  signal?: AbortSignal;
}

export interface ChatResponse {
  content: string;
  /** `length` when the model stopped at its output limit */
  finishReason?: 'stop' | 'length';
}

export interface LLMClient {
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
  getModel(): string;
}

export interface LLMConfig {
  baseUrl: string;
  model: string;
  timeout?: number;
  temperature?: number;
  /** Transport for the HTTP backend; the global fetch by default */
  fetch?: typeof fetch;
}
