/**
 * LLM Module
 */

export { OllamaClient, createClient } from './client.js';
export type {
  LLMClient,
  LLMConfig,
  Message,
  ChatOptions,
  ChatResponse
} from './types.js';
