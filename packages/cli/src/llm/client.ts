/**
 * LLM Client Factory
 */

import type { LLMClient } from './types.js';
import { getConfig, type SwitchboardConfig } from '../utils/config.js';
import { OllamaClient } from './ollama.client.js';

export { OllamaClient } from './ollama.client.js';

/**
 * Create LLM client from config
 */
export function createClient(cfg: SwitchboardConfig = getConfig()): LLMClient {
  return new OllamaClient({
    baseUrl: cfg.llm.baseUrl,
    model: cfg.llm.model,
    timeout: cfg.llm.timeoutMs,
    temperature: cfg.llm.temperature
  });
}
