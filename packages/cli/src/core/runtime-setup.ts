/**
 * Runtime Setup
 *
 * Builds the adapters, the tool registry, the model client and the session
 * store once, and wires them into an Agent.
 */

import fs from 'fs';
import { createClient } from '../llm/index.js';
import type { LLMClient } from '../llm/index.js';
import { CommentsAdapter, PostAdapter, type FetchFn } from '../adapters/index.js';
import { createToolRegistry, type ToolRegistry } from '../tools/index.js';
import { SessionStore } from '../session/index.js';
import { Agent, type TransitionInfo } from '../executor/index.js';
import { getConfig, type SwitchboardConfig } from '../utils/config.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { logger } from '../utils/logger.js';

export interface Runtime {
  agent: Agent;
  registry: ToolRegistry;
  sessions: SessionStore;
  llm: LLMClient;
}

export interface RuntimeOptions {
  /** Model client override, e.g. a scripted one in tests */
  llm?: LLMClient;
  /** fetch used by the HTTP adapters */
  fetch?: FetchFn;
  onTransition?: (info: TransitionInfo) => void;
}

/**
 * Read the configured preamble file. Unreadable or empty -> built-in preamble.
 */
export function loadSystemPreamble(cfg: SwitchboardConfig): string | undefined {
  const file = cfg.agent.systemPromptFile;
  if (!file) return undefined;

  try {
    const text = fs.readFileSync(file, 'utf8').trim();
    if (text.length === 0) {
      logger.warn(`System prompt file ${file} is empty; using the built-in prompt`);
      return undefined;
    }
    return text;
  } catch (error) {
    logger.warn(`Could not read system prompt file ${file}; using the built-in prompt`, {
      error: getErrorMessage(error)
    });
    return undefined;
  }
}

export function createRuntime(cfg: SwitchboardConfig = getConfig(), options: RuntimeOptions = {}): Runtime {
  logger.info('Initializing runtime...');

  const adapterOptions = {
    baseUrl: cfg.adapters.jsonplaceholderBaseUrl,
    timeoutMs: cfg.adapters.timeoutMs,
    fetch: options.fetch
  };
  const registry = createToolRegistry({
    post: new PostAdapter(adapterOptions),
    comments: new CommentsAdapter(adapterOptions)
  });
  logger.info(`Tool registry ready: ${registry.names().join(', ')}`);

  const llm = options.llm ?? createClient(cfg);
  logger.info(`Model: ${llm.getModel()} (${cfg.llm.baseUrl})`);

  const sessions = new SessionStore({
    ttlMs: cfg.session.ttlMs,
    historyLimit: cfg.session.historyTurns
  });

  const agent = new Agent({
    llm,
    registry,
    sessions,
    synthesize: cfg.agent.synthesize,
    systemPreamble: loadSystemPreamble(cfg),
    onTransition: options.onTransition
  });

  return { agent, registry, sessions, llm };
}
