/**
 * Agent
 *
 * Caller-facing surface: natural-language turns per session, plus direct tool
 * invocation for callers that already know what they want.
 */

import type { LLMClient } from '../llm/types.js';
import { ConversationContext } from '../session/conversation-context.js';
import type { SessionStore } from '../session/session-store.js';
import { ToolInvocation } from '../tools/invocation.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { FetchOptions, ToolResult, ToolSpec } from '../tools/types.js';
import { dispatch } from '../tools/dispatch.js';
import { logger } from '../utils/logger.js';
import { TurnOrchestrator, type TransitionInfo, type TurnOptions } from './orchestrator.js';
import type { AgentTurnResult } from './state.js';

export interface AgentConfig {
  llm: LLMClient;
  registry: ToolRegistry;
  sessions: SessionStore;
  synthesize?: boolean;
  systemPreamble?: string;
  onTransition?: (info: TransitionInfo) => void;
}

const DIRECT_SESSION_ID = 'direct';

export class Agent {
  private readonly config: AgentConfig;

  constructor(config: AgentConfig) {
    this.config = config;
  }

  /**
   * Run one turn. Turns of the same session run one after another.
   */
  handleTurn(sessionId: string, query: string, options: TurnOptions = {}): Promise<AgentTurnResult> {
    logger.info('Turn started', { sessionId, query });

    return this.config.sessions.withSession(sessionId, async context => {
      const orchestrator = new TurnOrchestrator({
        llm: this.config.llm,
        registry: this.config.registry,
        synthesize: this.config.synthesize,
        systemPreamble: this.config.systemPreamble,
        onTransition: this.config.onTransition
      });

      const outcome = await orchestrator.run(query, context, options);
      logger.info('Turn finished', {
        sessionId,
        status: outcome.result.status,
        tool: outcome.result.invokedTool?.toolName,
        toolStatus: outcome.result.toolResult?.status
      });
      return { context: outcome.context, value: outcome.result };
    });
  }

  /**
   * Call a tool without the model.
   *
   * @throws UnknownToolError, MissingArgumentError, ArgumentTypeError on bad input
   * @throws NoPriorReferenceError for "that post" and the like: there is no session here
   */
  async invokeTool(toolName: string, args: Record<string, unknown>, options: FetchOptions = {}): Promise<ToolResult> {
    const spec = this.config.registry.lookup(toolName);
    const noHistory = new ConversationContext(DIRECT_SESSION_ID, 0);
    const invocation = ToolInvocation.validate(spec, args).resolve((entity, surface) =>
      noHistory.resolveReference(entity, surface)
    );

    const { result } = await dispatch(this.config.registry, invocation, options);
    logger.info(`Direct ${toolName} -> ${result.status}`, { args: invocation.args, rawError: result.rawError });
    return result;
  }

  postCall(postId: number, options: FetchOptions = {}): Promise<ToolResult> {
    return this.invokeTool('post_call', { post_id: postId }, options);
  }

  commentsCall(postId: number, options: FetchOptions = {}): Promise<ToolResult> {
    return this.invokeTool('comments_call', { post_id: postId }, options);
  }

  endSession(sessionId: string): boolean {
    return this.config.sessions.end(sessionId);
  }

  listTools(): ToolSpec[] {
    return this.config.registry.list();
  }

  getModel(): string {
    return this.config.llm.getModel();
  }
}
