/**
 * Turn Orchestrator
 *
 * Drives one query through prompt -> parse -> dispatch -> synthesis.
 * One instance per turn. The session's context comes in as an argument and
 * goes back out with the outcome; nothing is kept on the instance afterwards.
 */

import type { ChatResponse, LLMClient, Message } from '../llm/types.js';
import type { ConversationContext } from '../session/conversation-context.js';
import { InvocationParser, type ModelOutput } from '../tools/parser.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolInvocation } from '../tools/invocation.js';
import type { ToolResult } from '../tools/types.js';
import { dispatch, entitiesOf } from '../tools/dispatch.js';
import { MalformedInvocationError, TurnCancelledError, isSwitchboardError } from '../types/errors.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { stripMarkdownCodeFence } from '../utils/llm-json.js';
import { logger } from '../utils/logger.js';
import { buildDispatchPrompt } from '../context/prompts/dispatch-prompt.js';
import { ANSWER_SYNTHESIS_PROMPT, buildSynthesisRequest, renderPayload } from '../context/prompts/answer-synthesis.js';
import { errorReply, failureReply } from './replies.js';
import {
  type AgentTurnResult,
  type TurnState,
  canTransition,
  createTurnResult
} from './state.js';

export interface TransitionInfo {
  sessionId: string;
  from: TurnState;
  to: TurnState;
}

export interface OrchestratorConfig {
  llm: LLMClient;
  registry: ToolRegistry;
  /** Phrase `ok` results with a second model call; otherwise return the payload as JSON */
  synthesize?: boolean;
  /** Replaces the default preamble of the routing prompt */
  systemPreamble?: string;
  onTransition?: (info: TransitionInfo) => void;
}

export interface TurnOptions {
  signal?: AbortSignal;
}

export interface TurnOutcome {
  result: AgentTurnResult;
  /** Updated on DONE; the untouched input otherwise */
  context: ConversationContext;
}

export const CANCELLED_REPLY = 'Request cancelled.';

export class TurnOrchestrator {
  private readonly llm: LLMClient;
  private readonly registry: ToolRegistry;
  private readonly parser: InvocationParser;
  private readonly synthesize: boolean;
  private readonly systemPreamble?: string;
  private readonly onTransition?: (info: TransitionInfo) => void;

  private state: TurnState = 'AWAITING_QUERY';
  private sessionId = '';

  constructor(config: OrchestratorConfig) {
    this.llm = config.llm;
    this.registry = config.registry;
    this.parser = new InvocationParser(config.registry);
    this.synthesize = config.synthesize ?? true;
    this.systemPreamble = config.systemPreamble;
    this.onTransition = config.onTransition;
  }

  get currentState(): TurnState {
    return this.state;
  }

  async run(query: string, context: ConversationContext, options: TurnOptions = {}): Promise<TurnOutcome> {
    if (this.state !== 'AWAITING_QUERY') {
      throw new Error('A TurnOrchestrator handles exactly one turn');
    }

    const { signal } = options;
    this.sessionId = context.sessionId;
    const draft = context.clone();

    let invokedTool: ToolInvocation | undefined;
    let toolResult: ToolResult | undefined;

    try {
      this.checkCancelled(signal);

      // AWAITING_QUERY -> PROMPTING_MODEL
      this.transition('PROMPTING_MODEL');
      const rewritten = draft.rewriteQuery(query);
      if (rewritten !== query) {
        logger.debug('Query rewritten', { sessionId: this.sessionId, query, rewritten });
      }
      const response = await this.llm.chat(this.buildMessages(draft, rewritten), { signal });
      this.checkCancelled(signal);

      // PROMPTING_MODEL -> PARSING_OUTPUT
      this.transition('PARSING_OUTPUT');
      const output = this.classify(response);

      if (output.kind === 'text') {
        this.transition('SYNTHESIZING_ANSWER');
        return this.complete(draft, query, { status: 'done', finalText: output.text });
      }

      if (output.invocation.hasReferences()) {
        logger.debug('Resolving references', { sessionId: this.sessionId, args: output.invocation.args });
      }
      invokedTool = output.invocation.resolve((entity, surface) => draft.resolveReference(entity, surface));

      // PARSING_OUTPUT -> DISPATCHING_TOOL
      this.transition('DISPATCHING_TOOL');
      logger.info(`Dispatching ${invokedTool.toolName}`, { sessionId: this.sessionId, args: invokedTool.args });
      const dispatched = await dispatch(this.registry, invokedTool, { signal });
      toolResult = dispatched.result;
      this.checkCancelled(signal);

      // DISPATCHING_TOOL -> SYNTHESIZING_ANSWER
      this.transition('SYNTHESIZING_ANSWER');
      if (toolResult.status !== 'ok') {
        logger.info(`${invokedTool.toolName} returned ${toolResult.status}`, {
          sessionId: this.sessionId,
          rawError: toolResult.rawError
        });
        return this.complete(draft, query, {
          status: 'done',
          finalText: failureReply(dispatched.spec, invokedTool, toolResult),
          invokedTool,
          toolResult
        });
      }

      for (const [entity, id] of entitiesOf(dispatched.spec, invokedTool)) {
        draft.record(entity, id);
      }

      const finalText = this.synthesize
        ? await this.phrase(query, toolResult, signal)
        : renderPayload(toolResult.payload);
      this.checkCancelled(signal);

      return this.complete(draft, query, { status: 'done', finalText, invokedTool, toolResult });
    } catch (error) {
      return { result: this.fail(error, signal, invokedTool, toolResult), context };
    }
  }

  /**
   * A reply the model stopped at its length limit is reported as cut off when
   * it doesn't parse, since the model never finished writing it.
   */
  private classify(response: ChatResponse): ModelOutput {
    if (response.finishReason !== 'length') {
      return this.parser.classify(response.content);
    }
    logger.warn('Model output hit the length limit', { sessionId: this.sessionId, length: response.content.length });
    try {
      return this.parser.classify(response.content);
    } catch (error) {
      if (error instanceof MalformedInvocationError) {
        throw new MalformedInvocationError('Model output was cut off before the tool call was complete');
      }
      throw error;
    }
  }

  private buildMessages(context: ConversationContext, query: string): Message[] {
    const messages: Message[] = [
      { role: 'system', content: buildDispatchPrompt(this.registry, this.systemPreamble) }
    ];
    for (const exchange of context.history) {
      messages.push({ role: 'user', content: exchange.query });
      messages.push({ role: 'assistant', content: exchange.answer });
    }
    messages.push({ role: 'user', content: query });
    return messages;
  }

  private async phrase(query: string, result: ToolResult, signal?: AbortSignal): Promise<string> {
    const response = await this.llm.chat(
      [
        { role: 'system', content: ANSWER_SYNTHESIS_PROMPT },
        { role: 'user', content: buildSynthesisRequest(query, result.toolName, result.payload) }
      ],
      { signal }
    );
    const text = stripMarkdownCodeFence(response.content);
    return text.length > 0 ? text : renderPayload(result.payload);
  }

  private complete(draft: ConversationContext, query: string, result: AgentTurnResult): TurnOutcome {
    this.transition('DONE');
    draft.recordExchange(query, result.finalText);
    return { result: createTurnResult(result), context: draft };
  }

  private fail(
    error: unknown,
    signal: AbortSignal | undefined,
    invokedTool: ToolInvocation | undefined,
    toolResult: ToolResult | undefined
  ): AgentTurnResult {
    if (error instanceof TurnCancelledError || signal?.aborted) {
      this.transition('CANCELLED');
      logger.info('Turn cancelled', { sessionId: this.sessionId });
      return createTurnResult({
        status: 'cancelled',
        finalText: CANCELLED_REPLY,
        invokedTool,
        toolResult,
        error: { code: 'CANCELLED', message: 'Turn cancelled by the caller' }
      });
    }

    this.transition('ERROR');
    const code = isSwitchboardError(error) ? error.code : 'INTERNAL';
    const message = getErrorMessage(error);
    if (code === 'INTERNAL') {
      logger.error('Turn failed unexpectedly', { sessionId: this.sessionId, error: message });
    } else {
      logger.warn(`Turn ended in ERROR: ${code}`, { sessionId: this.sessionId, error: message });
    }

    return createTurnResult({
      status: 'error',
      finalText: errorReply(error),
      invokedTool,
      toolResult,
      error: { code, message }
    });
  }

  private checkCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new TurnCancelledError();
    }
  }

  private transition(to: TurnState): void {
    const from = this.state;
    if (!canTransition(from, to)) {
      throw new Error(`Illegal turn transition ${from} -> ${to}`);
    }
    this.state = to;
    logger.debug(`Turn ${from} -> ${to}`, { sessionId: this.sessionId });
    this.onTransition?.({ sessionId: this.sessionId, from, to });
  }
}
