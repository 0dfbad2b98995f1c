/**
 * Turn State Machine
 *
 */

import type { ToolInvocation } from '../tools/invocation.js';
import type { ToolResult } from '../tools/types.js';
import type { ErrorCode } from '../types/errors.js';

export type TurnState =
  | 'AWAITING_QUERY'
  | 'PROMPTING_MODEL'
  | 'PARSING_OUTPUT'
  | 'DISPATCHING_TOOL'
  | 'SYNTHESIZING_ANSWER'
  | 'DONE'
  | 'ERROR'
  | 'CANCELLED';

const TERMINAL: ReadonlySet<TurnState> = new Set<TurnState>(['DONE', 'ERROR', 'CANCELLED']);

const TRANSITIONS: Record<TurnState, readonly TurnState[]> = {
  AWAITING_QUERY: ['PROMPTING_MODEL'],
  PROMPTING_MODEL: ['PARSING_OUTPUT'],
  PARSING_OUTPUT: ['DISPATCHING_TOOL', 'SYNTHESIZING_ANSWER'],
  DISPATCHING_TOOL: ['SYNTHESIZING_ANSWER'],
  SYNTHESIZING_ANSWER: ['DONE'],
  DONE: [],
  ERROR: [],
  CANCELLED: []
};

export function isTerminal(state: TurnState): boolean {
  return TERMINAL.has(state);
}

/**
 * ERROR and CANCELLED are reachable from every non-terminal state.
 */
export function canTransition(from: TurnState, to: TurnState): boolean {
  if (isTerminal(from)) return false;
  if (to === 'ERROR' || to === 'CANCELLED') return true;
  return TRANSITIONS[from].includes(to);
}

export type TurnStatus = 'done' | 'error' | 'cancelled';

export interface TurnError {
  code: ErrorCode | 'INTERNAL';
  message: string;
}

/**
 * Terminal artifact of one turn. Frozen once built.
 */
export interface AgentTurnResult {
  readonly status: TurnStatus;
  readonly finalText: string;
  readonly invokedTool?: ToolInvocation;
  readonly toolResult?: ToolResult;
  readonly error?: Readonly<TurnError>;
}

export function createTurnResult(result: AgentTurnResult): AgentTurnResult {
  return Object.freeze({
    ...result,
    error: result.error ? Object.freeze({ ...result.error }) : undefined
  });
}
