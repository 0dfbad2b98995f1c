/**
 * Executor
 *
 */

export { Agent, type AgentConfig } from './agent.js';
export {
  TurnOrchestrator,
  CANCELLED_REPLY,
  type OrchestratorConfig,
  type TransitionInfo,
  type TurnOptions,
  type TurnOutcome
} from './orchestrator.js';
export {
  canTransition,
  isTerminal,
  createTurnResult,
  type AgentTurnResult,
  type TurnError,
  type TurnState,
  type TurnStatus
} from './state.js';
export { errorReply, failureReply } from './replies.js';
