/**
 * Deterministic user-facing messages
 *
 * Used wherever a second model call would only compound a failure.
 */

import type { ToolInvocation } from '../tools/invocation.js';
import type { ToolResult, ToolSpec } from '../tools/types.js';
import {
  ArgumentTypeError,
  MissingArgumentError,
  NoPriorReferenceError,
  UnknownToolError,
  UnrecognizedReferenceError,
  isSwitchboardError
} from '../types/errors.js';

/**
 * Message for a `not_found` or `adapter_error` result
 */
export function failureReply(spec: ToolSpec, invocation: ToolInvocation, result: ToolResult): string {
  const id = invocation.args[spec.idArgument];
  const entity = spec.arguments[spec.idArgument]?.entity ?? 'item';

  if (result.status === 'not_found') {
    return `No such ${entity}: there is no ${entity} with id ${String(id)}.`;
  }
  return `The ${spec.name} lookup failed (${result.rawError ?? 'unknown error'}). Please try again later.`;
}

/**
 * Single message ending a turn in ERROR
 */
export function errorReply(error: unknown): string {
  if (error instanceof UnknownToolError) {
    return `I can't do that: "${error.toolName}" is not an available tool.`;
  }
  if (error instanceof NoPriorReferenceError) {
    return `I don't know which ${error.entity} you mean yet. Please give its number.`;
  }
  if (error instanceof UnrecognizedReferenceError) {
    return `I couldn't tell which ${error.entity} "${error.surface}" means. Please give its number.`;
  }
  if (error instanceof MissingArgumentError || error instanceof ArgumentTypeError) {
    return `I couldn't work out the details for that lookup (${error.key}). Please say exactly which item you mean.`;
  }
  if (isSwitchboardError(error)) {
    switch (error.code) {
      case 'AMBIGUOUS_OUTPUT':
      case 'MALFORMED_INVOCATION':
        return "I couldn't understand how to look that up. Please rephrase your request.";
      case 'MODEL_UNAVAILABLE':
        return 'The language model is not reachable right now. Please try again later.';
      default:
        break;
    }
  }
  return 'Something went wrong while handling your request.';
}
