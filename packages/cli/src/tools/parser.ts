/**
 * Invocation Parser
 *
 * The only path from model text to code execution. Extracts a single
 * `{"tool": ..., "args": {...}}` object from free text and validates it
 * against the registry.
 */

import { AmbiguousOutputError, MalformedInvocationError } from '../types/errors.js';
import { scanJsonObjects, stripMarkdownCodeFence } from '../utils/llm-json.js';
import { ToolInvocation } from './invocation.js';
import type { ToolRegistry } from './registry.js';

export const TOOL_KEY = 'tool';
export const ARGS_KEY = 'args';

export type ModelOutput =
  | { kind: 'text'; text: string }
  | { kind: 'tool'; invocation: ToolInvocation };

/** A broken fragment that still looks like an attempted tool call */
const TOOL_CALL_HINT_RE = /"(?:tool|args)"\s*:/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class InvocationParser {
  constructor(private readonly registry: ToolRegistry) {}

  /**
   * Parse raw model output into a validated invocation.
   *
   * @throws AmbiguousOutputError more than one JSON object, or one next to a broken fragment
   * @throws MalformedInvocationError no object, or not exactly `tool` + `args`
   * @throws UnknownToolError tool name not registered (exact match)
   * @throws MissingArgumentError / ArgumentTypeError schema violations
   */
  parse(raw: string): ToolInvocation {
    const { objects, fragments } = scanJsonObjects(raw);

    if (objects.length > 1) {
      throw new AmbiguousOutputError(objects.length);
    }
    if (objects.length === 1 && fragments.length > 0) {
      throw new AmbiguousOutputError(
        1,
        'Model output contains a JSON object next to an incomplete one; refusing to pick either'
      );
    }
    if (objects.length === 0) {
      throw new MalformedInvocationError('Model output does not contain a JSON object');
    }

    const candidate = objects[0].value;
    const keys = Object.keys(candidate);
    const toolName = candidate[TOOL_KEY];
    const args = candidate[ARGS_KEY];

    if (!(TOOL_KEY in candidate) || !(ARGS_KEY in candidate)) {
      throw new MalformedInvocationError(`Tool call must have "${TOOL_KEY}" and "${ARGS_KEY}" keys, got: ${keys.join(', ') || 'none'}`);
    }
    if (keys.length !== 2) {
      throw new MalformedInvocationError(`Tool call must have exactly "${TOOL_KEY}" and "${ARGS_KEY}" keys, got: ${keys.join(', ')}`);
    }
    if (typeof toolName !== 'string' || toolName.length === 0) {
      throw new MalformedInvocationError(`"${TOOL_KEY}" must be a non-empty string`);
    }
    if (!isPlainObject(args)) {
      throw new MalformedInvocationError(`"${ARGS_KEY}" must be an object`);
    }

    const spec = this.registry.lookup(toolName);
    return ToolInvocation.validate(spec, args);
  }

  /**
   * Decide whether the model answered directly or asked for a tool.
   * Only JSON carrying a `tool` or `args` key counts as a tool call, whole or
   * broken; prose quoting other JSON is a direct answer. Anything that tries to
   * be a tool call goes through `parse()` and its errors.
   */
  classify(raw: string): ModelOutput {
    if (raw.trim().length === 0) {
      throw new MalformedInvocationError('Model returned an empty response');
    }

    const { objects, fragments } = scanJsonObjects(raw);
    const attemptedCall =
      objects.some(({ value }) => Object.hasOwn(value, TOOL_KEY) || Object.hasOwn(value, ARGS_KEY)) ||
      fragments.some(fragment => TOOL_CALL_HINT_RE.test(fragment));

    if (!attemptedCall) {
      return { kind: 'text', text: stripMarkdownCodeFence(raw) };
    }
    return { kind: 'tool', invocation: this.parse(raw) };
  }
}
