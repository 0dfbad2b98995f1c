import type { ToolRegistry } from '../../tools/registry.js';
import { ARGS_KEY, TOOL_KEY } from '../../tools/parser.js';

export const DEFAULT_DISPATCH_PREAMBLE = `You are an assistant that answers questions about posts and their comments.
You can look data up by calling one of the tools below.`;

/**
 * System prompt for the routing call: preamble, tool catalogue, output rules.
 * The catalogue and rules are always appended, whatever the preamble.
 */
export function buildDispatchPrompt(registry: ToolRegistry, preamble: string = DEFAULT_DISPATCH_PREAMBLE): string {
  const names = registry.names().map(name => `"${name}"`).join(' or ');

  return `${preamble.trim()}

You have ${registry.size} tools you can call:
${registry.describe()}

When the user asks for information one of these tools can fetch:
- Output *only* valid JSON with exactly keys "${TOOL_KEY}" and "${ARGS_KEY}".
- "${TOOL_KEY}" must be ${names}.
- "${ARGS_KEY}" must follow the schema above.
- Output exactly one JSON object. Do not output any extra text around it.
- If the user refers to something from earlier in the conversation ("that post"), use its id.

Example: {"${TOOL_KEY}": "${registry.names()[0] ?? 'tool_name'}", "${ARGS_KEY}": {...}}

If no tool is needed, answer in plain text without any JSON.`;
}
