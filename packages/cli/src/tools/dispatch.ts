/**
 * Dispatch a resolved invocation to its tool's adapter.
 *
 * The tool is looked up by name here, at dispatch time, so an unregistered
 * name surfaces as UnknownToolError rather than as an argument problem.
 */

import type { ToolInvocation } from './invocation.js';
import type { ToolRegistry } from './registry.js';
import type { FetchOptions, ToolResult, ToolSpec } from './types.js';

/**
 * The value an adapter receives for the tool's id argument.
 * Unresolved references and non-numbers become NaN, which every adapter
 * rejects without a network call.
 */
export function idFor(spec: ToolSpec, invocation: ToolInvocation): number {
  const value = invocation.args[spec.idArgument];
  return typeof value === 'number' ? value : Number.NaN;
}

export async function dispatch(
  registry: ToolRegistry,
  invocation: ToolInvocation,
  options: FetchOptions = {}
): Promise<{ spec: ToolSpec; result: ToolResult }> {
  const spec = registry.lookup(invocation.toolName);
  const result = await spec.adapter.fetch(idFor(spec, invocation), options);
  return { spec, result };
}

/**
 * Entity ids an `ok` result establishes, e.g. `[["post", 2]]`.
 */
export function entitiesOf(spec: ToolSpec, invocation: ToolInvocation): Array<[string, number]> {
  const entities: Array<[string, number]> = [];
  for (const [key, arg] of Object.entries(spec.arguments)) {
    const value = invocation.args[key];
    if (arg.entity && typeof value === 'number') {
      entities.push([arg.entity, value]);
    }
  }
  return entities;
}
