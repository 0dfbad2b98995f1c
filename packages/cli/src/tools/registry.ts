/**
 * Tool Registry
 *
 * Catalogue of invocable tools. Filled once at startup, read-only afterwards,
 * and handed by reference to whatever needs it.
 */

import { DuplicateToolError, UnknownToolError } from '../types/errors.js';
import type { ArgumentSchema, ArgumentSpec, ToolSpec } from './types.js';

function freezeSpec(spec: ToolSpec): ToolSpec {
  const args: Record<string, Readonly<ArgumentSpec>> = {};
  for (const [key, arg] of Object.entries(spec.arguments)) {
    args[key] = Object.freeze({ ...arg });
  }

  return Object.freeze({
    ...spec,
    arguments: Object.freeze(args),
    access: spec.access ? Object.freeze({ scopes: Object.freeze([...spec.access.scopes]) }) : undefined
  });
}

function describeArgument(key: string, arg: Readonly<ArgumentSpec>): string {
  return `"${key}": <${arg.type}>`;
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolSpec>();

  /**
   * Register a tool. The stored spec and its schema are frozen.
   */
  register(spec: ToolSpec): ToolSpec {
    if (this.tools.has(spec.name)) {
      throw new DuplicateToolError(spec.name);
    }
    if (!Object.hasOwn(spec.arguments, spec.idArgument)) {
      throw new TypeError(`Tool "${spec.name}" names id argument "${spec.idArgument}" that is not in its schema`);
    }

    const frozen = freezeSpec(spec);
    this.tools.set(spec.name, frozen);
    return frozen;
  }

  /**
   * Get a tool by exact name
   */
  lookup(name: string): ToolSpec {
    const spec = this.tools.get(name);
    if (!spec) {
      throw new UnknownToolError(name, this.names());
    }
    return spec;
  }

  schemaFor(name: string): ArgumentSchema {
    return this.lookup(name).arguments;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolSpec[] {
    return Array.from(this.tools.values());
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Tool catalogue as it appears in the system prompt
   */
  describe(): string {
    return this.list()
      .map((spec, i) => {
        const args = Object.entries(spec.arguments)
          .map(([key, arg]) => describeArgument(key, arg))
          .join(', ');
        const optional = Object.entries(spec.arguments)
          .filter(([, arg]) => !arg.required)
          .map(([key]) => key);
        const note = optional.length > 0 ? ` Optional: ${optional.join(', ')}.` : '';
        return `${i + 1}) ${spec.name}: ${spec.description} Args schema: {${args}}.${note}`;
      })
      .join('\n');
  }
}
