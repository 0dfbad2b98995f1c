/**
 * Validated tool invocations
 *
 * A `ToolInvocation` can only come out of `ToolInvocation.validate()`, so
 * holding one means its arguments already satisfy the tool's schema. Raw
 * parsed JSON stays `Record<string, unknown>` and never reaches an adapter.
 */

import { ArgumentTypeError, MissingArgumentError } from '../types/errors.js';
import { classifyReference } from '../session/references.js';
import type { ArgumentSpec, EntityKind, ToolSpec } from './types.js';

/**
 * An identifier argument the model gave as text ("that post", "2")
 * rather than as a number. Resolved against the session before dispatch.
 */
export class EntityReference {
  constructor(
    readonly entity: EntityKind,
    readonly surface: string
  ) {}

  toJSON(): { ref: string } {
    return { ref: this.surface };
  }
}

export type ArgumentValue = string | number | boolean | EntityReference;

export type ReferenceResolver = (entity: EntityKind, surface: string) => number;

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number' && !Number.isInteger(value)) return `number ${value}`;
  return typeof value;
}

function withArticle(noun: string): string {
  return /^[aeiou]/i.test(noun) ? `an ${noun}` : `a ${noun}`;
}

function checkArgument(toolName: string, key: string, spec: Readonly<ArgumentSpec>, value: unknown): ArgumentValue {
  if (spec.entity && typeof value === 'string') {
    if (classifyReference(spec.entity, value).kind === 'unrecognized') {
      throw new ArgumentTypeError(toolName, key, `${withArticle(spec.type)} or a reference to ${withArticle(spec.entity)}`, `"${value}"`);
    }
    return new EntityReference(spec.entity, value.trim());
  }

  switch (spec.type) {
    case 'integer':
      if (typeof value === 'number' && Number.isInteger(value)) return value;
      break;
    case 'number':
      if (typeof value === 'number' && Number.isFinite(value)) return value;
      break;
    case 'string':
      if (typeof value === 'string') return value;
      break;
    case 'boolean':
      if (typeof value === 'boolean') return value;
      break;
  }

  throw new ArgumentTypeError(toolName, key, withArticle(spec.type), describeValue(value));
}

export class ToolInvocation {
  readonly args: Readonly<Record<string, ArgumentValue>>;

  private constructor(
    readonly toolName: string,
    args: Record<string, ArgumentValue>
  ) {
    this.args = Object.freeze(args);
  }

  /**
   * Check raw arguments against a tool's schema, in schema order.
   * Keys the schema doesn't know are dropped.
   */
  static validate(spec: ToolSpec, rawArgs: Record<string, unknown>): ToolInvocation {
    const args: Record<string, ArgumentValue> = {};

    for (const [key, argSpec] of Object.entries(spec.arguments)) {
      const value = Object.hasOwn(rawArgs, key) ? rawArgs[key] : undefined;

      if (value === undefined) {
        if (argSpec.required) {
          throw new MissingArgumentError(spec.name, key);
        }
        continue;
      }

      args[key] = checkArgument(spec.name, key, argSpec, value);
    }

    return new ToolInvocation(spec.name, args);
  }

  /**
   * Replace every entity reference with the id the resolver returns.
   */
  resolve(resolver: ReferenceResolver): ToolInvocation {
    const resolved: Record<string, ArgumentValue> = {};
    for (const [key, value] of Object.entries(this.args)) {
      resolved[key] = value instanceof EntityReference ? resolver(value.entity, value.surface) : value;
    }
    return new ToolInvocation(this.toolName, resolved);
  }

  hasReferences(): boolean {
    return Object.values(this.args).some(value => value instanceof EntityReference);
  }

  toJSON(): { tool: string; args: Readonly<Record<string, ArgumentValue>> } {
    return { tool: this.toolName, args: this.args };
  }
}
