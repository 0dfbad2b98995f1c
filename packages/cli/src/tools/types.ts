/**
 * Tool System Types
 *
 * A tool is a named, schema-typed lookup backed by exactly one adapter.
 */

export type ArgumentType = 'integer' | 'number' | 'string' | 'boolean';

/** Kind of conversational entity an identifier argument names, e.g. "post" */
export type EntityKind = string;

export interface ArgumentSpec {
  type: ArgumentType;
  required: boolean;
  description: string;
  /**
   * Marks an identifier argument. Besides a literal id it accepts a reference
   * such as "that post", resolved against the session before dispatch.
   */
  entity?: EntityKind;
}

export type ArgumentSchema = Readonly<Record<string, Readonly<ArgumentSpec>>>;

export type ToolStatus = 'ok' | 'adapter_error' | 'not_found';

export interface ToolResult<TPayload = unknown> {
  readonly toolName: string;
  readonly status: ToolStatus;
  readonly payload?: TPayload;
  /** Short diagnostic for `adapter_error` */
  readonly rawError?: string;
}

export interface FetchOptions {
  signal?: AbortSignal;
}

/**
 * One implementation per external resource.
 * Never throws: transport problems come back as `adapter_error`.
 */
export interface ResourceAdapter<TPayload = unknown> {
  readonly toolName: string;
  fetch(id: number, options?: FetchOptions): Promise<ToolResult<TPayload>>;
}

/** Reserved for access control; listed, not enforced */
export interface ToolAccess {
  scopes: readonly string[];
}

export interface ToolSpec {
  readonly name: string;
  readonly description: string;
  readonly arguments: ArgumentSchema;
  /** Argument whose value is handed to `adapter.fetch()` */
  readonly idArgument: string;
  readonly adapter: ResourceAdapter;
  readonly access?: Readonly<ToolAccess>;
}
