import type { ToolResult } from './types.js';

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * The payload is frozen along with the result, nested objects included.
 */
export function okResult<T>(toolName: string, payload: T): ToolResult<T> {
  const result: ToolResult<T> = { toolName, status: 'ok', payload: deepFreeze(payload) };
  return Object.freeze(result);
}

export function notFoundResult<T = never>(toolName: string, rawError?: string): ToolResult<T> {
  const result: ToolResult<T> = { toolName, status: 'not_found', rawError };
  return Object.freeze(result);
}

export function adapterErrorResult<T = never>(toolName: string, rawError: string): ToolResult<T> {
  const result: ToolResult<T> = { toolName, status: 'adapter_error', rawError };
  return Object.freeze(result);
}
