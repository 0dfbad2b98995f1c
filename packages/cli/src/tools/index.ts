/**
 * Tool System
 *
 */

export { ToolRegistry } from './registry.js';
export { InvocationParser, type ModelOutput } from './parser.js';
export { ToolInvocation, EntityReference, type ArgumentValue, type ReferenceResolver } from './invocation.js';
export { buildCatalogue, createToolRegistry, type CatalogueAdapters } from './catalogue.js';
export { dispatch, entitiesOf, idFor } from './dispatch.js';
export { okResult, notFoundResult, adapterErrorResult } from './result.js';
export type {
  ArgumentType,
  ArgumentSpec,
  ArgumentSchema,
  EntityKind,
  ToolAccess,
  ToolResult,
  ToolSpec,
  ToolStatus,
  ResourceAdapter,
  FetchOptions
} from './types.js';
