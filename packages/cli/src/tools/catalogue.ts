/**
 * Tool Catalogue
 *
 * The tools Switchboard exposes to the model.
 */

import type { Comment, Post } from '../adapters/index.js';
import { ToolRegistry } from './registry.js';
import type { ResourceAdapter, ToolSpec } from './types.js';

export interface CatalogueAdapters {
  post: ResourceAdapter<Post>;
  comments: ResourceAdapter<Comment[]>;
}

export function buildCatalogue(adapters: CatalogueAdapters): ToolSpec[] {
  return [
    {
      name: 'post_call',
      description: 'Fetch a post.',
      arguments: {
        post_id: {
          type: 'integer',
          required: true,
          description: 'Id of the post',
          entity: 'post'
        }
      },
      idArgument: 'post_id',
      adapter: adapters.post,
      access: { scopes: ['posts:read'] }
    },
    {
      name: 'comments_call',
      description: 'Fetch comments for a post.',
      arguments: {
        post_id: {
          type: 'integer',
          required: true,
          description: 'Id of the post whose comments to fetch',
          entity: 'post'
        }
      },
      idArgument: 'post_id',
      adapter: adapters.comments,
      access: { scopes: ['comments:read'] }
    }
  ];
}

/**
 * Registry with the full catalogue registered. Called once at startup.
 */
export function createToolRegistry(adapters: CatalogueAdapters): ToolRegistry {
  const registry = new ToolRegistry();
  for (const spec of buildCatalogue(adapters)) {
    registry.register(spec);
  }
  return registry;
}
