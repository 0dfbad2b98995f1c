/**
 * Post Adapter - GET /posts/{id}
 */

import { JsonPlaceholderAdapter } from './jsonplaceholder.js';
import { PostSchema, type Post } from './schemas.js';

export class PostAdapter extends JsonPlaceholderAdapter<Post> {
  readonly toolName = 'post_call';
  protected readonly idLabel = 'post_id';
  protected readonly resource = 'post';
  protected readonly schema = PostSchema;

  protected buildPath(id: number): string {
    return `/posts/${id}`;
  }
}
