/**
 * Comments Adapter - GET /comments?postId={id}
 *
 * The upstream answers an unknown post with an empty list, so an empty list
 * is a successful lookup.
 */

import { JsonPlaceholderAdapter, type PayloadCheck } from './jsonplaceholder.js';
import { CommentListSchema, type Comment } from './schemas.js';

export class CommentsAdapter extends JsonPlaceholderAdapter<Comment[]> {
  readonly toolName = 'comments_call';
  protected readonly idLabel = 'post_id';
  protected readonly resource = 'comments for post';
  protected readonly schema = CommentListSchema;

  protected buildPath(id: number): string {
    return `/comments?${new URLSearchParams({ postId: String(id) }).toString()}`;
  }

  protected checkPayload(body: unknown): PayloadCheck<Comment[]> {
    if (!Array.isArray(body)) {
      return { ok: false, error: 'expected a list of comments' };
    }
    return super.checkPayload(body);
  }
}
