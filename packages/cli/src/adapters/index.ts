export { JsonPlaceholderAdapter, type JsonPlaceholderOptions, type FetchFn } from './jsonplaceholder.js';
export { PostAdapter } from './post-adapter.js';
export { CommentsAdapter } from './comments-adapter.js';
export type { Post, Comment } from './schemas.js';
