export { ConversationContext, type ConversationSnapshot, type Exchange } from './conversation-context.js';
export { SessionStore, type SessionStoreOptions, type SessionTurn } from './session-store.js';
export { classifyReference, anaphorPattern, type ReferenceForm } from './references.js';
