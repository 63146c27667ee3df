/**
 * @description: Public exports for embedding the posts API in another server.
 * @scope: interface
 * @module: BackendExports
 * @risk: medium - Export changes can break downstream services.
 */

export { createRequestListener } from './app';
export type { RequestListenerDeps } from './app';
export { createPostHandlers, parsePostId } from './handlers/posts';
export { createHealthHandler } from './handlers/health';
export { createMemoryPostStore } from './storage/memoryPostStore';
export type { PostStore } from './storage/postStore';
export type { Post, PostDraft, PostJson } from './models/post';
export { serializePost } from './models/post';
export { parsePostDraft } from './validation/postDraft';
export { ReadWriteLock } from './utils/readWriteLock';
export * from './shared/errors';
export { logger } from './shared/logger';
export { logRequest } from './utils/requestLogger';
