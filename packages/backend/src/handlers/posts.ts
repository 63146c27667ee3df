/**
 * @description: Handles post collection and item endpoints: routing by method, body decoding and store error mapping.
 * @scope: backend
 * @module: PostHandlers
 * @risk: high - Wrong status mapping breaks every client of the API.
 */
import type { LogRequest, RequestLike, ResponseLike } from '../http/types';
import { readRequestBody } from '../http/body';
import { sendError, sendJson, sendNoContent } from '../http/respond';
import { serializePost } from '../models/post';
import type { PostStore } from '../storage/postStore';
import {
  PostNotFoundError,
  RequestBodyError,
  RequestBodyTooLargeError,
  RequestValidationError
} from '../shared/errors';
import { logger } from '../shared/logger';
import { parsePostDraft } from '../validation/postDraft';

type PostHandlerDeps = {
  postStore: PostStore;
  logRequest: LogRequest;
  maxBodyBytes: number;
};

// Largest value a signed 64-bit id can hold.
const MAX_POST_ID = 9223372036854775807n;
// Ids the store can hand out stay within exact number precision.
const MAX_ADDRESSABLE_ID = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Parses a path token as a non-negative decimal id. Returns null for anything
 * else, including signs, whitespace and values past the 64-bit range.
 * Percent-encoded digits are decoded first.
 */
const parsePostId = (token: string): bigint | null => {
  let decoded: string;
  try {
    decoded = decodeURIComponent(token);
  } catch {
    return null;
  }

  if (!/^\d+$/.test(decoded)) {
    return null;
  }
  const id = BigInt(decoded);
  return id > MAX_POST_ID ? null : id;
};

type PostOperation = 'list' | 'create' | 'get' | 'update' | 'delete';

const FAILURE_MESSAGES: Record<PostOperation, string> = {
  list: 'Failed to get posts',
  create: 'Failed to create post',
  get: 'Failed to get post',
  update: 'Failed to update post',
  delete: 'Failed to delete post'
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : 'unknown error');

// --- Handler factory ---
const createPostHandlers = ({ postStore, logRequest, maxBodyBytes }: PostHandlerDeps) => {
  // --- Shared failure mapping ---
  const respondWithFailure = (req: RequestLike, res: ResponseLike, operation: PostOperation, error: unknown): void => {
    if (error instanceof RequestValidationError) {
      sendError(res, 400, error.message, { fields: error.fields });
      logRequest(req, res, `post ${operation} validation fields=${error.fields.join(',')}`);
      return;
    }

    if (error instanceof RequestBodyError) {
      sendError(res, 400, error.message);
      logRequest(req, res, `post ${operation} invalid-body`);
      return;
    }

    if (error instanceof RequestBodyTooLargeError) {
      sendError(res, 413, 'request body too large');
      logRequest(req, res, `post ${operation} payload-too-large limit=${error.limitBytes}`);
      return;
    }

    if (error instanceof PostNotFoundError) {
      sendError(res, 404, error.message);
      logRequest(req, res, `post ${operation} missing id=${error.postId}`);
      return;
    }

    logger.error(`Post ${operation} failed: ${describeError(error)}`);
    sendError(res, 500, FAILURE_MESSAGES[operation]);
    logRequest(req, res, `post ${operation} error ${describeError(error)}`);
  };

  // --- Collection operations ---
  const handleListPosts = async (req: RequestLike, res: ResponseLike, parsedUrl: URL): Promise<void> => {
    try {
      const term = parsedUrl.searchParams.get('term') ?? '';
      const posts = await postStore.list(term);
      sendJson(res, 200, posts.map(serializePost));
      logRequest(req, res, `post list count=${posts.length}`);
    } catch (error) {
      respondWithFailure(req, res, 'list', error);
    }
  };

  const handleCreatePost = async (req: RequestLike, res: ResponseLike): Promise<void> => {
    try {
      const body = await readRequestBody(req, maxBodyBytes);
      const draft = parsePostDraft(body);
      const id = await postStore.create(draft);

      // Respond with the stored record so server-assigned fields are included.
      const created = await postStore.get(id);
      sendJson(res, 201, serializePost(created));
      logRequest(req, res, `post create id=${id}`);
    } catch (error) {
      respondWithFailure(req, res, 'create', error);
    }
  };

  // --- Item operations ---
  const handleGetPost = async (req: RequestLike, res: ResponseLike, id: number): Promise<void> => {
    try {
      const post = await postStore.get(id);
      sendJson(res, 200, serializePost(post));
      logRequest(req, res, `post get id=${id}`);
    } catch (error) {
      respondWithFailure(req, res, 'get', error);
    }
  };

  const handleUpdatePost = async (req: RequestLike, res: ResponseLike, id: number): Promise<void> => {
    try {
      const body = await readRequestBody(req, maxBodyBytes);
      const draft = parsePostDraft(body);
      const updated = await postStore.update(id, draft);
      sendJson(res, 200, serializePost(updated));
      logRequest(req, res, `post update id=${id}`);
    } catch (error) {
      respondWithFailure(req, res, 'update', error);
    }
  };

  const handleDeletePost = async (req: RequestLike, res: ResponseLike, id: number): Promise<void> => {
    try {
      await postStore.delete(id);
      sendNoContent(res);
      logRequest(req, res, `post delete id=${id}`);
    } catch (error) {
      respondWithFailure(req, res, 'delete', error);
    }
  };

  // --- Routing ---
  const handlePostCollectionRequest = async (req: RequestLike, res: ResponseLike, parsedUrl: URL): Promise<void> => {
    switch (req.method) {
      case 'GET':
        await handleListPosts(req, res, parsedUrl);
        return;
      case 'POST':
        await handleCreatePost(req, res);
        return;
      default:
        res.setHeader('Allow', 'GET, POST');
        sendError(res, 405, 'Method not allowed');
        logRequest(req, res, 'post collection method-not-allowed');
    }
  };

  const handlePostItemRequest = async (req: RequestLike, res: ResponseLike, token: string): Promise<void> => {
    // The id is checked before the method so a bad path is always a 400.
    const parsedId = parsePostId(token);
    if (parsedId === null) {
      sendError(res, 400, 'invalid identifier');
      logRequest(req, res, 'post invalid-id');
      return;
    }

    // Well-formed but beyond any id the store can assign; never round it onto a real one.
    if (parsedId > MAX_ADDRESSABLE_ID) {
      sendError(res, 404, `post with id ${parsedId} not found`);
      logRequest(req, res, `post unaddressable id=${parsedId}`);
      return;
    }
    const id = Number(parsedId);

    switch (req.method) {
      case 'GET':
        await handleGetPost(req, res, id);
        return;
      case 'PUT':
        await handleUpdatePost(req, res, id);
        return;
      case 'DELETE':
        await handleDeletePost(req, res, id);
        return;
      default:
        res.setHeader('Allow', 'GET, PUT, DELETE');
        sendError(res, 405, 'Method not allowed');
        logRequest(req, res, 'post item method-not-allowed');
    }
  };

  return { handlePostCollectionRequest, handlePostItemRequest };
};

export { createPostHandlers, parsePostId };
export type { PostHandlerDeps };
