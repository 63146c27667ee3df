/**
 * @description: Top-level request dispatch for the posts API.
 * @scope: core
 * @module: RequestListener
 * @risk: high - Dispatch errors make every endpoint unreachable.
 */
import type { LogRequest, RequestLike, ResponseLike } from './http/types';
import { sendError } from './http/respond';
import type { PostStore } from './storage/postStore';
import { createPostHandlers } from './handlers/posts';
import { createHealthHandler } from './handlers/health';

type RequestListenerDeps = {
  postStore: PostStore;
  logRequest: LogRequest;
  collectionPath: string;
  maxBodyBytes: number;
};

const HEALTH_PATH = '/health';

const createRequestListener = ({ postStore, logRequest, collectionPath, maxBodyBytes }: RequestListenerDeps) => {
  const { handlePostCollectionRequest, handlePostItemRequest } = createPostHandlers({
    postStore,
    logRequest,
    maxBodyBytes
  });
  const handleHealthRequest = createHealthHandler({ logRequest });
  const itemPrefix = `${collectionPath}/`;

  return async (req: RequestLike, res: ResponseLike): Promise<void> => {
    // --- Early request guard ---
    if (!req.url) {
      res.statusCode = 400;
      res.end('Bad Request');
      return;
    }

    // A leading `//` would be read as a host by the URL parser.
    if (req.url.startsWith('//')) {
      sendError(res, 400, 'invalid request target');
      logRequest(req, res, 'invalid-target');
      return;
    }

    try {
      // --- URL parsing ---
      const parsedUrl = new URL(req.url, 'http://localhost');
      const { pathname } = parsedUrl;

      if (pathname === HEALTH_PATH) {
        await handleHealthRequest(req, res);
        return;
      }

      // A bare trailing slash still addresses the collection.
      if (pathname === collectionPath || pathname === itemPrefix) {
        await handlePostCollectionRequest(req, res, parsedUrl);
        return;
      }

      if (pathname.startsWith(itemPrefix)) {
        await handlePostItemRequest(req, res, pathname.slice(itemPrefix.length));
        return;
      }

      sendError(res, 404, 'Not found');
      logRequest(req, res, 'no route');
    } catch (error) {
      sendError(res, 500, 'Internal server error');
      logRequest(req, res, error instanceof Error ? error.message : 'unknown error');
    }
  };
};

export { createRequestListener };
export type { RequestListenerDeps };
