/**
 * @description: Boots the posts API over node:http with the in-memory store.
 * @scope: core
 * @module: WebServer
 * @risk: high - Server failures make the API unavailable; all posts live only in this process.
 */
import http from 'node:http';

import { runtimeConfig } from './config';
import { createRequestListener } from './app';
import { createMemoryPostStore } from './storage/memoryPostStore';
import { logRequest } from './utils/requestLogger';
import { logger } from './shared/logger';

// --- Storage ---
const postStore = createMemoryPostStore();

// --- Handler wiring ---
const requestListener = createRequestListener({
  postStore,
  logRequest,
  collectionPath: runtimeConfig.posts.collectionPath,
  maxBodyBytes: runtimeConfig.posts.maxBodyBytes
});

// --- HTTP server ---
const server = http.createServer((req, res) => {
  requestListener(req, res).catch((error: unknown) => {
    logger.error(`Unhandled request failure: ${error instanceof Error ? error.message : String(error)}`);
    if (!res.headersSent) {
      res.statusCode = 500;
      res.end('Internal Server Error');
    }
  });
});

// --- Server startup ---
const { host, port } = runtimeConfig.server;
server.listen(port, host, () => {
  logger.info(`Posts API available on ${host}:${port} (collection ${runtimeConfig.posts.collectionPath})`);
});
