/**
 * @description: Runs the request listener behind node:http on a loopback port to cover socket-level body handling.
 * @scope: test
 * @module: PostServerTests
 * @risk: low - Binds an ephemeral port on 127.0.0.1 only.
 */
import http from 'node:http';
import test from 'node:test';
import assert from 'node:assert/strict';

import { createRequestListener } from '../src/app';
import { createMemoryPostStore } from '../src/storage/memoryPostStore';
import { createRecordingLogger } from './helpers/httpFakes';

type ClientResponse = {
  statusCode: number;
  body: string;
};

const startServer = async (maxBodyBytes: number) => {
  const { logRequest } = createRecordingLogger();
  const listener = createRequestListener({
    postStore: createMemoryPostStore(),
    logRequest,
    collectionPath: '/posts',
    maxBodyBytes
  });

  const server = http.createServer((req, res) => {
    listener(req, res).catch((error: unknown) => {
      res.statusCode = 500;
      res.end(error instanceof Error ? error.message : String(error));
    });
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));

  const address = server.address();
  assert.ok(address && typeof address === 'object', 'server should listen on a TCP port');

  const close = () => new Promise<void>((resolve, reject) => {
    server.closeAllConnections();
    server.close((error) => (error ? reject(error) : resolve()));
  });

  return { port: address.port, close };
};

// Writes the body in separate chunks with chunked transfer encoding, so no content-length is announced.
const sendChunked = (port: number, path: string, chunks: string[]): Promise<ClientResponse> =>
  new Promise<ClientResponse>((resolve, reject) => {
    const req = http.request(
      {
        host: '127.0.0.1',
        port,
        path,
        method: 'POST',
        agent: false,
        headers: {
          'content-type': 'application/json',
          'transfer-encoding': 'chunked'
        }
      },
      (res) => {
        const received: Buffer[] = [];
        res.on('data', (chunk: Buffer) => received.push(chunk));
        res.on('end', () => resolve({
          statusCode: res.statusCode ?? 0,
          body: Buffer.concat(received).toString('utf8')
        }));
        res.on('error', reject);
      }
    );
    req.on('error', reject);
    for (const chunk of chunks) {
      req.write(chunk);
    }
    req.end();
  });

test('an unannounced oversized body gets a 413 response over a real socket', async () => {
  const { port, close } = await startServer(16);

  try {
    const response = await sendChunked(port, '/posts', [
      '{"title":"abcdefghijklmnop",',
      '"content":"qrstuvwxyz0123456789",',
      '"category":"chunked"}'
    ]);

    assert.equal(response.statusCode, 413);
    assert.deepEqual(JSON.parse(response.body), { error: 'request body too large' });
  } finally {
    await close();
  }
});

test('a chunked body under the cap is created over a real socket', async () => {
  const { port, close } = await startServer(1024);

  try {
    const response = await sendChunked(port, '/posts', ['{"title":"Socket",', '"content":"post"}']);

    assert.equal(response.statusCode, 201);
    const created: { id: number; title: string; content: string } = JSON.parse(response.body);
    assert.equal(created.id, 1);
    assert.equal(created.title, 'Socket');
    assert.equal(created.content, 'post');
  } finally {
    await close();
  }
});
