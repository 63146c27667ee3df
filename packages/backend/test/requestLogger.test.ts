/**
 * @description: Ensures request log lines carry method, path and status without query strings.
 * @scope: test
 * @module: RequestLoggerTests
 * @risk: low - Guards against search terms leaking into logs.
 */
import test from 'node:test';
import assert from 'node:assert/strict';
import { Writable } from 'node:stream';
import { transports } from 'winston';

import { logger } from '../src/shared/logger';
import { logRequest } from '../src/utils/requestLogger';
import { FakeResponse, createFakeRequest } from './helpers/httpFakes';

const ANSI_PATTERN = /\u001b\[\d+m/g;

test('logRequest writes one line with the path but not the query string', async () => {
  const lines: string[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString().replace(ANSI_PATTERN, ''));
      callback();
    }
  });
  const capture = new transports.Stream({ stream: sink });
  logger.add(capture);

  try {
    const res = new FakeResponse();
    res.statusCode = 200;
    logRequest(createFakeRequest({ method: 'GET', url: '/posts?term=private-search' }), res, 'post list count=0');
    await new Promise<void>((resolve) => setImmediate(resolve));
  } finally {
    logger.remove(capture);
  }

  assert.equal(lines.length, 1);
  assert.match(lines[0], /\[info\]: \[\d{4}-\d{2}-\d{2}T[^\]]+Z\] GET \/posts -> 200 post list count=0\s*$/);
});
