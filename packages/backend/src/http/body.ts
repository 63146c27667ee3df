/**
 * @description: Reads request bodies with a byte cap.
 * @scope: utility
 * @module: RequestBody
 * @risk: medium - Unbounded reads let one client exhaust memory.
 */
import { RequestBodyTooLargeError } from '../shared/errors';
import type { RequestLike } from './types';

const readRequestBody = async (req: RequestLike, maxBytes: number): Promise<string> => {
  // Reject early when the client announces an oversized payload.
  const contentLengthHeader = req.headers['content-length'];
  if (contentLengthHeader) {
    const contentLength = Number(contentLengthHeader);
    if (Number.isFinite(contentLength) && contentLength > maxBytes) {
      throw new RequestBodyTooLargeError(maxBytes);
    }
  }

  const chunks: Buffer[] = [];
  let receivedBytes = 0;

  await new Promise<void>((resolve, reject) => {
    const onData = (chunk: Buffer | string) => {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      receivedBytes += buffer.length;
      if (receivedBytes > maxBytes) {
        // Drain and discard the rest so the socket stays usable for the 413 response.
        req.off('data', onData);
        req.resume();
        reject(new RequestBodyTooLargeError(maxBytes));
        return;
      }
      chunks.push(buffer);
    };

    req.on('data', onData);
    req.on('end', () => resolve());
    req.on('error', reject);
  });

  return Buffer.concat(chunks).toString('utf8');
};

export { readRequestBody };
