/**
 * @description: Typed failures raised by the post store and request decoding.
 * @scope: utility
 * @module: BackendErrors
 * @risk: medium - Handlers map these classes to HTTP status codes; a wrong class means a wrong status.
 */

// --- Store failures ---
export class PostNotFoundError extends Error {
  readonly postId: number;

  constructor(postId: number) {
    super(`post with id ${postId} not found`);
    this.name = 'PostNotFoundError';
    this.postId = postId;
  }
}

/**
 * Unexpected backend failure. The in-memory store never raises it; other
 * backends wrap their driver errors in it.
 */
export class PostStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PostStoreError';
  }
}

// --- Request decoding failures ---
export class RequestBodyError extends Error {
  constructor(message = 'invalid request body') {
    super(message);
    this.name = 'RequestBodyError';
  }
}

export class RequestBodyTooLargeError extends Error {
  readonly limitBytes: number;

  constructor(limitBytes: number) {
    super(`request body exceeds ${limitBytes} bytes`);
    this.name = 'RequestBodyTooLargeError';
    this.limitBytes = limitBytes;
  }
}

export class RequestValidationError extends Error {
  readonly fields: string[];

  constructor(fields: string[]) {
    super('title and content are required');
    this.name = 'RequestValidationError';
    this.fields = fields;
  }
}
