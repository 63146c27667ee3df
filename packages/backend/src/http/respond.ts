/**
 * @description: JSON response writers shared by the handlers.
 * @scope: utility
 * @module: HttpResponses
 * @risk: low - Formatting only.
 */
import type { ResponseLike } from './types';

const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';

const sendJson = (res: ResponseLike, statusCode: number, payload: unknown): void => {
  res.statusCode = statusCode;
  res.setHeader('Content-Type', JSON_CONTENT_TYPE);
  res.end(JSON.stringify(payload));
};

const sendError = (res: ResponseLike, statusCode: number, message: string, extra: Record<string, unknown> = {}): void => {
  sendJson(res, statusCode, { error: message, ...extra });
};

const sendNoContent = (res: ResponseLike): void => {
  res.statusCode = 204;
  res.end();
};

export { sendJson, sendError, sendNoContent, JSON_CONTENT_TYPE };
