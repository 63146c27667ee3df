/**
 * @description: Provides structured request logging for backend endpoints.
 * @scope: utility
 * @module: RequestLogger
 * @risk: low - Logging failures reduce observability but do not block requests.
 */
import type { RequestLike, ResponseLike } from '../http/types';
import { logger } from '../shared/logger';

/**
 * Builds a one-line log entry per request.
 */
function logRequest(req: RequestLike, res: ResponseLike, extra = ''): void {
  // --- Timestamp ---
  const timestamp = new Date().toISOString();

  // --- URL sanitization ---
  // Search terms arrive in the query string and are user content; log the path only.
  let logUrl = req.url;
  if (req.url && req.url.includes('?')) {
    try {
      logUrl = new URL(req.url, 'http://localhost').pathname;
    } catch {
      logUrl = req.url.split('?')[0];
    }
  }

  // --- Emit ---
  logger.info(`[${timestamp}] ${req.method} ${logUrl} -> ${res.statusCode} ${extra}`.trim());
}

export { logRequest };
