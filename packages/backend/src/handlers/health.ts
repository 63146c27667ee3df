/**
 * @description: Liveness endpoint for load balancers and container health checks.
 * @scope: backend
 * @module: HealthHandler
 * @risk: low - A failing check restarts the process but loses no request.
 */
import type { LogRequest, RequestLike, ResponseLike } from '../http/types';
import { sendJson } from '../http/respond';

// --- Handler factory ---
// Answers every method: health checkers differ in the verb they send.
const createHealthHandler = ({ logRequest }: { logRequest: LogRequest }) =>
  async (req: RequestLike, res: ResponseLike): Promise<void> => {
    res.setHeader('Cache-Control', 'no-store');
    sendJson(res, 200, { status: 'ok' });
    logRequest(req, res, 'health ok');
  };

export { createHealthHandler };
