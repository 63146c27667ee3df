/**
 * @description: Minimal request/response shapes the handlers rely on. `node:http` objects satisfy them.
 * @scope: interface
 * @module: HttpTypes
 * @risk: low - Type-only module.
 */
import type { IncomingHttpHeaders } from 'node:http';
import type { Readable } from 'node:stream';

export type RequestLike = Readable & {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
};

export interface ResponseLike {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body?: string): unknown;
}

export type LogRequest = (req: RequestLike, res: ResponseLike, extra?: string) => void;
