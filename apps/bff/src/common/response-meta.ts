import { randomUUID } from 'node:crypto';
import type { Request, Response } from 'express';

export const TRACE_HEADER = 'x-stakevault-trace-id';

export interface ResponseMeta {
  requestId: string;
  timestamp: string;
}

/** Builds response meta and echoes the caller's trace id (or the request id) back. */
export function createResponseMeta(req: Request, res: Response): ResponseMeta {
  const requestId = randomUUID();
  const timestamp = new Date().toISOString();
  const incoming = req.headers[TRACE_HEADER];
  const traceId = typeof incoming === 'string' && incoming ? incoming : requestId;
  res.setHeader(TRACE_HEADER, traceId);
  return { requestId, timestamp };
}
