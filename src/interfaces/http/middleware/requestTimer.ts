/// <reference path="../../../shared/express.d.ts" />
/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Stamps req.requestStartTime as the request enters the pipeline; the read
 * endpoints report `meta.totalTimeMs` from it. Registered first so the
 * measurement includes body parsing and logging.
 */
import type { NextFunction, Request, Response } from 'express';

export function requestTimer(req: Request, _res: Response, next: NextFunction): void {
  req.requestStartTime = Date.now();
  next();
}

/** Milliseconds since requestTimer ran, or undefined when it did not. */
export function elapsedMs(req: Request): number | undefined {
  return req.requestStartTime != null ? Math.round(Date.now() - req.requestStartTime) : undefined;
}
