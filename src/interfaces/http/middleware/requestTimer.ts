/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Stamps req.requestStartTime as the request enters the pipeline; the
 * controller turns it into meta.totalTimeMs. Registered first in app.ts.
 */
/// <reference path="../../../shared/express.d.ts" />
import type { NextFunction, Request, Response } from 'express';

export function requestTimer(req: Request, _res: Response, next: NextFunction): void {
  req.requestStartTime = Date.now();
  next();
}
