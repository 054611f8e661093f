/**
 * Transport Controller — HTTP Boundary for Dispatch
 * Layer: Interfaces (HTTP)
 *
 * Thin on purpose: read params and the validated body, call DispatchService,
 * send JSON. Handlers are arrow functions so `this` stays bound when Express
 * invokes them.
 */
/// <reference path="../../../shared/express.d.ts" />
import type { DispatchService } from '@application/services/DispatchService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { AuditBody, TripBody } from '@interfaces/http/schemas';
import type { Request, Response } from 'express';

export class TransportController {
  private service: DispatchService;

  constructor() {
    this.service = container.resolve<DispatchService>(TOKENS.DispatchService);
  }

  list = (_req: Request, res: Response): void => {
    res.status(200).json({
      status: 'success',
      data: this.service.listVariants(),
    });
  };

  trip = (req: Request<{ variant: string }>, res: Response): void => {
    const { variant } = req.params;
    const { config } = req.body as TripBody;

    const report = this.service.dispatch(variant, config);

    const totalTimeMs =
      req.requestStartTime != null ? Math.round(Date.now() - req.requestStartTime) : undefined;

    res.status(200).json({
      status: 'success',
      data: report,
      ...(totalTimeMs != null && { meta: { totalTimeMs } }),
    });
  };

  audit = (req: Request, res: Response): void => {
    const { configs } = req.body as AuditBody;

    res.status(200).json({
      status: 'success',
      data: this.service.audit(configs),
    });
  };
}
