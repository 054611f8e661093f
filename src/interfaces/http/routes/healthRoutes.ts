/**
 * Health Check Route
 * Layer: Interfaces (HTTP)
 *
 *   GET /api/v1/health  →  { status: 'ok', variants: ['car', ...], uptime, timestamp }
 *
 * `variants` is read from the container's TransportFactory on every call,
 * so a health check also confirms that DI wiring produced a usable registry.
 */
import type { TransportFactory } from '@application/factories/TransportFactory';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { Router } from 'express';

const router = Router();

router.get('/health', (_req, res) => {
  const factory = container.resolve<TransportFactory>(TOKENS.TransportFactory);

  res.status(200).json({
    status: 'ok',
    variants: factory.list().map((variant) => variant.key),
    uptime: Math.round(process.uptime()),
    timestamp: new Date().toISOString(),
  });
});

export { router as healthRoutes };
