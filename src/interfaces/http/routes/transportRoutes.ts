/**
 * Transport Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api/v1/transports` in app.ts:
 *
 *   GET  /api/v1/transports                  →  controller.list
 *   POST /api/v1/transports/audit            →  controller.audit
 *   POST /api/v1/transports/:variant/trips   →  controller.trip
 */
import { TransportController } from '@interfaces/http/controllers/TransportController';
import { validate } from '@interfaces/http/middleware/validation';
import { auditBodySchema, tripBodySchema } from '@interfaces/http/schemas';
import { Router } from 'express';

const router = Router();
const controller = new TransportController();

router.get('/', controller.list);
router.post('/audit', validate(auditBodySchema, 'body'), controller.audit);
router.post('/:variant/trips', validate(tripBodySchema, 'body'), controller.trip);

export { router as transportRoutes };
