/**
 * Request Validation Middleware Factory
 * Layer: Interfaces (HTTP)
 *
 * `validate(schema, source)` returns a middleware that checks one part of the
 * request against a Zod schema before the controller runs:
 *
 *   router.post('/audit', validate(auditBodySchema, 'body'), controller.audit);
 *
 * On success `req[source]` is replaced with the parsed data, defaults
 * applied. On failure a ValidationError (400) is thrown for the global error
 * handler and the controller is never reached.
 *
 * `query` is not a source: Express 5 exposes req.query as a read-only getter.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';
import type { z } from 'zod/v4';

export function validate<T extends z.ZodType>(schema: T, source: 'body' | 'params') {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req[source]);

    if (!result.success) {
      const messages = result.error.issues.map((issue) => issue.message).join('; ');
      throw new ValidationError(messages);
    }

    (req as unknown as Record<string, unknown>)[source] = result.data;
    next();
  };
}
