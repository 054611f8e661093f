/**
 * Request Body Schemas
 * Layer: Interfaces (HTTP)
 *
 * Shape-only checks at the HTTP boundary. Per-variant options inside
 * `config` are NOT checked here; each variant's own configSchema does that,
 * applied by TransportFactory.create().
 *
 * `configs` is turned into [variant, config] entries straight from the raw
 * body. A record schema would rebuild the object and lose own keys such as
 * "__proto__", and an unregistered key must reach the factory to fail there.
 */
import { z } from 'zod/v4';

const configBundle = z.record(z.string(), z.unknown());

export const tripBodySchema = z
  .object({
    config: configBundle.default({}),
  })
  .default({ config: {} });

export const auditBodySchema = z.object({
  configs: z
    .custom<object>(
      (value) => typeof value === 'object' && value !== null && !Array.isArray(value),
      'configs must be an object keyed by variant',
    )
    .transform((configs) => Object.entries(configs))
    .pipe(
      z
        .array(z.tuple([z.string(), configBundle]))
        .min(1, 'configs must name at least one variant'),
    ),
});

export type TripBody = z.output<typeof tripBodySchema>;
export type AuditBody = z.output<typeof auditBodySchema>;
