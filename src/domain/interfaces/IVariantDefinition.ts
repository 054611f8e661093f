/**
 * Variant Definition — one entry in the TransportFactory registry
 * Layer: Domain
 * Pattern: Factory Method (the creation contract)
 *
 * A definition pairs a discriminator with:
 *   - configSchema: the Zod schema listing the options this variant accepts
 *     (e.g. `{ apiKey }` for the rideshare car, `{}` for a bicycle);
 *   - create(): the creation step, handed the already-validated config.
 *
 * The creator's return type is ITransport, never a concrete vehicle, so
 * nothing downstream of the factory can reach the Adaptee.
 */
import type { ITransport } from '@domain/interfaces/ITransport';
import type { z } from 'zod/v4';

export interface IVariantDefinition<TSchema extends z.ZodType = z.ZodType> {
  key: string;
  description: string;
  configSchema: TSchema;
  create(config: z.output<TSchema>): ITransport;
}
