/**
 * Built-in Transport Variants
 * Layer: Application
 *
 *   car        { apiKey, fuelLitres? }  → EngineAdapter(Car)        rate:100
 *   bicycle    {}                       → PedalAdapter(Bicycle)     rate:20
 *   motorbike  { fuelLitres? }          → EngineAdapter(Motorbike)  rate:60
 *
 * Schemas are strict: an option a variant does not recognise is rejected
 * rather than ignored.
 */
import { EngineAdapter } from '@application/adapters/EngineAdapter';
import { PedalAdapter } from '@application/adapters/PedalAdapter';
import { Bicycle } from '@domain/entities/Bicycle';
import { Car } from '@domain/entities/Car';
import { Motorbike } from '@domain/entities/Motorbike';
import type { IVariantDefinition } from '@domain/interfaces/IVariantDefinition';
import { VARIANTS } from '@shared/constants';
import { z } from 'zod/v4';

import { TransportFactory } from './TransportFactory';

/** Keeps the creator's parameter typed from its own schema. */
export function defineVariant<TSchema extends z.ZodType>(
  definition: IVariantDefinition<TSchema>,
): IVariantDefinition<TSchema> {
  return definition;
}

const fuelLitres = z.number().min(0).optional();

export const carVariant = defineVariant({
  key: VARIANTS.CAR,
  description: 'Rideshare car booked through a provider API',
  configSchema: z.strictObject({
    apiKey: z.string().min(1, 'apiKey is required'),
    fuelLitres,
  }),
  create: (config) => new EngineAdapter(new Car(config)),
});

export const bicycleVariant = defineVariant({
  key: VARIANTS.BICYCLE,
  description: 'Pedal bicycle',
  configSchema: z.strictObject({}),
  create: () => new PedalAdapter(new Bicycle()),
});

export const motorbikeVariant = defineVariant({
  key: VARIANTS.MOTORBIKE,
  description: 'Petrol motorbike',
  configSchema: z.strictObject({ fuelLitres }),
  create: (config) => new EngineAdapter(new Motorbike(config)),
});

export const builtInVariants: readonly IVariantDefinition[] = [
  carVariant,
  bicycleVariant,
  motorbikeVariant,
];

export function createDefaultTransportFactory(): TransportFactory {
  const factory = new TransportFactory();
  for (const variant of builtInVariants) {
    factory.register(variant);
  }
  return factory;
}
