/**
 * Test Fixtures — Reusable Config Bundles
 * Layer: Test Helpers
 *
 * Config bundles handed to TransportFactory.create(). The apiKey is a
 * placeholder; nothing here ever leaves the process.
 */
import type { VariantConfig } from '@shared/types';

export const carConfig: VariantConfig = { apiKey: 'test-key' };

export const emptyTankCarConfig: VariantConfig = { apiKey: 'test-key', fuelLitres: 0 };

export const bicycleConfig: VariantConfig = {};

export const motorbikeConfig: VariantConfig = { fuelLitres: 5 };

/** One valid bundle per built-in variant. */
export const builtInConfigs: Record<string, VariantConfig> = {
  car: carConfig,
  bicycle: bicycleConfig,
  motorbike: motorbikeConfig,
};
