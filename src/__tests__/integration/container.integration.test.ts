/**
 * Integration Tests — DI Container Wiring
 *
 * Resolves the real registrations from core/container.ts and runs one trip
 * end to end, without HTTP.
 */
import { TransportClient } from '@application/clients/TransportClient';
import { TransportFactory } from '@application/factories/TransportFactory';
import { DispatchService } from '@application/services/DispatchService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';

describe('container', () => {
  it('should resolve the shared factory with the built-in variants', () => {
    const factory = container.resolve<TransportFactory>(TOKENS.TransportFactory);

    expect(factory).toBeInstanceOf(TransportFactory);
    expect(factory.list().map((v) => v.key)).toEqual(['car', 'bicycle', 'motorbike']);
    expect(container.resolve(TOKENS.TransportFactory)).toBe(factory);
  });

  it('should resolve the client', () => {
    expect(container.resolve(TOKENS.TransportClient)).toBeInstanceOf(TransportClient);
  });

  it('should resolve a DispatchService that can dispatch', () => {
    const service = container.resolve<DispatchService>(TOKENS.DispatchService);

    expect(service).toBeInstanceOf(DispatchService);
    expect(service.dispatch('motorbike', { fuelLitres: 3 })).toEqual({
      variant: 'motorbike',
      rate: 'rate:60',
    });
  });
});
