/**
 * Unit Tests — DispatchService
 *
 * The service wires factory → client. The real factory and client are used
 * (neither touches I/O); only the logger is silenced.
 */
import { TransportClient } from '@application/clients/TransportClient';
import { createDefaultTransportFactory } from '@application/factories/variants';
import { DispatchService } from '@application/services/DispatchService';
import {
  ContractViolationError,
  DelegationError,
  UnknownVariantError,
  ValidationError,
} from '@shared/errors/AppError';

import { bicycleConfig, carConfig, emptyTankCarConfig } from '../helpers/fixtures';
import { createSilentLogger } from '../helpers/mocks';

describe('DispatchService', () => {
  let service: DispatchService;

  beforeEach(() => {
    const logger = createSilentLogger();
    service = new DispatchService(
      createDefaultTransportFactory(),
      new TransportClient(logger),
      logger,
    );
  });

  describe('dispatch()', () => {
    it('should return the trip report for a car', () => {
      expect(service.dispatch('car', carConfig)).toEqual({ variant: 'car', rate: 'rate:100' });
    });

    it('should return the trip report for a bicycle', () => {
      expect(service.dispatch('bicycle', bicycleConfig)).toEqual({
        variant: 'bicycle',
        rate: 'rate:20',
      });
    });

    it('should surface UnknownVariantError', () => {
      expect(() => service.dispatch('unknown')).toThrow(UnknownVariantError);
    });

    it('should surface ValidationError for a bad config bundle', () => {
      expect(() => service.dispatch('car', {})).toThrow(ValidationError);
    });

    it('should surface DelegationError from the adaptee', () => {
      expect(() => service.dispatch('car', emptyTankCarConfig)).toThrow(DelegationError);
    });
  });

  describe('listVariants()', () => {
    it('should list the built-in keys', () => {
      expect(service.listVariants().map((v) => v.key)).toEqual(['car', 'bicycle', 'motorbike']);
    });
  });

  describe('audit()', () => {
    it('should pass for the built-in variants', () => {
      const audit = service.audit([
        ['car', carConfig],
        ['bicycle', bicycleConfig],
      ]);

      expect(audit.uniform).toBe(true);
      expect(Object.keys(audit.results)).toEqual(['car', 'bicycle']);
    });

    it('should throw ContractViolationError when one variant cannot move', () => {
      expect(() =>
        service.audit([
          ['car', emptyTankCarConfig],
          ['bicycle', bicycleConfig],
        ]),
      ).toThrow(ContractViolationError);
    });

    it('should reject an unknown variant before auditing', () => {
      expect(() =>
        service.audit([
          ['bicycle', {}],
          ['hovercraft', {}],
        ]),
      ).toThrow(UnknownVariantError);
    });

    it('should not let a "__proto__" key slip past the registry', () => {
      let caught: unknown;
      try {
        service.audit([
          ['__proto__', { apiKey: 'test-key' }],
          ['bicycle', {}],
        ]);
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(UnknownVariantError);
      expect((caught as UnknownVariantError).variant).toBe('__proto__');
    });
  });
});
