/**
 * Unit Tests — Substitutability Audit
 *
 * Uniform behaviour across variants passes; a variant that throws where its
 * siblings succeed, or whose reportRate() drifts, is a ContractViolationError.
 */
import {
  assertSubstitutable,
  auditSubstitutability,
} from '@application/contracts/substitutability';
import { createDefaultTransportFactory } from '@application/factories/variants';
import { ContractViolationError } from '@shared/errors/AppError';

import { builtInConfigs, emptyTankCarConfig } from '../helpers/fixtures';
import { createMockTransport } from '../helpers/mocks';

describe('auditSubstitutability()', () => {
  it('should find the built-in variants interchangeable', () => {
    const factory = createDefaultTransportFactory();
    const transports = Object.fromEntries(
      Object.entries(builtInConfigs).map(([key, config]) => [key, factory.create(key, config)]),
    );

    const audit = auditSubstitutability(transports);

    expect(audit.uniform).toBe(true);
    expect(audit.results).toEqual({
      car: { ok: true, rate: 'rate:100', error: null, idempotent: true },
      bicycle: { ok: true, rate: 'rate:20', error: null, idempotent: true },
      motorbike: { ok: true, rate: 'rate:60', error: null, idempotent: true },
    });
  });

  it('should flag a variant that fails where the others succeed', () => {
    const factory = createDefaultTransportFactory();

    const audit = auditSubstitutability({
      car: factory.create('car', emptyTankCarConfig),
      bicycle: factory.create('bicycle'),
    });

    expect(audit.uniform).toBe(false);
    expect(audit.results.car).toEqual({
      ok: false,
      rate: null,
      error: 'Out of fuel',
      idempotent: null,
    });
  });

  it('should treat all-failing variants as uniform', () => {
    const a = createMockTransport();
    const b = createMockTransport();
    a.primaryAction.mockImplementation(() => {
      throw new Error('down');
    });
    b.primaryAction.mockImplementation(() => {
      throw new Error('down');
    });

    expect(auditSubstitutability({ a, b }).uniform).toBe(true);
  });

  it('should flag a reportRate() that changes between calls', () => {
    const drifting = createMockTransport();
    drifting.reportRate.mockReturnValueOnce('rate:1').mockReturnValueOnce('rate:2');

    const audit = auditSubstitutability({ drifting, steady: createMockTransport() });

    expect(audit.uniform).toBe(false);
    expect(audit.results.drifting).toEqual({
      ok: true,
      rate: 'rate:1',
      error: null,
      idempotent: false,
    });
  });

  it('should be uniform for an empty set', () => {
    expect(auditSubstitutability({})).toEqual({ uniform: true, results: {} });
  });
});

describe('assertSubstitutable()', () => {
  it('should return the audit when variants are uniform', () => {
    const audit = assertSubstitutable({
      a: createMockTransport('rate:1'),
      b: createMockTransport('rate:2'),
    });

    expect(audit.uniform).toBe(true);
  });

  it('should throw ContractViolationError naming the failing variant', () => {
    const broken = createMockTransport();
    broken.primaryAction.mockImplementation(() => {
      throw new Error('not supported');
    });

    let caught: unknown;
    try {
      assertSubstitutable({ ok: createMockTransport(), broken });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ContractViolationError);
    const error = caught as ContractViolationError;
    expect(error.message).toBe(
      'Transport contract violated (failed where others succeeded: broken)',
    );
    expect(error.variants).toEqual(['broken']);
  });

  it('should name variants whose reportRate() drifts', () => {
    const drifting = createMockTransport();
    drifting.reportRate.mockReturnValueOnce('rate:1').mockReturnValueOnce('rate:2');

    expect(() => assertSubstitutable({ drifting })).toThrow(
      'Transport contract violated (reportRate() not idempotent: drifting)',
    );
  });
});
