/**
 * Transport Interface — the Target Capability Set
 * Layer: Domain
 *
 * The only contract a client may call. A bicycle, a rideshare car and a
 * motorbike have nothing in common at the native level (pedal() vs
 * startEngine()), but once adapted they all answer to these two operations.
 *
 * Every conforming variant must behave uniformly: a variant that throws where
 * its siblings succeed is a contract bug, reported as ContractViolationError
 * by the substitutability audit.
 */
export interface ITransport {
  /** Sets the vehicle in motion. */
  primaryAction(): void;
  /** Read-only; two successive calls return the same value. */
  reportRate(): string;
}

/**
 * Structural check used where a transport arrives from code the type checker
 * cannot see (e.g. a creator registered at runtime).
 */
export function isTransport(candidate: unknown): candidate is ITransport {
  if (typeof candidate !== 'object' || candidate === null) return false;
  return (
    'primaryAction' in candidate &&
    typeof candidate.primaryAction === 'function' &&
    'reportRate' in candidate &&
    typeof candidate.reportRate === 'function'
  );
}
