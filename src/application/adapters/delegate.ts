import { DelegationError } from '@shared/errors/AppError';

/**
 * Runs one native call on an Adaptee. A native failure surfaces as a
 * DelegationError; the original error is its `cause` and its message is kept.
 */
export function delegate<T>(operation: string, call: () => T): T {
  try {
    return call();
  } catch (err) {
    throw new DelegationError(operation, err);
  }
}
