/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * Request/response shapes that no single layer owns. VariantConfig is the
 * per-call config bundle handed to the factory; TripReport is what a client
 * returns after one trip; SubstitutabilityAudit is the per-variant outcome of
 * running the generic client routine.
 */
export type VariantConfig = Record<string, unknown>;

export interface VariantSummary {
  key: string;
  description: string;
}

export interface TripReport {
  variant: string;
  rate: string;
}

export interface VariantAuditResult {
  ok: boolean;
  rate: string | null;
  /** Message of the error the routine raised, if any. */
  error: string | null;
  /** Both reportRate() calls returned the same value. Null when the routine failed first. */
  idempotent: boolean | null;
}

export interface SubstitutabilityAudit {
  uniform: boolean;
  results: Record<string, VariantAuditResult>;
}
