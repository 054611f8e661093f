/**
 * Substitutability Audit
 * Layer: Application
 *
 * Runs the same generic client routine against every variant:
 *
 *   primaryAction() → reportRate() → reportRate()
 *
 * and records what happened. Variants that all succeed, or all fail, behave
 * uniformly. A mix of the two, or a reportRate() that changes between two
 * successive calls, means some variant does not honour the ITransport
 * contract; assertSubstitutable() turns that into a ContractViolationError
 * naming the offenders.
 */
import type { ITransport } from '@domain/interfaces/ITransport';
import { ContractViolationError } from '@shared/errors/AppError';
import type { SubstitutabilityAudit, VariantAuditResult } from '@shared/types';

function runRoutine(transport: ITransport): VariantAuditResult {
  try {
    transport.primaryAction();
    const first = transport.reportRate();
    const second = transport.reportRate();
    return { ok: true, rate: first, error: null, idempotent: first === second };
  } catch (err) {
    return {
      ok: false,
      rate: null,
      error: err instanceof Error ? err.message : String(err),
      idempotent: null,
    };
  }
}

export function auditSubstitutability(variants: Record<string, ITransport>): SubstitutabilityAudit {
  const results: Record<string, VariantAuditResult> = {};
  for (const [key, transport] of Object.entries(variants)) {
    results[key] = runRoutine(transport);
  }

  const outcomes = Object.values(results);
  const mixed = outcomes.some((r) => r.ok) && outcomes.some((r) => !r.ok);
  const drifting = outcomes.some((r) => r.idempotent === false);

  return { uniform: !mixed && !drifting, results };
}

export function assertSubstitutable(variants: Record<string, ITransport>): SubstitutabilityAudit {
  const audit = auditSubstitutability(variants);
  if (audit.uniform) return audit;

  const failing = Object.entries(audit.results)
    .filter(([, r]) => !r.ok)
    .map(([key]) => key);
  const drifting = Object.entries(audit.results)
    .filter(([, r]) => r.idempotent === false)
    .map(([key]) => key);

  const problems: string[] = [];
  if (failing.length > 0 && failing.length < Object.keys(audit.results).length) {
    problems.push(`failed where others succeeded: ${failing.join(', ')}`);
  }
  if (drifting.length > 0) {
    problems.push(`reportRate() not idempotent: ${drifting.join(', ')}`);
  }

  throw new ContractViolationError(`Transport contract violated (${problems.join('; ')})`, [
    ...new Set([...failing, ...drifting]),
  ]);
}
