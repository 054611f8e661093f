/**
 * Transport Factory
 * Layer: Application
 * Pattern: Factory Pattern (registry-backed)
 *
 * Holds the discriminator → VariantDefinition registry and is the only place
 * that turns a key into a concrete vehicle. create() runs three steps:
 *
 *   1. lookup   — unknown key → UnknownVariantError (never a default variant)
 *   2. validate — config bundle against the variant's Zod schema → ValidationError
 *   3. build    — call the creator; a result that does not satisfy
 *                 ITransport → ContractViolationError
 *
 * The caller always gets an ITransport back. A new variant is one register()
 * call; no call site changes.
 */
import type { IVariantDefinition } from '@domain/interfaces/IVariantDefinition';
import type { ITransport } from '@domain/interfaces/ITransport';
import { isTransport } from '@domain/interfaces/ITransport';
import {
  ConflictError,
  ContractViolationError,
  UnknownVariantError,
  ValidationError,
} from '@shared/errors/AppError';
import type { VariantConfig, VariantSummary } from '@shared/types';

export class TransportFactory {
  private readonly variants = new Map<string, IVariantDefinition>();

  register(definition: IVariantDefinition): this {
    if (this.variants.has(definition.key)) {
      throw new ConflictError(`Transport variant already registered: ${definition.key}`);
    }
    this.variants.set(definition.key, definition);
    return this;
  }

  has(discriminator: string): boolean {
    return this.variants.has(discriminator);
  }

  list(): VariantSummary[] {
    return [...this.variants.values()].map(({ key, description }) => ({ key, description }));
  }

  create(discriminator: string, config: VariantConfig = {}): ITransport {
    const definition = this.variants.get(discriminator);
    if (!definition) {
      throw new UnknownVariantError(discriminator, [...this.variants.keys()]);
    }

    const result = definition.configSchema.safeParse(config);
    if (!result.success) {
      const messages = result.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      throw new ValidationError(`Invalid config for ${discriminator}: ${messages}`);
    }

    const transport: unknown = definition.create(result.data);
    if (!isTransport(transport)) {
      throw new ContractViolationError(
        `Variant ${discriminator} produced an object without primaryAction()/reportRate()`,
        [discriminator],
      );
    }
    return transport;
  }
}
