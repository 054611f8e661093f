/**
 * Dispatch Service — The Orchestrator
 * Layer: Application
 * Pattern: Facade
 *
 * Sits between the HTTP controller and the dispatch machinery:
 *
 *   dispatch()     — factory builds the variant, client runs one trip.
 *   listVariants() — what the factory can build.
 *   audit()        — builds each requested [variant, config] pair and checks they are
 *                    interchangeable behind ITransport.
 *
 * The service never sees a concrete vehicle type; everything past the
 * factory is an ITransport.
 */
import type { TransportClient } from '@application/clients/TransportClient';
import { assertSubstitutable } from '@application/contracts/substitutability';
import type { TransportFactory } from '@application/factories/TransportFactory';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { ITransport } from '@domain/interfaces/ITransport';
import type {
  SubstitutabilityAudit,
  TripReport,
  VariantConfig,
  VariantSummary,
} from '@shared/types';
import { inject, injectable } from 'tsyringe';

@injectable()
export class DispatchService {
  constructor(
    @inject(TOKENS.TransportFactory) private factory: TransportFactory,
    @inject(TOKENS.TransportClient) private client: TransportClient,
    @inject(TOKENS.Logger) private logger: Logger,
  ) {}

  dispatch(variant: string, config: VariantConfig = {}): TripReport {
    const transport = this.factory.create(variant, config);
    const report = this.client.travel(variant, transport);
    this.logger.info(report, 'Dispatched');
    return report;
  }

  listVariants(): VariantSummary[] {
    return this.factory.list();
  }

  audit(configs: ReadonlyArray<readonly [string, VariantConfig]>): SubstitutabilityAudit {
    const transports: Record<string, ITransport> = Object.fromEntries(
      configs.map(([variant, config]) => [variant, this.factory.create(variant, config)] as const),
    );
    const audit = assertSubstitutable(transports);
    this.logger.info({ variants: Object.keys(transports) }, 'Substitutability audit passed');
    return audit;
  }
}
