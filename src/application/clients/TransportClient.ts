/**
 * Transport Client
 * Layer: Application
 *
 * The consumer side of the pattern. It is handed an ITransport and calls
 * only primaryAction() and reportRate(): no instanceof, no branching on the
 * vehicle type, no construction. The variant key is passed along purely to
 * label the report and the log lines.
 *
 * Errors are logged and rethrown untouched.
 */
import { TOKENS } from '@core/types';
import type { Logger } from '@core/logger';
import type { ITransport } from '@domain/interfaces/ITransport';
import type { TripReport } from '@shared/types';
import { inject, injectable } from 'tsyringe';

@injectable()
export class TransportClient {
  constructor(@inject(TOKENS.Logger) private logger: Logger) {}

  travel(variant: string, transport: ITransport): TripReport {
    try {
      transport.primaryAction();
      const rate = transport.reportRate();
      this.logger.debug({ variant, rate }, 'Trip completed');
      return { variant, rate };
    } catch (err) {
      this.logger.warn({ variant, err }, 'Trip failed');
      throw err;
    }
  }
}
