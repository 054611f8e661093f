/**
 * Car — rideshare Adaptee booked through a provider API
 * Layer: Domain
 *
 * The provider apiKey and the fuel level come in through the constructor; the
 * car never looks them up from a shared container. An empty tank makes
 * startEngine() fail with a plain Error, which EngineAdapter surfaces as a
 * DelegationError.
 */
import type { IEnginePowered } from '@domain/interfaces/IEnginePowered';

export const CAR_RATE = 'rate:100';
export const DEFAULT_CAR_FUEL_LITRES = 40;

export interface CarOptions {
  apiKey: string;
  fuelLitres?: number;
}

export class Car implements IEnginePowered {
  readonly apiKey: string;
  readonly fuelLitres: number;
  private running = false;

  constructor({ apiKey, fuelLitres = DEFAULT_CAR_FUEL_LITRES }: CarOptions) {
    this.apiKey = apiKey;
    this.fuelLitres = fuelLitres;
  }

  startEngine(): void {
    if (this.fuelLitres <= 0) {
      throw new Error('Out of fuel');
    }
    this.running = true;
  }

  speed(): string {
    return CAR_RATE;
  }

  get isRunning(): boolean {
    return this.running;
  }
}
