/**
 * Motorbike — second engine-driven Adaptee
 * Layer: Domain
 *
 * Shares IEnginePowered with Car, so the same EngineAdapter wraps it.
 */
import type { IEnginePowered } from '@domain/interfaces/IEnginePowered';

export const MOTORBIKE_RATE = 'rate:60';
export const DEFAULT_MOTORBIKE_FUEL_LITRES = 12;

export interface MotorbikeOptions {
  fuelLitres?: number;
}

export class Motorbike implements IEnginePowered {
  readonly fuelLitres: number;
  private running = false;

  constructor({ fuelLitres = DEFAULT_MOTORBIKE_FUEL_LITRES }: MotorbikeOptions = {}) {
    this.fuelLitres = fuelLitres;
  }

  startEngine(): void {
    if (this.fuelLitres <= 0) {
      throw new Error('Out of fuel');
    }
    this.running = true;
  }

  speed(): string {
    return MOTORBIKE_RATE;
  }

  get isRunning(): boolean {
    return this.running;
  }
}
