/**
 * Bicycle — human-powered Adaptee
 * Layer: Domain
 *
 * Exposes its own native vocabulary (pedal/speed). It has no idea that
 * ITransport exists; PedalAdapter is what makes it dispatchable.
 */
import type { IPedalPowered } from '@domain/interfaces/IPedalPowered';

export const BICYCLE_RATE = 'rate:20';

export class Bicycle implements IPedalPowered {
  private strokes = 0;

  pedal(): void {
    this.strokes += 1;
  }

  speed(): string {
    return BICYCLE_RATE;
  }

  get pedalStrokes(): number {
    return this.strokes;
  }
}
