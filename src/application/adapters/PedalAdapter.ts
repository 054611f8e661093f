/**
 * Pedal Adapter — IPedalPowered → ITransport
 * Layer: Application
 * Pattern: Adapter Pattern (object adapter, by composition)
 *
 * Two ways to build one:
 *   new PedalAdapter()          — builds and owns its own Bicycle
 *   new PedalAdapter(adaptee)   — wraps a vehicle built elsewhere (any
 *                                  IPedalPowered, e.g. a tandem or a mock)
 *
 * primaryAction() is exactly one pedal() call and reportRate() returns
 * speed() untouched. The adapter validates nothing itself.
 */
import { Bicycle } from '@domain/entities/Bicycle';
import type { IPedalPowered } from '@domain/interfaces/IPedalPowered';
import type { ITransport } from '@domain/interfaces/ITransport';

import { delegate } from './delegate';

export class PedalAdapter implements ITransport {
  constructor(private readonly adaptee: IPedalPowered = new Bicycle()) {}

  primaryAction(): void {
    delegate('pedal', () => this.adaptee.pedal());
  }

  reportRate(): string {
    return delegate('speed', () => this.adaptee.speed());
  }
}
