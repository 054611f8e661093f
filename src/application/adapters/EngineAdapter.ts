/**
 * Engine Adapter — IEnginePowered → ITransport
 * Layer: Application
 * Pattern: Adapter Pattern (object adapter, by aggregation)
 *
 * Always receives its Adaptee. Because it only knows the IEnginePowered
 * shape, the same class serves Car, Motorbike and any engine-driven vehicle
 * added later.
 *
 * An engine that refuses to start (e.g. "Out of fuel") surfaces as a
 * DelegationError carrying the native error as its cause.
 */
import type { IEnginePowered } from '@domain/interfaces/IEnginePowered';
import type { ITransport } from '@domain/interfaces/ITransport';

import { delegate } from './delegate';

export class EngineAdapter implements ITransport {
  constructor(private readonly adaptee: IEnginePowered) {}

  primaryAction(): void {
    delegate('startEngine', () => this.adaptee.startEngine());
  }

  reportRate(): string {
    return delegate('speed', () => this.adaptee.speed());
  }
}
