/**
 * Native shape of a human-powered vehicle (Adaptee side).
 * Knows nothing about ITransport; PedalAdapter bridges the two.
 */
export interface IPedalPowered {
  pedal(): void;
  speed(): string;
}
