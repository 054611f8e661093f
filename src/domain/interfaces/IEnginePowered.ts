/**
 * Native shape of an engine-driven vehicle (Adaptee side).
 *
 * EngineAdapter depends on this interface rather than on Car, so any new
 * engine-driven vehicle is adaptable without changing the adapter.
 */
export interface IEnginePowered {
  startEngine(): void;
  speed(): string;
}
