/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Each injectable dependency is identified by a Symbol. Services declare
 * `@inject(TOKENS.X)` and the container (core/container.ts) decides which
 * implementation answers for X.
 *
 * Grouped by layer so the full dependency surface is visible at a glance.
 */
export const TOKENS = {
  // Infrastructure
  Logger: Symbol.for('Logger'),

  // Factories — discriminator → variant construction
  TransportFactory: Symbol.for('TransportFactory'),

  // Clients — consumers of the ITransport contract
  TransportClient: Symbol.for('TransportClient'),

  // Services — application-level orchestrators
  DispatchService: Symbol.for('DispatchService'),
} as const;
