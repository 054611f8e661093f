/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The one place where tokens are bound to implementations:
 *
 *   TOKENS.Logger           → the shared pino instance (useValue)
 *   TOKENS.TransportFactory → a factory pre-loaded with the built-in variants
 *   TOKENS.TransportClient  → TransportClient (useClass)
 *   TOKENS.DispatchService  → DispatchService (useClass)
 *
 * `reflect-metadata` must load before tsyringe so the @injectable/@inject
 * decorators can record constructor parameters.
 *
 * Adding a vehicle variant never touches this file: it is a definition in
 * application/factories/variants.ts.
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { TOKENS } from './types';
import { logger } from './logger';

import { TransportClient } from '@application/clients/TransportClient';
import { createDefaultTransportFactory } from '@application/factories/variants';
import { DispatchService } from '@application/services/DispatchService';

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.TransportFactory, { useValue: createDefaultTransportFactory() });
container.register(TOKENS.TransportClient, { useClass: TransportClient });
container.register(TOKENS.DispatchService, { useClass: DispatchService });

export { container };
