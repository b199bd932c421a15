/**
 * @fileoverview wiregraph - Runtime dependency resolution
 * @description
 * Builds object graphs from registered definitions and introspected
 * constructor and method signatures.
 *
 * ## Architecture Layers
 *
 * - **domain**: identifiers, definitions, lifetimes and the error taxonomy
 * - **application**: the container, its decorators, the metadata resolver
 *   registry and the resolution engine
 * - **infrastructure**: reflection, tracing, logging and caching
 *
 * `reflect-metadata` is loaded here, before any decorated class can be
 * declared by a consumer.
 *
 * @example
 * ```typescript
 * import { Container, Injectable, Lifetime } from 'wiregraph';
 *
 * @Injectable({ lifetime: Lifetime.Scoped })
 * class UnitOfWork {}
 *
 * @Injectable()
 * class OrderService {
 *   constructor(readonly uow: UnitOfWork) {}
 * }
 *
 * const container = Container.create();
 * container.setScope('request-1');
 * const service = container.get(OrderService);
 * ```
 *
 * @packageDocumentation
 * @module wiregraph
 */

import 'reflect-metadata';

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';
