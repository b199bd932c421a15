/**
 * @module wiregraph/application
 * @description Application layer exports
 */

// ============================================================================
// Container & Decorators
// ============================================================================

export * from './di';

// ============================================================================
// Declarative Metadata
// ============================================================================

export * from './metadata';

// ============================================================================
// Resolution Engine
// ============================================================================

export * from './resolution';

// ============================================================================
// Ports
// ============================================================================

export type { IDefinitionCacheAdapter } from './ports';
