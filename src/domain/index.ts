/**
 * @module wiregraph/domain
 * @description Domain layer exports
 */

// ============================================================================
// Definitions, Identifiers & Lifetimes
// ============================================================================

export * from './definition';

// ============================================================================
// Errors
// ============================================================================

export * from './exceptions';
