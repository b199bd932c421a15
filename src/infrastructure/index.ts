/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Runtime concerns the resolution engine is built on:
 *
 * - **Reflection**: decorator metadata and signature introspection
 * - **Tracing**: the debug trace recorded while resolving
 * - **Logging**: the logger contract and its console / silent implementations
 * - **Cache**: an in-memory LRU store usable as definition cache
 *
 * @packageDocumentation
 * @module wiregraph/infrastructure
 */

// Signature introspection and decorator metadata
export * from './reflection';

// Resolution trace
export * from './tracing';

// Logger contract
export * from './logging';

// LRU + TTL cache
export * from './cache';
