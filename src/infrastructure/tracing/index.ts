/**
 * @fileoverview Resolution tracing exports
 *
 * @packageDocumentation
 * @module wiregraph/infrastructure/tracing
 */

export { DebugTracer, TraceLevel } from './DebugTracer';
export type { TraceAttributes, TraceEntry, TraceRecord } from './DebugTracer';
