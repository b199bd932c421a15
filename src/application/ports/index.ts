/**
 * wiregraph - Port Module
 *
 * Boundaries the container consumes
 */

export type { IDefinitionCacheAdapter } from './DefinitionCache';
