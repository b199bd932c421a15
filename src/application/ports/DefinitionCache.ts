/**
 * @fileoverview Definition cache port
 *
 * @packageDocumentation
 * @module wiregraph/application/ports
 *
 * Opaque key/value store the container uses to persist pre-resolved
 * definitions. Only definitions with string ids go through it; live class
 * instances resolved by type never do.
 *
 * Keys are `<namespace>-<base64(id)>`, so `clear(namespace + '-')` drops a
 * single container's entries from a shared store.
 */
export interface IDefinitionCacheAdapter {
  /** Cached value, or `undefined` on a miss */
  get(key: string): unknown;

  set(key: string, value: unknown): void;

  /**
   * Remove every entry, or only those whose key starts with `prefix`.
   */
  clear(prefix?: string): void;
}
