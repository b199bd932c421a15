/**
 * @fileoverview Object lifetime policies
 *
 * @packageDocumentation
 * @module wiregraph/domain/definition
 */

/**
 * Caching discipline applied to a resolved value.
 *
 * @remarks
 * ```
 * Singleton   get(id) → instance-1, get(id) → instance-1
 * Transient   get(id) → instance-1, get(id) → instance-2
 * Scoped      scope A → instance-1, scope B → instance-2, scope A → instance-1
 * ```
 *
 * | Policy    | Cache key          | Stored          |
 * |-----------|--------------------|-----------------|
 * | Singleton | id                 | forever         |
 * | Scoped    | (id, scope token)  | per token       |
 * | Transient | none               | never           |
 *
 * Switching scope never evicts another token's entries; coming back to a
 * token yields the instance it produced earlier.
 */
export enum Lifetime {
  /**
   * One instance per id for the lifetime of the container. The current
   * scope is ignored.
   */
  Singleton = 'singleton',

  /**
   * Never cached: every request re-runs the full resolution.
   */
  Transient = 'transient',

  /**
   * One instance per (id, scope token).
   */
  Scoped = 'scoped',
}

export const DEFAULT_LIFETIME = Lifetime.Singleton;

export function isLifetime(value: unknown): value is Lifetime {
  return (
    value === Lifetime.Singleton ||
    value === Lifetime.Transient ||
    value === Lifetime.Scoped
  );
}
