/**
 * @fileoverview Lifetime Manager
 *
 * @packageDocumentation
 * @module wiregraph/application/resolution
 *
 * Decides where a resolution is cached and whether a cached one exists.
 *
 * ```
 * obtain(id, lifetime, produce)
 *   │
 *   ├─ Transient ─────────────────────────────▶ produce()
 *   │
 *   ├─ entry for (id, key)? ── placeholder ───▶ settle ──▶ value
 *   │                      └── value ─────────▶ value
 *   │
 *   ├─ lazy ──▶ defer(placeholder) ──▶ settle ▶ value
 *   │
 *   └─ produce() ──▶ store (id, key) ─────────▶ value
 * ```
 *
 * `key` is {@link GLOBAL_SCOPE} for Singleton and the current scope token
 * for Scoped. Values are stored only after `produce()` returns, so a
 * failed resolution leaves no entry behind.
 */

import {
  Lifetime,
  describeIdentifier,
  type Identifier,
  type Resolution,
} from '../../domain/definition';
import type { ILogger } from '../../infrastructure/logging';
import {
  GLOBAL_SCOPE,
  type DefinitionRepository,
  type ScopeKey,
} from '../di/DefinitionRepository';
import { LazyPlaceholder } from './LazyPlaceholder';

export interface ObtainOptions {
  /** Store a placeholder first and evaluate through it */
  lazy?: boolean;
  label?: string;
}

export class LifetimeManager {
  constructor(
    private readonly repository: DefinitionRepository,
    private readonly logger: ILogger,
  ) {}

  /**
   * Cache key for `lifetime`, or `undefined` when it is never cached.
   */
  scopeKeyFor(lifetime: Lifetime): ScopeKey | undefined {
    switch (lifetime) {
      case Lifetime.Singleton:
        return GLOBAL_SCOPE;
      case Lifetime.Scoped:
        return this.repository.getScope();
      case Lifetime.Transient:
        return undefined;
    }
  }

  /**
   * The cached resolution of `id`, evaluating a stored placeholder.
   */
  lookup(id: Identifier, lifetime: Lifetime): Resolution | undefined {
    const key = this.scopeKeyFor(lifetime);
    if (key === undefined) return undefined;

    const entry = this.repository.getResolved(id, key);
    if (entry instanceof LazyPlaceholder) {
      return this.settle(id, key, entry);
    }
    return entry;
  }

  obtain(
    id: Identifier,
    lifetime: Lifetime,
    produce: () => Resolution,
    options: ObtainOptions = {},
  ): Resolution {
    const key = this.scopeKeyFor(lifetime);
    if (key === undefined) return produce();

    const cached = this.lookup(id, lifetime);
    if (cached) return cached;

    if (options.lazy) {
      const placeholder = this.defer(id, key, produce, options.label);
      return this.settle(id, key, placeholder);
    }

    const resolution = produce();
    this.repository.setResolved(id, key, resolution);
    return resolution;
  }

  /**
   * Store a placeholder for `(id, key)` without evaluating it.
   */
  defer(
    id: Identifier,
    key: ScopeKey,
    produce: () => Resolution,
    label: string = describeIdentifier(id),
  ): LazyPlaceholder<Resolution> {
    const placeholder = new LazyPlaceholder(produce, label);
    this.repository.setResolved(id, key, placeholder);
    return placeholder;
  }

  /**
   * Evaluate `placeholder` and swap it for its value. On failure the entry
   * is removed if it still holds this placeholder.
   */
  settle(id: Identifier, key: ScopeKey, placeholder: LazyPlaceholder<Resolution>): Resolution {
    let resolution: Resolution;
    try {
      resolution = placeholder.evaluate();
    } catch (error) {
      if (this.repository.getResolved(id, key) === placeholder) {
        this.repository.clearResolved(id, key);
      }
      throw error;
    }

    if (this.repository.getResolved(id, key) === placeholder) {
      this.repository.setResolved(id, key, resolution);
      this.logger.debug(`Lazy placeholder evaluated: ${placeholder.label}`);
    }
    return resolution;
  }
}
