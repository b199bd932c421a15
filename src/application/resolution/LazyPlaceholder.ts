/**
 * @fileoverview Lazy Placeholder
 *
 * @packageDocumentation
 * @module wiregraph/application/resolution
 *
 * A deferred resolution stored in a Resolved Entry in place of the value.
 * The first read evaluates it; the Lifetime Manager then swaps the entry
 * for the concrete result.
 *
 * ```
 * pending ──evaluate()──▶ evaluating ──ok──▶ done (value kept)
 *                             │
 *                             └──throws──▶ pending (entry removed, retry-able)
 * ```
 *
 * Reading a placeholder while it is evaluating (a producer that asks for
 * its own id) raises {@link CircularDependencyError} rather than handing
 * back a half-built value.
 */

import { CircularDependencyError } from '../../domain/exceptions';
import { renderDependencyGraph } from './ResolutionPath';

export type PlaceholderState = 'pending' | 'evaluating' | 'done';

export class LazyPlaceholder<T = unknown> {
  private evaluating = false;
  private outcome?: { value: T };

  constructor(
    private readonly producer: () => T,
    public readonly label: string,
  ) {}

  get state(): PlaceholderState {
    if (this.outcome) return 'done';
    return this.evaluating ? 'evaluating' : 'pending';
  }

  /**
   * Run the producer once and keep its result. Later calls return the
   * kept result; a failed run leaves the placeholder pending.
   */
  evaluate(): T {
    if (this.outcome) return this.outcome.value;

    if (this.evaluating) {
      throw new CircularDependencyError(
        [this.label, this.label],
        renderDependencyGraph([this.label], `${this.label} (LAZY RE-ENTRY)`),
      );
    }

    this.evaluating = true;
    try {
      const value = this.producer();
      this.outcome = { value };
      return value;
    } finally {
      this.evaluating = false;
    }
  }
}
