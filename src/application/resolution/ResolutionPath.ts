import { CircularDependencyError } from '../../domain/exceptions';

export type FrameKind = 'class' | 'definition';

interface Frame {
  kind: FrameKind;
  key: unknown;
  label: string;
}

/**
 * Render a resolution stack as a tree with `current` as the final leaf.
 *
 * ```
 * ├─ CheckoutService
 *   └─ PaymentGateway
 *     └─ Stripe (CIRCULAR!)
 * ```
 */
export function renderDependencyGraph(stack: readonly string[], current: string): string {
  let graph = '';
  for (let i = 0; i < stack.length; i++) {
    const indent = '  '.repeat(i);
    const branch = i === stack.length - 1 ? '└─' : '├─';
    graph += `${indent}${branch} ${stack[i]}\n`;
  }
  const indent = '  '.repeat(stack.length);
  graph += `${indent}└─ ${current}\n`;
  return graph;
}

/**
 * Classes and definitions currently under construction, outermost first.
 *
 * Entering a frame whose key is already on the path means the graph loops
 * back on itself; that is reported as a {@link CircularDependencyError}
 * for any cycle length, not only a constructor depending on its own class.
 */
export class ResolutionPath {
  private readonly frames: Frame[] = [];

  enter<T>(kind: FrameKind, key: unknown, label: string, work: () => T): T {
    if (this.contains(kind, key)) {
      throw this.cycle(label);
    }

    this.frames.push({ kind, key, label });
    try {
      return work();
    } finally {
      this.frames.pop();
    }
  }

  contains(kind: FrameKind, key: unknown): boolean {
    return this.frames.some((frame) => frame.kind === kind && frame.key === key);
  }

  labels(): string[] {
    return this.frames.map((frame) => frame.label);
  }

  get depth(): number {
    return this.frames.length;
  }

  /**
   * Tree of the current path ending in `leaf`.
   */
  graph(leaf: string): string {
    return renderDependencyGraph(this.labels(), leaf);
  }

  private cycle(label: string): CircularDependencyError {
    const labels = this.labels();
    return new CircularDependencyError(
      [...labels, label],
      renderDependencyGraph(labels, `${label} (CIRCULAR!)`),
    );
  }
}
