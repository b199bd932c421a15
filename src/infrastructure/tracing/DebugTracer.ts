/**
 * @fileoverview Resolution debug tracer
 *
 * @packageDocumentation
 * @module wiregraph/infrastructure/tracing
 *
 * Records what the container does while resolving: definition and class
 * boundaries as spans, parameters and lazy placeholders as plain entries.
 * Tracing is off unless a level is set, and entries above the configured
 * level are dropped at the call site.
 *
 * @example
 * ```typescript
 * const tracer = new DebugTracer(TraceLevel.Node);
 * const end = tracer.beginSpan('class CheckoutService');
 * tracer.push('param gateway ← PaymentGateway', TraceLevel.Verbose); // dropped
 * end();
 *
 * tracer.toArray().map((r) => r.msg);
 * // ['▶ start: class CheckoutService', '◀ end: class CheckoutService']
 * ```
 */

/**
 * Verbosity threshold. An entry is kept when its level is at or below
 * the tracer's level.
 */
export enum TraceLevel {
  Off = 0,
  Error = 1,
  Warn = 2,
  Info = 3,
  /** Class and definition boundaries */
  Node = 4,
  /** Parameters, properties, lazy initialisers */
  Verbose = 5,
}

export interface TraceAttributes {
  [key: string]: string | number | boolean | undefined;
}

export interface TraceEntry {
  readonly seq: number;
  readonly level: TraceLevel;
  readonly message: string;
  readonly context: TraceAttributes;
  readonly timestamp: number;
}

/**
 * Exported shape of a trace entry.
 */
export interface TraceRecord {
  ts: string;
  level: string;
  msg: string;
  ctx: TraceAttributes;
  /** Milliseconds since the previous record */
  deltaMs: number;
}

interface ActiveSpan {
  name: string;
  level: TraceLevel;
  startedAt: number;
  depth: number;
}

export class DebugTracer {
  private entries: TraceEntry[] = [];
  private readonly activeSpans = new Map<string, ActiveSpan>();
  private seq = 0;

  constructor(
    private level: TraceLevel = TraceLevel.Off,
    private readonly clock: () => number = Date.now,
  ) {}

  getLevel(): TraceLevel {
    return this.level;
  }

  setLevel(level: TraceLevel): this {
    this.level = level;
    return this;
  }

  isEnabled(level: TraceLevel = TraceLevel.Node): boolean {
    return this.level !== TraceLevel.Off && level <= this.level;
  }

  push(
    message: string,
    level: TraceLevel = TraceLevel.Node,
    context: TraceAttributes = {},
  ): void {
    if (!this.isEnabled(level)) return;

    this.entries.push({
      seq: ++this.seq,
      level,
      message,
      context,
      timestamp: this.clock(),
    });
  }

  /**
   * Open a span and return the function that closes it.
   */
  beginSpan(
    name: string,
    level: TraceLevel = TraceLevel.Node,
    context: TraceAttributes = {},
  ): () => void {
    if (!this.isEnabled(level)) {
      return () => undefined;
    }

    const spanId = (this.seq + 1).toString(16);
    const depth = this.activeSpans.size;
    this.activeSpans.set(spanId, {
      name,
      level,
      startedAt: this.clock(),
      depth,
    });
    this.push(`▶ start: ${name}`, level, { span_id: spanId, depth, ...context });

    return () => this.endSpan(spanId);
  }

  endSpan(spanId: string, context: TraceAttributes = {}): void {
    const span = this.activeSpans.get(spanId);
    if (!span) {
      this.push(`◀ end: span ${spanId}`, TraceLevel.Node, { span_id: spanId, ...context });
      return;
    }

    this.activeSpans.delete(spanId);
    this.push(`◀ end: ${span.name}`, span.level, {
      span_id: spanId,
      ms: this.clock() - span.startedAt,
      depth: span.depth,
      ...context,
    });
  }

  getEntries(): readonly TraceEntry[] {
    return this.entries;
  }

  /**
   * Export and drain the recorded entries.
   */
  toArray(): TraceRecord[] {
    let previous: TraceEntry | undefined;
    const records = this.entries.map((entry) => {
      const record: TraceRecord = {
        ts: new Date(entry.timestamp).toISOString(),
        level: TraceLevel[entry.level],
        msg: entry.message,
        ctx: entry.context,
        deltaMs: previous ? entry.timestamp - previous.timestamp : 0,
      };
      previous = entry;
      return record;
    });

    this.clear();
    return records;
  }

  /**
   * Export and drain the entries as `LEVEL   message` lines.
   */
  toText(): string {
    const lines = this.entries.map(
      (entry) => `${TraceLevel[entry.level].padEnd(7)} ${entry.message}`,
    );
    this.clear();
    return lines.join('\n');
  }

  /**
   * Close open spans and drop every entry.
   */
  clear(): this {
    for (const spanId of [...this.activeSpans.keys()]) {
      this.endSpan(spanId, { auto_close: true });
    }
    this.entries = [];
    this.activeSpans.clear();
    return this;
  }
}
