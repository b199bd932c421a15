/**
 * @fileoverview Declarative-Metadata Resolver Registry
 *
 * @packageDocumentation
 * @module wiregraph/application/metadata
 *
 * Maps an annotation class to the handler that supplies or post-processes
 * the value of the parameter or property carrying it.
 *
 * ```
 * @Infuse('db.url') @Trim() url
 *        │                 │
 *        ▼                 ▼
 *   resolve(current=undefined) ─▶ 'pg://x ' ─▶ resolve(current='pg://x ') ─▶ 'pg://x'
 * ```
 *
 * Resolvers run in annotation declaration order and each one sees the
 * value produced so far as `current`. A resolver returning `undefined`
 * contributes nothing; an annotation without a registered resolver is
 * skipped. Both cases let an annotation carry logic only.
 */

import type { AbstractConstructor, Identifier } from '../../domain/definition';
import type { CallSite } from '../../domain/exceptions';
import type { IContainer } from '../di/IDependencyInjection';

// ============================================================================
// Context
// ============================================================================

export type AnnotationTargetKind = 'parameter' | 'property';

/**
 * The parameter or property an annotation is attached to.
 */
export interface AnnotationTarget {
  /** Display name of the class or function that declares the member */
  owner: string;
  ownerType?: AbstractConstructor;
  /** `'constructor'`, a method name, or the property name */
  member: string;
  kind: AnnotationTargetKind;
  /** Parameter or property name */
  name: string;
  index?: number;
  /** Declared or overridden type, when known */
  type?: Identifier;
  callSite: CallSite;
}

export interface ResolutionContext<A extends object = object> {
  annotation: A;
  target: AnnotationTarget;
  container: IContainer;
  /** Value produced by earlier annotations, or the property's current value */
  current: unknown;
}

export interface MetadataResolver<A extends object = object> {
  resolve(context: ResolutionContext<A>): unknown;
}

export type MetadataResolverFn<A extends object = object> = (
  context: ResolutionContext<A>,
) => unknown;

type StoredResolver = (context: ResolutionContext) => unknown;

export interface MetadataOutcome {
  /** At least one resolver produced a value */
  supplied: boolean;
  value: unknown;
}

// ============================================================================
// Registry
// ============================================================================

export class MetadataResolverRegistry {
  private readonly resolvers = new Map<AbstractConstructor, StoredResolver>();

  /**
   * Register the handler for `type`. Instances of subclasses of `type` are
   * handled too unless their own class is registered.
   */
  register<A extends object>(
    type: AbstractConstructor<A>,
    resolver: MetadataResolver<A> | MetadataResolverFn<A>,
  ): this {
    const handler: MetadataResolverFn<A> =
      typeof resolver === 'function' ? resolver : (context) => resolver.resolve(context);

    this.resolvers.set(type, (context) => {
      const { annotation } = context;
      if (!(annotation instanceof type)) return undefined;
      return handler({ ...context, annotation });
    });
    return this;
  }

  unregister(type: AbstractConstructor): boolean {
    return this.resolvers.delete(type);
  }

  has(type: AbstractConstructor): boolean {
    return this.resolvers.has(type);
  }

  /**
   * Whether some registered resolver handles `annotation`.
   */
  handles(annotation: object): boolean {
    return this.lookup(annotation) !== undefined;
  }

  /**
   * Run the resolver registered for `context.annotation`. Returns
   * `undefined` when there is none.
   */
  resolve(context: ResolutionContext): unknown {
    return this.lookup(context.annotation)?.(context);
  }

  /**
   * Run every annotation of one parameter or property, threading the
   * value through them in order.
   */
  resolveAll(
    annotations: readonly object[],
    target: AnnotationTarget,
    container: IContainer,
    initial: unknown = undefined,
  ): MetadataOutcome {
    let value = initial;
    let supplied = false;

    for (const annotation of annotations) {
      const resolver = this.lookup(annotation);
      if (!resolver) continue;

      const result = resolver({ annotation, target, container, current: value });
      if (result !== undefined) {
        value = result;
        supplied = true;
      }
    }

    return { supplied, value };
  }

  /**
   * The annotation's own class first, then the first registered ancestor.
   */
  private lookup(annotation: object): StoredResolver | undefined {
    const proto: unknown = Object.getPrototypeOf(annotation);
    const own: unknown =
      typeof proto === 'object' && proto !== null ? Reflect.get(proto, 'constructor') : undefined;

    for (const [type, resolver] of this.resolvers) {
      if (type === own) return resolver;
    }
    for (const [type, resolver] of this.resolvers) {
      if (annotation instanceof type) return resolver;
    }
    return undefined;
  }
}
