/**
 * @fileoverview Annotation decorators
 *
 * @packageDocumentation
 * @module wiregraph/application/metadata
 *
 * Annotations are plain objects attached to a constructor parameter, a
 * method parameter or a property. They are recorded once, when the class
 * is declared, and read back through the {@link TypeIntrospector}; the
 * {@link MetadataResolverRegistry} decides what each one contributes.
 *
 * @example
 * ```typescript
 * class EnvVar {
 *   constructor(readonly name: string) {}
 * }
 * const Env = createAnnotation(EnvVar);
 *
 * container.metadata().register(EnvVar, ({ annotation }) => process.env[annotation.name]);
 *
 * @Injectable()
 * class Database {
 *   constructor(@Env('DATABASE_URL') readonly url: string) {}
 * }
 * ```
 */

import type { AnyFunction, Identifier } from '../../domain/definition';
import {
  CONSTRUCTOR_MEMBER,
  writeParameterAnnotation,
  writePropertyAnnotation,
} from '../../infrastructure/reflection';

/**
 * Signature shared by parameter and property decorators.
 */
export type MemberDecorator = (
  target: object,
  propertyKey: string | symbol | undefined,
  parameterIndex?: number,
) => void;

export interface DecoratorSite {
  /** Class that declares the member */
  owner: object;
  /** `'constructor'` for constructor parameters, otherwise the member name */
  member: string | symbol;
}

/**
 * Constructor parameter decorators receive the class; method parameter and
 * property decorators receive the prototype (or the class, when static).
 */
export function decoratorSite(target: object, propertyKey: string | symbol | undefined): DecoratorSite {
  if (propertyKey === undefined) {
    return { owner: target, member: CONSTRUCTOR_MEMBER };
  }

  if (typeof target === 'function') {
    return { owner: target, member: propertyKey };
  }

  const constructor: unknown = Reflect.get(target, 'constructor');
  return { owner: typeof constructor === 'function' ? constructor : target, member: propertyKey };
}

/**
 * Attach `annotation` to the decorated parameter or property.
 */
export function Annotate(annotation: object): MemberDecorator {
  return function (target, propertyKey, parameterIndex) {
    const { owner, member } = decoratorSite(target, propertyKey);

    if (typeof parameterIndex === 'number') {
      writeParameterAnnotation(owner, {
        member: String(member),
        index: parameterIndex,
        annotation,
      });
      return;
    }

    writePropertyAnnotation(owner, { property: member, annotation });
  };
}

/**
 * Turn an annotation class into a decorator factory taking the class's
 * constructor arguments.
 */
export function createAnnotation<A extends object, Args extends unknown[]>(
  type: new (...args: Args) => A,
): (...args: Args) => MemberDecorator {
  return (...args) => Annotate(new type(...args));
}

// ============================================================================
// Infuse
// ============================================================================

export type InfuseTarget = Identifier | AnyFunction;

/**
 * Built-in annotation: inject a definition, a class, or the result of a
 * plain function.
 *
 * | Form                   | Value                                  |
 * |------------------------|----------------------------------------|
 * | `@Infuse('id')`        | `container.get('id')`                  |
 * | `@Infuse(SomeClass)`   | `container.get(SomeClass)`             |
 * | `@Infuse(fn, a, b)`    | `fn` invoked with `a, b` and autowired |
 * | `@Infuse()`            | the declared type of the member        |
 */
export class InfuseAnnotation {
  readonly args: readonly unknown[];

  constructor(
    readonly target?: InfuseTarget,
    args: readonly unknown[] = [],
  ) {
    this.args = [...args];
  }
}

export function Infuse(target?: InfuseTarget, ...args: unknown[]): MemberDecorator {
  return Annotate(new InfuseAnnotation(target, args));
}
