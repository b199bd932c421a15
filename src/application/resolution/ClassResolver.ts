/**
 * @fileoverview Class Resolver
 *
 * @packageDocumentation
 * @module wiregraph/application/resolution
 *
 * Builds one instance of a class:
 *
 * ```
 * enter path ─▶ constructor args ─▶ new ─▶ properties ─▶ designated method ─▶ { instance, returned? }
 * ```
 *
 * The designated method is the first of: the method asked for by the
 * caller, the one registered with `registerMethod`, `@Injectable({ callOn })`,
 * and the container's `defaultMethod`. An explicitly named method must
 * exist; the others are skipped when the class does not have them.
 */

import type { ArgumentBag, Constructor, Resolution } from '../../domain/definition';
import { InvalidSubjectError } from '../../domain/exceptions';
import { CONSTRUCTOR_MEMBER, isClass, isObject } from '../../infrastructure/reflection';
import type { ParameterResolver } from './ParameterResolver';
import type { PropertyResolver } from './PropertyResolver';
import type { ResolutionServices } from './ResolutionStrategy';

interface DesignatedMethod {
  name: string;
  args: ArgumentBag;
}

export class ClassResolver {
  constructor(
    private readonly services: ResolutionServices,
    private readonly parameters: ParameterResolver,
    private readonly properties: PropertyResolver,
  ) {}

  resolve(cls: Constructor, constructorArgs: ArgumentBag, method?: string | false): Resolution {
    const { path, tracer, introspector, repository, logger } = this.services;
    const name = cls.name || '(anonymous class)';

    return path.enter('class', cls, name, () => {
      const endSpan = tracer.beginSpan(`class ${name}`);
      try {
        const shape = introspector.shapeOf(cls);
        const registered = repository.getClassResource(cls)?.constructorArgs;
        const args = this.parameters.resolve(
          shape,
          { ...registered, ...constructorArgs },
          { owner: name, ownerType: cls, member: CONSTRUCTOR_MEMBER, callSite: 'constructor' },
        );

        const instance: unknown = new cls(...args);
        this.properties.inject(cls, instance);
        logger.debug(`Constructed ${name}`);

        const designated = this.designatedMethod(cls, method);
        if (!designated) {
          return { instance };
        }

        return {
          instance,
          returned: this.invoke(instance, designated.name, designated.args, args),
        };
      } finally {
        endSpan();
      }
    });
  }

  /**
   * Resolve the parameters of `method` and call it on `instance`.
   */
  invoke(
    instance: unknown,
    method: string,
    args: ArgumentBag,
    siblings: readonly unknown[] = [],
  ): unknown {
    const cls = classOf(instance);
    const fn: unknown = isObject(instance) ? Reflect.get(instance, method) : undefined;
    if (!cls || typeof fn !== 'function') {
      throw new InvalidSubjectError(`${cls?.name ?? typeof instance}::${method}`, 'method does not exist');
    }

    const owner = cls.name || '(anonymous class)';
    const shape = this.services.introspector.methodShapeOf(cls, method);
    const values = shape
      ? this.parameters.resolve(
          shape,
          args,
          { owner, ownerType: cls, member: method, callSite: 'method' },
          siblings,
        )
      : Object.values(args);

    this.services.tracer.push(`call ${owner}::${method}()`);
    return Reflect.apply(fn, instance, values);
  }

  private designatedMethod(cls: Constructor, requested?: string | false): DesignatedMethod | undefined {
    if (requested === false) return undefined;

    const { introspector, repository } = this.services;
    const registered = repository.getClassResource(cls)?.method;

    if (typeof requested === 'string') {
      if (!introspector.methodShapeOf(cls, requested)) {
        throw new InvalidSubjectError(`${cls.name}::${requested}`, 'method does not exist');
      }
      return { name: requested, args: registered?.name === requested ? registered.args : {} };
    }

    if (registered && introspector.methodShapeOf(cls, registered.name)) {
      return registered;
    }

    const fallback =
      introspector.shapeOf(cls).declaredCallMethod ?? repository.getSettings().defaultMethod;
    if (fallback !== undefined && introspector.methodShapeOf(cls, fallback)) {
      return { name: fallback, args: {} };
    }
    return undefined;
  }
}

/**
 * The class `instance` was built from, when it was built from one.
 */
export function classOf(instance: unknown): Constructor | undefined {
  if (!isObject(instance)) return undefined;

  const proto: unknown = Object.getPrototypeOf(instance);
  if (!isObject(proto)) return undefined;

  const constructor: unknown = Reflect.get(proto, 'constructor');
  return isClass(constructor) ? constructor : undefined;
}
