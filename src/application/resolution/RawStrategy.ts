import type {
  AnyFunction,
  ArgumentBag,
  Constructor,
  Identifier,
  Resolution,
} from '../../domain/definition';
import { InvalidSubjectError } from '../../domain/exceptions';
import { isClass, isFactory, isObject } from '../../infrastructure/reflection';
import { TraceLevel } from '../../infrastructure/tracing';
import { classOf } from './ClassResolver';
import { PropertyResolver } from './PropertyResolver';
import type { ResolutionServices, ResolutionStrategy } from './ResolutionStrategy';

/**
 * Strategy used when `injection` is off.
 *
 * Nothing is introspected: constructors receive the values of their
 * registered argument bag in insertion order, methods and closures the
 * values of theirs, and registered properties are assigned. Dependencies
 * are not resolved and cycles are not detected.
 */
export class RawStrategy implements ResolutionStrategy {
  readonly name = 'raw';

  private readonly properties: PropertyResolver;

  constructor(private readonly services: ResolutionServices) {
    this.properties = new PropertyResolver(services);
  }

  resolveClass(cls: Constructor, constructorArgs: ArgumentBag, method?: string | false): Resolution {
    const resource = this.services.repository.getClassResource(cls);
    const args = { ...resource?.constructorArgs, ...constructorArgs };

    const instance: unknown = new cls(...Object.values(args));
    this.properties.applyRegistered(cls, instance);
    this.services.tracer.push(`raw class ${cls.name}`, TraceLevel.Node);

    if (method === false) return { instance };

    const registered = resource?.method;
    if (typeof method === 'string') {
      return {
        instance,
        returned: this.invokeMethod(instance, method, registered?.name === method ? registered.args : {}),
      };
    }
    if (registered) {
      return { instance, returned: this.invokeMethod(instance, registered.name, registered.args) };
    }

    const fallback = this.services.repository.getSettings().defaultMethod;
    if (fallback !== undefined && isObject(instance) && typeof Reflect.get(instance, fallback) === 'function') {
      return { instance, returned: this.invokeMethod(instance, fallback, {}) };
    }
    return { instance };
  }

  resolveDefinition(_id: Identifier, value: unknown): Resolution {
    if (isClass(value)) {
      return this.resolveClass(value, {});
    }
    if (isFactory(value)) {
      return { instance: this.invokeCallable(value, {}) };
    }
    return { instance: value };
  }

  invokeMethod(instance: unknown, method: string, args: ArgumentBag): unknown {
    const fn: unknown = isObject(instance) ? Reflect.get(instance, method) : undefined;
    if (typeof fn !== 'function') {
      throw new InvalidSubjectError(
        `${classOf(instance)?.name ?? typeof instance}::${method}`,
        'method does not exist',
      );
    }
    return Reflect.apply(fn, instance, Object.values(args));
  }

  invokeCallable(fn: AnyFunction, args: ArgumentBag): unknown {
    return Reflect.apply(fn, undefined, Object.values(args));
  }
}
