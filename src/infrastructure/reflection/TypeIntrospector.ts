/**
 * @fileoverview Type Introspector
 *
 * @packageDocumentation
 * @module wiregraph/infrastructure/reflection
 *
 * Computes the structural shape of a class, instance, function or enum
 * once and memoizes it.
 *
 * ## Where the shape comes from
 *
 * | Piece                  | Source                                           |
 * |------------------------|--------------------------------------------------|
 * | parameter names        | `Function.prototype.toString()` + parser          |
 * | defaults, rest         | same                                             |
 * | declared types         | `design:paramtypes` (TypeScript, decorated only) |
 * | type overrides         | `@Inject(type)` / `withParameterTypes(fn, ...)`  |
 * | annotations            | `@Annotate(...)` and friends                     |
 * | lifetime, tags, callOn | `@Injectable({...})`                             |
 * | interfaces             | `@Contract()` ancestors and `@Implements(...)`   |
 *
 * TypeScript emits `design:paramtypes` only for classes carrying at least
 * one decorator, so autowired classes are expected to be marked
 * `@Injectable()`. Built-in types (`String`, `Object`, `Array`, ...) and
 * erased interface types are dropped: the parameter then has no type and
 * is satisfied by overrides, annotations, positional values or defaults.
 *
 * ## Cache
 *
 * The cache is owned by the introspector instance. Classes and enums are
 * memoized separately from callables and methods, keyed by the subject
 * itself, so a subject is introspected once per introspector.
 */

import { InvalidSubjectError } from '../../domain/exceptions';
import {
  InterfaceToken,
  isPositionalKey,
  type AbstractConstructor,
  type AnyFunction,
  type Constructor,
  type Identifier,
  type InterfaceRef,
  type Lifetime,
} from '../../domain/definition';
import {
  CONSTRUCTOR_MEMBER,
  MetadataKeys,
  getOwnMetadata,
  isContractClass,
  isIdentifier,
  isUnknownArray,
  readImplements,
  readInjectableOptions,
  readParameterAnnotations,
  readParameterTypeOverrides,
  readPropertyAnnotations,
} from './metadata';
import { ParameterListParser, type ParsedParameter } from './ParameterListParser';

// ============================================================================
// Descriptors
// ============================================================================

export type TypeKind = 'class' | 'function' | 'enum';

export interface ParameterDescriptor {
  readonly name: string;
  readonly index: number;
  /** Declared or overridden type; absent for untyped and built-in types */
  readonly type?: Identifier;
  readonly optional: boolean;
  readonly hasDefault: boolean;
  readonly defaultSource?: string;
  readonly rest: boolean;
  /** Annotation instances in declaration order */
  readonly annotations: readonly object[];
}

export interface TypeDescriptor {
  readonly kind: TypeKind;
  readonly name: string;
  /** The described class; for methods, the class that declares the method */
  readonly target?: AbstractConstructor;
  readonly parameters: readonly ParameterDescriptor[];
  readonly implementedInterfaces: readonly InterfaceRef[];
  readonly declaredCallMethod?: string;
  readonly lifetime?: Lifetime;
  readonly tags: readonly string[];
  /** Marked `@Contract()`: resolved through an interface binding */
  readonly isContract: boolean;
  /** Enum member names */
  readonly members: readonly string[];
}

export interface PropertyDescriptor {
  readonly name: string | symbol;
  readonly owner: AbstractConstructor;
  readonly type?: Identifier;
  readonly annotations: readonly object[];
}

// ============================================================================
// Guards
// ============================================================================

const CLASS_SOURCE = /^class[\s{]/;

/**
 * True for functions written with `class` syntax. Native constructors
 * (`String`, `Map`, ...) and plain functions are not classes.
 */
export function isClass(value: unknown): value is Constructor {
  return (
    typeof value === 'function' && CLASS_SOURCE.test(Function.prototype.toString.call(value))
  );
}

export function isCallable(value: unknown): value is AnyFunction {
  return typeof value === 'function';
}

/**
 * A callable that is not a class: a factory, closure or bound function.
 */
export function isFactory(value: unknown): value is AnyFunction {
  return isCallable(value) && !isClass(value);
}

/**
 * Interface tokens and `@Contract()` classes.
 */
export function isInterfaceRef(value: unknown): value is InterfaceRef {
  return asInterfaceRef(value) !== undefined;
}

/**
 * `value` as an interface reference, or `undefined` when it is none.
 */
export function asInterfaceRef(value: unknown): InterfaceRef | undefined {
  if (value instanceof InterfaceToken) return value;
  if (isClass(value) && isContractClass(value)) return value;
  return undefined;
}

function isEnumObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) return false;

  const values = Object.values(value);
  return (
    values.length > 0 &&
    values.every((entry) => typeof entry === 'string' || typeof entry === 'number')
  );
}

/**
 * Each class of the prototype chain, starting with `cls`.
 */
export function classChain(cls: AbstractConstructor): AbstractConstructor[] {
  const chain: AbstractConstructor[] = [];
  for (let current: unknown = cls; isClass(current); current = Object.getPrototypeOf(current)) {
    chain.push(current);
  }
  return chain;
}

function describeSubject(subject: unknown): string {
  if (typeof subject === 'string') return `'${subject}'`;
  if (subject === null) return 'null';
  if (typeof subject === 'object') return 'plain object';
  return typeof subject;
}

// ============================================================================
// Introspector
// ============================================================================

export class TypeIntrospector {
  private classCache = new WeakMap<object, TypeDescriptor>();
  private callableCache = new WeakMap<object, TypeDescriptor>();
  private methodCache = new WeakMap<object, TypeDescriptor>();
  private propertyCache = new WeakMap<object, readonly PropertyDescriptor[]>();

  constructor(private readonly parser: ParameterListParser = new ParameterListParser()) {}

  /**
   * Shape of a class, an instance (its class is described), a function or
   * closure, or an enum object.
   *
   * @throws InvalidSubjectError for primitives and plain objects that are
   * not enum-shaped
   */
  shapeOf(subject: unknown): TypeDescriptor {
    if (isClass(subject)) return this.describeClass(subject);
    if (isCallable(subject)) return this.describeCallable(subject);

    if (typeof subject === 'object' && subject !== null) {
      if (isEnumObject(subject)) return this.describeEnum(subject);

      const proto: unknown = Object.getPrototypeOf(subject);
      if (typeof proto === 'object' && proto !== null && proto !== Object.prototype) {
        const constructor: unknown = Reflect.get(proto, 'constructor');
        if (isClass(constructor)) return this.describeClass(constructor);
      }
    }

    throw new InvalidSubjectError(describeSubject(subject));
  }

  /**
   * Shape of `cls.prototype[method]`, looked up along the class chain.
   * Returns `undefined` when no class in the chain declares the method.
   */
  methodShapeOf(cls: AbstractConstructor, method: string): TypeDescriptor | undefined {
    const owner = classChain(cls).find((current) =>
      Object.prototype.hasOwnProperty.call(current.prototype, method),
    );
    if (!owner) return undefined;

    const proto: unknown = owner.prototype;
    if (typeof proto !== 'object' || proto === null) return undefined;

    const fn: unknown = Reflect.get(proto, method);
    if (!isCallable(fn)) return undefined;

    const cached = this.methodCache.get(fn);
    if (cached) return cached;

    const parsed = this.parser.parseCallable(Function.prototype.toString.call(fn));
    const descriptor: TypeDescriptor = {
      kind: 'function',
      name: `${owner.name}::${method}`,
      target: owner,
      parameters: this.buildParameters(
        parsed,
        getOwnMetadata(MetadataKeys.PARAM_TYPES, proto, method),
        owner,
        method,
      ),
      implementedInterfaces: [],
      tags: [],
      isContract: false,
      members: [],
    };

    this.methodCache.set(fn, descriptor);
    return descriptor;
  }

  /**
   * Annotated properties of `cls` and its ancestors. A property annotated
   * on both a subclass and a parent keeps the subclass annotations.
   */
  propertiesOf(cls: AbstractConstructor): readonly PropertyDescriptor[] {
    const cached = this.propertyCache.get(cls);
    if (cached) return cached;

    const seen = new Set<string | symbol>();
    const properties: PropertyDescriptor[] = [];

    for (const owner of classChain(cls)) {
      const ownAnnotations = readPropertyAnnotations(owner);
      const names = [...new Set(ownAnnotations.map((entry) => entry.property))];

      for (const name of names) {
        if (seen.has(name)) continue;
        seen.add(name);

        const declared = getOwnMetadata(MetadataKeys.PROPERTY_TYPE, owner.prototype, name);
        properties.push({
          name,
          owner,
          type: isClass(declared) ? declared : undefined,
          annotations: ownAnnotations
            .filter((entry) => entry.property === name)
            .map((entry) => entry.annotation),
        });
      }
    }

    this.propertyCache.set(cls, properties);
    return properties;
  }

  /**
   * Whether `cls` is, extends or declares `iface`.
   */
  implementsInterface(cls: AbstractConstructor, iface: InterfaceRef): boolean {
    if (cls === iface) return true;
    return this.shapeOf(cls).implementedInterfaces.includes(iface);
  }

  /**
   * Drop every memoized shape.
   */
  clear(): void {
    this.classCache = new WeakMap();
    this.callableCache = new WeakMap();
    this.methodCache = new WeakMap();
    this.propertyCache = new WeakMap();
  }

  // ==========================================================================
  // Describers
  // ==========================================================================

  private describeClass(cls: Constructor): TypeDescriptor {
    const cached = this.classCache.get(cls);
    if (cached) return cached;

    const options = readInjectableOptions(cls);
    const descriptor: TypeDescriptor = {
      kind: 'class',
      name: cls.name || '(anonymous class)',
      target: cls,
      parameters: this.constructorParameters(cls),
      implementedInterfaces: this.collectInterfaces(cls),
      declaredCallMethod: options?.callOn,
      lifetime: options?.lifetime,
      tags: options?.tags ?? [],
      isContract: isContractClass(cls),
      members: [],
    };

    this.classCache.set(cls, descriptor);
    return descriptor;
  }

  private describeCallable(fn: AnyFunction): TypeDescriptor {
    const cached = this.callableCache.get(fn);
    if (cached) return cached;

    const parsed = this.parser.parseCallable(Function.prototype.toString.call(fn));
    const descriptor: TypeDescriptor = {
      kind: 'function',
      name: fn.name || 'closure',
      parameters: this.buildParameters(
        parsed,
        getOwnMetadata(MetadataKeys.FUNCTION_PARAM_TYPES, fn),
        undefined,
        undefined,
        true,
      ),
      implementedInterfaces: [],
      tags: [],
      isContract: false,
      members: [],
    };

    this.callableCache.set(fn, descriptor);
    return descriptor;
  }

  private describeEnum(subject: object): TypeDescriptor {
    const cached = this.classCache.get(subject);
    if (cached) return cached;

    // Numeric enums carry a reverse mapping: '0' -> 'Member'.
    const members = Object.entries(subject)
      .filter(([key, value]) => !(isPositionalKey(key) && typeof value === 'string'))
      .map(([key]) => key);

    const descriptor: TypeDescriptor = {
      kind: 'enum',
      name: '(enum)',
      parameters: [],
      implementedInterfaces: [],
      tags: [],
      isContract: false,
      members,
    };

    this.classCache.set(subject, descriptor);
    return descriptor;
  }

  /**
   * Parameters of the nearest constructor in the class chain.
   */
  private constructorParameters(cls: Constructor): ParameterDescriptor[] {
    for (const current of classChain(cls)) {
      const parsed = this.parser.parseConstructor(Function.prototype.toString.call(current));
      if (parsed !== undefined) {
        return this.buildParameters(
          parsed,
          getOwnMetadata(MetadataKeys.PARAM_TYPES, current),
          current,
          CONSTRUCTOR_MEMBER,
        );
      }
    }
    return [];
  }

  private buildParameters(
    parsed: readonly ParsedParameter[],
    declaredTypes: unknown,
    owner?: AbstractConstructor,
    member?: string,
    explicit = false,
  ): ParameterDescriptor[] {
    const types = isUnknownArray(declaredTypes) ? declaredTypes : [];
    const overrides = owner
      ? readParameterTypeOverrides(owner).filter((entry) => entry.member === member)
      : [];
    const annotations = owner
      ? readParameterAnnotations(owner).filter((entry) => entry.member === member)
      : [];

    return parsed.map((parameter, index) => {
      const declared = types[index];
      const override = overrides.find((entry) => entry.index === index);

      return {
        name: parameter.name,
        index,
        type: override?.type ?? this.declaredType(declared, explicit),
        optional: parameter.defaultSource !== undefined || parameter.rest,
        hasDefault: parameter.defaultSource !== undefined,
        defaultSource: parameter.defaultSource,
        rest: parameter.rest,
        annotations: annotations
          .filter((entry) => entry.index === index)
          .map((entry) => entry.annotation),
      };
    });
  }

  /**
   * Emitted types keep user classes only. Types listed through
   * `withParameterTypes` are taken as written.
   */
  private declaredType(declared: unknown, explicit: boolean): Identifier | undefined {
    if (explicit) return isIdentifier(declared) ? declared : undefined;
    return isClass(declared) ? declared : undefined;
  }

  private collectInterfaces(cls: Constructor): InterfaceRef[] {
    const found: InterfaceRef[] = [];

    for (const current of classChain(cls)) {
      if (current !== cls && isContractClass(current)) {
        found.push(current);
      }
      for (const declared of readImplements(current)) {
        if (isInterfaceRef(declared)) found.push(declared);
      }
    }

    return [...new Set(found)];
  }
}
