/**
 * @fileoverview Decorator metadata storage
 *
 * @packageDocumentation
 * @module wiregraph/infrastructure/reflection
 *
 * Thin typed layer over `reflect-metadata`. Decorators write through these
 * helpers and the {@link TypeIntrospector} reads through them, so every
 * value that comes back out is narrowed by a guard instead of arriving as
 * `any`.
 *
 * Per-parameter records are stored on the owning class, keyed by member
 * name; constructor parameters use the member name `'constructor'`.
 */

import 'reflect-metadata';

import {
  InterfaceToken,
  isLifetime,
  type Identifier,
  type Lifetime,
} from '../../domain/definition';

export const MetadataKeys = {
  /** Emitted by TypeScript for decorated constructors and methods */
  PARAM_TYPES: 'design:paramtypes',
  /** Emitted by TypeScript for decorated properties */
  PROPERTY_TYPE: 'design:type',
  INJECTABLE: 'injectable:options',
  INJECT_PARAMETERS: 'injectable:parameters',
  FUNCTION_PARAM_TYPES: 'wiregraph:function-paramtypes',
  CONTRACT: 'wiregraph:contract',
  IMPLEMENTS: 'wiregraph:implements',
  PARAMETER_ANNOTATIONS: 'wiregraph:annotations:parameters',
  PROPERTY_ANNOTATIONS: 'wiregraph:annotations:properties',
} as const;

export const CONSTRUCTOR_MEMBER = 'constructor';

// ============================================================================
// Record shapes
// ============================================================================

export interface InjectableOptions {
  /** Lifetime used when the class is resolved by type. Default Singleton. */
  lifetime?: Lifetime;
  tags?: readonly string[];
  /** Method invoked after construction when none is registered explicitly */
  callOn?: string;
}

export interface ParameterTypeOverride {
  member: string;
  index: number;
  type: Identifier;
}

export interface ParameterAnnotation {
  member: string;
  index: number;
  annotation: object;
}

export interface PropertyAnnotation {
  property: string | symbol;
  annotation: object;
}

// ============================================================================
// Guards
// ============================================================================

export function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

export function isIdentifier(value: unknown): value is Identifier {
  return (
    typeof value === 'string' ||
    typeof value === 'symbol' ||
    typeof value === 'function' ||
    value instanceof InterfaceToken
  );
}

export function isUnknownArray(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

function isArrayOf<T>(value: unknown, item: (entry: unknown) => entry is T): value is T[] {
  return Array.isArray(value) && value.every(item);
}

function isInjectableOptions(value: unknown): value is InjectableOptions {
  if (!isObject(value)) return false;
  if ('lifetime' in value && value.lifetime !== undefined && !isLifetime(value.lifetime)) return false;
  if ('callOn' in value && value.callOn !== undefined && typeof value.callOn !== 'string') return false;
  return true;
}

function isParameterTypeOverride(value: unknown): value is ParameterTypeOverride {
  return (
    isObject(value) &&
    'member' in value &&
    typeof value.member === 'string' &&
    'index' in value &&
    typeof value.index === 'number' &&
    'type' in value &&
    isIdentifier(value.type)
  );
}

function isParameterAnnotation(value: unknown): value is ParameterAnnotation {
  return (
    isObject(value) &&
    'member' in value &&
    typeof value.member === 'string' &&
    'index' in value &&
    typeof value.index === 'number' &&
    'annotation' in value &&
    isObject(value.annotation)
  );
}

function isPropertyAnnotation(value: unknown): value is PropertyAnnotation {
  return (
    isObject(value) &&
    'property' in value &&
    (typeof value.property === 'string' || typeof value.property === 'symbol') &&
    'annotation' in value &&
    isObject(value.annotation)
  );
}

function isInterfaceRefList(value: unknown): value is Identifier[] {
  return isArrayOf(value, isIdentifier);
}

// ============================================================================
// Raw access
// ============================================================================

export function getOwnMetadata(key: string, target: object, member?: string | symbol): unknown {
  return member === undefined
    ? Reflect.getOwnMetadata(key, target)
    : Reflect.getOwnMetadata(key, target, member);
}

/**
 * Like {@link getOwnMetadata} but walks the prototype chain of `target`.
 */
export function getMetadata(key: string, target: object, member?: string | symbol): unknown {
  return member === undefined
    ? Reflect.getMetadata(key, target)
    : Reflect.getMetadata(key, target, member);
}

export function defineMetadata(
  key: string,
  value: unknown,
  target: object,
  member?: string | symbol,
): void {
  if (member === undefined) {
    Reflect.defineMetadata(key, value, target);
  } else {
    Reflect.defineMetadata(key, value, target, member);
  }
}

// ============================================================================
// Typed readers / writers
// ============================================================================

export function readInjectableOptions(target: object): InjectableOptions | undefined {
  const value = getMetadata(MetadataKeys.INJECTABLE, target);
  return isInjectableOptions(value) ? value : undefined;
}

export function readParameterTypeOverrides(owner: object): ParameterTypeOverride[] {
  const value = getOwnMetadata(MetadataKeys.INJECT_PARAMETERS, owner);
  return isArrayOf(value, isParameterTypeOverride) ? value : [];
}

export function readParameterAnnotations(owner: object): ParameterAnnotation[] {
  const value = getOwnMetadata(MetadataKeys.PARAMETER_ANNOTATIONS, owner);
  return isArrayOf(value, isParameterAnnotation) ? value : [];
}

export function readPropertyAnnotations(owner: object): PropertyAnnotation[] {
  const value = getOwnMetadata(MetadataKeys.PROPERTY_ANNOTATIONS, owner);
  return isArrayOf(value, isPropertyAnnotation) ? value : [];
}

export function readImplements(owner: object): Identifier[] {
  const value = getOwnMetadata(MetadataKeys.IMPLEMENTS, owner);
  return isInterfaceRefList(value) ? value : [];
}

export function isContractClass(value: unknown): boolean {
  return typeof value === 'function' && getOwnMetadata(MetadataKeys.CONTRACT, value) === true;
}

/**
 * Record a parameter type override. A later override for the same slot wins.
 */
export function writeParameterTypeOverride(owner: object, entry: ParameterTypeOverride): void {
  const existing = readParameterTypeOverrides(owner).filter(
    (item) => item.member !== entry.member || item.index !== entry.index,
  );
  defineMetadata(MetadataKeys.INJECT_PARAMETERS, [...existing, entry], owner);
}

/**
 * Parameter decorators run bottom-up; prepending keeps the list in
 * declaration order.
 */
export function writeParameterAnnotation(owner: object, entry: ParameterAnnotation): void {
  defineMetadata(
    MetadataKeys.PARAMETER_ANNOTATIONS,
    [entry, ...readParameterAnnotations(owner)],
    owner,
  );
}

/**
 * Properties are decorated top to bottom, but the decorators of one
 * property run bottom-up. An entry goes in front of its own property's
 * earlier entries, or last for a property not seen yet.
 */
export function writePropertyAnnotation(owner: object, entry: PropertyAnnotation): void {
  const entries = readPropertyAnnotations(owner);
  const first = entries.findIndex((existing) => existing.property === entry.property);
  const at = first === -1 ? entries.length : first;

  defineMetadata(
    MetadataKeys.PROPERTY_ANNOTATIONS,
    [...entries.slice(0, at), entry, ...entries.slice(at)],
    owner,
  );
}
