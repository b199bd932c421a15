/**
 * @fileoverview Definition data model
 *
 * @packageDocumentation
 * @module wiregraph/domain/definition
 */

import { InterfaceToken } from './InterfaceToken';
import { Lifetime } from './Lifetime';

// ============================================================================
// Callable shapes
// ============================================================================

/**
 * Concrete class constructor.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = unknown> = new (...args: any[]) => T;

/**
 * Abstract or concrete class constructor.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractConstructor<T = unknown> = abstract new (...args: any[]) => T;

/**
 * Any plain function or closure. Invoked through `Reflect.apply`.
 */
export type AnyFunction = (...args: never[]) => unknown;

// ============================================================================
// Identifiers
// ============================================================================

/**
 * Abstract type the container can resolve through an environment binding.
 */
export type InterfaceRef = InterfaceToken | AbstractConstructor;

/**
 * Key of a definition, class or interface.
 *
 * Keys compare by identity, so two tokens created with the same name are
 * two different identifiers.
 */
export type Identifier = string | symbol | AbstractConstructor | InterfaceToken;

export function describeIdentifier(id: Identifier): string {
  if (typeof id === 'string') return id;
  if (typeof id === 'symbol') return id.toString();
  if (id instanceof InterfaceToken) return id.name;
  return id.name || '(anonymous class)';
}

// ============================================================================
// Argument bags
// ============================================================================

/**
 * Named or positional arguments. Keys are parameter names, or decimal
 * indexes (`'0'`, `'1'`, ...) for positional values.
 */
export type ArgumentBag = Record<string, unknown>;

/**
 * What callers may hand in wherever an {@link ArgumentBag} is accepted.
 * Arrays become positional bags.
 */
export type ArgumentInput = ArgumentBag | readonly unknown[];

export function toArgumentBag(input: ArgumentInput | undefined): ArgumentBag {
  if (input === undefined) return {};
  if (isReadonlyArray(input)) {
    const bag: ArgumentBag = {};
    input.forEach((value, index) => {
      bag[String(index)] = value;
    });
    return bag;
  }
  return { ...input };
}

function isReadonlyArray(value: ArgumentInput): value is readonly unknown[] {
  return Array.isArray(value);
}

const POSITIONAL_KEY = /^(0|[1-9]\d*)$/;

export function isPositionalKey(key: string): boolean {
  return POSITIONAL_KEY.test(key);
}

/**
 * Positional values of a bag, in index order.
 */
export function positionalValues(bag: ArgumentBag): unknown[] {
  return Object.keys(bag)
    .filter(isPositionalKey)
    .sort((a, b) => Number(a) - Number(b))
    .map((key) => bag[key]);
}

// ============================================================================
// Definitions & resources
// ============================================================================

export interface DefinitionMeta {
  lifetime: Lifetime;
  tags: readonly string[];
}

export interface MethodResource {
  name: string;
  args: ArgumentBag;
}

/**
 * Explicit registrations recorded for a class.
 */
export interface ClassResource {
  constructorArgs?: ArgumentBag;
  method?: MethodResource;
  properties?: ArgumentBag;
}

export interface ClosureResource {
  fn: AnyFunction;
  args: ArgumentBag;
}

/**
 * Outcome of resolving a class or definition. `returned` is present only
 * when a designated method was invoked.
 */
export interface Resolution<T = unknown> {
  instance: T;
  returned?: unknown;
}

export function hasReturned(resolution: Resolution): boolean {
  return Object.prototype.hasOwnProperty.call(resolution, 'returned');
}
