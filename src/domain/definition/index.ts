/**
 * wiregraph - Definition Module
 */

export { Lifetime, DEFAULT_LIFETIME, isLifetime } from './Lifetime';
export { InterfaceToken, createInterface } from './InterfaceToken';
export {
  describeIdentifier,
  toArgumentBag,
  isPositionalKey,
  positionalValues,
  hasReturned,
} from './types';

export type {
  Constructor,
  AbstractConstructor,
  AnyFunction,
  InterfaceRef,
  Identifier,
  ArgumentBag,
  ArgumentInput,
  DefinitionMeta,
  MethodResource,
  ClassResource,
  ClosureResource,
  Resolution,
} from './types';
