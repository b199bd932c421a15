/**
 * @fileoverview Runtime reflection exports
 *
 * @packageDocumentation
 * @module wiregraph/infrastructure/reflection
 */

export {
  TypeIntrospector,
  isClass,
  isCallable,
  isFactory,
  isInterfaceRef,
  asInterfaceRef,
  classChain,
} from './TypeIntrospector';
export type {
  TypeKind,
  TypeDescriptor,
  ParameterDescriptor,
  PropertyDescriptor,
} from './TypeIntrospector';

export { ParameterListParser } from './ParameterListParser';
export type { ParsedParameter } from './ParameterListParser';

export {
  MetadataKeys,
  CONSTRUCTOR_MEMBER,
  isObject,
  isIdentifier,
  isContractClass,
  getMetadata,
  getOwnMetadata,
  defineMetadata,
  readInjectableOptions,
  writeParameterTypeOverride,
  writeParameterAnnotation,
  writePropertyAnnotation,
} from './metadata';
export type {
  InjectableOptions,
  ParameterTypeOverride,
  ParameterAnnotation,
  PropertyAnnotation,
} from './metadata';
