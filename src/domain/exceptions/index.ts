/**
 * wiregraph - Exception Module
 *
 * Error taxonomy raised by configuration, introspection and resolution
 */

export {
  ContainerException,
  AmbiguousDefinitionError,
  ConfigurationLockedError,
  InvalidSubjectError,
  NotFoundException,
  DependencyResolutionError,
  UnresolvableDependencyError,
  InterfaceNotBoundError,
  CircularDependencyError,
} from './exceptions';

export type { CallSite, UnresolvableDetails } from './exceptions';
