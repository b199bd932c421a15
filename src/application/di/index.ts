/**
 * @module wiregraph/application/di
 * @description Container, configuration and decorators
 */

// ============================================================================
// Container
// ============================================================================

export { Container } from './Container';
export type { BindOptions, DefinitionSource } from './Container';

export type { IContainer, IServiceProvider } from './IDependencyInjection';

// ============================================================================
// State & Options
// ============================================================================

export { DefinitionRepository, GLOBAL_SCOPE } from './DefinitionRepository';
export type {
  ScopeKey,
  ResolvedValue,
  ClassResourcePatch,
  RepositoryOptions,
} from './DefinitionRepository';

export {
  DEFAULT_ENVIRONMENT,
  DEFAULT_SCOPE,
  DEFAULT_CACHE_NAMESPACE,
  DEFAULT_RESOLUTION_SETTINGS,
  resolveSettings,
} from './ContainerOptions';
export type { ContainerOptions, MutableOptions, ResolutionSettings } from './ContainerOptions';

// ============================================================================
// Decorators
// ============================================================================

export { Injectable, Inject, Contract, Implements, withParameterTypes } from './decorators';
