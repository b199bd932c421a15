/**
 * wiregraph - Resolution Module
 */

export { ResolutionKernel } from './ResolutionKernel';
export type { KernelDependencies } from './ResolutionKernel';
export type { ResolutionStrategy, ResolutionServices, StrategyName } from './ResolutionStrategy';
export { AutowiredStrategy } from './AutowiredStrategy';
export { RawStrategy } from './RawStrategy';
export { ClassResolver, classOf } from './ClassResolver';
export { DefinitionResolver } from './DefinitionResolver';
export { ParameterResolver } from './ParameterResolver';
export type { CallTarget } from './ParameterResolver';
export { PropertyResolver } from './PropertyResolver';
export { LifetimeManager } from './LifetimeManager';
export type { ObtainOptions } from './LifetimeManager';
export { LazyPlaceholder } from './LazyPlaceholder';
export type { PlaceholderState } from './LazyPlaceholder';
export { ResolutionPath, renderDependencyGraph } from './ResolutionPath';
export type { FrameKind } from './ResolutionPath';
