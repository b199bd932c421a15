/**
 * @fileoverview Resolution strategy contracts
 *
 * @packageDocumentation
 * @module wiregraph/application/resolution
 *
 * Two strategies build values: {@link AutowiredStrategy} introspects
 * signatures and recurses through the graph; {@link RawStrategy} only
 * replays what was registered. The {@link ResolutionKernel} picks one per
 * request from the `injection` setting and owns everything both share:
 * lifetimes, the lazy layer, the definition cache and entry dispatch.
 */

import type {
  AnyFunction,
  ArgumentBag,
  Constructor,
  Identifier,
  InterfaceRef,
  Resolution,
} from '../../domain/definition';
import type { ILogger } from '../../infrastructure/logging';
import type { TypeIntrospector } from '../../infrastructure/reflection';
import type { DebugTracer } from '../../infrastructure/tracing';
import type { DefinitionRepository } from '../di/DefinitionRepository';
import type { IContainer } from '../di/IDependencyInjection';
import type { MetadataResolverRegistry } from '../metadata';
import type { LifetimeManager } from './LifetimeManager';
import type { ResolutionPath } from './ResolutionPath';

export type StrategyName = 'autowired' | 'raw';

export interface ResolutionStrategy {
  readonly name: StrategyName;

  /**
   * Construct `cls`, apply properties and run its designated method.
   * Never consults or fills the lifetime cache for `cls` itself.
   *
   * @param method - a method to run instead of the designated one, or
   * `false` to run none
   */
  resolveClass(cls: Constructor, constructorArgs: ArgumentBag, method?: string | false): Resolution;

  /**
   * Turn a definition value into a resolution: classes are built, factories
   * invoked, anything else returned as is.
   */
  resolveDefinition(id: Identifier, value: unknown): Resolution;

  /**
   * Invoke `method` on an already resolved instance.
   */
  invokeMethod(instance: unknown, method: string, args: ArgumentBag): unknown;

  invokeCallable(fn: AnyFunction, args: ArgumentBag, label?: string): unknown;
}

/**
 * What the resolvers of a strategy need from the kernel.
 */
export interface ResolutionServices {
  readonly repository: DefinitionRepository;
  readonly introspector: TypeIntrospector;
  readonly metadata: MetadataResolverRegistry;
  readonly lifetimes: LifetimeManager;
  readonly path: ResolutionPath;
  readonly tracer: DebugTracer;
  readonly logger: ILogger;
  readonly container: IContainer;

  /**
   * Value of a definition, cached per its lifetime.
   */
  resolveDefinition(id: Identifier): unknown;

  /**
   * Instance of a class dependency, cached per the class's lifetime.
   */
  resolveClassDependency(cls: Constructor): unknown;

  /**
   * Concrete class bound to `iface` in the current environment.
   */
  concreteFor(iface: InterfaceRef): Constructor | undefined;
}
