/**
 * @fileoverview Container
 *
 * @packageDocumentation
 * @module wiregraph/application/di
 *
 * Public facade over the {@link DefinitionRepository} (state) and the
 * {@link ResolutionKernel} (behavior). Configuration methods return `this`
 * and are rejected once the container is locked; resolution methods stay
 * available.
 */

import {
  DEFAULT_LIFETIME,
  describeIdentifier,
  hasReturned,
  toArgumentBag,
  type AbstractConstructor,
  type AnyFunction,
  type ArgumentBag,
  type ArgumentInput,
  type Constructor,
  type Identifier,
  type InterfaceRef,
  type InterfaceToken,
  Lifetime,
  type Resolution,
} from '../../domain/definition';
import { ContainerException, NotFoundException } from '../../domain/exceptions';
import { silentLogger, type ILogger } from '../../infrastructure/logging';
import {
  TypeIntrospector,
  isFactory,
  readInjectableOptions,
} from '../../infrastructure/reflection';
import { DebugTracer, TraceLevel, type TraceRecord } from '../../infrastructure/tracing';
import { InfuseAnnotation, InfuseResolver, MetadataResolverRegistry } from '../metadata';
import type { IDefinitionCacheAdapter } from '../ports';
import { ResolutionKernel } from '../resolution';
import type { ContainerOptions, MutableOptions } from './ContainerOptions';
import {
  DefinitionRepository,
  GLOBAL_SCOPE,
  type ClassResourcePatch,
} from './DefinitionRepository';
import type { IContainer, IServiceProvider } from './IDependencyInjection';

export interface BindOptions {
  lifetime?: Lifetime;
  tags?: readonly string[];
}

/**
 * Definitions keyed by string id, or any identifiers as entries.
 */
export type DefinitionSource =
  | Record<string, unknown>
  | Iterable<readonly [Identifier, unknown]>;

function isEntryIterable(
  source: DefinitionSource,
): source is Iterable<readonly [Identifier, unknown]> {
  return Symbol.iterator in source;
}

/**
 * Dependency resolution container.
 *
 * @example
 * ```typescript
 * const container = Container.create({ environment: 'production' });
 *
 * container
 *   .bind('db.url', 'postgres://localhost/app')
 *   .bind('clock', () => new SystemClock(), { lifetime: Lifetime.Transient })
 *   .bindInterfaceForEnv('production', PaymentGateway, StripeGateway)
 *   .registerMethod(Checkout, 'boot')
 *   .lock();
 *
 * const checkout = container.get(Checkout);
 * ```
 */
export class Container implements IContainer {
  private readonly repository: DefinitionRepository;
  private readonly kernel: ResolutionKernel;
  private readonly metadataRegistry = new MetadataResolverRegistry();
  private readonly typeIntrospector = new TypeIntrospector();
  private readonly debugTracer: DebugTracer;
  private readonly logger: ILogger;

  constructor(options: ContainerOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.debugTracer = new DebugTracer(options.traceLevel ?? TraceLevel.Off);
    this.repository = new DefinitionRepository({ ...options, logger: this.logger });
    this.kernel = new ResolutionKernel({
      repository: this.repository,
      introspector: this.typeIntrospector,
      metadata: this.metadataRegistry,
      tracer: this.debugTracer,
      logger: this.logger,
      container: this,
    });

    this.metadataRegistry.register(InfuseAnnotation, new InfuseResolver());
    this.repository.setResolved(Container, GLOBAL_SCOPE, { instance: this });
  }

  /**
   * Create a new container
   */
  static create(options?: ContainerOptions): Container {
    return new Container(options);
  }

  // ==================== Definitions ====================

  /**
   * Bind `id` to a literal value, a class or a factory.
   *
   * In lazy mode a non-factory Singleton definition is stored as a
   * placeholder and resolved on first read.
   *
   * @throws AmbiguousDefinitionError when `id` and `value` are the same
   * @throws ConfigurationLockedError after {@link lock}
   */
  bind(id: Identifier, value: unknown, options: BindOptions = {}): this {
    this.repository.setDefinition(
      id,
      value,
      options.lifetime ?? DEFAULT_LIFETIME,
      options.tags ?? [],
    );

    if (this.repository.getSettings().lazy) {
      this.kernel.deferDefinition(id);
    }
    return this;
  }

  /**
   * Bind many definitions with the default lifetime and no tags.
   */
  addDefinitions(definitions: DefinitionSource): this {
    const entries = isEntryIterable(definitions) ? definitions : Object.entries(definitions);
    for (const [id, value] of entries) {
      this.bind(id, value);
    }
    return this;
  }

  // ==================== Registration ====================

  /**
   * Arguments for the constructor of `cls`, by parameter name or position.
   * Replaces earlier constructor arguments.
   */
  registerClass(cls: AbstractConstructor, args: ArgumentInput = {}): this {
    this.addClassResource(cls, { kind: 'constructor', args: toArgumentBag(args) });
    return this;
  }

  /**
   * Method to run on `cls` after construction, with its arguments.
   */
  registerMethod(cls: AbstractConstructor, method: string, args: ArgumentInput = {}): this {
    this.addClassResource(cls, {
      kind: 'method',
      method: { name: method, args: toArgumentBag(args) },
    });
    return this;
  }

  /**
   * Values assigned to properties of `cls` after construction. Merges with
   * earlier property registrations.
   */
  registerProperty(cls: AbstractConstructor, properties: Record<string, unknown>): this {
    this.addClassResource(cls, { kind: 'property', properties: { ...properties } });
    return this;
  }

  /**
   * Make `fn` callable by `alias` through {@link call} and {@link get}.
   */
  registerClosure(alias: string, fn: AnyFunction, args: ArgumentInput = {}): this {
    this.repository.addClosureResource(alias, fn, toArgumentBag(args));
    return this;
  }

  bindInterfaceForEnv(environment: string, iface: InterfaceRef, concrete: Constructor): this {
    this.repository.bindInterfaceForEnv(environment, iface, concrete);
    return this;
  }

  registerProvider(provider: IServiceProvider): this {
    provider.register(this);
    return this;
  }

  // ==================== Resolution ====================

  get<T>(id: AbstractConstructor<T>): T;
  get<T>(id: InterfaceToken<T>): T;
  get(id: Identifier): unknown;
  get(id: Identifier): unknown {
    return this.kernel.resolveEntry(id).instance;
  }

  getReturn(id: Identifier): unknown {
    const resolution = this.kernel.resolveEntry(id);
    return hasReturned(resolution) ? resolution.returned : resolution.instance;
  }

  make<T>(id: AbstractConstructor<T>, method?: false): T;
  make<T>(id: InterfaceToken<T>, method?: false): T;
  make(id: AbstractConstructor | InterfaceToken, method: string): unknown;
  make(id: AbstractConstructor | InterfaceToken, method: string | false = false): unknown {
    const resolution = this.kernel.buildFresh(id, method);
    return typeof method === 'string' ? resolution.returned : resolution.instance;
  }

  call(target: Identifier | AnyFunction, method?: string | false, args?: ArgumentInput): unknown {
    const bag = toArgumentBag(args);
    const strategy = this.kernel.strategy();

    if (typeof target === 'string' || typeof target === 'symbol') {
      if (this.repository.hasDefinition(target)) {
        return this.callOn(this.kernel.resolveDefinitionEntry(target), method, bag);
      }

      const closure =
        typeof target === 'string' ? this.repository.getClosureResource(target) : undefined;
      if (closure) {
        return strategy.invokeCallable(
          closure.fn,
          { ...closure.args, ...bag },
          describeIdentifier(target),
        );
      }
      throw new NotFoundException(describeIdentifier(target));
    }

    if (isFactory(target)) {
      return strategy.invokeCallable(target, bag);
    }

    return this.callOn(this.kernel.resolveEntry(target), method, bag);
  }

  has(id: Identifier): boolean {
    return (
      this.repository.hasDefinition(id) ||
      this.repository.hasResolved(id) ||
      (typeof id === 'string' && this.repository.getClosureResource(id) !== undefined)
    );
  }

  findByTag(tag: string): Map<Identifier, unknown> {
    const found = new Map<Identifier, unknown>();
    for (const [id, meta] of this.repository.allDefinitionMeta()) {
      if (meta.tags.includes(tag)) {
        found.set(id, this.get(id));
      }
    }
    for (const cls of this.repository.knownClasses()) {
      if (!found.has(cls) && readInjectableOptions(cls)?.tags?.includes(tag) === true) {
        found.set(cls, this.get(cls));
      }
    }
    return found;
  }

  // ==================== Options ====================

  setEnvironment(environment: string): this {
    this.repository.setEnvironment(environment);
    return this;
  }

  getEnvironment(): string {
    return this.repository.getEnvironment();
  }

  /**
   * Switch the scope used by Scoped entries. Allowed after lock.
   */
  setScope(token: string): this {
    this.repository.setScope(token);
    return this;
  }

  getScope(): string {
    return this.repository.getScope();
  }

  setOptions(options: MutableOptions): this {
    this.repository.setOptions(options);
    return this;
  }

  enableLazyLoading(lazy: boolean = true): this {
    this.repository.setLazy(lazy);
    return this;
  }

  enableDefinitionCache(adapter: IDefinitionCacheAdapter, namespace?: string): this {
    this.repository.setCacheAdapter(adapter, namespace);
    return this;
  }

  /**
   * Resolve every Singleton string-id definition and write it to the cache
   * adapter. Transient and Scoped definitions are rebuilt on read, so they
   * are left out.
   *
   * @param forceClear - drop this container's cached keys first
   */
  cacheAllDefinitions(forceClear: boolean = false): this {
    const ids = this.repository
      .definitionIds()
      .filter((id): id is string => typeof id === 'string');
    if (ids.length === 0) {
      throw new ContainerException('No definitions added.');
    }

    const adapter = this.repository.getCacheAdapter();
    if (!adapter) {
      throw new ContainerException('No cache adapter set.');
    }

    if (forceClear) {
      adapter.clear(this.repository.makeCacheKey(''));
    }

    const singletons = ids.filter(
      (id) => this.repository.getDefinitionMeta(id)?.lifetime === Lifetime.Singleton,
    );
    for (const id of singletons) {
      adapter.set(this.repository.makeCacheKey(id), this.get(id));
    }
    this.logger.info(`Cached ${singletons.length} definition(s)`);
    return this;
  }

  lock(): this {
    this.repository.lock();
    this.logger.info('Container locked');
    return this;
  }

  isLocked(): boolean {
    return this.repository.isLocked();
  }

  // ==================== Collaborators ====================

  metadata(): MetadataResolverRegistry {
    return this.metadataRegistry;
  }

  introspector(): TypeIntrospector {
    return this.typeIntrospector;
  }

  tracer(): DebugTracer {
    return this.debugTracer;
  }

  getRepository(): DefinitionRepository {
    return this.repository;
  }

  /**
   * Resolve `id` with verbose tracing and return the trace. A failure is
   * recorded as the last entry instead of being thrown.
   */
  debug(id: Identifier): TraceRecord[] {
    const previous = this.debugTracer.getLevel();
    this.debugTracer.setLevel(TraceLevel.Verbose);

    try {
      this.get(id);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`debug(${describeIdentifier(id)}) failed: ${message}`);
      this.debugTracer.push(`failed: ${message}`, TraceLevel.Error, {
        error: error instanceof Error ? error.name : 'unknown',
      });
    } finally {
      this.debugTracer.setLevel(previous);
    }

    return this.debugTracer.toArray();
  }

  /**
   * Registering resources drops the resolved entries of `cls`; the
   * container's own entry is put back.
   */
  private addClassResource(cls: AbstractConstructor, patch: ClassResourcePatch): void {
    this.repository.addClassResource(cls, patch);
    if (cls === Container) {
      this.repository.setResolved(Container, GLOBAL_SCOPE, { instance: this });
    }
  }

  private callOn(
    resolution: Resolution,
    method: string | false | undefined,
    args: ArgumentBag,
  ): unknown {
    if (typeof method === 'string') {
      return this.kernel.strategy().invokeMethod(resolution.instance, method, args);
    }
    return hasReturned(resolution) ? resolution.returned : resolution.instance;
  }
}
