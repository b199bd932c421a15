/**
 * @fileoverview Resolution Kernel
 *
 * @packageDocumentation
 * @module wiregraph/application/resolution
 *
 * Entry dispatch and everything shared by both strategies.
 *
 * ```
 * resolveEntry(id)
 *   ├─ definition         ─▶ resolveDefinitionEntry ─▶ lifetime ─▶ lazy? ─▶ cache adapter ─▶ strategy
 *   ├─ closure alias      ─▶ strategy.invokeCallable (never cached)
 *   ├─ interface          ─▶ environment binding ─▶ resolveClassEntry
 *   ├─ class              ─▶ resolveClassEntry ─▶ lifetime ─▶ strategy
 *   └─ unknown string id  ─▶ NotFoundException
 * ```
 *
 * Class lifetimes come from `@Injectable({ lifetime })` and default to
 * Singleton. Definition lifetimes are set when binding. The strategy is
 * chosen on every request, so `setOptions({ injection })` takes effect
 * immediately.
 */

import {
  DEFAULT_LIFETIME,
  Lifetime,
  describeIdentifier,
  type ArgumentBag,
  type Constructor,
  type Identifier,
  type InterfaceRef,
  type Resolution,
} from '../../domain/definition';
import {
  InterfaceNotBoundError,
  InvalidSubjectError,
  NotFoundException,
} from '../../domain/exceptions';
import type { ILogger } from '../../infrastructure/logging';
import {
  asInterfaceRef,
  isClass,
  isFactory,
  type TypeIntrospector,
} from '../../infrastructure/reflection';
import { TraceLevel, type DebugTracer } from '../../infrastructure/tracing';
import { GLOBAL_SCOPE, type DefinitionRepository } from '../di/DefinitionRepository';
import type { IContainer } from '../di/IDependencyInjection';
import type { MetadataResolverRegistry } from '../metadata';
import { AutowiredStrategy } from './AutowiredStrategy';
import { LifetimeManager } from './LifetimeManager';
import { RawStrategy } from './RawStrategy';
import { ResolutionPath } from './ResolutionPath';
import type { ResolutionServices, ResolutionStrategy } from './ResolutionStrategy';

export interface KernelDependencies {
  repository: DefinitionRepository;
  introspector: TypeIntrospector;
  metadata: MetadataResolverRegistry;
  tracer: DebugTracer;
  logger: ILogger;
  container: IContainer;
}

export class ResolutionKernel implements ResolutionServices {
  readonly repository: DefinitionRepository;
  readonly introspector: TypeIntrospector;
  readonly metadata: MetadataResolverRegistry;
  readonly tracer: DebugTracer;
  readonly logger: ILogger;
  readonly container: IContainer;
  readonly lifetimes: LifetimeManager;
  readonly path = new ResolutionPath();

  private readonly autowired: AutowiredStrategy;
  private readonly raw: RawStrategy;

  constructor(deps: KernelDependencies) {
    this.repository = deps.repository;
    this.introspector = deps.introspector;
    this.metadata = deps.metadata;
    this.tracer = deps.tracer;
    this.logger = deps.logger;
    this.container = deps.container;
    this.lifetimes = new LifetimeManager(deps.repository, deps.logger);
    this.autowired = new AutowiredStrategy(this);
    this.raw = new RawStrategy(this);
  }

  strategy(): ResolutionStrategy {
    return this.repository.getSettings().injection ? this.autowired : this.raw;
  }

  // ==========================================================================
  // Entries
  // ==========================================================================

  resolveEntry(id: Identifier): Resolution {
    if (this.repository.hasDefinition(id)) {
      return this.resolveDefinitionEntry(id);
    }

    if (typeof id === 'string' || typeof id === 'symbol') {
      const closure = typeof id === 'string' ? this.repository.getClosureResource(id) : undefined;
      if (closure) {
        return {
          instance: this.strategy().invokeCallable(closure.fn, closure.args, describeIdentifier(id)),
        };
      }
      throw new NotFoundException(describeIdentifier(id));
    }

    return this.resolveClassEntry(this.concreteOf(id));
  }

  resolveDefinitionEntry(id: Identifier): Resolution {
    const meta = this.repository.getDefinitionMeta(id);
    if (!meta) {
      throw new NotFoundException(describeIdentifier(id));
    }

    const value = this.repository.getDefinition(id);
    const lazy = this.repository.getSettings().lazy && !isFactory(value);

    return this.lifetimes.obtain(
      id,
      meta.lifetime,
      () => this.produceDefinition(id, value, meta.lifetime),
      { lazy, label: describeIdentifier(id) },
    );
  }

  /**
   * Resolve `cls` through the lifetime cache, keyed by the class itself.
   */
  resolveClassEntry(cls: Constructor): Resolution {
    const lifetime = this.introspector.shapeOf(cls).lifetime ?? DEFAULT_LIFETIME;
    return this.lifetimes.obtain(cls, lifetime, () => this.strategy().resolveClass(cls, {}));
  }

  /**
   * A fresh resolution of a class or interface; the lifetime cache is
   * neither read nor written for the subject itself.
   */
  buildFresh(
    subject: InterfaceRef,
    method?: string | false,
    constructorArgs: ArgumentBag = {},
  ): Resolution {
    return this.strategy().resolveClass(this.concreteOf(subject), constructorArgs, method);
  }

  /**
   * Store a placeholder for a non-factory Singleton definition without
   * resolving it.
   */
  deferDefinition(id: Identifier): void {
    const meta = this.repository.getDefinitionMeta(id);
    const value = this.repository.getDefinition(id);
    if (!meta || meta.lifetime !== Lifetime.Singleton || isFactory(value)) return;

    this.lifetimes.defer(id, GLOBAL_SCOPE, () => this.produceDefinition(id, value, meta.lifetime));
  }

  // ==========================================================================
  // ResolutionServices
  // ==========================================================================

  resolveDefinition(id: Identifier): unknown {
    return this.resolveDefinitionEntry(id).instance;
  }

  resolveClassDependency(cls: Constructor): unknown {
    return this.resolveClassEntry(this.concreteOf(cls)).instance;
  }

  concreteFor(iface: InterfaceRef): Constructor | undefined {
    return this.repository.getEnvConcrete(iface);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private produceDefinition(id: Identifier, value: unknown, lifetime: Lifetime): Resolution {
    const label = describeIdentifier(id);

    return this.path.enter('definition', id, label, () => {
      const endSpan = this.tracer.beginSpan(`definition ${label}`);
      try {
        const resolution = this.throughDefinitionCache(id, lifetime, () =>
          this.strategy().resolveDefinition(id, value),
        );
        this.logger.debug(`Resolved definition '${label}'`);
        return resolution;
      } finally {
        endSpan();
      }
    });
  }

  /**
   * Singleton definitions with string ids are read from and written to the
   * cache adapter, when one is set.
   */
  private throughDefinitionCache(
    id: Identifier,
    lifetime: Lifetime,
    produce: () => Resolution,
  ): Resolution {
    const adapter = this.repository.getCacheAdapter();
    if (!adapter || typeof id !== 'string' || lifetime !== Lifetime.Singleton) {
      return produce();
    }

    const key = this.repository.makeCacheKey(id);
    const cached = adapter.get(key);
    if (cached !== undefined) {
      this.tracer.push(`definition ${id}: cache hit`, TraceLevel.Verbose, { key });
      return { instance: cached };
    }

    const resolution = produce();
    adapter.set(key, resolution.instance);
    return resolution;
  }

  /**
   * The class to build for `subject`: itself, or the environment binding
   * when it is an interface.
   */
  concreteOf(subject: InterfaceRef): Constructor {
    const iface = asInterfaceRef(subject);
    if (iface !== undefined) return this.requireConcrete(iface);
    if (isClass(subject)) return subject;

    throw new InvalidSubjectError(describeIdentifier(subject), 'is not a class or interface');
  }

  private requireConcrete(iface: InterfaceRef): Constructor {
    const concrete = this.concreteFor(iface);
    if (concrete) return concrete;

    const name = describeIdentifier(iface);
    throw new InterfaceNotBoundError({
      parameter: name,
      owner: name,
      callSite: 'entry',
      dependencyGraph: this.path.graph(`${name} (UNBOUND)`),
      interfaceName: name,
      environment: this.repository.getEnvironment(),
    });
  }
}
