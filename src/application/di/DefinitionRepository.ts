/**
 * @fileoverview Definition Repository
 *
 * @packageDocumentation
 * @module wiregraph/application/di
 *
 * Sole owner of the container's mutable state:
 *
 * - id → definition, with lifetime and tags
 * - class → explicit constructor / method / property registrations
 * - closure alias → (callable, arguments)
 * - (id, scope) → resolved entry or lazy placeholder
 * - environment → interface → concrete bindings
 * - current scope, environment, resolution settings, lock flag
 * - the external definition cache adapter
 *
 * Every configuration write calls {@link DefinitionRepository.checkIfLocked}
 * first. Reads, scope switching and resolved-entry bookkeeping stay
 * available after `lock()`.
 */

import {
  DEFAULT_LIFETIME,
  describeIdentifier,
  type AbstractConstructor,
  type ArgumentBag,
  type ClassResource,
  type ClosureResource,
  type AnyFunction,
  type Constructor,
  type DefinitionMeta,
  type Identifier,
  type InterfaceRef,
  type Lifetime,
  type MethodResource,
  type Resolution,
} from '../../domain/definition';
import {
  AmbiguousDefinitionError,
  ConfigurationLockedError,
} from '../../domain/exceptions';
import { silentLogger, type ILogger } from '../../infrastructure/logging';
import type { IDefinitionCacheAdapter } from '../ports';
import type { LazyPlaceholder } from '../resolution/LazyPlaceholder';
import {
  DEFAULT_CACHE_NAMESPACE,
  DEFAULT_ENVIRONMENT,
  DEFAULT_SCOPE,
  resolveSettings,
  type ContainerOptions,
  type MutableOptions,
  type ResolutionSettings,
} from './ContainerOptions';

/**
 * Scope key of Singleton entries. Distinct from every string token.
 */
export const GLOBAL_SCOPE: unique symbol = Symbol('wiregraph.global-scope');

export type ScopeKey = string | typeof GLOBAL_SCOPE;

export type ResolvedValue = Resolution | LazyPlaceholder<Resolution>;

/**
 * A single registration for a class. Constructor and method bags replace
 * the previous ones; property bags merge key-wise.
 */
export type ClassResourcePatch =
  | { kind: 'constructor'; args: ArgumentBag }
  | { kind: 'method'; method: MethodResource }
  | { kind: 'property'; properties: ArgumentBag };

export type RepositoryOptions = Pick<
  ContainerOptions,
  'environment' | 'scope' | 'logger' | 'cache' | 'cacheNamespace'
> &
  Partial<ResolutionSettings>;

export class DefinitionRepository {
  private readonly definitions = new Map<Identifier, unknown>();
  private readonly definitionMeta = new Map<Identifier, DefinitionMeta>();
  private readonly classResources = new Map<AbstractConstructor, ClassResource>();
  private readonly closureResources = new Map<string, ClosureResource>();
  private readonly resolved = new Map<Identifier, Map<ScopeKey, ResolvedValue>>();
  private readonly envBindings = new Map<string, Map<InterfaceRef, Constructor>>();

  private readonly logger: ILogger;
  private settings: ResolutionSettings;
  private scope: string;
  private environment: string;
  private locked = false;
  private cacheAdapter?: IDefinitionCacheAdapter;
  private cacheNamespace: string;

  constructor(options: RepositoryOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.settings = resolveSettings(options);
    this.scope = options.scope ?? DEFAULT_SCOPE;
    this.environment = options.environment ?? DEFAULT_ENVIRONMENT;
    this.cacheAdapter = options.cache;
    this.cacheNamespace = options.cacheNamespace ?? DEFAULT_CACHE_NAMESPACE;
  }

  // ==========================================================================
  // Definitions
  // ==========================================================================

  /**
   * Bind `id` to a literal, a class or a factory. Re-binding drops the
   * id's resolved entries in every scope.
   *
   * @throws AmbiguousDefinitionError when `id` and `value` are the same value
   */
  setDefinition(
    id: Identifier,
    value: unknown,
    lifetime: Lifetime = DEFAULT_LIFETIME,
    tags: readonly string[] = [],
  ): void {
    this.checkIfLocked(`bind '${describeIdentifier(id)}'`);

    if (Object.is(id, value)) {
      throw new AmbiguousDefinitionError(describeIdentifier(id));
    }

    this.definitions.set(id, value);
    this.definitionMeta.set(id, { lifetime, tags: [...tags] });
    this.clearResolved(id);
  }

  hasDefinition(id: Identifier): boolean {
    return this.definitions.has(id);
  }

  getDefinition(id: Identifier): unknown {
    return this.definitions.get(id);
  }

  getDefinitionMeta(id: Identifier): DefinitionMeta | undefined {
    return this.definitionMeta.get(id);
  }

  /**
   * Definition metadata in binding order.
   */
  allDefinitionMeta(): ReadonlyMap<Identifier, DefinitionMeta> {
    return this.definitionMeta;
  }

  definitionIds(): Identifier[] {
    return [...this.definitions.keys()];
  }

  // ==========================================================================
  // Class & closure resources
  // ==========================================================================

  addClassResource(cls: AbstractConstructor, patch: ClassResourcePatch): void {
    this.checkIfLocked(`register ${patch.kind} resources for ${describeIdentifier(cls)}`);

    const current = this.classResources.get(cls) ?? {};
    switch (patch.kind) {
      case 'constructor':
        current.constructorArgs = { ...patch.args };
        break;
      case 'method':
        current.method = { name: patch.method.name, args: { ...patch.method.args } };
        break;
      case 'property':
        current.properties = { ...current.properties, ...patch.properties };
        break;
    }

    this.classResources.set(cls, current);
    this.clearResolved(cls);
  }

  getClassResource(cls: AbstractConstructor): Readonly<ClassResource> | undefined {
    return this.classResources.get(cls);
  }

  addClosureResource(alias: string, fn: AnyFunction, args: ArgumentBag = {}): void {
    this.checkIfLocked(`register closure '${alias}'`);

    this.closureResources.set(alias, { fn, args: { ...args } });
    this.clearResolved(alias);
  }

  getClosureResource(alias: string): Readonly<ClosureResource> | undefined {
    return this.closureResources.get(alias);
  }

  // ==========================================================================
  // Resolved entries
  // ==========================================================================

  getResolved(id: Identifier, scope: ScopeKey): ResolvedValue | undefined {
    return this.resolved.get(id)?.get(scope);
  }

  setResolved(id: Identifier, scope: ScopeKey, value: ResolvedValue): void {
    let entries = this.resolved.get(id);
    if (!entries) {
      entries = new Map();
      this.resolved.set(id, entries);
    }
    entries.set(scope, value);
  }

  /**
   * Drop the entry for one scope, or every entry of `id` when no scope is given.
   */
  clearResolved(id: Identifier, scope?: ScopeKey): void {
    if (scope === undefined) {
      this.resolved.delete(id);
      return;
    }

    const entries = this.resolved.get(id);
    if (!entries) return;

    entries.delete(scope);
    if (entries.size === 0) {
      this.resolved.delete(id);
    }
  }

  hasResolved(id: Identifier): boolean {
    return (this.resolved.get(id)?.size ?? 0) > 0;
  }

  /**
   * Classes with registered resources or a resolved entry, registered first.
   */
  knownClasses(): AbstractConstructor[] {
    const classes = new Set<AbstractConstructor>(this.classResources.keys());
    for (const id of this.resolved.keys()) {
      if (typeof id === 'function') classes.add(id);
    }
    return [...classes];
  }

  // ==========================================================================
  // Environment & scope
  // ==========================================================================

  bindInterfaceForEnv(environment: string, iface: InterfaceRef, concrete: Constructor): void {
    this.checkIfLocked(`bind ${describeIdentifier(iface)} for environment '${environment}'`);

    let bindings = this.envBindings.get(environment);
    if (!bindings) {
      bindings = new Map();
      this.envBindings.set(environment, bindings);
    }
    bindings.set(iface, concrete);
  }

  /**
   * Concrete class bound to `iface` for the current environment.
   */
  getEnvConcrete(iface: InterfaceRef): Constructor | undefined {
    return this.envBindings.get(this.environment)?.get(iface);
  }

  setEnvironment(environment: string): void {
    this.checkIfLocked(`switch environment to '${environment}'`);
    this.environment = environment;
  }

  getEnvironment(): string {
    return this.environment;
  }

  /**
   * Switch the scope token. Entries of other tokens are kept.
   */
  setScope(token: string): void {
    this.scope = token;
  }

  getScope(): string {
    return this.scope;
  }

  // ==========================================================================
  // Lock
  // ==========================================================================

  lock(): void {
    this.locked = true;
  }

  isLocked(): boolean {
    return this.locked;
  }

  /**
   * @throws ConfigurationLockedError once the repository is locked
   */
  checkIfLocked(operation: string): void {
    if (!this.locked) return;

    this.logger.warn(`Rejected configuration change after lock: ${operation}`);
    throw new ConfigurationLockedError(operation);
  }

  // ==========================================================================
  // Settings & cache
  // ==========================================================================

  getSettings(): Readonly<ResolutionSettings> {
    return this.settings;
  }

  setOptions(options: MutableOptions): void {
    this.checkIfLocked('change options');
    this.settings = {
      ...this.settings,
      injection: options.injection ?? this.settings.injection,
      propertyAttributes: options.propertyAttributes ?? this.settings.propertyAttributes,
      defaultMethod: 'defaultMethod' in options ? options.defaultMethod : this.settings.defaultMethod,
    };
  }

  setLazy(lazy: boolean): void {
    this.checkIfLocked('toggle lazy loading');
    this.settings = { ...this.settings, lazy };
  }

  setCacheAdapter(adapter: IDefinitionCacheAdapter, namespace?: string): void {
    this.checkIfLocked('set the definition cache');
    this.cacheAdapter = adapter;
    if (namespace !== undefined) {
      this.cacheNamespace = namespace;
    }
  }

  getCacheAdapter(): IDefinitionCacheAdapter | undefined {
    return this.cacheAdapter;
  }

  /**
   * `<namespace>-<base64(id)>`; `makeCacheKey('')` is the namespace prefix.
   */
  makeCacheKey(id: string): string {
    return `${this.cacheNamespace}-${Buffer.from(id, 'utf8').toString('base64')}`;
  }
}
