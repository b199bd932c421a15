import type { ILogger } from '../../infrastructure/logging';
import type { TraceLevel } from '../../infrastructure/tracing';
import type { IDefinitionCacheAdapter } from '../ports';

/**
 * Settings the resolution algorithm reads on every request.
 */
export interface ResolutionSettings {
  /** Autowire through introspection; `false` switches to the raw strategy */
  injection: boolean;
  /** Resolve annotated properties through the metadata registry */
  propertyAttributes: boolean;
  /** Method invoked after construction when a class declares none */
  defaultMethod?: string;
  /** Store lazy placeholders instead of resolving non-factory definitions eagerly */
  lazy: boolean;
}

/**
 * Container options
 */
export interface ContainerOptions extends Partial<ResolutionSettings> {
  /** Environment consulted by interface bindings (default: 'default') */
  environment?: string;

  /** Initial scope token (default: 'default') */
  scope?: string;

  /** Logger (default: silent) */
  logger?: ILogger;

  /** Debug trace verbosity (default: TraceLevel.Off) */
  traceLevel?: TraceLevel;

  /** Persisted-definition store */
  cache?: IDefinitionCacheAdapter;

  /** Prefix of the keys this container writes to the cache (default: 'wiregraph') */
  cacheNamespace?: string;
}

/**
 * The subset `setOptions` may change after construction.
 */
export type MutableOptions = Partial<
  Pick<ResolutionSettings, 'injection' | 'propertyAttributes' | 'defaultMethod'>
>;

export const DEFAULT_ENVIRONMENT = 'default';
export const DEFAULT_SCOPE = 'default';
export const DEFAULT_CACHE_NAMESPACE = 'wiregraph';

export const DEFAULT_RESOLUTION_SETTINGS: Readonly<ResolutionSettings> = {
  injection: true,
  propertyAttributes: false,
  lazy: false,
};

export function resolveSettings(options: ContainerOptions = {}): ResolutionSettings {
  return {
    injection: options.injection ?? DEFAULT_RESOLUTION_SETTINGS.injection,
    propertyAttributes: options.propertyAttributes ?? DEFAULT_RESOLUTION_SETTINGS.propertyAttributes,
    defaultMethod: options.defaultMethod,
    lazy: options.lazy ?? DEFAULT_RESOLUTION_SETTINGS.lazy,
  };
}
