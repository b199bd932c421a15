import type {
  AnyFunction,
  ArgumentBag,
  Constructor,
  Identifier,
  Resolution,
} from '../../domain/definition';
import { ClassResolver } from './ClassResolver';
import { DefinitionResolver } from './DefinitionResolver';
import { ParameterResolver } from './ParameterResolver';
import { PropertyResolver } from './PropertyResolver';
import type { ResolutionServices, ResolutionStrategy } from './ResolutionStrategy';

/**
 * Default strategy: signatures are introspected and every dependency is
 * resolved recursively.
 */
export class AutowiredStrategy implements ResolutionStrategy {
  readonly name = 'autowired';

  private readonly classes: ClassResolver;
  private readonly definitions: DefinitionResolver;

  constructor(services: ResolutionServices) {
    const parameters = new ParameterResolver(services);
    this.classes = new ClassResolver(services, parameters, new PropertyResolver(services));
    this.definitions = new DefinitionResolver(services, this.classes, parameters);
  }

  resolveClass(cls: Constructor, constructorArgs: ArgumentBag, method?: string | false): Resolution {
    return this.classes.resolve(cls, constructorArgs, method);
  }

  resolveDefinition(id: Identifier, value: unknown): Resolution {
    return this.definitions.resolve(id, value);
  }

  invokeMethod(instance: unknown, method: string, args: ArgumentBag): unknown {
    return this.classes.invoke(instance, method, args);
  }

  invokeCallable(fn: AnyFunction, args: ArgumentBag, label?: string): unknown {
    return this.definitions.invoke(fn, args, label);
  }
}
