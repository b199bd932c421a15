import {
  describeIdentifier,
  type AnyFunction,
  type ArgumentBag,
  type Identifier,
  type Resolution,
} from '../../domain/definition';
import { isClass, isFactory } from '../../infrastructure/reflection';
import { TraceLevel } from '../../infrastructure/tracing';
import type { ClassResolver } from './ClassResolver';
import type { ParameterResolver } from './ParameterResolver';
import type { ResolutionServices } from './ResolutionStrategy';

/**
 * Turns definition values into resolutions.
 *
 * - class: a new instance, built like any autowired class
 * - factory: its return value, with parameters autowired
 * - anything else: the value itself
 */
export class DefinitionResolver {
  constructor(
    private readonly services: ResolutionServices,
    private readonly classes: ClassResolver,
    private readonly parameters: ParameterResolver,
  ) {}

  resolve(id: Identifier, value: unknown): Resolution {
    const label = describeIdentifier(id);

    if (isClass(value)) {
      return this.classes.resolve(value, {});
    }

    if (isFactory(value)) {
      return { instance: this.invoke(value, {}, label) };
    }

    this.services.tracer.push(`definition ${label}: literal`, TraceLevel.Verbose);
    return { instance: value };
  }

  /**
   * Call a factory or closure with autowired parameters.
   */
  invoke(fn: AnyFunction, args: ArgumentBag, label: string = fn.name || 'closure'): unknown {
    const shape = this.services.introspector.shapeOf(fn);
    const values = this.parameters.resolve(shape, args, {
      owner: label,
      member: label,
      callSite: 'function',
    });

    this.services.tracer.push(`invoke ${label}()`, TraceLevel.Node);
    return Reflect.apply(fn, undefined, values);
  }
}
