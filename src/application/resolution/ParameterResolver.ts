/**
 * @fileoverview Parameter Resolver
 *
 * @packageDocumentation
 * @module wiregraph/application/resolution
 *
 * Produces the argument list of a constructor, method or factory.
 *
 * Each parameter takes the first source that yields a value:
 *
 * | # | Source                                                            |
 * |---|-------------------------------------------------------------------|
 * | 1 | value supplied under the parameter's name                         |
 * | 2 | earlier argument of the same pass that is an instance of its type |
 * | 3 | its type: definition, environment binding, or class               |
 * | 4 | its annotations, through the metadata registry                    |
 * | 5 | a definition whose id is the parameter's name                     |
 * | 6 | next positional value; rest parameters take all that remain       |
 * | 7 | `undefined`, when the parameter has a default                     |
 *
 * An interface type without a binding for the current environment raises
 * {@link InterfaceNotBoundError} at step 3; later steps are not tried.
 * Anything else left raises {@link UnresolvableDependencyError}.
 *
 * Cycles are caught one level down: every class and definition entered
 * through step 3 passes through the {@link ResolutionPath}.
 */

import {
  describeIdentifier,
  positionalValues,
  type ArgumentBag,
  type Identifier,
  type InterfaceRef,
} from '../../domain/definition';
import {
  InterfaceNotBoundError,
  UnresolvableDependencyError,
  type CallSite,
} from '../../domain/exceptions';
import { asInterfaceRef, isClass } from '../../infrastructure/reflection';
import type { ParameterDescriptor, TypeDescriptor } from '../../infrastructure/reflection';
import { TraceLevel } from '../../infrastructure/tracing';
import type { AnnotationTarget } from '../metadata';
import type { ResolutionServices } from './ResolutionStrategy';

/**
 * Where the parameters being resolved belong.
 */
export interface CallTarget {
  owner: string;
  ownerType?: TypeDescriptor['target'];
  /** `'constructor'`, the method name, or the function label */
  member: string;
  callSite: CallSite;
}

type Attempt = { found: true; value: unknown } | { found: false; unbound?: InterfaceRef };

const MISSING: Attempt = { found: false };

function hasOwn(bag: ArgumentBag, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(bag, key);
}

export class ParameterResolver {
  constructor(private readonly services: ResolutionServices) {}

  /**
   * Resolve every parameter of `shape`.
   *
   * @param siblings - arguments already produced in this pass (the
   * constructor's, when resolving the designated method)
   */
  resolve(
    shape: TypeDescriptor,
    supplied: ArgumentBag,
    site: CallTarget,
    siblings: readonly unknown[] = [],
  ): unknown[] {
    const positional = positionalValues(supplied);
    const args: unknown[] = [];
    let cursor = 0;

    for (const parameter of shape.parameters) {
      if (parameter.rest) {
        args.push(...positional.slice(cursor));
        cursor = positional.length;
        break;
      }

      const attempt = this.resolveParameter(parameter, supplied, site, [...siblings, ...args]);
      if (attempt.found) {
        args.push(attempt.value);
        continue;
      }

      if (cursor < positional.length) {
        args.push(positional[cursor++]);
        continue;
      }

      if (parameter.optional) {
        args.push(undefined);
        continue;
      }

      throw this.unresolvable(parameter, site);
    }

    return args;
  }

  private resolveParameter(
    parameter: ParameterDescriptor,
    supplied: ArgumentBag,
    site: CallTarget,
    produced: readonly unknown[],
  ): Attempt {
    const { tracer, repository } = this.services;
    const { name, type } = parameter;

    if (hasOwn(supplied, name)) {
      tracer.push(`param ${name}: explicit`, TraceLevel.Verbose, { owner: site.owner });
      return { found: true, value: this.fromOverride(parameter, supplied[name], site) };
    }

    if (typeof type === 'function') {
      const sibling = produced.find((value) => value instanceof type);
      if (sibling !== undefined) {
        tracer.push(`param ${name}: reused ${describeIdentifier(type)}`, TraceLevel.Verbose);
        return { found: true, value: sibling };
      }
    }

    const typed = type === undefined ? MISSING : this.fromType(type);
    if (typed.found) {
      tracer.push(`param ${name}: by type ${describeIdentifier(type ?? name)}`, TraceLevel.Verbose);
      return typed;
    }
    if (typed.unbound !== undefined) {
      throw this.unresolvable(parameter, site, typed.unbound);
    }

    if (parameter.annotations.length > 0) {
      const outcome = this.services.metadata.resolveAll(
        parameter.annotations,
        this.annotationTarget(parameter, site),
        this.services.container,
      );
      if (outcome.supplied) {
        tracer.push(`param ${name}: from annotations`, TraceLevel.Verbose);
        return { found: true, value: outcome.value };
      }
    }

    if (repository.hasDefinition(name)) {
      tracer.push(`param ${name}: definition by name`, TraceLevel.Verbose);
      return { found: true, value: this.services.resolveDefinition(name) };
    }

    return MISSING;
  }

  /**
   * A class supplied for an interface-typed parameter is resolved as a
   * dependency, provided it implements the interface.
   */
  private fromOverride(parameter: ParameterDescriptor, value: unknown, site: CallTarget): unknown {
    const iface = asInterfaceRef(parameter.type);
    if (iface === undefined || !isClass(value)) {
      return value;
    }

    if (!this.services.introspector.implementsInterface(value, iface)) {
      throw new UnresolvableDependencyError({
        ...this.details(parameter, site),
        reason: `${value.name} does not implement ${describeIdentifier(iface)}`,
      });
    }
    return this.services.resolveClassDependency(value);
  }

  private fromType(type: Identifier): Attempt {
    const { repository } = this.services;

    if (repository.hasDefinition(type)) {
      return { found: true, value: this.services.resolveDefinition(type) };
    }

    const iface = asInterfaceRef(type);
    if (iface !== undefined) {
      const concrete = this.services.concreteFor(iface);
      return concrete
        ? { found: true, value: this.services.resolveClassDependency(concrete) }
        : { found: false, unbound: iface };
    }

    if (isClass(type)) {
      return { found: true, value: this.services.resolveClassDependency(type) };
    }

    return MISSING;
  }

  private annotationTarget(parameter: ParameterDescriptor, site: CallTarget): AnnotationTarget {
    return {
      owner: site.owner,
      ownerType: site.ownerType,
      member: site.member,
      kind: 'parameter',
      name: parameter.name,
      index: parameter.index,
      type: parameter.type,
      callSite: site.callSite,
    };
  }

  private details(parameter: ParameterDescriptor, site: CallTarget) {
    return {
      parameter: parameter.name,
      owner: site.owner,
      callSite: site.callSite,
      member: site.member,
      dependencyGraph: this.services.path.graph(`${parameter.name} (UNRESOLVED)`),
    };
  }

  private unresolvable(
    parameter: ParameterDescriptor,
    site: CallTarget,
    unbound?: InterfaceRef,
  ): UnresolvableDependencyError {
    if (unbound !== undefined) {
      return new InterfaceNotBoundError({
        ...this.details(parameter, site),
        interfaceName: describeIdentifier(unbound),
        environment: this.services.repository.getEnvironment(),
      });
    }
    return new UnresolvableDependencyError(this.details(parameter, site));
  }
}
