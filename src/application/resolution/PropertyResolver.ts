import type { AbstractConstructor, ArgumentBag } from '../../domain/definition';
import { classChain, isObject } from '../../infrastructure/reflection';
import { TraceLevel } from '../../infrastructure/tracing';
import type { ResolutionServices } from './ResolutionStrategy';

/**
 * Post-construction property assignment.
 *
 * Registered properties are collected from the root ancestor down to `cls`,
 * so a subclass registration overrides its parent's. With
 * `propertyAttributes` on, annotated properties without a registered value
 * are then resolved through the metadata registry; each resolver sees the
 * property's current value (its initializer, if any) as `current`.
 */
export class PropertyResolver {
  constructor(private readonly services: ResolutionServices) {}

  /**
   * Registered property values for `cls`, ancestors first.
   */
  registeredFor(cls: AbstractConstructor): ArgumentBag {
    const { repository } = this.services;
    return classChain(cls)
      .reverse()
      .reduce<ArgumentBag>(
        (bag, owner) => ({ ...bag, ...repository.getClassResource(owner)?.properties }),
        {},
      );
  }

  applyRegistered(cls: AbstractConstructor, instance: unknown): ArgumentBag {
    const registered = this.registeredFor(cls);
    if (!isObject(instance)) return registered;

    for (const [name, value] of Object.entries(registered)) {
      Reflect.set(instance, name, value);
    }
    return registered;
  }

  inject(cls: AbstractConstructor, instance: unknown): void {
    const registered = this.applyRegistered(cls, instance);

    const { repository, introspector, metadata, container, tracer } = this.services;
    if (!repository.getSettings().propertyAttributes || !isObject(instance)) return;

    for (const property of introspector.propertiesOf(cls)) {
      const name = String(property.name);
      if (Object.prototype.hasOwnProperty.call(registered, property.name)) continue;

      const outcome = metadata.resolveAll(
        property.annotations,
        {
          owner: property.owner.name,
          ownerType: property.owner,
          member: name,
          kind: 'property',
          name,
          type: property.type,
          callSite: 'property',
        },
        container,
        Reflect.get(instance, property.name),
      );

      if (outcome.supplied) {
        Reflect.set(instance, property.name, outcome.value);
        tracer.push(`property ${name}: from annotations`, TraceLevel.Verbose, { owner: cls.name });
      }
    }
  }
}
