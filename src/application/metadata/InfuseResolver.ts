import { UnresolvableDependencyError } from '../../domain/exceptions';
import { isFactory } from '../../infrastructure/reflection';
import type { InfuseAnnotation } from './annotations';
import type { MetadataResolver, ResolutionContext } from './MetadataResolverRegistry';

/**
 * Resolver pre-registered for {@link InfuseAnnotation}.
 */
export class InfuseResolver implements MetadataResolver<InfuseAnnotation> {
  resolve({ annotation, target, container }: ResolutionContext<InfuseAnnotation>): unknown {
    const subject = annotation.target;

    if (isFactory(subject)) {
      return container.call(subject, undefined, annotation.args);
    }
    if (subject !== undefined) {
      return container.get(subject);
    }
    if (target.type !== undefined) {
      return container.get(target.type);
    }

    throw new UnresolvableDependencyError({
      parameter: target.name,
      owner: target.owner,
      callSite: target.callSite,
      member: target.member,
      reason: '@Infuse() needs a target when the member has no declared type',
    });
  }
}
