/**
 * wiregraph - Declarative Metadata Module
 */

export {
  MetadataResolverRegistry,
} from './MetadataResolverRegistry';
export type {
  AnnotationTarget,
  AnnotationTargetKind,
  ResolutionContext,
  MetadataResolver,
  MetadataResolverFn,
  MetadataOutcome,
} from './MetadataResolverRegistry';

export {
  Annotate,
  createAnnotation,
  decoratorSite,
  Infuse,
  InfuseAnnotation,
} from './annotations';
export type { MemberDecorator, DecoratorSite, InfuseTarget } from './annotations';

export { InfuseResolver } from './InfuseResolver';
