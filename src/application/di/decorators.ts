/**
 * @fileoverview Dependency injection decorators
 *
 * @packageDocumentation
 * @module wiregraph/application/di
 *
 * Decorators only record metadata; nothing is registered with a container
 * at declaration time.
 *
 * @remarks
 * TypeScript emits `design:paramtypes` for a constructor only when the
 * class carries a decorator. Mark every autowired class with
 * `@Injectable()`, even when it needs no options:
 *
 * ```json
 * {
 *   "compilerOptions": {
 *     "experimentalDecorators": true,
 *     "emitDecoratorMetadata": true
 *   }
 * }
 * ```
 */

import {
  Lifetime,
  type AnyFunction,
  type Identifier,
  type InterfaceRef,
} from '../../domain/definition';
import {
  MetadataKeys,
  defineMetadata,
  writeParameterTypeOverride,
  type InjectableOptions,
} from '../../infrastructure/reflection';
import { Annotate, decoratorSite, InfuseAnnotation, type MemberDecorator } from '../metadata';

/**
 * Mark a class as autowirable and set how it is cached when resolved by type.
 *
 * @example
 * ```typescript
 * @Injectable({ lifetime: Lifetime.Scoped, tags: ['http'], callOn: 'boot' })
 * class RequestLog {
 *   constructor(private readonly clock: Clock) {}
 *
 *   boot(): void { ... }
 * }
 * ```
 */
export function Injectable(options: InjectableOptions = {}): ClassDecorator {
  return function (target) {
    defineMetadata(
      MetadataKeys.INJECTABLE,
      { ...options, lifetime: options.lifetime ?? Lifetime.Singleton },
      target,
    );
  };
}

/**
 * Override the type of a constructor or method parameter, or inject a
 * property.
 *
 * On a parameter the given type replaces the emitted one, which is how an
 * {@link InterfaceToken} or a definition id reaches an erased interface
 * type. On a property it behaves like `@Infuse(type)`.
 *
 * @example
 * ```typescript
 * @Injectable()
 * class Checkout {
 *   @Inject(AuditTrail)
 *   audit!: AuditTrail;
 *
 *   constructor(@Inject(PaymentGateway) private readonly gateway: PaymentGateway) {}
 * }
 * ```
 */
export function Inject(type: Identifier): MemberDecorator {
  return function (target, propertyKey, parameterIndex) {
    if (typeof parameterIndex !== 'number') {
      Annotate(new InfuseAnnotation(type))(target, propertyKey);
      return;
    }

    const { owner, member } = decoratorSite(target, propertyKey);
    writeParameterTypeOverride(owner, { member: String(member), index: parameterIndex, type });
  };
}

/**
 * Declare an abstract class as an interface. Subclasses implement it, and
 * parameters typed with it resolve through the environment binding.
 */
export function Contract(): ClassDecorator {
  return function (target) {
    defineMetadata(MetadataKeys.CONTRACT, true, target);
  };
}

/**
 * Declare the interfaces a class implements. Needed for
 * {@link InterfaceToken}s, which no class can `extend`.
 */
export function Implements(...interfaces: InterfaceRef[]): ClassDecorator {
  return function (target) {
    defineMetadata(MetadataKeys.IMPLEMENTS, [...interfaces], target);
  };
}

/**
 * Give a factory's parameters types. Functions cannot be decorated, so this
 * is the only way a factory parameter gets autowired by type.
 *
 * @example
 * ```typescript
 * container.bind('report', withParameterTypes(
 *   (mailer: Mailer, clock: Clock) => new Report(mailer, clock),
 *   [Mailer, Clock],
 * ));
 * ```
 */
export function withParameterTypes<F extends AnyFunction>(
  fn: F,
  types: readonly (Identifier | undefined)[],
): F {
  defineMetadata(MetadataKeys.FUNCTION_PARAM_TYPES, [...types], fn);
  return fn;
}
