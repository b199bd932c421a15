/**
 * @fileoverview Dependency Injection Interfaces
 *
 * @packageDocumentation
 * @module wiregraph/application/di
 *
 * Read side of the container, as seen by metadata resolvers, service
 * providers and application code that should not reconfigure it.
 *
 * ## Entry points
 *
 * | Call                       | Cached per lifetime | Runs designated method | Returns             |
 * |----------------------------|---------------------|------------------------|---------------------|
 * | `get(id)`                  | yes                 | yes                    | instance / value    |
 * | `getReturn(id)`            | yes                 | yes                    | method return value |
 * | `make(cls)`                | no                  | no                     | fresh instance      |
 * | `make(cls, 'method')`      | no                  | named method           | method return value |
 * | `call(fn, ...)`            | no                  | n/a                    | function result     |
 * | `call(cls, 'method', ...)` | yes (instance)      | named method           | method return value |
 *
 * @example
 * ```typescript
 * function buildReport(container: IContainer): ReportBuilder {
 *   const builder = container.make(ReportBuilder);
 *   builder.useMailer(container.get(Mailer));
 *   return builder;
 * }
 * ```
 */

import type {
  AbstractConstructor,
  AnyFunction,
  ArgumentInput,
  Identifier,
  InterfaceToken,
} from '../../domain/definition';
import type { Container } from './Container';

export interface IContainer {
  /**
   * Resolve a class, interface or definition id, honoring its lifetime.
   *
   * @throws NotFoundException for an unknown string or symbol id
   * @throws DependencyResolutionError when the object graph cannot be built
   */
  get<T>(id: AbstractConstructor<T>): T;
  get<T>(id: InterfaceToken<T>): T;
  get(id: Identifier): unknown;

  /**
   * Whether `id` has a definition, a resolved entry or a closure alias.
   */
  has(id: Identifier): boolean;

  /**
   * Build a fresh instance, bypassing the lifetime cache. With `method`,
   * that method is invoked and its return value is handed back instead.
   */
  make<T>(id: AbstractConstructor<T>, method?: false): T;
  make<T>(id: InterfaceToken<T>, method?: false): T;
  make(id: AbstractConstructor | InterfaceToken, method: string): unknown;

  /**
   * Invoke a factory, a closure alias, a definition, or a method of a
   * resolved class.
   */
  call(
    target: Identifier | AnyFunction,
    method?: string | false,
    args?: ArgumentInput,
  ): unknown;

  /**
   * Return value of the designated method run while resolving `id`, or the
   * resolved value itself when no method ran.
   */
  getReturn(id: Identifier): unknown;

  /**
   * Resolved values of every definition carrying `tag`, in definition order,
   * then of every registered or resolved class tagged through
   * `@Injectable({ tags })`.
   */
  findByTag(tag: string): Map<Identifier, unknown>;
}

/**
 * A bundle of registrations applied to a container in one step.
 *
 * @example
 * ```typescript
 * class BillingProvider implements IServiceProvider {
 *   register(container: Container): void {
 *     container
 *       .bind('billing.currency', 'EUR')
 *       .bindInterfaceForEnv('production', PaymentGateway, StripeGateway);
 *   }
 * }
 *
 * container.registerProvider(new BillingProvider());
 * ```
 */
export interface IServiceProvider {
  register(container: Container): void;
}
