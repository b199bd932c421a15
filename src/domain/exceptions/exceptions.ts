/**
 * @fileoverview Container Exceptions
 *
 * @packageDocumentation
 * @module wiregraph/domain/exceptions
 *
 * Every failure raised by the container derives from {@link ContainerException}.
 * Errors are thrown synchronously at the point of detection and travel up the
 * recursive resolution stack unmodified.
 *
 * ```
 * ContainerException
 * ├─ AmbiguousDefinitionError
 * ├─ ConfigurationLockedError
 * ├─ InvalidSubjectError
 * ├─ NotFoundException
 * └─ DependencyResolutionError
 *    ├─ UnresolvableDependencyError
 *    │  └─ InterfaceNotBoundError
 *    └─ CircularDependencyError
 * ```
 */

/**
 * Where a parameter was being resolved when resolution failed.
 */
export type CallSite = 'constructor' | 'method' | 'property' | 'function' | 'entry';

// ==================== Base ====================

/**
 * Base container exception
 */
export class ContainerException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContainerException';
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

// ==================== Configuration ====================

/**
 * Raised when an identifier is bound to itself (`bind('foo', 'foo')`).
 */
export class AmbiguousDefinitionError extends ContainerException {
  constructor(public readonly id: string) {
    super(`Id and definition cannot be the same (${id})`);
    this.name = 'AmbiguousDefinitionError';
  }
}

/**
 * Raised by every configuration write once the container is locked.
 */
export class ConfigurationLockedError extends ContainerException {
  constructor(public readonly operation: string) {
    super(`Container is locked! Unable to ${operation}`);
    this.name = 'ConfigurationLockedError';
  }
}

/**
 * The introspector could not classify a subject as a class, callable or enum.
 */
export class InvalidSubjectError extends ContainerException {
  constructor(
    public readonly subject: string,
    reason: string = 'is not a class, callable or enum',
  ) {
    super(`Invalid subject ${subject}: ${reason}`);
    this.name = 'InvalidSubjectError';
  }
}

/**
 * No definition, class or closure alias is registered under a string id.
 */
export class NotFoundException extends ContainerException {
  constructor(public readonly id: string) {
    super(`No entry or class found for '${id}'`);
    this.name = 'NotFoundException';
  }
}

// ==================== Resolution ====================

/**
 * Base class for failures that happen while an object graph is being built.
 *
 * @remarks
 * `dependencyGraph` shows the resolution path that led to the failure,
 * with the failing node last:
 *
 * ```
 * ├─ CheckoutService
 *   └─ PaymentGateway
 *     └─ Stripe (CIRCULAR!)
 * ```
 *
 * @example
 * ```typescript
 * try {
 *   container.get(CheckoutService);
 * } catch (error) {
 *   if (error instanceof DependencyResolutionError) {
 *     logger.error(error.message);
 *     logger.error(error.dependencyGraph);
 *   }
 *   throw error;
 * }
 * ```
 */
export class DependencyResolutionError extends ContainerException {
  constructor(
    message: string,
    public readonly dependencyGraph: string = '',
  ) {
    super(message);
    this.name = 'DependencyResolutionError';
  }
}

/**
 * Where and why a parameter could not be resolved.
 */
export interface UnresolvableDetails {
  /** Parameter or property name */
  parameter: string;
  /** Class or function that declares it */
  owner: string;
  callSite: CallSite;
  /** Method name when `callSite` is `'method'` */
  member?: string;
  dependencyGraph?: string;
  reason?: string;
}

function describeLocation(details: UnresolvableDetails): string {
  switch (details.callSite) {
    case 'constructor':
      return `${details.owner}::constructor()`;
    case 'method':
      return `${details.owner}::${details.member ?? 'method'}()`;
    case 'function':
      return `${details.owner}()`;
    case 'property':
      return `${details.owner}.${details.parameter}`;
    case 'entry':
      return 'container entry';
  }
}

/**
 * No override, type match, binding, annotation or default could satisfy a parameter.
 *
 * @example
 * ```
 * Resolution failed for 'apiKey' in StripeClient::constructor()
 * Resolution failed for 'to' in Mailer::send()
 * ```
 */
export class UnresolvableDependencyError extends DependencyResolutionError {
  public readonly parameter: string;
  public readonly owner: string;
  public readonly callSite: CallSite;
  public readonly member?: string;

  constructor(details: UnresolvableDetails) {
    super(
      `Resolution failed for '${details.parameter}' in ${describeLocation(details)}` +
        (details.reason ? `: ${details.reason}` : ''),
      details.dependencyGraph,
    );
    this.name = 'UnresolvableDependencyError';
    this.parameter = details.parameter;
    this.owner = details.owner;
    this.callSite = details.callSite;
    this.member = details.member;
  }
}

/**
 * An interface type has no binding for the current environment and no override.
 */
export class InterfaceNotBoundError extends UnresolvableDependencyError {
  public readonly interfaceName: string;
  public readonly environment: string;

  constructor(
    details: Omit<UnresolvableDetails, 'reason'> & { interfaceName: string; environment: string },
  ) {
    super({
      ...details,
      reason: `interface ${details.interfaceName} is not bound for environment '${details.environment}'`,
    });
    this.name = 'InterfaceNotBoundError';
    this.interfaceName = details.interfaceName;
    this.environment = details.environment;
  }
}

/**
 * A class (or definition) was reached again while it was still being built.
 */
export class CircularDependencyError extends DependencyResolutionError {
  constructor(
    public readonly path: readonly string[],
    dependencyGraph: string = '',
  ) {
    super(`Circular dependency detected: ${path.join(' → ')}`, dependencyGraph);
    this.name = 'CircularDependencyError';
  }
}
