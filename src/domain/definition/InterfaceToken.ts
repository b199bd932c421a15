/**
 * Runtime stand-in for a TypeScript interface.
 *
 * @remarks
 * Interfaces vanish at compile time, so a parameter typed with one carries
 * no usable runtime type. A token gives the interface an identity the
 * container can bind per environment and that `@Inject` can point at.
 *
 * @example
 * ```typescript
 * interface Mailer { send(to: string): void }
 * const Mailer = createInterface<Mailer>('Mailer');
 *
 * container.bindInterfaceForEnv('prod', Mailer, SmtpMailer);
 *
 * class SignupService {
 *   constructor(@Inject(Mailer) private readonly mailer: Mailer) {}
 * }
 * ```
 */
export class InterfaceToken<T = unknown> {
  /** Carries `T` for inference only; never set at runtime. */
  declare readonly __type?: T;

  constructor(public readonly name: string) {}

  toString(): string {
    return `InterfaceToken(${this.name})`;
  }
}

export function createInterface<T>(name: string): InterfaceToken<T> {
  return new InterfaceToken<T>(name);
}
