/**
 * wiregraph - Basic Example
 *
 * Demonstrates the core container concepts:
 * - Autowiring constructor dependencies
 * - Interface bindings per environment
 * - Definitions, tags and lifetimes
 * - Annotations and the debug trace
 */

import {
  ConfigurationLockedError,
  Container,
  Contract,
  Infuse,
  Injectable,
  Lifetime,
  UnresolvableDependencyError,
  consoleLogger,
  createAnnotation,
} from '../src/index';

// ==================== Contracts ====================

@Contract()
abstract class Notifier {
  abstract send(to: string, body: string): string;
}

@Injectable()
class EmailNotifier extends Notifier {
  constructor(@Infuse('mail.from') private readonly from: string) {
    super();
  }

  override send(to: string, body: string): string {
    return `email ${this.from} -> ${to}: ${body}`;
  }
}

@Injectable()
class ConsoleNotifier extends Notifier {
  override send(to: string, body: string): string {
    return `console -> ${to}: ${body}`;
  }
}

// ==================== Annotations ====================

class EnvVar {
  constructor(
    readonly name: string,
    readonly fallback: string,
  ) {}
}
const Env = createAnnotation(EnvVar);

// ==================== Services ====================

@Injectable()
class UserRepository {
  private readonly users = new Map([['u1', 'ada@example.test']]);

  emailOf(id: string): string | undefined {
    return this.users.get(id);
  }
}

@Injectable({ callOn: 'boot' })
class SignupService {
  constructor(
    private readonly users: UserRepository,
    private readonly notifier: Notifier,
  ) {}

  boot(@Env('SIGNUP_REGION', 'eu') region: string): string {
    return `signup ready in ${region}`;
  }

  welcome(id: string): string {
    return this.notifier.send(this.users.emailOf(id) ?? 'unknown', 'welcome aboard');
  }
}

@Injectable()
class ReportJob {
  constructor(readonly bucket: string) {}
}

// ==================== Main ====================

function main(): void {
  console.log('═══════════════════════════════════════════════════════════');
  console.log('  wiregraph - Container Demo');
  console.log('═══════════════════════════════════════════════════════════\n');

  const container = Container.create({ logger: consoleLogger, environment: 'production' });

  container.metadata().register(EnvVar, ({ annotation }) =>
    process.env[annotation.name] ?? annotation.fallback,
  );

  container
    .bind('mail.from', 'noreply@example.test')
    .bind('request.id', () => Math.random().toString(16).slice(2), {
      lifetime: Lifetime.Transient,
    })
    .bind('cache.redis', 'redis://localhost', { tags: ['cache'] })
    .bind('cache.memory', 'memory://', { tags: ['cache'] })
    .bindInterfaceForEnv('production', Notifier, EmailNotifier)
    .bindInterfaceForEnv('development', Notifier, ConsoleNotifier);

  // 1. Autowiring
  console.log('--- 1. Autowiring ---');
  console.log(container.getReturn(SignupService));
  console.log(container.get(SignupService).welcome('u1'));
  console.log();

  // 2. Environment switch
  console.log('--- 2. Environment switch ---');
  container.setEnvironment('development');
  console.log(container.make(SignupService).welcome('u1'));
  console.log();

  // 3. Lock
  console.log('--- 3. Lock ---');
  container.lock();
  try {
    container.bind('mail.from', 'other@example.test');
  } catch (error) {
    if (!(error instanceof ConfigurationLockedError)) throw error;
    console.log(error.message);
  }
  console.log();

  // 4. Tags and lifetimes
  console.log('--- 4. Tags and lifetimes ---');
  console.log('cache backends:', [...container.findByTag('cache').keys()]);
  console.log('transient ids differ:', container.get('request.id') !== container.get('request.id'));
  console.log();

  // 5. Failures show the graph
  console.log('--- 5. Failure report ---');
  try {
    container.get(ReportJob);
  } catch (error) {
    if (!(error instanceof UnresolvableDependencyError)) throw error;
    console.log(error.message);
    console.log(error.dependencyGraph);
  }

  // 6. Debug trace
  console.log('--- 6. Debug trace ---');
  for (const record of container.debug(UserRepository)) {
    console.log(`${record.level.padEnd(7)} ${record.msg}`);
  }
}

main();
