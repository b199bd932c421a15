/**
 * @fileoverview Unit tests for the Container facade
 *
 * Definitions, registrations, calls, the lock, tags, providers, the
 * definition cache and the debug trace.
 */

import {
  AmbiguousDefinitionError,
  CacheManager,
  ConfigurationLockedError,
  Container,
  Inject,
  Injectable,
  InvalidSubjectError,
  Lifetime,
  NotFoundException,
  TraceLevel,
  UnresolvableDependencyError,
  withParameterTypes,
  type ILogger,
  type IServiceProvider,
} from '../../../src';

// ============================================================================
// Test Services
// ============================================================================

@Injectable()
class Clock {
  now(): number {
    return 1_700_000_000_000;
  }
}

@Injectable({ callOn: 'boot' })
class Service {
  booted = 0;

  constructor(readonly clock: Clock) {}

  boot(): string {
    this.booted++;
    return 'booted';
  }

  status(@Inject(Clock) clock: Clock): string {
    return clock === this.clock ? 'same-clock' : 'other-clock';
  }
}

@Injectable()
class Worker {
  start(): string {
    return 'started';
  }

  configure(level: number): number {
    return level * 2;
  }
}

@Injectable()
class Endpoint {
  retries?: number;

  constructor(
    readonly url: string,
    readonly timeout: number = 30,
  ) {}
}

@Injectable()
class Greeter {}

@Injectable({ tags: ['http'] })
class HealthCheck {
  path = '/';
}

@Injectable({ lifetime: Lifetime.Transient })
class RequestContext {}

@Injectable()
class Handler {
  constructor(
    readonly first: RequestContext,
    readonly second: RequestContext,
  ) {}
}

@Injectable()
class Scheduler {
  constructor(readonly clock: Clock) {}
}

class MailProvider implements IServiceProvider {
  register(container: Container): void {
    container.bind('mail.from', 'noreply@test');
  }
}

function createLogger(): jest.Mocked<ILogger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

// ============================================================================
// Tests
// ============================================================================

describe('Container', () => {
  let container: Container;

  beforeEach(() => {
    container = Container.create();
  });

  // ==================== Definitions ====================

  describe('Definitions', () => {
    it('should resolve literals, factories and classes', () => {
      container
        .bind('db.url', 'pg://test')
        .bind('clock.now', () => 42)
        .bind('greeter', Greeter);

      expect(container.get('db.url')).toBe('pg://test');
      expect(container.get('clock.now')).toBe(42);
      expect(container.get('greeter')).toBeInstanceOf(Greeter);
    });

    it('should cache Singleton definitions and rebuild Transient ones', () => {
      let calls = 0;
      container
        .bind('shared', () => ({ n: ++calls }))
        .bind('fresh', () => ({ n: ++calls }), { lifetime: Lifetime.Transient });

      expect(container.get('shared')).toBe(container.get('shared'));
      expect(container.get('fresh')).not.toBe(container.get('fresh'));
      expect(calls).toBe(3);
    });

    it('should add definitions from records and entry lists', () => {
      container.addDefinitions({ a: 1, b: 2 }).addDefinitions(new Map([['c', 3]]));

      expect([container.get('a'), container.get('b'), container.get('c')]).toEqual([1, 2, 3]);
    });

    it('should reject a definition bound to its own id', () => {
      expect(() => container.bind('foo', 'foo')).toThrowErrorType(AmbiguousDefinitionError);
    });

    it('should raise NotFoundException for unknown string ids', () => {
      expect(() => container.get('missing')).toThrow(new NotFoundException('missing'));
    });

    it('should register itself', () => {
      expect(container.has(Container)).toBe(true);
      expect(container.get(Container)).toBe(container);
    });

    it('should keep its own entry after resources are registered for Container', () => {
      container.registerProperty(Container, { label: 'root' });

      expect(container.get(Container)).toBe(container);
    });

    it('should report definitions, closures and resolved classes in has()', () => {
      container.bind('db.url', 'pg://test').registerClosure('noop', () => undefined);

      expect(container.has('db.url')).toBe(true);
      expect(container.has('noop')).toBe(true);
      expect(container.has(Greeter)).toBe(false);

      container.get(Greeter);
      expect(container.has(Greeter)).toBe(true);
    });
  });

  // ==================== Registration ====================

  describe('Class registrations', () => {
    it('should pass registered constructor arguments and fall back to defaults', () => {
      container.registerClass(Endpoint, { url: 'http://localhost' });

      const endpoint = container.get(Endpoint);
      expect(endpoint.url).toBe('http://localhost');
      expect(endpoint.timeout).toBe(30);
    });

    it('should accept positional constructor arguments', () => {
      container.registerClass(Endpoint, ['http://remote', 5]);

      expect(container.get(Endpoint).timeout).toBe(5);
    });

    it('should prefer a registered value over autowiring a concrete class', () => {
      const mine = new Clock();
      container.registerClass(Scheduler, { clock: mine });

      const scheduler = container.get(Scheduler);
      expect(scheduler.clock).toBe(mine);
      expect(scheduler.clock).not.toBe(container.get(Clock));
    });

    it('should reuse a Transient instance for sibling parameters of one constructor', () => {
      const handler = container.get(Handler);

      expect(handler.second).toBe(handler.first);
      expect(container.get(RequestContext)).not.toBe(handler.first);
    });

    it('should assign registered properties after construction', () => {
      container
        .registerClass(Endpoint, { url: 'http://localhost' })
        .registerProperty(Endpoint, { retries: 2 });

      expect(container.get(Endpoint).retries).toBe(2);
    });

    it('should run the registered method with its arguments', () => {
      container.registerMethod(Worker, 'configure', { level: 3 });

      expect(container.getReturn(Worker)).toBe(6);
    });

    it('should run the configured default method when the class has it', () => {
      container.setOptions({ defaultMethod: 'start' });

      expect(container.getReturn(Worker)).toBe('started');
      expect(container.getReturn(Greeter)).toBeInstanceOf(Greeter);
    });
  });

  // ==================== Calls ====================

  describe('Calls', () => {
    it('should run @Injectable({ callOn }) once per cached instance', () => {
      expect(container.getReturn(Service)).toBe('booted');
      expect(container.getReturn(Service)).toBe('booted');
      expect(container.get(Service).booted).toBe(1);
    });

    it('should build a fresh instance and run the named method with make()', () => {
      const cached = container.get(Service);
      const fresh = container.make(Service);

      expect(fresh).not.toBe(cached);
      expect(fresh.booted).toBe(0);
      expect(cached.booted).toBe(1);
      expect(container.make(Service, 'status')).toBe('same-clock');
    });

    it('should reject a named method the class lacks', () => {
      expect(() => container.make(Service, 'nope')).toThrow(
        'Invalid subject Service::nope: method does not exist',
      );
      expect(() => container.call(Service, 'nope')).toThrowErrorType(InvalidSubjectError);
    });

    it('should call a method on the cached instance', () => {
      expect(container.call(Service, 'status')).toBe('same-clock');
    });

    it('should autowire plain functions', () => {
      const now = withParameterTypes((clock: Clock) => clock.now(), [Clock]);

      expect(container.call(now)).toBe(1_700_000_000_000);
      expect(container.call((a: number, b: number) => a + b, undefined, [2, 3])).toBe(5);
    });

    it('should merge closure arguments with call arguments', () => {
      container.registerClosure(
        'greet',
        (name: string, punctuation: string) => `hello ${name}${punctuation}`,
        { punctuation: '!' },
      );

      expect(container.call('greet', undefined, { name: 'ada' })).toBe('hello ada!');
      expect(container.call('greet', undefined, { name: 'bob', punctuation: '?' })).toBe('hello bob?');
    });

    it('should report the missing closure parameter', () => {
      container.registerClosure('greet', (name: string) => `hello ${name}`);

      expect(() => container.get('greet')).toThrow(
        new UnresolvableDependencyError({ parameter: 'name', owner: 'greet', callSite: 'function' }),
      );
    });

    it('should name the alias when a called closure lacks a parameter', () => {
      container.registerClosure('greet', (name: string) => `hello ${name}`);

      expect(() => container.call('greet')).toThrow(
        new UnresolvableDependencyError({ parameter: 'name', owner: 'greet', callSite: 'function' }),
      );
    });

    it('should call a method of a definition', () => {
      container.bind('worker', Worker);

      expect(container.call('worker', 'configure', { level: 5 })).toBe(10);
    });
  });

  // ==================== Lock ====================

  describe('Lock', () => {
    it('should reject configuration after lock and keep resolving', () => {
      const logger = createLogger();
      container = Container.create({ logger });
      container.bind('a', 1).lock();

      expect(() => container.bind('b', 2)).toThrowErrorType(ConfigurationLockedError);
      expect(() => container.registerClass(Endpoint, {})).toThrowErrorType(ConfigurationLockedError);
      expect(() => container.enableLazyLoading()).toThrowErrorType(ConfigurationLockedError);
      expect(container.has('b')).toBe(false);
      expect(container.get('a')).toBe(1);
      expect(container.isLocked()).toBe(true);
      expect(logger.info).toHaveBeenCalledWith('Container locked');
    });

    it('should still switch scope after lock', () => {
      container.lock().setScope('request-9');

      expect(container.getScope()).toBe('request-9');
    });
  });

  // ==================== Tags & Providers ====================

  describe('Tags and providers', () => {
    it('should find tagged definitions in binding order', () => {
      container
        .bind('mailer.smtp', 'smtp', { tags: ['mailer'] })
        .bind('db', 'pg')
        .bind('mailer.log', () => 'log', { tags: ['mailer', 'debug'] });

      expect([...container.findByTag('mailer')]).toEqual([
        ['mailer.smtp', 'smtp'],
        ['mailer.log', 'log'],
      ]);
      expect(container.findByTag('none').size).toBe(0);
    });

    it('should include resolved classes tagged through @Injectable after definitions', () => {
      container.bind('http.port', 8080, { tags: ['http'] });
      container.get(Greeter);
      const check = container.get(HealthCheck);

      expect([...container.findByTag('http')]).toEqual([
        ['http.port', 8080],
        [HealthCheck, check],
      ]);
    });

    it('should resolve registered classes tagged through @Injectable', () => {
      container.registerProperty(HealthCheck, { path: '/health' });

      const found = container.findByTag('http');
      expect(found.size).toBe(1);
      expect(found.get(HealthCheck)).toBe(container.get(HealthCheck));
      expect(container.get(HealthCheck).path).toBe('/health');
    });

    it('should let providers register definitions', () => {
      container.registerProvider(new MailProvider());

      expect(container.get('mail.from')).toBe('noreply@test');
    });
  });

  // ==================== Definition Cache ====================

  describe('Definition cache', () => {
    it('should refuse to cache without definitions or adapter', () => {
      expect(() => container.cacheAllDefinitions()).toThrow('No definitions added.');

      container.bind('a', 'alpha');
      expect(() => container.cacheAllDefinitions()).toThrow('No cache adapter set.');
    });

    it('should write every string-id definition under namespaced keys', () => {
      const cache = new CacheManager();
      container
        .bind('a', 'alpha')
        .bind('b', () => 'beta')
        .bind(Symbol.for('greeter'), Greeter)
        .enableDefinitionCache(cache, 'app')
        .cacheAllDefinitions();

      expect(cache.keys()).toEqual(['app-YQ==', 'app-Yg==']);
      expect(cache.get('app-Yg==')).toBe('beta');
    });

    it('should leave Transient and Scoped definitions out of the cache', () => {
      const logger = createLogger();
      const cache = new CacheManager();
      Container.create({ logger })
        .bind('a', 'alpha')
        .bind('request.id', () => 'r-1', { lifetime: Lifetime.Transient })
        .bind('session', () => 's-1', { lifetime: Lifetime.Scoped })
        .enableDefinitionCache(cache, 'app')
        .cacheAllDefinitions();

      expect(cache.keys()).toEqual(['app-YQ==']);
      expect(logger.info).toHaveBeenCalledWith('Cached 1 definition(s)');
    });

    it('should read cached values instead of resolving', () => {
      const cache = new CacheManager();
      container.bind('b', () => 'beta').enableDefinitionCache(cache, 'app').cacheAllDefinitions();

      const factory = jest.fn(() => 'recomputed');
      const second = Container.create({ cache, cacheNamespace: 'app' }).bind('b', factory);

      expect(second.get('b')).toBe('beta');
      expect(factory).not.toHaveBeenCalled();
    });

    it('should clear only its own namespace when forced', () => {
      const cache = new CacheManager();
      cache.set('app-stale', 1);
      cache.set('other-x', 2);

      container.bind('a', 'alpha').enableDefinitionCache(cache, 'app').cacheAllDefinitions(true);

      expect(cache.keys()).toEqual(['other-x', 'app-YQ==']);
    });
  });

  // ==================== Debug ====================

  describe('Debug trace', () => {
    it('should return the spans of a successful resolution', () => {
      const records = container.debug(Greeter);

      expect(records.map((record) => record.msg)).toEqual([
        '▶ start: class Greeter',
        '◀ end: class Greeter',
      ]);
      expect(container.tracer().getLevel()).toBe(TraceLevel.Off);
    });

    it('should record a failure as the last entry', () => {
      const logger = createLogger();
      container = Container.create({ logger });

      const records = container.debug('missing');

      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({
        level: 'Error',
        msg: "failed: No entry or class found for 'missing'",
        ctx: { error: 'NotFoundException' },
      });
      expect(logger.error).toHaveBeenCalledWith(
        "debug(missing) failed: No entry or class found for 'missing'",
      );
    });
  });
});
