/**
 * @fileoverview Integration tests for lifetimes, scopes and lazy loading
 */

import { CircularDependencyError, Container, Injectable, Lifetime } from '../../../src';

// ============================================================================
// Test Services
// ============================================================================

@Injectable()
class Config {}

@Injectable({ lifetime: Lifetime.Transient })
class RequestId {}

@Injectable({ lifetime: Lifetime.Scoped })
class UnitOfWork {}

@Injectable()
class Dashboard {
  constructor(readonly requestId: RequestId) {}
}

let constructed = 0;

@Injectable()
class ExpensiveIndex {
  constructor() {
    constructed++;
  }
}

@Injectable()
class LoopingConsumer {
  constructor(readonly loop: unknown) {}
}

@Injectable()
class NeedsDsn {
  constructor(readonly dsn: string) {}
}

// ============================================================================
// Tests
// ============================================================================

describe('Lifetimes', () => {
  let container: Container;

  beforeEach(() => {
    container = Container.create();
    constructed = 0;
  });

  describe('Classes', () => {
    it('should return the same Singleton instance', () => {
      expect(container.get(Config)).toBe(container.get(Config));
    });

    it('should return a new Transient instance on every request', () => {
      expect(container.get(RequestId)).not.toBe(container.get(RequestId));
    });

    it('should keep the Transient a Singleton received at construction', () => {
      const dashboard = container.get(Dashboard);

      expect(container.get(Dashboard).requestId).toBe(dashboard.requestId);
    });

    it('should keep one Scoped instance per scope token', () => {
      container.setScope('a');
      const first = container.get(UnitOfWork);
      container.setScope('b');
      const second = container.get(UnitOfWork);
      container.setScope('a');
      const third = container.get(UnitOfWork);

      expect(third).toBe(first);
      expect(second).not.toBe(first);
    });

    it('should share Singletons across scopes', () => {
      container.setScope('a');
      const first = container.get(Config);
      container.setScope('b');

      expect(container.get(Config)).toBe(first);
    });
  });

  describe('Definitions', () => {
    it('should cache Scoped definitions per scope token', () => {
      let built = 0;
      container.bind('request.context', () => ({ n: ++built }), { lifetime: Lifetime.Scoped });

      container.setScope('r1');
      const r1 = container.get('request.context');
      expect(container.get('request.context')).toBe(r1);

      container.setScope('r2');
      expect(container.get('request.context')).not.toBe(r1);
      expect(built).toBe(2);
    });

    it('should drop cached values when an id is rebound', () => {
      container.bind('port', 8080);
      expect(container.get('port')).toBe(8080);

      container.bind('port', 9090);
      expect(container.get('port')).toBe(9090);
    });
  });
});

describe('Lazy loading', () => {
  let container: Container;

  beforeEach(() => {
    container = Container.create({ lazy: true });
    constructed = 0;
  });

  it('should construct a class definition on first read only', () => {
    container.bind('index', ExpensiveIndex);
    expect(constructed).toBe(0);

    const first = container.get('index');
    expect(constructed).toBe(1);

    expect(container.get('index')).toBe(first);
    expect(constructed).toBe(1);
  });

  it('should invoke a factory definition on first read only', () => {
    let built = 0;
    container.bind('report', () => ({ n: ++built }));
    expect(built).toBe(0);

    container.get('report');
    container.get('report');
    expect(built).toBe(1);
  });

  it('should be switchable after construction', () => {
    container = Container.create().enableLazyLoading();
    container.bind('index', ExpensiveIndex);

    expect(constructed).toBe(0);
    expect(container.get('index')).toBeInstanceOf(ExpensiveIndex);
  });

  it('should reject a definition that reads itself while being built', () => {
    container.bind('loop', LoopingConsumer);

    let caught: unknown;
    try {
      container.get('loop');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CircularDependencyError);
    if (caught instanceof CircularDependencyError) {
      expect(caught.path).toEqual(['loop', 'loop']);
      expect(caught.dependencyGraph).toBe('└─ loop\n  └─ loop (LAZY RE-ENTRY)\n');
    }
  });

  it('should retry a placeholder whose evaluation failed', () => {
    container.bind('consumer', NeedsDsn);

    expect(() => container.get('consumer')).toThrow(
      "Resolution failed for 'dsn' in NeedsDsn::constructor()",
    );

    container.bind('dsn', 'pg://test');
    expect(container.get('consumer')).toEqual(new NeedsDsn('pg://test'));
  });
});
