/**
 * @fileoverview Integration tests for resolution with injection turned off
 */

import { Container, Injectable } from '../../../src';

// ============================================================================
// Test Services
// ============================================================================

@Injectable()
class Clock {}

@Injectable()
class Consumer {
  constructor(readonly clock?: Clock) {}
}

class Endpoint {
  retries = 0;

  constructor(
    readonly url: string,
    readonly timeout: number,
  ) {}
}

class Worker {
  start(): string {
    return 'started';
  }

  configure(level: number, suffix: string): string {
    return `${level * 2}${suffix}`;
  }
}

// ============================================================================
// Tests
// ============================================================================

describe('Raw resolution', () => {
  let container: Container;

  beforeEach(() => {
    container = Container.create({ injection: false });
  });

  it('should pass registered constructor arguments in order', () => {
    container.registerClass(Endpoint, { url: 'http://raw', timeout: 5 });

    const endpoint = container.get(Endpoint);
    expect(endpoint.url).toBe('http://raw');
    expect(endpoint.timeout).toBe(5);
  });

  it('should not autowire constructor dependencies', () => {
    expect(container.get(Consumer).clock).toBeUndefined();
  });

  it('should run the registered method with its arguments', () => {
    container.registerMethod(Worker, 'configure', [4, 'x']);

    expect(container.getReturn(Worker)).toBe('8x');
  });

  it('should assign registered properties', () => {
    container
      .registerClass(Endpoint, ['http://raw', 1])
      .registerProperty(Endpoint, { retries: 3 });

    expect(container.get(Endpoint).retries).toBe(3);
  });

  it('should call closures with their registered arguments merged with call arguments', () => {
    container.registerClosure('sum', (a: number, b: number) => a + b, [1, 2]);

    expect(container.call('sum')).toBe(3);
    expect(container.call('sum', undefined, { 1: 10 })).toBe(11);
  });

  it('should resolve definitions without autowiring', () => {
    container.bind('greeting', () => 'hi').bind('consumer', Consumer);

    expect(container.get('greeting')).toBe('hi');
    expect(container.get('consumer')).toEqual(new Consumer());
  });

  it('should run the default method when the class has it', () => {
    container.setOptions({ defaultMethod: 'start' });

    expect(container.getReturn(Worker)).toBe('started');
  });

  it('should autowire again once injection is turned back on', () => {
    expect(container.get(Consumer).clock).toBeUndefined();

    container.setOptions({ injection: true });

    expect(container.make(Consumer).clock).toBeInstanceOf(Clock);
  });
});
