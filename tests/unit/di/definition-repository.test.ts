/**
 * @fileoverview Unit tests for DefinitionRepository
 *
 * Configuration writes, the lock, class resource bags and resolved entries.
 */

import {
  AmbiguousDefinitionError,
  ConfigurationLockedError,
  DefinitionRepository,
  GLOBAL_SCOPE,
  Lifetime,
  type ILogger,
} from '../../../src';

class Mailer {}
class SmtpMailer extends Mailer {}

function createLogger(): jest.Mocked<ILogger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

describe('DefinitionRepository', () => {
  let logger: jest.Mocked<ILogger>;
  let repository: DefinitionRepository;

  beforeEach(() => {
    logger = createLogger();
    repository = new DefinitionRepository({ logger, cacheNamespace: 'ns' });
  });

  // ==========================================================================
  // Definitions
  // ==========================================================================

  describe('Definitions', () => {
    it('should store value, lifetime and tags', () => {
      repository.setDefinition('db.url', 'pg://test', Lifetime.Transient, ['config']);

      expect(repository.hasDefinition('db.url')).toBe(true);
      expect(repository.getDefinition('db.url')).toBe('pg://test');
      expect(repository.getDefinitionMeta('db.url')).toEqual({
        lifetime: Lifetime.Transient,
        tags: ['config'],
      });
    });

    it('should default to Singleton without tags', () => {
      repository.setDefinition('port', 8080);

      expect(repository.getDefinitionMeta('port')).toEqual({ lifetime: Lifetime.Singleton, tags: [] });
    });

    it('should reject an id bound to itself', () => {
      expect(() => repository.setDefinition('foo', 'foo')).toThrow(AmbiguousDefinitionError);
      expect(() => repository.setDefinition('foo', 'foo')).toThrow(
        'Id and definition cannot be the same (foo)',
      );
      expect(repository.hasDefinition('foo')).toBe(false);
    });

    it('should drop resolved entries when an id is rebound', () => {
      repository.setDefinition('port', 8080);
      repository.setResolved('port', GLOBAL_SCOPE, { instance: 8080 });
      repository.setResolved('port', 'request-1', { instance: 8080 });

      repository.setDefinition('port', 9090);

      expect(repository.hasResolved('port')).toBe(false);
    });

    it('should list ids in binding order', () => {
      repository.setDefinition('b', 2);
      repository.setDefinition(Mailer, SmtpMailer);
      repository.setDefinition('a', 1);

      expect(repository.definitionIds()).toEqual(['b', Mailer, 'a']);
    });
  });

  // ==========================================================================
  // Class resources
  // ==========================================================================

  describe('Class resources', () => {
    it('should replace constructor and method bags', () => {
      repository.addClassResource(Mailer, { kind: 'constructor', args: { host: 'a' } });
      repository.addClassResource(Mailer, { kind: 'constructor', args: { port: 25 } });
      repository.addClassResource(Mailer, { kind: 'method', method: { name: 'boot', args: {} } });
      repository.addClassResource(Mailer, {
        kind: 'method',
        method: { name: 'start', args: { retries: 3 } },
      });

      expect(repository.getClassResource(Mailer)).toEqual({
        constructorArgs: { port: 25 },
        method: { name: 'start', args: { retries: 3 } },
      });
    });

    it('should merge property bags', () => {
      repository.addClassResource(Mailer, { kind: 'property', properties: { from: 'a@test' } });
      repository.addClassResource(Mailer, { kind: 'property', properties: { retries: 2 } });
      repository.addClassResource(Mailer, { kind: 'property', properties: { from: 'b@test' } });

      expect(repository.getClassResource(Mailer)?.properties).toEqual({
        from: 'b@test',
        retries: 2,
      });
    });

    it('should store closures with their arguments', () => {
      const sum = (a: number, b: number): number => a + b;
      repository.addClosureResource('sum', sum, { a: 1 });

      expect(repository.getClosureResource('sum')).toEqual({ fn: sum, args: { a: 1 } });
    });
  });

  // ==========================================================================
  // Resolved entries
  // ==========================================================================

  describe('Resolved entries', () => {
    it('should keep entries per scope', () => {
      repository.setResolved(Mailer, 'a', { instance: 'first' });
      repository.setResolved(Mailer, 'b', { instance: 'second' });
      repository.clearResolved(Mailer, 'a');

      expect(repository.getResolved(Mailer, 'a')).toBeUndefined();
      expect(repository.getResolved(Mailer, 'b')).toEqual({ instance: 'second' });
      expect(repository.hasResolved(Mailer)).toBe(true);

      repository.clearResolved(Mailer, 'b');
      expect(repository.hasResolved(Mailer)).toBe(false);
    });
  });

  // ==========================================================================
  // Environment bindings
  // ==========================================================================

  describe('Environment bindings', () => {
    it('should resolve bindings of the current environment only', () => {
      repository.bindInterfaceForEnv('production', Mailer, SmtpMailer);

      expect(repository.getEnvConcrete(Mailer)).toBeUndefined();

      repository.setEnvironment('production');
      expect(repository.getEnvConcrete(Mailer)).toBe(SmtpMailer);
    });
  });

  // ==========================================================================
  // Lock
  // ==========================================================================

  describe('Lock', () => {
    beforeEach(() => {
      repository.setDefinition('port', 8080);
      repository.lock();
    });

    it('should reject every configuration write', () => {
      expect(() => repository.setDefinition('port', 9090)).toThrowErrorType(ConfigurationLockedError);
      expect(() => repository.addClassResource(Mailer, { kind: 'constructor', args: {} })).toThrowErrorType(
        ConfigurationLockedError,
      );
      expect(() => repository.addClosureResource('fn', () => 1)).toThrowErrorType(
        ConfigurationLockedError,
      );
      expect(() => repository.bindInterfaceForEnv('dev', Mailer, SmtpMailer)).toThrowErrorType(
        ConfigurationLockedError,
      );
      expect(() => repository.setEnvironment('dev')).toThrowErrorType(ConfigurationLockedError);
      expect(() => repository.setOptions({ injection: false })).toThrowErrorType(
        ConfigurationLockedError,
      );
      expect(() => repository.setLazy(true)).toThrowErrorType(ConfigurationLockedError);
    });

    it('should leave state unchanged and log the rejected write', () => {
      expect(() => repository.setDefinition('port', 9090)).toThrow(
        "Container is locked! Unable to bind 'port'",
      );

      expect(repository.getDefinition('port')).toBe(8080);
      expect(logger.warn).toHaveBeenCalledWith(
        "Rejected configuration change after lock: bind 'port'",
      );
    });

    it('should still allow switching scope', () => {
      repository.setScope('request-2');

      expect(repository.getScope()).toBe('request-2');
      expect(repository.isLocked()).toBe(true);
    });
  });

  // ==========================================================================
  // Settings & cache keys
  // ==========================================================================

  describe('Settings', () => {
    it('should keep settings an option leaves out', () => {
      repository.setOptions({ defaultMethod: 'boot' });
      repository.setOptions({ propertyAttributes: true });

      expect(repository.getSettings()).toEqual({
        injection: true,
        propertyAttributes: true,
        defaultMethod: 'boot',
        lazy: false,
      });
    });

    it('should build namespaced base64 cache keys', () => {
      expect(repository.makeCacheKey('a')).toBe('ns-YQ==');
      expect(repository.makeCacheKey('')).toBe('ns-');
    });
  });
});
