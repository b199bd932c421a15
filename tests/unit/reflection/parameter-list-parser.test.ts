/**
 * @fileoverview Unit tests for ParameterListParser
 *
 * Parameter names, rest markers and default sources read from function
 * source text.
 */

import { ParameterListParser } from '../../../src';

describe('ParameterListParser', () => {
  const parser = new ParameterListParser();

  // ==========================================================================
  // Callables
  // ==========================================================================

  describe('parseCallable', () => {
    it('should read plain, destructured and rest parameters of an arrow', () => {
      expect(parser.parseCallable('(a, { b } = {}, ...rest) => a')).toEqual([
        { name: 'a', rest: false, destructured: false },
        { name: '__param1', rest: false, destructured: true, defaultSource: '{}' },
        { name: 'rest', rest: true, destructured: false },
      ]);
    });

    it('should read an arrow without parentheses', () => {
      expect(parser.parseCallable('x => x * 2')).toEqual([
        { name: 'x', rest: false, destructured: false },
      ]);
    });

    it('should read async function declarations with defaults', () => {
      const parsed = parser.parseCallable('async function load(url, retries = 3) { return url; }');

      expect(parsed.map((p) => p.name)).toEqual(['url', 'retries']);
      expect(parsed[1].defaultSource).toBe('3');
    });

    it('should return no parameters for an empty list', () => {
      expect(parser.parseCallable('function () { return 1; }')).toEqual([]);
      expect(parser.parseCallable('() => 1')).toEqual([]);
    });

    it('should ignore commas inside strings and nested brackets', () => {
      const parsed = parser.parseCallable("(a = 'x,y', b = (1, 2), c = [3, 4]) => a");

      expect(parsed.map((p) => p.name)).toEqual(['a', 'b', 'c']);
      expect(parsed.map((p) => p.defaultSource)).toEqual(["'x,y'", '(1, 2)', '[3, 4]']);
    });

    it('should ignore commas inside comments and regular expressions', () => {
      const parsed = parser.parseCallable('function f(a /* , fake */, b = /[,)]/g) {}');

      expect(parsed.map((p) => p.name)).toEqual(['a', 'b']);
      expect(parsed[1].defaultSource).toBe('/[,)]/g');
    });

    it('should ignore parentheses inside template literals', () => {
      const parsed = parser.parseCallable('(label = `(${1 + 1}), done`, next) => label');

      expect(parsed.map((p) => p.name)).toEqual(['label', 'next']);
    });

    it('should keep operators and arrows inside default values', () => {
      const parsed = parser.parseCallable('(flag = a == b, cb = () => 1) => flag');

      expect(parsed.map((p) => p.defaultSource)).toEqual(['a == b', '() => 1']);
    });
  });

  // ==========================================================================
  // Constructors
  // ==========================================================================

  describe('parseConstructor', () => {
    it('should read the constructor of a class body', () => {
      const parsed = parser.parseConstructor('class A { constructor(db, cache = null) {} }');

      expect(parsed).toEqual([
        { name: 'db', rest: false, destructured: false },
        { name: 'cache', rest: false, destructured: false, defaultSource: 'null' },
      ]);
    });

    it('should return undefined when the class declares no constructor', () => {
      expect(parser.parseConstructor('class B extends A { run(x) { return x; } }')).toBeUndefined();
    });

    it('should skip the word constructor inside strings and method bodies', () => {
      const source = [
        'class D {',
        "  label = 'constructor(x)';",
        '  describe() { return this.constructor.name; }',
        '  constructor(y) {}',
        '}',
      ].join('\n');

      expect(parser.parseConstructor(source)?.map((p) => p.name)).toEqual(['y']);
    });

    it('should skip a static method named constructor', () => {
      const parsed = parser.parseConstructor('class E { static constructor(z) {} constructor(w) {} }');

      expect(parsed?.map((p) => p.name)).toEqual(['w']);
    });
  });
});
