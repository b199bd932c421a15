/**
 * @fileoverview Parameter list extraction from function source
 *
 * @packageDocumentation
 * @module wiregraph/infrastructure/reflection
 *
 * JavaScript keeps parameter names only in a function's source text. The
 * parser reads `Function.prototype.toString()` output and returns, per
 * parameter, its name, whether it is a rest parameter and the source of its
 * default value.
 *
 * Handles every function form the runtime prints: declarations, function
 * expressions, arrows (with and without parentheses), async and generator
 * functions, shorthand and computed methods, and class constructors.
 * Strings, template literals, comments and regular expression literals are
 * skipped so brackets and commas inside them do not count.
 *
 * @example
 * ```typescript
 * const parser = new ParameterListParser();
 *
 * parser.parseCallable('(a, { b } = {}, ...rest) => a');
 * // [
 * //   { name: 'a', rest: false, destructured: false },
 * //   { name: '__param1', rest: false, destructured: true, defaultSource: '{}' },
 * //   { name: 'rest', rest: true, destructured: false },
 * // ]
 *
 * parser.parseConstructor('class A { constructor(db, cache = null) {} }');
 * // [{ name: 'db', ... }, { name: 'cache', defaultSource: 'null', ... }]
 * ```
 */

export interface ParsedParameter {
  name: string;
  rest: boolean;
  destructured: boolean;
  /** Source text of the default value, when one is declared */
  defaultSource?: string;
}

type Visitor = (char: string, index: number, depth: number) => boolean | void;

const OPENERS = '([{';
const CLOSERS = ')]}';
const IDENTIFIER_START = /[A-Za-z_$]/;
const IDENTIFIER_PART = /[\w$]/;
const LEADING_IDENTIFIER = /^[A-Za-z_$][\w$]*/;
const BARE_ARROW = /^(?:async\s+)?([A-Za-z_$][\w$]*)\s*=>/;
/** A `/` after one of these starts a regular expression, not a division */
const REGEX_PRECEDERS = '(,=:[!&|?{};+-*%<>~^';

export class ParameterListParser {
  /**
   * Parameters of a function, arrow or method from its source text.
   */
  parseCallable(source: string): ParsedParameter[] {
    const text = source.trim();

    const bare = BARE_ARROW.exec(text);
    if (bare) {
      return [{ name: bare[1], rest: false, destructured: false }];
    }

    const open = this.findParameterListStart(text);
    if (open === -1) return [];

    return this.parseList(this.sliceBalanced(text, open));
  }

  /**
   * Parameters of the constructor declared in a class body, or `undefined`
   * when the class declares none (the caller then looks at the parent).
   */
  parseConstructor(classSource: string): ParsedParameter[] | undefined {
    const text = classSource.trim();
    const bodyOpen = walk(text, (char, _index, depth) => char === '{' && depth === 0);
    if (bodyOpen === -1) return undefined;

    let found = -1;
    walk(
      text,
      (char, index, depth) => {
        if (depth === 0 && char === '}') return true;
        if (depth !== 1 || !IDENTIFIER_START.test(char)) return false;
        if (index > 0 && (IDENTIFIER_PART.test(text[index - 1]) || text[index - 1] === '.')) {
          return false;
        }
        if (!text.startsWith('constructor', index)) return false;

        const after = index + 'constructor'.length;
        if (IDENTIFIER_PART.test(text[after] ?? '')) return false;
        if (/\bstatic\s*$/.test(text.slice(bodyOpen + 1, index))) return false;

        const next = text.slice(after).search(/\S/);
        if (next === -1 || text[after + next] !== '(') return false;

        found = after + next;
        return true;
      },
      bodyOpen,
    );

    if (found === -1) return undefined;
    return this.parseList(this.sliceBalanced(text, found));
  }

  /**
   * Split a raw parameter list (the text between the parentheses).
   */
  parseList(list: string): ParsedParameter[] {
    return splitTopLevel(list, ',')
      .map((segment) => segment.trim())
      .filter((segment) => segment.length > 0)
      .map((segment, index) => this.parseSegment(segment, index));
  }

  private parseSegment(segment: string, index: number): ParsedParameter {
    const rest = segment.startsWith('...');
    const body = rest ? segment.slice(3).trim() : segment;

    const assignment = walk(
      body,
      (char, position, depth) =>
        depth === 0 && char === '=' && body[position + 1] !== '>' && body[position + 1] !== '=',
    );

    const target = (assignment === -1 ? body : body.slice(0, assignment)).trim();
    const destructured = target.startsWith('{') || target.startsWith('[');
    const parameter: ParsedParameter = {
      name: destructured ? `__param${index}` : (LEADING_IDENTIFIER.exec(target)?.[0] ?? target),
      rest,
      destructured,
    };

    if (assignment !== -1) {
      parameter.defaultSource = body.slice(assignment + 1).trim();
    }

    return parameter;
  }

  private findParameterListStart(text: string): number {
    let result = -1;
    walk(text, (char, index, depth) => {
      if (depth !== 0) return false;
      if (char === '(') {
        result = index;
        return true;
      }
      // A body or arrow before any parenthesis means there is no list.
      return char === '{' || (char === '=' && text[index + 1] === '>');
    });
    return result;
  }

  /**
   * Text between the bracket at `open` and its matching closer.
   */
  private sliceBalanced(text: string, open: number): string {
    const close = walk(text, (char, _index, depth) => CLOSERS.includes(char) && depth === 0, open);
    return text.slice(open + 1, close === -1 ? text.length : close);
  }
}

// ============================================================================
// Scanner
// ============================================================================

/**
 * Visit every code character of `source` from `start`, skipping literals
 * and comments. Openers are visited at the depth outside them and closers
 * at the depth they return to. Returns the index where the visitor
 * returned `true`, or -1.
 */
function walk(source: string, visit: Visitor, start: number = 0): number {
  let depth = 0;
  let previous = '';
  let index = start;

  while (index < source.length) {
    const next = skipLiteral(source, index, previous);
    if (next !== index) {
      index = next;
      previous = ')';
      continue;
    }

    const char = source[index];
    if (CLOSERS.includes(char)) depth--;
    if (visit(char, index, depth) === true) return index;
    if (OPENERS.includes(char)) depth++;
    if (!/\s/.test(char)) previous = char;
    index++;
  }

  return -1;
}

function splitTopLevel(source: string, separator: string): string[] {
  const parts: string[] = [];
  let from = 0;

  walk(source, (char, index, depth) => {
    if (depth === 0 && char === separator) {
      parts.push(source.slice(from, index));
      from = index + 1;
    }
  });

  parts.push(source.slice(from));
  return parts;
}

/**
 * Index just past the string, template, comment or regex literal starting
 * at `index`, or `index` itself when none starts there.
 */
function skipLiteral(source: string, index: number, previous: string): number {
  const char = source[index];
  const next = source[index + 1];

  if (char === '/' && next === '/') {
    const end = source.indexOf('\n', index + 2);
    return end === -1 ? source.length : end + 1;
  }
  if (char === '/' && next === '*') {
    const end = source.indexOf('*/', index + 2);
    return end === -1 ? source.length : end + 2;
  }
  if (char === '"' || char === "'") {
    return skipQuoted(source, index, char);
  }
  if (char === '`') {
    return skipTemplate(source, index + 1);
  }
  if (char === '/' && (previous === '' || REGEX_PRECEDERS.includes(previous))) {
    return skipRegex(source, index);
  }

  return index;
}

function skipQuoted(source: string, index: number, quote: string): number {
  let position = index + 1;
  while (position < source.length && source[position] !== quote) {
    position += source[position] === '\\' ? 2 : 1;
  }
  return position + 1;
}

function skipTemplate(source: string, index: number): number {
  let position = index;
  while (position < source.length) {
    const char = source[position];
    if (char === '\\') {
      position += 2;
    } else if (char === '`') {
      return position + 1;
    } else if (char === '$' && source[position + 1] === '{') {
      const close = walk(
        source,
        (current, _at, depth) => current === '}' && depth === 0,
        position + 1,
      );
      position = close === -1 ? source.length : close + 1;
    } else {
      position++;
    }
  }
  return position;
}

function skipRegex(source: string, index: number): number {
  let position = index + 1;
  let inClass = false;

  while (position < source.length) {
    const char = source[position];
    if (char === '\n') return index;
    if (char === '\\') {
      position += 2;
      continue;
    }
    if (char === '[') inClass = true;
    else if (char === ']') inClass = false;
    else if (char === '/' && !inClass) break;
    position++;
  }

  position++;
  while (position < source.length && /[a-z]/i.test(source[position])) {
    position++;
  }
  return position;
}
