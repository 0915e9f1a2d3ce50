/**
 * Pattern Compiler
 *
 * Turns a wildcard or regular-expression source into a case-insensitive
 * matcher bound to a target (file name or full path).
 *
 * - Name mode: the pattern must match the entire file name.
 * - Path mode: the pattern may match any substring of the full path.
 */

import { InvalidPatternError } from './errors.js';

/**
 * How the compiled expression is tested against a candidate.
 */
export type MatchStyle = 'anchored' | 'search';

/**
 * Which string of a directory entry is tested.
 */
export type MatchTarget = 'name' | 'path';

/**
 * A compiled, immutable matcher.
 */
export interface Pattern {
  /** The source as given by the caller */
  readonly source: string;
  /** Regular expression source after wildcard translation */
  readonly expression: string;
  readonly style: MatchStyle;
  readonly target: MatchTarget;
  /** Test a candidate file name or path */
  matches(candidate: string): boolean;
}

/** Characters with a meaning in regular expressions that wildcards take literally. */
const REGEX_METACHARACTERS = new Set(['.', '[', ']', '(', ')', '{', '}', '+', '^', '$', '|', '\\']);

/**
 * Translate a wildcard (`*`, `?`) source into a regular expression source.
 * The result is not anchored.
 */
export function wildcardToRegex(source: string): string {
  let result = '';
  for (const char of source) {
    if (char === '*') {
      result += '.*';
    } else if (char === '?') {
      result += '.';
    } else if (REGEX_METACHARACTERS.has(char)) {
      result += `\\${char}`;
    } else {
      result += char;
    }
  }
  return result;
}

function buildRegExp(expression: string, source: string): RegExp {
  try {
    return new RegExp(expression, 'i');
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new InvalidPatternError(source, message);
  }
}

/**
 * Compile a pattern.
 *
 * @param source - Wildcard or regex source
 * @param useRegex - Treat the source as a regular expression
 * @param pathMatch - Match against the full path instead of the file name
 * @throws InvalidPatternError if the source does not compile
 */
export function compilePattern(source: string, useRegex: boolean, pathMatch: boolean): Pattern {
  const expression = useRegex ? source : wildcardToRegex(source);
  const style: MatchStyle = pathMatch ? 'search' : 'anchored';
  const target: MatchTarget = pathMatch ? 'path' : 'name';

  // Validate the caller's expression on its own before wrapping it, so a
  // source like "a)|(b" is rejected rather than balanced by the wrapper.
  const searchRegex = buildRegExp(expression, source);
  const regex = style === 'anchored' ? buildRegExp(`^(?:${expression})$`, source) : searchRegex;

  return Object.freeze({
    source,
    expression,
    style,
    target,
    matches: (candidate: string): boolean => regex.test(candidate),
  });
}
