/**
 * Command Templates
 *
 * Expands the placeholders of a per-file command:
 *
 * - %d: directory containing the file
 * - %n: file name
 * - %f: full path
 *
 * The template is split into tokens once, and values are inserted into
 * that token list, so text coming from a file name is never scanned for
 * placeholders.
 *
 * renderCommand() produces the display form with quoted values. The
 * argument list that is actually launched comes from splitTemplate(),
 * which splits only the literal text and inserts values verbatim.
 */

import * as path from 'path';
import * as shlex from 'shlex';
import { splitPath, type FileRecord } from '../search/index.js';

export type PlaceholderKind = 'directory' | 'name' | 'path';

export type TemplateToken =
  | { type: 'literal'; text: string }
  | { type: 'placeholder'; kind: PlaceholderKind };

const PLACEHOLDERS: Record<string, PlaceholderKind> = {
  d: 'directory',
  n: 'name',
  f: 'path',
};

/**
 * Split a template into literal text and placeholder tokens.
 * A '%' not followed by d, n or f is literal.
 */
export function parseTemplate(template: string): TemplateToken[] {
  const tokens: TemplateToken[] = [];
  let literal = '';

  for (let i = 0; i < template.length; i++) {
    const kind = template[i] === '%' ? PLACEHOLDERS[template[i + 1] ?? ''] : undefined;
    if (kind) {
      if (literal) {
        tokens.push({ type: 'literal', text: literal });
        literal = '';
      }
      tokens.push({ type: 'placeholder', kind });
      i++;
    } else {
      literal += template[i];
    }
  }

  if (literal) {
    tokens.push({ type: 'literal', text: literal });
  }
  return tokens;
}

/**
 * Wrap a value in double quotes so that it splits back into one argument.
 *
 * Embedded quotes are escaped, as are backslashes that would otherwise
 * escape a quote; other backslashes are kept as they are.
 */
export function quoteArgument(value: string): string {
  const escaped = value.replace(/(\\*)("|$)/g, (_match, slashes: string, quote: string) => {
    return slashes + slashes + (quote ? '\\"' : '');
  });
  return `"${escaped}"`;
}

export interface TemplateOptions {
  /** Path separator used to find the directory and name (default: path.sep) */
  separator?: string;
}

function placeholderValues(
  record: FileRecord,
  options: TemplateOptions
): Record<PlaceholderKind, string> {
  const { directory, name } = splitPath(record.path, options.separator ?? path.sep);
  return { directory, name, path: record.path };
}

/**
 * Render pre-parsed tokens for one record.
 */
export function renderTokens(
  tokens: readonly TemplateToken[],
  record: FileRecord,
  options: TemplateOptions = {}
): string {
  const values = placeholderValues(record, options);

  return tokens
    .map((token) => (token.type === 'literal' ? token.text : quoteArgument(values[token.kind])))
    .join('');
}

/**
 * Render a command template for one record.
 */
export function renderCommand(
  template: string,
  record: FileRecord,
  options: TemplateOptions = {}
): string {
  return renderTokens(parseTemplate(template), record, options);
}

// Private-use code points stand in for values while the literal text is split.
const MARKER_START = '\uE000';
const MARKER_END = '\uE001';
const MARKER = /\uE000(\d+)\uE001/g;

/**
 * Split pre-parsed tokens into program arguments for one record.
 *
 * Literal text follows POSIX shell quoting rules (shlex). Each placeholder
 * value becomes part of the argument it appears in, byte for byte, so a
 * value with spaces, quotes or backslashes is never re-split or unescaped.
 *
 * @throws Error from shlex when the literal text has unbalanced quotes
 */
export function splitTemplate(
  tokens: readonly TemplateToken[],
  record: FileRecord,
  options: TemplateOptions = {}
): string[] {
  const values = placeholderValues(record, options);
  const inserted: string[] = [];

  const line = tokens
    .map((token) => {
      if (token.type === 'literal') {
        return token.text;
      }
      inserted.push(values[token.kind]);
      return `${MARKER_START}${inserted.length - 1}${MARKER_END}`;
    })
    .join('');

  return shlex
    .split(line)
    .map((arg) => arg.replace(MARKER, (_match, index: string) => inserted[Number(index)] ?? ''));
}
