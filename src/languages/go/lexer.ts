/**
 * pqcscan - Go Lexer
 * Tokenizes Go source, including automatic semicolon insertion
 */

import type { Position } from './ast.js';

export type TokenKind =
  | 'ident'
  | 'keyword'
  | 'int'
  | 'float'
  | 'imaginary'
  | 'rune'
  | 'string'
  | 'operator'
  | 'semicolon';

export interface Token {
  kind: TokenKind;
  text: string;
  position: Position;
  // Semicolon inserted at a line break rather than written
  automatic?: boolean;
}

export const KEYWORDS: ReadonlySet<string> = new Set([
  'break', 'case', 'chan', 'const', 'continue', 'default', 'defer', 'else',
  'fallthrough', 'for', 'func', 'go', 'goto', 'if', 'import', 'interface',
  'map', 'package', 'range', 'return', 'select', 'struct', 'switch', 'type', 'var',
]);

// Longest first so that maximal munch works with a simple prefix scan
const OPERATORS = [
  '<<=', '>>=', '&^=', '...',
  '&&', '||', '<-', '++', '--', '==', '!=', '<=', '>=', ':=',
  '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '<<', '>>', '&^',
  '+', '-', '*', '/', '%', '&', '|', '^', '<', '>', '=', '!', '~',
  '(', ')', '[', ']', '{', '}', ',', '.', ':',
];

const IDENT_PATTERN = /[\p{L}_][\p{L}\p{Nd}_]*/uy;
const NUMBER_PATTERN =
  /(?:0[xX][0-9a-fA-F_]*(?:\.[0-9a-fA-F_]*)?(?:[pP][+-]?[0-9_]+)?|0[bBoO][0-9_]+|[0-9][0-9_]*(?:\.[0-9_]*)?(?:[eE][+-]?[0-9_]+)?|\.[0-9][0-9_]*(?:[eE][+-]?[0-9_]+)?)i?/y;

/**
 * A line break after one of these ends the statement
 */
function triggersSemicolon(token: Token | undefined): boolean {
  if (!token) return false;
  switch (token.kind) {
    case 'ident':
    case 'int':
    case 'float':
    case 'imaginary':
    case 'rune':
    case 'string':
      return true;
    case 'keyword':
      return ['break', 'continue', 'fallthrough', 'return'].includes(token.text);
    case 'operator':
      return ['++', '--', ')', ']', '}'].includes(token.text);
    case 'semicolon':
      return false;
  }
}

function classifyNumber(text: string): TokenKind {
  if (text.endsWith('i')) return 'imaginary';
  if (/^0[xX]/.test(text)) {
    return /[.pP]/.test(text) ? 'float' : 'int';
  }
  if (/^0[bBoO]/.test(text)) return 'int';
  return /[.eE]/.test(text) ? 'float' : 'int';
}

/**
 * Tokenize Go source text.
 * Never throws: unterminated literals run to the end of the line (or file for
 * raw strings) and unknown characters become single-character operators.
 */
export function tokenize(source: string, file: string): Token[] {
  const tokens: Token[] = [];
  let offset = 0;
  let line = 1;
  let lineStart = 0;

  const positionAt = (at: number): Position => ({
    file,
    line,
    column: at - lineStart + 1,
    offset: at,
  });

  const insertSemicolon = (at: number): void => {
    if (triggersSemicolon(tokens[tokens.length - 1])) {
      tokens.push({ kind: 'semicolon', text: ';', position: positionAt(at), automatic: true });
    }
  };

  // Advance over text that may contain newlines, keeping line bookkeeping
  const consume = (end: number): void => {
    for (let i = offset; i < end; i++) {
      if (source[i] === '\n') {
        line++;
        lineStart = i + 1;
      }
    }
    offset = end;
  };

  while (offset < source.length) {
    const ch = source[offset];

    if (ch === '\n') {
      insertSemicolon(offset);
      consume(offset + 1);
      continue;
    }

    if (ch === ' ' || ch === '\t' || ch === '\r') {
      offset++;
      continue;
    }

    // Comments
    if (source.startsWith('//', offset)) {
      const end = source.indexOf('\n', offset);
      offset = end === -1 ? source.length : end;
      continue;
    }

    if (source.startsWith('/*', offset)) {
      const close = source.indexOf('*/', offset + 2);
      const end = close === -1 ? source.length : close + 2;
      if (source.slice(offset, end).includes('\n')) {
        insertSemicolon(offset);
      }
      consume(end);
      continue;
    }

    const start = offset;
    const position = positionAt(start);

    // Identifiers and keywords
    IDENT_PATTERN.lastIndex = offset;
    const ident = IDENT_PATTERN.exec(source);
    if (ident) {
      const text = ident[0];
      tokens.push({ kind: KEYWORDS.has(text) ? 'keyword' : 'ident', text, position });
      offset += text.length;
      continue;
    }

    // Numbers (a lone '.' falls through to the operator table)
    if (/[0-9]/.test(ch) || (ch === '.' && /[0-9]/.test(source[offset + 1] ?? ''))) {
      NUMBER_PATTERN.lastIndex = offset;
      const number = NUMBER_PATTERN.exec(source);
      if (number) {
        tokens.push({ kind: classifyNumber(number[0]), text: number[0], position });
        offset += number[0].length;
        continue;
      }
    }

    // Interpreted strings and runes stop at an unescaped delimiter or a line break
    if (ch === '"' || ch === "'") {
      let end = offset + 1;
      while (end < source.length && source[end] !== '\n') {
        if (source[end] === '\\' && source[end + 1] !== '\n' && end + 1 < source.length) {
          end += 2;
          continue;
        }
        if (source[end] === ch) {
          end++;
          break;
        }
        end++;
      }
      tokens.push({ kind: ch === '"' ? 'string' : 'rune', text: source.slice(start, end), position });
      offset = end;
      continue;
    }

    // Raw strings may span lines
    if (ch === '`') {
      const close = source.indexOf('`', offset + 1);
      const end = close === -1 ? source.length : close + 1;
      tokens.push({ kind: 'string', text: source.slice(start, end), position });
      consume(end);
      continue;
    }

    if (ch === ';') {
      tokens.push({ kind: 'semicolon', text: ';', position });
      offset++;
      continue;
    }

    const operator = OPERATORS.find(op => source.startsWith(op, offset)) ?? ch;
    tokens.push({ kind: 'operator', text: operator, position });
    offset += operator.length;
  }

  insertSemicolon(offset);
  return tokens;
}
