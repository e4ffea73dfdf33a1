/**
 * pqcscan - Error Types
 */

import type { Position } from '../languages/go/ast.js';

/**
 * An import path literal that cannot be decoded.
 * Fatal for the file being analyzed: no diagnostics are returned for it.
 */
export class MalformedLiteralError extends Error {
  readonly literal: string;
  readonly position: Position;

  constructor(literal: string, position: Position, reason: string) {
    super(`${position.file}:${position.line}:${position.column}: malformed import path ${literal}: ${reason}`);
    this.name = 'MalformedLiteralError';
    this.literal = literal;
    this.position = position;
  }
}
