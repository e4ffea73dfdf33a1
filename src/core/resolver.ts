/**
 * pqcscan - Alias Resolver
 * Maps the qualifier of a call back to the package it was imported from
 */

import type { ImportSpec } from '../languages/go/ast.js';
import { decodeStringLiteral } from './literal.js';
import { MalformedLiteralError } from './errors.js';

/**
 * Decoded import path of a spec
 * @throws MalformedLiteralError when the literal cannot be decoded
 */
export function importPath(spec: ImportSpec): string {
  const decoded = decodeStringLiteral(spec.literal);
  if (!decoded.ok) {
    throw new MalformedLiteralError(spec.literal, spec.literalPosition, decoded.reason);
  }
  return decoded.value;
}

/**
 * Name a package is referred to by when imported without an alias:
 * the last segment of its path ("crypto/ecdsa" -> "ecdsa")
 */
export function defaultAlias(path: string): string {
  const segments = path.split('/');
  return segments[segments.length - 1];
}

/**
 * Local name an import is bound to in its file
 */
export function localAlias(spec: ImportSpec): string {
  return spec.alias?.name ?? defaultAlias(importPath(spec));
}

/**
 * Package path `localName` denotes in a file, or undefined when it is not an
 * import alias (a local variable, a receiver, a package-less helper...).
 */
export function resolveAlias(imports: readonly ImportSpec[], localName: string): string | undefined {
  // Dot and blank imports bind no name
  if (localName === '.' || localName === '_') return undefined;
  const spec = imports.find(candidate => localAlias(candidate) === localName);
  return spec ? importPath(spec) : undefined;
}
