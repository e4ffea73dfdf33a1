/**
 * pqcscan - Traversal & Matcher
 *
 * Checks one parsed file: its imports against the taxonomy, then the calls
 * made through import aliases inside its function bodies. Pure and
 * synchronous; nothing is shared between files.
 */

import type {
  Expression,
  GoFile,
  ImportSpec,
  SelectorCallExpression,
  Statement,
} from '../languages/go/ast.js';
import type { CallDiagnostic, Diagnostic, ImportDiagnostic, MatchOptions, TraversalPolicy } from '../types.js';
import { CATEGORIES, CATEGORY_INFO, DEFAULT_TAXONOMY, type Category, type Taxonomy } from './taxonomy.js';
import { importPath, resolveAlias } from './resolver.js';

function assertNever(value: never): never {
  throw new Error(`Unexpected node: ${JSON.stringify(value)}`);
}

/**
 * Import finding text. `literal` is the path literal as written, quotes
 * included, so raw and escaped imports read as they do in the source.
 */
export function importMessage(literal: string, category: Category): string {
  if (category === 'key-exchange') {
    return `${literal} uses a quantum-vulnerable ${CATEGORY_INFO[category].label}; consider "crypto/mlkem"`;
  }
  return `${literal} uses quantum-vulnerable ${CATEGORY_INFO[category].label}`;
}

export function callMessage(qualifier: string, functionName: string): string {
  return `function "${qualifier}.${functionName}" implements quantum-vulnerable cryptography`;
}

// ============================================================
// Call references
// ============================================================

/**
 * The call reference an expression is, if any. Only `qualifier.member(...)`
 * with two plain identifiers qualifies.
 */
export function asCallReference(expression: Expression): SelectorCallExpression | undefined {
  switch (expression.kind) {
    case 'selectorCall':
      return expression;
    case 'call':
    case 'functionLiteral':
    case 'operand':
      return undefined;
    default:
      return assertNever(expression);
  }
}

/**
 * Call references of a single statement, without descending into it.
 * Only assignments and expression statements can carry one.
 */
function shallowReferences(statement: Statement): SelectorCallExpression[] {
  switch (statement.kind) {
    case 'assign':
      return statement.rhs
        .map(asCallReference)
        .filter((ref): ref is SelectorCallExpression => ref !== undefined);
    case 'expression': {
      const ref = asCallReference(statement.expression);
      return ref ? [ref] : [];
    }
    case 'compound':
    case 'simple':
      return [];
    default:
      return assertNever(statement);
  }
}

function collectFromExpression(expression: Expression, out: SelectorCallExpression[]): void {
  switch (expression.kind) {
    case 'selectorCall':
      out.push(expression);
      expression.arguments.forEach(arg => collectFromExpression(arg, out));
      break;
    case 'call':
      collectFromExpression(expression.callee, out);
      expression.arguments.forEach(arg => collectFromExpression(arg, out));
      break;
    case 'functionLiteral':
      expression.body.forEach(statement => collectFromStatement(statement, out));
      break;
    case 'operand':
      expression.children.forEach(child => collectFromExpression(child, out));
      break;
    default:
      assertNever(expression);
  }
}

function collectFromStatement(statement: Statement, out: SelectorCallExpression[]): void {
  switch (statement.kind) {
    case 'assign':
      statement.lhs.forEach(e => collectFromExpression(e, out));
      statement.rhs.forEach(e => collectFromExpression(e, out));
      break;
    case 'expression':
      collectFromExpression(statement.expression, out);
      break;
    case 'compound':
      statement.header.forEach(s => collectFromStatement(s, out));
      statement.blocks.forEach(block => block.forEach(s => collectFromStatement(s, out)));
      break;
    case 'simple':
      statement.expressions.forEach(e => collectFromExpression(e, out));
      break;
    default:
      assertNever(statement);
  }
}

/**
 * Call references of a function body in source order
 */
export function findCallReferences(body: readonly Statement[], traversal: TraversalPolicy = 'shallow'): SelectorCallExpression[] {
  if (traversal === 'shallow') {
    return body.flatMap(shallowReferences);
  }
  const out: SelectorCallExpression[] = [];
  body.forEach(statement => collectFromStatement(statement, out));
  return out;
}

// ============================================================
// Matching
// ============================================================

function checkImport(spec: ImportSpec, taxonomy: Taxonomy): ImportDiagnostic[] {
  const path = importPath(spec);
  const categories = taxonomy.classifyImport(path);

  // Fixed category order keeps output stable
  return CATEGORIES.filter(category => categories.has(category)).map((category): ImportDiagnostic => ({
    kind: 'import',
    position: spec.position,
    message: importMessage(spec.literal, category),
    module: path,
    category,
  }));
}

function checkCall(ref: SelectorCallExpression, file: GoFile, taxonomy: Taxonomy): CallDiagnostic | undefined {
  const module = resolveAlias(file.imports, ref.qualifier.name);
  if (module === undefined) return undefined;
  if (!taxonomy.classifyFunction(module, ref.member.name)) return undefined;

  return {
    kind: 'call',
    position: ref.qualifier.position,
    message: callMessage(ref.qualifier.name, ref.member.name),
    module,
    qualifier: ref.qualifier.name,
    functionName: ref.member.name,
  };
}

/**
 * Diagnostics for one file: imports first, then calls in declaration and
 * statement order. Identical findings are all reported.
 *
 * @throws MalformedLiteralError if an import path cannot be decoded; no
 * partial results are returned in that case
 */
export function analyzeFile(file: GoFile, options: MatchOptions = {}): Diagnostic[] {
  const taxonomy = options.taxonomy ?? DEFAULT_TAXONOMY;
  const traversal = options.traversal ?? 'shallow';
  const diagnostics: Diagnostic[] = [];

  for (const spec of file.imports) {
    diagnostics.push(...checkImport(spec, taxonomy));
  }

  for (const declaration of file.declarations) {
    if (declaration.kind !== 'function' || !declaration.body) continue;

    for (const ref of findCallReferences(declaration.body, traversal)) {
      const diagnostic = checkCall(ref, file, taxonomy);
      if (diagnostic) diagnostics.push(diagnostic);
    }
  }

  return diagnostics;
}
