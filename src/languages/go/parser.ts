/**
 * pqcscan - Go Parser
 * Builds the GoFile model from source text. The parser is lenient: code it
 * cannot make sense of becomes an operand or is dropped, never an exception.
 */

import { tokenize, type Token } from './lexer.js';
import type {
  Expression,
  FunctionDeclaration,
  GenericDeclaration,
  GoFile,
  Identifier,
  ImportSpec,
  Statement,
  CompoundStatement,
  SimpleKeyword,
} from './ast.js';

const OPENERS = new Set(['(', '[', '{']);
const CLOSERS = new Set([')', ']', '}']);

const ASSIGN_OPERATORS = new Set([
  '=', ':=', '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '<<=', '>>=', '&^=',
]);

const STATEMENT_KEYWORDS: ReadonlyMap<string, SimpleKeyword> = new Map<string, SimpleKeyword>([
  ['go', 'go'],
  ['defer', 'defer'],
  ['return', 'return'],
  ['type', 'type'],
  ['goto', 'goto'],
  ['break', 'break'],
  ['continue', 'continue'],
  ['fallthrough', 'fallthrough'],
]);

// Keywords followed by an expression list
const EXPRESSION_KEYWORDS: ReadonlySet<SimpleKeyword> = new Set<SimpleKeyword>(['go', 'defer', 'return']);

// Operators that separate operands inside an expression
const EXPRESSION_OPERATORS = new Set([
  '+', '-', '*', '/', '%', '&', '|', '^', '<<', '>>', '&^', '&&', '||',
  '==', '!=', '<', '<=', '>', '>=', '<-', '!', '~', '...',
]);

// ============================================================
// Token helpers
// ============================================================

function isOperator(token: Token | undefined, text: string): boolean {
  return token !== undefined && token.kind === 'operator' && token.text === text;
}

function isKeyword(token: Token | undefined, text: string): boolean {
  return token !== undefined && token.kind === 'keyword' && token.text === text;
}

function depthDelta(token: Token): number {
  if (token.kind !== 'operator') return 0;
  if (OPENERS.has(token.text)) return 1;
  if (CLOSERS.has(token.text)) return -1;
  return 0;
}

/**
 * Index of the bracket closing the one at `open` (last index if unbalanced)
 */
export function findClosing(tokens: Token[], open: number): number {
  let depth = 0;
  for (let i = open; i < tokens.length; i++) {
    depth += depthDelta(tokens[i]);
    if (depth === 0) return i;
  }
  return tokens.length - 1;
}

/**
 * Index of the bracket opening the one at `close` (-1 if unbalanced)
 */
function findOpening(tokens: Token[], close: number): number {
  let depth = 0;
  for (let i = close; i >= 0; i--) {
    depth -= depthDelta(tokens[i]);
    if (depth === 0) return i;
  }
  return -1;
}

/**
 * Split at depth-0 tokens matching `isSeparator` (separators are dropped)
 */
function splitTopLevel(tokens: Token[], isSeparator: (token: Token) => boolean): Token[][] {
  const pieces: Token[][] = [];
  let current: Token[] = [];
  let depth = 0;

  for (const token of tokens) {
    if (depth === 0 && isSeparator(token)) {
      pieces.push(current);
      current = [];
      continue;
    }
    depth = Math.max(0, depth + depthDelta(token));
    current.push(token);
  }
  pieces.push(current);
  return pieces;
}

function indexAtDepthZero(tokens: Token[], predicate: (token: Token, index: number) => boolean, from = 0): number {
  let depth = 0;
  for (let i = from; i < tokens.length; i++) {
    if (depth === 0 && predicate(tokens[i], i)) return i;
    depth = Math.max(0, depth + depthDelta(tokens[i]));
  }
  return -1;
}

function toIdentifier(token: Token): Identifier {
  return { name: token.text, position: token.position };
}

function joinText(tokens: Token[]): string {
  return tokens.map(t => t.text).join('');
}

/**
 * In a control clause header, `T{` with T a bare type name opens the body,
 * while `[]T{`, `map[K]V{` and `struct{...}{` are composite literals.
 */
function isCompositeLiteralBrace(tokens: Token[], brace: number): boolean {
  let k = brace - 1;
  if (isOperator(tokens[k], '}')) {
    return isKeyword(tokens[findOpening(tokens, k) - 1], 'struct');
  }
  if (tokens[k]?.kind !== 'ident') return false;
  k--;
  while (isOperator(tokens[k], '.') && tokens[k - 1]?.kind === 'ident') {
    k -= 2;
  }
  while (isOperator(tokens[k], '*')) {
    k--;
  }
  return isOperator(tokens[k], ']');
}

/**
 * Find the `{` opening the body of an if/for/switch/select, starting after
 * the keyword. Function literal bodies and composite literals are skipped.
 */
function findControlBody(tokens: Token[], from: number): number {
  let depth = 0;
  let pendingFunctions = 0;

  for (let i = from; i < tokens.length; i++) {
    const token = tokens[i];
    if (depth === 0 && isKeyword(token, 'func')) {
      pendingFunctions++;
      continue;
    }
    if (depth === 0 && isOperator(token, '{')) {
      if (pendingFunctions > 0) {
        pendingFunctions--;
        i = findClosing(tokens, i);
        continue;
      }
      if (isCompositeLiteralBrace(tokens, i)) {
        i = findClosing(tokens, i);
        continue;
      }
      return i;
    }
    depth = Math.max(0, depth + depthDelta(token));
  }
  return -1;
}

/**
 * End (exclusive) of a control statement starting at `start`
 */
function scanControlEnd(tokens: Token[], start: number): number {
  const open = findControlBody(tokens, start + 1);
  if (open === -1) {
    const semicolon = indexAtDepthZero(tokens, t => t.kind === 'semicolon', start);
    return semicolon === -1 ? tokens.length : semicolon;
  }

  let close = findClosing(tokens, open);
  if (isKeyword(tokens[start], 'if')) {
    while (isKeyword(tokens[close + 1], 'else')) {
      if (isKeyword(tokens[close + 2], 'if')) {
        const next = findControlBody(tokens, close + 3);
        if (next === -1) break;
        close = findClosing(tokens, next);
      } else if (isOperator(tokens[close + 2], '{')) {
        close = findClosing(tokens, close + 2);
        break;
      } else {
        break;
      }
    }
  }
  return close + 1;
}

// ============================================================
// Statements
// ============================================================

type StatementUnit =
  | { kind: 'statement'; tokens: Token[] }
  | { kind: 'label'; label: Token }
  | { kind: 'clause'; head: Token[]; position: Token['position'] };

/**
 * Cut a statement list into units: statements, labels and case clause heads.
 * Control statements extend past the semicolons inside their headers.
 */
function scanStatements(tokens: Token[]): StatementUnit[] {
  const units: StatementUnit[] = [];
  let i = 0;

  while (i < tokens.length) {
    const token = tokens[i];

    if (token.kind === 'semicolon') {
      i++;
      continue;
    }

    if (isKeyword(token, 'case') || isKeyword(token, 'default')) {
      const colon = indexAtDepthZero(tokens, t => isOperator(t, ':'), i + 1);
      const end = colon === -1 ? tokens.length : colon;
      units.push({ kind: 'clause', head: tokens.slice(i + 1, end), position: token.position });
      i = end + 1;
      continue;
    }

    if (token.kind === 'ident' && isOperator(tokens[i + 1], ':')) {
      units.push({ kind: 'label', label: token });
      i += 2;
      continue;
    }

    let end: number;
    if (token.kind === 'keyword' && ['if', 'for', 'switch', 'select'].includes(token.text)) {
      end = scanControlEnd(tokens, i);
    } else {
      const semicolon = indexAtDepthZero(tokens, t => t.kind === 'semicolon', i);
      end = semicolon === -1 ? tokens.length : semicolon;
    }
    units.push({ kind: 'statement', tokens: tokens.slice(i, end) });
    i = end;
  }

  return units;
}

/**
 * Parse the contents of a block. Case clauses collect the statements that
 * follow them; labels wrap the statement they precede.
 */
export function parseStatementList(tokens: Token[]): Statement[] {
  const statements: Statement[] = [];
  let clause: CompoundStatement | undefined;
  let labels: Token[] = [];

  const emit = (statement: Statement): void => {
    let wrapped = statement;
    for (const label of labels.reverse()) {
      wrapped = { kind: 'compound', keyword: 'label', header: [], blocks: [[wrapped]], position: label.position };
    }
    labels = [];
    if (clause) {
      clause.blocks[0].push(wrapped);
    } else {
      statements.push(wrapped);
    }
  };

  const flushLabels = (): void => {
    for (const label of labels) {
      const empty: CompoundStatement = { kind: 'compound', keyword: 'label', header: [], blocks: [[]], position: label.position };
      if (clause) clause.blocks[0].push(empty);
      else statements.push(empty);
    }
    labels = [];
  };

  for (const unit of scanStatements(tokens)) {
    switch (unit.kind) {
      case 'label':
        labels.push(unit.label);
        break;
      case 'clause':
        flushLabels();
        clause = {
          kind: 'compound',
          keyword: 'case',
          header: parseClauseHead(unit.head),
          blocks: [[]],
          position: unit.position,
        };
        statements.push(clause);
        break;
      case 'statement': {
        const statement = parseStatement(unit.tokens);
        if (statement) emit(statement);
        break;
      }
    }
  }

  flushLabels();
  return statements;
}

function parseClauseHead(head: Token[]): Statement[] {
  if (head.length === 0) return [];
  const isCommunication = indexAtDepthZero(head, t => ASSIGN_OPERATORS.has(t.text) || isOperator(t, '<-')) !== -1;
  if (isCommunication) {
    const statement = parseStatement(head);
    return statement ? [statement] : [];
  }
  return parseExpressionList(head).map(expression => ({
    kind: 'expression' as const,
    expression,
    position: expression.position,
  }));
}

/**
 * Header of if/for/switch: `init; cond` or `init; cond; post`
 */
function parseHeader(tokens: Token[]): Statement[] {
  return splitTopLevel(tokens, t => t.kind === 'semicolon')
    .filter(part => part.length > 0)
    .map(part => parseStatement(part))
    .filter((s): s is Statement => s !== undefined);
}

function parseIf(tokens: Token[]): CompoundStatement {
  const header: Statement[] = [];
  const blocks: Statement[][] = [];
  let i = 1;

  for (;;) {
    const open = findControlBody(tokens, i);
    if (open === -1) {
      header.push(...parseHeader(tokens.slice(i)));
      break;
    }
    header.push(...parseHeader(tokens.slice(i, open)));
    const close = findClosing(tokens, open);
    blocks.push(parseStatementList(tokens.slice(open + 1, close)));
    i = close + 1;

    if (!isKeyword(tokens[i], 'else')) break;
    if (isKeyword(tokens[i + 1], 'if')) {
      i += 2;
      continue;
    }
    if (isOperator(tokens[i + 1], '{')) {
      const elseClose = findClosing(tokens, i + 1);
      blocks.push(parseStatementList(tokens.slice(i + 2, elseClose)));
    }
    break;
  }

  return { kind: 'compound', keyword: 'if', header, blocks, position: tokens[0].position };
}

function parseLoopOrSwitch(tokens: Token[], keyword: 'for' | 'switch' | 'select'): CompoundStatement {
  const position = tokens[0].position;
  const open = findControlBody(tokens, 1);
  if (open === -1) {
    return { kind: 'compound', keyword, header: parseHeader(tokens.slice(1)), blocks: [], position };
  }
  const close = findClosing(tokens, open);
  return {
    kind: 'compound',
    keyword,
    header: parseHeader(tokens.slice(1, open)),
    blocks: [parseStatementList(tokens.slice(open + 1, close))],
    position,
  };
}

/**
 * Values of `var`/`const` specs: everything after the depth-0 `=`
 */
function parseDeclarationValues(tokens: Token[]): Expression[] {
  const specs = isOperator(tokens[0], '(')
    ? splitTopLevel(tokens.slice(1, findClosing(tokens, 0)), t => t.kind === 'semicolon')
    : [tokens];

  const values: Expression[] = [];
  for (const spec of specs) {
    const equals = indexAtDepthZero(spec, t => isOperator(t, '='));
    if (equals !== -1) {
      values.push(...parseExpressionList(spec.slice(equals + 1)));
    }
  }
  return values;
}

export function parseStatement(tokens: Token[]): Statement | undefined {
  if (tokens.length === 0) return undefined;
  const first = tokens[0];
  const position = first.position;

  if (first.kind === 'keyword') {
    switch (first.text) {
      case 'if':
        return parseIf(tokens);
      case 'for':
        return parseLoopOrSwitch(tokens, 'for');
      case 'switch':
        return parseLoopOrSwitch(tokens, 'switch');
      case 'select':
        return parseLoopOrSwitch(tokens, 'select');
      case 'var':
        return { kind: 'simple', keyword: 'var', expressions: parseDeclarationValues(tokens.slice(1)), position };
      case 'const':
        return { kind: 'simple', keyword: 'const', expressions: parseDeclarationValues(tokens.slice(1)), position };
    }

    const keyword = STATEMENT_KEYWORDS.get(first.text);
    if (keyword) {
      const expressions = EXPRESSION_KEYWORDS.has(keyword) ? parseExpressionList(tokens.slice(1)) : [];
      return { kind: 'simple', keyword, expressions, position };
    }
  }

  if (isOperator(first, '{')) {
    const close = findClosing(tokens, 0);
    return { kind: 'compound', keyword: 'block', header: [], blocks: [parseStatementList(tokens.slice(1, close))], position };
  }

  const assign = indexAtDepthZero(tokens, t => t.kind === 'operator' && ASSIGN_OPERATORS.has(t.text));
  if (assign !== -1) {
    return {
      kind: 'assign',
      operator: tokens[assign].text,
      lhs: parseExpressionList(tokens.slice(0, assign)),
      rhs: parseExpressionList(tokens.slice(assign + 1)),
      position,
    };
  }

  const last = tokens[tokens.length - 1];
  if (isOperator(last, '++') || isOperator(last, '--')) {
    const operand = parseExpression(tokens.slice(0, -1));
    return { kind: 'simple', keyword: 'incdec', expressions: operand ? [operand] : [], position };
  }

  const send = indexAtDepthZero(tokens, (t, i) => i > 0 && isOperator(t, '<-'));
  if (send !== -1) {
    const expressions = [parseExpression(tokens.slice(0, send)), parseExpression(tokens.slice(send + 1))]
      .filter((e): e is Expression => e !== undefined);
    return { kind: 'simple', keyword: 'send', expressions, position };
  }

  const expression = parseExpression(tokens);
  return expression ? { kind: 'expression', expression, position } : undefined;
}

// ============================================================
// Expressions
// ============================================================

export function parseExpressionList(tokens: Token[]): Expression[] {
  return splitTopLevel(tokens, t => isOperator(t, ','))
    .map(part => parseExpression(part))
    .filter((e): e is Expression => e !== undefined);
}

/**
 * Split an expression into operands at depth-0 operators. A function
 * literal is kept whole even when its signature contains `*` or `<-`.
 */
export function parseExpression(tokens: Token[]): Expression | undefined {
  if (tokens.length === 0) return undefined;

  const pieces: Token[][] = [];
  let current: Token[] = [];
  let depth = 0;
  let split = false;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];

    if (depth === 0 && isKeyword(token, 'func')) {
      const open = indexAtDepthZero(tokens, t => isOperator(t, '{'), i + 1);
      const end = open === -1 ? i : findClosing(tokens, open);
      current.push(...tokens.slice(i, end + 1));
      i = end;
      continue;
    }

    const separates = (token.kind === 'operator' && EXPRESSION_OPERATORS.has(token.text)) || isKeyword(token, 'range');
    if (depth === 0 && separates) {
      split = true;
      if (current.length > 0) pieces.push(current);
      current = [];
      continue;
    }

    depth = Math.max(0, depth + depthDelta(token));
    current.push(token);
  }
  if (current.length > 0) pieces.push(current);

  if (!split && pieces.length === 1) {
    return parsePrimary(pieces[0]);
  }

  return {
    kind: 'operand',
    text: joinText(tokens),
    children: pieces.map(piece => parsePrimary(piece)).filter((e): e is Expression => e !== undefined),
    position: tokens[0].position,
  };
}

function operand(tokens: Token[], children: Expression[]): Expression {
  return { kind: 'operand', text: joinText(tokens), children, position: tokens[0].position };
}

/**
 * Elements of a composite literal or index expression, split at `,` and `:`
 */
function parseElements(tokens: Token[]): Expression[] {
  return splitTopLevel(tokens, t => isOperator(t, ',') || isOperator(t, ':'))
    .map(part => parseExpression(part))
    .filter((e): e is Expression => e !== undefined);
}

/**
 * A single operand with its postfix chain: calls, selectors, index
 * expressions, type assertions, composite and function literals.
 */
function parsePrimary(tokens: Token[]): Expression | undefined {
  if (tokens.length === 0) return undefined;
  const last = tokens[tokens.length - 1];
  const lastIndex = tokens.length - 1;

  if (isOperator(last, ')')) {
    const open = findOpening(tokens, lastIndex);
    if (open === -1) return operand(tokens, []);
    const inner = tokens.slice(open + 1, lastIndex);

    if (open === 0) {
      return operand(tokens, parseExpressionList(inner));
    }

    const callee = tokens.slice(0, open);

    // x.(T) and x.(type)
    if (isOperator(callee[callee.length - 1], '.')) {
      const subject = parsePrimary(callee.slice(0, -1));
      return operand(tokens, subject ? [subject] : []);
    }

    const args = parseExpressionList(inner);
    if (callee.length === 3 && callee[0].kind === 'ident' && isOperator(callee[1], '.') && callee[2].kind === 'ident') {
      return {
        kind: 'selectorCall',
        qualifier: toIdentifier(callee[0]),
        member: toIdentifier(callee[2]),
        arguments: args,
        position: callee[0].position,
      };
    }

    const calleeExpression = parsePrimary(callee) ?? operand(callee, []);
    return { kind: 'call', callee: calleeExpression, arguments: args, position: tokens[0].position };
  }

  if (isOperator(last, '}')) {
    const open = findOpening(tokens, lastIndex);
    if (open === -1) return operand(tokens, []);
    const inner = tokens.slice(open + 1, lastIndex);

    if (isKeyword(tokens[0], 'func')) {
      return { kind: 'functionLiteral', body: parseStatementList(inner), position: tokens[0].position };
    }
    return operand(tokens, parseElements(inner));
  }

  if (isOperator(last, ']')) {
    const open = findOpening(tokens, lastIndex);
    if (open === -1) return operand(tokens, []);
    const subject = open > 0 ? parsePrimary(tokens.slice(0, open)) : undefined;
    const elements = parseElements(tokens.slice(open + 1, lastIndex));
    return operand(tokens, subject ? [subject, ...elements] : elements);
  }

  if (last.kind === 'ident' && tokens.length >= 3 && isOperator(tokens[lastIndex - 1], '.')) {
    const subject = parsePrimary(tokens.slice(0, -2));
    return operand(tokens, subject ? [subject] : []);
  }

  return operand(tokens, []);
}

// ============================================================
// Declarations
// ============================================================

function parseImportSpec(tokens: Token[]): ImportSpec | null {
  const pathToken = tokens[tokens.length - 1];
  if (!pathToken || pathToken.kind !== 'string') return null;

  if (tokens.length === 1) {
    return { literal: pathToken.text, literalPosition: pathToken.position, position: pathToken.position };
  }

  if (tokens.length === 2) {
    const name = tokens[0];
    if (name.kind === 'ident' || isOperator(name, '.')) {
      return {
        literal: pathToken.text,
        alias: toIdentifier(name),
        literalPosition: pathToken.position,
        position: name.position,
      };
    }
  }

  return null;
}

function parseImportDeclaration(tokens: Token[]): ImportSpec[] {
  const specs = isOperator(tokens[0], '(')
    ? splitTopLevel(tokens.slice(1, findClosing(tokens, 0)), t => t.kind === 'semicolon')
    : [tokens];

  return specs
    .filter(spec => spec.length > 0)
    .map(spec => parseImportSpec(spec))
    .filter((spec): spec is ImportSpec => spec !== null);
}

function parseFunctionDeclaration(tokens: Token[]): FunctionDeclaration | null {
  let i = 1;
  let receiver: string | undefined;

  if (isOperator(tokens[i], '(')) {
    const close = findClosing(tokens, i);
    const inner = tokens.slice(i + 1, close);
    // (s *Signer) -> *Signer, (Signer) -> Signer
    const typeTokens = inner.length > 1 && inner[0].kind === 'ident' && !isOperator(inner[1], '[') && !isOperator(inner[1], '.')
      ? inner.slice(1)
      : inner;
    receiver = joinText(typeTokens);
    i = close + 1;
  }

  const nameToken = tokens[i];
  if (!nameToken || nameToken.kind !== 'ident') return null;

  let body: Statement[] | undefined;
  const lastIndex = tokens.length - 1;
  if (isOperator(tokens[lastIndex], '}')) {
    const open = findOpening(tokens, lastIndex);
    const before = tokens[open - 1];
    // func f() struct{} has no body
    if (open > i && !isKeyword(before, 'struct') && !isKeyword(before, 'interface')) {
      body = parseStatementList(tokens.slice(open + 1, lastIndex));
    }
  }

  return {
    kind: 'function',
    name: toIdentifier(nameToken),
    receiver,
    body,
    position: tokens[0].position,
  };
}

/**
 * Parse Go source into the model the matcher consumes
 */
export function parseGoFile(source: string, fileName: string): GoFile {
  const tokens = tokenize(source, fileName);
  const file: GoFile = { fileName, imports: [], declarations: [] };

  for (const decl of splitTopLevel(tokens, t => t.kind === 'semicolon')) {
    const first = decl[0];
    if (!first || first.kind !== 'keyword') continue;

    switch (first.text) {
      case 'package':
        if (decl[1]?.kind === 'ident') {
          file.packageName = toIdentifier(decl[1]);
        }
        break;
      case 'import':
        file.imports.push(...parseImportDeclaration(decl.slice(1)));
        break;
      case 'func': {
        const fn = parseFunctionDeclaration(decl);
        if (fn) file.declarations.push(fn);
        break;
      }
      case 'var':
      case 'const':
      case 'type': {
        const kind: GenericDeclaration['kind'] = first.text === 'var' ? 'var' : first.text === 'const' ? 'const' : 'type';
        file.declarations.push({ kind, position: first.position });
        break;
      }
    }
  }

  return file;
}
