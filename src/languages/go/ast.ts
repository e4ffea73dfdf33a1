/**
 * pqcscan - Go Syntax Model
 *
 * The parsed representation of a single Go file consumed by the matcher.
 * Statements and expressions are tagged unions; the matcher switches on
 * `kind` and only ever acts on the `selectorCall` variant.
 */

export interface Position {
  file: string;
  line: number;      // 1-based
  column: number;    // 1-based
  offset: number;    // 0-based character offset
}

export interface Identifier {
  name: string;
  position: Position;
}

// ============================================================
// Declarations
// ============================================================

/**
 * import "path" / import alias "path"
 */
export interface ImportSpec {
  // Path literal exactly as written, quotes included ("crypto/rsa" or `crypto/rsa`)
  literal: string;
  // Explicit local name, including "." and "_"
  alias?: Identifier;
  // Position of the path literal
  literalPosition: Position;
  // Position of the spec (alias when written, otherwise the literal)
  position: Position;
}

export interface FunctionDeclaration {
  kind: 'function';
  name: Identifier;
  // Receiver type text for methods, e.g. "*Signer"
  receiver?: string;
  // Undefined for bodiless (external) declarations
  body?: Statement[];
  position: Position;
}

export interface GenericDeclaration {
  kind: 'var' | 'const' | 'type';
  position: Position;
}

export type Declaration = FunctionDeclaration | GenericDeclaration;

export interface GoFile {
  fileName: string;
  packageName?: Identifier;
  imports: ImportSpec[];
  declarations: Declaration[];
}

// ============================================================
// Statements
// ============================================================

/** x = f(), a, b := g(), n += h() */
export interface AssignStatement {
  kind: 'assign';
  operator: string;
  lhs: Expression[];
  rhs: Expression[];
  position: Position;
}

/** A bare expression used as a statement */
export interface ExpressionStatement {
  kind: 'expression';
  expression: Expression;
  position: Position;
}

export type CompoundKeyword = 'if' | 'for' | 'switch' | 'select' | 'block' | 'case' | 'label';

/**
 * Statements that own nested statement lists.
 * `header` holds the init/condition/post statements of if/for/switch and the
 * expressions of a case clause; `blocks` holds each nested body in order.
 */
export interface CompoundStatement {
  kind: 'compound';
  keyword: CompoundKeyword;
  header: Statement[];
  blocks: Statement[][];
  position: Position;
}

export type SimpleKeyword =
  | 'return' | 'go' | 'defer'
  | 'var' | 'const' | 'type'
  | 'goto' | 'break' | 'continue' | 'fallthrough'
  | 'send' | 'incdec';

/** Every other statement; `expressions` lists the expressions it contains */
export interface SimpleStatement {
  kind: 'simple';
  keyword: SimpleKeyword;
  expressions: Expression[];
  position: Position;
}

export type Statement = AssignStatement | ExpressionStatement | CompoundStatement | SimpleStatement;

// ============================================================
// Expressions
// ============================================================

/**
 * qualifier.member(args) where both parts are plain identifiers.
 * This is the only shape that can be a call reference.
 */
export interface SelectorCallExpression {
  kind: 'selectorCall';
  qualifier: Identifier;
  member: Identifier;
  arguments: Expression[];
  position: Position;
}

/** Any other call: f(x), a.b.c(x), f()(x), T(x) */
export interface CallExpression {
  kind: 'call';
  callee: Expression;
  arguments: Expression[];
  position: Position;
}

export interface FunctionLiteral {
  kind: 'functionLiteral';
  body: Statement[];
  position: Position;
}

/**
 * Identifiers, literals, selectors, index and slice expressions, composite
 * literals, unary and binary expressions. `children` holds the
 * sub-expressions found inside it.
 */
export interface OperandExpression {
  kind: 'operand';
  text: string;
  children: Expression[];
  position: Position;
}

export type Expression = SelectorCallExpression | CallExpression | FunctionLiteral | OperandExpression;
