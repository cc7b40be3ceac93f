/**
 * qop-ir - Symbolic IR for quantum-operator expressions
 *
 * Sums and products of scalars, symbolic parameters and Pauli strings, with a
 * canonical form shared by every structurally equivalent expression.
 */

// Leaves
export {
  named,
  bound,
  symbolName,
  symbolsEqual,
  compareSymbols,
  formatSymbol
} from './ir/Symbol.js';
export type { Symbol, NamedSymbol, BoundSymbol } from './ir/Symbol.js';

export {
  PauliString,
  parsePauliOperator,
  isPauliOperator,
  comparePauliOperators
} from './ir/Pauli.js';
export type { PauliOperator, PauliTerm, PauliParseResult } from './ir/Pauli.js';

// Expression tree
export {
  scalar,
  symbol,
  pauli,
  sum,
  product,
  children,
  exprEquals,
  formatExpr
} from './ir/Expr.js';
export type {
  Expr,
  ExprKind,
  ScalarExpr,
  SymbolExpr,
  PauliExpr,
  SumExpr,
  ProductExpr
} from './ir/Expr.js';

// Canonicalization
export { compareExpr, EXPR_KIND_RANK } from './ir/Ordering.js';
export { ExprTransformer } from './ir/ExprTransformer.js';
export { flatten, isFlat, FlattenTransformer } from './ir/Flatten.js';
export {
  canonicalize,
  isCanonical,
  canonicalEquals,
  canonicalKey,
  CanonicalTransformer
} from './ir/Canonical.js';
export type { Canonicalized } from './ir/Canonical.js';
export { serializeExpr, exprDepth } from './ir/ExprUtils.js';

// Errors
export { InvalidOperatorError } from './ir/Errors.js';
