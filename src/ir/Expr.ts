/**
 * Expression tree for quantum-operator expressions.
 *
 * Nodes are immutable and may be shared between parents. Constructors never
 * flatten, sort or simplify; see Flatten.ts and Canonical.ts for that.
 */

import { PauliString } from './Pauli.js';
import { Symbol, formatSymbol, symbolsEqual } from './Symbol.js';
import { numbersEqual } from './Numeric.js';

export type Expr =
  | ScalarExpr
  | SymbolExpr
  | PauliExpr
  | SumExpr
  | ProductExpr;

export type ExprKind = Expr['kind'];

/**
 * Numeric coefficient
 */
export interface ScalarExpr {
  readonly kind: 'scalar';
  readonly value: number;
}

/**
 * Symbolic parameter
 */
export interface SymbolExpr {
  readonly kind: 'symbol';
  readonly symbol: Symbol;
}

/**
 * Pauli tensor product
 */
export interface PauliExpr {
  readonly kind: 'pauli';
  readonly pauli: PauliString;
}

/**
 * Sum of terms. Term order carries no meaning.
 */
export interface SumExpr {
  readonly kind: 'sum';
  readonly terms: readonly Expr[];
}

/**
 * Product of factors. Operators do not commute, so factor order is significant.
 */
export interface ProductExpr {
  readonly kind: 'product';
  readonly factors: readonly Expr[];
}

export function scalar(value: number): ScalarExpr {
  return { kind: 'scalar', value };
}

export function symbol(symbol: Symbol): SymbolExpr {
  return { kind: 'symbol', symbol };
}

export function pauli(pauli: PauliString): PauliExpr {
  return { kind: 'pauli', pauli };
}

export function sum(terms: Iterable<Expr>): SumExpr {
  return { kind: 'sum', terms: [...terms] };
}

export function product(factors: Iterable<Expr>): ProductExpr {
  return { kind: 'product', factors: [...factors] };
}

/**
 * Children of a node, in stored order
 */
export function children(expr: Expr): readonly Expr[] {
  switch (expr.kind) {
    case 'sum':
      return expr.terms;
    case 'product':
      return expr.factors;
    default:
      return [];
  }
}

function listsEqual(a: readonly Expr[], b: readonly Expr[]): boolean {
  return a.length === b.length && a.every((e, i) => exprEquals(e, b[i]));
}

/**
 * Structural equality: same shape, same leaves, same order.
 * No algebraic identities are applied.
 */
export function exprEquals(a: Expr, b: Expr): boolean {
  if (a === b) {
    return true;
  }

  switch (a.kind) {
    case 'scalar':
      return b.kind === 'scalar' && numbersEqual(a.value, b.value);
    case 'symbol':
      return b.kind === 'symbol' && symbolsEqual(a.symbol, b.symbol);
    case 'pauli':
      return b.kind === 'pauli' && a.pauli.equals(b.pauli);
    case 'sum':
      return b.kind === 'sum' && listsEqual(a.terms, b.terms);
    case 'product':
      return b.kind === 'product' && listsEqual(a.factors, b.factors);
  }
}

export function formatExpr(expr: Expr): string {
  switch (expr.kind) {
    case 'scalar':
      return String(expr.value);
    case 'symbol':
      return formatSymbol(expr.symbol);
    case 'pauli':
      return `[${expr.pauli.toString()}]`;
    case 'sum':
      return expr.terms.length === 0
        ? '(+)'
        : `(${expr.terms.map(formatExpr).join(' + ')})`;
    case 'product':
      return expr.factors.length === 0
        ? '(*)'
        : `(${expr.factors.map(formatExpr).join(' * ')})`;
  }
}
