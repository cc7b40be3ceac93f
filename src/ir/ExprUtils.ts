/**
 * Shared helpers over expression trees
 */

import { Expr } from './Expr.js';
import { Symbol } from './Symbol.js';

function serializeSymbol(symbol: Symbol): string {
  switch (symbol.kind) {
    case 'named':
      return `named(${JSON.stringify(symbol.name)})`;
    case 'bound':
      return `bound(${JSON.stringify(symbol.name)},${symbol.value})`;
  }
}

/**
 * Serializes an expression to a structural string.
 * Child order is kept as stored, so two trees get the same string exactly
 * when they are structurally equal.
 */
export function serializeExpr(expr: Expr): string {
  switch (expr.kind) {
    case 'scalar':
      return `num(${expr.value})`;

    case 'symbol':
      return `sym(${serializeSymbol(expr.symbol)})`;

    case 'pauli':
      return `pauli(${expr.pauli.toString()})`;

    case 'sum':
      return `sum(${expr.terms.map(serializeExpr).join(',')})`;

    case 'product':
      return `prod(${expr.factors.map(serializeExpr).join(',')})`;
  }
}

/**
 * Maximum nesting depth; leaves have depth 1
 */
export function exprDepth(expr: Expr): number {
  switch (expr.kind) {
    case 'scalar':
    case 'symbol':
    case 'pauli':
      return 1;

    case 'sum':
    case 'product': {
      const items = expr.kind === 'sum' ? expr.terms : expr.factors;
      if (items.length === 0) {
        return 1;
      }
      return 1 + items.reduce((deepest, item) => Math.max(deepest, exprDepth(item)), 0);
    }
  }
}
