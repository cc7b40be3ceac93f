/**
 * Total order over expressions, used to sort the terms of a canonical sum.
 *
 * Nodes of different kinds are ranked by EXPR_KIND_RANK. Within a kind:
 *   scalar   numeric order (see Numeric.ts)
 *   symbol   compareSymbols
 *   pauli    qubit indices, then operators (I < X < Y < Z)
 *   sum      term by term, a prefix sorts first
 *   product  factor by factor, a prefix sorts first
 */

import { Expr, ExprKind } from './Expr.js';
import { compareNumbers } from './Numeric.js';
import { compareSymbols } from './Symbol.js';

export const EXPR_KIND_RANK: Readonly<Record<ExprKind, number>> = {
  scalar: 0,
  symbol: 1,
  pauli: 2,
  sum: 3,
  product: 4
};

function compareLists(a: readonly Expr[], b: readonly Expr[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const c = compareExpr(a[i], b[i]);
    if (c !== 0) {
      return c;
    }
  }
  return Math.sign(a.length - b.length);
}

export function compareExpr(a: Expr, b: Expr): number {
  if (a === b) {
    return 0;
  }

  const rank = EXPR_KIND_RANK[a.kind] - EXPR_KIND_RANK[b.kind];
  if (rank !== 0) {
    return Math.sign(rank);
  }

  switch (a.kind) {
    case 'scalar':
      return b.kind === 'scalar' ? compareNumbers(a.value, b.value) : 0;
    case 'symbol':
      return b.kind === 'symbol' ? compareSymbols(a.symbol, b.symbol) : 0;
    case 'pauli':
      if (b.kind !== 'pauli') return 0;
      // PauliString.compare looks at indices only; break its ties on the operators
      return a.pauli.compare(b.pauli) || a.pauli.compareOperators(b.pauli);
    case 'sum':
      return b.kind === 'sum' ? compareLists(a.terms, b.terms) : 0;
    case 'product':
      return b.kind === 'product' ? compareLists(a.factors, b.factors) : 0;
  }
}
