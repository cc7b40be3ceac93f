import { describe, it, expect } from 'vitest';
import { ExprTransformer } from '../../src/ir/ExprTransformer.js';
import { Expr, SymbolExpr, symbol, scalar, pauli, sum, product } from '../../src/ir/Expr.js';
import { named, bound } from '../../src/ir/Symbol.js';
import { PauliString } from '../../src/ir/Pauli.js';

/**
 * Binds named symbols to values from a table
 */
class BindSymbols extends ExprTransformer {
  constructor(private readonly values: Map<string, number>) {
    super();
  }

  protected visitSymbol(node: SymbolExpr): Expr {
    const value = this.values.get(node.symbol.name);
    if (node.symbol.kind === 'bound' || value === undefined) {
      return node;
    }
    return symbol(bound(node.symbol.name, value));
  }
}

describe('ExprTransformer', () => {
  const theta = symbol(named('theta'));
  const phi = symbol(named('phi'));
  const x0 = pauli(PauliString.fromText('X'));
  const two = scalar(2);

  it('should rebuild combinators from transformed children', () => {
    const pass = new BindSymbols(new Map([['theta', 0.5]]));
    const out = pass.transform(product([sum([theta, two]), x0, phi]));
    expect(out).toEqual(
      product([sum([symbol(bound('theta', 0.5)), two]), x0, phi])
    );
  });

  it('should leave untouched leaves shared', () => {
    const pass = new BindSymbols(new Map());
    const out = pass.transform(sum([theta, x0, two]));
    expect(out.kind).toBe('sum');
    if (out.kind === 'sum') {
      expect(out.terms[0]).toBe(theta);
      expect(out.terms[1]).toBe(x0);
      expect(out.terms[2]).toBe(two);
    }
  });
});
