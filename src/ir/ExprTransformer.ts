/**
 * ExprTransformer - Abstract base class for expression rewrites
 *
 * Provides the recursive descent every pass needs:
 * - leaves are returned unchanged, by reference
 * - sums and products are rebuilt from their transformed children
 *
 * Usage:
 *   class MyPass extends ExprTransformer {
 *     protected visitSum(node: SumExpr): Expr {
 *       const rebuilt = super.visitSum(node);
 *       // Custom logic here
 *       return rebuilt;
 *     }
 *   }
 */

import {
  Expr,
  ScalarExpr,
  SymbolExpr,
  PauliExpr,
  SumExpr,
  ProductExpr,
  sum,
  product
} from './Expr.js';

export abstract class ExprTransformer {
  /**
   * Main entry point; dispatches on node kind
   */
  transform(expr: Expr): Expr {
    switch (expr.kind) {
      case 'scalar':
        return this.visitScalar(expr);
      case 'symbol':
        return this.visitSymbol(expr);
      case 'pauli':
        return this.visitPauli(expr);
      case 'sum':
        return this.visitSum(expr);
      case 'product':
        return this.visitProduct(expr);
    }
  }

  protected visitScalar(node: ScalarExpr): Expr {
    return node;
  }

  protected visitSymbol(node: SymbolExpr): Expr {
    return node;
  }

  protected visitPauli(node: PauliExpr): Expr {
    return node;
  }

  protected visitSum(node: SumExpr): Expr {
    return sum(node.terms.map(term => this.transform(term)));
  }

  protected visitProduct(node: ProductExpr): Expr {
    return product(node.factors.map(factor => this.transform(factor)));
  }
}
