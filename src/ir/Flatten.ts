/**
 * Associativity unrolling: sum(a, sum(b, c)) becomes sum(a, b, c), and likewise
 * for products. Nothing is merged, reordered or simplified.
 */

import { Expr, ExprKind, SumExpr, ProductExpr, children, sum, product } from './Expr.js';
import { ExprTransformer } from './ExprTransformer.js';

export class FlattenTransformer extends ExprTransformer {
  protected visitSum(node: SumExpr): Expr {
    return sum(this.spliceChildren(node.terms, 'sum'));
  }

  protected visitProduct(node: ProductExpr): Expr {
    return product(this.spliceChildren(node.factors, 'product'));
  }

  /**
   * Transform each child; children that come back as the same kind of node
   * contribute their own children in place.
   */
  private spliceChildren(items: readonly Expr[], kind: 'sum' | 'product'): Expr[] {
    const out: Expr[] = [];
    for (const item of items) {
      const transformed = this.transform(item);
      if (transformed.kind === kind) {
        for (const child of children(transformed)) {
          out.push(child);
        }
      } else {
        out.push(transformed);
      }
    }
    return out;
  }
}

const flattener = new FlattenTransformer();

export function flatten(expr: Expr): Expr {
  return flattener.transform(expr);
}

/**
 * True when no sum directly contains a sum and no product directly contains a product
 */
export function isFlat(expr: Expr): boolean {
  const flatUnder = (items: readonly Expr[], kind: ExprKind): boolean =>
    items.every(item => item.kind !== kind && isFlat(item));

  switch (expr.kind) {
    case 'sum':
      return flatUnder(expr.terms, 'sum');
    case 'product':
      return flatUnder(expr.factors, 'product');
    default:
      return true;
  }
}
