/**
 * Canonicalization of structurally equivalent expressions.
 *
 * Every tree that differs from another only in the order of sum terms or in
 * how sums and products are nested maps to the same output. Algebraically
 * equivalent trees (distributivity, like terms, scalar arithmetic) generally
 * do not.
 */

import { Expr, SumExpr, exprEquals, sum } from './Expr.js';
import { FlattenTransformer } from './Flatten.js';
import { compareExpr } from './Ordering.js';
import { serializeExpr } from './ExprUtils.js';

const issued: unique symbol = Symbol('Canonicalized');

/**
 * Marks a value as the output of `canonicalize`. Functions that need a
 * canonical argument take this type instead of re-checking at runtime.
 */
export class Canonicalized<T> {
  private readonly inner: T;

  /** @internal */
  constructor(token: typeof issued, inner: T) {
    if (token !== issued) {
      throw new Error('Canonicalized values are created by canonicalize()');
    }
    this.inner = inner;
  }

  get(): T {
    return this.inner;
  }
}

/**
 * Flattens, then sorts the terms of every sum. Products keep their factor order.
 */
export class CanonicalTransformer extends FlattenTransformer {
  protected visitSum(node: SumExpr): Expr {
    const flat = super.visitSum(node);
    if (flat.kind !== 'sum') {
      return flat;
    }
    return sum([...flat.terms].sort(compareExpr));
  }
}

const canonicalizer = new CanonicalTransformer();

export function canonicalize(expr: Expr): Canonicalized<Expr> {
  return new Canonicalized(issued, canonicalizer.transform(expr));
}

/**
 * True when canonicalizing `expr` would return an equal tree
 */
export function isCanonical(expr: Expr): boolean {
  return exprEquals(canonicalizer.transform(expr), expr);
}

export function canonicalEquals(a: Canonicalized<Expr>, b: Canonicalized<Expr>): boolean {
  return exprEquals(a.get(), b.get());
}

/**
 * Hash key for deduplicating canonical expressions; equal keys mean equal trees
 */
export function canonicalKey(c: Canonicalized<Expr>): string {
  return serializeExpr(c.get());
}
