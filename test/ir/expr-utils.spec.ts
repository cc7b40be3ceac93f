import { describe, it, expect } from 'vitest';
import { serializeExpr, exprDepth } from '../../src/ir/ExprUtils.js';
import { scalar, symbol, pauli, sum, product } from '../../src/ir/Expr.js';
import { named, bound } from '../../src/ir/Symbol.js';
import { PauliString } from '../../src/ir/Pauli.js';

const a = symbol(named('a'));
const b = symbol(named('b'));
const c = symbol(named('c'));

describe('Expression Serialization', () => {
  it('should serialize leaves', () => {
    expect(serializeExpr(scalar(42))).toBe('num(42)');
    expect(serializeExpr(a)).toBe('sym(named("a"))');
    expect(serializeExpr(symbol(bound('t', 2)))).toBe('sym(bound("t",2))');
    expect(serializeExpr(pauli(PauliString.fromText('XY')))).toBe('pauli(X0 Y1)');
  });

  it('should serialize combinators in stored order', () => {
    const e = product([scalar(-0.5), sum([b, a])]);
    expect(serializeExpr(e)).toBe('prod(num(-0.5),sum(sym(named("b")),sym(named("a"))))');
  });

  it('should serialize empty combinators', () => {
    expect(serializeExpr(sum([]))).toBe('sum()');
    expect(serializeExpr(product([]))).toBe('prod()');
  });

  it('should quote names so separators cannot collide', () => {
    expect(serializeExpr(symbol(named('a,b')))).toBe('sym(named("a,b"))');
    expect(serializeExpr(sum([symbol(named('a')), symbol(named('b'))]))).not.toBe(
      serializeExpr(sum([symbol(named('a,b'))]))
    );
  });
});

describe('exprDepth', () => {
  it('should count leaves and empty nodes as depth 1', () => {
    expect(exprDepth(a)).toBe(1);
    expect(exprDepth(sum([]))).toBe(1);
  });

  it('should handle very wide nodes', () => {
    const wide = Array.from({ length: 300000 }, (_, i) => scalar(i));
    expect(exprDepth(sum(wide))).toBe(2);
    expect(exprDepth(product([sum(wide), a]))).toBe(3);
  });

  it('should follow the deepest branch', () => {
    expect(exprDepth(sum([a, product([b, sum([c])])]))).toBe(4);
  });
});
