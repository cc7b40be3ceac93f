/**
 * Shows that reordered sums share a canonical form while reordered products do not
 */

import {
  PauliString,
  named,
  scalar,
  symbol,
  pauli,
  sum,
  product,
  canonicalize,
  canonicalEquals,
  canonicalKey,
  formatExpr
} from '../src/index.js';

const theta = symbol(named('theta'));
const zz = pauli(PauliString.fromText('ZZ'));
const xi = pauli(PauliString.fromText('XI'));

const h1 = sum([product([theta, zz]), scalar(0.5), xi]);
const h2 = sum([xi, sum([scalar(0.5), product([theta, zz])])]);

const c1 = canonicalize(h1);
const c2 = canonicalize(h2);

console.log(`h1:        ${formatExpr(h1)}`);
console.log(`h2:        ${formatExpr(h2)}`);
console.log(`canonical: ${formatExpr(c1.get())}`);
console.log(`equal:     ${canonicalEquals(c1, c2)}`);
console.log(`key:       ${canonicalKey(c1)}`);
console.log();

const p1 = canonicalize(product([zz, xi]));
const p2 = canonicalize(product([xi, zz]));
console.log(`${formatExpr(p1.get())} vs ${formatExpr(p2.get())}: equal = ${canonicalEquals(p1, p2)}`);
