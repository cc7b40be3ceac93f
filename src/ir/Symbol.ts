/**
 * Symbolic parameters that appear in operator expressions.
 *
 * Symbols are not variables: they carry no evaluation semantics, and a bound
 * value is part of the symbol's identity rather than a substitution.
 */

import { compareNumbers, numbersEqual } from './Numeric.js';

export type Symbol = NamedSymbol | BoundSymbol;

/**
 * A free parameter (e.g. `theta`)
 */
export interface NamedSymbol {
  readonly kind: 'named';
  readonly name: string;
}

/**
 * A parameter that has been bound to a numeric value (e.g. `theta=0.5`)
 */
export interface BoundSymbol {
  readonly kind: 'bound';
  readonly name: string;
  readonly value: number;
}

export function named(name: string): NamedSymbol {
  return { kind: 'named', name };
}

export function bound(name: string, value: number): BoundSymbol {
  return { kind: 'bound', name, value };
}

/**
 * Name of the symbol, ignoring any bound value
 */
export function symbolName(symbol: Symbol): string {
  return symbol.name;
}

export function symbolsEqual(a: Symbol, b: Symbol): boolean {
  if (a.kind === 'named' && b.kind === 'named') {
    return a.name === b.name;
  }
  if (a.kind === 'bound' && b.kind === 'bound') {
    return a.name === b.name && numbersEqual(a.value, b.value);
  }
  return false;
}

const SYMBOL_KIND_RANK: Record<Symbol['kind'], number> = {
  named: 0,
  bound: 1
};

/**
 * Named symbols sort before bound ones; then by name, then by bound value.
 */
export function compareSymbols(a: Symbol, b: Symbol): number {
  const rank = SYMBOL_KIND_RANK[a.kind] - SYMBOL_KIND_RANK[b.kind];
  if (rank !== 0) {
    return Math.sign(rank);
  }

  if (a.name !== b.name) {
    return a.name < b.name ? -1 : 1;
  }

  if (a.kind === 'bound' && b.kind === 'bound') {
    return compareNumbers(a.value, b.value);
  }
  return 0;
}

export function formatSymbol(symbol: Symbol): string {
  switch (symbol.kind) {
    case 'named':
      return symbol.name;
    case 'bound':
      return `${symbol.name}=${symbol.value}`;
  }
}
