/**
 * Pauli operators and Pauli strings.
 *
 * These are the atomic operators Hamiltonians and observables are built from.
 * A PauliString is always stored normalized: identities dropped and entries
 * in ascending qubit order.
 */

import { InvalidOperatorError } from './Errors.js';
import { compareNumbers, numbersEqual } from './Numeric.js';

export type PauliOperator = 'I' | 'X' | 'Y' | 'Z';

export type PauliTerm = readonly [index: number, op: PauliOperator];

const OPERATOR_RANK: Record<PauliOperator, number> = {
  I: 0,
  X: 1,
  Y: 2,
  Z: 3
};

export function isPauliOperator(ch: string): ch is PauliOperator {
  return ch === 'I' || ch === 'X' || ch === 'Y' || ch === 'Z';
}

/**
 * Parse a single-character operator symbol
 */
export function parsePauliOperator(ch: string, position?: number): PauliOperator {
  if (!isPauliOperator(ch)) {
    throw new InvalidOperatorError(ch, position);
  }
  return ch;
}

export function comparePauliOperators(a: PauliOperator, b: PauliOperator): number {
  return Math.sign(OPERATOR_RANK[a] - OPERATOR_RANK[b]);
}

export type PauliParseResult =
  | { ok: true; value: PauliString }
  | { ok: false; error: InvalidOperatorError };

/**
 * A tensor product of Pauli operators acting on specific qubits.
 *
 * Invariants:
 * - entries are in ascending index order
 * - identity operators are omitted
 *
 * Duplicate indices are accepted as given; use `duplicateIndices()` to find them.
 * Qubit indices are expected to be non-negative integers. Other numbers are
 * stored as given and ordered by the total order in Numeric.ts (NaN last).
 */
export class PauliString {
  private constructor(private readonly terms: readonly PauliTerm[]) {}

  /**
   * Build a normalized string from unordered (index, operator) pairs.
   * Entries with equal indices keep their relative input order.
   */
  static create(pairs: Iterable<PauliTerm>): PauliString {
    const terms = [...pairs]
      .filter(([, op]) => op !== 'I')
      .map(([index, op]): PauliTerm => [index, op])
      .sort((a, b) => compareNumbers(a[0], b[0]));
    return new PauliString(terms);
  }

  static identity(): PauliString {
    return new PauliString([]);
  }

  /**
   * Parse a dense operator string where character position is the qubit index,
   * e.g. "XIZ" acts with X on qubit 0 and Z on qubit 2.
   *
   * @throws InvalidOperatorError on any character outside I, X, Y, Z
   */
  static fromText(text: string): PauliString {
    const pairs: PauliTerm[] = [];
    let index = 0;
    for (const ch of text) {
      pairs.push([index, parsePauliOperator(ch, index)]);
      index++;
    }
    return PauliString.create(pairs);
  }

  static tryFromText(text: string): PauliParseResult {
    try {
      return { ok: true, value: PauliString.fromText(text) };
    } catch (err) {
      if (err instanceof InvalidOperatorError) {
        return { ok: false, error: err };
      }
      throw err;
    }
  }

  get ops(): readonly PauliTerm[] {
    return this.terms;
  }

  get length(): number {
    return this.terms.length;
  }

  indices(): number[] {
    return this.terms.map(([index]) => index);
  }

  isIdentity(): boolean {
    return this.terms.length === 0;
  }

  /**
   * Indices that appear more than once, ascending
   */
  duplicateIndices(): number[] {
    const duplicates: number[] = [];
    for (let i = 1; i < this.terms.length; i++) {
      const index = this.terms[i][0];
      const repeated = numbersEqual(index, this.terms[i - 1][0]);
      if (repeated && (duplicates.length === 0 || !numbersEqual(duplicates[duplicates.length - 1], index))) {
        duplicates.push(index);
      }
    }
    return duplicates;
  }

  equals(other: PauliString): boolean {
    if (this.terms.length !== other.terms.length) {
      return false;
    }
    return this.terms.every(
      ([index, op], i) => numbersEqual(index, other.terms[i][0]) && op === other.terms[i][1]
    );
  }

  /**
   * Orders by the sequence of qubit indices only; operators are ignored.
   * So X0 and Z0 compare as 0 here while `equals` tells them apart.
   */
  compare(other: PauliString): number {
    const n = Math.min(this.terms.length, other.terms.length);
    for (let i = 0; i < n; i++) {
      const c = compareNumbers(this.terms[i][0], other.terms[i][0]);
      if (c !== 0) {
        return c;
      }
    }
    return Math.sign(this.terms.length - other.terms.length);
  }

  /**
   * Operator-by-operator comparison, for use once `compare` has tied
   */
  compareOperators(other: PauliString): number {
    const n = Math.min(this.terms.length, other.terms.length);
    for (let i = 0; i < n; i++) {
      const c = comparePauliOperators(this.terms[i][1], other.terms[i][1]);
      if (c !== 0) {
        return c;
      }
    }
    return Math.sign(this.terms.length - other.terms.length);
  }

  toString(): string {
    if (this.terms.length === 0) {
      return 'I';
    }
    return this.terms.map(([index, op]) => `${op}${index}`).join(' ');
  }
}
