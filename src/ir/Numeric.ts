/**
 * Total order over IEEE doubles used wherever expression values are compared.
 *
 * Ordinary numbers compare by value (so 0 and -0 are equal), NaN sorts after
 * every number and compares equal to itself.
 */
export function compareNumbers(a: number, b: number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  if (a === b) return 0;

  const aNaN = Number.isNaN(a);
  const bNaN = Number.isNaN(b);
  if (aNaN && bNaN) return 0;
  return aNaN ? 1 : -1;
}

export function numbersEqual(a: number, b: number): boolean {
  return compareNumbers(a, b) === 0;
}
