export class InvalidOperatorError extends Error {
  constructor(
    public readonly character: string,
    public readonly position?: number
  ) {
    const positionInfo = position !== undefined ? ` at position ${position}` : '';
    super(`Invalid Pauli operator character '${character}'${positionInfo}`);
    this.name = 'InvalidOperatorError';
  }
}

export class CliUsageError extends Error {
  constructor(
    message: string,
    public readonly argument?: string
  ) {
    super(message);
    this.name = 'CliUsageError';
  }
}
