/**
 * Command-line option parsing and term handling for qop-canon
 */

import { CliUsageError } from './ir/Errors.js';
import { Expr, formatExpr, scalar, symbol, pauli, sum, product } from './ir/Expr.js';
import { PauliString } from './ir/Pauli.js';
import { named, bound } from './ir/Symbol.js';
import { canonicalize, canonicalKey } from './ir/Canonical.js';

export interface CliOptions {
  combine: 'sum' | 'product';
  printKey: boolean;
  help: boolean;
  terms: string[];
}

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const PAULI_PATTERN = /^[A-Z]+$/;

export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    combine: 'sum',
    printKey: false,
    help: false,
    terms: []
  };

  for (const arg of args) {
    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--product') {
      options.combine = 'product';
    } else if (arg === '--sum') {
      options.combine = 'sum';
    } else if (arg === '--key') {
      options.printKey = true;
    } else if (arg.startsWith('--')) {
      throw new CliUsageError(`Unknown option "${arg}"`, arg);
    } else {
      options.terms.push(arg);
    }
  }

  if (!options.help && options.terms.length === 0) {
    throw new CliUsageError('No terms given');
  }

  return options;
}

/**
 * Interpret one command-line term:
 *   1.5, -2e3     scalar
 *   XIZ           Pauli string (any all-uppercase token)
 *   theta=0.25    bound symbol
 *   theta         named symbol
 */
export function parseTerm(token: string): Expr {
  if (NUMBER_PATTERN.test(token)) {
    return scalar(Number(token));
  }

  if (PAULI_PATTERN.test(token)) {
    const parsed = PauliString.tryFromText(token);
    if (!parsed.ok) {
      throw new CliUsageError(`${parsed.error.message} in term "${token}"`, token);
    }
    return pauli(parsed.value);
  }

  const eq = token.indexOf('=');
  if (eq >= 0) {
    const name = token.slice(0, eq);
    const valueText = token.slice(eq + 1);
    if (!IDENTIFIER_PATTERN.test(name)) {
      throw new CliUsageError(`Invalid symbol name "${name}"`, token);
    }
    if (!NUMBER_PATTERN.test(valueText)) {
      throw new CliUsageError(`Invalid value "${valueText}" for symbol "${name}"`, token);
    }
    if (!Number.isFinite(Number(valueText))) {
      throw new CliUsageError(`Value "${valueText}" for symbol "${name}" is not finite`, token);
    }
    return symbol(bound(name, Number(valueText)));
  }

  if (IDENTIFIER_PATTERN.test(token)) {
    return symbol(named(token));
  }

  throw new CliUsageError(`Invalid term "${token}"`, token);
}

export function buildExpression(options: CliOptions): Expr {
  const terms = options.terms.map(parseTerm);
  return options.combine === 'product' ? product(terms) : sum(terms);
}

/**
 * Text printed for a parsed command line
 */
export function renderOutput(options: CliOptions): string {
  const canonical = canonicalize(buildExpression(options));
  return options.printKey ? canonicalKey(canonical) : formatExpr(canonical.get());
}
