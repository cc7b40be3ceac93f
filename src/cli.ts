#!/usr/bin/env node

import { parseCliArgs, renderOutput } from './CliOptions.js';
import type { CliOptions } from './CliOptions.js';
import { CliUsageError } from './ir/Errors.js';

function printUsage() {
  console.log(`
qop-canon - Canonical form of quantum-operator expressions

Usage:
  qop-canon [options] <term>...

Options:
  --sum                 Combine the terms into a sum (default)
  --product             Combine the terms into a product, in the order given
  --key                 Print the structural key instead of the expression
  --help, -h            Show this help message

Terms:
  1.5, -2e3             scalar
  XIZ                   Pauli string; character position is the qubit index
  theta=0.25            symbol bound to a value
  theta                 named symbol

Examples:
  qop-canon theta XZI 0.5
  qop-canon --product XI IZ
  qop-canon --key ZZ theta=1
  `.trim());
}

function main() {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printUsage();
    process.exit(0);
  }

  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}`);
      printUsage();
      process.exit(1);
    }
    throw err;
  }

  if (options.help) {
    printUsage();
    process.exit(0);
  }

  try {
    console.log(renderOutput(options));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    console.error('Error: Failed to canonicalize expression');
    if (err instanceof Error) {
      console.error(err.message);
      if (err.stack) {
        console.error('\nStack trace:');
        console.error(err.stack);
      }
    }
    process.exit(1);
  }
}

main();
