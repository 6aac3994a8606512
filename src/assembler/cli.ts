#!/usr/bin/env node
/**
 * Hack Assembly Parser CLI
 *
 * Usage: hack-parse <input.asm> [--json]
 */

import { readFileSync } from 'fs';
import { pathToFileURL } from 'url';
import { resolveLabelAddresses } from './labels.js';
import { tryParse } from './parser.js';
import { formatInstruction } from './printer.js';

interface CliOptions {
  inputFile: string;
  json: boolean;
}

// `help` is set only when usage was asked for, not when the arguments were bad
type ParsedArgs = { ok: true; options: CliOptions } | { ok: false; help: boolean };

function parseArgs(args: string[]): ParsedArgs {
  const cliArgs = args.slice(2); // Skip node and script path

  if (cliArgs.length === 0) {
    return { ok: false, help: false };
  }

  let inputFile = '';
  let json = false;

  for (const arg of cliArgs) {
    if (arg === '--json') {
      json = true;
    } else if (arg === '-h' || arg === '--help') {
      return { ok: false, help: true };
    } else if (!arg.startsWith('-')) {
      inputFile = arg;
    } else {
      console.error(`Error: Unknown option '${arg}'`);
      return { ok: false, help: false };
    }
  }

  if (!inputFile) {
    console.error('Error: No input file specified');
    return { ok: false, help: false };
  }

  return { ok: true, options: { inputFile, json } };
}

function printUsage(): void {
  console.log(`Hack Assembly Parser

Usage: hack-parse <input.asm> [--json]

Options:
  --json       Print the parsed program as JSON
  -h, --help   Show this help message

Examples:
  hack-parse Max.asm
  hack-parse Max.asm --json`);
}

export function main(args: string[] = process.argv): number {
  const parsed = parseArgs(args);

  if (!parsed.ok) {
    printUsage();
    return parsed.help ? 0 : 1;
  }

  const { options } = parsed;

  // Read input file
  let source: string;
  try {
    source = readFileSync(options.inputFile, 'utf-8');
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      console.error(`Error: File not found: ${options.inputFile}`);
    } else {
      console.error(`Error: Cannot read file: ${options.inputFile}`);
    }
    return 1;
  }

  const result = tryParse(source);

  if (!result.ok) {
    const { error } = result;
    console.error(`${options.inputFile}:${error.line}:${error.column}: ${error.message}`);
    return 1;
  }

  if (options.json) {
    console.log(JSON.stringify(result.program, null, 2));
    return 0;
  }

  for (const node of result.program.instructions) {
    console.log(formatInstruction(node));
  }

  const labels = resolveLabelAddresses(result.program);
  if (labels.addresses.size > 0) {
    console.log('\nLabels:');
    for (const [name, address] of labels.addresses) {
      console.log(`${name} ${address}`);
    }
  }

  // Duplicates are only warned about; the first declaration keeps its address
  for (const label of labels.duplicates) {
    console.error(`${options.inputFile}:${label.line}:${label.column}: duplicate label ${label.name}`);
  }

  return 0;
}

// Run if executed directly
if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exit(main());
}
