#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { transpileFile } from './transpile.js';
import { loadConfig, mergeOptions } from './config.js';
import { loadClassDescriptions, constructibleNames, generatePythonStub } from './header-stubs.js';
import { MalformedInputError, CollaboratorError, ConfigError } from './errors.js';
import type { TranspileOptions } from './context.js';
import { c } from './colors.js';

function showUsage(): void {
  console.error('Usage: py2ino <input.py> [options]');
  console.error('       py2ino stub <classes.json> [-o <file.py>]');
  console.error('');
  console.error('Options:');
  console.error('  -o, --output <file>       Write the sketch here instead of beside the input');
  console.error('  -a, --auto-loop           Call every other function from a synthesized loop()');
  console.error('  -i, --infer-construction  Treat any `x = Name(...)` as object construction');
  console.error('  -c, --classes <file>      Class description JSON; its classes are constructible');
  console.error('      --no-comments         Drop source comments');
  console.error('  -v, --verbose             Show the syntax tree');
  console.error('  -h, --help                Show this help message');
}

function fail(message: string): never {
  console.error(c.error(`Error: ${message}`));
  showUsage();
  process.exit(1);
}

interface CliArgs {
  command: 'transpile' | 'stub';
  inputFile: string | null;
  outputFile: string | null;
  classesFile: string | null;
  verbose: boolean;
  overrides: Partial<TranspileOptions>;
}

function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    command: 'transpile',
    inputFile: null,
    outputFile: null,
    classesFile: null,
    verbose: false,
    overrides: {}
  };

  let i = 0;
  if (args[0] === 'stub') {
    parsed.command = 'stub';
    i = 1;
  }

  const value = (flag: string): string => {
    const next = args[++i];
    if (next === undefined || next.startsWith('-')) {
      fail(`${flag} needs a value`);
    }
    return next;
  };

  for (; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--output' || arg === '-o') {
      parsed.outputFile = value(arg);
    } else if (arg === '--auto-loop' || arg === '-a') {
      parsed.overrides.autoLoop = true;
    } else if (arg === '--infer-construction' || arg === '-i') {
      parsed.overrides.inferConstruction = true;
    } else if (arg === '--classes' || arg === '-c') {
      parsed.classesFile = value(arg);
    } else if (arg === '--no-comments') {
      parsed.overrides.comments = false;
    } else if (arg === '--verbose' || arg === '-v') {
      parsed.verbose = true;
    } else if (arg === '--help' || arg === '-h') {
      showUsage();
      process.exit(0);
    } else if (!arg.startsWith('-')) {
      parsed.inputFile = arg;
    } else {
      fail(`Unknown option: ${arg}`);
    }
  }

  return parsed;
}

function printSnippet(source: string, file: string, line: number, column: number | undefined): void {
  console.error(`Location: ${file}:${line}${column !== undefined ? `:${column}` : ''}`);
  console.error('');
  const lines = source.split('\n');
  if (line >= 1 && line <= lines.length) {
    const lineNumStr = String(line);
    const gutter = ' '.repeat(lineNumStr.length);
    console.error(`${lineNumStr} | ${lines[line - 1]}`);
    if (column !== undefined) {
      console.error(`${gutter} | ${' '.repeat(column)}^`);
    }
    console.error('');
  }
}

function runStub(args: CliArgs): void {
  if (!args.inputFile) {
    fail('No class description specified');
  }
  const classes = loadClassDescriptions(args.inputFile);
  const stub = generatePythonStub(classes);
  const outFile = args.outputFile ?? `${path.parse(args.inputFile).name}.py`;
  fs.writeFileSync(outFile, stub);
  console.error(c.success(`Python stub written to ${outFile}`));
}

function runTranspile(args: CliArgs): void {
  if (!args.inputFile) {
    fail('No input file specified');
  }

  const config = loadConfig();
  const classesFile = args.classesFile ?? config.classes;
  const overrides: Partial<TranspileOptions> = { ...args.overrides };
  if (classesFile) {
    overrides.constructibleTypes = constructibleNames(loadClassDescriptions(classesFile));
  }

  const result = transpileFile(args.inputFile, {
    ...mergeOptions(config, overrides),
    outFile: args.outputFile ?? undefined
  });

  if (args.verbose) {
    console.error(c.bold('=== Syntax tree ==='));
    console.error(JSON.stringify(result.tree, (_key, value: unknown) =>
      typeof value === 'bigint' ? value.toString() : value, 2));
    console.error('');
  }

  for (const diagnostic of result.diagnostics) {
    console.error(c.warn(`warning: ${diagnostic.message}`));
  }

  const headers = result.unit.includes.length > 0 ? result.unit.includes.join(', ') : 'none';
  console.error(c.success(`Transpiled ${args.inputFile} → ${result.outFile}`));
  console.error(c.info(`Headers: ${headers}`));
}

function main(): void {
  const args = parseArgs(process.argv.slice(2));

  try {
    if (args.command === 'stub') {
      runStub(args);
    } else {
      runTranspile(args);
    }
  } catch (error: unknown) {
    console.error('');
    if (error instanceof MalformedInputError || error instanceof CollaboratorError || error instanceof ConfigError) {
      console.error(c.error(`Error: ${error.message}`));
      console.error('');
      console.error(`Error Code: ${error.code}`);
      if (error instanceof MalformedInputError && error.line !== undefined && args.inputFile) {
        printSnippet(fs.readFileSync(args.inputFile, 'utf8'), args.inputFile, error.line, error.column);
      }
      if (error instanceof CollaboratorError && error.diagnostics) {
        console.error(c.gray(error.diagnostics));
      }
    } else if (error instanceof Error) {
      console.error(c.error(`Error: ${error.message}`));
      if (args.verbose && error.stack) {
        console.error('Stack trace:');
        console.error(error.stack);
      }
    } else {
      console.error(c.error(`Error: ${String(error)}`));
    }
    console.error('');
    process.exit(1);
  }
}

main();
