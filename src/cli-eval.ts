#!/usr/bin/env node
/**
 * exprfold CLI - Evaluate expressions
 *
 * Usage:
 *   exprfold '1 - cos(pi/3)'
 *   exprfold --unknown 'x*y + 1'
 *   echo 'x = 2; x^10' | exprfold -
 *   exprfold --explain EXPR-N001
 */

import * as fs from 'fs';
import { loadConfig } from './cli-config.js';
import { explainError } from './cli-explain.js';
import {
  buildSessionOptions,
  evaluateProgram,
  formatError,
  parseArgs,
} from './cli-shared.js';

/**
 * Display help information
 */
function showHelp(): void {
  console.log(`exprfold - real and complex expression evaluator

Usage:
  exprfold [options] <expression>   Evaluate a program
  exprfold [options] -              Read the program from stdin
  exprfold --explain <id>           Describe an error id
  exprfold --help                   Show this help message
  exprfold --version                Show version information

Options:
  --complex          Evaluate over complex numbers
  --unknown          Keep unknown names as free variables
  --no-vars          Disallow assignment
  --canonical        Print the fully bracketed form
  --config <file>    Read settings from a YAML file (default: .exprfold.yaml)

Examples:
  exprfold '2**10'
  exprfold --complex 'sqrt(-4)'
  exprfold --unknown 'a = 2; a*x + 1'`);
}

/**
 * Display version information
 */
function showVersion(): void {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson: unknown = JSON.parse(
    fs.readFileSync(packageJsonPath, 'utf-8')
  );
  const version =
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
      ? packageJson.version
      : 'unknown';
  console.log(`exprfold ${version}`);
}

/**
 * Entry point for exprfold binary
 */
function main(): void {
  try {
    const command = parseArgs(process.argv.slice(2));

    if (command.mode === 'help') {
      showHelp();
      return;
    }

    if (command.mode === 'version') {
      showVersion();
      return;
    }

    if (command.mode === 'explain') {
      const text = explainError(command.errorId);
      if (text === null) {
        console.error(`Unknown error id: ${command.errorId}`);
        process.exit(1);
      }
      console.log(text);
      return;
    }

    const config = loadConfig(process.cwd(), command.flags.configPath);
    const options = buildSessionOptions(command.flags, config);
    const source = command.source ?? fs.readFileSync(0, 'utf-8');

    const output = evaluateProgram(source, options, command.flags.canonical);
    if (output !== null) {
      console.log(output);
    }
  } catch (err) {
    console.error(formatError(err instanceof Error ? err : new Error(String(err))));
    process.exit(1);
  }
}

main();
