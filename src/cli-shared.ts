/**
 * CLI Shared Utilities
 * Argument parsing, session setup and output formatting for the CLI
 */

import type { CliConfig } from './cli-config.js';
import { ExprError } from './error-classes.js';
import {
  createSession,
  toCanonical,
  toReadable,
  type Operand,
  type SessionOptions,
} from './runtime/index.js';
import { parse } from './parser/index.js';

// ============================================================
// ARGUMENTS
// ============================================================

/** Flags that shape the session and output of an evaluation */
export interface EvalFlags {
  complex: boolean;
  /** Allow free variables */
  unknown: boolean;
  /** Disable assignment */
  noVars: boolean;
  canonical: boolean;
  configPath?: string | undefined;
}

export type CliCommand =
  | { mode: 'help' }
  | { mode: 'version' }
  | { mode: 'explain'; errorId: string }
  | {
      mode: 'eval';
      /** Program text, or null to read it from stdin */
      source: string | null;
      flags: EvalFlags;
    };

const BOOLEAN_FLAGS: Readonly<Record<string, keyof Omit<EvalFlags, 'configPath'>>> = {
  '--complex': 'complex',
  '--unknown': 'unknown',
  '--no-vars': 'noVars',
  '--canonical': 'canonical',
};

/**
 * Parse command-line arguments into structured command
 *
 * @throws Error on unknown options, missing option values or extra arguments
 */
export function parseArgs(argv: string[]): CliCommand {
  // Check for --help and --version in any position
  if (argv.includes('--help')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version')) {
    return { mode: 'version' };
  }

  const flags: EvalFlags = {
    complex: false,
    unknown: false,
    noVars: false,
    canonical: false,
  };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--explain' || arg === '--config') {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error(`Option ${arg} requires a value`);
      }
      i++;
      if (arg === '--explain') {
        return { mode: 'explain', errorId: value };
      }
      flags.configPath = value;
      continue;
    }

    const flag = BOOLEAN_FLAGS[arg];
    if (flag !== undefined) {
      flags[flag] = true;
      continue;
    }

    if (arg.startsWith('-') && arg !== '-') {
      throw new Error(`Unknown option: ${arg}`);
    }

    positional.push(arg);
  }

  // If no expression, default to help
  const [expression, ...extra] = positional;
  if (expression === undefined) {
    return { mode: 'help' };
  }
  if (extra.length > 0) {
    throw new Error(`Unexpected argument: ${extra[0]}`);
  }

  return {
    mode: 'eval',
    source: expression === '-' ? null : expression,
    flags,
  };
}

// ============================================================
// SESSION SETUP
// ============================================================

/**
 * Merge configuration file settings and flags into session options.
 *
 * The CLI rejects unknown names unless --unknown is given or the
 * configuration enables free variables. Flags only ever switch a
 * capability on (or assignment off), they never undo the file.
 */
export function buildSessionOptions(
  flags: EvalFlags,
  config: CliConfig | null
): SessionOptions {
  const options: SessionOptions = {
    domain: config?.domain ?? 'real',
    allowAssignment: config?.allowAssignment ?? true,
    allowFreeVariables: config?.allowFreeVariables ?? false,
    variables: config?.variables,
    constants: config?.constants,
  };

  if (flags.complex) options.domain = 'complex';
  if (flags.unknown) options.allowFreeVariables = true;
  if (flags.noVars) options.allowAssignment = false;

  return options;
}

// ============================================================
// OUTPUT
// ============================================================

/**
 * Convert a program result to its printed form.
 * Returns null for an empty program, which prints nothing.
 */
export function formatOutput(
  value: Operand | undefined,
  canonical = false
): string | null {
  if (value === undefined) return null;
  return canonical ? toCanonical(value) : toReadable(value);
}

/**
 * Evaluate a program in a fresh session and format its result.
 */
export function evaluateProgram(
  source: string,
  options: SessionOptions,
  canonical = false
): string | null {
  const session = createSession(options);
  return formatOutput(parse(session, source), canonical);
}

/**
 * Format error for stderr output
 */
export function formatError(err: Error): string {
  if (err instanceof ExprError) {
    return `[${err.errorId}] ${err.message}`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}
