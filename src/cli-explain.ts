/**
 * CLI Error Explanation
 * Renders a registry entry and runs its examples through the parser
 */

import {
  CapabilityError,
  ExprError,
  LexicalError,
  NameResolutionError,
  ParseError,
} from './error-classes.js';
import {
  ERROR_REGISTRY,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
} from './error-registry.js';
import { formatOutput } from './cli-shared.js';
import { parse } from './parser/index.js';
import { createSession } from './runtime/index.js';

const CATEGORY_CLASSES: Readonly<Record<ErrorCategory, string>> = {
  lexer: LexicalError.name,
  parse: ParseError.name,
  name: NameResolutionError.name,
  capability: CapabilityError.name,
};

/**
 * Outcome of an example in a session without free variables: the message
 * of the error it raises, prefixed with the id when that differs.
 */
function runExample(definition: ErrorDefinition, example: ErrorExample): string {
  const session = createSession({ allowFreeVariables: false, ...example.session });
  try {
    return formatOutput(parse(session, example.code)) ?? 'no value';
  } catch (err) {
    if (!(err instanceof ExprError)) throw err;
    return err.errorId === definition.errorId
      ? err.message
      : `[${err.errorId}] ${err.message}`;
  }
}

function section(title: string, body: string): string[] {
  return [`${title}:`, `  ${body}`, ''];
}

/**
 * Render documentation for `exprfold --explain`.
 *
 * @returns Formatted documentation, or null for an unknown id
 *
 * @example
 * explainError('EXPR-N001')
 * // 'EXPR-N001: Unknown variable or constant\nRaised as NameResolutionError ...'
 */
export function explainError(errorId: string): string | null {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) return null;

  const lines = [
    `${definition.errorId}: ${definition.description}`,
    `Raised as ${CATEGORY_CLASSES[definition.category]} (${definition.category})`,
    '',
  ];
  if (definition.cause) lines.push(...section('Cause', definition.cause));
  if (definition.resolution) {
    lines.push(...section('Resolution', definition.resolution));
  }

  const examples = definition.examples ?? [];
  if (examples.length > 0) lines.push('Examples:');
  for (const example of examples) {
    lines.push(`  ${example.description}`, '');
    lines.push(...example.code.split('\n').map((line) => `    ${line}`));
    lines.push(`    => ${runExample(definition, example)}`, '');
  }

  return lines.join('\n').trimEnd();
}
