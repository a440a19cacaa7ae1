/**
 * Tests for CLI error explanation
 */

import { describe, expect, it } from 'vitest';
import { explainError } from '../../src/cli-explain.js';

describe('explainError', () => {
  it('renders every section of a definition', () => {
    expect(explainError('EXPR-P002')).toBe(
      [
        'EXPR-P002: Missing token',
        'Raised as ParseError (parse)',
        '',
        'Cause:',
        '  A closing parenthesis or separator is missing.',
        '',
        'Resolution:',
        '  Balance parentheses and separate statements with ;.',
        '',
        'Examples:',
        '  Unclosed parenthesis',
        '',
        '    (1 + 2',
        "    => Expected ')', got end of input. Hint: Check for unclosed parenthesis at 1:7",
      ].join('\n')
    );
  });

  it('names the error class of each category', () => {
    expect(explainError('EXPR-L001')?.split('\n')[1]).toBe(
      'Raised as LexicalError (lexer)'
    );
    expect(explainError('EXPR-N001')?.split('\n')[1]).toBe(
      'Raised as NameResolutionError (name)'
    );
    expect(explainError('EXPR-C002')?.split('\n')[1]).toBe(
      'Raised as CapabilityError (capability)'
    );
  });

  it('shows the message each example raises', () => {
    const text = explainError('EXPR-N002');
    expect(text?.split('\n').slice(-9)).toEqual([
      '  Misspelled function',
      '',
      '    cso(0)',
      '    => Unknown univariate function cso at 1:1',
      '',
      '  Unary function called with two arguments',
      '',
      '    sin(1, 2)',
      '    => Unknown bivariate function sin at 1:1',
    ]);
  });

  it('runs examples without free variables', () => {
    expect(explainError('EXPR-N001')?.split('\n').at(-1)).toBe(
      '    => Unknown variable or constant x at 1:1'
    );
  });

  it('applies session settings an example needs', () => {
    expect(explainError('EXPR-C001')?.split('\n').at(-1)).toBe(
      '    => Assignment to x not supported at 1:1'
    );
    expect(explainError('EXPR-C002')?.split('\n').at(-1)).toBe(
      '    => Complex number 2j not supported at 1:1'
    );
  });

  it('returns null for unknown ids', () => {
    expect(explainError('P001')).toBeNull();
    expect(explainError('EXPR-X001')).toBeNull();
    expect(explainError('expr-p001')).toBeNull();
    expect(explainError('EXPR-P999')).toBeNull();
  });
});
