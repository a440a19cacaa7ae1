/**
 * End-to-end scenarios
 * Parse, partially evaluate and format through the public API
 */

import { describe, expect, it } from 'vitest';
import {
  CapabilityError,
  createSession,
  evaluate,
  freeVariables,
  isExpression,
  parse,
} from '../src/index.js';

describe('scenarios', () => {
  it('simplifies a mixed expression step by step', () => {
    const session = createSession();
    const tree = parse(session, '1 - cos(pi/3) + x*y');
    if (tree === undefined) throw new Error('empty program');

    expect([...freeVariables(tree)].sort()).toEqual(['x', 'y']);
    const partial = evaluate(tree, { x: 1 });
    expect(isExpression(partial)).toBe(true);
    expect([...freeVariables(partial)]).toEqual(['y']);
    expect(evaluate(tree, { x: 1, y: 2 })).toBe(2.5);
  });

  it('keeps assignments across programs', () => {
    const session = createSession();
    expect(parse(session, 'x = 3')).toBe(3);
    expect(parse(session, 'x+1')).toBe(4);
  });

  it('rejects assignment when disabled', () => {
    const session = createSession({ allowAssignment: false });
    expect(() => parse(session, 'x = 3')).toThrow(CapabilityError);
    expect(session.variables.size).toBe(0);
  });

  it('reads ** as exponentiation', () => {
    expect(parse(createSession(), '2**3')).toBe(8);
  });

  it('divides by zero without an error', () => {
    expect(parse(createSession(), '1/0')).toBe(Infinity);
  });

  it('rejects imaginary literals in real mode', () => {
    expect(() => parse(createSession(), '2j')).toThrow(CapabilityError);
  });
});
