/**
 * Runtime Tests: Complex Numbers
 * Complex arithmetic and complex-mode sessions
 */

import { describe, expect, it } from 'vitest';
import {
  CapabilityError,
  Complex,
  createSession,
  formatReal,
  isExpression,
  parse,
  toReadable,
  type Operand,
} from '../../src/index.js';
import { run } from '../helpers/session.js';

function complexResult(source: string): Complex {
  const value = run(source, { domain: 'complex' });
  if (!(value instanceof Complex)) {
    throw new Error(`Expected a complex result for ${source}`);
  }
  return value;
}

function expectClose(actual: Complex, re: number, im: number): void {
  expect(actual.re).toBeCloseTo(re, 12);
  expect(actual.im).toBeCloseTo(im, 12);
}

describe('Complex', () => {
  describe('arithmetic', () => {
    it('adds, subtracts and multiplies', () => {
      const z = new Complex(1, 2);
      const w = new Complex(3, -1);
      expect(z.add(w)).toEqual(new Complex(4, 1));
      expect(z.sub(w)).toEqual(new Complex(-2, 3));
      expect(z.mul(w)).toEqual(new Complex(5, 5));
    });

    it('divides', () => {
      expect(new Complex(5, 5).div(new Complex(3, -1))).toEqual(
        new Complex(1, 2)
      );
    });

    it('divides by zero without throwing', () => {
      expect(Complex.ONE.div(Complex.ZERO)).toEqual(new Complex(Infinity, 0));
      expect(new Complex(-1, 1).div(Complex.ZERO)).toEqual(
        new Complex(-Infinity, Infinity)
      );
      const q = Complex.ZERO.div(Complex.ZERO);
      expect(q.re).toBeNaN();
      expect(q.im).toBeNaN();
    });

    it('raises to integer powers exactly', () => {
      expect(Complex.I.pow(new Complex(2))).toEqual(new Complex(-1, 0));
      expect(new Complex(1, 1).pow(new Complex(-2))).toEqual(
        new Complex(0, -0.5)
      );
    });

    it('raises to fractional and complex powers', () => {
      // i^i = e^(-pi/2)
      expectClose(Complex.I.pow(Complex.I), Math.exp(-Math.PI / 2), 0);
      expectClose(new Complex(-1).pow(new Complex(0.5)), 0, 1);
    });

    it('handles zero bases and exponents', () => {
      expect(Complex.ZERO.pow(Complex.ZERO)).toEqual(Complex.ONE);
      expect(Complex.ZERO.pow(new Complex(2))).toEqual(Complex.ZERO);
      expect(Complex.ZERO.pow(new Complex(-1)).re).toBe(Infinity);
    });

    it('computes modulus and argument', () => {
      const z = new Complex(3, 4);
      expect(z.abs()).toBe(5);
      expect(z.arg()).toBe(Math.atan2(4, 3));
    });

    it('takes principal square roots', () => {
      expect(new Complex(-4).sqrt()).toEqual(new Complex(0, 2));
      expect(new Complex(0, -2).sqrt()).toEqual(new Complex(1, -1));
      expect(Complex.ZERO.sqrt()).toEqual(Complex.ZERO);
    });

    it('evaluates transcendental functions on the principal branch', () => {
      expectClose(new Complex(0, Math.PI).exp(), -1, 0);
      expectClose(new Complex(-1).log(), 0, Math.PI);
      expectClose(new Complex(100).log10(), 2, 0);
      expectClose(new Complex(0, 1).sin(), 0, Math.sinh(1));
      expectClose(new Complex(0, 1).cos(), Math.cosh(1), 0);
      expectClose(new Complex(0.5).tan(), Math.tan(0.5), 0);
      expectClose(new Complex(0.5).asin(), Math.asin(0.5), 0);
      expectClose(new Complex(0.5).acos(), Math.acos(0.5), 0);
      expectClose(new Complex(0.5).atan(), Math.atan(0.5), 0);
    });

    it('is immutable', () => {
      expect(Object.isFrozen(new Complex(1, 1))).toBe(true);
    });
  });

  describe('formatting', () => {
    it('renders non-finite parts', () => {
      expect(formatReal(NaN)).toBe('nan');
      expect(formatReal(-0)).toBe('-0');
      expect(new Complex(Infinity, NaN).toString()).toBe('(inf+nanj)');
    });

    it('renders pure imaginary values without brackets', () => {
      expect(new Complex(0, 1.5).toString()).toBe('1.5j');
      expect(new Complex(0, 0).toString()).toBe('0j');
    });
  });
});

describe('complex sessions', () => {
  it('reads imaginary literals', () => {
    expect(complexResult('2j')).toEqual(new Complex(0, 2));
    expect(complexResult('1 + 2j')).toEqual(new Complex(1, 2));
  });

  it('lifts real literals and results', () => {
    const value = complexResult('1 + 2');
    expect(value).toEqual(new Complex(3, 0));
    expect(toReadable(value)).toBe('(3+0j)');
  });

  it('multiplies imaginary units', () => {
    expect(complexResult('2j * 2j')).toEqual(new Complex(-4, 0));
  });

  it('takes square roots of negative numbers', () => {
    expect(complexResult('sqrt(-4)')).toEqual(new Complex(0, 2));
    expect(toReadable(complexResult('sqrt(-4)'))).toBe('2j');
  });

  it('follows the complex convention for division by zero', () => {
    expect(complexResult('1/0')).toEqual(new Complex(Infinity, 0));
  });

  it('lifts constants and initial variables', () => {
    const session = createSession({ domain: 'complex', variables: { a: 2 } });
    expect(session.variables.get('a')).toEqual(new Complex(2, 0));
    expect(session.constants.get('pi')).toEqual(new Complex(Math.PI, 0));
  });

  it('keeps trees over free variables', () => {
    const session = createSession({ domain: 'complex' });
    const value: Operand | undefined = parse(session, 'z * 1j');
    expect(value !== undefined && isExpression(value)).toBe(true);
    if (value !== undefined) {
      expect(toReadable(value)).toBe('z*1j');
    }
  });

  it('provides the complex function table', () => {
    expectClose(complexResult('phase(1j)'), Math.PI / 2, 0);
    expectClose(complexResult('polar(3 + 4j)'), 5, Math.atan2(4, 3));
    expectClose(complexResult('rect(2, pi)'), -2, 0);
    expectClose(complexResult('exp(0)'), 1, 0);
    expectClose(complexResult('log(1j)'), 0, Math.PI / 2);
    expectClose(complexResult('log(8, 2)'), 3, 0);
    expectClose(complexResult('log10(1000)'), 3, 0);
  });

  it('rejects imaginary literals in real sessions', () => {
    const session = createSession();
    expect(() => parse(session, '2j')).toThrow(CapabilityError);
    expect(() => parse(session, '2j')).toThrow(
      'Complex number 2j not supported at 1:1'
    );
  });
});
