/**
 * Built-in Constants and Functions
 *
 * Default lookup tables for new sessions. Real tables wrap Math; complex
 * tables wrap {@link Complex} methods and always return complex values.
 */

import { Complex } from '../core/complex.js';
import type { BinaryFunction, UnaryFunction } from '../core/types.js';
import { toReal, type NumericDomain, type NumericValue } from '../core/values.js';

// ============================================================
// ADAPTERS
// ============================================================

/** Wrap a real function; complex arguments with non-zero imaginary part give NaN */
export function realUnary(fn: (x: number) => number): UnaryFunction {
  return (x) => fn(toReal(x));
}

export function realBinary(fn: (x: number, y: number) => number): BinaryFunction {
  return (x, y) => fn(toReal(x), toReal(y));
}

/** Wrap a complex function; real arguments are lifted */
export function complexUnary(fn: (z: Complex) => NumericValue): UnaryFunction {
  return (x) => fn(Complex.from(x));
}

export function complexBinary(
  fn: (z: Complex, w: Complex) => NumericValue
): BinaryFunction {
  return (x, y) => fn(Complex.from(x), Complex.from(y));
}

// ============================================================
// CONSTANTS
// ============================================================

export const BUILTIN_CONSTANTS: Readonly<Record<string, number>> = {
  pi: Math.PI,
  e: Math.E,
};

// ============================================================
// REAL MODE
// ============================================================

export const REAL_UNARY_FUNCTIONS: Readonly<Record<string, UnaryFunction>> = {
  exp: realUnary(Math.exp),
  expm1: realUnary(Math.expm1),
  log: realUnary(Math.log),
  log1p: realUnary(Math.log1p),
  log2: realUnary(Math.log2),
  log10: realUnary(Math.log10),
  sqrt: realUnary(Math.sqrt),
  asin: realUnary(Math.asin),
  acos: realUnary(Math.acos),
  atan: realUnary(Math.atan),
  cos: realUnary(Math.cos),
  sin: realUnary(Math.sin),
  tan: realUnary(Math.tan),
  fabs: realUnary(Math.abs),
  floor: realUnary(Math.floor),
  ceil: realUnary(Math.ceil),
};

export const REAL_BINARY_FUNCTIONS: Readonly<Record<string, BinaryFunction>> = {
  pow: realBinary(Math.pow),
  atan2: realBinary(Math.atan2),
  // log(x, base)
  log: realBinary((x, base) => Math.log(x) / Math.log(base)),
};

// ============================================================
// COMPLEX MODE
// ============================================================

export const COMPLEX_UNARY_FUNCTIONS: Readonly<Record<string, UnaryFunction>> = {
  phase: complexUnary((z) => new Complex(z.arg(), 0)),
  // Packs modulus and phase as re and im: polar(z) = |z| + arg(z)j
  polar: complexUnary((z) => new Complex(z.abs(), z.arg())),
  exp: complexUnary((z) => z.exp()),
  log: complexUnary((z) => z.log()),
  log10: complexUnary((z) => z.log10()),
  sqrt: complexUnary((z) => z.sqrt()),
  asin: complexUnary((z) => z.asin()),
  acos: complexUnary((z) => z.acos()),
  atan: complexUnary((z) => z.atan()),
  cos: complexUnary((z) => z.cos()),
  sin: complexUnary((z) => z.sin()),
  tan: complexUnary((z) => z.tan()),
};

export const COMPLEX_BINARY_FUNCTIONS: Readonly<Record<string, BinaryFunction>> = {
  // rect(modulus, phase) reads the real parts of its arguments
  rect: complexBinary((r, phi) => Complex.fromPolar(r.re, phi.re)),
  // log(z, base)
  log: complexBinary((z, base) => z.log().div(base.log())),
};

export function defaultUnaryFunctions(
  domain: NumericDomain
): Readonly<Record<string, UnaryFunction>> {
  return domain === 'complex' ? COMPLEX_UNARY_FUNCTIONS : REAL_UNARY_FUNCTIONS;
}

export function defaultBinaryFunctions(
  domain: NumericDomain
): Readonly<Record<string, BinaryFunction>> {
  return domain === 'complex' ? COMPLEX_BINARY_FUNCTIONS : REAL_BINARY_FUNCTIONS;
}
