/**
 * Numeric Values
 *
 * A session works in one numeric domain: real values are plain doubles,
 * complex values are {@link Complex} instances.
 */

import { Complex, formatReal } from './complex.js';

export type NumericDomain = 'real' | 'complex';

/** Concrete result of a fully defined computation */
export type NumericValue = number | Complex;

export function isNumericValue(value: unknown): value is NumericValue {
  return typeof value === 'number' || value instanceof Complex;
}

/**
 * Convert a value into the representation used by a domain.
 * Real domains keep complex values as they are.
 */
export function toDomain(value: NumericValue, domain: NumericDomain): NumericValue {
  return domain === 'complex' ? Complex.from(value) : value;
}

/**
 * Real part of a value, or NaN when the imaginary part is non-zero.
 */
export function toReal(value: NumericValue): number {
  if (typeof value === 'number') return value;
  return value.im === 0 ? value.re : NaN;
}

/** True when the rendered form starts with a minus sign */
export function isNegative(value: NumericValue): boolean {
  if (typeof value === 'number') return value < 0 || Object.is(value, -0);
  return value.toString().startsWith('-');
}

export function formatNumeric(value: NumericValue): string {
  return typeof value === 'number' ? formatReal(value) : value.toString();
}
