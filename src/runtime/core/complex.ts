/**
 * Complex Numbers
 *
 * Immutable complex value used by sessions in complex mode. All
 * transcendental functions return the principal branch.
 */

/**
 * Render a double for display. Non-finite values render as `inf`, `-inf`
 * and `nan`; expression formatting writes them as foldable divisions.
 */
export function formatReal(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  if (Object.is(value, -0)) return '-0';
  return String(value);
}

/** Integer exponents up to this magnitude use repeated multiplication */
const MAX_INTEGER_POWER = 100;

export class Complex {
  /** Real part */
  readonly re: number;
  /** Imaginary part */
  readonly im: number;

  constructor(re: number, im = 0) {
    this.re = re;
    this.im = im;
    Object.freeze(this);
  }

  static readonly ZERO = new Complex(0, 0);
  static readonly ONE = new Complex(1, 0);
  static readonly I = new Complex(0, 1);

  /** Lift a real number into the complex plane */
  static from(value: number | Complex): Complex {
    return value instanceof Complex ? value : new Complex(value, 0);
  }

  /** Build from polar coordinates */
  static fromPolar(modulus: number, argument: number): Complex {
    return new Complex(
      modulus * Math.cos(argument),
      modulus * Math.sin(argument)
    );
  }

  isZero(): boolean {
    return this.re === 0 && this.im === 0;
  }

  equals(other: Complex): boolean {
    return this.re === other.re && this.im === other.im;
  }

  /** Modulus |z| */
  abs(): number {
    return Math.hypot(this.re, this.im);
  }

  /** Argument (phase) in (-pi, pi] */
  arg(): number {
    return Math.atan2(this.im, this.re);
  }

  neg(): Complex {
    return new Complex(-this.re, -this.im);
  }

  add(other: Complex): Complex {
    return new Complex(this.re + other.re, this.im + other.im);
  }

  sub(other: Complex): Complex {
    return new Complex(this.re - other.re, this.im - other.im);
  }

  mul(other: Complex): Complex {
    return new Complex(
      this.re * other.re - this.im * other.im,
      this.re * other.im + this.im * other.re
    );
  }

  /** Division by zero gives infinite parts (NaN for 0/0), never an exception */
  div(other: Complex): Complex {
    if (other.isZero()) {
      if (this.isZero()) return new Complex(NaN, NaN);
      return new Complex(
        this.re === 0 ? 0 : this.re / 0,
        this.im === 0 ? 0 : this.im / 0
      );
    }
    const denom = other.re * other.re + other.im * other.im;
    return new Complex(
      (this.re * other.re + this.im * other.im) / denom,
      (this.im * other.re - this.re * other.im) / denom
    );
  }

  pow(exponent: Complex): Complex {
    if (exponent.isZero()) return Complex.ONE;
    if (this.isZero()) {
      return exponent.re > 0 && exponent.im === 0
        ? Complex.ZERO
        : new Complex(Infinity, 0);
    }
    if (
      exponent.im === 0 &&
      Number.isInteger(exponent.re) &&
      Math.abs(exponent.re) <= MAX_INTEGER_POWER
    ) {
      return this.powInteger(exponent.re);
    }
    return exponent.mul(this.log()).exp();
  }

  private powInteger(n: number): Complex {
    let result = Complex.ONE;
    let base: Complex = this;
    let k = Math.abs(n);
    while (k > 0) {
      if (k & 1) result = result.mul(base);
      base = base.mul(base);
      k >>= 1;
    }
    return n < 0 ? Complex.ONE.div(result) : result;
  }

  /** Principal square root */
  sqrt(): Complex {
    if (this.isZero()) return Complex.ZERO;
    const modulus = this.abs();
    const re = Math.sqrt((modulus + this.re) / 2);
    const im = Math.sqrt((modulus - this.re) / 2);
    return new Complex(re, this.im < 0 ? -im : im);
  }

  exp(): Complex {
    return Complex.fromPolar(Math.exp(this.re), this.im);
  }

  /** Natural logarithm; log(0) is -inf */
  log(): Complex {
    return new Complex(Math.log(this.abs()), this.arg());
  }

  log10(): Complex {
    const log = this.log();
    return new Complex(log.re / Math.LN10, log.im / Math.LN10);
  }

  sin(): Complex {
    return new Complex(
      Math.sin(this.re) * Math.cosh(this.im),
      Math.cos(this.re) * Math.sinh(this.im)
    );
  }

  cos(): Complex {
    return new Complex(
      Math.cos(this.re) * Math.cosh(this.im),
      -Math.sin(this.re) * Math.sinh(this.im)
    );
  }

  tan(): Complex {
    return this.sin().div(this.cos());
  }

  /** asin z = -i log(iz + sqrt(1 - z^2)) */
  asin(): Complex {
    const iz = Complex.I.mul(this);
    const root = Complex.ONE.sub(this.mul(this)).sqrt();
    return Complex.I.neg().mul(iz.add(root).log());
  }

  /** acos z = -i log(z + i sqrt(1 - z^2)) */
  acos(): Complex {
    const root = Complex.ONE.sub(this.mul(this)).sqrt();
    return Complex.I.neg().mul(this.add(Complex.I.mul(root)).log());
  }

  /** atan z = (i/2) log((i + z) / (i - z)) */
  atan(): Complex {
    const ratio = Complex.I.add(this).div(Complex.I.sub(this));
    return new Complex(0, 0.5).mul(ratio.log());
  }

  /**
   * Render as `2j`, `(1+2j)` or `(1-2j)`. Pure imaginary values omit
   * the real part and the brackets.
   */
  toString(): string {
    const im = `${formatReal(Math.abs(this.im))}j`;
    if (this.re === 0 && !Object.is(this.re, -0)) {
      return this.im < 0 || Object.is(this.im, -0) ? `-${im}` : im;
    }
    const sign = this.im < 0 || Object.is(this.im, -0) ? '-' : '+';
    return `(${formatReal(this.re)}${sign}${im})`;
  }
}
