import { arr, fill, assertArrayIndex, toBigInt } from "@intpoly/common";
import { TokenReader } from "./tokens.js";

/** Coefficients can be given as bigints or as safe integer numbers. */
export type Coefficient = bigint | number;

export type Term = [coefficient: bigint, exponent: number];

// CLASS DEFINITION
// ================================================================================================
/**
 * A polynomial in one variable with integer coefficients, stored densely:
 * the entry at index `i` is the coefficient of `x^i`. There is always at
 * least a constant term, and trailing zero entries are kept as they are.
 */
export class Polynomial {
  #coeffs: bigint[];

  // CONSTRUCTOR
  // --------------------------------------------------------------------------------------------
  /**
   * `new Polynomial()` is zero, `new Polynomial(c)` the constant `c`,
   * `new Polynomial(c, e)` the single term `c x^|e|`, and
   * `new Polynomial(other)` a copy of `other`.
   */
  constructor(coeffOrSource: Coefficient | Polynomial = 0n, exponent = 0) {
    if (coeffOrSource instanceof Polynomial) {
      this.#coeffs = coeffOrSource.#coeffs.slice();
    } else {
      const coeff = toBigInt(coeffOrSource, "coefficient");
      assertArrayIndex(exponent, "exponent");
      const coeffs = fill(Math.abs(exponent) + 1, 0n);
      coeffs[coeffs.length - 1] = coeff;
      this.#coeffs = coeffs;
    }
  }

  /** Builds a polynomial whose coefficient of `x^i` is `values[i]`. */
  static fromCoefficients(values: readonly Coefficient[]): Polynomial {
    const coeffs = values.map((value, exponent) =>
      toBigInt(value, `coefficient of x^${exponent}`),
    );
    return Polynomial.#wrap(coeffs.length ? coeffs : [0n]);
  }

  /** Reads a pair list such as `"5 2 3 0 0 0"` into a new polynomial. */
  static parse(text: string): Polynomial {
    return new Polynomial().read(text);
  }

  static #wrap(coeffs: bigint[]): Polynomial {
    const poly = new Polynomial();
    poly.#coeffs = coeffs;
    return poly;
  }

  static #convolve(a: bigint[], b: bigint[]): bigint[] {
    const product = fill(a.length + b.length - 1, 0n);
    for (let i = 0; i < a.length; i++) {
      for (let j = 0; j < b.length; j++) {
        product[i + j] += a[i] * b[j];
      }
    }
    return product;
  }

  // PROPERTIES
  // --------------------------------------------------------------------------------------------
  /** Number of stored coefficients, trailing zeros included. */
  get length(): number {
    return this.#coeffs.length;
  }

  /** Highest exponent with a non-zero coefficient, or 0 for zero. */
  get degree(): number {
    for (let i = this.#coeffs.length - 1; i > 0; i--) {
      if (this.#coeffs[i] !== 0n) return i;
    }
    return 0;
  }

  coefficients(): bigint[] {
    return this.#coeffs.slice();
  }

  isZero(): boolean {
    return this.#coeffs.every((coeff) => coeff === 0n);
  }

  clone(): Polynomial {
    return new Polynomial(this);
  }

  // COEFFICIENT ACCESS
  // --------------------------------------------------------------------------------------------
  /** Terms outside the stored range, negative exponents included, are 0. */
  getCoeff(exponent: number): bigint {
    if (
      !Number.isInteger(exponent) ||
      exponent < 0 ||
      exponent >= this.#coeffs.length
    ) {
      return 0n;
    }
    return this.#coeffs[exponent];
  }

  /**
   * Sets the coefficient of `x^|exponent|`, growing the polynomial with
   * zero entries when the exponent is past its current length. The
   * exponent must fit an array index, so its size is below 2^32 - 1.
   */
  setCoeff(coeff: Coefficient, exponent: number): void {
    const value = toBigInt(coeff, "coefficient");
    assertArrayIndex(exponent, "exponent");
    const index = Math.abs(exponent);

    if (index >= this.#coeffs.length) {
      const grown = fill(index + 1, 0n);
      for (let i = 0; i < this.#coeffs.length; i++) {
        grown[i] = this.#coeffs[i];
      }
      this.#coeffs = grown;
    }

    this.#coeffs[index] = value;
  }

  /** Zeroes every coefficient without changing the length. */
  reset(): this {
    this.#coeffs.fill(0n);
    return this;
  }

  // ARITHMETIC
  // --------------------------------------------------------------------------------------------
  add(rhs: Polynomial): Polynomial {
    const a = this.#coeffs,
      b = rhs.#coeffs;
    return Polynomial.#wrap(
      arr(Math.max(a.length, b.length), (i) => {
        const coefficientA = i < a.length ? a[i] : 0n;
        const coefficientB = i < b.length ? b[i] : 0n;
        return coefficientA + coefficientB;
      }),
    );
  }

  sub(rhs: Polynomial): Polynomial {
    const a = this.#coeffs,
      b = rhs.#coeffs;
    return Polynomial.#wrap(
      arr(Math.max(a.length, b.length), (i) => {
        const coefficientA = i < a.length ? a[i] : 0n;
        const coefficientB = i < b.length ? b[i] : 0n;
        return coefficientA - coefficientB;
      }),
    );
  }

  mul(rhs: Polynomial): Polynomial {
    return Polynomial.#wrap(Polynomial.#convolve(this.#coeffs, rhs.#coeffs));
  }

  addAssign(rhs: Polynomial): this {
    const b = rhs.#coeffs;
    if (this.#coeffs.length < b.length) {
      this.setCoeff(0n, b.length - 1);
    }
    for (let i = 0; i < b.length; i++) {
      this.#coeffs[i] += b[i];
    }
    return this;
  }

  subAssign(rhs: Polynomial): this {
    const b = rhs.#coeffs;
    if (this.#coeffs.length < b.length) {
      this.setCoeff(0n, b.length - 1);
    }
    for (let i = 0; i < b.length; i++) {
      this.#coeffs[i] -= b[i];
    }
    return this;
  }

  mulAssign(rhs: Polynomial): this {
    this.#coeffs = Polynomial.#convolve(this.#coeffs, rhs.#coeffs);
    return this;
  }

  /** Makes this polynomial an independent copy of `source`. */
  assign(source: Polynomial): this {
    if (source !== this) {
      this.#coeffs = source.#coeffs.slice();
    }
    return this;
  }

  // COMPARISON
  // --------------------------------------------------------------------------------------------
  /** Trailing zero entries do not affect equality. */
  equals(rhs: Polynomial): boolean {
    const [smaller, larger] =
      this.#coeffs.length <= rhs.#coeffs.length
        ? [this.#coeffs, rhs.#coeffs]
        : [rhs.#coeffs, this.#coeffs];

    for (let i = 0; i < larger.length; i++) {
      const expected = i < smaller.length ? smaller[i] : 0n;
      if (larger[i] !== expected) return false;
    }
    return true;
  }

  notEquals(rhs: Polynomial): boolean {
    return !this.equals(rhs);
  }

  // TEXT
  // --------------------------------------------------------------------------------------------
  /** Non-zero terms from the highest exponent down. */
  toPairs(): Term[] {
    const pairs: Term[] = [];
    for (let exponent = this.#coeffs.length - 1; exponent >= 0; exponent--) {
      const coeff = this.#coeffs[exponent];
      if (coeff !== 0n) pairs.push([coeff, exponent]);
    }
    return pairs;
  }

  /**
   * Human-readable form, e.g. `" +1x^3 -3x^2 +4"`. Every term starts with
   * a space and the zero polynomial is `" 0"`.
   */
  toString(): string {
    const terms = this.toPairs().map(([coeff, exponent]) => {
      const sign = coeff > 0n ? "+" : "";
      const variable = exponent >= 1 ? "x" : "";
      const power = exponent >= 2 ? `^${exponent}` : "";
      return ` ${sign}${coeff}${variable}${power}`;
    });
    return terms.length ? terms.join("") : " 0";
  }

  /**
   * Replaces the coefficients with those of a pair list: integer
   * `coeff exponent` pairs applied through {@link setCoeff} until the pair
   * `0 0`. Existing coefficients are zeroed first; the length is kept.
   * Passing a {@link TokenReader} lets several polynomials be read from one
   * input in turn.
   */
  read(tokens: string | Iterable<string> | TokenReader): this {
    const reader =
      tokens instanceof TokenReader ? tokens : new TokenReader(tokens);
    this.reset();

    for (;;) {
      const coeff = reader.nextInteger();
      const exponent = reader.nextInteger();
      if (coeff === 0n && exponent === 0n) return this;
      this.setCoeff(coeff, Number(exponent));
    }
  }
}
