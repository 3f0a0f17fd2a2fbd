import { Polynomial } from "./Polynomial.js";

/** Anything text can be written to, such as a Node `Writable`. */
export interface TextSink {
  write(chunk: string): unknown;
}

export function format(poly: Polynomial): string {
  return poly.toString();
}

/**
 * The pair list that {@link Polynomial.read} accepts: non-zero terms as
 * `coeff exponent`, highest exponent first, closed by `0 0`.
 */
export function formatPairs(poly: Polynomial): string {
  return [...poly.toPairs().flat(), 0, 0].join(" ");
}

export function writePolynomial<S extends TextSink>(
  sink: S,
  poly: Polynomial,
): S {
  sink.write(format(poly));
  return sink;
}
