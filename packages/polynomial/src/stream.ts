import { Polynomial } from "./Polynomial.js";
import { AsyncTokenReader, tokenizeStream } from "./tokens.js";
import type { ByteOrTextChunk } from "./tokens.js";

/**
 * Reads a pair list from a chunked source such as a Node `Readable`.
 *
 * Given a raw source, reading stops at the `0 0` terminator and the source
 * is released. Given an {@link AsyncTokenReader}, the reader is left open
 * so that further polynomials can be read from it.
 */
export async function readPolynomial(
  source: AsyncIterable<ByteOrTextChunk> | AsyncTokenReader,
  target: Polynomial = new Polynomial(),
): Promise<Polynomial> {
  if (source instanceof AsyncTokenReader) {
    return readPairs(source, target);
  }

  const reader = new AsyncTokenReader(tokenizeStream(source));
  try {
    return await readPairs(reader, target);
  } finally {
    await reader.close();
  }
}

async function readPairs(
  reader: AsyncTokenReader,
  target: Polynomial,
): Promise<Polynomial> {
  target.reset();

  for (;;) {
    const coeff = await reader.nextInteger();
    const exponent = await reader.nextInteger();
    if (coeff === 0n && exponent === 0n) return target;
    target.setCoeff(coeff, Number(exponent));
  }
}
