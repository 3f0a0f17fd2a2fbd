import { PolynomialParseError } from "./errors.js";

const INTEGER = /^[+-]?\d+$/;

export type ByteOrTextChunk = string | Uint8Array;

/** Splits text into its whitespace-separated tokens. */
export function* tokenize(text: string): Generator<string, void> {
  for (const match of text.matchAll(/\S+/g)) yield match[0];
}

/**
 * Splits a chunked source into whitespace-separated tokens. A token that
 * straddles two chunks is held back until its end is seen. Byte chunks are
 * decoded as UTF-8.
 */
export async function* tokenizeStream(
  source: AsyncIterable<ByteOrTextChunk>,
): AsyncGenerator<string, void> {
  const decoder = new TextDecoder();
  let pending = "";

  for await (const chunk of source) {
    pending +=
      typeof chunk === "string"
        ? chunk
        : decoder.decode(chunk, { stream: true });
    const parts = pending.split(/\s+/);
    pending = parts.pop() ?? "";
    for (const part of parts) if (part) yield part;
  }

  pending += decoder.decode();
  for (const part of pending.split(/\s+/)) if (part) yield part;
}

/** @internal */
export function parseInteger(token: string, position: number): bigint {
  if (!INTEGER.test(token)) {
    throw PolynomialParseError.notAnInteger(token, position);
  }
  return BigInt(token);
}

/** Pulls integers off a token iterator, counting tokens as it goes. */
export class TokenReader {
  readonly #tokens: Iterator<string>;
  #position = 0;

  constructor(tokens: string | Iterable<string>) {
    const iterable = typeof tokens === "string" ? tokenize(tokens) : tokens;
    this.#tokens = iterable[Symbol.iterator]();
  }

  get position(): number {
    return this.#position;
  }

  nextInteger(): bigint {
    const next = this.#tokens.next();
    if (next.done) {
      throw PolynomialParseError.endOfInput(this.#position);
    }
    return parseInteger(next.value, this.#position++);
  }
}

/** The asynchronous counterpart of {@link TokenReader}. */
export class AsyncTokenReader {
  readonly #tokens: AsyncIterator<string>;
  #position = 0;

  constructor(tokens: AsyncIterable<string>) {
    this.#tokens = tokens[Symbol.asyncIterator]();
  }

  get position(): number {
    return this.#position;
  }

  async nextInteger(): Promise<bigint> {
    const next = await this.#tokens.next();
    if (next.done) {
      throw PolynomialParseError.endOfInput(this.#position);
    }
    return parseInteger(next.value, this.#position++);
  }

  /** Lets the underlying source release its resources. */
  async close(): Promise<void> {
    await this.#tokens.return?.();
  }
}
