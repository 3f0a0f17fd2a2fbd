export { Polynomial } from "./Polynomial.js";
export type { Coefficient, Term } from "./Polynomial.js";
export { format, formatPairs, writePolynomial } from "./format.js";
export type { TextSink } from "./format.js";
export { readPolynomial } from "./stream.js";
export {
  TokenReader,
  AsyncTokenReader,
  tokenize,
  tokenizeStream,
} from "./tokens.js";
export type { ByteOrTextChunk } from "./tokens.js";
export { PolynomialParseError } from "./errors.js";
