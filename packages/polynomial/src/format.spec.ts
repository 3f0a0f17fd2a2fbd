import assert from "assert";
import { PassThrough } from "node:stream";
import { text } from "node:stream/consumers";
import { Polynomial } from "./Polynomial.js";
import { format, formatPairs, writePolynomial } from "./format.js";

describe("format", () => {
  it("matches toString", () => {
    const p = Polynomial.fromCoefficients([4, 0, -3, 1]);
    assert.equal(format(p), " +1x^3 -3x^2 +4");
  });

  it("writes to the sink it is given", () => {
    const chunks: string[] = [];
    const sink = { write: (chunk: string) => chunks.push(chunk) };

    assert.strictEqual(writePolynomial(sink, new Polynomial(4, 5)), sink);
    writePolynomial(sink, new Polynomial());
    assert.deepEqual(chunks, [" +4x^5", " 0"]);
  });

  it("writes to a node stream", async () => {
    const sink = new PassThrough();
    const written = text(sink);
    writePolynomial(sink, Polynomial.fromCoefficients([3, 0, 4])).end();
    assert.equal(await written, " +4x^2 +3");
  });

  describe("formatPairs", () => {
    it("lists pairs from the highest exponent and ends with 0 0", () => {
      assert.equal(
        formatPairs(Polynomial.fromCoefficients([3, 0, 5])),
        "5 2 3 0 0 0",
      );
      assert.equal(
        formatPairs(Polynomial.fromCoefficients([0, -1, 0, 0])),
        "-1 1 0 0",
      );
    });

    it("is just the terminator for zero", () => {
      assert.equal(formatPairs(new Polynomial(0, 3)), "0 0");
    });
  });
});
