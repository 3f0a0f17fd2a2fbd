import { assert } from "chai";
import { Readable } from "node:stream";
import {
  AsyncTokenReader,
  TokenReader,
  tokenize,
  tokenizeStream,
} from "./tokens.js";
import { PolynomialParseError } from "./errors.js";

async function collect(tokens: AsyncIterable<string>): Promise<string[]> {
  const collected: string[] = [];
  for await (const token of tokens) collected.push(token);
  return collected;
}

describe("tokens", () => {
  describe("tokenize", () => {
    it("splits on any whitespace", () => {
      assert.deepEqual([...tokenize("  5\t2\n3  ")], ["5", "2", "3"]);
    });

    it("yields nothing for blank input", () => {
      assert.deepEqual([...tokenize("")], []);
      assert.deepEqual([...tokenize(" \n ")], []);
    });
  });

  describe("tokenizeStream", () => {
    it("joins tokens that straddle chunks", async () => {
      const tokens = await collect(
        tokenizeStream(Readable.from(["1", "2 3", "4\n", " 5"])),
      );
      assert.deepEqual(tokens, ["12", "34", "5"]);
    });

    it("decodes byte chunks", async () => {
      const bytes = new TextEncoder().encode("7 1 0 0\n");
      const tokens = await collect(
        tokenizeStream(Readable.from([bytes.slice(0, 3), bytes.slice(3)])),
      );
      assert.deepEqual(tokens, ["7", "1", "0", "0"]);
    });
  });

  describe("TokenReader", () => {
    it("reads signed integers and counts tokens", () => {
      const reader = new TokenReader("+4 -7 0");
      assert.strictEqual(reader.nextInteger(), 4n);
      assert.strictEqual(reader.nextInteger(), -7n);
      assert.strictEqual(reader.nextInteger(), 0n);
      assert.equal(reader.position, 3);
    });

    it("rejects tokens that are not decimal integers", () => {
      for (const token of ["1.5", "0x10", "two", "1e3"]) {
        assert.throws(
          () => new TokenReader(token).nextInteger(),
          PolynomialParseError,
          `expected an integer at token 0 ("${token}")`,
        );
      }
    });

    it("reads integers beyond the safe number range exactly", () => {
      const reader = new TokenReader(
        "9007199254740993 -340282366920938463463374607431768211456",
      );
      assert.strictEqual(reader.nextInteger(), 9007199254740993n);
      assert.strictEqual(reader.nextInteger(), -(2n ** 128n));
    });

    it("fails at the end of input", () => {
      const reader = new TokenReader(["1"]);
      reader.nextInteger();
      assert.throws(
        () => reader.nextInteger(),
        PolynomialParseError,
        "input ended before the 0 0 terminator at token 1",
      );
    });
  });

  describe("AsyncTokenReader", () => {
    it("reads integers from an async token source", async () => {
      const reader = new AsyncTokenReader(
        tokenizeStream(Readable.from(["10 -", "3"])),
      );
      assert.strictEqual(await reader.nextInteger(), 10n);
      assert.strictEqual(await reader.nextInteger(), -3n);
      assert.equal(reader.position, 2);
    });

    it("rejects at the end of input", async () => {
      const reader = new AsyncTokenReader(tokenizeStream(Readable.from([""])));
      let caught: unknown;
      try {
        await reader.nextInteger();
      } catch (error) {
        caught = error;
      }
      assert.instanceOf(caught, PolynomialParseError);
    });
  });
});
