import Benchmark from "benchmark";
import { arr } from "@intpoly/common";
import { Polynomial, format } from "@intpoly/polynomial";

const suite = new Benchmark.Suite("Polynomial arithmetic");

function buildPolynomial(length: number): Polynomial {
  return Polynomial.fromCoefficients(
    arr(length, () => Math.floor(Math.random() * 200) - 100),
  );
}

const small = buildPolynomial(16);
const large = buildPolynomial(512);

suite.add("add", () => {
  large.add(small);
});

suite.add("mul (16 x 16)", () => {
  small.mul(small);
});

suite.add("mul (512 x 16)", () => {
  large.mul(small);
});

suite.add("mulAssign (16 x 16)", () => {
  small.clone().mulAssign(small);
});

suite.add("format", () => {
  format(large);
});

suite.on("cycle", (event: Benchmark.Event) => {
  console.log(String(event.target));
  console.log(event.target.stats);
});

suite.run({ async: true });
