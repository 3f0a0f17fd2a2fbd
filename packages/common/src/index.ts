/** @internal */
export function arr<T>(length: number, mapper: (n: number) => T): T[] {
  const a = new Array<T>(length);
  for (let i = 0; i < length; i++) a[i] = mapper(i);
  return a;
}

/** @internal */
export function fill<T>(length: number, value: T): T[] {
  return new Array<T>(length).fill(value);
}

/** @internal */
export function assertInteger(value: number, name: string): void {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`expected ${name} to be a safe integer, got ${value}`);
  }
}

/** One past the largest index a JavaScript array can hold. */
export const MAX_ARRAY_LENGTH = 2 ** 32 - 1;

/** @internal */
export function assertArrayIndex(value: number, name: string): void {
  assertInteger(value, name);
  if (Math.abs(value) >= MAX_ARRAY_LENGTH) {
    throw new RangeError(
      `expected ${name} to be below ${MAX_ARRAY_LENGTH}, got ${value}`,
    );
  }
}

/** @internal */
export function toBigInt(value: bigint | number, name: string): bigint {
  if (typeof value === "bigint") return value;
  assertInteger(value, name);
  return BigInt(value);
}
