export class PolynomialParseError extends Error {
  readonly token: string | undefined;
  readonly position: number;

  constructor(reason: string, token: string | undefined, position: number) {
    super(
      token === undefined
        ? `${reason} at token ${position}`
        : `${reason} at token ${position} ("${token}")`,
    );
    this.name = "PolynomialParseError";
    this.token = token;
    this.position = position;
  }

  static endOfInput(position: number): PolynomialParseError {
    return new PolynomialParseError(
      "input ended before the 0 0 terminator",
      undefined,
      position,
    );
  }

  static notAnInteger(token: string, position: number): PolynomialParseError {
    return new PolynomialParseError("expected an integer", token, position);
  }
}
