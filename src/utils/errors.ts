/**
 * Error raised when a value vector does not match the size of the layer it is applied to
 * (network inputs, training targets or a decoded value line). Never recovered internally:
 * vectors are not truncated or padded.
 *
 * @example
 * try {
 *   net.fire([1]);
 * } catch (e) {
 *   if (e instanceof ShapeMismatchError) console.log(e.expected, e.actual); // 2 1
 * }
 */
export class ShapeMismatchError extends Error {
  /** Size the layer / traversal requires. */
  readonly expected: number;
  /** Size that was supplied. */
  readonly actual: number;

  constructor(what: string, expected: number, actual: number) {
    super(`${what} size mismatch: expected ${expected}, got ${actual}`);
    this.name = 'ShapeMismatchError';
    this.expected = expected;
    this.actual = actual;
    Object.setPrototypeOf(this, ShapeMismatchError.prototype);
  }
}

/**
 * Error raised by the text decoders when a header or a numeric field cannot be parsed.
 */
export class InvalidDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidDataError';
    Object.setPrototypeOf(this, InvalidDataError.prototype);
  }
}
