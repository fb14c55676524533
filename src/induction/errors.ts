/**
 * Raised when parallel inputs disagree in length: the attribute matrix and the
 * class vector, a column and its classes, or a row and the matrix width.
 */
export class ShapeMismatchError extends Error {
  readonly expected: number;
  readonly actual: number;

  constructor(message: string, expected: number, actual: number) {
    super(`${message}: expected ${expected}, got ${actual}`);
    this.name = "ShapeMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export function assertSameLength(what: string, expected: number, actual: number): void {
  if (expected !== actual) {
    throw new ShapeMismatchError(what, expected, actual);
  }
}
