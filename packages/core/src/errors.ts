/**
 * Circuit Errors
 *
 * Every failure raised while building or validating a circuit is a
 * CircuitError. Each subclass fixes a `kind` so callers can branch on
 * either `instanceof` or the string discriminator.
 */

/**
 * Discriminator for the error classes below
 */
export type CircuitErrorKind =
  | 'IndexOutOfRange'
  | 'InvalidGateIndex'
  | 'LengthMismatch'
  | 'DimensionMismatch'
  | 'DuplicateIndex'
  | 'InvalidGate';

/**
 * Context attached to an error
 */
export interface CircuitErrorOptions {
  /**
   * Position of the offending gate within the batch being validated
   */
  gateIndex?: number;
}

function withGatePrefix(message: string, gateIndex: number | undefined): string {
  return gateIndex === undefined ? message : `Gate ${gateIndex}: ${message}`;
}

export abstract class CircuitError extends Error {
  abstract readonly kind: CircuitErrorKind;
  readonly gateIndex?: number;

  constructor(message: string, options: CircuitErrorOptions = {}) {
    super(withGatePrefix(message, options.gateIndex));
    this.name = new.target.name;
    this.gateIndex = options.gateIndex;
  }
}

/**
 * Common base of the two range errors. Catch this to handle a wire index
 * and an insertion position outside their range alike.
 */
export abstract class OutOfRangeError extends CircuitError {}

/**
 * A qubit or classical-bit index lies outside the circuit's counts
 */
export class IndexOutOfRangeError extends OutOfRangeError {
  readonly kind = 'IndexOutOfRange';

  constructor(
    readonly wire: 'qubit' | 'cbit',
    readonly index: number,
    readonly count: number,
    options?: CircuitErrorOptions
  ) {
    super(
      `${wire === 'qubit' ? 'Qubit' : 'Classical bit'} ${index} out of range [0, ${count - 1}]`,
      options
    );
  }
}

/**
 * An insertion position lies outside [0, length].
 *
 * This is not an IndexOutOfRangeError, which is reserved for wire
 * indices; both extend OutOfRangeError.
 */
export class InvalidGateIndexError extends OutOfRangeError {
  readonly kind = 'InvalidGateIndex';

  constructor(
    readonly position: number,
    readonly length: number
  ) {
    super(`Gate position ${position} out of range [0, ${length}]`);
  }
}

/**
 * Two lists that must run in parallel have different lengths
 */
export class LengthMismatchError extends CircuitError {
  readonly kind = 'LengthMismatch';

  constructor(
    readonly what: string,
    readonly expected: number,
    readonly actual: number,
    options?: CircuitErrorOptions
  ) {
    super(`${what}: expected ${expected}, got ${actual}`, options);
  }
}

/**
 * A matrix does not have side 2^targets
 */
export class DimensionMismatchError extends CircuitError {
  readonly kind = 'DimensionMismatch';

  constructor(
    readonly expected: number,
    readonly rows: number,
    readonly columns: number[],
    options?: CircuitErrorOptions
  ) {
    super(
      `Matrix must be ${expected}x${expected}, got ${rows} rows with lengths [${columns.join(', ')}]`,
      options
    );
  }
}

/**
 * The same index appears twice in one gate's own index list
 */
export class DuplicateIndexError extends CircuitError {
  readonly kind = 'DuplicateIndex';

  constructor(
    readonly indices: readonly number[],
    readonly duplicate: number,
    options?: CircuitErrorOptions
  ) {
    super(`Index ${duplicate} repeated in [${indices.join(', ')}]`, options);
  }
}

/**
 * A gate is malformed in a way none of the other kinds describe
 */
export class InvalidGateError extends CircuitError {
  readonly kind = 'InvalidGate';

  constructor(message: string, options?: CircuitErrorOptions) {
    super(message, options);
  }
}
