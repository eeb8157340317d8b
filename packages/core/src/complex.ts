/**
 * Complex number values for unitary matrix entries.
 *
 * Matrix gates store their entries as complex numbers of the form a + bi.
 */

/**
 * Complex number interface
 */
export interface Complex {
  readonly real: number;
  readonly imag: number;
}

/**
 * Anything accepted where a matrix entry is expected.
 * A plain number is a real entry.
 */
export type ComplexLike = number | Complex;

/**
 * Square complex matrix, row-major
 */
export type ComplexMatrix = readonly (readonly Complex[])[];

/**
 * Matrix input accepted by the matrix gate factories
 */
export type ComplexMatrixLike = readonly (readonly ComplexLike[])[];

/**
 * Create a complex number
 */
export function complex(real: number, imag: number = 0): Complex {
  return Object.freeze({ real, imag });
}

/**
 * Complex zero
 */
export const ZERO: Complex = complex(0, 0);

/**
 * Complex one
 */
export const ONE: Complex = complex(1, 0);

/**
 * Complex i (imaginary unit)
 */
export const I: Complex = complex(0, 1);

/**
 * Check whether a value has the shape of a complex number
 */
export function isComplex(value: unknown): value is Complex {
  return (
    typeof value === 'object' &&
    value !== null &&
    'real' in value &&
    'imag' in value &&
    typeof value.real === 'number' &&
    typeof value.imag === 'number'
  );
}

/**
 * Coerce a number or complex value into a frozen Complex
 */
export function toComplex(value: ComplexLike): Complex {
  if (typeof value === 'number') {
    return complex(value, 0);
  }
  return complex(value.real, value.imag);
}

/**
 * Exact comparison of two complex values.
 *
 * Both parts are compared with `Object.is`, so `0` and `-0` differ
 * and `NaN` matches `NaN`.
 */
export function identical(a: Complex, b: Complex): boolean {
  return Object.is(a.real, b.real) && Object.is(a.imag, b.imag);
}

/**
 * Check if two complex numbers are approximately equal
 */
export function equals(a: Complex, b: Complex, tolerance: number = 1e-10): boolean {
  return (
    Math.abs(a.real - b.real) < tolerance &&
    Math.abs(a.imag - b.imag) < tolerance
  );
}

/**
 * Copy a matrix into frozen rows of frozen Complex entries
 */
export function toComplexMatrix(matrix: ComplexMatrixLike): ComplexMatrix {
  return Object.freeze(matrix.map((row) => Object.freeze(row.map(toComplex))));
}

/**
 * Exact, entry-by-entry comparison of two matrices
 */
export function matricesIdentical(a: ComplexMatrix, b: ComplexMatrix): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    const rowA = a[i];
    const rowB = b[i];
    if (rowA.length !== rowB.length) {
      return false;
    }
    for (let j = 0; j < rowA.length; j++) {
      if (!identical(rowA[j], rowB[j])) {
        return false;
      }
    }
  }
  return true;
}
