/**
 * @qcircuit/core
 *
 * Quantum circuit data structures: a closed catalog of gates, a mutable
 * circuit builder and immutable circuit snapshots that share storage
 * without copying.
 *
 * @example
 * ```typescript
 * import { QuantumCircuit, H, CNOT } from '@qcircuit/core';
 *
 * // Build with the fluent API
 * const bell = new QuantumCircuit(2, 2)
 *   .addHGate(0)
 *   .addCNOTGate(0, 1)
 *   .measure([0, 1], [0, 1]);
 *
 * // Or from gate values
 * const same = new QuantumCircuit(2, 2, [H(0), CNOT(0, 1)]).measure([0, 1], [0, 1]);
 * bell.equals(same); // true
 *
 * // Share a snapshot, keep building the original
 * const snapshot = bell.freeze();
 * bell.addXGate(0);
 * snapshot.length; // 3
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Circuits
// ============================================================================

export { ImmutableQuantumCircuit, QuantumCircuit } from './circuit';
export type { CircuitStats } from './circuit';

export { resolveGateSequence } from './combine';
export type { GateSequence, GateSource } from './combine';

export { calculateDepth } from './depth';

export { checkGateBounds } from './storage';
export type { CircuitBounds } from './storage';

// ============================================================================
// Gates
// ============================================================================

export {
  Identity,
  X,
  Y,
  Z,
  H,
  S,
  Sdag,
  SqrtX,
  SqrtXdag,
  SqrtY,
  SqrtYdag,
  T,
  Tdag,
  U1,
  U2,
  U3,
  RX,
  RY,
  RZ,
  CNOT,
  CZ,
  SWAP,
  TOFFOLI,
  UnitaryMatrix,
  SingleQubitUnitaryMatrix,
  TwoQubitUnitaryMatrix,
  Pauli,
  PauliRotation,
  Measurement,
  gateQubits,
  gateCbits,
  gatesEqual,
  normalizeGate,
  validateGate,
  isFixedSingleQubitGate,
  isRotationGate,
  isControlledGate,
  isUnitaryMatrixGate,
} from './gate';
export type {
  QuantumGate,
  FixedSingleQubitGate,
  RotationGate,
  ControlledGate,
  SwapGate,
  ToffoliGate,
  UnitaryMatrixGate,
  PauliGate,
  PauliRotationGate,
  MeasurementGate,
} from './gate';

export {
  GateNames,
  PauliIds,
  FIXED_SINGLE_QUBIT_GATE_NAMES,
  ROTATION_GATE_NAMES,
  CONTROLLED_GATE_NAMES,
  UNITARY_MATRIX_GATE_NAMES,
  isFixedSingleQubitGateName,
  isRotationGateName,
  isControlledGateName,
  isUnitaryMatrixGateName,
  isPauliId,
} from './gate-names';
export type {
  GateName,
  FixedSingleQubitGateName,
  RotationGateName,
  ControlledGateName,
  UnitaryMatrixGateName,
  PauliId,
} from './gate-names';

// ============================================================================
// Errors
// ============================================================================

export {
  CircuitError,
  OutOfRangeError,
  IndexOutOfRangeError,
  InvalidGateIndexError,
  LengthMismatchError,
  DimensionMismatchError,
  DuplicateIndexError,
  InvalidGateError,
} from './errors';
export type { CircuitErrorKind, CircuitErrorOptions } from './errors';

// ============================================================================
// Complex Number Utilities
// ============================================================================

export { complex, toComplex, toComplexMatrix, identical, equals, isComplex, ZERO, ONE, I } from './complex';
export type { Complex, ComplexLike, ComplexMatrix, ComplexMatrixLike } from './complex';

// ============================================================================
// Version Info
// ============================================================================

export const VERSION = '0.1.0';
