/**
 * Gate Catalog
 *
 * The closed set of gate kinds a circuit can hold, their factories and
 * their structural validation. Validation here checks shape only (list
 * lengths, matrix dimensions, Pauli identifiers, repeated indices); a
 * gate is checked against a circuit's qubit and classical-bit counts
 * when it is inserted.
 */

import {
  isComplex,
  matricesIdentical,
  toComplexMatrix,
  type ComplexMatrix,
  type ComplexMatrixLike,
} from './complex';
import {
  DimensionMismatchError,
  DuplicateIndexError,
  InvalidGateError,
  LengthMismatchError,
  type CircuitErrorOptions,
} from './errors';
import {
  GateNames,
  MATRIX_TARGET_COUNTS,
  ROTATION_PARAM_COUNTS,
  isControlledGateName,
  isFixedSingleQubitGateName,
  isPauliId,
  isRotationGateName,
  isUnitaryMatrixGateName,
  type ControlledGateName,
  type FixedSingleQubitGateName,
  type PauliId,
  type RotationGateName,
  type UnitaryMatrixGateName,
} from './gate-names';

// ============================================================================
// Gate Definitions
// ============================================================================

/**
 * Single-qubit gate (no parameters)
 */
export interface FixedSingleQubitGate {
  readonly type: FixedSingleQubitGateName;
  readonly qubit: number;
}

/**
 * Parameterized single-qubit phase or rotation gate.
 *
 * `params` holds λ for U1, (φ, λ) for U2, (θ, φ, λ) for U3 and θ for
 * RX, RY and RZ.
 */
export interface RotationGate {
  readonly type: RotationGateName;
  readonly qubit: number;
  readonly params: readonly number[];
}

/**
 * Two-qubit gate with a control and a target
 */
export interface ControlledGate {
  readonly type: ControlledGateName;
  readonly control: number;
  readonly target: number;
}

/**
 * SWAP gate. Its two targets are interchangeable.
 */
export interface SwapGate {
  readonly type: typeof GateNames.SWAP;
  readonly targets: readonly [number, number];
}

/**
 * Toffoli gate (CCNOT)
 */
export interface ToffoliGate {
  readonly type: typeof GateNames.TOFFOLI;
  readonly controls: readonly [number, number];
  readonly target: number;
}

/**
 * Gate given by an explicit matrix of side 2^targets.
 *
 * The matrix is not checked for unitarity.
 */
export interface UnitaryMatrixGate {
  readonly type: UnitaryMatrixGateName;
  readonly targets: readonly number[];
  readonly matrix: ComplexMatrix;
}

/**
 * Tensor product of Pauli operators, one per target
 */
export interface PauliGate {
  readonly type: typeof GateNames.Pauli;
  readonly targets: readonly number[];
  readonly pauliIds: readonly PauliId[];
}

/**
 * Rotation exp(-iθP/2) about a Pauli string P
 */
export interface PauliRotationGate {
  readonly type: typeof GateNames.PauliRotation;
  readonly targets: readonly number[];
  readonly pauliIds: readonly PauliId[];
  readonly angle: number;
}

/**
 * Measurement of `qubits[i]` into `cbits[i]`
 */
export interface MeasurementGate {
  readonly type: typeof GateNames.Measurement;
  readonly qubits: readonly number[];
  readonly cbits: readonly number[];
}

/**
 * Union type for all gates
 */
export type QuantumGate =
  | FixedSingleQubitGate
  | RotationGate
  | ControlledGate
  | SwapGate
  | ToffoliGate
  | UnitaryMatrixGate
  | PauliGate
  | PauliRotationGate
  | MeasurementGate;

// ============================================================================
// Type Guards
// ============================================================================

export function isFixedSingleQubitGate(gate: QuantumGate): gate is FixedSingleQubitGate {
  return isFixedSingleQubitGateName(gate.type);
}

export function isRotationGate(gate: QuantumGate): gate is RotationGate {
  return isRotationGateName(gate.type);
}

export function isControlledGate(gate: QuantumGate): gate is ControlledGate {
  return isControlledGateName(gate.type);
}

export function isUnitaryMatrixGate(gate: QuantumGate): gate is UnitaryMatrixGate {
  return isUnitaryMatrixGateName(gate.type);
}

// ============================================================================
// Structural Validation
// ============================================================================

function checkNumber(value: unknown, what: string, options?: CircuitErrorOptions): number {
  if (typeof value !== 'number') {
    throw new InvalidGateError(`${what} must be a number, got ${String(value)}`, options);
  }
  return value;
}

function checkNonEmpty(indices: readonly number[], what: string, options?: CircuitErrorOptions): void {
  if (indices.length === 0) {
    throw new InvalidGateError(`${what} must not be empty`, options);
  }
}

/**
 * Throw DuplicateIndexError on the first index that repeats
 */
export function checkDistinct(indices: readonly number[], options?: CircuitErrorOptions): void {
  const seen = new Set<number>();
  for (const index of indices) {
    if (seen.has(index)) {
      throw new DuplicateIndexError(indices, index, options);
    }
    seen.add(index);
  }
}

function checkPauliIds(
  targets: readonly number[],
  pauliIds: readonly number[],
  options?: CircuitErrorOptions
): readonly PauliId[] {
  if (pauliIds.length !== targets.length) {
    throw new LengthMismatchError('Pauli ids per target', targets.length, pauliIds.length, options);
  }
  const ids: PauliId[] = [];
  for (const id of pauliIds) {
    if (!isPauliId(id)) {
      throw new InvalidGateError(`Pauli id ${id} is not one of 0 (I), 1 (X), 2 (Y), 3 (Z)`, options);
    }
    ids.push(id);
  }
  return Object.freeze(ids);
}

function checkMatrix(
  targets: readonly number[],
  matrix: ComplexMatrixLike,
  options?: CircuitErrorOptions
): ComplexMatrix {
  const side = 2 ** targets.length;
  if (matrix.length !== side || matrix.some((row) => row.length !== side)) {
    throw new DimensionMismatchError(
      side,
      matrix.length,
      matrix.map((row) => row.length),
      options
    );
  }
  for (const row of matrix) {
    for (const entry of row) {
      if (typeof entry !== 'number' && !isComplex(entry)) {
        throw new InvalidGateError(`Matrix entry ${String(entry)} is not a number`, options);
      }
    }
  }
  return toComplexMatrix(matrix);
}

// ============================================================================
// Normalization
// ============================================================================
//
// Each normalizer validates one variant's shape and returns a deeply frozen
// copy, so gates held by a circuit can be shared between storages.

function freezeIndices(indices: readonly number[]): readonly number[] {
  return Object.freeze([...indices]);
}

function normalizeFixed(gate: FixedSingleQubitGate): FixedSingleQubitGate {
  return Object.freeze({ type: gate.type, qubit: gate.qubit });
}

function normalizeRotation(gate: RotationGate, options?: CircuitErrorOptions): RotationGate {
  const expected = ROTATION_PARAM_COUNTS[gate.type];
  if (gate.params.length !== expected) {
    throw new LengthMismatchError(`${gate.type} parameters`, expected, gate.params.length, options);
  }
  const params = gate.params.map((p, i) => checkNumber(p, `${gate.type} parameter ${i}`, options));
  return Object.freeze({ type: gate.type, qubit: gate.qubit, params: Object.freeze(params) });
}

function normalizeControlled(gate: ControlledGate, options?: CircuitErrorOptions): ControlledGate {
  checkDistinct([gate.control, gate.target], options);
  return Object.freeze({ type: gate.type, control: gate.control, target: gate.target });
}

function normalizeSwap(gate: SwapGate, options?: CircuitErrorOptions): SwapGate {
  if (gate.targets.length !== 2) {
    throw new LengthMismatchError('SWAP targets', 2, gate.targets.length, options);
  }
  const [a, b] = gate.targets;
  checkDistinct([a, b], options);
  return Object.freeze({ type: GateNames.SWAP, targets: Object.freeze([a, b] as const) });
}

function normalizeToffoli(gate: ToffoliGate, options?: CircuitErrorOptions): ToffoliGate {
  if (gate.controls.length !== 2) {
    throw new LengthMismatchError('TOFFOLI controls', 2, gate.controls.length, options);
  }
  const [c1, c2] = gate.controls;
  checkDistinct([c1, c2, gate.target], options);
  return Object.freeze({
    type: GateNames.TOFFOLI,
    controls: Object.freeze([c1, c2] as const),
    target: gate.target,
  });
}

function normalizeUnitaryMatrix(
  gate: UnitaryMatrixGate,
  options?: CircuitErrorOptions
): UnitaryMatrixGate {
  const required = MATRIX_TARGET_COUNTS[gate.type];
  if (required !== undefined && gate.targets.length !== required) {
    throw new LengthMismatchError(`${gate.type} targets`, required, gate.targets.length, options);
  }
  checkNonEmpty(gate.targets, `${gate.type} targets`, options);
  checkDistinct(gate.targets, options);
  const matrix = checkMatrix(gate.targets, gate.matrix, options);
  return Object.freeze({ type: gate.type, targets: freezeIndices(gate.targets), matrix });
}

function normalizePauli(gate: PauliGate, options?: CircuitErrorOptions): PauliGate {
  checkNonEmpty(gate.targets, 'Pauli targets', options);
  const pauliIds = checkPauliIds(gate.targets, gate.pauliIds, options);
  checkDistinct(gate.targets, options);
  return Object.freeze({ type: GateNames.Pauli, targets: freezeIndices(gate.targets), pauliIds });
}

function normalizePauliRotation(
  gate: PauliRotationGate,
  options?: CircuitErrorOptions
): PauliRotationGate {
  checkNonEmpty(gate.targets, 'PauliRotation targets', options);
  const pauliIds = checkPauliIds(gate.targets, gate.pauliIds, options);
  checkDistinct(gate.targets, options);
  const angle = checkNumber(gate.angle, 'PauliRotation angle', options);
  return Object.freeze({
    type: GateNames.PauliRotation,
    targets: freezeIndices(gate.targets),
    pauliIds,
    angle,
  });
}

function normalizeMeasurement(
  gate: MeasurementGate,
  options?: CircuitErrorOptions
): MeasurementGate {
  if (gate.qubits.length !== gate.cbits.length) {
    throw new LengthMismatchError(
      'Classical bits per measured qubit',
      gate.qubits.length,
      gate.cbits.length,
      options
    );
  }
  checkNonEmpty(gate.qubits, 'Measurement qubits', options);
  checkDistinct(gate.qubits, options);
  checkDistinct(gate.cbits, options);
  return Object.freeze({
    type: GateNames.Measurement,
    qubits: freezeIndices(gate.qubits),
    cbits: freezeIndices(gate.cbits),
  });
}

function unknownGate(gate: never, options?: CircuitErrorOptions): never {
  throw new InvalidGateError(`Unknown gate type: ${String(Reflect.get(gate, 'type'))}`, options);
}

/**
 * Validate a gate's shape and return a deeply frozen copy of it.
 *
 * Circuit bounds are not checked here.
 */
export function normalizeGate(gate: QuantumGate, options?: CircuitErrorOptions): QuantumGate {
  switch (gate.type) {
    case 'Identity':
    case 'X':
    case 'Y':
    case 'Z':
    case 'H':
    case 'S':
    case 'Sdag':
    case 'SqrtX':
    case 'SqrtXdag':
    case 'SqrtY':
    case 'SqrtYdag':
    case 'T':
    case 'Tdag':
      return normalizeFixed(gate);
    case 'U1':
    case 'U2':
    case 'U3':
    case 'RX':
    case 'RY':
    case 'RZ':
      return normalizeRotation(gate, options);
    case 'CNOT':
    case 'CZ':
      return normalizeControlled(gate, options);
    case 'SWAP':
      return normalizeSwap(gate, options);
    case 'TOFFOLI':
      return normalizeToffoli(gate, options);
    case 'UnitaryMatrix':
    case 'SingleQubitUnitaryMatrix':
    case 'TwoQubitUnitaryMatrix':
      return normalizeUnitaryMatrix(gate, options);
    case 'Pauli':
      return normalizePauli(gate, options);
    case 'PauliRotation':
      return normalizePauliRotation(gate, options);
    case 'Measurement':
      return normalizeMeasurement(gate, options);
    default:
      return unknownGate(gate, options);
  }
}

/**
 * Check a gate's shape, throwing on the first violation
 */
export function validateGate(gate: QuantumGate, options?: CircuitErrorOptions): void {
  normalizeGate(gate, options);
}

// ============================================================================
// Gate Factories
// ============================================================================

export function Identity(qubit: number): FixedSingleQubitGate {
  return normalizeFixed({ type: 'Identity', qubit });
}

export function X(qubit: number): FixedSingleQubitGate {
  return normalizeFixed({ type: 'X', qubit });
}

export function Y(qubit: number): FixedSingleQubitGate {
  return normalizeFixed({ type: 'Y', qubit });
}

export function Z(qubit: number): FixedSingleQubitGate {
  return normalizeFixed({ type: 'Z', qubit });
}

/**
 * Hadamard gate
 */
export function H(qubit: number): FixedSingleQubitGate {
  return normalizeFixed({ type: 'H', qubit });
}

/**
 * S gate (sqrt Z)
 */
export function S(qubit: number): FixedSingleQubitGate {
  return normalizeFixed({ type: 'S', qubit });
}

export function Sdag(qubit: number): FixedSingleQubitGate {
  return normalizeFixed({ type: 'Sdag', qubit });
}

export function SqrtX(qubit: number): FixedSingleQubitGate {
  return normalizeFixed({ type: 'SqrtX', qubit });
}

export function SqrtXdag(qubit: number): FixedSingleQubitGate {
  return normalizeFixed({ type: 'SqrtXdag', qubit });
}

export function SqrtY(qubit: number): FixedSingleQubitGate {
  return normalizeFixed({ type: 'SqrtY', qubit });
}

export function SqrtYdag(qubit: number): FixedSingleQubitGate {
  return normalizeFixed({ type: 'SqrtYdag', qubit });
}

/**
 * T gate (sqrt S)
 */
export function T(qubit: number): FixedSingleQubitGate {
  return normalizeFixed({ type: 'T', qubit });
}

export function Tdag(qubit: number): FixedSingleQubitGate {
  return normalizeFixed({ type: 'Tdag', qubit });
}

/**
 * Phase gate U1(λ)
 */
export function U1(qubit: number, lambda: number): RotationGate {
  return normalizeRotation({ type: 'U1', qubit, params: [lambda] });
}

export function U2(qubit: number, phi: number, lambda: number): RotationGate {
  return normalizeRotation({ type: 'U2', qubit, params: [phi, lambda] });
}

/**
 * General single-qubit unitary U3(θ, φ, λ)
 */
export function U3(qubit: number, theta: number, phi: number, lambda: number): RotationGate {
  return normalizeRotation({ type: 'U3', qubit, params: [theta, phi, lambda] });
}

/**
 * Rotation around X-axis
 */
export function RX(qubit: number, angle: number): RotationGate {
  return normalizeRotation({ type: 'RX', qubit, params: [angle] });
}

/**
 * Rotation around Y-axis
 */
export function RY(qubit: number, angle: number): RotationGate {
  return normalizeRotation({ type: 'RY', qubit, params: [angle] });
}

/**
 * Rotation around Z-axis
 */
export function RZ(qubit: number, angle: number): RotationGate {
  return normalizeRotation({ type: 'RZ', qubit, params: [angle] });
}

/**
 * Controlled-NOT gate
 */
export function CNOT(control: number, target: number): ControlledGate {
  return normalizeControlled({ type: 'CNOT', control, target });
}

/**
 * Controlled-Z gate
 */
export function CZ(control: number, target: number): ControlledGate {
  return normalizeControlled({ type: 'CZ', control, target });
}

export function SWAP(target1: number, target2: number): SwapGate {
  return normalizeSwap({ type: 'SWAP', targets: [target1, target2] });
}

export function TOFFOLI(control1: number, control2: number, target: number): ToffoliGate {
  return normalizeToffoli({ type: 'TOFFOLI', controls: [control1, control2], target });
}

/**
 * Gate acting on `targets` by an arbitrary matrix of side 2^targets.length
 */
export function UnitaryMatrix(
  targets: readonly number[],
  matrix: ComplexMatrixLike
): UnitaryMatrixGate {
  return normalizeUnitaryMatrix({
    type: 'UnitaryMatrix',
    targets,
    matrix: checkMatrix(targets, matrix),
  });
}

export function SingleQubitUnitaryMatrix(
  target: number,
  matrix: ComplexMatrixLike
): UnitaryMatrixGate {
  return normalizeUnitaryMatrix({
    type: 'SingleQubitUnitaryMatrix',
    targets: [target],
    matrix: checkMatrix([target], matrix),
  });
}

export function TwoQubitUnitaryMatrix(
  target1: number,
  target2: number,
  matrix: ComplexMatrixLike
): UnitaryMatrixGate {
  return normalizeUnitaryMatrix({
    type: 'TwoQubitUnitaryMatrix',
    targets: [target1, target2],
    matrix: checkMatrix([target1, target2], matrix),
  });
}

export function Pauli(targets: readonly number[], pauliIds: readonly number[]): PauliGate {
  return normalizePauli({
    type: 'Pauli',
    targets,
    pauliIds: checkPauliIds(targets, pauliIds),
  });
}

export function PauliRotation(
  targets: readonly number[],
  pauliIds: readonly number[],
  angle: number
): PauliRotationGate {
  return normalizePauliRotation({
    type: 'PauliRotation',
    targets,
    pauliIds: checkPauliIds(targets, pauliIds),
    angle,
  });
}

export function Measurement(
  qubits: readonly number[],
  cbits: readonly number[]
): MeasurementGate {
  return normalizeMeasurement({ type: 'Measurement', qubits, cbits });
}

// ============================================================================
// Wires
// ============================================================================

/**
 * Qubit indices a gate acts on, controls first
 */
export function gateQubits(gate: QuantumGate): readonly number[] {
  switch (gate.type) {
    case 'CNOT':
    case 'CZ':
      return [gate.control, gate.target];
    case 'TOFFOLI':
      return [...gate.controls, gate.target];
    case 'SWAP':
    case 'UnitaryMatrix':
    case 'SingleQubitUnitaryMatrix':
    case 'TwoQubitUnitaryMatrix':
    case 'Pauli':
    case 'PauliRotation':
      return gate.targets;
    case 'Measurement':
      return gate.qubits;
    default:
      return [gate.qubit];
  }
}

/**
 * Classical-bit indices a gate writes to
 */
export function gateCbits(gate: QuantumGate): readonly number[] {
  return gate.type === 'Measurement' ? gate.cbits : [];
}

// ============================================================================
// Equality
// ============================================================================

function sameIndices(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

function sameValues(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((value, i) => Object.is(value, b[i]));
}

/**
 * Structural equality of two gates.
 *
 * Angles and matrix entries are compared exactly (`Object.is`); callers
 * that need a tolerance compare parameters themselves.
 */
export function gatesEqual(a: QuantumGate, b: QuantumGate): boolean {
  if (a.type !== b.type) {
    return false;
  }
  if (isFixedSingleQubitGate(a) && isFixedSingleQubitGate(b)) {
    return a.qubit === b.qubit;
  }
  if (isRotationGate(a) && isRotationGate(b)) {
    return a.qubit === b.qubit && sameValues(a.params, b.params);
  }
  if (isControlledGate(a) && isControlledGate(b)) {
    return a.control === b.control && a.target === b.target;
  }
  if (isUnitaryMatrixGate(a) && isUnitaryMatrixGate(b)) {
    return sameIndices(a.targets, b.targets) && matricesIdentical(a.matrix, b.matrix);
  }
  if (a.type === 'SWAP' && b.type === 'SWAP') {
    return sameIndices(a.targets, b.targets);
  }
  if (a.type === 'TOFFOLI' && b.type === 'TOFFOLI') {
    return sameIndices(a.controls, b.controls) && a.target === b.target;
  }
  if (a.type === 'Pauli' && b.type === 'Pauli') {
    return sameIndices(a.targets, b.targets) && sameIndices(a.pauliIds, b.pauliIds);
  }
  if (a.type === 'PauliRotation' && b.type === 'PauliRotation') {
    return (
      sameIndices(a.targets, b.targets) &&
      sameIndices(a.pauliIds, b.pauliIds) &&
      Object.is(a.angle, b.angle)
    );
  }
  if (a.type === 'Measurement' && b.type === 'Measurement') {
    return sameIndices(a.qubits, b.qubits) && sameIndices(a.cbits, b.cbits);
  }
  return false;
}
