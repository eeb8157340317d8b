/**
 * Gate Names
 *
 * The `type` tag of every gate kind in the catalog, grouped by shape.
 */

// ============================================================================
// Gate Name Constants
// ============================================================================

export const GateNames = {
  Identity: 'Identity',
  X: 'X',
  Y: 'Y',
  Z: 'Z',
  H: 'H',
  S: 'S',
  Sdag: 'Sdag',
  SqrtX: 'SqrtX',
  SqrtXdag: 'SqrtXdag',
  SqrtY: 'SqrtY',
  SqrtYdag: 'SqrtYdag',
  T: 'T',
  Tdag: 'Tdag',
  U1: 'U1',
  U2: 'U2',
  U3: 'U3',
  RX: 'RX',
  RY: 'RY',
  RZ: 'RZ',
  CNOT: 'CNOT',
  CZ: 'CZ',
  SWAP: 'SWAP',
  TOFFOLI: 'TOFFOLI',
  UnitaryMatrix: 'UnitaryMatrix',
  SingleQubitUnitaryMatrix: 'SingleQubitUnitaryMatrix',
  TwoQubitUnitaryMatrix: 'TwoQubitUnitaryMatrix',
  Pauli: 'Pauli',
  PauliRotation: 'PauliRotation',
  Measurement: 'Measurement',
} as const;

// ============================================================================
// Gate Name Groups
// ============================================================================

/**
 * Single-qubit gates without parameters
 */
export const FIXED_SINGLE_QUBIT_GATE_NAMES = [
  GateNames.Identity,
  GateNames.X,
  GateNames.Y,
  GateNames.Z,
  GateNames.H,
  GateNames.S,
  GateNames.Sdag,
  GateNames.SqrtX,
  GateNames.SqrtXdag,
  GateNames.SqrtY,
  GateNames.SqrtYdag,
  GateNames.T,
  GateNames.Tdag,
] as const;

/**
 * Single-qubit phase and rotation gates
 */
export const ROTATION_GATE_NAMES = [
  GateNames.U1,
  GateNames.U2,
  GateNames.U3,
  GateNames.RX,
  GateNames.RY,
  GateNames.RZ,
] as const;

/**
 * Two-qubit gates with a control and a target
 */
export const CONTROLLED_GATE_NAMES = [GateNames.CNOT, GateNames.CZ] as const;

/**
 * Gates carrying an explicit unitary matrix
 */
export const UNITARY_MATRIX_GATE_NAMES = [
  GateNames.UnitaryMatrix,
  GateNames.SingleQubitUnitaryMatrix,
  GateNames.TwoQubitUnitaryMatrix,
] as const;

export type FixedSingleQubitGateName = (typeof FIXED_SINGLE_QUBIT_GATE_NAMES)[number];
export type RotationGateName = (typeof ROTATION_GATE_NAMES)[number];
export type ControlledGateName = (typeof CONTROLLED_GATE_NAMES)[number];
export type UnitaryMatrixGateName = (typeof UNITARY_MATRIX_GATE_NAMES)[number];

/**
 * All gate names
 */
export type GateName = (typeof GateNames)[keyof typeof GateNames];

/**
 * Number of angle parameters each rotation gate takes
 */
export const ROTATION_PARAM_COUNTS: Readonly<Record<RotationGateName, number>> = {
  U1: 1,
  U2: 2,
  U3: 3,
  RX: 1,
  RY: 1,
  RZ: 1,
};

/**
 * Number of targets a matrix gate requires, or undefined for any
 */
export const MATRIX_TARGET_COUNTS: Readonly<Record<UnitaryMatrixGateName, number | undefined>> = {
  UnitaryMatrix: undefined,
  SingleQubitUnitaryMatrix: 1,
  TwoQubitUnitaryMatrix: 2,
};

// ============================================================================
// Type Guards
// ============================================================================

function includes<T extends string>(names: readonly T[], name: string): name is T {
  return names.some((n) => n === name);
}

export function isFixedSingleQubitGateName(name: string): name is FixedSingleQubitGateName {
  return includes(FIXED_SINGLE_QUBIT_GATE_NAMES, name);
}

export function isRotationGateName(name: string): name is RotationGateName {
  return includes(ROTATION_GATE_NAMES, name);
}

export function isControlledGateName(name: string): name is ControlledGateName {
  return includes(CONTROLLED_GATE_NAMES, name);
}

export function isUnitaryMatrixGateName(name: string): name is UnitaryMatrixGateName {
  return includes(UNITARY_MATRIX_GATE_NAMES, name);
}

// ============================================================================
// Pauli Identifiers
// ============================================================================

export const PauliIds = {
  I: 0,
  X: 1,
  Y: 2,
  Z: 3,
} as const;

export type PauliId = (typeof PauliIds)[keyof typeof PauliIds];

export function isPauliId(value: number): value is PauliId {
  return value === 0 || value === 1 || value === 2 || value === 3;
}
