/**
 * Tests for the gate catalog
 */

import { describe, it, expect } from 'vitest';
import {
  CNOT,
  CZ,
  H,
  Identity,
  Measurement,
  Pauli,
  PauliRotation,
  RX,
  RY,
  RZ,
  SWAP,
  SingleQubitUnitaryMatrix,
  SqrtX,
  TOFFOLI,
  Tdag,
  TwoQubitUnitaryMatrix,
  U1,
  U2,
  U3,
  UnitaryMatrix,
  X,
  gateCbits,
  gateQubits,
  gatesEqual,
  normalizeGate,
  validateGate,
  isControlledGate,
  isFixedSingleQubitGate,
  isRotationGate,
  isUnitaryMatrixGate,
  type QuantumGate,
} from '../gate';
import { complex } from '../complex';
import {
  DimensionMismatchError,
  DuplicateIndexError,
  InvalidGateError,
  LengthMismatchError,
} from '../errors';
import { catchError } from './helpers';

const PAULI_X = [
  [0, 1],
  [1, 0],
];

const IDENTITY_4 = [
  [1, 0, 0, 0],
  [0, 1, 0, 0],
  [0, 0, 1, 0],
  [0, 0, 0, 1],
];

describe('Fixed Single-Qubit Gates', () => {
  it('creates gates with a single qubit', () => {
    expect(H(0)).toEqual({ type: 'H', qubit: 0 });
    expect(X(2)).toEqual({ type: 'X', qubit: 2 });
    expect(Identity(1)).toEqual({ type: 'Identity', qubit: 1 });
    expect(SqrtX(3)).toEqual({ type: 'SqrtX', qubit: 3 });
    expect(Tdag(0)).toEqual({ type: 'Tdag', qubit: 0 });
  });

  it('does not check circuit bounds', () => {
    expect(H(-1)).toEqual({ type: 'H', qubit: -1 });
    expect(H(1000)).toEqual({ type: 'H', qubit: 1000 });
  });
});

describe('Rotation Gates', () => {
  it('stores angles in order', () => {
    expect(RX(1, Math.PI / 2)).toEqual({ type: 'RX', qubit: 1, params: [Math.PI / 2] });
    expect(RY(0, 0.25).params).toEqual([0.25]);
    expect(RZ(0, -1).params).toEqual([-1]);
    expect(U1(0, 0.5).params).toEqual([0.5]);
    expect(U2(0, 0.1, 0.2).params).toEqual([0.1, 0.2]);
    expect(U3(0, Math.PI, Math.PI / 2, Math.PI / 4).params).toEqual([
      Math.PI,
      Math.PI / 2,
      Math.PI / 4,
    ]);
  });

  it('rejects the wrong number of parameters', () => {
    const gate: QuantumGate = { type: 'U3', qubit: 0, params: [1, 2] };
    const error = catchError(() => normalizeGate(gate), LengthMismatchError);
    expect(error.message).toBe('U3 parameters: expected 3, got 2');
    expect(error.kind).toBe('LengthMismatch');
  });

  it('rejects a non-numeric parameter', () => {
    const gate: QuantumGate = JSON.parse('{"type":"RX","qubit":0,"params":["half"]}');
    expect(() => normalizeGate(gate)).toThrow(InvalidGateError);
    expect(() => normalizeGate(gate)).toThrow('RX parameter 0 must be a number, got half');
  });
});

describe('Two- and Three-Qubit Gates', () => {
  it('creates controlled gates', () => {
    expect(CNOT(0, 1)).toEqual({ type: 'CNOT', control: 0, target: 1 });
    expect(CZ(2, 0)).toEqual({ type: 'CZ', control: 2, target: 0 });
  });

  it('creates SWAP with symmetric targets', () => {
    expect(SWAP(2, 0)).toEqual({ type: 'SWAP', targets: [2, 0] });
  });

  it('creates TOFFOLI with two controls', () => {
    expect(TOFFOLI(0, 1, 2)).toEqual({ type: 'TOFFOLI', controls: [0, 1], target: 2 });
  });

  it('rejects repeated qubits', () => {
    const error = catchError(() => CNOT(1, 1), DuplicateIndexError);
    expect(error.message).toBe('Index 1 repeated in [1, 1]');
    expect(error.duplicate).toBe(1);
    expect(() => SWAP(3, 3)).toThrow(DuplicateIndexError);
    expect(() => TOFFOLI(0, 1, 0)).toThrow('Index 0 repeated in [0, 1, 0]');
  });
});

describe('Unitary Matrix Gates', () => {
  it('converts real entries to complex values', () => {
    const gate = SingleQubitUnitaryMatrix(0, PAULI_X);
    expect(gate.type).toBe('SingleQubitUnitaryMatrix');
    expect(gate.targets).toEqual([0]);
    expect(gate.matrix).toEqual([
      [
        { real: 0, imag: 0 },
        { real: 1, imag: 0 },
      ],
      [
        { real: 1, imag: 0 },
        { real: 0, imag: 0 },
      ],
    ]);
  });

  it('keeps complex entries', () => {
    const gate = UnitaryMatrix([1], [
      [complex(0), complex(0, -1)],
      [complex(0, 1), complex(0)],
    ]);
    expect(gate.matrix[0][1]).toEqual({ real: 0, imag: -1 });
    expect(gate.matrix[1][0]).toEqual({ real: 0, imag: 1 });
  });

  it('accepts a 4x4 matrix on two targets', () => {
    const gate = TwoQubitUnitaryMatrix(0, 2, IDENTITY_4);
    expect(gate.targets).toEqual([0, 2]);
    expect(gate.matrix).toHaveLength(4);
  });

  it('rejects a matrix whose side is not 2^targets', () => {
    const error = catchError(() => UnitaryMatrix([0, 1], PAULI_X), DimensionMismatchError);
    expect(error.message).toBe('Matrix must be 4x4, got 2 rows with lengths [2, 2]');
    expect(error.kind).toBe('DimensionMismatch');
    expect(() => SingleQubitUnitaryMatrix(0, IDENTITY_4)).toThrow(DimensionMismatchError);
  });

  it('rejects a ragged matrix', () => {
    expect(() => UnitaryMatrix([0], [[1, 0], [0]])).toThrow(
      'Matrix must be 2x2, got 2 rows with lengths [2, 1]'
    );
  });

  it('rejects repeated targets', () => {
    expect(() => TwoQubitUnitaryMatrix(1, 1, IDENTITY_4)).toThrow(DuplicateIndexError);
  });

  it('requires the fixed target count of specialised kinds', () => {
    const gate: QuantumGate = {
      type: 'SingleQubitUnitaryMatrix',
      targets: [0, 1],
      matrix: IDENTITY_4.map((row) => row.map((v) => complex(v))),
    };
    expect(() => normalizeGate(gate)).toThrow(
      'SingleQubitUnitaryMatrix targets: expected 1, got 2'
    );
  });

  it('rejects an empty target list', () => {
    expect(() => UnitaryMatrix([], [[1]])).toThrow('UnitaryMatrix targets must not be empty');
  });
});

describe('Pauli Gates', () => {
  it('creates a Pauli string', () => {
    expect(Pauli([0, 1], [1, 2])).toEqual({ type: 'Pauli', targets: [0, 1], pauliIds: [1, 2] });
  });

  it('creates a Pauli rotation', () => {
    expect(PauliRotation([0, 1, 2], [1, 2, 3], Math.PI / 3)).toEqual({
      type: 'PauliRotation',
      targets: [0, 1, 2],
      pauliIds: [1, 2, 3],
      angle: Math.PI / 3,
    });
  });

  it('rejects a Pauli id list of another length', () => {
    const error = catchError(() => Pauli([0, 1], [1]), LengthMismatchError);
    expect(error.message).toBe('Pauli ids per target: expected 2, got 1');
    expect(error.expected).toBe(2);
    expect(error.actual).toBe(1);
  });

  it('rejects Pauli ids outside 0..3', () => {
    expect(() => Pauli([0], [4])).toThrow(InvalidGateError);
    expect(() => PauliRotation([0], [-1], 0.5)).toThrow(
      'Pauli id -1 is not one of 0 (I), 1 (X), 2 (Y), 3 (Z)'
    );
  });

  it('rejects repeated targets', () => {
    expect(() => Pauli([0, 0], [1, 1])).toThrow(DuplicateIndexError);
  });

  it('rejects an empty Pauli string', () => {
    expect(() => Pauli([], [])).toThrow('Pauli targets must not be empty');
  });
});

describe('Measurement', () => {
  it('pairs qubits and classical bits by position', () => {
    expect(Measurement([0, 1], [1, 0])).toEqual({
      type: 'Measurement',
      qubits: [0, 1],
      cbits: [1, 0],
    });
  });

  it('rejects lists of different lengths', () => {
    expect(() => Measurement([0, 1], [0])).toThrow(LengthMismatchError);
  });

  it('rejects repeated qubits or classical bits', () => {
    expect(() => Measurement([0, 0], [0, 1])).toThrow('Index 0 repeated in [0, 0]');
    expect(() => Measurement([0, 1], [1, 1])).toThrow('Index 1 repeated in [1, 1]');
  });
});

describe('Normalization', () => {
  it('returns a frozen copy of a literal gate', () => {
    const literal: QuantumGate = { type: 'RZ', qubit: 0, params: [0.5] };
    const normalized = normalizeGate(literal);
    expect(normalized).not.toBe(literal);
    expect(normalized).toEqual(literal);
    expect(Object.isFrozen(normalized)).toBe(true);
  });

  it('freezes nested lists and matrices', () => {
    const rotation = RX(0, 1);
    expect(Object.isFrozen(rotation.params)).toBe(true);

    const matrixGate = SingleQubitUnitaryMatrix(0, PAULI_X);
    expect(Object.isFrozen(matrixGate.matrix)).toBe(true);
    expect(Object.isFrozen(matrixGate.matrix[0])).toBe(true);
    expect(Object.isFrozen(matrixGate.matrix[0][0])).toBe(true);
  });

  it('rejects an unknown gate type', () => {
    const gate: QuantumGate = JSON.parse('{"type":"Fredkin","qubits":[0,1,2]}');
    const error = catchError(() => validateGate(gate), InvalidGateError);
    expect(error.message).toBe('Unknown gate type: Fredkin');
    expect(error.kind).toBe('InvalidGate');
  });

  it('accepts a well-formed gate', () => {
    expect(() => validateGate(CNOT(0, 1))).not.toThrow();
  });

  it('attaches the gate position when given', () => {
    const duplicate = catchError(
      () => validateGate({ type: 'CZ', control: 2, target: 2 }, { gateIndex: 4 }),
      DuplicateIndexError
    );
    expect(duplicate.gateIndex).toBe(4);
    expect(duplicate.message).toBe('Gate 4: Index 2 repeated in [2, 2]');
  });
});

describe('Wires', () => {
  it('lists qubits with controls first', () => {
    expect(gateQubits(H(3))).toEqual([3]);
    expect(gateQubits(RX(1, 0.5))).toEqual([1]);
    expect(gateQubits(CNOT(2, 0))).toEqual([2, 0]);
    expect(gateQubits(SWAP(1, 0))).toEqual([1, 0]);
    expect(gateQubits(TOFFOLI(0, 1, 2))).toEqual([0, 1, 2]);
    expect(gateQubits(Pauli([3, 1], [1, 3]))).toEqual([3, 1]);
    expect(gateQubits(Measurement([0, 2], [1, 0]))).toEqual([0, 2]);
  });

  it('lists classical bits of measurements only', () => {
    expect(gateCbits(Measurement([0, 2], [1, 0]))).toEqual([1, 0]);
    expect(gateCbits(H(0))).toEqual([]);
    expect(gateCbits(CNOT(0, 1))).toEqual([]);
  });
});

describe('Type Guards', () => {
  it('classifies gates by shape', () => {
    expect(isFixedSingleQubitGate(H(0))).toBe(true);
    expect(isFixedSingleQubitGate(RX(0, 1))).toBe(false);
    expect(isRotationGate(U2(0, 1, 2))).toBe(true);
    expect(isControlledGate(CZ(0, 1))).toBe(true);
    expect(isControlledGate(SWAP(0, 1))).toBe(false);
    expect(isUnitaryMatrixGate(SingleQubitUnitaryMatrix(0, PAULI_X))).toBe(true);
  });
});

describe('Gate Equality', () => {
  it('compares kind and indices', () => {
    expect(gatesEqual(H(0), H(0))).toBe(true);
    expect(gatesEqual(H(0), H(1))).toBe(false);
    expect(gatesEqual(H(0), X(0))).toBe(false);
    expect(gatesEqual(CNOT(0, 1), CNOT(0, 1))).toBe(true);
    expect(gatesEqual(CNOT(0, 1), CZ(0, 1))).toBe(false);
    expect(gatesEqual(SWAP(0, 1), SWAP(1, 0))).toBe(false);
    expect(gatesEqual(TOFFOLI(0, 1, 2), TOFFOLI(0, 1, 2))).toBe(true);
    expect(gatesEqual(Measurement([0], [0]), Measurement([0], [1]))).toBe(false);
  });

  it('compares angles exactly', () => {
    expect(gatesEqual(RX(0, 0.5), RX(0, 0.5))).toBe(true);
    expect(gatesEqual(RX(0, 0.5), RX(0, 0.5000001))).toBe(false);
    expect(gatesEqual(RX(0, 0.5), RY(0, 0.5))).toBe(false);
    expect(gatesEqual(RZ(0, 0), RZ(0, -0))).toBe(false);
    expect(gatesEqual(PauliRotation([0], [3], 1), PauliRotation([0], [3], 1))).toBe(true);
    expect(gatesEqual(PauliRotation([0], [3], 1), PauliRotation([0], [3], 2))).toBe(false);
  });

  it('compares Pauli ids', () => {
    expect(gatesEqual(Pauli([0, 1], [1, 2]), Pauli([0, 1], [1, 2]))).toBe(true);
    expect(gatesEqual(Pauli([0, 1], [1, 2]), Pauli([0, 1], [2, 1]))).toBe(false);
  });

  it('compares matrix entries exactly', () => {
    const a = SingleQubitUnitaryMatrix(0, PAULI_X);
    const b = SingleQubitUnitaryMatrix(0, [
      [complex(0), complex(1)],
      [complex(1), complex(0)],
    ]);
    const c = SingleQubitUnitaryMatrix(0, [
      [complex(0), complex(1, 1e-15)],
      [complex(1), complex(0)],
    ]);
    expect(gatesEqual(a, b)).toBe(true);
    expect(gatesEqual(a, c)).toBe(false);
    expect(gatesEqual(a, UnitaryMatrix([0], PAULI_X))).toBe(false);
  });
});
