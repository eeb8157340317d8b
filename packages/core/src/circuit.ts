/**
 * Quantum Circuits
 *
 * Two handles over the same storage. An ImmutableQuantumCircuit is a
 * read-only snapshot that can be shared freely. A QuantumCircuit is a
 * builder that owns its storage; freezing it hands the current storage to
 * a snapshot without copying, and the builder copies the storage before
 * its next change so the snapshot stays as it was.
 */

import type { ComplexMatrixLike } from './complex';
import { prepareGates, type GateSequence } from './combine';
import { InvalidGateIndexError } from './errors';
import {
  CNOT,
  CZ,
  H,
  Identity,
  Pauli,
  PauliRotation,
  RX,
  RY,
  RZ,
  S,
  SWAP,
  Sdag,
  SingleQubitUnitaryMatrix,
  SqrtX,
  SqrtXdag,
  SqrtY,
  SqrtYdag,
  T,
  TOFFOLI,
  Tdag,
  TwoQubitUnitaryMatrix,
  U1,
  U2,
  U3,
  UnitaryMatrix,
  X,
  Y,
  Z,
  gateQubits,
  gatesEqual,
  type QuantumGate,
} from './gate';
import type { GateName } from './gate-names';
import { CircuitStorage, checkCounts, prepareGate } from './storage';

// ============================================================================
// Circuit Statistics
// ============================================================================

/**
 * Statistics about a circuit
 */
export interface CircuitStats {
  qubitCount: number;
  cbitCount: number;
  depth: number;
  totalGates: number;
  singleQubitGates: number;
  twoQubitGates: number;
  threeQubitGates: number;
  /**
   * Non-measurement gates on more than three qubits
   */
  multiQubitGates: number;
  measurements: number;
  gateBreakdown: Partial<Record<GateName, number>>;
}

// ============================================================================
// Immutable Circuit
// ============================================================================

/**
 * Read-only quantum circuit.
 *
 * A handle created by `freeze()` or by this constructor never changes,
 * so it may be shared as a template between programs. QuantumCircuit
 * extends this class, so every circuit can be read through it.
 *
 * @example
 * ```typescript
 * const template = new QuantumCircuit(2).addHGate(0).addCNOTGate(0, 1).freeze();
 *
 * const program = template.combine([RZ(1, Math.PI / 4)]);
 * program.measure([0, 1], [0, 1]);
 * ```
 */
export class ImmutableQuantumCircuit {
  protected _storage: CircuitStorage;

  /**
   * Create a snapshot handle of another circuit. Equivalent to
   * `circuit.freeze()`.
   */
  constructor(source: ImmutableQuantumCircuit | CircuitStorage) {
    this._storage = source instanceof CircuitStorage ? source : source.share();
  }

  // =========================================================================
  // Properties
  // =========================================================================

  /**
   * Number of qubits in the circuit
   */
  get qubitCount(): number {
    return this._storage.qubitCount;
  }

  /**
   * Number of classical bits in the circuit
   */
  get cbitCount(): number {
    return this._storage.cbitCount;
  }

  /**
   * Gates in execution order. This is a view, not a copy.
   */
  get gates(): readonly QuantumGate[] {
    return this._storage.gates;
  }

  /**
   * Number of gates in the circuit
   */
  get length(): number {
    return this._storage.gates.length;
  }

  /**
   * Number of layers when gates on disjoint wires run in parallel
   */
  get depth(): number {
    return this._storage.depth;
  }

  // =========================================================================
  // Derivation
  // =========================================================================

  /**
   * New circuit holding this circuit's gates followed by `gates`.
   *
   * The gates are validated against this circuit's counts and are not
   * remapped. This circuit is left unchanged.
   */
  combine(gates: GateSequence): QuantumCircuit {
    return this.getMutableCopy().extend(gates);
  }

  /**
   * Read-only handle on the current storage. No gates are copied.
   */
  freeze(): ImmutableQuantumCircuit {
    return new ImmutableQuantumCircuit(this);
  }

  /**
   * Independent circuit with a copy of this circuit's counts and gates
   */
  getMutableCopy(): QuantumCircuit {
    const copy = new QuantumCircuit(this.qubitCount, this.cbitCount);
    copy._storage = this._storage.clone();
    return copy;
  }

  // =========================================================================
  // Comparison
  // =========================================================================

  /**
   * Structural equality: same counts and pairwise-equal gates in order.
   *
   * Parameters and matrix entries must be identical; no tolerance applies.
   */
  equals(other: ImmutableQuantumCircuit): boolean {
    if (this === other || this._storage === other._storage) {
      return true;
    }
    if (
      this.qubitCount !== other.qubitCount ||
      this.cbitCount !== other.cbitCount ||
      this.length !== other.length
    ) {
      return false;
    }
    const theirs = other.gates;
    return this.gates.every((gate, i) => gatesEqual(gate, theirs[i]));
  }

  // =========================================================================
  // Statistics
  // =========================================================================

  /**
   * Get circuit statistics
   */
  getStats(): CircuitStats {
    const gateBreakdown: Partial<Record<GateName, number>> = {};
    let singleQubitGates = 0;
    let twoQubitGates = 0;
    let threeQubitGates = 0;
    let multiQubitGates = 0;
    let measurements = 0;

    for (const gate of this.gates) {
      gateBreakdown[gate.type] = (gateBreakdown[gate.type] ?? 0) + 1;

      if (gate.type === 'Measurement') {
        measurements++;
        continue;
      }
      switch (gateQubits(gate).length) {
        case 1:
          singleQubitGates++;
          break;
        case 2:
          twoQubitGates++;
          break;
        case 3:
          threeQubitGates++;
          break;
        default:
          multiQubitGates++;
      }
    }

    return {
      qubitCount: this.qubitCount,
      cbitCount: this.cbitCount,
      depth: this.depth,
      totalGates: this.length,
      singleQubitGates,
      twoQubitGates,
      threeQubitGates,
      multiQubitGates,
      measurements,
      gateBreakdown,
    };
  }

  /**
   * Storage for a new snapshot handle. Once shared, the storage is never
   * written again.
   */
  protected share(): CircuitStorage {
    this._storage.markShared();
    return this._storage;
  }
}

// ============================================================================
// Mutable Circuit
// ============================================================================

/**
 * Quantum circuit builder.
 *
 * Every insertion is validated against the circuit's qubit and classical
 * bit counts before anything changes, so a failed call leaves the circuit
 * as it was.
 *
 * @example
 * ```typescript
 * const circuit = new QuantumCircuit(3, 3)
 *   .addHGate(0)
 *   .addCNOTGate(0, 1)
 *   .addTOFFOLIGate(0, 1, 2)
 *   .measure([0, 1, 2], [0, 1, 2]);
 *
 * circuit.depth; // 4
 * ```
 */
export class QuantumCircuit extends ImmutableQuantumCircuit {
  /**
   * Create a new circuit
   * @param qubitCount Number of qubits, at least 1
   * @param cbitCount Number of classical bits
   * @param gates Initial gates, validated in order
   */
  constructor(qubitCount: number, cbitCount: number = 0, gates: readonly QuantumGate[] = []) {
    checkCounts(qubitCount, cbitCount);
    super(new CircuitStorage(qubitCount, cbitCount, prepareGates(gates, { qubitCount, cbitCount })));
  }

  // =========================================================================
  // Generic Insertion
  // =========================================================================

  /**
   * Insert a gate at `index`, appending by default
   */
  addGate(gate: QuantumGate, index: number = this.length): this {
    if (!Number.isInteger(index) || index < 0 || index > this.length) {
      throw new InvalidGateIndexError(index, this.length);
    }
    const prepared = prepareGate(gate, this._storage);
    this.writableStorage().insert(prepared, index);
    return this;
  }

  /**
   * Append a list of gates or another circuit's gates.
   *
   * Either every gate is appended or, if one is invalid, none is.
   */
  extend(gates: GateSequence): this {
    const prepared = prepareGates(gates, this._storage);
    if (prepared.length > 0) {
      this.writableStorage().append(prepared);
    }
    return this;
  }

  /**
   * Measure qubits into classical bits, pairing the lists by position.
   * A single index counts as a list of one.
   */
  measure(qubitIndices: number | readonly number[], classicalIndices: number | readonly number[]): this {
    const qubits = typeof qubitIndices === 'number' ? [qubitIndices] : qubitIndices;
    const cbits = typeof classicalIndices === 'number' ? [classicalIndices] : classicalIndices;
    return this.addGate({ type: 'Measurement', qubits, cbits });
  }

  // =========================================================================
  // Single-Qubit Gates
  // =========================================================================

  addIdentityGate(qubitIndex: number): this {
    return this.addGate(Identity(qubitIndex));
  }

  /**
   * Pauli-X gate (NOT)
   */
  addXGate(qubitIndex: number): this {
    return this.addGate(X(qubitIndex));
  }

  /**
   * Pauli-Y gate
   */
  addYGate(qubitIndex: number): this {
    return this.addGate(Y(qubitIndex));
  }

  /**
   * Pauli-Z gate
   */
  addZGate(qubitIndex: number): this {
    return this.addGate(Z(qubitIndex));
  }

  /**
   * Hadamard gate
   */
  addHGate(qubitIndex: number): this {
    return this.addGate(H(qubitIndex));
  }

  addSGate(qubitIndex: number): this {
    return this.addGate(S(qubitIndex));
  }

  addSdagGate(qubitIndex: number): this {
    return this.addGate(Sdag(qubitIndex));
  }

  addSqrtXGate(qubitIndex: number): this {
    return this.addGate(SqrtX(qubitIndex));
  }

  addSqrtXdagGate(qubitIndex: number): this {
    return this.addGate(SqrtXdag(qubitIndex));
  }

  addSqrtYGate(qubitIndex: number): this {
    return this.addGate(SqrtY(qubitIndex));
  }

  addSqrtYdagGate(qubitIndex: number): this {
    return this.addGate(SqrtYdag(qubitIndex));
  }

  addTGate(qubitIndex: number): this {
    return this.addGate(T(qubitIndex));
  }

  addTdagGate(qubitIndex: number): this {
    return this.addGate(Tdag(qubitIndex));
  }

  // =========================================================================
  // Parameterized Single-Qubit Gates
  // =========================================================================

  addU1Gate(qubitIndex: number, lambda: number): this {
    return this.addGate(U1(qubitIndex, lambda));
  }

  addU2Gate(qubitIndex: number, phi: number, lambda: number): this {
    return this.addGate(U2(qubitIndex, phi, lambda));
  }

  addU3Gate(qubitIndex: number, theta: number, phi: number, lambda: number): this {
    return this.addGate(U3(qubitIndex, theta, phi, lambda));
  }

  /**
   * Rotation around X-axis
   */
  addRXGate(qubitIndex: number, angle: number): this {
    return this.addGate(RX(qubitIndex, angle));
  }

  /**
   * Rotation around Y-axis
   */
  addRYGate(qubitIndex: number, angle: number): this {
    return this.addGate(RY(qubitIndex, angle));
  }

  /**
   * Rotation around Z-axis
   */
  addRZGate(qubitIndex: number, angle: number): this {
    return this.addGate(RZ(qubitIndex, angle));
  }

  // =========================================================================
  // Multi-Qubit Gates
  // =========================================================================

  /**
   * Controlled-NOT gate
   */
  addCNOTGate(controlIndex: number, targetIndex: number): this {
    return this.addGate(CNOT(controlIndex, targetIndex));
  }

  /**
   * Controlled-Z gate
   */
  addCZGate(controlIndex: number, targetIndex: number): this {
    return this.addGate(CZ(controlIndex, targetIndex));
  }

  addSWAPGate(targetIndex1: number, targetIndex2: number): this {
    return this.addGate(SWAP(targetIndex1, targetIndex2));
  }

  /**
   * Toffoli gate (CCNOT)
   */
  addTOFFOLIGate(controlIndex1: number, controlIndex2: number, targetIndex: number): this {
    return this.addGate(TOFFOLI(controlIndex1, controlIndex2, targetIndex));
  }

  // =========================================================================
  // Matrix and Pauli Gates
  // =========================================================================

  addUnitaryMatrixGate(targetIndices: readonly number[], unitaryMatrix: ComplexMatrixLike): this {
    return this.addGate(UnitaryMatrix(targetIndices, unitaryMatrix));
  }

  addSingleQubitUnitaryMatrixGate(targetIndex: number, unitaryMatrix: ComplexMatrixLike): this {
    return this.addGate(SingleQubitUnitaryMatrix(targetIndex, unitaryMatrix));
  }

  addTwoQubitUnitaryMatrixGate(
    targetIndex1: number,
    targetIndex2: number,
    unitaryMatrix: ComplexMatrixLike
  ): this {
    return this.addGate(TwoQubitUnitaryMatrix(targetIndex1, targetIndex2, unitaryMatrix));
  }

  addPauliGate(targetIndices: readonly number[], pauliIds: readonly number[]): this {
    return this.addGate(Pauli(targetIndices, pauliIds));
  }

  addPauliRotationGate(
    targetIndices: readonly number[],
    pauliIds: readonly number[],
    angle: number
  ): this {
    return this.addGate(PauliRotation(targetIndices, pauliIds, angle));
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  /**
   * Storage that may be written. A shared storage is copied first and the
   * copy replaces it for this circuit.
   */
  private writableStorage(): CircuitStorage {
    if (this._storage.shared) {
      this._storage = this._storage.clone();
    }
    return this._storage;
  }
}
