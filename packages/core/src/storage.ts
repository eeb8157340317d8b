/**
 * Circuit Storage
 *
 * The raw container behind both circuit handles: fixed qubit and
 * classical-bit counts plus the ordered gate list. Once a storage has been
 * handed to an immutable handle it is marked shared and refuses further
 * mutation; owners copy it first.
 */

import { calculateDepth } from './depth';
import { IndexOutOfRangeError, type CircuitErrorOptions } from './errors';
import { gateCbits, gateQubits, normalizeGate, type QuantumGate } from './gate';

/**
 * Qubit and classical-bit counts a gate is checked against
 */
export interface CircuitBounds {
  readonly qubitCount: number;
  readonly cbitCount: number;
}

/**
 * Throw a RangeError unless the counts describe a valid circuit
 */
export function checkCounts(qubitCount: number, cbitCount: number): void {
  if (!Number.isInteger(qubitCount) || qubitCount < 1) {
    throw new RangeError(`qubitCount must be a positive integer, got ${qubitCount}`);
  }
  if (!Number.isInteger(cbitCount) || cbitCount < 0) {
    throw new RangeError(`cbitCount must be a non-negative integer, got ${cbitCount}`);
  }
}

function checkIndex(
  wire: 'qubit' | 'cbit',
  index: number,
  count: number,
  options?: CircuitErrorOptions
): void {
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw new IndexOutOfRangeError(wire, index, count, options);
  }
}

/**
 * Check every wire of a gate against the circuit's counts
 */
export function checkGateBounds(
  gate: QuantumGate,
  bounds: CircuitBounds,
  options?: CircuitErrorOptions
): void {
  for (const qubit of gateQubits(gate)) {
    checkIndex('qubit', qubit, bounds.qubitCount, options);
  }
  for (const cbit of gateCbits(gate)) {
    checkIndex('cbit', cbit, bounds.cbitCount, options);
  }
}

/**
 * Validate a gate for insertion into a circuit with the given bounds and
 * return the frozen copy to store
 */
export function prepareGate(
  gate: QuantumGate,
  bounds: CircuitBounds,
  options?: CircuitErrorOptions
): QuantumGate {
  const normalized = normalizeGate(gate, options);
  checkGateBounds(normalized, bounds, options);
  return normalized;
}

export class CircuitStorage implements CircuitBounds {
  readonly qubitCount: number;
  readonly cbitCount: number;
  private readonly _gates: QuantumGate[];
  private _shared: boolean = false;
  private _depth: number | undefined;

  /**
   * Create storage over gates that have already been prepared for these
   * bounds
   */
  constructor(qubitCount: number, cbitCount: number, gates: QuantumGate[] = []) {
    checkCounts(qubitCount, cbitCount);
    this.qubitCount = qubitCount;
    this.cbitCount = cbitCount;
    this._gates = gates;
  }

  get gates(): readonly QuantumGate[] {
    return this._gates;
  }

  get depth(): number {
    if (this._depth === undefined) {
      this._depth = calculateDepth(this);
    }
    return this._depth;
  }

  /**
   * Whether an immutable handle references this storage
   */
  get shared(): boolean {
    return this._shared;
  }

  markShared(): void {
    this._shared = true;
  }

  /**
   * Unshared copy with the same counts and gate order.
   * Gates are frozen, so the copy holds the same gate objects.
   */
  clone(): CircuitStorage {
    return new CircuitStorage(this.qubitCount, this.cbitCount, [...this._gates]);
  }

  insert(gate: QuantumGate, position: number): void {
    this.assertWritable();
    this._gates.splice(position, 0, gate);
    this._depth = undefined;
  }

  append(gates: readonly QuantumGate[]): void {
    this.assertWritable();
    for (const gate of gates) {
      this._gates.push(gate);
    }
    this._depth = undefined;
  }

  private assertWritable(): void {
    if (this._shared) {
      throw new Error('Circuit storage is shared and cannot be modified');
    }
  }
}
