/**
 * Combine/Extend
 *
 * Gate sequences appended to a circuit come either as a plain list or as
 * another circuit. Only the source's gates are consumed: its counts are
 * not compared with the target's and no index is remapped, so the caller
 * is responsible for merging circuits built over the same qubit space.
 */

import type { QuantumGate } from './gate';
import { prepareGate, type CircuitBounds } from './storage';

/**
 * Anything exposing an ordered gate list, such as a circuit
 */
export interface GateSource {
  readonly gates: readonly QuantumGate[];
}

export type GateSequence = GateSource | readonly QuantumGate[];

function isGateSource(sequence: GateSequence): sequence is GateSource {
  return !Array.isArray(sequence);
}

/**
 * The gates of a sequence, in order
 */
export function resolveGateSequence(sequence: GateSequence): readonly QuantumGate[] {
  return isGateSource(sequence) ? sequence.gates : sequence;
}

/**
 * Validate every gate of a sequence against the target's bounds.
 *
 * Nothing is applied here; the first invalid gate throws with its
 * position in the sequence, so a caller that applies the result only
 * after this returns never mutates partially.
 */
export function prepareGates(sequence: GateSequence, bounds: CircuitBounds): QuantumGate[] {
  return resolveGateSequence(sequence).map((gate, gateIndex) =>
    prepareGate(gate, bounds, { gateIndex })
  );
}
