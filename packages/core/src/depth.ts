/**
 * Depth Analyzer
 */

import { gateCbits, gateQubits } from './gate';
import type { GateSource } from './combine';

/**
 * Calculate circuit depth: the number of layers when every gate runs as
 * early as the gates before it on the same qubit or classical bit allow.
 * Only wires that some gate touches are tracked.
 */
export function calculateDepth(circuit: GateSource): number {
  const qubitDepths = new Map<number, number>();
  const cbitDepths = new Map<number, number>();
  let depth = 0;

  for (const gate of circuit.gates) {
    const qubits = gateQubits(gate);
    const cbits = gateCbits(gate);

    let layer = 0;
    for (const q of qubits) {
      layer = Math.max(layer, qubitDepths.get(q) ?? 0);
    }
    for (const c of cbits) {
      layer = Math.max(layer, cbitDepths.get(c) ?? 0);
    }
    layer += 1;

    for (const q of qubits) {
      qubitDepths.set(q, layer);
    }
    for (const c of cbits) {
      cbitDepths.set(c, layer);
    }
    depth = Math.max(depth, layer);
  }

  return depth;
}
