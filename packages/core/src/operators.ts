/**
 * Common Operators
 *
 * Builders for operators that show up repeatedly when working with
 * stabilizer codes.
 */

import { DensePauliOperator } from './dense-operator';
import { X, Z, type Pauli } from './pauli';
import { SparsePauliOperator } from './sparse-operator';

/**
 * Logical operators of a code
 */
export interface LogicalOperators {
  x: SparsePauliOperator;
  z: SparsePauliOperator;
}

/**
 * Create an operator acting with `pauli` on a single qubit
 *
 * @throws {PauliError} if the position is out of bound
 */
export function singleQubitOperator(
  length: number,
  position: number,
  pauli: Pauli
): SparsePauliOperator {
  return SparsePauliOperator.create(length, [position], [pauli]);
}

/**
 * Create a dense operator applying the same Pauli on every qubit
 */
export function uniformOperator(length: number, pauli: Pauli): DensePauliOperator {
  return DensePauliOperator.identity(length).multiply(pauli);
}

/**
 * Stabilizer generators Z_k Z_{k+1} of the bit-flip repetition code
 */
export function repetitionCodeStabilizers(length: number): SparsePauliOperator[] {
  if (!Number.isInteger(length) || length < 2) {
    throw new Error('Repetition code needs at least 2 qubits');
  }
  return Array.from({ length: length - 1 }, (_, k) =>
    SparsePauliOperator.create(length, [k, k + 1], [Z, Z])
  );
}

/**
 * Logical X (X on every qubit) and logical Z (Z on the first qubit) of the
 * bit-flip repetition code
 */
export function repetitionCodeLogicals(length: number): LogicalOperators {
  if (!Number.isInteger(length) || length < 2) {
    throw new Error('Repetition code needs at least 2 qubits');
  }
  const positions = Array.from({ length }, (_, i) => i);
  return {
    x: SparsePauliOperator.create(length, positions, positions.map(() => X)),
    z: singleQubitOperator(length, 0, Z),
  };
}
