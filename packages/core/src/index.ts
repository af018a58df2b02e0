/**
 * @pauli-algebra/core
 *
 * Exact algebra of Pauli operators for stabilizer codes: single-qubit
 * Paulis, the phase group {1, -1, i, -i}, and sparse and dense
 * multi-qubit operators.
 *
 * @example
 * ```typescript
 * import { SparsePauliOperator, DensePauliOperator, Phase, X, Y, Z } from '@pauli-algebra/core';
 *
 * // Commutation of low-weight operators on many qubits
 * const a = SparsePauliOperator.create(1000, [1, 2, 3], [X, Y, Z]);
 * const b = SparsePauliOperator.create(1000, [2, 3, 4], [X, X, X]);
 * a.commutesWith(b); // true
 *
 * // Exact phase tracking
 * const p = DensePauliOperator.withPhaseAndPaulis(Phase.i(), [X, Y]);
 * p.multiply(DensePauliOperator.withPaulis([Y, Y])).toString(); // '-ZI'
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Single-Qubit Algebra
// ============================================================================

export { Phase, multiplyPhases } from './phase';
export type { ComplexValue, UnitComponent } from './phase';

export {
  I,
  X,
  Y,
  Z,
  PAULIS,
  isPauli,
  isTrivial,
  isNonTrivial,
  commutesWith,
  anticommutesWith,
  multiplyPaulis,
  multiplyPaulisWithPhase,
} from './pauli';
export type { Pauli, NonTrivialPauli, PhasedPauli } from './pauli';

// ============================================================================
// Multi-Qubit Operators
// ============================================================================

export { SparsePauliOperator } from './sparse-operator';
export type { RawSparseOperator } from './sparse-operator';

export { DensePauliOperator } from './dense-operator';
export type { RawDenseOperator } from './dense-operator';

export {
  singleQubitOperator,
  uniformOperator,
  repetitionCodeStabilizers,
  repetitionCodeLogicals,
} from './operators';
export type { LogicalOperators } from './operators';

// ============================================================================
// Errors
// ============================================================================

export { PauliError, PauliErrorCode, ok, err, unwrap } from './errors';
export type { PauliErrorDetail, PauliResult } from './errors';

// ============================================================================
// Version Info
// ============================================================================

export const VERSION = '0.1.0';
