/**
 * Single-qubit Pauli operators.
 *
 * The four operators I, X, Y and Z form a group under multiplication (up to
 * phase) and follow the usual commutation relations: two Paulis commute when
 * either is the identity or both are equal, and anticommute otherwise.
 */

import { Phase } from './phase';

// ============================================================================
// Pauli Type Definitions
// ============================================================================

/**
 * A single-qubit Pauli operator without a phase
 */
export type Pauli = 'I' | 'X' | 'Y' | 'Z';

/**
 * Non-identity Pauli operators
 */
export type NonTrivialPauli = Exclude<Pauli, 'I'>;

/**
 * Result of a phase-aware product: the correction phase and the Pauli
 */
export type PhasedPauli = readonly [phase: Phase, pauli: Pauli];

export const I = 'I' satisfies Pauli;
export const X = 'X' satisfies Pauli;
export const Y = 'Y' satisfies Pauli;
export const Z = 'Z' satisfies Pauli;

/**
 * All single-qubit Paulis
 */
export const PAULIS: readonly Pauli[] = Object.freeze([I, X, Y, Z]);

// ============================================================================
// Predicates
// ============================================================================

/**
 * Check if an arbitrary value is a Pauli
 */
export function isPauli(value: unknown): value is Pauli {
  return value === I || value === X || value === Y || value === Z;
}

/**
 * Check if the operator is the identity
 */
export function isTrivial(pauli: Pauli): pauli is 'I' {
  return pauli === I;
}

/**
 * Check if the operator is not the identity
 */
export function isNonTrivial(pauli: Pauli): pauli is NonTrivialPauli {
  return pauli !== I;
}

/**
 * Check if two Paulis commute
 *
 * @example
 * ```typescript
 * commutesWith(I, X); // true
 * commutesWith(Y, Y); // true
 * commutesWith(Z, X); // false
 * ```
 */
export function commutesWith(a: Pauli, b: Pauli): boolean {
  return a === I || b === I || a === b;
}

/**
 * Check if two Paulis anticommute
 */
export function anticommutesWith(a: Pauli, b: Pauli): boolean {
  return !commutesWith(a, b);
}

// ============================================================================
// Multiplication
// ============================================================================

/**
 * Product of two Paulis ignoring the phase.
 *
 * The result does not depend on the order of the operands.
 */
export function multiplyPaulis(a: Pauli, b: Pauli): Pauli {
  if (a === I) {
    return b;
  }
  if (a === b) {
    return I;
  }
  if (a === X && b === Y) {
    return Z;
  }
  if (a === Y && b === Z) {
    return X;
  }
  if (a === Z && b === X) {
    return Y;
  }
  return multiplyPaulis(b, a);
}

const ONE = Phase.one();
const PLUS_I = Phase.i();
const MINUS_I = Phase.minusI();

const PHASED_PRODUCTS: Readonly<Record<Pauli, Readonly<Record<Pauli, PhasedPauli>>>> = {
  I: { I: [ONE, I], X: [ONE, X], Y: [ONE, Y], Z: [ONE, Z] },
  X: { I: [ONE, X], X: [ONE, I], Y: [PLUS_I, Z], Z: [MINUS_I, Y] },
  Y: { I: [ONE, Y], X: [MINUS_I, Z], Y: [ONE, I], Z: [PLUS_I, X] },
  Z: { I: [ONE, Z], X: [PLUS_I, Y], Y: [MINUS_I, X], Z: [ONE, I] },
};

/**
 * Product of two Paulis as a (phase, Pauli) pair
 *
 * @example
 * ```typescript
 * multiplyPaulisWithPhase(X, Y); // [i, Z]
 * multiplyPaulisWithPhase(Y, X); // [-i, Z]
 * ```
 */
export function multiplyPaulisWithPhase(a: Pauli, b: Pauli): PhasedPauli {
  return PHASED_PRODUCTS[a][b];
}
