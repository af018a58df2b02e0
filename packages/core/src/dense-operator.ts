/**
 * Dense Pauli Operator
 *
 * A global phase together with one single-qubit Pauli per qubit. Unlike
 * the sparse representation, the phase is tracked exactly through every
 * product, which makes this form suited to composing gate sequences.
 */

import { PauliError } from './errors';
import {
  anticommutesWith,
  isNonTrivial,
  isPauli,
  multiplyPaulisWithPhase,
  type NonTrivialPauli,
  type Pauli,
} from './pauli';
import { Phase } from './phase';

/**
 * Backing storage of a dense operator, as handed out by raw extraction
 */
export interface RawDenseOperator {
  phase: Phase;
  paulis: Pauli[];
}

/**
 * Dense Pauli operator with a global phase.
 *
 * @example
 * ```typescript
 * // i XYZ
 * const op = DensePauliOperator.withPhaseAndPaulis(Phase.i(), [X, Y, Z]);
 * const xs = DensePauliOperator.withPaulis([X, X, X]);
 *
 * xs.multiply(Phase.minusI()).toString(); // '-iXXX'
 * xs.multiply(Y).toString();              // '-iZZZ'
 * op.commutesWith(xs);                    // true
 * op.multiply(xs).toString();             // '+iIZY'
 * ```
 */
export class DensePauliOperator {
  private readonly _paulis: readonly Pauli[];
  private readonly _phase: Phase;

  private constructor(phase: Phase, paulis: Pauli[]) {
    this._phase = phase;
    this._paulis = Object.freeze(paulis);
    Object.freeze(this);
  }

  // =========================================================================
  // Construction
  // =========================================================================

  /**
   * Operator on zero qubits with phase 1
   */
  static empty(): DensePauliOperator {
    return new DensePauliOperator(Phase.one(), []);
  }

  /**
   * Identity on `length` qubits with phase 1
   *
   * @throws {PauliError} if the length is not a non-negative integer
   */
  static identity(length: number): DensePauliOperator {
    if (!Number.isInteger(length) || length < 0) {
      throw PauliError.invalidLength(length);
    }
    return new DensePauliOperator(Phase.one(), new Array<Pauli>(length).fill('I'));
  }

  /**
   * Operator with the given Paulis and a phase of 1
   */
  static withPaulis(paulis: readonly Pauli[]): DensePauliOperator {
    return new DensePauliOperator(Phase.one(), [...paulis]);
  }

  /**
   * Operator with the given phase and Paulis
   */
  static withPhaseAndPaulis(phase: Phase, paulis: readonly Pauli[]): DensePauliOperator {
    return new DensePauliOperator(phase, [...paulis]);
  }

  // =========================================================================
  // Properties
  // =========================================================================

  get length(): number {
    return this._paulis.length;
  }

  get phase(): Phase {
    return this._phase;
  }

  get paulis(): readonly Pauli[] {
    return this._paulis;
  }

  /**
   * Number of non-identity elements
   */
  get weight(): number {
    return this._paulis.filter(isNonTrivial).length;
  }

  isEmpty(): boolean {
    return this._paulis.length === 0;
  }

  /**
   * Pauli at the given position, or undefined if the position is out of
   * bound
   */
  get(position: number): Pauli | undefined {
    if (!Number.isInteger(position) || position < 0 || position >= this._paulis.length) {
      return undefined;
    }
    return this._paulis[position];
  }

  /**
   * Positions where the Pauli is not the identity
   *
   * @example
   * ```typescript
   * const op = DensePauliOperator.withPaulis([X, I, Y, I, Z, I]);
   * [...op.nonTrivialPositions()]; // [0, 2, 4]
   * ```
   */
  *nonTrivialPositions(): IterableIterator<number> {
    for (const [position] of this.nonTrivialPaulis()) {
      yield position;
    }
  }

  /**
   * (position, Pauli) pairs where the Pauli is not the identity
   */
  *nonTrivialPaulis(): IterableIterator<[number, NonTrivialPauli]> {
    for (let position = 0; position < this._paulis.length; position++) {
      const pauli = this._paulis[position];
      if (isNonTrivial(pauli)) {
        yield [position, pauli];
      }
    }
  }

  // =========================================================================
  // Commutation
  // =========================================================================

  /**
   * Check if two operators commute
   *
   * @throws {PauliError} if the operators have different lengths
   */
  commutesWith(other: DensePauliOperator): boolean {
    return this.countAnticommuting(other) % 2 === 0;
  }

  /**
   * Check if two operators anticommute
   *
   * @throws {PauliError} if the operators have different lengths
   */
  anticommutesWith(other: DensePauliOperator): boolean {
    return this.countAnticommuting(other) % 2 === 1;
  }

  // =========================================================================
  // Multiplication
  // =========================================================================

  /**
   * Product with another operator of the same length. Phases of both
   * operands and of every single-qubit product accumulate into the result.
   *
   * @throws {PauliError} if the operators have different lengths
   */
  multiply(other: DensePauliOperator): DensePauliOperator;
  /**
   * Same operator with its phase multiplied by `phase`
   */
  multiply(phase: Phase): DensePauliOperator;
  /**
   * Product with `pauli` applied on every qubit
   */
  multiply(pauli: Pauli): DensePauliOperator;
  multiply(other: DensePauliOperator | Phase | Pauli): DensePauliOperator {
    if (other instanceof Phase) {
      return new DensePauliOperator(this._phase.multiply(other), [...this._paulis]);
    }
    if (isPauli(other)) {
      const pauli = other;
      return this.multiplyEach(() => pauli, this._phase);
    }
    const operator = other;
    this.assertSameLength(operator);
    return this.multiplyEach(
      (position) => operator._paulis[position],
      this._phase.multiply(operator._phase)
    );
  }

  // =========================================================================
  // Comparison and Conversion
  // =========================================================================

  equals(other: DensePauliOperator): boolean {
    return (
      this._phase.equals(other._phase) &&
      this._paulis.length === other._paulis.length &&
      this._paulis.every((pauli, i) => pauli === other._paulis[i])
    );
  }

  /**
   * Format as a phase prefix followed by the Pauli string, e.g. `-iXIZ`
   */
  toString(): string {
    const sign = this._phase.real + this._phase.imag > 0 ? '+' : '-';
    const unit = this._phase.isReal() ? '' : 'i';
    return `${sign}${unit}${this._paulis.join('')}`;
  }

  /**
   * Copy of the phase and Paulis
   */
  toRaw(): RawDenseOperator {
    return { phase: this._phase, paulis: [...this._paulis] };
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private multiplyEach(
    right: (position: number) => Pauli,
    phase: Phase
  ): DensePauliOperator {
    let total = phase;
    const paulis = this._paulis.map((pauli, position) => {
      const [factor, product] = multiplyPaulisWithPhase(pauli, right(position));
      total = total.multiply(factor);
      return product;
    });
    return new DensePauliOperator(total, paulis);
  }

  private countAnticommuting(other: DensePauliOperator): number {
    this.assertSameLength(other);
    return this._paulis.filter((pauli, i) => anticommutesWith(pauli, other._paulis[i])).length;
  }

  private assertSameLength(other: DensePauliOperator): void {
    if (this._paulis.length !== other._paulis.length) {
      throw PauliError.lengthMismatch(this._paulis.length, other._paulis.length);
    }
  }
}
