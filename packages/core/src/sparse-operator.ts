/**
 * Sparse Pauli Operator
 *
 * A multi-qubit Pauli operator is a string of single-qubit Paulis such as
 * `IXIX` or `XIYIZ`. Error-correcting codes act on thousands of qubits with
 * operators of small weight, so this representation keeps only the
 * non-identity entries, sorted by position, and ignores the global phase.
 */

import { PauliError, err, ok, unwrap, type PauliResult } from './errors';
import {
  X,
  Z,
  anticommutesWith,
  isNonTrivial,
  multiplyPaulis,
  type NonTrivialPauli,
  type Pauli,
} from './pauli';

/**
 * Backing storage of a sparse operator, as handed out by raw extraction
 */
export interface RawSparseOperator {
  length: number;
  positions: number[];
  paulis: Pauli[];
}

/**
 * Pauli operator optimized for sparse operations.
 *
 * Instances are canonical: positions are strictly increasing and below the
 * length, and identities are never stored.
 *
 * @example
 * ```typescript
 * // X_0 Y_2 Z_4, that is XIYIZ
 * const op = SparsePauliOperator.create(5, [0, 2, 4], [X, Y, Z]);
 * op.get(1);            // 'I'
 * op.weight;            // 3
 * op.toString();        // '[(0, X), (2, Y), (4, Z)]'
 * ```
 */
export class SparsePauliOperator implements Iterable<[number, NonTrivialPauli]> {
  private readonly _length: number;
  private readonly _positions: readonly number[];
  private readonly _paulis: readonly NonTrivialPauli[];

  private constructor(length: number, positions: number[], paulis: NonTrivialPauli[]) {
    this._length = length;
    this._positions = Object.freeze(positions);
    this._paulis = Object.freeze(paulis);
    Object.freeze(this);
  }

  // =========================================================================
  // Construction
  // =========================================================================

  /**
   * Build an operator from its length, the positions of its non-identity
   * elements and their values.
   *
   * Positions may come in any order. Entries sharing a position are
   * multiplied together and identities are discarded.
   */
  static tryCreate(
    length: number,
    positions: readonly number[],
    paulis: readonly Pauli[]
  ): PauliResult<SparsePauliOperator> {
    if (!Number.isInteger(length) || length < 0) {
      return err(PauliError.invalidLength(length));
    }
    if (positions.length !== paulis.length) {
      return err(PauliError.lengthMismatch(positions.length, paulis.length));
    }
    const outOfBound = positions.find(
      (position) => !Number.isInteger(position) || position < 0 || position >= length
    );
    if (outOfBound !== undefined) {
      return err(PauliError.outOfBound(outOfBound, length));
    }
    return ok(SparsePauliOperator.canonicalize(length, positions, paulis));
  }

  /**
   * Same as {@link SparsePauliOperator.tryCreate}, throwing on invalid input
   *
   * @throws {PauliError}
   */
  static create(
    length: number,
    positions: readonly number[],
    paulis: readonly Pauli[]
  ): SparsePauliOperator {
    return unwrap(SparsePauliOperator.tryCreate(length, positions, paulis));
  }

  /**
   * Identity operator on `length` qubits
   */
  static empty(length: number = 0): SparsePauliOperator {
    return SparsePauliOperator.create(length, [], []);
  }

  private static canonicalize(
    length: number,
    positions: readonly number[],
    paulis: readonly Pauli[]
  ): SparsePauliOperator {
    const order = positions
      .map((_, index) => index)
      .sort((a, b) => positions[a] - positions[b]);

    const mergedPositions: number[] = [];
    const mergedPaulis: Pauli[] = [];
    for (const index of order) {
      const last = mergedPositions.length - 1;
      if (last >= 0 && mergedPositions[last] === positions[index]) {
        mergedPaulis[last] = multiplyPaulis(mergedPaulis[last], paulis[index]);
      } else {
        mergedPositions.push(positions[index]);
        mergedPaulis.push(paulis[index]);
      }
    }

    const keptPositions: number[] = [];
    const keptPaulis: NonTrivialPauli[] = [];
    mergedPaulis.forEach((pauli, index) => {
      if (isNonTrivial(pauli)) {
        keptPositions.push(mergedPositions[index]);
        keptPaulis.push(pauli);
      }
    });
    return new SparsePauliOperator(length, keptPositions, keptPaulis);
  }

  // =========================================================================
  // Properties
  // =========================================================================

  /**
   * Number of qubits the operator acts on
   */
  get length(): number {
    return this._length;
  }

  /**
   * Number of non-identity elements
   */
  get weight(): number {
    return this._positions.length;
  }

  /**
   * Pauli at the given position, or undefined if the position is out of
   * bound
   */
  get(position: number): Pauli | undefined {
    if (!Number.isInteger(position) || position < 0 || position >= this._length) {
      return undefined;
    }
    const index = this.indexOf(position);
    return index < 0 ? 'I' : this._paulis[index];
  }

  /**
   * Positions of the non-identity elements, in increasing order
   */
  nonTrivialPositions(): readonly number[] {
    return this._positions;
  }

  /**
   * Non-identity elements, in the order of their positions
   */
  nonTrivialPaulis(): readonly NonTrivialPauli[] {
    return this._paulis;
  }

  /**
   * Iterate over (position, Pauli) pairs of non-identity elements
   */
  *entries(): IterableIterator<[number, NonTrivialPauli]> {
    for (let i = 0; i < this._positions.length; i++) {
      yield [this._positions[i], this._paulis[i]];
    }
  }

  [Symbol.iterator](): IterableIterator<[number, NonTrivialPauli]> {
    return this.entries();
  }

  // =========================================================================
  // Commutation
  // =========================================================================

  /**
   * Check if two operators commute.
   *
   * Only positions where both operators are non-trivial matter, so the
   * operators may have different lengths: the shorter one behaves as if
   * padded with identities.
   *
   * @example
   * ```typescript
   * const a = SparsePauliOperator.create(5, [1, 2, 3], [X, Y, Z]);
   * const b = SparsePauliOperator.create(5, [2, 3, 4], [X, X, X]);
   * const c = SparsePauliOperator.create(5, [0, 1], [Z, Z]);
   * a.commutesWith(b); // true
   * a.commutesWith(c); // false
   * ```
   */
  commutesWith(other: SparsePauliOperator): boolean {
    let anticommuting = 0;
    let i = 0;
    let j = 0;
    while (i < this._positions.length && j < other._positions.length) {
      const position = this._positions[i];
      const otherPosition = other._positions[j];
      if (position < otherPosition) {
        i++;
      } else if (position > otherPosition) {
        j++;
      } else {
        if (anticommutesWith(this._paulis[i], other._paulis[j])) {
          anticommuting++;
        }
        i++;
        j++;
      }
    }
    return anticommuting % 2 === 0;
  }

  /**
   * Check if two operators anticommute
   */
  anticommutesWith(other: SparsePauliOperator): boolean {
    return !this.commutesWith(other);
  }

  // =========================================================================
  // Multiplication
  // =========================================================================

  /**
   * Element-wise product of two operators, or a length mismatch error if
   * their lengths differ
   *
   * @example
   * ```typescript
   * const a = SparsePauliOperator.create(5, [1, 2, 3], [X, Y, Z]);
   * const b = SparsePauliOperator.create(5, [2, 3, 4], [Y, X, Z]);
   * unwrap(a.multiplyWith(b)).toString(); // '[(1, X), (3, Y), (4, Z)]'
   * ```
   */
  multiplyWith(other: SparsePauliOperator): PauliResult<SparsePauliOperator> {
    if (this._length !== other._length) {
      return err(PauliError.lengthMismatch(this._length, other._length));
    }

    const positions: number[] = [];
    const paulis: NonTrivialPauli[] = [];
    let i = 0;
    let j = 0;
    while (i < this._positions.length || j < other._positions.length) {
      const position = i < this._positions.length ? this._positions[i] : Infinity;
      const otherPosition = j < other._positions.length ? other._positions[j] : Infinity;
      if (position < otherPosition) {
        positions.push(position);
        paulis.push(this._paulis[i]);
        i++;
      } else if (position > otherPosition) {
        positions.push(otherPosition);
        paulis.push(other._paulis[j]);
        j++;
      } else {
        const product = multiplyPaulis(this._paulis[i], other._paulis[j]);
        if (isNonTrivial(product)) {
          positions.push(position);
          paulis.push(product);
        }
        i++;
        j++;
      }
    }
    return ok(new SparsePauliOperator(this._length, positions, paulis));
  }

  /**
   * Same as {@link SparsePauliOperator.multiplyWith}, throwing on a length
   * mismatch
   *
   * @throws {PauliError}
   */
  multiply(other: SparsePauliOperator): SparsePauliOperator {
    return unwrap(this.multiplyWith(other));
  }

  // =========================================================================
  // X/Z Decomposition
  // =========================================================================

  /**
   * X part of the operator: X and Y become X, Z is dropped
   */
  xPart(): SparsePauliOperator {
    return this.project(Z, X);
  }

  /**
   * Z part of the operator: Y and Z become Z, X is dropped
   */
  zPart(): SparsePauliOperator {
    return this.project(X, Z);
  }

  /**
   * Split the operator into an X-only and a Z-only operator whose product
   * is the original, up to phase
   */
  partitionXAndZ(): [SparsePauliOperator, SparsePauliOperator] {
    return [this.xPart(), this.zPart()];
  }

  // =========================================================================
  // Comparison and Conversion
  // =========================================================================

  equals(other: SparsePauliOperator): boolean {
    return (
      this._length === other._length &&
      this._positions.length === other._positions.length &&
      this._positions.every(
        (position, i) => position === other._positions[i] && this._paulis[i] === other._paulis[i]
      )
    );
  }

  /**
   * Format as a list of (position, Pauli) pairs
   */
  toString(): string {
    const pairs = Array.from(this.entries(), ([position, pauli]) => `(${position}, ${pauli})`);
    return `[${pairs.join(', ')}]`;
  }

  /**
   * Copy of the non-trivial positions
   */
  toRawPositions(): number[] {
    return [...this._positions];
  }

  /**
   * Copy of the non-trivial Paulis
   */
  toRawPaulis(): Pauli[] {
    return [...this._paulis];
  }

  /**
   * Copy of the backing storage. Passing it back to
   * {@link SparsePauliOperator.create} gives an equal operator.
   */
  toRaw(): RawSparseOperator {
    return {
      length: this._length,
      positions: this.toRawPositions(),
      paulis: this.toRawPaulis(),
    };
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private project(dropped: NonTrivialPauli, target: NonTrivialPauli): SparsePauliOperator {
    const positions: number[] = [];
    const paulis: NonTrivialPauli[] = [];
    this._paulis.forEach((pauli, i) => {
      if (pauli !== dropped) {
        positions.push(this._positions[i]);
        paulis.push(target);
      }
    });
    return new SparsePauliOperator(this._length, positions, paulis);
  }

  private indexOf(position: number): number {
    let low = 0;
    let high = this._positions.length - 1;
    while (low <= high) {
      const mid = (low + high) >>> 1;
      const value = this._positions[mid];
      if (value === position) {
        return mid;
      }
      if (value < position) {
        low = mid + 1;
      } else {
        high = mid - 1;
      }
    }
    return -1;
  }
}
