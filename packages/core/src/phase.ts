/**
 * Global phases for Pauli operators.
 *
 * A phase is one of the four units 1, -1, i and -i of the Gaussian
 * integers. The units form a cyclic group of order 4, so products are
 * computed exactly and always land back on one of the four instances.
 */

/**
 * Component of a unit Gaussian integer
 */
export type UnitComponent = -1 | 0 | 1;

/**
 * Plain complex record, compatible with amplitude utilities
 */
export interface ComplexValue {
  real: number;
  imag: number;
}

/**
 * One of the four phases 1, -1, i, -i.
 *
 * Instances are canonical: each unit exists exactly once, so `===` and
 * {@link Phase.equals} agree.
 *
 * @example
 * ```typescript
 * Phase.minusOne().multiply(Phase.i()); // -i
 * Phase.i().multiply(Phase.minusI());   // 1
 * ```
 */
export class Phase {
  private static readonly ONE = new Phase(1, 0, '1');
  private static readonly MINUS_ONE = new Phase(-1, 0, '-1');
  private static readonly I = new Phase(0, 1, 'i');
  private static readonly MINUS_I = new Phase(0, -1, '-i');

  private readonly _real: UnitComponent;
  private readonly _imag: UnitComponent;
  private readonly _label: string;

  private constructor(real: UnitComponent, imag: UnitComponent, label: string) {
    this._real = real;
    this._imag = imag;
    this._label = label;
    Object.freeze(this);
  }

  // =========================================================================
  // Constructors
  // =========================================================================

  /**
   * Phase 1
   */
  static one(): Phase {
    return Phase.ONE;
  }

  /**
   * Phase -1
   */
  static minusOne(): Phase {
    return Phase.MINUS_ONE;
  }

  /**
   * Phase i
   */
  static i(): Phase {
    return Phase.I;
  }

  /**
   * Phase -i
   */
  static minusI(): Phase {
    return Phase.MINUS_I;
  }

  /**
   * All four phases, in the order 1, i, -1, -i (powers of i)
   */
  static all(): readonly Phase[] {
    return [Phase.ONE, Phase.I, Phase.MINUS_ONE, Phase.MINUS_I];
  }

  // =========================================================================
  // Properties
  // =========================================================================

  get real(): UnitComponent {
    return this._real;
  }

  get imag(): UnitComponent {
    return this._imag;
  }

  /**
   * True for 1 and -1
   */
  isReal(): boolean {
    return this._imag === 0;
  }

  // =========================================================================
  // Group Operations
  // =========================================================================

  /**
   * Exact product (a1 + b1 i)(a2 + b2 i).
   *
   * Exactly one of the two components of a unit is non-zero, so each
   * component of the product is itself in {-1, 0, 1}.
   */
  multiply(other: Phase): Phase {
    return Phase.fromUnit(
      this._real * other._real - this._imag * other._imag,
      this._real * other._imag + this._imag * other._real
    );
  }

  /**
   * Multiplicative inverse, which for a unit is its conjugate
   */
  inverse(): Phase {
    return Phase.fromUnit(this._real, -this._imag);
  }

  equals(other: Phase): boolean {
    return this._real === other._real && this._imag === other._imag;
  }

  // =========================================================================
  // Conversion
  // =========================================================================

  toComplex(): ComplexValue {
    return { real: this._real, imag: this._imag };
  }

  toString(): string {
    return this._label;
  }

  private static fromUnit(real: number, imag: number): Phase {
    if (imag === 0) {
      return real > 0 ? Phase.ONE : Phase.MINUS_ONE;
    }
    return imag > 0 ? Phase.I : Phase.MINUS_I;
  }
}

/**
 * Product of any number of phases (1 for none)
 */
export function multiplyPhases(...phases: Phase[]): Phase {
  return phases.reduce((total, phase) => total.multiply(phase), Phase.one());
}
