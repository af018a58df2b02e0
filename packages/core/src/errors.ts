/**
 * Errors raised when building or combining Pauli operators.
 */

export enum PauliErrorCode {
  /** Two sizes that must agree differ */
  LengthMismatch = 'LENGTH_MISMATCH',
  /** A position is not strictly less than the operator length */
  OutOfBound = 'OUT_OF_BOUND',
  /** The operator length is not a non-negative integer */
  InvalidLength = 'INVALID_LENGTH',
}

/**
 * Structured payload of a {@link PauliError}
 */
export type PauliErrorDetail =
  | { readonly code: PauliErrorCode.LengthMismatch; readonly left: number; readonly right: number }
  | { readonly code: PauliErrorCode.OutOfBound; readonly position: number; readonly length: number }
  | { readonly code: PauliErrorCode.InvalidLength; readonly length: number };

function formatDetail(detail: PauliErrorDetail): string {
  switch (detail.code) {
    case PauliErrorCode.LengthMismatch:
      return `incompatible length ${detail.left} and ${detail.right}`;
    case PauliErrorCode.OutOfBound:
      return `position ${detail.position} is out of bound for length ${detail.length}`;
    case PauliErrorCode.InvalidLength:
      return `invalid operator length ${detail.length}`;
  }
}

/**
 * Error class for all operator failures.
 *
 * Carries a typed `code` for programmatic matching and the offending
 * sizes or position in `detail`.
 */
export class PauliError extends Error {
  readonly detail: PauliErrorDetail;

  constructor(detail: PauliErrorDetail) {
    super(formatDetail(detail));
    this.name = 'PauliError';
    this.detail = detail;
  }

  get code(): PauliErrorCode {
    return this.detail.code;
  }

  static lengthMismatch(left: number, right: number): PauliError {
    return new PauliError({ code: PauliErrorCode.LengthMismatch, left, right });
  }

  static outOfBound(position: number, length: number): PauliError {
    return new PauliError({ code: PauliErrorCode.OutOfBound, position, length });
  }

  static invalidLength(length: number): PauliError {
    return new PauliError({ code: PauliErrorCode.InvalidLength, length });
  }
}

// ============================================================================
// Results
// ============================================================================

/**
 * Outcome of a fallible operation
 */
export type PauliResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: PauliError };

export function ok<T>(value: T): PauliResult<T> {
  return { ok: true, value };
}

export function err<T>(error: PauliError): PauliResult<T> {
  return { ok: false, error };
}

/**
 * Return the value of a successful result, or throw its error
 */
export function unwrap<T>(result: PauliResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
