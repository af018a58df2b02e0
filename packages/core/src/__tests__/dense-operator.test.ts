/**
 * Tests for DensePauliOperator
 */

import { describe, it, expect } from 'vitest';
import { DensePauliOperator } from '../dense-operator';
import { PauliError, PauliErrorCode } from '../errors';
import { I, X, Y, Z, PAULIS, type Pauli } from '../pauli';
import { Phase } from '../phase';

describe('DensePauliOperator Creation', () => {
  it('defaults to phase one', () => {
    const op = DensePauliOperator.withPaulis([X, Y, Z]);
    expect(op.phase).toBe(Phase.one());
    expect(op.paulis).toEqual([X, Y, Z]);
    expect(op.length).toBe(3);
  });

  it('creates operator with a phase', () => {
    const op = DensePauliOperator.withPhaseAndPaulis(Phase.minusI(), [I, Z]);
    expect(op.phase).toBe(Phase.minusI());
    expect(op.toString()).toBe('-iIZ');
  });

  it('creates empty operator', () => {
    const op = DensePauliOperator.empty();
    expect(op.isEmpty()).toBe(true);
    expect(op.length).toBe(0);
    expect(op.toString()).toBe('+');
  });

  it('creates identity operator', () => {
    const op = DensePauliOperator.identity(3);
    expect(op.toString()).toBe('+III');
    expect(op.weight).toBe(0);
    expect(op.isEmpty()).toBe(false);
    expect(() => DensePauliOperator.identity(-1)).toThrow('invalid operator length -1');
  });

  it('copies and freezes its Paulis', () => {
    const paulis: Pauli[] = [X, X];
    const op = DensePauliOperator.withPaulis(paulis);
    paulis[0] = Z;
    expect(op.paulis).toEqual([X, X]);
    expect(Object.isFrozen(op.paulis)).toBe(true);
  });
});

describe('DensePauliOperator Access', () => {
  const op = DensePauliOperator.withPaulis([X, I, Y, I, Z, I]);

  it('returns the Pauli at each position', () => {
    expect(op.get(0)).toBe(X);
    expect(op.get(1)).toBe(I);
    expect(op.get(5)).toBe(I);
    expect(op.get(6)).toBeUndefined();
    expect(op.get(-1)).toBeUndefined();
  });

  it('counts non-identity elements', () => {
    expect(op.weight).toBe(3);
  });

  it('lists non-trivial positions', () => {
    expect([...op.nonTrivialPositions()]).toEqual([0, 2, 4]);
  });

  it('lists non-trivial Paulis', () => {
    expect([...op.nonTrivialPaulis()]).toEqual([
      [0, X],
      [2, Y],
      [4, Z],
    ]);
  });

  it('restarts iteration on every call', () => {
    expect([...op.nonTrivialPositions()]).toEqual([...op.nonTrivialPositions()]);
  });

  it('formats phase and Paulis', () => {
    expect(DensePauliOperator.withPhaseAndPaulis(Phase.one(), [X, Z]).toString()).toBe('+XZ');
    expect(DensePauliOperator.withPhaseAndPaulis(Phase.minusOne(), [X, Z]).toString()).toBe('-XZ');
    expect(DensePauliOperator.withPhaseAndPaulis(Phase.i(), [X, Z]).toString()).toBe('+iXZ');
    expect(DensePauliOperator.withPhaseAndPaulis(Phase.minusI(), [X, Z]).toString()).toBe('-iXZ');
  });

  it('hands out a copy of its storage', () => {
    const raw = DensePauliOperator.withPhaseAndPaulis(Phase.i(), [I, X]).toRaw();
    expect(raw).toEqual({ phase: Phase.i(), paulis: [I, X] });
    raw.paulis.push(Z);
    expect(raw.paulis).toEqual([I, X, Z]);
  });
});

describe('DensePauliOperator Commutation', () => {
  const first = DensePauliOperator.withPaulis([X, Y, Z]);
  const second = DensePauliOperator.withPaulis([Y, Y, Y]);
  const third = DensePauliOperator.withPaulis([I, X, I]);

  it('checks commutation', () => {
    expect(first.commutesWith(second)).toBe(true);
    expect(first.commutesWith(third)).toBe(false);
    expect(second.commutesWith(third)).toBe(false);
  });

  it('checks anticommutation', () => {
    expect(first.anticommutesWith(second)).toBe(false);
    expect(first.anticommutesWith(third)).toBe(true);
    expect(second.anticommutesWith(third)).toBe(true);
  });

  it('is symmetric', () => {
    for (const a of [first, second, third]) {
      for (const b of [first, second, third]) {
        expect(a.commutesWith(b)).toBe(b.commutesWith(a));
      }
    }
  });

  it('ignores the phase', () => {
    expect(first.multiply(Phase.i()).commutesWith(second)).toBe(true);
  });

  it('throws on a length mismatch', () => {
    const short = DensePauliOperator.withPaulis([X, X]);
    expect(() => first.commutesWith(short)).toThrow(PauliError);
    expect(() => first.anticommutesWith(short)).toThrow('incompatible length 3 and 2');
  });
});

describe('DensePauliOperator Multiplication', () => {
  it('multiplies operators', () => {
    const first = DensePauliOperator.withPhaseAndPaulis(Phase.i(), [I, X, Y, Z]);
    const second = DensePauliOperator.withPhaseAndPaulis(Phase.one(), [X, Z, X, Z]);
    const product = DensePauliOperator.withPhaseAndPaulis(Phase.minusI(), [X, Y, Z, I]);

    expect(first.multiply(second).equals(product)).toBe(true);
    expect(second.multiply(first).equals(product)).toBe(true);
    expect(first.multiply(second).toString()).toBe('-iXYZI');
  });

  it('flips the sign for anticommuting operators', () => {
    const xz = DensePauliOperator.withPaulis([X, Z]);
    const zz = DensePauliOperator.withPaulis([Z, Z]);
    expect(xz.multiply(zz).toString()).toBe('-iYI');
    expect(zz.multiply(xz).toString()).toBe('+iYI');
  });

  it('squares to the identity times the squared phase', () => {
    const op = DensePauliOperator.withPhaseAndPaulis(Phase.i(), [X, Y]);
    expect(op.multiply(op).toString()).toBe('-II');
  });

  it('multiplies by a phase', () => {
    const op = DensePauliOperator.withPhaseAndPaulis(Phase.minusOne(), [X, Z, I, Y]);
    const product = DensePauliOperator.withPhaseAndPaulis(Phase.minusI(), [X, Z, I, Y]);
    expect(op.multiply(Phase.i()).equals(product)).toBe(true);
  });

  it('multiplies by a Pauli on every qubit', () => {
    const op = DensePauliOperator.withPhaseAndPaulis(Phase.minusOne(), [Y, X, Z, I]);
    const product = DensePauliOperator.withPhaseAndPaulis(Phase.minusOne(), [X, Y, I, Z]);
    expect(op.multiply(Z).equals(product)).toBe(true);
    expect(DensePauliOperator.withPaulis([X, X, X]).multiply(Y).toString()).toBe('-iZZZ');
  });

  it('leaves the operands unchanged', () => {
    const op = DensePauliOperator.withPhaseAndPaulis(Phase.i(), [X, Y]);
    op.multiply(Z);
    op.multiply(Phase.minusOne());
    op.multiply(DensePauliOperator.withPaulis([Z, Z]));
    expect(op.toString()).toBe('+iXY');
  });

  it('keeps the phase in the group', () => {
    const operators: DensePauliOperator[] = [];
    for (const phase of Phase.all()) {
      for (const a of PAULIS) {
        for (const b of PAULIS) {
          operators.push(DensePauliOperator.withPhaseAndPaulis(phase, [a, b]));
        }
      }
    }
    for (const left of operators) {
      for (const right of operators) {
        const product = left.multiply(right);
        expect(Phase.all()).toContain(product.phase);
        expect(product.length).toBe(2);
      }
    }
  });

  it('throws on a length mismatch', () => {
    const first = DensePauliOperator.withPaulis([X, Y, Z]);
    const second = DensePauliOperator.withPaulis([X, Y]);
    expect(() => first.multiply(second)).toThrow(PauliError);
    try {
      first.multiply(second);
    } catch (error) {
      expect(error).toBeInstanceOf(PauliError);
      if (error instanceof PauliError) {
        expect(error.detail).toEqual({ code: PauliErrorCode.LengthMismatch, left: 3, right: 2 });
      }
    }
  });
});

describe('DensePauliOperator Equality', () => {
  it('compares phase and Paulis', () => {
    const op = DensePauliOperator.withPaulis([X, Z]);
    expect(op.equals(DensePauliOperator.withPaulis([X, Z]))).toBe(true);
    expect(op.equals(DensePauliOperator.withPhaseAndPaulis(Phase.minusOne(), [X, Z]))).toBe(false);
    expect(op.equals(DensePauliOperator.withPaulis([X, Z, I]))).toBe(false);
  });
});
