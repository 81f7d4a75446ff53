import { describe, expect, it } from 'vitest';
import { OrderingError } from '../../errors.js';
import { validateChain } from '../ContinuityValidator.js';
import { balance, statement } from './fixtures.js';

const january = statement({
  statementId: 'A',
  statementNumber: '03',
  endBalance: balance('965,00'),
  periodStart: '2024-01-01',
  periodEnd: '2024-01-31',
});

describe('validateChain', () => {
  it('passes when the next statement opens with the previous closing balance', () => {
    const february = statement({
      statementId: 'B',
      startBalance: balance('965,00'),
      periodStart: '2024-02-01',
      periodEnd: '2024-02-29',
    });

    const [result] = validateChain([january, february]);
    expect(result.fromStatementId).toBe('A');
    expect(result.toStatementId).toBe('B');
    expect(result.passed).toBe(true);
    expect(result.delta.toString()).toBe('0.00');
  });

  it('reports the gap when the balances do not chain', () => {
    const february = statement({
      statementId: 'B',
      startBalance: balance('964,00'),
      periodStart: '2024-02-01',
      periodEnd: '2024-02-29',
    });

    const [result] = validateChain([january, february]);
    expect(result.passed).toBe(false);
    expect(result.delta.toString()).toBe('-1.00');
    expect(result.fromEndBalance.toString()).toBe('965.00');
    expect(result.toStartBalance.toString()).toBe('964.00');
  });

  it('returns one result per adjacent pair', () => {
    expect(validateChain([])).toEqual([]);
    expect(validateChain([january])).toEqual([]);

    const chain = validateChain([
      january,
      statement({ statementId: 'B', startBalance: balance('965,00'), periodStart: '2024-02-01', periodEnd: '2024-02-29' }),
      statement({ statementId: 'C', periodStart: '2024-03-01', periodEnd: '2024-03-31' }),
    ]);
    expect(chain.map((result) => `${result.fromStatementId}->${result.toStatementId}`)).toEqual(['A->B', 'B->C']);
  });

  it('rejects overlapping periods before checking anything', () => {
    const overlapping = statement({
      statementId: 'B',
      startBalance: balance('965,00'),
      periodStart: '2024-01-15',
      periodEnd: '2024-02-15',
    });
    const first = statement({ statementId: 'A', periodStart: '2024-01-01', periodEnd: '2024-02-01' });

    expect(() => validateChain([first, overlapping])).toThrow(OrderingError);
    try {
      validateChain([first, overlapping]);
    } catch (error) {
      expect(error instanceof OrderingError ? [error.fromStatementId, error.toStatementId] : null).toEqual(['A', 'B']);
    }
  });

  it('rejects statements out of order or starting on the same day', () => {
    const february = statement({ statementId: 'B', periodStart: '2024-02-01', periodEnd: '2024-02-29' });
    expect(() => validateChain([february, january])).toThrow(OrderingError);

    const sameStart = statement({ statementId: 'C', periodStart: '2024-01-01', periodEnd: '2024-01-15' });
    expect(() => validateChain([january, sameStart])).toThrow(OrderingError);
  });

  it('rejects a statement that ends before it starts', () => {
    const inverted = statement({ statementId: 'X', periodStart: '2024-02-10', periodEnd: '2024-02-01' });
    expect(() => validateChain([inverted])).toThrow(OrderingError);
  });

  it('allows the next period to begin on the previous closing day', () => {
    const february = statement({
      statementId: 'B',
      startBalance: balance('965,00'),
      periodStart: '2024-01-31',
      periodEnd: '2024-02-29',
    });

    expect(validateChain([january, february])[0].passed).toBe(true);
  });

  it('compares printed statement numbers ignoring leading zeros', () => {
    const next = (previousStatementNumber: string | null) =>
      validateChain([
        january,
        statement({ statementId: 'B', previousStatementNumber, periodStart: '2024-02-01', periodEnd: '2024-02-29' }),
      ])[0].sequenceConsistent;

    expect(next('3')).toBe(true);
    expect(next('2')).toBe(false);
    expect(next(null)).toBeNull();
  });
});
