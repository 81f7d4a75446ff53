import type { BalanceFact, StatementFacts } from '../../entities/StatementFacts.js';
import { createTransactionRecord } from '../../entities/TransactionRecord.js';
import type { TransactionRecord, TransactionRecordInput } from '../../entities/TransactionRecord.js';
import { parseAmount } from '../AmountParser.js';

export const balance = (printed: string, claimedValue: number | null = null, date: string | null = null): BalanceFact => ({
  originalString: printed,
  parsedValue: parseAmount(printed),
  claimedValue,
  date,
});

export const transaction = (printed: string, overrides: Partial<TransactionRecordInput> = {}): TransactionRecord =>
  createTransactionRecord({
    originalString: printed,
    claimedValue: null,
    date: '2024-01-10',
    valutaDate: null,
    description: 'Buchung',
    category: parseAmount(printed).isNegative() ? 'Ausgang' : 'Eingang',
    ...overrides,
  });

export const statement = (overrides: Partial<StatementFacts> & { statementId: string }): StatementFacts => ({
  statementNumber: null,
  previousStatementNumber: null,
  startBalance: balance('0,00'),
  endBalance: balance('0,00'),
  transactions: [],
  periodStart: '2024-01-01',
  periodEnd: '2024-01-31',
  formatFailures: [],
  ...overrides,
});
