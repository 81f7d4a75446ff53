import type { MonetaryAmount } from './MonetaryAmount.js';
import type { TransactionRecord } from './TransactionRecord.js';

export interface BalanceFact {
  readonly originalString: string;
  readonly parsedValue: MonetaryAmount;
  readonly claimedValue: number | null;
  readonly date: string | null; // ISO date
}

/** A transaction the oracle listed but whose amount could not be read. */
export interface FormatFailure {
  readonly field: string;
  readonly originalString: string | null;
  readonly claimedValue: number | null;
  readonly message: string;
}

export interface StatementFacts {
  readonly statementId: string;
  readonly statementNumber: string | null;
  readonly previousStatementNumber: string | null;
  readonly startBalance: BalanceFact;
  readonly endBalance: BalanceFact;
  readonly transactions: readonly TransactionRecord[];
  readonly periodStart: string; // ISO date
  readonly periodEnd: string; // ISO date
  readonly formatFailures: readonly FormatFailure[];
}
