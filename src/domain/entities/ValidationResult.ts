import type { MonetaryAmount } from './MonetaryAmount.js';

export type IssueSeverity = 'INFO' | 'WARNING' | 'ERROR';

export type ValidationIssueCode =
  | 'zero_transactions'
  | 'unparseable_amount'
  | 'unmapped_category'
  | 'sign_conflict'
  | 'missing_transaction_date';

export interface ValidationIssue {
  code: ValidationIssueCode;
  message: string;
  field?: string;
  severity: IssueSeverity;
}

export interface BalanceCheck {
  expected: MonetaryAmount;
  actual: MonetaryAmount;
  delta: MonetaryAmount;
  tolerance: MonetaryAmount;
  passed: boolean;
}

/** The oracle's number disagrees with the deterministic reading of the printed string. */
export interface ConversionDiscrepancy {
  field: string;
  originalString: string;
  claimed: number;
  reparsed: MonetaryAmount;
  difference: MonetaryAmount;
}

export interface ValidationResult {
  readonly statementId: string;
  readonly balanceCheck: BalanceCheck;
  readonly conversionDiscrepancies: readonly ConversionDiscrepancy[];
  readonly transactionCount: number;
  readonly numericFieldsExamined: number;
  readonly issues: readonly ValidationIssue[];
}
