import type { AnalysisErrorCode } from '../errors.js';

export interface StatementFailure {
  statementId: string;
  code: AnalysisErrorCode;
  message: string;
}

export interface OrderingFailure {
  fromStatementId: string;
  toStatementId: string;
  message: string;
}

export interface AnalysisReport {
  readonly passed: boolean;
  readonly statementCount: number;
  readonly failedStatements: readonly StatementFailure[];
  readonly balanceChecksPassed: number;
  readonly balanceChecksFailed: readonly string[];
  readonly continuityChecksPassed: number;
  readonly continuityChecksFailed: ReadonlyArray<{ fromStatementId: string; toStatementId: string }>;
  readonly orderingFailure: OrderingFailure | null;
  readonly zeroTransactionStatements: readonly string[];
  readonly sequenceGaps: ReadonlyArray<{ fromStatementId: string; toStatementId: string }>;
  readonly totalConversionDiscrepancies: number;
  readonly numericFieldsExamined: number;
  readonly discrepancyRate: number;
  readonly discrepancyRateThreshold: number | null;
  readonly discrepancyRateExceeded: boolean;
}
