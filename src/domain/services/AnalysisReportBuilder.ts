import type { AnalysisReport, OrderingFailure, StatementFailure } from '../entities/AnalysisReport.js';
import type { ContinuityResult } from '../entities/ContinuityResult.js';
import type { ValidationResult } from '../entities/ValidationResult.js';

export interface AnalysisReportInput {
  validations: readonly ValidationResult[];
  continuity: readonly ContinuityResult[];
  failures?: readonly StatementFailure[];
  orderingFailure?: OrderingFailure | null;
  /** Caller policy, e.g. 0.05 fails the run when more than 5% of claimed numbers were wrong. */
  discrepancyRateThreshold?: number | null;
}

export const buildAnalysisReport = (input: AnalysisReportInput): AnalysisReport => {
  const failures = input.failures ?? [];
  const orderingFailure = input.orderingFailure ?? null;
  const threshold = input.discrepancyRateThreshold ?? null;

  const balanceChecksFailed = input.validations
    .filter((validation) => !validation.balanceCheck.passed)
    .map((validation) => validation.statementId);

  const zeroTransactionStatements = input.validations
    .filter((validation) => validation.issues.some((issue) => issue.code === 'zero_transactions'))
    .map((validation) => validation.statementId);

  const continuityChecksFailed = input.continuity
    .filter((result) => !result.passed)
    .map(({ fromStatementId, toStatementId }) => ({ fromStatementId, toStatementId }));

  const sequenceGaps = input.continuity
    .filter((result) => result.sequenceConsistent === false)
    .map(({ fromStatementId, toStatementId }) => ({ fromStatementId, toStatementId }));

  const totalConversionDiscrepancies = input.validations.reduce(
    (sum, validation) => sum + validation.conversionDiscrepancies.length,
    0,
  );
  const numericFieldsExamined = input.validations.reduce(
    (sum, validation) => sum + validation.numericFieldsExamined,
    0,
  );
  const discrepancyRate = numericFieldsExamined === 0 ? 0 : totalConversionDiscrepancies / numericFieldsExamined;
  const discrepancyRateExceeded = threshold !== null && discrepancyRate > threshold;

  const passed =
    balanceChecksFailed.length === 0 &&
    continuityChecksFailed.length === 0 &&
    zeroTransactionStatements.length === 0 &&
    failures.length === 0 &&
    orderingFailure === null &&
    !discrepancyRateExceeded;

  return Object.freeze({
    passed,
    statementCount: input.validations.length + failures.length,
    failedStatements: failures,
    balanceChecksPassed: input.validations.length - balanceChecksFailed.length,
    balanceChecksFailed,
    continuityChecksPassed: input.continuity.length - continuityChecksFailed.length,
    continuityChecksFailed,
    orderingFailure,
    zeroTransactionStatements,
    sequenceGaps,
    totalConversionDiscrepancies,
    numericFieldsExamined,
    discrepancyRate,
    discrepancyRateThreshold: threshold,
    discrepancyRateExceeded,
  });
};
