import type { AnalysisReport, StatementFailure } from '../../domain/entities/AnalysisReport.js';
import type { ContinuityResult } from '../../domain/entities/ContinuityResult.js';
import type { BalanceFact, StatementFacts } from '../../domain/entities/StatementFacts.js';
import type { ValidationResult } from '../../domain/entities/ValidationResult.js';
import type {
  BatchArtifactDTO,
  ContinuityArtifactDTO,
  ReportArtifactDTO,
  StatementArtifactDTO,
  ValidationArtifactDTO,
} from '../dto/AnalysisArtifactDTO.js';
import type { ExtractionProtocol } from '../protocol/StatementExtractionProtocol.js';

const toBalanceArtifact = (balance: BalanceFact) => ({
  betrag_original: balance.originalString,
  betrag_nummer: balance.claimedValue,
  wert: balance.parsedValue.toString(),
  datum: balance.date,
});

export const toValidationArtifact = (validation: ValidationResult): ValidationArtifactDTO => ({
  statement_id: validation.statementId,
  balance_check: {
    expected: validation.balanceCheck.expected.toString(),
    actual: validation.balanceCheck.actual.toString(),
    delta: validation.balanceCheck.delta.toString(),
    tolerance: validation.balanceCheck.tolerance.toString(),
    passed: validation.balanceCheck.passed,
  },
  conversion_discrepancies: validation.conversionDiscrepancies.map((discrepancy) => ({
    field: discrepancy.field,
    original_string: discrepancy.originalString,
    claimed: discrepancy.claimed,
    reparsed: discrepancy.reparsed.toString(),
    difference: discrepancy.difference.toString(),
  })),
  transaction_count: validation.transactionCount,
  numeric_fields_examined: validation.numericFieldsExamined,
  issues: validation.issues.map((issue) => ({ ...issue })),
});

export const toStatementArtifact = (facts: StatementFacts, validation: ValidationResult): StatementArtifactDTO => ({
  statement_id: facts.statementId,
  statement_number: facts.statementNumber,
  previous_statement_number: facts.previousStatementNumber,
  period: { start: facts.periodStart, end: facts.periodEnd },
  start_balance: toBalanceArtifact(facts.startBalance),
  end_balance: toBalanceArtifact(facts.endBalance),
  transactions: facts.transactions.map((record) => ({
    betrag_original: record.originalString,
    betrag_nummer: record.claimedValue,
    wert: record.parsedValue.toString(),
    datum: record.date,
    valuta: record.valutaDate,
    beschreibung: record.description,
    kategorie: record.category,
    wkn: record.securities.wkn,
    isin: record.securities.isin,
    wertpapier_name: record.securities.name,
  })),
  format_failures: facts.formatFailures.map((failure) => ({
    field: failure.field,
    original_string: failure.originalString,
    claimed: failure.claimedValue,
    message: failure.message,
  })),
  validation: toValidationArtifact(validation),
});

export const toContinuityArtifact = (result: ContinuityResult): ContinuityArtifactDTO => ({
  from_statement_id: result.fromStatementId,
  to_statement_id: result.toStatementId,
  from_end_balance: result.fromEndBalance.toString(),
  to_start_balance: result.toStartBalance.toString(),
  delta: result.delta.toString(),
  passed: result.passed,
  sequence_consistent: result.sequenceConsistent,
});

const toPair = (pair: { fromStatementId: string; toStatementId: string }) => ({
  from_statement_id: pair.fromStatementId,
  to_statement_id: pair.toStatementId,
});

const toFailureArtifact = (failure: StatementFailure) => ({
  statement_id: failure.statementId,
  code: failure.code,
  message: failure.message,
});

export const toReportArtifact = (report: AnalysisReport): ReportArtifactDTO => ({
  passed: report.passed,
  statement_count: report.statementCount,
  failed_statements: report.failedStatements.map(toFailureArtifact),
  balance_checks_passed: report.balanceChecksPassed,
  balance_checks_failed: [...report.balanceChecksFailed],
  continuity_checks_passed: report.continuityChecksPassed,
  continuity_checks_failed: report.continuityChecksFailed.map(toPair),
  ordering_failure: report.orderingFailure
    ? { ...toPair(report.orderingFailure), message: report.orderingFailure.message }
    : null,
  zero_transaction_statements: [...report.zeroTransactionStatements],
  sequence_gaps: report.sequenceGaps.map(toPair),
  total_conversion_discrepancies: report.totalConversionDiscrepancies,
  numeric_fields_examined: report.numericFieldsExamined,
  discrepancy_rate: report.discrepancyRate,
  discrepancy_rate_threshold: report.discrepancyRateThreshold,
  discrepancy_rate_exceeded: report.discrepancyRateExceeded,
});

export const toBatchArtifact = (params: {
  batchId: string;
  createdAt: string;
  modelId: string;
  protocol: ExtractionProtocol;
  statements: ReadonlyArray<{ facts: StatementFacts; validation: ValidationResult }>;
  continuity: readonly ContinuityResult[];
  report: AnalysisReport;
}): BatchArtifactDTO => ({
  batch_id: params.batchId,
  created_at: params.createdAt,
  model_id: params.modelId,
  protocol: {
    version: params.protocol.version,
    stepwise_validation: params.protocol.stepwiseValidation,
  },
  statements: params.statements.map(({ facts, validation }) => toStatementArtifact(facts, validation)),
  continuity: params.continuity.map(toContinuityArtifact),
  failures: params.report.failedStatements.map(toFailureArtifact),
  report: toReportArtifact(params.report),
});
