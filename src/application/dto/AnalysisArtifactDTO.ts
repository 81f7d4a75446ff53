import { z } from 'zod';

const DecimalStringSchema = z.string().regex(/^-?\d+(\.\d+)?$/);

export const IssueArtifactSchema = z.object({
  code: z.string(),
  message: z.string(),
  field: z.string().optional(),
  severity: z.enum(['INFO', 'WARNING', 'ERROR']),
});

export const ValidationArtifactSchema = z.object({
  statement_id: z.string(),
  balance_check: z.object({
    expected: DecimalStringSchema,
    actual: DecimalStringSchema,
    delta: DecimalStringSchema,
    tolerance: DecimalStringSchema,
    passed: z.boolean(),
  }),
  conversion_discrepancies: z.array(
    z.object({
      field: z.string(),
      original_string: z.string(),
      claimed: z.number(),
      reparsed: DecimalStringSchema,
      difference: DecimalStringSchema,
    }),
  ),
  transaction_count: z.number().int().nonnegative(),
  numeric_fields_examined: z.number().int().nonnegative(),
  issues: z.array(IssueArtifactSchema),
});

export type ValidationArtifactDTO = z.infer<typeof ValidationArtifactSchema>;

export const BalanceArtifactSchema = z.object({
  betrag_original: z.string(),
  betrag_nummer: z.number().nullable(),
  wert: DecimalStringSchema,
  datum: z.string().nullable(),
});

export const TransactionArtifactSchema = z.object({
  betrag_original: z.string(),
  betrag_nummer: z.number().nullable(),
  wert: DecimalStringSchema,
  datum: z.string().nullable(),
  valuta: z.string().nullable(),
  beschreibung: z.string(),
  kategorie: z.string(),
  wkn: z.string().nullable(),
  isin: z.string().nullable(),
  wertpapier_name: z.string().nullable(),
});

export const StatementArtifactSchema = z.object({
  statement_id: z.string(),
  statement_number: z.string().nullable(),
  previous_statement_number: z.string().nullable(),
  period: z.object({ start: z.string(), end: z.string() }),
  start_balance: BalanceArtifactSchema,
  end_balance: BalanceArtifactSchema,
  transactions: z.array(TransactionArtifactSchema),
  format_failures: z.array(
    z.object({
      field: z.string(),
      original_string: z.string().nullable(),
      claimed: z.number().nullable(),
      message: z.string(),
    }),
  ),
  validation: ValidationArtifactSchema,
});

export type StatementArtifactDTO = z.infer<typeof StatementArtifactSchema>;

export const ContinuityArtifactSchema = z.object({
  from_statement_id: z.string(),
  to_statement_id: z.string(),
  from_end_balance: DecimalStringSchema,
  to_start_balance: DecimalStringSchema,
  delta: DecimalStringSchema,
  passed: z.boolean(),
  sequence_consistent: z.boolean().nullable(),
});

export type ContinuityArtifactDTO = z.infer<typeof ContinuityArtifactSchema>;

const StatementPairSchema = z.object({ from_statement_id: z.string(), to_statement_id: z.string() });

export const StatementFailureArtifactSchema = z.object({
  statement_id: z.string(),
  code: z.enum(['FORMAT_ERROR', 'EXTRACTION_ERROR', 'ORDERING_ERROR', 'ORACLE_ERROR']),
  message: z.string(),
});

export const ReportArtifactSchema = z.object({
  passed: z.boolean(),
  statement_count: z.number().int().nonnegative(),
  failed_statements: z.array(StatementFailureArtifactSchema),
  balance_checks_passed: z.number().int().nonnegative(),
  balance_checks_failed: z.array(z.string()),
  continuity_checks_passed: z.number().int().nonnegative(),
  continuity_checks_failed: z.array(StatementPairSchema),
  ordering_failure: StatementPairSchema.extend({ message: z.string() }).nullable(),
  zero_transaction_statements: z.array(z.string()),
  sequence_gaps: z.array(StatementPairSchema),
  total_conversion_discrepancies: z.number().int().nonnegative(),
  numeric_fields_examined: z.number().int().nonnegative(),
  discrepancy_rate: z.number().min(0).max(1),
  discrepancy_rate_threshold: z.number().nullable(),
  discrepancy_rate_exceeded: z.boolean(),
});

export type ReportArtifactDTO = z.infer<typeof ReportArtifactSchema>;

export const BatchArtifactSchema = z.object({
  batch_id: z.string(),
  created_at: z.string(),
  model_id: z.string(),
  protocol: z.object({
    version: z.enum(['dual-amount', 'single-amount']),
    stepwise_validation: z.boolean(),
  }),
  statements: z.array(StatementArtifactSchema),
  continuity: z.array(ContinuityArtifactSchema),
  failures: z.array(StatementFailureArtifactSchema),
  report: ReportArtifactSchema,
});

export type BatchArtifactDTO = z.infer<typeof BatchArtifactSchema>;
