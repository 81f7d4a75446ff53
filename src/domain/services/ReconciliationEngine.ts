import { MonetaryAmount } from '../entities/MonetaryAmount.js';
import type { StatementFacts } from '../entities/StatementFacts.js';
import type { TransactionRecord } from '../entities/TransactionRecord.js';
import type {
  ConversionDiscrepancy,
  ValidationIssue,
  ValidationResult,
} from '../entities/ValidationResult.js';
import { parseAmount } from './AmountParser.js';
import type { AmountParserOptions } from './AmountParser.js';
import { DEFAULT_SIGN_CONVENTION, resolveDirection } from './SignConvention.js';
import type { SignConvention } from './SignConvention.js';

export const DEFAULT_BALANCE_TOLERANCE = MonetaryAmount.fromPlain('0.01');
// half a cent absorbs the oracle rounding its own conversions
export const DEFAULT_CONVERSION_TOLERANCE = MonetaryAmount.fromPlain('0.005');

export interface ReconciliationOptions {
  balanceTolerance: MonetaryAmount;
  conversionTolerance: MonetaryAmount;
  signConvention: SignConvention;
  parser: AmountParserOptions;
}

export const DEFAULT_RECONCILIATION_OPTIONS: ReconciliationOptions = {
  balanceTolerance: DEFAULT_BALANCE_TOLERANCE,
  conversionTolerance: DEFAULT_CONVERSION_TOLERANCE,
  signConvention: DEFAULT_SIGN_CONVENTION,
  parser: {},
};

interface DualField {
  field: string;
  originalString: string;
  claimedValue: number | null;
}

const signedValue = (
  record: TransactionRecord,
  reparsed: MonetaryAmount,
  field: string,
  convention: SignConvention,
  issues: ValidationIssue[],
  unmapped: Map<string, number>,
): MonetaryAmount => {
  const direction = resolveDirection(convention, record.category);

  if (direction === null) {
    unmapped.set(record.category, (unmapped.get(record.category) ?? 0) + 1);
    return reparsed;
  }

  const explicitPlus = record.originalString.trim().startsWith('+');
  if ((direction === 'CREDIT' && reparsed.isNegative()) || (direction === 'DEBIT' && explicitPlus)) {
    issues.push({
      code: 'sign_conflict',
      message: `Category "${record.category}" books as ${direction} but "${record.originalString}" is printed with the opposite sign.`,
      field,
      severity: 'WARNING',
    });
  }

  const magnitude = reparsed.abs();
  return direction === 'DEBIT' ? magnitude.negate() : magnitude;
};

/**
 * Checks one statement: every dual amount is re-derived from its printed string,
 * and `start + Σ transactions` must land on the printed end balance.
 * Only the re-derived values enter the arithmetic; the oracle's numbers are compared, never used.
 */
export const reconcile = (
  facts: StatementFacts,
  options: ReconciliationOptions = DEFAULT_RECONCILIATION_OPTIONS,
): ValidationResult => {
  const issues: ValidationIssue[] = [];
  const discrepancies: ConversionDiscrepancy[] = [];
  let examined = 0;

  const reparse = (dual: DualField): MonetaryAmount => {
    const reparsed = parseAmount(dual.originalString, options.parser);

    if (dual.claimedValue !== null) {
      examined += 1;
      const claimed = MonetaryAmount.fromNumber(dual.claimedValue);
      if (!claimed.isWithin(reparsed, options.conversionTolerance)) {
        discrepancies.push({
          field: dual.field,
          originalString: dual.originalString,
          claimed: dual.claimedValue,
          reparsed,
          difference: claimed.subtract(reparsed),
        });
      }
    }

    return reparsed;
  };

  const start = reparse({ field: 'start_balance', ...facts.startBalance });
  const actual = reparse({ field: 'end_balance', ...facts.endBalance });

  const unmapped = new Map<string, number>();
  const signed = facts.transactions.map((record, index) => {
    const field = `transactions[${index}]`;
    if (record.date === null) {
      issues.push({
        code: 'missing_transaction_date',
        message: `Transaction "${record.description}" has no readable booking date.`,
        field,
        severity: 'INFO',
      });
    }

    const reparsed = reparse({ field, originalString: record.originalString, claimedValue: record.claimedValue });
    return signedValue(record, reparsed, field, options.signConvention, issues, unmapped);
  });

  for (const [category, count] of unmapped) {
    issues.push({
      code: 'unmapped_category',
      message: `No booking direction configured for "${category}"; the printed sign was used for ${count} transaction(s).`,
      severity: 'INFO',
    });
  }

  for (const failure of facts.formatFailures) {
    issues.push({
      code: 'unparseable_amount',
      message: failure.message,
      field: failure.field,
      severity: 'ERROR',
    });
  }

  const zeroTransactions = facts.transactions.length === 0 && facts.formatFailures.length === 0;
  if (zeroTransactions) {
    issues.push({
      code: 'zero_transactions',
      message: 'No transactions were extracted; the extraction most likely failed.',
      field: 'transactions',
      severity: 'WARNING',
    });
  }

  const expected = start.add(MonetaryAmount.sum(signed));
  const delta = actual.subtract(expected);
  const withinTolerance = delta.abs().compare(options.balanceTolerance) <= 0;

  return Object.freeze({
    statementId: facts.statementId,
    balanceCheck: {
      expected,
      actual,
      delta,
      tolerance: options.balanceTolerance,
      passed: withinTolerance && !zeroTransactions && facts.formatFailures.length === 0,
    },
    conversionDiscrepancies: discrepancies,
    transactionCount: facts.transactions.length,
    numericFieldsExamined: examined,
    issues,
  });
};
