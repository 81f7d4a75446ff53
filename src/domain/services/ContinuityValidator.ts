import type { ContinuityResult } from '../entities/ContinuityResult.js';
import type { MonetaryAmount } from '../entities/MonetaryAmount.js';
import type { StatementFacts } from '../entities/StatementFacts.js';
import { OrderingError } from '../errors.js';
import { DEFAULT_BALANCE_TOLERANCE } from './ReconciliationEngine.js';

export interface ContinuityOptions {
  tolerance: MonetaryAmount;
}

const normalizeStatementNumber = (value: string): string => value.trim().replace(/^0+(?=\d)/, '');

const assertChronological = (statements: readonly StatementFacts[]): void => {
  for (const statement of statements) {
    if (statement.periodStart > statement.periodEnd) {
      throw new OrderingError(
        `Statement ${statement.statementId} ends (${statement.periodEnd}) before it starts (${statement.periodStart})`,
        statement.statementId,
        statement.statementId,
      );
    }
  }

  for (let index = 1; index < statements.length; index += 1) {
    const previous = statements[index - 1];
    const current = statements[index];

    if (current.periodStart <= previous.periodStart) {
      throw new OrderingError(
        `Statement ${current.statementId} does not start after ${previous.statementId}`,
        previous.statementId,
        current.statementId,
      );
    }
    // consecutive statements may share the boundary day; the opening balance carries the previous closing date
    if (current.periodStart < previous.periodEnd) {
      throw new OrderingError(
        `Statement ${current.statementId} overlaps ${previous.statementId} (${current.periodStart} < ${previous.periodEnd})`,
        previous.statementId,
        current.statementId,
      );
    }
  }
};

/**
 * Checks that each statement opens with the balance the previous one closed with.
 * Input must already be sorted by period start; anything else is an `OrderingError`.
 */
export const validateChain = (
  statements: readonly StatementFacts[],
  options: ContinuityOptions = { tolerance: DEFAULT_BALANCE_TOLERANCE },
): ContinuityResult[] => {
  assertChronological(statements);

  return statements.slice(1).map((to, index) => {
    const from = statements[index];
    const fromEndBalance = from.endBalance.parsedValue;
    const toStartBalance = to.startBalance.parsedValue;

    const sequenceConsistent =
      from.statementNumber !== null && to.previousStatementNumber !== null
        ? normalizeStatementNumber(from.statementNumber) === normalizeStatementNumber(to.previousStatementNumber)
        : null;

    return Object.freeze({
      fromStatementId: from.statementId,
      toStatementId: to.statementId,
      fromEndBalance,
      toStartBalance,
      delta: toStartBalance.subtract(fromEndBalance),
      passed: toStartBalance.isWithin(fromEndBalance, options.tolerance),
      sequenceConsistent,
    });
  });
};
