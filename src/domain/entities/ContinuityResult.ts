import type { MonetaryAmount } from './MonetaryAmount.js';

export interface ContinuityResult {
  readonly fromStatementId: string;
  readonly toStatementId: string;
  readonly fromEndBalance: MonetaryAmount;
  readonly toStartBalance: MonetaryAmount;
  readonly delta: MonetaryAmount; // toStartBalance - fromEndBalance
  readonly passed: boolean;
  /** null when either statement number is unknown */
  readonly sequenceConsistent: boolean | null;
}
