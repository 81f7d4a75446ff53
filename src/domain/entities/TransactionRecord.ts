import { parseAmount } from '../services/AmountParser.js';
import type { AmountParserOptions } from '../services/AmountParser.js';
import type { MonetaryAmount } from './MonetaryAmount.js';

export interface SecuritiesReference {
  wkn: string | null;
  isin: string | null;
  name: string | null;
}

/**
 * One booking line of a statement, carrying the amount exactly as printed and the
 * oracle's own numeric reading of it. `parsedValue` always comes from `originalString`.
 */
export interface TransactionRecord {
  readonly originalString: string;
  readonly parsedValue: MonetaryAmount;
  readonly claimedValue: number | null;
  readonly date: string | null; // ISO date
  readonly valutaDate: string | null; // ISO date
  readonly description: string;
  readonly category: string;
  readonly securities: SecuritiesReference;
}

export type TransactionRecordInput = Omit<TransactionRecord, 'parsedValue' | 'securities'> & {
  securities?: SecuritiesReference;
};

export const createTransactionRecord = (
  input: TransactionRecordInput,
  parserOptions: AmountParserOptions = {},
): TransactionRecord =>
  Object.freeze({
    originalString: input.originalString,
    parsedValue: parseAmount(input.originalString, parserOptions),
    claimedValue: input.claimedValue,
    date: input.date,
    valutaDate: input.valutaDate,
    description: input.description,
    category: input.category,
    securities: input.securities ?? { wkn: null, isin: null, name: null },
  });
