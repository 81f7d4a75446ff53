import { MonetaryAmount } from '../../domain/entities/MonetaryAmount.js';
import type { BalanceFact, FormatFailure, StatementFacts } from '../../domain/entities/StatementFacts.js';
import { createTransactionRecord } from '../../domain/entities/TransactionRecord.js';
import type { TransactionRecord } from '../../domain/entities/TransactionRecord.js';
import { ExtractionError, FormatError } from '../../domain/errors.js';
import { parseAmount } from '../../domain/services/AmountParser.js';
import type { AmountParserOptions } from '../../domain/services/AmountParser.js';
import { normalizeStatementDate } from '../../domain/services/StatementDate.js';
import {
  classifyTransaction,
  extractSecurities,
  extractValutaDate,
} from '../../domain/services/TransactionClassifier.js';
import { OracleStatementSchema, OracleTransactionSchema } from '../dto/OracleStatementDTO.js';
import type { OracleBalanceDTO, OracleTransactionDTO } from '../dto/OracleStatementDTO.js';

export interface OracleResponseParseOptions {
  statementId: string;
  parser?: AmountParserOptions;
}

const PLAIN_NUMBER = /^-?\d+(\.\d+)?$/;
const SCALAR_CHAR = /[\w.+-]/;

interface SafeCut {
  index: number;
  open: string[];
}

/**
 * Cuts a truncated JSON text back to its last complete value and closes whatever
 * objects and arrays are still open. Returns the input unchanged when nothing is open.
 *
 * A value counts as complete once its closing quote, bracket or delimiter has been read;
 * a number at the very end of the text may still be missing digits and is dropped.
 */
export const closeTruncatedJson = (text: string): string => {
  const open: string[] = [];
  let inString = false;
  let escaped = false;
  let stringIsKey = false;
  let expectingKey = false;
  let inScalar = false;
  let lastCut: SafeCut | null = null;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];

    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') {
        inString = false;
        if (!stringIsKey) lastCut = { index: index + 1, open: [...open] };
      }
      continue;
    }

    if (inScalar && !SCALAR_CHAR.test(char)) {
      inScalar = false;
      lastCut = { index, open: [...open] };
    }

    switch (char) {
      case '"':
        inString = true;
        stringIsKey = expectingKey;
        break;
      case '{':
      case '[':
        open.push(char);
        expectingKey = char === '{';
        lastCut = { index: index + 1, open: [...open] };
        break;
      case '}':
      case ']':
        open.pop();
        expectingKey = false;
        lastCut = { index: index + 1, open: [...open] };
        break;
      case ',':
        expectingKey = open[open.length - 1] === '{';
        lastCut = { index, open: [...open] };
        break;
      case ':':
        expectingKey = false;
        break;
      default:
        if (SCALAR_CHAR.test(char)) inScalar = true;
        break;
    }
  }

  if (open.length === 0 && !inString) {
    return text;
  }
  if (lastCut === null) {
    return text;
  }

  const closers = [...lastCut.open]
    .reverse()
    .map((bracket) => (bracket === '{' ? '}' : ']'))
    .join('');
  return `${text.slice(0, lastCut.index)}${closers}`;
};

const tryParse = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

const isJsonObject = (value: unknown): boolean =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Index of the bracket closing the one at `start`, or -1 when the text ends first. */
const findClosingBracket = (text: string, start: number): number => {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < text.length; index += 1) {
    const char = text[index];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }

    if (char === '"') inString = true;
    else if (char === '{' || char === '[') depth += 1;
    else if (char === '}' || char === ']') {
      depth -= 1;
      if (depth === 0) return index;
    }
  }
  return -1;
};

const findObject = (text: string): unknown => {
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    const end = findClosingBracket(text, start);
    if (end === -1) {
      // every later brace sits inside this unterminated object
      const closed = tryParse(closeTruncatedJson(text.slice(start).trim()));
      return isJsonObject(closed) ? closed : undefined;
    }

    const candidate = tryParse(text.slice(start, end + 1));
    if (isJsonObject(candidate)) {
      return candidate;
    }
  }
  return undefined;
};

/**
 * Finds the statement object in free-form oracle output. Markdown fences are searched
 * first, then the whole text; within each, every `{` is tried until one starts an object
 * that parses. An object cut off by the end of the text is closed before giving up.
 */
export const extractJsonPayload = (raw: string): unknown => {
  for (const fence of raw.matchAll(/```(?:json)?\s*([\s\S]*?)(?:```|$)/gi)) {
    const payload = findObject(fence[1]);
    if (payload !== undefined) {
      return payload;
    }
  }
  return findObject(raw);
};

const toClaim = (value: string | number | null | undefined): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) && Math.abs(value) < 1e21 ? value : null;
  }
  if (typeof value === 'string' && PLAIN_NUMBER.test(value.trim())) {
    return Number(value.trim());
  }
  return null;
};

const pickOriginal = (node: OracleBalanceDTO | OracleTransactionDTO): string | null => {
  const value = node.betrag_original ?? node.betrag_text ?? node.betrag;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? MonetaryAmount.fromNumber(value).toString() : null;
  }
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

const toReference = (value: string | number | null | undefined): string | null =>
  value === null || value === undefined ? null : String(value).trim() || null;

const toBalance = (
  field: string,
  node: OracleBalanceDTO,
  options: OracleResponseParseOptions,
): BalanceFact => {
  const originalString = pickOriginal(node);
  if (originalString === null) {
    throw new ExtractionError(`The oracle response has no amount for ${field}`, {
      statementId: options.statementId,
    });
  }

  return {
    originalString,
    parsedValue: parseAmount(originalString, options.parser),
    claimedValue: toClaim(node.betrag_nummer),
    date: normalizeStatementDate(node.datum),
  };
};

const toTransaction = (
  node: OracleTransactionDTO,
  options: OracleResponseParseOptions,
): TransactionRecord => {
  const originalString = pickOriginal(node);
  if (originalString === null) {
    throw new FormatError('Transaction has no printed amount', '');
  }

  const description = node.beschreibung?.trim() ?? '';
  const printed = parseAmount(originalString, options.parser);
  const category = node.kategorie?.trim() || classifyTransaction(description, printed.isNegative());

  return createTransactionRecord(
    {
      originalString,
      claimedValue: toClaim(node.betrag_nummer),
      date: normalizeStatementDate(node.datum),
      valutaDate: normalizeStatementDate(node.valuta) ?? normalizeStatementDate(extractValutaDate(description)),
      description,
      category,
      securities: extractSecurities(description),
    },
    options.parser,
  );
};

/**
 * Turns raw oracle text into `StatementFacts`.
 *
 * Throws `ExtractionError` when no statement structure, balance or period can be found and
 * `FormatError` when a balance string cannot be read. An unreadable transaction amount is
 * recorded in `formatFailures` and the remaining transactions are kept.
 */
export const parseOracleResponse = (raw: string, options: OracleResponseParseOptions): StatementFacts => {
  const payload = extractJsonPayload(raw);
  if (payload === undefined) {
    throw new ExtractionError('The oracle response contains no parseable JSON object', {
      statementId: options.statementId,
    });
  }

  const parsed = OracleStatementSchema.safeParse(payload);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ExtractionError(`The oracle response is not a statement: ${detail.join('; ')}`, {
      statementId: options.statementId,
    });
  }

  const statement = parsed.data;
  const startBalance = toBalance('anfangssaldo', statement.anfangssaldo, options);
  const endBalance = toBalance('endsaldo', statement.endsaldo, options);

  const transactions: TransactionRecord[] = [];
  const formatFailures: FormatFailure[] = [];

  (statement.transaktionen ?? []).forEach((entry, index) => {
    const field = `transactions[${index}]`;
    const node = OracleTransactionSchema.safeParse(entry);
    if (!node.success) {
      formatFailures.push({
        field,
        originalString: null,
        claimedValue: null,
        message: `Transaction ${index + 1} is not an object with amount fields`,
      });
      return;
    }

    try {
      transactions.push(toTransaction(node.data, options));
    } catch (error) {
      if (!(error instanceof FormatError)) {
        throw error;
      }
      formatFailures.push({
        field,
        originalString: pickOriginal(node.data),
        claimedValue: toClaim(node.data.betrag_nummer),
        message: error.message,
      });
    }
  });

  const periodStart = normalizeStatementDate(statement.zeitraum?.von) ?? startBalance.date;
  const periodEnd = normalizeStatementDate(statement.zeitraum?.bis) ?? endBalance.date;
  if (periodStart === null || periodEnd === null) {
    throw new ExtractionError('The statement period cannot be determined from the oracle response', {
      statementId: options.statementId,
    });
  }

  return Object.freeze({
    statementId: options.statementId,
    statementNumber: toReference(statement.auszug_nummer),
    previousStatementNumber: toReference(statement.anfangssaldo.referenz_auszug),
    startBalance,
    endBalance,
    transactions,
    periodStart,
    periodEnd,
    formatFailures,
  });
};
