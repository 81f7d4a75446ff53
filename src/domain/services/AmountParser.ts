import { MonetaryAmount } from '../entities/MonetaryAmount.js';
import { FormatError } from '../errors.js';

/**
 * How a lone separator followed by exactly three digits is read ("1.234", "1,234").
 * German statements print whole thousands that way, so `thousands` is the default.
 */
export type ThreeDigitPolicy = 'thousands' | 'decimal';

export interface AmountParserOptions {
  threeDigitPolicy?: ThreeDigitPolicy;
}

const CURRENCY_MARKERS = /EUR|USD|CHF|GBP|[€$£]/gi;
const BLANKS = /\s/g;
const DASHES = /[\u2212\u2013]/g;

const assertThousandsGroups = (text: string, separator: string, raw: string): void => {
  const [head, ...groups] = text.split(separator);
  if (head.length === 0 || head.length > 3 || groups.some((group) => group.length !== 3)) {
    throw new FormatError(`Cannot resolve separators in amount "${raw}"`, raw);
  }
};

const normalizeSeparators = (text: string, raw: string, policy: ThreeDigitPolicy): string => {
  const lastDot = text.lastIndexOf('.');
  const lastComma = text.lastIndexOf(',');

  if (lastDot !== -1 && lastComma !== -1) {
    // Whichever symbol comes last is the decimal separator.
    const decimalIndex = Math.max(lastDot, lastComma);
    const decimal = text[decimalIndex];
    const thousands = decimal === '.' ? ',' : '.';

    if (text.indexOf(decimal) !== decimalIndex) {
      throw new FormatError(`Amount "${raw}" has more than one decimal separator`, raw);
    }

    const integerPart = text.slice(0, decimalIndex);
    assertThousandsGroups(integerPart, thousands, raw);
    return `${integerPart.split(thousands).join('')}.${text.slice(decimalIndex + 1)}`;
  }

  const separator = lastDot !== -1 ? '.' : lastComma !== -1 ? ',' : null;
  if (separator === null) {
    return text;
  }

  const parts = text.split(separator);
  const trailing = parts[parts.length - 1];

  if (parts.length === 2) {
    if (trailing.length === 1 || trailing.length === 2) {
      return `${parts[0]}.${trailing}`;
    }
    if (trailing.length === 3 && policy === 'decimal') {
      return `${parts[0]}.${trailing}`;
    }
  }

  assertThousandsGroups(text, separator, raw);
  return parts.join('');
};

/**
 * Reads an amount in German (`450.105,96`) or plain (`450105.96`) notation.
 *
 * When both `.` and `,` occur, the rightmost one is the decimal separator.
 * A lone separator is decimal only when one to two digits follow it; three
 * trailing digits are decided by `threeDigitPolicy`; anything else must be
 * a well-formed thousands grouping.
 */
export const parseAmount = (raw: string, options: AmountParserOptions = {}): MonetaryAmount => {
  const policy = options.threeDigitPolicy ?? 'thousands';
  let text = raw.replace(CURRENCY_MARKERS, '').replace(BLANKS, '').replace(DASHES, '-');
  let negative = false;

  if (text.startsWith('(') && text.endsWith(')')) {
    negative = true;
    text = text.slice(1, -1);
  }

  if (text.startsWith('+')) {
    text = text.slice(1);
  } else if (text.startsWith('-')) {
    negative = true;
    text = text.slice(1);
  } else if (text.endsWith('-')) {
    // "1.234,56-" is how some statements print debits
    negative = true;
    text = text.slice(0, -1);
  }

  if (!/\d/.test(text)) {
    throw new FormatError(`Amount "${raw}" contains no digits`, raw);
  }
  if (!/^[\d.,]+$/.test(text)) {
    throw new FormatError(`Amount "${raw}" contains unexpected characters`, raw);
  }

  const normalized = normalizeSeparators(text, raw, policy);
  if (!/^\d+(\.\d+)?$/.test(normalized)) {
    throw new FormatError(`Amount "${raw}" does not normalize to a decimal number`, raw);
  }

  return MonetaryAmount.fromPlain(`${negative ? '-' : ''}${normalized}`);
};

/** German notation with `.` thousands groups and `,` decimals; the inverse of `parseAmount`. */
export const formatGerman = (amount: MonetaryAmount): string => {
  const plain = amount.toString();
  const negative = plain.startsWith('-');
  const body = negative ? plain.slice(1) : plain;
  const point = body.indexOf('.');
  const integer = point === -1 ? body : body.slice(0, point);
  const fraction = point === -1 ? '' : `,${body.slice(point + 1)}`;
  const grouped = integer.replace(/\B(?=(\d{3})+(?!\d))/g, '.');
  return `${negative ? '-' : ''}${grouped}${fraction}`;
};
