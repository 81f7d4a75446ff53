import type { SecuritiesReference } from '../entities/TransactionRecord.js';

const VALUTA_MARKER = /(?:Wert|Valuta):\s*(\d{2}\.\d{2}\.\d{4})/;
const WKN_PATTERN = /\bWKN\s+([A-Z0-9]{6})\b/;
const ISIN_PATTERN = /\b([A-Z]{2}[A-Z0-9]{9}\d)\b/;
const SECURITY_REFERENCE = /\bWKN\b|\b[A-Z]{2}[A-Z0-9]{9}\d\b/;
const SETTLEMENT_PREFIX = /\b(?:Wertpapierabrechnung|Wertp\.\S*)\s+(?:(?:KV|VV|Kauf|Verkauf)\s+)?/i;

/**
 * Names the booking type of a statement line from its German booking text.
 * `printedNegative` only decides the direction of transfers and of lines no keyword matches.
 */
export const classifyTransaction = (description: string, printedNegative: boolean): string => {
  const text = description.toLowerCase();

  if (text.includes('wertpapierabrechnung') || text.includes('wertp.')) {
    if (/\bVV\b/.test(description) || text.includes('verkauf')) return 'Wertpapierverkauf';
    if (/\bKV\b/.test(description) || text.includes('kauf')) return 'Wertpapierkauf';
    return 'Wertpapierabrechnung';
  }
  if (text.includes('durchlfd') && text.includes('sperrbetr')) {
    return 'Wertpapier-Sperrbeträge';
  }
  if (text.includes('überweisung') || text.includes('übertrag')) {
    return printedNegative ? 'Überweisung ausgehend' : 'Überweisung eingehend';
  }
  if (text.includes('gutschrift')) return 'Gutschrift';
  if (text.includes('lastschr')) return 'Lastschrift';
  if (text.includes('depotentgelt')) return 'Depotentgelt';
  if (text.includes('entgeltabrechnung')) return 'Entgeltabrechnung';
  if (text.includes('abrechnung')) {
    return text.includes('verwahrentgelt') ? 'Verwahrentgelt' : 'Abrechnung';
  }

  return printedNegative ? 'Ausgang' : 'Eingang';
};

/** The value date printed inside a booking text ("Wert: 30.04.2022"), as written. */
export const extractValutaDate = (description: string): string | null =>
  VALUTA_MARKER.exec(description)?.[1] ?? null;

// "Wertpapierabrechnung KV TESLA INC. WKN A1CX3T": the name sits between the order type and the first reference
const extractSecurityName = (description: string): string | null => {
  const reference = description.search(SECURITY_REFERENCE);
  if (reference <= 0) return null;

  const head = description.slice(0, reference);
  const prefix = SETTLEMENT_PREFIX.exec(head);
  if (!prefix) return null;

  const name = head.slice(prefix.index + prefix[0].length).trim();
  return name || null;
};

export const extractSecurities = (description: string): SecuritiesReference => ({
  wkn: WKN_PATTERN.exec(description)?.[1] ?? null,
  isin: ISIN_PATTERN.exec(description)?.[1] ?? null,
  name: extractSecurityName(description),
});
