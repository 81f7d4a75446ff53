import { MonetaryAmount } from '../../domain/entities/MonetaryAmount.js';
import { formatGerman, parseAmount } from '../../domain/services/AmountParser.js';
import type { ExtractedDocument } from '../ports/DocumentExtractorPort.js';
import type { OracleRequest } from '../ports/LLMOraclePort.js';

/**
 * What the oracle is asked to return per statement.
 *
 * `dual-amount` asks for every amount twice (printed string and the model's own number) so
 * conversions can be checked; `single-amount` asks only for the printed string.
 * `stepwiseValidation` additionally has the model show its own balance arithmetic.
 */
export type ExtractionProtocol =
  | { version: 'dual-amount'; stepwiseValidation: boolean }
  | { version: 'single-amount'; stepwiseValidation: boolean };

export type ExtractionProtocolVersion = ExtractionProtocol['version'];

export const DEFAULT_EXTRACTION_PROTOCOL: ExtractionProtocol = { version: 'dual-amount', stepwiseValidation: true };

export interface ExtractionRequestOptions {
  modelId: string;
  maxContextChars: number;
}

const WORKED_EXAMPLE_START = '12.345,67';
const WORKED_EXAMPLE_AMOUNTS = ['-84,20', '-2,50', '1.250,00', '-640,00', '3.412,75', '-19,99'];

export interface WorkedExample {
  startBalance: MonetaryAmount;
  amounts: MonetaryAmount[];
  sum: MonetaryAmount;
  endBalance: MonetaryAmount;
  formula: string;
}

/** The summation example injected into every request; its arithmetic is computed, not typed in. */
export const buildWorkedExample = (): WorkedExample => {
  const startBalance = parseAmount(WORKED_EXAMPLE_START);
  const amounts = WORKED_EXAMPLE_AMOUNTS.map((raw) => parseAmount(raw));
  const sum = MonetaryAmount.sum(amounts);
  const formula = amounts
    .map((amount, index) => (index > 0 && amount.isNegative() ? `(${amount.toFixed(2)})` : amount.toFixed(2)))
    .join(' + ');

  return { startBalance, amounts, sum, endBalance: startBalance.add(sum), formula };
};

const amountField = (protocol: ExtractionProtocol, printed: string): Record<string, string | number> => {
  if (protocol.version === 'dual-amount') {
    return { betrag_original: printed, betrag_nummer: parseAmount(printed).toNumber() };
  }
  return { betrag_original: printed };
};

const responseSkeleton = (protocol: ExtractionProtocol): Record<string, unknown> => {
  const example = buildWorkedExample();
  const skeleton: Record<string, unknown> = {
    auszug_nummer: '4',
    zeitraum: { von: '30.04.2022', bis: '31.05.2022' },
    anfangssaldo: {
      ...amountField(protocol, WORKED_EXAMPLE_START),
      datum: '30.04.2022',
      referenz_auszug: '3',
    },
    endsaldo: {
      ...amountField(protocol, formatGerman(example.endBalance)),
      datum: '31.05.2022',
    },
    transaktionen: [
      {
        datum: '02.05.2022',
        valuta: '30.04.2022',
        beschreibung: 'Entgeltabrechnung',
        ...amountField(protocol, WORKED_EXAMPLE_AMOUNTS[1]),
        kategorie: 'Entgeltabrechnung',
      },
    ],
  };

  if (protocol.stepwiseValidation) {
    skeleton.validierung = {
      anfangssaldo_nummer: example.startBalance.toNumber(),
      transaktionen_summe_berechnung: example.formula,
      transaktionen_summe_nummer: example.sum.toNumber(),
      berechneter_endsaldo: example.endBalance.toNumber(),
      dokument_endsaldo_nummer: example.endBalance.toNumber(),
      differenz: 0,
      validierung_ok: true,
    };
  }

  return skeleton;
};

const amountRules = (protocol: ExtractionProtocol): string[] => {
  if (protocol.version === 'single-amount') {
    return [
      'BETRÄGE:',
      '- "betrag_original" ist der Betrag EXAKT wie im Dokument gedruckt (Punkt, Komma und Vorzeichen unverändert).',
      '- Rechne keine Beträge um.',
    ];
  }

  return [
    'DUALE ZAHLENANGABE - jeder Geldbetrag wird ZWEIMAL angegeben:',
    '1. "betrag_original": der Betrag EXAKT wie im Dokument gedruckt (Punkt, Komma und Vorzeichen unverändert)',
    '2. "betrag_nummer": derselbe Betrag als Dezimalzahl (Tausenderpunkte entfernen, Dezimalkomma wird Punkt)',
    'Beispiele:',
    ...['12.480,35', '-7,90', '3.000,00'].map(
      (printed) => `- "${printed}" -> betrag_original: "${printed}", betrag_nummer: ${parseAmount(printed).toFixed(2)}`,
    ),
  ];
};

const summationRules = (): string[] => {
  const example = buildWorkedExample();
  return [
    'SUMMIERUNG:',
    `Summiere ALLE Transaktionen, niemals nur die erste oder letzte. Beispiel mit ${example.amounts.length} Transaktionen:`,
    `Anfangssaldo ${example.startBalance.toFixed(2)}`,
    `Summe = ${example.formula} = ${example.sum.toFixed(2)}`,
    `Endsaldo = ${example.startBalance.toFixed(2)} + ${example.sum.toFixed(2)} = ${example.endBalance.toFixed(2)}`,
  ];
};

export const buildSystemPrompt = (protocol: ExtractionProtocol): string =>
  protocol.version === 'dual-amount'
    ? 'Du bist ein präziser Assistent für die Analyse deutscher Kontoauszüge. Du gibst JEDEN Geldbetrag zweimal an: als Original-String (betrag_original) und als umgerechnete Zahl (betrag_nummer). Antworte ausschließlich mit JSON.'
    : 'Du bist ein präziser Assistent für die Analyse deutscher Kontoauszüge. Du gibst Geldbeträge exakt so an, wie sie im Dokument stehen. Antworte ausschließlich mit JSON.';

export const buildExtractionPrompt = (protocol: ExtractionProtocol): string => {
  const sections: string[][] = [
    ['KONTOAUSZUG ANALYSE'],
    amountRules(protocol),
    [
      'EXTRAKTION:',
      '1. "auszug_nummer": die Nummer aus "Kontoauszug X/JJJJ".',
      '2. "anfangssaldo": der Kontostand zu Beginn, wie er im Dokument steht (NICHT berechnen), mit Datum und der Nummer des vorherigen Auszugs ("referenz_auszug").',
      '3. "endsaldo": der Kontostand am Ende, wie er im Dokument steht (NICHT berechnen), mit Datum.',
      '4. "transaktionen": JEDE Buchung zwischen Anfangs- und Endsaldo mit "datum", "valuta" (falls vorhanden), "beschreibung" und "kategorie". Hinweise und Fußnoten sind keine Buchungen.',
    ],
    summationRules(),
  ];

  if (protocol.stepwiseValidation) {
    sections.push([
      'VALIDIERUNG:',
      'Gib im Feld "validierung" deine Rechnung Schritt für Schritt an: Anfangssaldo, vollständige Summenformel, Summe, berechneter Endsaldo, Endsaldo laut Dokument und Differenz.',
    ]);
  }

  sections.push(['ANTWORTFORMAT (JSON):', JSON.stringify(responseSkeleton(protocol), null, 2)]);

  return sections.map((lines) => lines.join('\n')).join('\n\n');
};

const renderTables = (document: ExtractedDocument): string =>
  document.tables
    .map((table, index) => {
      const heading = table.page === null ? `Tabelle ${index + 1}` : `Tabelle ${index + 1} (Seite ${table.page})`;
      const rows = table.rows.map((row) => `| ${row.join(' | ')} |`);
      return [heading, ...rows].join('\n');
    })
    .join('\n\n');

/** Document text plus its tables as pipe-separated rows, cut to `maxChars`. */
export const renderDocumentContext = (document: ExtractedDocument, maxChars: number): string => {
  const tables = renderTables(document);
  const context = tables ? `${document.text}\n\nTABELLEN:\n${tables}` : document.text;
  return context.slice(0, maxChars);
};

export const buildExtractionRequest = (
  protocol: ExtractionProtocol,
  document: ExtractedDocument,
  options: ExtractionRequestOptions,
): OracleRequest => ({
  systemPrompt: buildSystemPrompt(protocol),
  prompt: buildExtractionPrompt(protocol),
  context: renderDocumentContext(document, options.maxContextChars),
  modelId: options.modelId,
  responseFormat: 'json',
});
