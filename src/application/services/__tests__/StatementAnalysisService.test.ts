import pino from 'pino';
import { describe, expect, it } from 'vitest';
import { OracleUnavailableError } from '../../../domain/errors.js';
import { DEFAULT_RECONCILIATION_OPTIONS } from '../../../domain/services/ReconciliationEngine.js';
import { InMemoryArtifactStore } from '../../../infrastructure/adapters/storage/InMemoryArtifactStore.js';
import { BatchArtifactSchema } from '../../dto/AnalysisArtifactDTO.js';
import type { DocumentExtractorPort, DocumentSource, ExtractedDocument } from '../../ports/DocumentExtractorPort.js';
import type { LLMOraclePort, OracleRequest } from '../../ports/LLMOraclePort.js';
import { DEFAULT_EXTRACTION_PROTOCOL } from '../../protocol/StatementExtractionProtocol.js';
import { StatementAnalysisService } from '../StatementAnalysisService.js';
import type { StatementAnalysisSettings } from '../StatementAnalysisService.js';

const logger = pino({ level: 'silent' });

class TextExtractor implements DocumentExtractorPort {
  async extract(source: DocumentSource): Promise<ExtractedDocument> {
    return { text: source.content.toString('utf8'), tables: [], pageCount: 1 };
  }
}

/** Answers with the canned response registered for the document text. */
class ScriptedOracle implements LLMOraclePort {
  readonly requests: OracleRequest[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly responses: Record<string, string | Error>) {}

  async complete(request: OracleRequest): Promise<string> {
    this.requests.push(request);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.inFlight -= 1;

    const response = this.responses[request.context];
    if (response instanceof Error) throw response;
    if (response === undefined) throw new Error(`no scripted response for ${request.context}`);
    return response;
  }
}

const settings: StatementAnalysisSettings = {
  protocol: DEFAULT_EXTRACTION_PROTOCOL,
  modelId: 'test-model',
  maxContextChars: 10_000,
  concurrency: 2,
  reconciliation: DEFAULT_RECONCILIATION_OPTIONS,
  discrepancyRateThreshold: null,
};

const january = JSON.stringify({
  auszug_nummer: '1',
  zeitraum: { von: '01.01.2024', bis: '31.01.2024' },
  anfangssaldo: { betrag_original: '1.000,00', betrag_nummer: 1000, datum: '01.01.2024' },
  endsaldo: { betrag_original: '965,00', betrag_nummer: 965, datum: '31.01.2024' },
  transaktionen: [
    { datum: '05.01.2024', beschreibung: 'Kartenzahlung', betrag_original: '-50,00', betrag_nummer: -50 },
    { datum: '12.01.2024', beschreibung: 'Gutschrift', betrag_original: '25,00', betrag_nummer: 25 },
    { datum: '20.01.2024', beschreibung: 'Lastschrift Strom', betrag_original: '-10,00', betrag_nummer: -10 },
  ],
});

const february = JSON.stringify({
  auszug_nummer: '2',
  zeitraum: { von: '01.02.2024', bis: '29.02.2024' },
  anfangssaldo: { betrag_original: '965,00', datum: '01.02.2024', referenz_auszug: '1' },
  endsaldo: { betrag_original: '1.065,00', datum: '29.02.2024' },
  transaktionen: [
    { datum: '01.02.2024', beschreibung: 'Gutschrift Gehalt', betrag_original: '100,00', betrag_nummer: 1000 },
  ],
});

const doc = (fileName: string) => ({ fileName, content: Buffer.from(fileName) });

describe('StatementAnalysisService', () => {
  it('analyses a batch, chains it in period order and stores the artifact', async () => {
    const oracle = new ScriptedOracle({
      'feb.pdf': february,
      'jan.pdf': january,
      'broken.pdf': 'Leider kann ich dieses Dokument nicht lesen.',
    });
    const storage = new InMemoryArtifactStore();
    const service = new StatementAnalysisService(new TextExtractor(), oracle, storage, settings, logger);

    const result = await service.analyzeBatch({
      batchId: 'batch-1',
      documents: [{ document: doc('feb.pdf') }, { document: doc('jan.pdf') }, { document: doc('broken.pdf') }],
    });

    expect(result.outcomes.map((outcome) => outcome.status)).toEqual(['ANALYZED', 'ANALYZED', 'FAILED']);
    expect(result.continuity).toHaveLength(1);
    expect(result.continuity[0].fromStatementId).toBe('statement-2');
    expect(result.continuity[0].toStatementId).toBe('statement-1');
    expect(result.continuity[0].passed).toBe(true);
    expect(result.continuity[0].sequenceConsistent).toBe(true);

    const { report } = result;
    expect(report.passed).toBe(false);
    expect(report.statementCount).toBe(3);
    expect(report.balanceChecksPassed).toBe(2);
    expect(report.failedStatements).toEqual([
      {
        statementId: 'statement-3',
        code: 'EXTRACTION_ERROR',
        message: 'The oracle response contains no parseable JSON object',
      },
    ]);
    expect(report.totalConversionDiscrepancies).toBe(1);
    expect(report.numericFieldsExamined).toBe(6);

    const stored = await storage.loadBatch('batch-1');
    expect(stored).toEqual(result.artifact);
    expect(BatchArtifactSchema.parse(stored)).toEqual(result.artifact);
    expect(result.artifact.model_id).toBe('test-model');
    expect(result.artifact.protocol).toEqual({ version: 'dual-amount', stepwise_validation: true });
    expect(result.artifact.statements.map((entry) => entry.statement_id)).toEqual(['statement-2', 'statement-1']);
    expect(result.artifact.failures).toEqual([
      {
        statement_id: 'statement-3',
        code: 'EXTRACTION_ERROR',
        message: 'The oracle response contains no parseable JSON object',
      },
    ]);
    expect(result.artifact.statements[1].transactions[0]).toMatchObject({
      betrag_original: '100,00',
      betrag_nummer: 1000,
      wert: '100.00',
      kategorie: 'Gutschrift',
    });
    expect(result.artifact.statements[1].validation.conversion_discrepancies).toEqual([
      {
        field: 'transactions[0]',
        original_string: '100,00',
        claimed: 1000,
        reparsed: '100.00',
        difference: '900.00',
      },
    ]);
  });

  it('records overlapping periods as an ordering failure', async () => {
    const overlapping = january.replace('"von":"01.01.2024"', '"von":"15.01.2024"').replace('"auszug_nummer":"1"', '"auszug_nummer":"9"');
    const oracle = new ScriptedOracle({
      'a.pdf': january.replace('"bis":"31.01.2024"', '"bis":"20.01.2024"'),
      'b.pdf': overlapping,
    });
    const service = new StatementAnalysisService(
      new TextExtractor(),
      oracle,
      new InMemoryArtifactStore(),
      settings,
      logger,
    );

    const { report, continuity } = await service.analyzeBatch({
      batchId: 'batch-2',
      documents: [
        { statementId: 'a', document: doc('a.pdf') },
        { statementId: 'b', document: doc('b.pdf') },
      ],
    });

    expect(continuity).toEqual([]);
    expect(report.orderingFailure).toMatchObject({ fromStatementId: 'a', toStatementId: 'b' });
    expect(report.passed).toBe(false);
  });

  it('turns an unavailable oracle into a failed statement', async () => {
    const oracle = new ScriptedOracle({ 'jan.pdf': new OracleUnavailableError('timeout') });
    const service = new StatementAnalysisService(new TextExtractor(), oracle, new InMemoryArtifactStore(), settings, logger);

    const outcome = await service.analyzeStatement('jan', doc('jan.pdf'));
    expect(outcome).toEqual({
      status: 'FAILED',
      failure: { statementId: 'jan', code: 'ORACLE_ERROR', message: 'timeout' },
    });
  });

  it('does not swallow unexpected errors', async () => {
    const oracle = new ScriptedOracle({ 'jan.pdf': new TypeError('bug') });
    const service = new StatementAnalysisService(new TextExtractor(), oracle, new InMemoryArtifactStore(), settings, logger);

    await expect(service.analyzeBatch({ batchId: 'batch-3', documents: [{ document: doc('jan.pdf') }] })).rejects.toThrow(
      'bug',
    );
  });

  it('keeps at most `concurrency` oracle requests in flight', async () => {
    const names = ['1.pdf', '2.pdf', '3.pdf', '4.pdf', '5.pdf'];
    const oracle = new ScriptedOracle(Object.fromEntries(names.map((name) => [name, 'keine Daten'])));
    const service = new StatementAnalysisService(new TextExtractor(), oracle, new InMemoryArtifactStore(), settings, logger);

    const { outcomes } = await service.analyzeBatch({
      batchId: 'batch-4',
      documents: names.map((name) => ({ document: doc(name) })),
    });

    expect(outcomes).toHaveLength(5);
    expect(oracle.requests).toHaveLength(5);
    expect(oracle.maxInFlight).toBe(2);
  });
});
