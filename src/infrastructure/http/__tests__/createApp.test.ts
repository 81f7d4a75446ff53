import type { Server } from 'node:http';
import pino from 'pino';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { BatchArtifactSchema } from '../../../application/dto/AnalysisArtifactDTO.js';
import type { DocumentExtractorPort } from '../../../application/ports/DocumentExtractorPort.js';
import type { LLMOraclePort } from '../../../application/ports/LLMOraclePort.js';
import { InMemoryArtifactStore } from '../../adapters/storage/InMemoryArtifactStore.js';
import { AppContainer } from '../../bootstrap/AppContainer.js';
import { loadConfig } from '../../config/Config.js';
import { createApp } from '../createApp.js';

// the document text doubles as the oracle answer, so uploads carry the statement JSON
const extractor: DocumentExtractorPort = {
  extract: async (source) => ({ text: source.content.toString('utf8'), tables: [], pageCount: 1 }),
};
const echoOracle: LLMOraclePort = { complete: async (request) => request.context };

const january = JSON.stringify({
  auszug_nummer: '1',
  zeitraum: { von: '01.01.2024', bis: '31.01.2024' },
  anfangssaldo: { betrag_original: '1.000,00', datum: '01.01.2024' },
  endsaldo: { betrag_original: '965,00', datum: '31.01.2024' },
  transaktionen: [
    { datum: '05.01.2024', beschreibung: 'Kartenzahlung', betrag_original: '-50,00' },
    { datum: '12.01.2024', beschreibung: 'Gutschrift', betrag_original: '25,00' },
    { datum: '20.01.2024', beschreibung: 'Lastschrift Strom', betrag_original: '-10,00' },
  ],
});

const february = JSON.stringify({
  auszug_nummer: '2',
  zeitraum: { von: '01.02.2024', bis: '29.02.2024' },
  anfangssaldo: { betrag_original: '965,00', datum: '01.02.2024', referenz_auszug: '1' },
  endsaldo: { betrag_original: '1.065,00', datum: '29.02.2024' },
  transaktionen: [{ datum: '01.02.2024', beschreibung: 'Gutschrift Gehalt', betrag_original: '100,00' }],
});

describe('HTTP API', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const container = new AppContainer({
      config: loadConfig({}),
      logger: pino({ level: 'silent' }),
      extractor,
      oracle: echoOracle,
      storage: new InMemoryArtifactStore(),
    });

    server = createApp(container).listen(0, '127.0.0.1');
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/api/health`);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ name: 'Kontoauszug Audit API', oracleConfigured: true });
  });

  it('analyses uploaded statements and serves the stored artifact', async () => {
    const form = new FormData();
    form.append('statements', new Blob([february], { type: 'application/pdf' }), 'feb.pdf');
    form.append('statements', new Blob([january], { type: 'application/pdf' }), 'jan.pdf');

    const response = await fetch(`${baseUrl}/api/analyses`, { method: 'POST', body: form });
    const artifact = BatchArtifactSchema.parse(await response.json());

    expect(response.status).toBe(201);
    expect(artifact.report.passed).toBe(true);
    expect(artifact.report.statement_count).toBe(2);
    expect(artifact.statements.map((entry) => entry.statement_id)).toEqual(['jan', 'feb']);
    expect(artifact.continuity).toEqual([
      {
        from_statement_id: 'jan',
        to_statement_id: 'feb',
        from_end_balance: '965.00',
        to_start_balance: '965.00',
        delta: '0.00',
        passed: true,
        sequence_consistent: true,
      },
    ]);

    const stored = await fetch(`${baseUrl}/api/analyses/${artifact.batch_id}`);
    expect(stored.status).toBe(200);
    expect(await stored.json()).toEqual(artifact);

    const listing = await fetch(`${baseUrl}/api/analyses`);
    expect(await listing.json()).toEqual({ batchIds: [artifact.batch_id] });
  });

  it('rejects a request without statements', async () => {
    const form = new FormData();
    form.append('note', 'nothing attached');

    const response = await fetch(`${baseUrl}/api/analyses`, { method: 'POST', body: form });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'No statements provided. Upload one or more files as "statements".',
    });
  });

  it('rejects unsupported file types', async () => {
    const form = new FormData();
    form.append('statements', new Blob(['II*'], { type: 'image/tiff' }), 'scan.tiff');

    const response = await fetch(`${baseUrl}/api/analyses`, { method: 'POST', body: form });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Only PDF statements or layout JSON files are allowed' });
  });

  it('returns 404 for unknown batches and routes', async () => {
    expect((await fetch(`${baseUrl}/api/analyses/batch-missing`)).status).toBe(404);
    expect((await fetch(`${baseUrl}/api/unknown`)).status).toBe(404);
  });

  it('answers questions about an uploaded document', async () => {
    const form = new FormData();
    form.append('question', 'Wie hoch ist der Endsaldo?');
    form.append('document', new Blob(['Endsaldo 965,00 EUR'], { type: 'application/pdf' }), 'auszug.pdf');

    const response = await fetch(`${baseUrl}/api/questions`, { method: 'POST', body: form });
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      question: 'Wie hoch ist der Endsaldo?',
      answer: 'Endsaldo 965,00 EUR',
      modelId: 'openai/gpt-4o-mini',
      pageCount: 1,
    });
  });

  it('requires a question', async () => {
    const form = new FormData();
    form.append('document', new Blob(['Endsaldo'], { type: 'application/pdf' }), 'auszug.pdf');

    const response = await fetch(`${baseUrl}/api/questions`, { method: 'POST', body: form });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'question is required' });
  });
});
