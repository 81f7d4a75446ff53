import { describe, expect, it } from 'vitest';
import {
  buildExtractionPrompt,
  buildExtractionRequest,
  buildSystemPrompt,
  buildWorkedExample,
  renderDocumentContext,
} from '../StatementExtractionProtocol.js';

describe('buildWorkedExample', () => {
  it('computes the summation it shows', () => {
    const example = buildWorkedExample();

    expect(example.amounts).toHaveLength(6);
    expect(example.sum.toString()).toBe('3916.06');
    expect(example.endBalance.toString()).toBe('16261.73');
    expect(example.formula).toBe('-84.20 + (-2.50) + 1250.00 + (-640.00) + 3412.75 + (-19.99)');
  });
});

describe('buildExtractionPrompt', () => {
  it('asks for both representations under the dual-amount protocol', () => {
    const prompt = buildExtractionPrompt({ version: 'dual-amount', stepwiseValidation: true });

    expect(prompt).toContain('- "12.480,35" -> betrag_original: "12.480,35", betrag_nummer: 12480.35');
    expect(prompt).toContain('Summe = -84.20 + (-2.50) + 1250.00 + (-640.00) + 3412.75 + (-19.99) = 3916.06');
    expect(prompt).toContain('Endsaldo = 12345.67 + 3916.06 = 16261.73');
    expect(prompt).toContain('"betrag_original": "16.261,73"');
    expect(prompt).toContain('"betrag_nummer": 16261.73');
    expect(prompt).toContain('VALIDIERUNG:');
    expect(prompt).toContain('"transaktionen_summe_nummer": 3916.06');
  });

  it('drops the numeric field and the self-check when configured off', () => {
    const prompt = buildExtractionPrompt({ version: 'single-amount', stepwiseValidation: false });

    expect(prompt).not.toContain('betrag_nummer');
    expect(prompt).not.toContain('VALIDIERUNG:');
    expect(prompt).not.toContain('"validierung"');
    expect(prompt).toContain('= 3916.06');
  });

  it('tells the model about the second representation only when it is requested', () => {
    expect(buildSystemPrompt({ version: 'dual-amount', stepwiseValidation: false })).toContain('betrag_nummer');
    expect(buildSystemPrompt({ version: 'single-amount', stepwiseValidation: false })).not.toContain('betrag_nummer');
  });
});

describe('renderDocumentContext', () => {
  const document = {
    text: 'Kontoauszug 4/2022',
    tables: [
      {
        page: 1,
        rows: [
          ['Datum', 'Betrag'],
          ['02.05.', '-84,20'],
        ],
      },
    ],
    pageCount: 1,
  };

  it('appends tables as pipe rows', () => {
    expect(renderDocumentContext(document, 10_000)).toBe(
      'Kontoauszug 4/2022\n\nTABELLEN:\nTabelle 1 (Seite 1)\n| Datum | Betrag |\n| 02.05. | -84,20 |',
    );
  });

  it('cuts the context to the configured size', () => {
    expect(renderDocumentContext({ text: 'abcdef', tables: [], pageCount: 1 }, 3)).toBe('abc');
  });

  it('builds a JSON request for the configured model', () => {
    const request = buildExtractionRequest({ version: 'dual-amount', stepwiseValidation: true }, document, {
      modelId: 'test-model',
      maxContextChars: 18,
    });

    expect(request.modelId).toBe('test-model');
    expect(request.responseFormat).toBe('json');
    expect(request.context).toBe('Kontoauszug 4/2022');
    expect(request.systemPrompt).toContain('JSON');
  });
});
