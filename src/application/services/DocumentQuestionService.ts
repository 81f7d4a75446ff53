import type { Logger } from 'pino';
import { OracleUnavailableError } from '../../domain/errors.js';
import type { DocumentExtractorPort, DocumentSource } from '../ports/DocumentExtractorPort.js';
import type { LLMOraclePort } from '../ports/LLMOraclePort.js';
import { renderDocumentContext } from '../protocol/StatementExtractionProtocol.js';

const SYSTEM_PROMPT =
  'Du beantwortest Fragen zu einem Bankdokument. Stütze dich ausschließlich auf den übergebenen Dokumentinhalt und sage, wenn die Antwort darin nicht steht.';

export interface DocumentAnswer {
  question: string;
  answer: string;
  modelId: string;
  pageCount: number;
}

export class DocumentQuestionService {
  constructor(
    private readonly extractor: DocumentExtractorPort,
    private readonly oracle: LLMOraclePort,
    private readonly settings: { modelId: string; maxContextChars: number },
    private readonly logger: Logger,
  ) {}

  async ask(params: { document: DocumentSource; question: string }): Promise<DocumentAnswer> {
    const extracted = await this.extractor.extract(params.document);

    const answer = await this.oracle.complete({
      systemPrompt: SYSTEM_PROMPT,
      prompt: params.question,
      context: renderDocumentContext(extracted, this.settings.maxContextChars),
      modelId: this.settings.modelId,
      responseFormat: 'text',
    });

    const trimmed = answer.trim();
    if (!trimmed) {
      throw new OracleUnavailableError('The oracle returned an empty answer');
    }

    this.logger.info({ fileName: params.document.fileName, answerLength: trimmed.length }, 'question answered');

    return {
      question: params.question,
      answer: trimmed,
      modelId: this.settings.modelId,
      pageCount: extracted.pageCount,
    };
  }
}
