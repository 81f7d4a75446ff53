import dayjs from 'dayjs';
import type { Logger } from 'pino';
import type { AnalysisReport, OrderingFailure, StatementFailure } from '../../domain/entities/AnalysisReport.js';
import type { ContinuityResult } from '../../domain/entities/ContinuityResult.js';
import type { StatementFacts } from '../../domain/entities/StatementFacts.js';
import type { ValidationResult } from '../../domain/entities/ValidationResult.js';
import { AnalysisError, OrderingError } from '../../domain/errors.js';
import { buildAnalysisReport } from '../../domain/services/AnalysisReportBuilder.js';
import { validateChain } from '../../domain/services/ContinuityValidator.js';
import { reconcile } from '../../domain/services/ReconciliationEngine.js';
import type { ReconciliationOptions } from '../../domain/services/ReconciliationEngine.js';
import type { BatchArtifactDTO } from '../dto/AnalysisArtifactDTO.js';
import type { ArtifactStoragePort } from '../ports/ArtifactStoragePort.js';
import type { DocumentExtractorPort, DocumentSource } from '../ports/DocumentExtractorPort.js';
import type { LLMOraclePort } from '../ports/LLMOraclePort.js';
import { buildExtractionRequest } from '../protocol/StatementExtractionProtocol.js';
import type { ExtractionProtocol } from '../protocol/StatementExtractionProtocol.js';
import { toBatchArtifact } from './ArtifactMapper.js';
import { parseOracleResponse } from './OracleResponseParser.js';

export interface StatementAnalysisSettings {
  protocol: ExtractionProtocol;
  modelId: string;
  maxContextChars: number;
  concurrency: number;
  reconciliation: ReconciliationOptions;
  discrepancyRateThreshold: number | null;
}

export type StatementOutcome =
  | { status: 'ANALYZED'; facts: StatementFacts; validation: ValidationResult }
  | { status: 'FAILED'; failure: StatementFailure };

export interface AnalyzeBatchParams {
  batchId: string;
  documents: Array<{ statementId?: string; document: DocumentSource }>;
}

export interface BatchAnalysisResult {
  outcomes: StatementOutcome[];
  continuity: ContinuityResult[];
  report: AnalysisReport;
  artifact: BatchArtifactDTO;
}

export const createBatchId = (): string =>
  `batch-${dayjs().format('YYYYMMDD-HHmmss')}-${Math.random().toString(36).slice(2, 9)}`;

const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await task(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker));
  return results;
};

export class StatementAnalysisService {
  constructor(
    private readonly extractor: DocumentExtractorPort,
    private readonly oracle: LLMOraclePort,
    private readonly storage: ArtifactStoragePort,
    private readonly settings: StatementAnalysisSettings,
    private readonly logger: Logger,
  ) {}

  /** Extracts, asks the oracle and reconciles one statement. Analysis errors become a `FAILED` outcome. */
  async analyzeStatement(statementId: string, document: DocumentSource): Promise<StatementOutcome> {
    const log = this.logger.child({ statementId, fileName: document.fileName });

    try {
      const extracted = await this.extractor.extract(document);
      log.debug({ pageCount: extracted.pageCount, textLength: extracted.text.length }, 'document extracted');

      const request = buildExtractionRequest(this.settings.protocol, extracted, {
        modelId: this.settings.modelId,
        maxContextChars: this.settings.maxContextChars,
      });
      const response = await this.oracle.complete(request);

      const facts = parseOracleResponse(response, {
        statementId,
        parser: this.settings.reconciliation.parser,
      });
      const validation = reconcile(facts, this.settings.reconciliation);

      log.info(
        {
          transactions: validation.transactionCount,
          balancePassed: validation.balanceCheck.passed,
          delta: validation.balanceCheck.delta.toString(),
          discrepancies: validation.conversionDiscrepancies.length,
        },
        'statement reconciled',
      );

      return { status: 'ANALYZED', facts, validation };
    } catch (error) {
      if (!(error instanceof AnalysisError)) {
        throw error;
      }

      log.warn({ code: error.code, err: error }, 'statement analysis failed');
      return { status: 'FAILED', failure: { statementId, code: error.code, message: error.message } };
    }
  }

  async analyzeBatch(params: AnalyzeBatchParams): Promise<BatchAnalysisResult> {
    const log = this.logger.child({ batchId: params.batchId });
    log.info({ documents: params.documents.length, protocol: this.settings.protocol }, 'analysing batch');

    const outcomes = await mapWithConcurrency(params.documents, this.settings.concurrency, (entry, index) =>
      this.analyzeStatement(entry.statementId ?? `statement-${index + 1}`, entry.document),
    );

    // continuity runs over period order, not completion order
    const analyzed = outcomes
      .flatMap((outcome) => (outcome.status === 'ANALYZED' ? [outcome] : []))
      .sort(
        (a, b) =>
          a.facts.periodStart.localeCompare(b.facts.periodStart) || a.facts.periodEnd.localeCompare(b.facts.periodEnd),
      );
    const failures = outcomes.flatMap((outcome) => (outcome.status === 'FAILED' ? [outcome.failure] : []));

    let continuity: ContinuityResult[] = [];
    let orderingFailure: OrderingFailure | null = null;
    try {
      continuity = validateChain(
        analyzed.map((outcome) => outcome.facts),
        { tolerance: this.settings.reconciliation.balanceTolerance },
      );
    } catch (error) {
      if (!(error instanceof OrderingError)) {
        throw error;
      }
      orderingFailure = {
        fromStatementId: error.fromStatementId,
        toStatementId: error.toStatementId,
        message: error.message,
      };
      log.warn(orderingFailure, 'statement periods are not in order');
    }

    const report = buildAnalysisReport({
      validations: analyzed.map((outcome) => outcome.validation),
      continuity,
      failures,
      orderingFailure,
      discrepancyRateThreshold: this.settings.discrepancyRateThreshold,
    });

    const artifact = toBatchArtifact({
      batchId: params.batchId,
      createdAt: new Date().toISOString(),
      modelId: this.settings.modelId,
      protocol: this.settings.protocol,
      statements: analyzed,
      continuity,
      report,
    });
    await this.storage.saveBatch(artifact);

    log.info(
      {
        passed: report.passed,
        failed: failures.length,
        discrepancyRate: report.discrepancyRate,
        continuityFailures: report.continuityChecksFailed.length,
      },
      'batch analysed',
    );

    return { outcomes, continuity, report, artifact };
  }
}
