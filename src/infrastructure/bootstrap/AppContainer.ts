import type { Logger } from 'pino';
import type { ArtifactStoragePort } from '../../application/ports/ArtifactStoragePort.js';
import type { DocumentExtractorPort } from '../../application/ports/DocumentExtractorPort.js';
import type { LLMOraclePort } from '../../application/ports/LLMOraclePort.js';
import { DocumentQuestionService } from '../../application/services/DocumentQuestionService.js';
import { StatementAnalysisService } from '../../application/services/StatementAnalysisService.js';
import { LayoutResultExtractor } from '../adapters/extractor/LayoutResultExtractor.js';
import { PdfTextExtractor } from '../adapters/extractor/PdfTextExtractor.js';
import { RoutingDocumentExtractor } from '../adapters/extractor/RoutingDocumentExtractor.js';
import { OpenAIChatOracle } from '../adapters/oracle/OpenAIChatOracle.js';
import { UnconfiguredOracle } from '../adapters/oracle/UnconfiguredOracle.js';
import { FileArtifactStore } from '../adapters/storage/FileArtifactStore.js';
import { InMemoryArtifactStore } from '../adapters/storage/InMemoryArtifactStore.js';
import { loadConfig } from '../config/Config.js';
import type { AppConfig } from '../config/Config.js';
import { createLogger } from '../logging/logger.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  logger?: Logger;
  extractor?: DocumentExtractorPort;
  oracle?: LLMOraclePort;
  storage?: ArtifactStoragePort;
}

export class AppContainer {
  readonly config: AppConfig;
  readonly logger: Logger;

  readonly extractor: DocumentExtractorPort;
  readonly oracle: LLMOraclePort;
  readonly storage: ArtifactStoragePort;
  readonly analysisService: StatementAnalysisService;
  readonly questionService: DocumentQuestionService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    this.logger = overrides.logger ?? createLogger(this.config.app.logLevel);

    const oracleConfig = this.config.oracle;
    const analysisConfig = this.config.analysis;

    this.extractor =
      overrides.extractor ??
      new RoutingDocumentExtractor({ '.pdf': new PdfTextExtractor(), '.json': new LayoutResultExtractor() });

    if (overrides.oracle) {
      this.oracle = overrides.oracle;
    } else if (oracleConfig.enabled) {
      this.oracle = OpenAIChatOracle.fromSettings(oracleConfig);
    } else {
      this.logger.warn('no oracle configured; analyses will fail until ORACLE_API_KEY or ORACLE_BASE_URL is set');
      this.oracle = new UnconfiguredOracle();
    }

    this.storage =
      overrides.storage ??
      (this.config.app.artifactDir ? new FileArtifactStore(this.config.app.artifactDir) : new InMemoryArtifactStore());

    this.analysisService = new StatementAnalysisService(
      this.extractor,
      this.oracle,
      this.storage,
      {
        protocol: analysisConfig.protocol,
        modelId: oracleConfig.model,
        maxContextChars: analysisConfig.maxContextChars,
        concurrency: analysisConfig.concurrency,
        reconciliation: {
          balanceTolerance: analysisConfig.balanceTolerance,
          conversionTolerance: analysisConfig.conversionTolerance,
          signConvention: analysisConfig.signConvention,
          parser: { threeDigitPolicy: analysisConfig.threeDigitPolicy },
        },
        discrepancyRateThreshold: analysisConfig.maxDiscrepancyRate,
      },
      this.logger.child({ component: 'analysis' }),
    );

    this.questionService = new DocumentQuestionService(
      this.extractor,
      this.oracle,
      { modelId: oracleConfig.model, maxContextChars: analysisConfig.maxContextChars },
      this.logger.child({ component: 'questions' }),
    );
  }

  hasLiveOracle(): boolean {
    return !(this.oracle instanceof UnconfiguredOracle);
  }
}
