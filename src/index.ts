#!/usr/bin/env node
import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { createBatchId } from './application/services/StatementAnalysisService.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { FileArtifactStore } from './infrastructure/adapters/storage/FileArtifactStore.js';
import { loadConfig } from './infrastructure/config/Config.js';

const USAGE = `Usage: kontoauszug-audit [--out <dir>] [--batch-id <id>] <file-or-directory>...

Analyses PDF statements (or layout JSON files) as one batch, writes
<out>/<batch-id>.analysis.json and exits with 1 when the report fails.`;

const STATEMENT_EXTENSIONS = new Set(['.pdf', '.json']);
const ARTIFACT_SUFFIX = '.analysis.json';

const isStatementFile = (fileName: string): boolean =>
  STATEMENT_EXTENSIONS.has(path.extname(fileName).toLowerCase()) && !fileName.endsWith(ARTIFACT_SUFFIX);

const collectFiles = async (inputs: string[]): Promise<string[]> => {
  const files: string[] = [];
  for (const input of inputs) {
    const info = await stat(input);
    if (info.isDirectory()) {
      const entries = await readdir(input);
      files.push(...entries.filter(isStatementFile).sort().map((entry) => path.join(input, entry)));
    } else {
      files.push(input);
    }
  }
  return files;
};

const main = async (): Promise<number> => {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o' },
      'batch-id': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help || positionals.length === 0) {
    console.log(USAGE);
    return values.help ? 0 : 2;
  }

  const config = loadConfig();
  const outDir = values.out ?? config.app.artifactDir ?? 'artifacts';
  const container = new AppContainer({ config, storage: new FileArtifactStore(outDir) });

  const files = await collectFiles(positionals);
  if (files.length === 0) {
    container.logger.error({ inputs: positionals }, 'no PDF or JSON statements found');
    return 2;
  }

  const documents = await Promise.all(
    files.map(async (file) => ({
      statementId: path.parse(file).name,
      document: { fileName: path.basename(file), content: await readFile(file) },
    })),
  );

  const batchId = values['batch-id'] ?? createBatchId();
  const { report } = await container.analysisService.analyzeBatch({ batchId, documents });

  container.logger.info(
    {
      artifact: path.join(outDir, `${batchId}${ARTIFACT_SUFFIX}`),
      passed: report.passed,
      statements: report.statementCount,
      failedStatements: report.failedStatements.map((failure) => failure.statementId),
      balanceChecksFailed: report.balanceChecksFailed,
      continuityChecksFailed: report.continuityChecksFailed.length,
      discrepancyRate: report.discrepancyRate,
    },
    report.passed ? 'batch passed' : 'batch failed',
  );

  return report.passed ? 0 : 1;
};

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 2;
  });
