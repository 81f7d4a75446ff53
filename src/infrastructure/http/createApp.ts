import cors from 'cors';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import path from 'node:path';
import { AnalysisError, OracleUnavailableError } from '../../domain/errors.js';
import { createBatchId } from '../../application/services/StatementAnalysisService.js';
import type { AppContainer } from '../bootstrap/AppContainer.js';

const ACCEPTED_EXTENSIONS = new Set(['.pdf', '.json']);
const MAX_STATEMENTS = 50;

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 10 * 1024 * 1024, // 10MB max
    files: MAX_STATEMENTS,
  },
  fileFilter: (req, file, cb) => {
    if (ACCEPTED_EXTENSIONS.has(path.extname(file.originalname).toLowerCase())) {
      cb(null, true);
    } else {
      cb(new Error('Only PDF statements or layout JSON files are allowed'));
    }
  },
});

const statusFor = (error: unknown): number => {
  if (error instanceof OracleUnavailableError) return 503;
  if (error instanceof AnalysisError) return 422;
  return 500;
};

export const createApp = (container: AppContainer) => {
  const app = express();
  const log = container.logger.child({ component: 'http' });

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: '2mb' }));

  app.get('/api/health', (req, res) => {
    res.json({
      name: 'Kontoauszug Audit API',
      version: '0.1.0',
      oracleConfigured: container.hasLiveOracle(),
      model: container.config.oracle.model,
      protocol: container.config.analysis.protocol,
    });
  });

  app.post('/api/analyses', upload.array('statements', MAX_STATEMENTS), async (req, res) => {
    try {
      const files = Array.isArray(req.files) ? req.files : [];
      if (files.length === 0) {
        return res.status(400).json({ error: 'No statements provided. Upload one or more files as "statements".' });
      }

      const batchId = createBatchId();
      const result = await container.analysisService.analyzeBatch({
        batchId,
        documents: files.map((file) => ({
          statementId: path.parse(file.originalname).name,
          document: { fileName: file.originalname, content: file.buffer },
        })),
      });

      res.status(201).json(result.artifact);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unable to analyse statements';
      log.error({ err: error }, 'analysis request failed');
      res.status(statusFor(error)).json({ error: message });
    }
  });

  app.get('/api/analyses', async (req, res) => {
    try {
      res.json({ batchIds: await container.storage.listBatchIds() });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unable to list analyses';
      res.status(500).json({ error: message });
    }
  });

  app.get('/api/analyses/:batchId', async (req, res) => {
    try {
      const artifact = await container.storage.loadBatch(req.params.batchId);
      if (!artifact) {
        return res.status(404).json({ error: `No analysis stored for ${req.params.batchId}` });
      }
      res.json(artifact);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unable to load analysis';
      res.status(500).json({ error: message });
    }
  });

  app.post('/api/questions', upload.single('document'), async (req, res) => {
    try {
      const question: unknown = req.body?.question;
      if (typeof question !== 'string' || !question.trim()) {
        return res.status(400).json({ error: 'question is required' });
      }
      if (!req.file) {
        return res.status(400).json({ error: 'No document provided. Upload a file as "document".' });
      }

      const answer = await container.questionService.ask({
        question: question.trim(),
        document: { fileName: req.file.originalname, content: req.file.buffer },
      });
      res.json(answer);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unable to answer question';
      log.error({ err: error }, 'question request failed');
      res.status(statusFor(error)).json({ error: message });
    }
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'API endpoint not found' });
  });

  // upload rejections from multer arrive here
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(error);
    }
    const message = error instanceof Error ? error.message : 'Unexpected error';
    res.status(error instanceof Error ? 400 : 500).json({ error: message });
  });

  return app;
};
