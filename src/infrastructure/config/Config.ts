import { z } from 'zod';
import { MonetaryAmount } from '../../domain/entities/MonetaryAmount.js';
import type { ThreeDigitPolicy } from '../../domain/services/AmountParser.js';
import { DEFAULT_BALANCE_TOLERANCE, DEFAULT_CONVERSION_TOLERANCE } from '../../domain/services/ReconciliationEngine.js';
import { DEFAULT_SIGN_CONVENTION } from '../../domain/services/SignConvention.js';
import type { SignConvention } from '../../domain/services/SignConvention.js';
import { DEFAULT_EXTRACTION_PROTOCOL } from '../../application/protocol/StatementExtractionProtocol.js';
import type { ExtractionProtocol } from '../../application/protocol/StatementExtractionProtocol.js';

const DEFAULT_ORACLE_BASE_URL = 'https://openrouter.ai/api/v1';
const DEFAULT_ORACLE_MODEL = 'openai/gpt-4o-mini';

export interface AppConfig {
  oracle: {
    apiKey: string;
    baseUrl: string;
    model: string;
    timeoutMs: number;
    maxRetries: number;
    temperature: number;
    maxTokens: number;
    enabled: boolean;
  };
  analysis: {
    protocol: ExtractionProtocol;
    balanceTolerance: MonetaryAmount;
    conversionTolerance: MonetaryAmount;
    maxDiscrepancyRate: number | null;
    threeDigitPolicy: ThreeDigitPolicy;
    signConvention: SignConvention;
    concurrency: number;
    maxContextChars: number;
  };
  app: {
    port: number;
    artifactDir: string | null;
    logLevel: string;
  };
}

type Env = Record<string, string | undefined>;

const SignConventionOverrideSchema = z.record(z.string().min(1), z.enum(['DEBIT', 'CREDIT']));

const readEnv = (env: Env, name: string): string | null => {
  const value = env[name];
  if (!value) return null;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : null;
};

const readNumberEnv = (env: Env, name: string, fallback: number): number => {
  const raw = readEnv(env, name);
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

const readBooleanEnv = (env: Env, name: string, fallback: boolean): boolean => {
  const raw = readEnv(env, name)?.toLowerCase();
  if (!raw) return fallback;
  return !['false', '0', 'no', 'off'].includes(raw);
};

const readAmountEnv = (env: Env, name: string, fallback: MonetaryAmount): MonetaryAmount => {
  const raw = readEnv(env, name);
  return raw ? MonetaryAmount.fromPlain(raw).abs() : fallback;
};

const readRateEnv = (env: Env, name: string): number | null => {
  const raw = readEnv(env, name);
  if (!raw) return null;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new Error(`${name} must be a fraction between 0 and 1, got "${raw}"`);
  }
  return parsed;
};

const readProtocol = (env: Env): ExtractionProtocol => {
  const stepwiseValidation = readBooleanEnv(
    env,
    'ANALYSIS_STEPWISE_VALIDATION',
    DEFAULT_EXTRACTION_PROTOCOL.stepwiseValidation,
  );
  const version = readEnv(env, 'ANALYSIS_PROTOCOL');

  if (version === 'single-amount') {
    return { version: 'single-amount', stepwiseValidation };
  }
  if (version === null || version === 'dual-amount') {
    return { version: 'dual-amount', stepwiseValidation };
  }
  throw new Error(`ANALYSIS_PROTOCOL must be "dual-amount" or "single-amount", got "${version}"`);
};

const readThreeDigitPolicy = (env: Env): ThreeDigitPolicy => {
  const policy = readEnv(env, 'ANALYSIS_THREE_DIGIT_POLICY');
  if (policy === null || policy === 'thousands') return 'thousands';
  if (policy === 'decimal') return 'decimal';
  throw new Error(`ANALYSIS_THREE_DIGIT_POLICY must be "thousands" or "decimal", got "${policy}"`);
};

/** Entries from `ANALYSIS_SIGN_CONVENTION` (a JSON object of category to DEBIT/CREDIT) extend the defaults. */
const readSignConvention = (env: Env): SignConvention => {
  const raw = readEnv(env, 'ANALYSIS_SIGN_CONVENTION');
  if (!raw) return DEFAULT_SIGN_CONVENTION;

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new Error('ANALYSIS_SIGN_CONVENTION is not valid JSON', { cause: error });
  }

  const overrides = SignConventionOverrideSchema.parse(json);
  return { directions: { ...DEFAULT_SIGN_CONVENTION.directions, ...overrides } };
};

export const loadConfig = (env: Env = process.env): AppConfig => {
  const apiKey = readEnv(env, 'ORACLE_API_KEY') ?? readEnv(env, 'OPENROUTER_API_KEY') ?? '';
  const baseUrl = (readEnv(env, 'ORACLE_BASE_URL') ?? DEFAULT_ORACLE_BASE_URL).replace(/\/$/, '');

  return {
    oracle: {
      apiKey,
      baseUrl,
      model: readEnv(env, 'ORACLE_MODEL') ?? DEFAULT_ORACLE_MODEL,
      timeoutMs: readNumberEnv(env, 'ORACLE_TIMEOUT_MS', 60_000),
      maxRetries: Math.floor(readNumberEnv(env, 'ORACLE_MAX_RETRIES', 2)),
      temperature: readNumberEnv(env, 'ORACLE_TEMPERATURE', 0),
      maxTokens: Math.floor(readNumberEnv(env, 'ORACLE_MAX_TOKENS', 8_000)),
      // local endpoints such as Ollama take no key
      enabled: apiKey.length > 0 || baseUrl !== DEFAULT_ORACLE_BASE_URL,
    },
    analysis: {
      protocol: readProtocol(env),
      balanceTolerance: readAmountEnv(env, 'ANALYSIS_BALANCE_TOLERANCE', DEFAULT_BALANCE_TOLERANCE),
      conversionTolerance: readAmountEnv(env, 'ANALYSIS_CONVERSION_TOLERANCE', DEFAULT_CONVERSION_TOLERANCE),
      maxDiscrepancyRate: readRateEnv(env, 'ANALYSIS_MAX_DISCREPANCY_RATE'),
      threeDigitPolicy: readThreeDigitPolicy(env),
      signConvention: readSignConvention(env),
      concurrency: Math.max(1, Math.floor(readNumberEnv(env, 'ANALYSIS_CONCURRENCY', 4))),
      maxContextChars: Math.max(1, Math.floor(readNumberEnv(env, 'ANALYSIS_MAX_CONTEXT_CHARS', 15_000))),
    },
    app: {
      port: readNumberEnv(env, 'PORT', 4000),
      artifactDir: readEnv(env, 'ARTIFACT_DIR'),
      logLevel: readEnv(env, 'LOG_LEVEL') ?? (env.NODE_ENV === 'production' ? 'info' : 'debug'),
    },
  };
};
