import { describe, expect, it } from 'vitest';
import { loadConfig } from '../Config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});

    expect(config.oracle.enabled).toBe(false);
    expect(config.oracle.baseUrl).toBe('https://openrouter.ai/api/v1');
    expect(config.analysis.protocol).toEqual({ version: 'dual-amount', stepwiseValidation: true });
    expect(config.analysis.balanceTolerance.toString()).toBe('0.01');
    expect(config.analysis.conversionTolerance.toString()).toBe('0.005');
    expect(config.analysis.maxDiscrepancyRate).toBeNull();
    expect(config.analysis.threeDigitPolicy).toBe('thousands');
    expect(config.analysis.concurrency).toBe(4);
    expect(config.app.artifactDir).toBeNull();
    expect(config.app.logLevel).toBe('debug');
  });

  it('reads oracle and analysis settings from the environment', () => {
    const config = loadConfig({
      OPENROUTER_API_KEY: 'test-key',
      ORACLE_MODEL: 'test-model',
      ORACLE_TIMEOUT_MS: '5000',
      ANALYSIS_PROTOCOL: 'single-amount',
      ANALYSIS_STEPWISE_VALIDATION: 'false',
      ANALYSIS_BALANCE_TOLERANCE: '0.05',
      ANALYSIS_MAX_DISCREPANCY_RATE: '0.1',
      ANALYSIS_THREE_DIGIT_POLICY: 'decimal',
      ANALYSIS_CONCURRENCY: '0',
      ARTIFACT_DIR: ' ./artifacts ',
      NODE_ENV: 'production',
    });

    expect(config.oracle.apiKey).toBe('test-key');
    expect(config.oracle.enabled).toBe(true);
    expect(config.oracle.model).toBe('test-model');
    expect(config.oracle.timeoutMs).toBe(5000);
    expect(config.analysis.protocol).toEqual({ version: 'single-amount', stepwiseValidation: false });
    expect(config.analysis.balanceTolerance.toString()).toBe('0.05');
    expect(config.analysis.maxDiscrepancyRate).toBe(0.1);
    expect(config.analysis.threeDigitPolicy).toBe('decimal');
    expect(config.analysis.concurrency).toBe(1);
    expect(config.app.artifactDir).toBe('./artifacts');
    expect(config.app.logLevel).toBe('info');
  });

  it('enables a keyless local endpoint', () => {
    const config = loadConfig({ ORACLE_BASE_URL: 'http://localhost:11434/v1/' });
    expect(config.oracle.baseUrl).toBe('http://localhost:11434/v1');
    expect(config.oracle.enabled).toBe(true);
  });

  it('merges sign convention overrides over the defaults', () => {
    const config = loadConfig({ ANALYSIS_SIGN_CONVENTION: '{"Sparplan":"DEBIT","Gutschrift":"DEBIT"}' });

    expect(config.analysis.signConvention.directions.Sparplan).toBe('DEBIT');
    expect(config.analysis.signConvention.directions.Gutschrift).toBe('DEBIT');
    expect(config.analysis.signConvention.directions.Lastschrift).toBe('DEBIT');
  });

  it('rejects invalid settings', () => {
    expect(() => loadConfig({ ANALYSIS_PROTOCOL: 'triple' })).toThrow(/ANALYSIS_PROTOCOL/);
    expect(() => loadConfig({ ANALYSIS_THREE_DIGIT_POLICY: 'guess' })).toThrow(/ANALYSIS_THREE_DIGIT_POLICY/);
    expect(() => loadConfig({ ANALYSIS_SIGN_CONVENTION: '{"Sparplan":"SIDEWAYS"}' })).toThrow();
    expect(() => loadConfig({ ANALYSIS_SIGN_CONVENTION: 'not json' })).toThrow(/not valid JSON/);
    expect(() => loadConfig({ ANALYSIS_MAX_DISCREPANCY_RATE: '5%' })).toThrow(
      'ANALYSIS_MAX_DISCREPANCY_RATE must be a fraction between 0 and 1, got "5%"',
    );
    expect(() => loadConfig({ ANALYSIS_MAX_DISCREPANCY_RATE: '1.5' })).toThrow(/ANALYSIS_MAX_DISCREPANCY_RATE/);
  });
});
