import type { LLMOraclePort } from '../../../application/ports/LLMOraclePort.js';
import { OracleUnavailableError } from '../../../domain/errors.js';

export class UnconfiguredOracle implements LLMOraclePort {
  async complete(): Promise<string> {
    throw new OracleUnavailableError(
      'No oracle is configured. Set ORACLE_API_KEY (or OPENROUTER_API_KEY) or point ORACLE_BASE_URL at a local endpoint.',
    );
  }
}
