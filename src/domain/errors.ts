export type AnalysisErrorCode = 'FORMAT_ERROR' | 'EXTRACTION_ERROR' | 'ORDERING_ERROR' | 'ORACLE_ERROR';

export abstract class AnalysisError extends Error {
  abstract readonly code: AnalysisErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * An amount string that cannot be resolved to a single numeric value.
 * Scoped to one field; callers decide whether to drop the statement or flag and continue.
 */
export class FormatError extends AnalysisError {
  readonly code = 'FORMAT_ERROR';

  constructor(
    message: string,
    readonly raw: string,
  ) {
    super(message);
  }
}

/** The oracle's answer (or the source document) holds no usable statement structure. */
export class ExtractionError extends AnalysisError {
  readonly code = 'EXTRACTION_ERROR';
  readonly statementId: string | null;

  constructor(message: string, options: { statementId?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.statementId = options.statementId ?? null;
  }
}

export class OrderingError extends AnalysisError {
  readonly code = 'ORDERING_ERROR';

  constructor(
    message: string,
    readonly fromStatementId: string,
    readonly toStatementId: string,
  ) {
    super(message);
  }
}

/** The language model endpoint could not be reached or returned nothing. */
export class OracleUnavailableError extends AnalysisError {
  readonly code = 'ORACLE_ERROR';
}
