export class AppError extends Error {
  readonly statusCode: number;

  readonly code?: string;

  readonly details?: unknown;

  constructor(message: string, statusCode = 500, options?: { code?: string; details?: unknown }) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = options?.code;
    this.details = options?.details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, { code: 'VALIDATION_ERROR', details });
    this.name = 'ValidationError';
  }
}

export type AlignmentErrorKind = 'MissingFeature' | 'UnknownCategory';

const ALIGNMENT_CODES: Record<AlignmentErrorKind, string> = {
  MissingFeature: 'MISSING_FEATURE',
  UnknownCategory: 'UNKNOWN_CATEGORY'
};

export class AlignmentError extends AppError {
  readonly kind: AlignmentErrorKind;

  readonly field: string;

  constructor(kind: AlignmentErrorKind, field: string, message: string, details?: Record<string, unknown>) {
    super(message, 422, { code: ALIGNMENT_CODES[kind], details: { field, ...details } });
    this.name = 'AlignmentError';
    this.kind = kind;
    this.field = field;
  }
}

export class ArtifactUnavailableError extends AppError {
  readonly retryAfterSeconds: number;

  constructor(message = 'Scoring artifact is not loaded', retryAfterSeconds = 5) {
    super(message, 503, { code: 'ARTIFACT_UNAVAILABLE' });
    this.name = 'ArtifactUnavailableError';
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export type ArtifactLoadFailure = 'unreadable' | 'corrupt' | 'version_mismatch';

export class ArtifactLoadError extends AppError {
  readonly reason: ArtifactLoadFailure;

  constructor(reason: ArtifactLoadFailure, message: string, details?: unknown) {
    super(message, 503, { code: 'ARTIFACT_LOAD_FAILED', details: { reason, ...(details ? { cause: details } : {}) } });
    this.name = 'ArtifactLoadError';
    this.reason = reason;
  }
}

export class ScoringError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 500, { code: 'SCORING_ERROR', details });
    this.name = 'ScoringError';
  }
}

export class LedgerWriteFailure extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 500, { code: 'LEDGER_WRITE_FAILURE', details });
    this.name = 'LedgerWriteFailure';
  }
}

export class MonitorEvaluationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 500, { code: 'MONITOR_EVALUATION_ERROR', details });
    this.name = 'MonitorEvaluationError';
  }
}

const BODY_ERROR_CODES: Record<number, string> = {
  413: 'PAYLOAD_TOO_LARGE',
  415: 'UNSUPPORTED_MEDIA_TYPE'
};

/**
 * Maps the http-errors shape thrown by body-parser (`status` in the 4xx
 * range, `expose: true`) onto an AppError. Returns null for anything else.
 */
export function fromBodyParserError(error: unknown): AppError | null {
  if (!(error instanceof Error) || !('status' in error) || typeof error.status !== 'number') {
    return null;
  }
  if (error.status < 400 || error.status >= 500 || !('expose' in error) || error.expose !== true) {
    return null;
  }
  const type = 'type' in error && typeof error.type === 'string' ? error.type : undefined;
  const message = type === 'entity.parse.failed' ? 'Request body is not valid JSON' : error.message;
  return new AppError(message, error.status, {
    code: BODY_ERROR_CODES[error.status] ?? 'VALIDATION_ERROR',
    details: type ? { type } : undefined
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'unknown';
}
