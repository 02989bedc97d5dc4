/**
 * Shared error types for the extraction pipeline.
 *
 * Validation problems are collected as `RowValidationIssue` values and never
 * thrown. Everything below is for failures of code the pipeline calls out to
 * (classifier, extractors, patch providers, vendor lookup) and for bad setup.
 */

export const ERROR_CODES = {
  // Input validation
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
  LOOKUP_TABLE_INVALID: 'LOOKUP_TABLE_INVALID',

  // Collaborator failures
  CLASSIFIER_FAILED: 'CLASSIFIER_FAILED',
  EXTRACTOR_FAILED: 'EXTRACTOR_FAILED',
  PATCH_FAILED: 'PATCH_FAILED',
  REPAIR_FAILED: 'REPAIR_FAILED',
  VENDOR_LOOKUP_FAILED: 'VENDOR_LOOKUP_FAILED',
  CLIENT_DETECTION_FAILED: 'CLIENT_DETECTION_FAILED',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

/**
 * Pipeline stage an error was raised in
 */
export type PipelineStage =
  | 'config'
  | 'client_detection'
  | 'classifier'
  | 'extractor'
  | 'enhancement'
  | 'repair'
  | 'vendor_lookup'
  | 'finalizer';

const STAGE_ERROR_CODES: Readonly<Record<PipelineStage, ErrorCode>> = {
  config: ERROR_CODES.INVALID_CONFIGURATION,
  client_detection: ERROR_CODES.CLIENT_DETECTION_FAILED,
  classifier: ERROR_CODES.CLASSIFIER_FAILED,
  extractor: ERROR_CODES.EXTRACTOR_FAILED,
  enhancement: ERROR_CODES.PATCH_FAILED,
  repair: ERROR_CODES.REPAIR_FAILED,
  vendor_lookup: ERROR_CODES.VENDOR_LOOKUP_FAILED,
  finalizer: ERROR_CODES.VALIDATION_FAILED,
};

/** Longest error text that is copied into a row diagnostic. */
export const MAX_DIAGNOSTIC_MESSAGE_LENGTH = 500;

/**
 * Extract a message from anything that was thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/**
 * Clip an error message to the length a diagnostic value may carry.
 */
export function toDiagnosticMessage(error: unknown, maxLength: number = MAX_DIAGNOSTIC_MESSAGE_LENGTH): string {
  const message = getErrorMessage(error);
  return message.length > maxLength ? message.slice(0, maxLength) : message;
}

export class PipelineError extends Error {
  public details?: Record<string, unknown>;

  constructor(
    message: string,
    public code: ErrorCode,
    public stage: PipelineStage,
    options?: {
      details?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PipelineError';
    this.details = options?.details;
  }

  /** `"<CODE>: <message>"`, clipped for storage in a row. */
  toDiagnostic(): string {
    return toDiagnosticMessage(`${this.code}: ${this.message}`);
  }

  // ========== Static factory methods ==========

  static collaboratorFailed(stage: PipelineStage, error: unknown, details?: Record<string, unknown>) {
    if (isPipelineError(error)) return error;
    return new PipelineError(getErrorMessage(error), STAGE_ERROR_CODES[stage], stage, {
      details,
      cause: error,
    });
  }

  static extractorFailed(route: string, error: unknown) {
    return new PipelineError(
      `Extractor for ${route} failed: ${getErrorMessage(error)}`,
      ERROR_CODES.EXTRACTOR_FAILED,
      'extractor',
      { details: { route }, cause: error }
    );
  }

  static invalidConfiguration(message: string, details?: Record<string, unknown>) {
    return new PipelineError(message, ERROR_CODES.INVALID_CONFIGURATION, 'config', { details });
  }

  static invalidLookupTable(message: string, details?: Record<string, unknown>) {
    return new PipelineError(message, ERROR_CODES.LOOKUP_TABLE_INVALID, 'config', { details });
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
