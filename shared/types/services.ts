/**
 * Collaborator interfaces for the extraction pipeline.
 *
 * The pipeline owns no OCR, classification, patching or vendor master data;
 * those arrive through the functions below. Each has a fixed parameter set so
 * the pipeline never inspects what a collaborator accepts.
 */

import type { PipelineError } from '../errors';
import type { PlatformRoute } from '../constants';
import type { DraftRow, RowValidationIssue } from '../schema/accounting-row';
import type { PipelineOptions } from '../schema/pipeline-config';

// ===== EXTRACTORS =====

export interface ExtractorInput {
  text: string;
  filename: string;
  /** Tax id of the operating company the document belongs to, `""` if unknown */
  clientTaxId: string;
  options: PipelineOptions;
  platformHint: PlatformRoute;
}

/**
 * Produce an unlocked row from document text. May omit any column, must not
 * apply withholding or lock the row.
 */
export type Extractor = (input: ExtractorInput) => DraftRow;

export interface ExtractorRegistration {
  route: PlatformRoute;
  /** Value written to `_extraction_method` */
  method: string;
  extract: Extractor;
}

export interface ExtractorLookup {
  get(route: PlatformRoute): ExtractorRegistration | undefined;
  fallback(): ExtractorRegistration;
}

// ===== OPTIONAL COLLABORATORS =====

/** Label a document with its platform (free-form, normalized by the pipeline). */
export type PlatformClassifier = (text: string, filename: string) => string;

export interface PatchRequest {
  text: string;
  filename: string;
  clientTaxId: string;
  platform: string;
  options: PipelineOptions;
  /** Issues of the current row; empty for an enhancement pass */
  validationErrors: RowValidationIssue[];
}

/** Best-effort field filler. Returns a loose map that is sanitized before merging. */
export type PatchProvider = (request: PatchRequest) => Record<string, unknown>;

export interface VendorCodeQuery {
  clientTaxId: string;
  vendorTaxId: string;
  vendorName: string;
}

/** Map a vendor to its `Cxxxxx` code; `""` when unknown. */
export type VendorCodeLookup = (query: VendorCodeQuery) => string;

/** Guess the operating company's tax id from document text; `""` when unsure. */
export type ClientDetector = (text: string) => string;

export interface PipelineCollaborators {
  extractors: ExtractorLookup;
  classifier?: PlatformClassifier;
  enhancer?: PatchProvider;
  repairer?: PatchProvider;
  vendorLookup?: VendorCodeLookup;
  clientDetector?: ClientDetector;
}

// ===== RESULTS =====

/**
 * Outcome of calling an optional collaborator: not configured, ran without an
 * answer, answered, or threw.
 */
export type CollaboratorResult<T> =
  | { status: 'unavailable' }
  | { status: 'not_found' }
  | { status: 'resolved'; value: T }
  | { status: 'failed'; error: PipelineError };
