/**
 * Extraction Pipeline
 *
 * One document in, one locked accounting row out.
 *
 * Stages:
 * 1. Client - which operating company the document belongs to
 * 2. Classification - platform label from the classifier collaborator
 * 3. Extraction - registry dispatch, generic fallback on a missing or failing extractor
 * 4. Enhancement - optional best-effort patch (non-ads platforms)
 * 5. Validation + one optional repair pass
 * 6. Vendor code lookup
 * 7. Finalization - reference, wallet, GL, withholding, schema lock
 *
 * Collaborator failures never abort a document. They are logged, kept as
 * `_collaborator_errors` and the affected field stays unresolved.
 */

import {
  ADS_PLATFORMS,
  normalizePlatformRoute,
  platformLabelFor,
  UNKNOWN_VENDOR_CODE,
  type PlatformLabel,
  type PlatformRoute,
} from '@shared/constants';
import { PipelineError, type PipelineStage } from '@shared/errors';
import {
  appendDiagnostic,
  cellText,
  coerceDraftRow,
  diagnosticText,
  isBlankCell,
  type DraftRow,
  type LockedRow,
  type RowValidationIssue,
} from '@shared/schema/accounting-row';
import { parsePipelineOptions } from '@shared/schema/pipeline-config';
import { isObject } from '@shared/types/guards';
import type {
  CollaboratorResult,
  ExtractorInput,
  ExtractorRegistration,
  PatchProvider,
  PatchRequest,
  PipelineCollaborators,
} from '@shared/types/services';
import { config as processConfig, type Config } from '../config';
import { CODE_PATTERNS, DIAGNOSTICS } from '../config/constants';
import { resolveClientTaxId } from './client-identity';
import { ExtractorRegistry } from './extractors/extractor-registry';
import { logger, type DocumentLogger } from './logger';
import { finalizeRow } from './row-finalizer';
import { mergePatch, sanitizePatch, type MergeMode, type MergeResult } from './row-merge';
import { validateRow } from './row-validation';

// =============================================================================
// TYPES
// =============================================================================

export interface ExtractRowOptions {
  filename?: string;
  /** Operating company tax id; resolved from `config` when omitted */
  clientTaxId?: string;
  /** Loose per-call options (`calculate_wht`, `client_tags`, `gl_code_map`, …) */
  config?: unknown;
  /** Platform label to use when no classifier is configured or it has no answer */
  platform?: string;
}

export interface ExtractRowResult {
  platform: PlatformLabel;
  row: LockedRow;
  /** Issues of the finalized row; empty when it passes */
  errors: RowValidationIssue[];
}

// =============================================================================
// COLLABORATOR CALLS
// =============================================================================

/**
 * Call an optional collaborator and classify the outcome. A throw becomes a
 * `failed` result carrying a `PipelineError` for `stage`.
 */
export function invokeCollaborator<T>(
  stage: PipelineStage,
  call: (() => T) | undefined,
  hasAnswer: (value: T) => boolean
): CollaboratorResult<T> {
  if (!call) return { status: 'unavailable' };

  try {
    const value = call();
    return hasAnswer(value) ? { status: 'resolved', value } : { status: 'not_found' };
  } catch (error) {
    return { status: 'failed', error: PipelineError.collaboratorFailed(stage, error) };
  }
}

/** Records a failed result and passes every result through. */
type Tracker = <T>(result: CollaboratorResult<T>) => CollaboratorResult<T>;

const hasText = (value: string): boolean => value.trim() !== '';
const hasFields = (value: Record<string, unknown>): boolean => isObject(value) && Object.keys(value).length > 0;

function describeConfig(raw: unknown): string {
  let text: string;
  try {
    text = JSON.stringify(raw) ?? '';
  } catch (error) {
    text = `[unserializable options: ${error instanceof Error ? error.message : String(error)}]`;
  }
  return text.slice(0, DIAGNOSTICS.CONFIG_ECHO_LENGTH);
}

// =============================================================================
// PIPELINE CLASS
// =============================================================================

export class ExtractionPipeline {
  private readonly collaborators: PipelineCollaborators;
  private readonly runtime: Config;

  constructor(collaborators: PipelineCollaborators, runtime: Config = processConfig) {
    this.collaborators = collaborators;
    this.runtime = runtime;
  }

  /**
   * Run one document through every stage.
   */
  extractRow(text: string, options: ExtractRowOptions = {}): ExtractRowResult {
    const filename = options.filename ?? '';
    const pipelineOptions = parsePipelineOptions(options.config);
    const log = logger.forDocument(filename);
    const failures: PipelineError[] = [];

    const track: Tracker = (result) => {
      if (result.status === 'failed') {
        log.warn(`${result.error.stage} collaborator failed`, { code: result.error.code, message: result.error.message });
        failures.push(result.error);
      }
      return result;
    };

    // Stage 1: client
    let clientTaxId = resolveClientTaxId(options.clientTaxId ?? '', pipelineOptions);
    if (!clientTaxId) {
      const { clientDetector } = this.collaborators;
      const detected = track(
        invokeCollaborator('client_detection', clientDetector && (() => clientDetector(text)), hasText)
      );
      if (detected.status === 'resolved') clientTaxId = detected.value.trim();
    }

    // Stage 2: classification
    const { classifier } = this.collaborators;
    const classified = track(
      invokeCollaborator('classifier', classifier && (() => classifier(text, filename)), hasText)
    );
    const platformRaw = classified.status === 'resolved' ? classified.value : options.platform ?? '';
    const route = normalizePlatformRoute(platformRaw);
    const platform = platformLabelFor(route);

    log.debug('Document classified', { platform, route, clientTaxId });

    // Stage 3: extraction
    const input: ExtractorInput = {
      text,
      filename,
      clientTaxId,
      options: pipelineOptions,
      platformHint: route,
    };
    let row = this.runExtractor(route, input, log, failures);

    if (row.seq === undefined) row.seq = '';
    if (isBlankCell(row, 'quantity')) row.quantity = '1';

    if (this.runtime.diagnostics.classifier) {
      row._platform = platform;
      row._platform_route = route;
      row._platform_raw = platformRaw;
      row._filename = filename;
      if (isObject(options.config) && Object.keys(options.config).length > 0) {
        row._cfg = describeConfig(options.config);
      }
    }

    const isAds = ADS_PLATFORMS.has(route);
    const request = (validationErrors: RowValidationIssue[]): PatchRequest => ({
      text,
      filename,
      clientTaxId,
      platform,
      options: pipelineOptions,
      validationErrors,
    });

    // Stage 4: enhancement
    let enhancedKeys: ReadonlySet<string> = new Set();
    if (!isAds && this.runtime.passes.enhance) {
      const mode: MergeMode = this.runtime.passes.enhanceFillMissing ? 'fill_missing' : 'overwrite';
      const enhanced = this.applyPatch('enhancement', this.collaborators.enhancer, request([]), row, mode, new Set(), track);
      if (enhanced) {
        row = enhanced.row;
        enhancedKeys = new Set(enhanced.appliedKeys);
        const method = diagnosticText(row, '_extraction_method');
        if (method) row._extraction_method = `${method}+patch`;
        log.debug('Enhancement patch merged', { mode, applied: enhanced.appliedKeys });
      }
    }

    // Stage 5: validation + repair
    let issues = validateRow(row);
    if (issues.length > 0 && !isAds && this.runtime.passes.repair) {
      const repaired = this.applyPatch('repair', this.collaborators.repairer, request(issues), row, 'overwrite', enhancedKeys, track);
      if (repaired) {
        row = repaired.row;
        issues = validateRow(row);
        log.debug('Repair patch merged', { applied: repaired.appliedKeys, remaining: issues.length });
      }
    }

    // Stage 6: vendor code
    this.applyVendorCode(row, clientTaxId, track);

    if (this.runtime.diagnostics.collaboratorErrors) {
      for (const failure of failures) appendDiagnostic(row, '_collaborator_errors', failure.toDiagnostic());
    }

    // Stage 7: finalization
    const locked = finalizeRow(
      { row, platform, text, filename, clientTaxId, options: pipelineOptions },
      this.runtime
    );
    const errors = validateRow(locked);

    log.info('Row extracted', {
      platform,
      method: diagnosticText(locked, '_extraction_method'),
      errors: errors.length,
      collaboratorFailures: failures.length,
    });

    return { platform, row: locked, errors };
  }

  // ===== STAGES =====

  private runExtractor(
    route: PlatformRoute,
    input: ExtractorInput,
    log: DocumentLogger,
    failures: PipelineError[]
  ): DraftRow {
    const { extractors } = this.collaborators;
    const registration = extractors.get(route);
    const fallback = extractors.fallback();

    if (!registration) {
      const row = this.runFallback(fallback, input, log, failures);
      if (route === 'GENERIC') {
        row._extraction_method = fallback.method;
      } else {
        row._missing_extractor = route.toLowerCase();
        row._extraction_method = `${fallback.method}_${route.toLowerCase()}_fallback`;
      }
      return row;
    }

    try {
      const row = coerceDraftRow(registration.extract(input));
      row._extraction_method = registration.method;
      return row;
    } catch (error) {
      const failure = PipelineError.extractorFailed(route, error);
      log.error('Extractor failed, using generic fallback', { route }, failure);

      const row = this.runFallback(fallback, input, log, failures);
      row._extractor_error = failure.toDiagnostic();
      row._extraction_method = `${fallback.method}_error_fallback`;
      return row;
    }
  }

  private runFallback(
    fallback: ExtractorRegistration,
    input: ExtractorInput,
    log: DocumentLogger,
    failures: PipelineError[]
  ): DraftRow {
    try {
      return coerceDraftRow(fallback.extract({ ...input, platformHint: 'GENERIC' }));
    } catch (error) {
      const failure = PipelineError.extractorFailed('GENERIC', error);
      log.error('Fallback extractor failed, continuing with an empty row', {}, failure);
      failures.push(failure);
      return {};
    }
  }

  private applyPatch(
    stage: 'enhancement' | 'repair',
    provider: PatchProvider | undefined,
    request: PatchRequest,
    row: DraftRow,
    mode: MergeMode,
    protectedKeys: ReadonlySet<string>,
    track: Tracker
  ): MergeResult | undefined {
    const result = track(invokeCollaborator(stage, provider && (() => provider(request)), hasFields));
    if (result.status !== 'resolved') return undefined;
    return mergePatch(row, sanitizePatch(result.value), mode, protectedKeys);
  }

  private applyVendorCode(row: DraftRow, clientTaxId: string, track: Tracker): void {
    const { vendorLookup } = this.collaborators;
    const vendorCode = cellText(row, 'vendorCode');
    const query = {
      clientTaxId,
      vendorTaxId: cellText(row, 'taxId'),
      vendorName:
        diagnosticText(row, '_vendor_name') ||
        (vendorCode.toLowerCase() === UNKNOWN_VENDOR_CODE.toLowerCase() ? '' : vendorCode),
    };

    const result = track(invokeCollaborator('vendor_lookup', vendorLookup && (() => vendorLookup(query)), hasText));
    if (result.status !== 'resolved') return;

    const code = result.value.trim().toUpperCase();
    if (!CODE_PATTERNS.VENDOR_CODE.test(code)) return;

    row.vendorCode = code;
    if (this.runtime.diagnostics.vendor) {
      row._client_tax_id_used = query.clientTaxId;
      row._vendor_tax_id_used = query.vendorTaxId;
      row._vendor_code_resolved = code;
    }
  }
}

/**
 * Extract one row with the built-in extractors and any extra collaborators.
 */
export function extractRow(
  text: string,
  options: ExtractRowOptions = {},
  collaborators: Partial<PipelineCollaborators> = {}
): ExtractRowResult {
  const pipeline = new ExtractionPipeline({
    ...collaborators,
    extractors: collaborators.extractors ?? ExtractorRegistry.withBuiltIns(),
  });
  return pipeline.extractRow(text, options);
}
