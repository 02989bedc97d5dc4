/**
 * Per-call pipeline options.
 *
 * Callers pass a loose snake_case object (often straight from a form or a
 * job payload, so booleans arrive as "1", "yes", "✅" and lists as comma or
 * JSON strings). It is parsed once into `PipelineOptions`; nothing downstream
 * reads the raw object again.
 */

import { z } from 'zod';
import { WHT_DEFAULTS, type GlBucket } from '../constants';
import { isObject, isString, safeParseJson } from '../types/guards';

export type GlCodeEntry = string | Partial<Record<GlBucket, string>>;

export interface PipelineOptions {
  /** Compute withholding from the tax-exclusive base when none is present */
  calculateWht: boolean;
  /** Look for a withholding phrase in the document text */
  autoDetectWht: boolean;
  whtRate: number;
  filingCodeWithWht: string;
  filingCodeWithoutWht: string;
  /** Let text detection replace a withholding amount the extractor supplied */
  overrideExistingWht: boolean;
  clientTaxId: string;
  clientTaxIds: string[];
  /** Upper-cased client tags (`RABBIT`, `SHD`, …) */
  clientTags: string[];
  glCodeMap: Record<string, GlCodeEntry>;
  companyNameByTaxId: Record<string, string>;
}

const TRUE_TOKENS: ReadonlySet<string> = new Set(['1', 'true', 'yes', 'y', 'on', 'enable', 'enabled', '✅']);

export function isTruthy(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) && value !== 0;
  return TRUE_TOKENS.has(String(value).trim().toLowerCase());
}

/**
 * Read a list option given as an array, a JSON list (or JSON string), a comma
 * separated string or a single value. Blank entries are dropped.
 */
export function parseListOption(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) {
    return value.map((item) => String(item).trim()).filter((item) => item.length > 0);
  }
  if (isObject(value)) return [];

  const text = String(value).trim();
  if (!text) return [];

  const looksJson = (text.startsWith('[') && text.endsWith(']')) || (text.startsWith('"') && text.endsWith('"'));
  if (looksJson) {
    const decoded = safeParseJson<unknown>(text, (v): v is unknown => v !== undefined, undefined);
    if (Array.isArray(decoded)) {
      return decoded.map((item) => String(item).trim()).filter((item) => item.length > 0);
    }
    if (isString(decoded) && decoded.trim()) {
      return [decoded.trim()];
    }
  }

  if (text.includes(',')) {
    return text.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
  }
  return [text];
}

function toText(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (isObject(value) || Array.isArray(value)) return '';
  return String(value).trim();
}

function toRate(value: unknown): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : WHT_DEFAULTS.RATE;
  const text = toText(value);
  if (!text) return WHT_DEFAULTS.RATE;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : WHT_DEFAULTS.RATE;
}

function toObject(value: unknown): Record<string, unknown> {
  if (isObject(value)) return value;
  if (isString(value) && value.trim().startsWith('{')) {
    return safeParseJson(value, isObject, {});
  }
  return {};
}

function toGlCodeMap(value: unknown): Record<string, GlCodeEntry> {
  const out: Record<string, GlCodeEntry> = {};
  for (const [taxId, entry] of Object.entries(toObject(value))) {
    if (isString(entry)) {
      if (entry.trim()) out[taxId.trim()] = entry.trim();
      continue;
    }
    if (!isObject(entry)) continue;

    const buckets: Partial<Record<GlBucket, string>> = {};
    for (const bucket of ['ADS', 'MARKETPLACE', 'DEFAULT'] as const) {
      const code = entry[bucket];
      if (isString(code) && code.trim()) buckets[bucket] = code.trim();
    }
    out[taxId.trim()] = buckets;
  }
  return out;
}

function toStringMap(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(toObject(value))) {
    if (isString(entry) && entry.trim()) out[key.trim()] = entry.trim();
  }
  return out;
}

export const pipelineConfigSchema = z
  .object({
    calculate_wht: z.unknown(),
    wht_enabled: z.unknown(),
    auto_detect_wht: z.unknown(),
    wht_rate: z.unknown(),
    pnd_when_wht: z.unknown(),
    pnd_when_no_wht: z.unknown(),
    wht_override_existing: z.unknown(),
    client_tax_id: z.unknown(),
    client_tax_ids: z.unknown(),
    client_tags: z.unknown(),
    gl_code_map: z.unknown(),
    company_name_by_tax_id: z.unknown(),
  })
  .passthrough()
  .catch({})
  .transform((raw): PipelineOptions => ({
    calculateWht: isTruthy(raw.calculate_wht !== undefined ? raw.calculate_wht : raw.wht_enabled),
    autoDetectWht: raw.auto_detect_wht === undefined ? true : isTruthy(raw.auto_detect_wht),
    whtRate: toRate(raw.wht_rate),
    filingCodeWithWht: toText(raw.pnd_when_wht) || WHT_DEFAULTS.FILING_CODE_WITH_WHT,
    filingCodeWithoutWht: toText(raw.pnd_when_no_wht) || WHT_DEFAULTS.FILING_CODE_WITHOUT_WHT,
    overrideExistingWht: isTruthy(raw.wht_override_existing),
    clientTaxId: toText(raw.client_tax_id),
    clientTaxIds: parseListOption(raw.client_tax_ids),
    clientTags: parseListOption(raw.client_tags).map((tag) => tag.toUpperCase()),
    glCodeMap: toGlCodeMap(raw.gl_code_map),
    companyNameByTaxId: toStringMap(raw.company_name_by_tax_id),
  }));

export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

/**
 * Parse a loose options object. Never throws: anything unreadable falls back
 * to the defaults.
 */
export function parsePipelineOptions(input: unknown): PipelineOptions {
  return pipelineConfigSchema.parse(isObject(input) ? input : {});
}

export const DEFAULT_PIPELINE_OPTIONS: Readonly<PipelineOptions> = parsePipelineOptions({});
