/**
 * Reference Resolver
 *
 * Picks the one document number a row is filed under. Candidates come from
 * the extractor (invoice number, reference), from the document text and
 * finally from the file name; each is reduced to its structural core and
 * scored by how specific its shape is.
 *
 * The result is written to both `reference` and `invoiceNo`. Resolving an
 * already resolved value returns it unchanged.
 */

import * as path from 'path';
import type { DraftRow } from '@shared/schema/accounting-row';
import { diagnosticText } from '@shared/schema/accounting-row';
import { REFERENCE_SCORES } from '../config/constants';
import { compactNoWhitespace } from '../utils/text';

// ═══════════════════════════════════════════════════════════════════════════
// SHAPES
// ═══════════════════════════════════════════════════════════════════════════

/** Structural cores, searched anywhere in a candidate. */
const CORE_PATTERNS: readonly RegExp[] = [
  /(TRS[A-Z0-9\-_/.]{10,})/i,
  /(RCS[A-Z0-9\-_/.]{10,})/i,
  /(TTSTH\d{8,})/i,
  /\b(THMPTI\d{10,})\b/i,
];

/** The same cores, anchored, for scoring. */
const SCORED_SHAPES: ReadonlyArray<readonly [RegExp, number]> = [
  [/^TRS[A-Z0-9\-_/.]{10,}/i, REFERENCE_SCORES.TRS],
  [/^RCS[A-Z0-9\-_/.]{10,}/i, REFERENCE_SCORES.RCS],
  [/^TTSTH\d{8,}/i, REFERENCE_SCORES.TTSTH],
  [/^THMPTI\d{10,}\b/i, REFERENCE_SCORES.LAZADA_INVOICE],
];

const HASH_RE = /^[a-f0-9]{32}$/i;
const GENERIC_TOKEN_RE = /^[A-Z0-9\-_/.]+$/i;
const EXTENSION_RE = /\.(pdf|png|jpg|jpeg|xlsx|xls)$/i;
const NOISE_PREFIX_RE = /^(?:Shopee-)?TI[VR]-|^Shopee-|^TIV-|^TIR-|^SPX-|^LAZ-|^LZD-|^TikTok-/i;

// Text patterns (global: every occurrence is a candidate)
const LAZADA_INVOICE_TEXT_RE = /\b(THMPTI\d{10,})\b/gi;
const INVOICE_BLOCK_TEXT_RE =
  /(?:Invoice\s*No\.?|Tax\s*Invoice\s*\/\s*Receipt|Receipt\s*No\.?)\s*[:：]?\s*([A-Z0-9\-_/.]{8,})/gi;
const CORE_TEXT_PATTERNS: readonly RegExp[] = [
  /(TRS[A-Z0-9\-_/.]{10,})/gi,
  /(RCS[A-Z0-9\-_/.]{10,})/gi,
  /(TTSTH\d{8,})/gi,
];

/** Row diagnostics that may carry the source file name. */
const FILENAME_DIAGNOSTICS = ['_filename', '_source_file', '_file'] as const;

// ═══════════════════════════════════════════════════════════════════════════
// NORMALIZATION
// ═══════════════════════════════════════════════════════════════════════════

function stripRepeated(value: string, pattern: RegExp): string {
  let current = value;
  let next = current.replace(pattern, '');
  while (next !== current) {
    current = next;
    next = current.replace(pattern, '');
  }
  return current;
}

export function isProbablyHash(value: string): boolean {
  return HASH_RE.test(value.trim());
}

/**
 * Reduce a raw candidate to its document-number core.
 *
 * "Shopee-TIV-TRSPEMKP00-00000-251203-0012589.pdf" → "TRSPEMKP00-00000-251203-0012589"
 */
export function normalizeReferenceCore(value: string | undefined): string {
  const compact = compactNoWhitespace(value);
  if (!compact) return '';

  const withoutExt = stripRepeated(compact, EXTENSION_RE);

  for (const pattern of CORE_PATTERNS) {
    const match = pattern.exec(withoutExt);
    if (match) return compactNoWhitespace(match[1]);
  }

  let stripped = withoutExt;
  let previous = '';
  while (stripped !== previous) {
    previous = stripped;
    stripped = stripRepeated(stripRepeated(stripped, NOISE_PREFIX_RE), EXTENSION_RE);
  }

  return stripped || withoutExt;
}

function uniqueNonEmpty(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of values) {
    const value = raw.trim();
    if (!value || seen.has(value)) continue;
    seen.add(value);
    out.push(value);
  }
  return out;
}

/**
 * Reference-shaped strings found in document text, normalized, in order:
 * Lazada invoice numbers, labeled "Invoice No." blocks, then TRS/RCS/TTSTH cores.
 */
export function extractReferenceCandidatesFromText(text: string): string[] {
  if (!text) return [];

  const found: string[] = [];
  for (const match of text.matchAll(LAZADA_INVOICE_TEXT_RE)) {
    found.push(normalizeReferenceCore(match[1]));
  }
  for (const match of text.matchAll(INVOICE_BLOCK_TEXT_RE)) {
    found.push(normalizeReferenceCore(match[1]));
  }
  for (const pattern of CORE_TEXT_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      found.push(normalizeReferenceCore(match[1]));
    }
  }

  return uniqueNonEmpty(found);
}

// ═══════════════════════════════════════════════════════════════════════════
// SCORING & SELECTION
// ═══════════════════════════════════════════════════════════════════════════

export function scoreReference(platform: string, reference: string): number {
  const ref = reference.trim();
  if (!ref) return 0;

  if (isProbablyHash(ref)) return REFERENCE_SCORES.HASH;

  for (const [shape, score] of SCORED_SHAPES) {
    if (shape.test(ref)) return score;
  }

  if (platform.trim().toUpperCase() === 'LAZADA' && ref.toUpperCase().startsWith('TH') && ref.length >= 12) {
    return REFERENCE_SCORES.LAZADA_TH_TOKEN;
  }

  if (ref.length >= 10 && GENERIC_TOKEN_RE.test(ref)) {
    return REFERENCE_SCORES.GENERIC_LONG;
  }

  return REFERENCE_SCORES.OTHER;
}

/**
 * Highest-scoring candidate, earliest on ties. A hash-shaped winner gives way
 * to the first candidate that is not a hash.
 */
export function pickBestReference(platform: string, candidates: readonly string[]): string {
  const unique = uniqueNonEmpty(candidates);
  if (unique.length === 0) return '';

  let best = unique[0];
  let bestScore = scoreReference(platform, best);
  for (const candidate of unique.slice(1)) {
    const score = scoreReference(platform, candidate);
    if (score > bestScore) {
      best = candidate;
      bestScore = score;
    }
  }

  if (isProbablyHash(best)) {
    best = unique.find((candidate) => !isProbablyHash(candidate)) ?? best;
  }

  return compactNoWhitespace(best);
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base name of the source file: the explicit name first, then whatever the
 * row recorded.
 */
export function resolveSourceFilename(filename: string, row: DraftRow): string {
  const explicit = filename.trim();
  if (explicit) return path.win32.basename(explicit);

  for (const key of FILENAME_DIAGNOSTICS) {
    const recorded = diagnosticText(row, key);
    if (recorded) return path.win32.basename(recorded);
  }
  return '';
}

export interface ReferenceQuery {
  platform: string;
  sourceFilename: string;
  row: DraftRow;
  text: string;
}

export function resolveReference({ platform, sourceFilename, row, text }: ReferenceQuery): string {
  const candidates = [
    normalizeReferenceCore(row.invoiceNo),
    normalizeReferenceCore(row.reference),
    ...extractReferenceCandidatesFromText(text),
    sourceFilename ? normalizeReferenceCore(sourceFilename) : '',
  ];
  return pickBestReference(platform, candidates);
}
