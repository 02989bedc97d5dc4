/**
 * Withholding-Tax Policy Engine
 *
 * Decides the final withholding amount of a row and the net amount actually
 * paid. The row's `paidAmount` (or `unitPrice`) is taken as the VAT-inclusive
 * gross; after this step `paidAmount` holds gross minus withholding.
 *
 * Sources, in order:
 * 1. a withholding phrase in the document text (when auto-detect is on and
 *    the row has no amount yet, or override is requested)
 * 2. rate × tax-exclusive base (when calculation is on and there is still no amount)
 * 3. the amount the extractor supplied
 */

import type { DraftRow } from '@shared/schema/accounting-row';
import { cellText, diagnosticText, isBlankCell } from '@shared/schema/accounting-row';
import type { PipelineOptions } from '@shared/schema/pipeline-config';
import { formatMoney, roundMoney, thaiDigitsToArabic, toAmount } from '../utils/text';

const NO_VAT_TOKENS: ReadonlySet<string> = new Set(['NO', 'NONE', '0', '0%', 'EXEMPT']);

/**
 * VAT rate as a fraction: "7%" → 0.07, "7" → 0.07, "0.07" → 0.07, "NO" → 0.
 */
export function parseVatRate(value: string | number | undefined): number {
  if (value === undefined) return 0;
  const text = String(value).trim().toUpperCase();
  if (!text || NO_VAT_TOKENS.has(text)) return 0;
  if (text.endsWith('%')) return toAmount(text.slice(0, -1)) / 100;
  const rate = toAmount(text);
  return rate > 1 ? rate / 100 : rate;
}

// ═══════════════════════════════════════════════════════════════════════════
// DETECTION
// ═══════════════════════════════════════════════════════════════════════════

const WHT_PHRASES: readonly RegExp[] = [
  /(?:หักภาษี\s*ณ\s*ที่จ่าย|ภาษีหัก\s*ณ\s*ที่จ่าย)[^\d%]{0,40}(\d{1,2}(?:\.\d+)?)\s*%[^\d]{0,40}(\d{1,3}(?:,\d{3})+(?:\.\d{1,2})?|\d+(?:\.\d{1,2})?)/i,
  /withholding\s*tax[^\d%]{0,40}(\d{1,2}(?:\.\d+)?)\s*%[^\d]{0,40}(\d{1,3}(?:,\d{3})+(?:\.\d{1,2})?|\d+(?:\.\d{1,2})?)/i,
];

export interface WithholdingDetection {
  /** Fraction, e.g. 0.03 */
  rate: number;
  amount: number;
}

/**
 * First Thai or English withholding phrase carrying a percentage and an
 * amount ("หักภาษี ณ ที่จ่าย 3% จำนวน 4,414.88").
 */
export function detectWithholdingFromText(text: string): WithholdingDetection | undefined {
  if (!text) return undefined;
  const normalized = thaiDigitsToArabic(text);

  for (const phrase of WHT_PHRASES) {
    const match = phrase.exec(normalized);
    if (match) {
      return { rate: toAmount(match[1]) / 100, amount: toAmount(match[2]) };
    }
  }
  return undefined;
}

// ═══════════════════════════════════════════════════════════════════════════
// POLICY
// ═══════════════════════════════════════════════════════════════════════════

export type WithholdingSource = 'extractor' | 'detected' | 'calculated' | 'none';

export interface WithholdingOutcome {
  source: WithholdingSource;
  whtAmount: number;
  gross: number;
  /** Net paid amount, set when withholding applied to a positive gross */
  net?: number;
}

/**
 * Apply the withholding policy to `row` in place.
 *
 * @param storeMeta - write `_wht_*` / `_gross_amount_before_wht` diagnostics
 */
export function applyWithholdingPolicy(
  row: DraftRow,
  options: PipelineOptions,
  text: string,
  storeMeta = true
): WithholdingOutcome {
  const vatRate = parseVatRate(row.vatRate);

  let wht = toAmount(cellText(row, 'whtAmount'));
  let source: WithholdingSource = wht > 0 ? 'extractor' : 'none';

  let gross = toAmount(row.paidAmount);
  if (gross <= 0) gross = toAmount(row.unitPrice);

  const subtotal = toAmount(diagnosticText(row, '_subtotal_ex_vat'));

  if (options.autoDetectWht && (options.overrideExistingWht || wht <= 0)) {
    const detected = detectWithholdingFromText(text);
    if (detected && detected.amount > 0) {
      wht = roundMoney(detected.amount);
      row.whtAmount = formatMoney(wht);
      source = 'detected';
      if (storeMeta) {
        row._wht_detected_rate = detected.rate.toFixed(4);
        row._wht_detected_amount = formatMoney(detected.amount);
      }
    }
  }

  if (options.calculateWht && wht <= 0) {
    let base = 0;
    if (subtotal > 0) {
      base = subtotal;
    } else if (gross > 0) {
      base = vatRate > 0 ? gross / (1 + vatRate) : gross;
    }

    if (base > 0) {
      wht = Math.max(0, roundMoney(base * options.whtRate));
      row.whtAmount = formatMoney(wht);
      source = 'calculated';
      if (storeMeta) {
        row._wht_calc_rate = options.whtRate.toFixed(4);
        row._wht_calc_base_ex_vat = formatMoney(base);
      }
    }
  }

  if (wht > 0) {
    let net: number | undefined;
    if (gross > 0) {
      if (storeMeta) row._gross_amount_before_wht = formatMoney(gross);
      net = Math.max(0, roundMoney(gross - wht));
      row.paidAmount = formatMoney(net);
    }
    if (isBlankCell(row, 'filingCode')) row.filingCode = options.filingCodeWithWht;
    return { source, whtAmount: wht, gross, net };
  }

  // No withholding: never leave a stale or negative value behind
  if (!options.calculateWht || wht < 0) row.whtAmount = '';
  if (isBlankCell(row, 'filingCode')) row.filingCode = options.filingCodeWithoutWht;
  return { source: 'none', whtAmount: 0, gross };
}
