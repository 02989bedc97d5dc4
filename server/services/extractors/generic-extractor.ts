/**
 * Generic extractor
 *
 * Best-effort reader for documents without a dedicated extractor, and the
 * fallback when a platform extractor throws. Picks up what most Thai tax
 * invoices print: a date, the vendor's 13-digit tax id, the branch, an
 * invoice number and the total.
 */

import type { DraftRow } from '@shared/schema/accounting-row';
import type { ExtractorInput } from '@shared/types/services';
import { VAT_RATE_TOKENS } from '@shared/constants';
import {
  compactNoWhitespace,
  digitsOnly,
  findAmountNearKeyword,
  normalizeDocumentText,
  yyyymmddFromParts,
} from '../../utils/text';

const DATE_YMD_RE = /\b(20\d{2})[-/.](\d{1,2})[-/.](\d{1,2})\b/;
const DATE_DMY_RE = /\b(\d{1,2})[-/.](\d{1,2})[-/.](\d{4})\b/;
const TAX_ID_13_RE = /\b\d{13}\b/g;
const BRANCH_RE = /(?:branch|สาขา(?:ที่)?)\s*[:\-]?\s*(\d{1,5})/i;
const HEAD_OFFICE_RE = /(?:head\s*office|สำนักงานใหญ่)/i;
const INVOICE_NO_RE =
  /(?:invoice\s*(?:no\.?|number)|receipt\s*no\.?|tax\s*invoice\s*no\.?|เลขที่(?:ใบกำกับภาษี)?)\s*[:：#\-]?\s*([A-Za-z0-9][A-Za-z0-9\-_/]{3,})/i;
const TOTAL_RE = /\b(?:grand\s*total|total\s*amount|amount\s*due|total)\b|จำนวนเงินรวม|ยอดรวม|รวมทั้งสิ้น/i;
const VAT_7_RE = /(?:vat\s*7\s*%|ภาษีมูลค่าเพิ่ม\s*7\s*%)/i;

/** Buddhist-era years are converted to the common era. */
function toGregorianYear(year: number): number {
  return year > 2400 ? year - 543 : year;
}

export function extractGenericDate(text: string): string {
  const ymd = DATE_YMD_RE.exec(text);
  if (ymd) {
    const date = yyyymmddFromParts(ymd[1], ymd[2], ymd[3]);
    if (date) return date;
  }

  const dmy = DATE_DMY_RE.exec(text);
  if (dmy) return yyyymmddFromParts(toGregorianYear(Number(dmy[3])), dmy[2], dmy[1]);

  return '';
}

export function extractGeneric({ text, clientTaxId }: ExtractorInput): DraftRow {
  const t = normalizeDocumentText(text);
  const row: DraftRow = { quantity: '1' };
  if (!t) return row;

  const date = extractGenericDate(t);
  if (date) {
    row.docDate = date;
    row.invoiceDate = date;
    row.taxPurchaseDate = date;
  }

  const client = digitsOnly(clientTaxId, 13);
  for (const match of t.matchAll(TAX_ID_13_RE)) {
    if (match[0] !== client) {
      row.taxId = match[0];
      break;
    }
  }

  const branch = BRANCH_RE.exec(t);
  if (branch) {
    row.branchCode = branch[1].padStart(5, '0');
  } else if (HEAD_OFFICE_RE.test(t)) {
    row.branchCode = '00000';
  }

  const invoice = INVOICE_NO_RE.exec(t);
  if (invoice) {
    const invoiceNo = compactNoWhitespace(invoice[1]);
    row.invoiceNo = invoiceNo;
    row.reference = invoiceNo;
  }

  const total = findAmountNearKeyword(t, TOTAL_RE);
  if (total) {
    row.unitPrice = total;
    row.paidAmount = total;
  }

  if (VAT_7_RE.test(t)) row.vatRate = VAT_RATE_TOKENS.STANDARD;

  return row;
}
