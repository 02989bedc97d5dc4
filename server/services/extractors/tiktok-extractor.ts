/**
 * TikTok Shop tax invoice / receipt extractor
 *
 * Reads the invoice number, vendor tax id, branch, invoice date, totals and
 * the withholding footer ("withheld tax at the rate of 3% amounting to
 * ฿4,414.88"). The VAT-inclusive total goes to `paidAmount`; the finalizer
 * nets withholding out of it.
 */

import { EXPENSE_GROUPS, PRICE_TYPES, UNKNOWN_VENDOR_CODE, VAT_RATE_TOKENS } from '@shared/constants';
import type { DraftRow } from '@shared/schema/accounting-row';
import type { ExtractorInput } from '@shared/types/services';
import {
  compactNoWhitespace,
  digitsOnly,
  findAmountNearKeyword,
  formatMoney,
  moneyToText,
  monthFromName,
  normalizeDocumentText,
  toAmount,
  yyyymmddFromParts,
  type YearRange,
} from '../../utils/text';

export const TIKTOK_VENDOR_NAME = 'TikTok Shop (Thailand) Ltd.';

const INVOICE_NO_RE = /\bTTSTH\d{8,}\b/i;
const INVOICE_NUMBER_LINE_RE = /(invoice\s*(?:no|number))\s*[:：#\-]?\s*([A-Za-z0-9][A-Za-z0-9\-_/]{6,})/i;
const INVOICE_DATE_LINE_RE = /(invoice\s*date)\s*[:：\-]?\s*(.+)/i;

const VENDOR_TAX_LINE_RE = /(tax\s*registration\s*number)\s*[:：\-]?\s*(\d{13})/i;
const TAX_ID_13_RE = /\b\d{13}\b/g;
const BRANCH_RE = /(branch|สาขา)\s*[:\-]?\s*(\d{1,5})/i;

const DATE_YMD_RE = /\b(\d{4})[-/](\d{1,2})[-/](\d{1,2})\b/;
const DATE_MON_DD_YYYY_RE = /\b(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)\s+(\d{1,2}),\s*(\d{4})\b/i;
const INVOICE_YEARS: YearRange = { min: 1900, max: 2100 };

const TOTAL_INCL_RE =
  /(total\s*amount\s*\(\s*including\s*vat\s*\)|total\s*amount.*including\s*vat|amount\s*in\s*thb\s*\(\s*including\s*vat\s*\)|grand\s*total|amount\s*due)/i;
const TOTAL_VAT_RE = /(total\s*vat\s*7%|total\s*vat|vat\s*amount|value\s*added\s*tax)/i;
const SUBTOTAL_EXCL_RE =
  /(subtotal\s*\(\s*excluding\s*vat\s*\)|subtotal.*excluding\s*vat|total.*excluding\s*vat|amount\s*in\s*thb\s*\(\s*excluding\s*vat\s*\))/i;

const WHT_AMOUNTING_RE =
  /(withheld\s*tax|withholding\s*tax)[\s\S]*?rate\s*of\s*(\d{1,2})\s*%[\s\S]*?amounting\s*to\s*฿?\s*([0-9,]+(?:\.[0-9]{1,2})?)/i;
const WHT_GENERIC_RE =
  /(withheld|withholding|wht|ภาษี\s*ณ\s*ที่\s*จ่าย)[\s\S]*?(\d{1,2})\s*%[\s\S]*?(?:฿|THB)?\s*([0-9,]+(?:\.[0-9]{1,2})?)/i;

const ADS_HINT_RE = /\b(ads|advertising|promotion|โฆษณา|ค่าโฆษณา)\b/i;

// ===== FIELD HELPERS =====

export function extractTiktokInvoiceNo(text: string): string {
  const direct = INVOICE_NO_RE.exec(text);
  if (direct) return compactNoWhitespace(direct[0]);

  const labeled = INVOICE_NUMBER_LINE_RE.exec(text);
  return labeled ? compactNoWhitespace(labeled[2]) : '';
}

/**
 * Vendor tax id: the "Tax Registration Number" line, else the first 13-digit
 * number that is not the client's own id.
 */
export function extractVendorTaxId(text: string, clientTaxId: string): string {
  const labeled = VENDOR_TAX_LINE_RE.exec(text);
  if (labeled) return digitsOnly(labeled[2], 13);

  const client = digitsOnly(clientTaxId, 13);
  for (const match of text.matchAll(TAX_ID_13_RE)) {
    const candidate = digitsOnly(match[0], 13);
    if (candidate && candidate !== client) return candidate;
  }
  return '';
}

function dateFromText(value: string): string {
  const ymd = DATE_YMD_RE.exec(value);
  if (ymd) {
    const date = yyyymmddFromParts(ymd[1], ymd[2], ymd[3], INVOICE_YEARS);
    if (date) return date;
  }

  const named = DATE_MON_DD_YYYY_RE.exec(value);
  if (named) {
    return yyyymmddFromParts(named[3], monthFromName(named[1]), named[2], INVOICE_YEARS);
  }
  return '';
}

/** Date on the "Invoice date" line, else the first date anywhere. */
export function extractTiktokInvoiceDate(text: string): string {
  const line = INVOICE_DATE_LINE_RE.exec(text);
  if (line) {
    const date = dateFromText(line[2]);
    if (date) return date;
  }
  return dateFromText(text);
}

export interface AmountSummary {
  subtotalExVat: string;
  vatAmount: string;
  totalInclVat: string;
}

export function extractAmountSummary(text: string): AmountSummary {
  const subtotalExVat = findAmountNearKeyword(text, SUBTOTAL_EXCL_RE);
  const vatAmount = findAmountNearKeyword(text, TOTAL_VAT_RE);
  let totalInclVat = findAmountNearKeyword(text, TOTAL_INCL_RE);

  if (!totalInclVat && subtotalExVat && vatAmount) {
    totalInclVat = formatMoney(toAmount(subtotalExVat) + toAmount(vatAmount));
  }
  if (!totalInclVat && subtotalExVat) totalInclVat = subtotalExVat;

  return { subtotalExVat, vatAmount, totalInclVat };
}

/** Withholding amount printed in the footer, `""` when none. */
export function extractTiktokWithholding(text: string): string {
  for (const pattern of [WHT_AMOUNTING_RE, WHT_GENERIC_RE]) {
    const match = pattern.exec(text);
    if (!match) continue;
    const rate = digitsOnly(match[2], 2);
    const amount = moneyToText(match[3]);
    if (rate && amount) return amount;
  }
  return '';
}

// ===== EXTRACTOR =====

export function extractTiktok({ text, clientTaxId }: ExtractorInput): DraftRow {
  const t = normalizeDocumentText(text);

  const row: DraftRow = {
    vendorCode: UNKNOWN_VENDOR_CODE,
    branchCode: '00000',
    priceType: PRICE_TYPES.VAT_INCLUSIVE,
    quantity: '1',
    unitPrice: '0',
    vatRate: VAT_RATE_TOKENS.STANDARD,
    paidAmount: '0',
    description: '',
    note: '',
    expenseGroup: EXPENSE_GROUPS.MARKETPLACE,
    _vendor_name: TIKTOK_VENDOR_NAME,
  };
  if (!t) return row;

  const invoiceNo = extractTiktokInvoiceNo(t);
  if (invoiceNo) {
    row.reference = invoiceNo;
    row.invoiceNo = invoiceNo;
  }

  row.taxId = extractVendorTaxId(t, clientTaxId);

  const branch = BRANCH_RE.exec(t);
  const branchDigits = branch ? digitsOnly(branch[2], 5) : '';
  row.branchCode = branchDigits ? branchDigits.padStart(5, '0') : '00000';

  const date = extractTiktokInvoiceDate(t);
  if (date) {
    row.docDate = date;
    row.invoiceDate = date;
    row.taxPurchaseDate = date;
  }

  const amounts = extractAmountSummary(t);
  if (amounts.totalInclVat) {
    row.unitPrice = amounts.totalInclVat;
    row.paidAmount = amounts.totalInclVat;
  }
  if (amounts.subtotalExVat) row._subtotal_ex_vat = amounts.subtotalExVat;

  const wht = extractTiktokWithholding(t);
  if (wht) row.whtAmount = wht;

  row.expenseGroup = ADS_HINT_RE.test(t) ? EXPENSE_GROUPS.ADVERTISING : EXPENSE_GROUPS.MARKETPLACE;

  return row;
}
