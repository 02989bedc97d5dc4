/**
 * Row Finalizer
 *
 * Last stage of the pipeline. Takes whatever the extractor and patch passes
 * produced and turns it into the locked import row:
 *
 *   note → document date → company → platform defaults → reference →
 *   description → wallet → GL account → minimal defaults → number format →
 *   withholding tax → schema lock
 *
 * The document date is only ever taken from the document text, never from
 * the file name.
 */

import {
  ADS_PLATFORMS,
  EXPENSE_GROUPS,
  MARKETPLACE_PLATFORMS,
  PLATFORM_DESCRIPTIONS,
  PLATFORM_GROUPS,
  PRICE_TYPES,
  VAT_RATE_TOKENS,
  glBucketFor,
} from '@shared/constants';
import {
  cellText,
  isBlankCell,
  isDiagnosticKey,
  type DraftRow,
  type LockedRow,
  type RowKey,
} from '@shared/schema/accounting-row';
import type { PipelineOptions } from '@shared/schema/pipeline-config';
import { config as processConfig, type Config } from '../config';
import { formatMoney, isNumericText, toAmount, yyyymmddFromParts } from '../utils/text';
import { clientBucketOf, resolveClientTaxId, resolveCompanyName } from './client-identity';
import { resolveReference, resolveSourceFilename } from './reference-resolver';
import { resolveWallet } from './wallet-resolver';
import { applyWithholdingPolicy } from './withholding-tax';

// ═══════════════════════════════════════════════════════════════════════════
// DOCUMENT DATE
// ═══════════════════════════════════════════════════════════════════════════

const LABELED_DATE_RE =
  /(?:Invoice\s*Date|วันที่(?:ใบกำกับ|เอกสาร|ออกเอกสาร)|Date)\s*[:：]?\s*(20\d{2})[-/](\d{2})[-/](\d{2})/i;
const ISO_DATE_RE = /\b(20\d{2})[-/](\d{2})[-/](\d{2})\b/;

/**
 * Document date as `YYYYMMDD`: a labeled invoice/document date first, else
 * the first ISO-style date in the text. `""` when none is usable.
 */
export function extractDocDateFromText(text: string): string {
  if (!text) return '';

  const labeled = LABELED_DATE_RE.exec(text);
  if (labeled) return yyyymmddFromParts(labeled[1], labeled[2], labeled[3]);

  const iso = ISO_DATE_RE.exec(text);
  if (iso) return yyyymmddFromParts(iso[1], iso[2], iso[3]);

  return '';
}

// ═══════════════════════════════════════════════════════════════════════════
// PLATFORM DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Expense group, description, VAT rate and price type for empty cells.
 * Marketplace documents always land in the marketplace group, and a GL
 * account that merely repeats that group label is cleared.
 */
export function applyPlatformDefaults(row: DraftRow, platform: string): void {
  const p = platform.trim().toUpperCase();

  const group = PLATFORM_GROUPS[p];
  if (group && isBlankCell(row, 'expenseGroup')) row.expenseGroup = group;

  if (isBlankCell(row, 'description')) {
    const description = PLATFORM_DESCRIPTIONS[p];
    if (description) row.description = description;
  }

  if (ADS_PLATFORMS.has(p)) {
    if (isBlankCell(row, 'vatRate')) row.vatRate = VAT_RATE_TOKENS.NONE;
    if (isBlankCell(row, 'priceType')) row.priceType = PRICE_TYPES.NO_VAT;
  } else if (MARKETPLACE_PLATFORMS.has(p)) {
    if (isBlankCell(row, 'vatRate')) row.vatRate = VAT_RATE_TOKENS.STANDARD;
    if (isBlankCell(row, 'priceType')) row.priceType = PRICE_TYPES.VAT_INCLUSIVE;

    row.expenseGroup = EXPENSE_GROUPS.MARKETPLACE;
    if (cellText(row, 'glAccount') === EXPENSE_GROUPS.MARKETPLACE) row.glAccount = '';
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// DESCRIPTION
// ═══════════════════════════════════════════════════════════════════════════

const SELLER_ID_TEXT_RE = /(?:seller\s*id|shop\s*id)\s*[:#]?\s*([0-9]{4,})/i;
const USERNAME_TEXT_RE = /(?:username|user\s*name|shop\s*name)\s*[:#]?\s*([A-Za-z0-9_.\-]{3,})/i;

export function guessSellerId(row: DraftRow, text: string): string {
  const hinted = row.merchant?.sellerId?.trim();
  if (hinted) return hinted;
  return SELLER_ID_TEXT_RE.exec(text)?.[1].trim() ?? '';
}

export function guessUsername(row: DraftRow, text: string): string {
  const hinted = row.merchant?.username?.trim() || row.merchant?.shopName?.trim();
  if (hinted) return hinted;
  return USERNAME_TEXT_RE.exec(text)?.[1].trim() ?? '';
}

/**
 * "<base> — SellerID=… | Username=… | File=…" with only the non-empty tags.
 * The platform description stands in for an empty base.
 */
export function buildDescription(
  base: string,
  platform: string,
  sellerId: string,
  username: string,
  sourceFile: string
): string {
  const parts: string[] = [];
  const head = base.trim() || PLATFORM_DESCRIPTIONS[platform.trim().toUpperCase()] || '';
  if (head) parts.push(head);

  const tags: string[] = [];
  if (sellerId) tags.push(`SellerID=${sellerId}`);
  if (username) tags.push(`Username=${username}`);
  if (sourceFile) tags.push(`File=${sourceFile}`);
  if (tags.length > 0) parts.push(tags.join(' | '));

  return parts.join(' — ').trim();
}

// ═══════════════════════════════════════════════════════════════════════════
// GL ACCOUNT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * GL account, first hit wins: `gl_code_map` for the company (single code or
 * per ADS/MARKETPLACE/DEFAULT bucket), `GL_CODE_<BUCKET>`, the extractor's
 * value, the expense group label.
 */
export function resolveGlCode(
  clientTaxId: string,
  platform: string,
  row: DraftRow,
  options: PipelineOptions,
  runtime: Config = processConfig
): string {
  const entry = Object.hasOwn(options.glCodeMap, clientTaxId) ? options.glCodeMap[clientTaxId] : undefined;
  if (typeof entry === 'string') {
    if (entry) return entry;
  } else if (entry) {
    const code = entry[glBucketFor(platform)] || entry.DEFAULT;
    if (code) return code;
  }

  const bucket = clientBucketOf(clientTaxId);
  if (bucket && runtime.glCodes[bucket]) return runtime.glCodes[bucket];

  return cellText(row, 'glAccount') || cellText(row, 'expenseGroup');
}

// ═══════════════════════════════════════════════════════════════════════════
// SCHEMA LOCK
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Exactly the 22 import columns, in order, followed by the diagnostics.
 * Every other key is dropped.
 */
export function lockRowSchema(row: DraftRow): LockedRow {
  const cell = (key: RowKey): string => row[key] ?? '';

  const locked: LockedRow = {
    seq: cell('seq'),
    companyName: cell('companyName'),
    docDate: cell('docDate'),
    reference: cell('reference'),
    vendorCode: cell('vendorCode'),
    taxId: cell('taxId'),
    branchCode: cell('branchCode'),
    invoiceNo: cell('invoiceNo'),
    invoiceDate: cell('invoiceDate'),
    taxPurchaseDate: cell('taxPurchaseDate'),
    priceType: cell('priceType'),
    glAccount: cell('glAccount'),
    description: cell('description'),
    quantity: cell('quantity'),
    unitPrice: cell('unitPrice'),
    vatRate: cell('vatRate'),
    whtAmount: cell('whtAmount'),
    paymentMethod: cell('paymentMethod'),
    paidAmount: cell('paidAmount'),
    filingCode: cell('filingCode'),
    note: cell('note'),
    expenseGroup: cell('expenseGroup'),
  };

  for (const key of Object.keys(row)) {
    if (!isDiagnosticKey(key)) continue;
    const value = row[key];
    locked[key] = Array.isArray(value) ? [...value] : value;
  }

  return locked;
}

// ═══════════════════════════════════════════════════════════════════════════
// FINALIZE
// ═══════════════════════════════════════════════════════════════════════════

const MONEY_COLUMNS: readonly RowKey[] = ['unitPrice', 'paidAmount', 'whtAmount'];

function formatNumericCells(row: DraftRow): void {
  for (const key of MONEY_COLUMNS) {
    const value = cellText(row, key);
    if (value && isNumericText(value)) row[key] = formatMoney(toAmount(value));
  }

  const branch = cellText(row, 'branchCode');
  if (/^\d{1,5}$/.test(branch)) row.branchCode = branch.padStart(5, '0');
}

export interface FinalizeInput {
  row: DraftRow;
  /** Platform label (`TIKTOK`, `META`, `UNKNOWN`, …) */
  platform: string;
  text: string;
  filename: string;
  clientTaxId: string;
  options: PipelineOptions;
}

export function finalizeRow(input: FinalizeInput, runtime: Config = processConfig): LockedRow {
  const { options } = input;
  const text = input.text;
  const platform = (input.platform || 'UNKNOWN').trim().toUpperCase();

  const row: DraftRow = { ...input.row };
  if (input.row.merchant) row.merchant = { ...input.row.merchant };

  row.note = '';

  if (isBlankCell(row, 'docDate')) {
    const docDate = extractDocDateFromText(text);
    if (docDate) row.docDate = docDate;
  }

  const clientTaxId = resolveClientTaxId(input.clientTaxId, options);
  if (clientTaxId && isBlankCell(row, 'companyName')) {
    row.companyName = resolveCompanyName(clientTaxId, options, runtime);
  }

  applyPlatformDefaults(row, platform);

  const sourceFile = resolveSourceFilename(input.filename, row);
  const reference = resolveReference({ platform, sourceFilename: sourceFile, row, text });
  row.reference = reference;
  row.invoiceNo = reference;

  const sellerId = guessSellerId(row, text);
  const username = guessUsername(row, text);
  row.description = buildDescription(cellText(row, 'description'), platform, sellerId, username, sourceFile);

  if (isBlankCell(row, 'paymentMethod')) {
    const shopName = row.merchant?.shopName?.trim() || row.merchant?.username?.trim() || username || sourceFile;
    const wallet = resolveWallet({ clientTaxId, sellerId, shopName, text });
    if (wallet.status === 'resolved') {
      row.paymentMethod = wallet.code;
      if (runtime.diagnostics.wallet) {
        row._wallet_code_resolved = wallet.code;
        row._wallet_source = wallet.source;
      }
    } else {
      row.paymentMethod = '';
    }
  }

  row.glAccount = resolveGlCode(clientTaxId, platform, row, options, runtime);

  const isAds = ADS_PLATFORMS.has(platform);
  if (row.seq === undefined) row.seq = '';
  if (isBlankCell(row, 'quantity')) row.quantity = '1';
  if (isBlankCell(row, 'priceType')) row.priceType = isAds ? PRICE_TYPES.NO_VAT : PRICE_TYPES.VAT_INCLUSIVE;
  if (isBlankCell(row, 'vatRate')) row.vatRate = isAds ? VAT_RATE_TOKENS.NONE : VAT_RATE_TOKENS.STANDARD;

  formatNumericCells(row);

  applyWithholdingPolicy(row, options, text, runtime.diagnostics.wht);

  return lockRowSchema(row);
}
