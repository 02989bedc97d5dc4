/**
 * Accounting Row Schema
 *
 * The fixed 22-column row handed to the bookkeeping import, the mutable draft
 * the pipeline stages work on, and the coercion of loosely-typed extractor
 * output into that draft.
 *
 * ## Principles
 * - Column order is part of the contract (`ROW_KEYS`)
 * - Every contractual value is a string once locked
 * - Keys starting with `_` are diagnostics: kept through the lock, never
 *   part of the import columns
 * - In a draft, `undefined` means "not computed yet" and `""` means
 *   "legitimately empty"
 */

import { z } from 'zod';
import { isCellScalar, isObject, isString } from '../types/guards';

// ═══════════════════════════════════════════════════════════════════════════
// COLUMNS
// ═══════════════════════════════════════════════════════════════════════════

export const ROW_KEYS = [
  'seq',
  'companyName',
  'docDate',
  'reference',
  'vendorCode',
  'taxId',
  'branchCode',
  'invoiceNo',
  'invoiceDate',
  'taxPurchaseDate',
  'priceType',
  'glAccount',
  'description',
  'quantity',
  'unitPrice',
  'vatRate',
  'whtAmount',
  'paymentMethod',
  'paidAmount',
  'filingCode',
  'note',
  'expenseGroup',
] as const;

export type RowKey = typeof ROW_KEYS[number];

const ROW_KEY_SET: ReadonlySet<string> = new Set(ROW_KEYS);

export function isRowKey(key: string): key is RowKey {
  return ROW_KEY_SET.has(key);
}

/**
 * Column-letter keys used by older extractors (`A_seq` … `U_group`).
 */
const COLUMN_LETTER_KEYS: ReadonlyMap<string, RowKey> = new Map<string, RowKey>([
  ['A_seq', 'seq'],
  ['A_company_name', 'companyName'],
  ['B_doc_date', 'docDate'],
  ['C_reference', 'reference'],
  ['D_vendor_code', 'vendorCode'],
  ['E_tax_id_13', 'taxId'],
  ['F_branch_5', 'branchCode'],
  ['G_invoice_no', 'invoiceNo'],
  ['H_invoice_date', 'invoiceDate'],
  ['I_tax_purchase_date', 'taxPurchaseDate'],
  ['J_price_type', 'priceType'],
  ['K_account', 'glAccount'],
  ['L_description', 'description'],
  ['M_qty', 'quantity'],
  ['N_unit_price', 'unitPrice'],
  ['O_vat_rate', 'vatRate'],
  ['P_wht', 'whtAmount'],
  ['Q_payment_method', 'paymentMethod'],
  ['R_paid_amount', 'paidAmount'],
  ['S_pnd', 'filingCode'],
  ['T_note', 'note'],
  ['U_group', 'expenseGroup'],
]);

// ═══════════════════════════════════════════════════════════════════════════
// DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════

export const DIAGNOSTIC_PREFIX = '_';

export type DiagnosticKey = `_${string}`;
export type DiagnosticValue = string | string[];
export type Diagnostics = { [key: DiagnosticKey]: DiagnosticValue };

export function isDiagnosticKey(key: string): key is DiagnosticKey {
  return key.startsWith(DIAGNOSTIC_PREFIX) && key.length > 1;
}

export function isDiagnosticValue(value: unknown): value is DiagnosticValue {
  return isString(value) || (Array.isArray(value) && value.every(isString));
}

// ═══════════════════════════════════════════════════════════════════════════
// ROW TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type RowFields = { [K in RowKey]?: string };
export type AccountingRow = { [K in RowKey]: string };

/**
 * Merchant identity signals an extractor may report. Used for wallet
 * resolution and the description tags; dropped by the schema lock.
 */
export interface MerchantHints {
  sellerId?: string;
  shopName?: string;
  username?: string;
}

export type DraftRow = RowFields & Diagnostics & { merchant?: MerchantHints };
export type LockedRow = AccountingRow & Diagnostics;

export interface RowValidationIssue {
  field: string;
  message: string;
  code: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// ACCESSORS
// ═══════════════════════════════════════════════════════════════════════════

/** Trimmed cell value, `""` when unset. */
export function cellText(row: RowFields, key: RowKey): string {
  return (row[key] ?? '').trim();
}

export function isBlankCell(row: RowFields, key: RowKey): boolean {
  return cellText(row, key) === '';
}

/** Trimmed diagnostic value when it is a single string, `""` otherwise. */
export function diagnosticText(row: Diagnostics, key: DiagnosticKey): string {
  const value: DiagnosticValue | undefined = row[key];
  return isString(value) ? value.trim() : '';
}

/** Append a message to a list-valued diagnostic. */
export function appendDiagnostic(row: Diagnostics, key: DiagnosticKey, message: string): void {
  const current: DiagnosticValue | undefined = row[key];
  if (Array.isArray(current)) {
    row[key] = [...current, message];
  } else if (isString(current) && current) {
    row[key] = [current, message];
  } else {
    row[key] = [message];
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// COERCION
// ═══════════════════════════════════════════════════════════════════════════

const MERCHANT_HINT_KEYS: ReadonlyArray<readonly [string, keyof MerchantHints]> = [
  ['seller_id', 'sellerId'],
  ['sellerId', 'sellerId'],
  ['shop_id', 'sellerId'],
  ['shopid', 'sellerId'],
  ['shopId', 'sellerId'],
  ['merchant_id', 'sellerId'],
  ['merchantId', 'sellerId'],
  ['shop_name', 'shopName'],
  ['shopName', 'shopName'],
  ['seller_name', 'shopName'],
  ['sellerName', 'shopName'],
  ['username', 'username'],
  ['user_name', 'username'],
  ['seller_username', 'username'],
];

const SOURCE_FILE_KEYS = ['filename', 'source_file', 'file'] as const;

const looseRecordSchema = z.record(z.string(), z.unknown());

function scalarText(value: unknown): string | undefined {
  if (!isCellScalar(value)) return undefined;
  return String(value);
}

function toDiagnosticValue(value: unknown): DiagnosticValue | undefined {
  if (isDiagnosticValue(value)) return Array.isArray(value) ? [...value] : value;
  if (Array.isArray(value)) {
    return value.filter(isCellScalar).map((item) => String(item));
  }
  return scalarText(value);
}

function coerceMerchant(source: Record<string, unknown>): MerchantHints | undefined {
  const merchant: MerchantHints = {};

  const nested = source.merchant;
  if (isObject(nested)) {
    for (const field of ['sellerId', 'shopName', 'username'] as const) {
      const value = scalarText(nested[field])?.trim();
      if (value) merchant[field] = value;
    }
  }

  for (const [legacyKey, field] of MERCHANT_HINT_KEYS) {
    if (merchant[field]) continue;
    const value = scalarText(source[legacyKey])?.trim();
    if (value) merchant[field] = value;
  }

  return Object.keys(merchant).length > 0 ? merchant : undefined;
}

/**
 * Turn whatever an extractor or patch provider returned into a draft row.
 *
 * Contractual values are stringified (numbers, booleans); `null`, objects and
 * unknown keys are dropped. Column-letter keys are renamed to their column.
 * Anything that is not a plain object yields an empty draft.
 */
export function coerceDraftRow(input: unknown): DraftRow {
  const parsed = looseRecordSchema.safeParse(input);
  if (!parsed.success) return {};

  const source = parsed.data;
  const row: DraftRow = {};

  for (const [rawKey, value] of Object.entries(source)) {
    const key = COLUMN_LETTER_KEYS.get(rawKey) ?? rawKey;
    if (isRowKey(key)) {
      const text = scalarText(value);
      if (text !== undefined && (row[key] === undefined || rawKey === key)) {
        row[key] = text;
      }
    } else if (isDiagnosticKey(key)) {
      const diagnostic = toDiagnosticValue(value);
      if (diagnostic !== undefined) row[key] = diagnostic;
    }
  }

  if (row._source_file === undefined) {
    for (const fileKey of SOURCE_FILE_KEYS) {
      const value = scalarText(source[fileKey])?.trim();
      if (value) {
        row._source_file = value;
        break;
      }
    }
  }

  const merchant = coerceMerchant(source);
  if (merchant) row.merchant = merchant;

  return row;
}
