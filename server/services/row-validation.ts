/**
 * Row validation
 *
 * Format checks on the import columns. Problems are returned as a list next
 * to the row; a row with issues is still a valid pipeline result.
 */

import { z, type ZodIssue } from 'zod';
import type { DraftRow, RowValidationIssue } from '@shared/schema/accounting-row';
import { PRICE_TYPES, VAT_RATE_TOKENS } from '@shared/constants';

export const VALIDATION_CODES = {
  INVALID_DATE: 'INVALID_DATE',
  INVALID_BRANCH: 'INVALID_BRANCH',
  INVALID_TAX_ID: 'INVALID_TAX_ID',
  INVALID_PRICE_TYPE: 'INVALID_PRICE_TYPE',
  INVALID_VAT_RATE: 'INVALID_VAT_RATE',
} as const;

const PRICE_TYPE_VALUES: ReadonlySet<string> = new Set(Object.values(PRICE_TYPES));
const VAT_RATE_VALUES: ReadonlySet<string> = new Set(Object.values(VAT_RATE_TOKENS));

/** `YYYYMMDD` naming a real calendar day. */
export function isValidYyyymmdd(value: string): boolean {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(value.trim());
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

export function isValidBranchCode(value: string): boolean {
  return /^\d{5}$/.test(value.trim());
}

export function isValidTaxId(value: string): boolean {
  return /^\d{13}$/.test(value.trim());
}

export function isValidPriceType(value: string): boolean {
  return PRICE_TYPE_VALUES.has(value.trim());
}

export function isValidVatRate(value: string): boolean {
  return VAT_RATE_VALUES.has(value.trim().toUpperCase());
}

/**
 * String cell checked by `check`; blank cells pass unless `required`.
 */
function cellRule(check: (value: string) => boolean, code: string, message: string, required = false) {
  return z
    .string()
    .optional()
    .superRefine((raw, ctx) => {
      const value = (raw ?? '').trim();
      if (!value && !required) return;
      if (!check(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message, params: { code } });
      }
    });
}

export const rowValidationSchema = z.object({
  docDate: cellRule(isValidYyyymmdd, VALIDATION_CODES.INVALID_DATE, 'Document date must be YYYYMMDD', true),
  invoiceDate: cellRule(isValidYyyymmdd, VALIDATION_CODES.INVALID_DATE, 'Invoice date must be YYYYMMDD'),
  taxPurchaseDate: cellRule(isValidYyyymmdd, VALIDATION_CODES.INVALID_DATE, 'Tax purchase date must be YYYYMMDD'),
  branchCode: cellRule(isValidBranchCode, VALIDATION_CODES.INVALID_BRANCH, 'Branch code must be 5 digits'),
  taxId: cellRule(isValidTaxId, VALIDATION_CODES.INVALID_TAX_ID, 'Tax id must be 13 digits'),
  priceType: cellRule(isValidPriceType, VALIDATION_CODES.INVALID_PRICE_TYPE, 'Price type must be 1, 2 or 3'),
  vatRate: cellRule(isValidVatRate, VALIDATION_CODES.INVALID_VAT_RATE, 'VAT rate must be 7%, 0% or NO'),
});

function issueCode(issue: ZodIssue): string {
  if (issue.code === z.ZodIssueCode.custom) {
    const code: unknown = issue.params?.code;
    if (typeof code === 'string') return code;
  }
  return issue.code.toUpperCase();
}

function formatZodIssues(issues: readonly ZodIssue[]): RowValidationIssue[] {
  return issues.map((issue) => ({
    field: issue.path.join('.') || 'unknown',
    message: issue.message,
    code: issueCode(issue),
  }));
}

/**
 * Issues of a row, in column order. Empty when the row passes.
 */
export function validateRow(row: DraftRow): RowValidationIssue[] {
  const result = rowValidationSchema.safeParse({
    docDate: row.docDate,
    invoiceDate: row.invoiceDate,
    taxPurchaseDate: row.taxPurchaseDate,
    branchCode: row.branchCode,
    taxId: row.taxId,
    priceType: row.priceType,
    vatRate: row.vatRate,
  });
  return result.success ? [] : formatZodIssues(result.error.issues);
}
