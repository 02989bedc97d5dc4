/**
 * Text & Amount Utilities
 *
 * Small helpers shared by the extractors and the finalizer stages: Thai digit
 * folding, whitespace handling, money parsing/rounding and date assembly.
 */

import { MONEY } from '../config/constants';

const THAI_DIGITS = '๐๑๒๓๔๕๖๗๘๙';
const THAI_DIGIT_RE = /[๐-๙]/g;

/** Replace Thai digits (๐–๙) with ASCII digits. */
export function thaiDigitsToArabic(value: string): string {
  return value.replace(THAI_DIGIT_RE, (digit) => String(THAI_DIGITS.indexOf(digit)));
}

/**
 * Normalize raw OCR text: Thai digits folded, CRLF and non-breaking spaces
 * unified, runs of spaces/tabs collapsed. Line structure is kept.
 */
export function normalizeDocumentText(text: string): string {
  return thaiDigitsToArabic(text)
    .replace(/\r\n?/g, '\n')
    .replace(/[\u00a0\u2007\u202f]/g, ' ')
    .replace(/[ \t]+/g, ' ')
    .trim();
}

/** Trim and collapse whitespace to single spaces. */
export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/** Remove every whitespace character. */
export function compactNoWhitespace(value: string | undefined): string {
  return (value ?? '').replace(/\s+/g, '');
}

export function digitsOnly(value: string, maxLength?: number): string {
  const digits = thaiDigitsToArabic(value).replace(/\D+/g, '');
  return maxLength !== undefined ? digits.slice(0, maxLength) : digits;
}

// ═══════════════════════════════════════════════════════════════════════════
// MONEY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Parse an amount cell ("151,000.00", " 42 ", 12.5). Unparseable → 0.
 */
export function toAmount(value: string | number | undefined): number {
  if (value === undefined) return 0;
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
  const text = value.trim().replace(/,/g, '');
  if (!text) return 0;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : 0;
}

/** True when the cell holds a number ("1,234.5", "0"). */
export function isNumericText(value: string): boolean {
  const text = value.trim().replace(/,/g, '');
  return text !== '' && Number.isFinite(Number(text));
}

/** Two-decimal rounding with the epsilon bias. */
export function roundMoney(value: number): number {
  return Math.round((value + MONEY.ROUNDING_EPSILON) * 100) / 100;
}

export function formatMoney(value: number): string {
  return roundMoney(value).toFixed(2);
}

/**
 * Parse a money token as printed on a document ("฿4,414.88", "THB 10").
 * Negative or unreadable values give `""`.
 */
export function moneyToText(token: string): string {
  const cleaned = token.replace(/,/g, '').replace(/฿/g, '').replace(/THB/gi, '').trim();
  if (!cleaned) return '';
  const parsed = Number(cleaned);
  if (!Number.isFinite(parsed) || parsed < 0) return '';
  return formatMoney(parsed);
}

const MONEY_TOKEN_RE = /-?\d{1,3}(?:,\d{3})+(?:\.\d{1,2})?|-?\d+(?:\.\d{1,2})?/g;

/** Money tokens of `chunk`, skipping percentages ("7%"). */
function moneyTokens(chunk: string): string[] {
  const tokens: string[] = [];
  for (const match of chunk.matchAll(MONEY_TOKEN_RE)) {
    const after = chunk.charAt((match.index ?? 0) + match[0].length);
    if (after !== '%') tokens.push(match[0]);
  }
  return tokens;
}

/**
 * Amount printed for a keyword: the first amount within `window` characters
 * after it, else the last amount in the 120 characters before it. `""` when
 * the keyword or an amount is missing. `keyword` must not carry the `g` flag.
 */
export function findAmountNearKeyword(text: string, keyword: RegExp, window = 280): string {
  const match = keyword.exec(text);
  if (!match) return '';

  const keywordEnd = match.index + match[0].length;
  const following = moneyTokens(text.slice(keywordEnd, Math.min(text.length, keywordEnd + window)));
  if (following.length > 0) return moneyToText(following[0]);

  const preceding = moneyTokens(text.slice(Math.max(0, match.index - 120), match.index));
  if (preceding.length > 0) return moneyToText(preceding[preceding.length - 1]);
  return '';
}

// ═══════════════════════════════════════════════════════════════════════════
// DATES
// ═══════════════════════════════════════════════════════════════════════════

export interface YearRange {
  min: number;
  max: number;
}

const DOC_YEARS: YearRange = { min: 2000, max: 2099 };

/**
 * `YYYYMMDD` from numeric parts, `""` when a part is out of range.
 */
export function yyyymmddFromParts(
  year: string | number,
  month: string | number,
  day: string | number,
  years: YearRange = DOC_YEARS
): string {
  const y = Number(year);
  const m = Number(month);
  const d = Number(day);
  if (!Number.isInteger(y) || !Number.isInteger(m) || !Number.isInteger(d)) return '';
  if (y < years.min || y > years.max) return '';
  if (m < 1 || m > 12) return '';
  if (d < 1 || d > 31) return '';
  return `${String(y).padStart(4, '0')}${String(m).padStart(2, '0')}${String(d).padStart(2, '0')}`;
}

const MONTHS: Readonly<Record<string, number>> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

export function monthFromName(name: string): number {
  return MONTHS[name.slice(0, 3).toLowerCase()] ?? 0;
}
