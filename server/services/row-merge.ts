/**
 * Patch merging
 *
 * Enhancement and repair providers return loose field maps. They are
 * sanitized here and merged into the draft either into empty cells only or
 * over existing values. Expense group, note and GL account belong to the
 * finalizer's policy and are never taken from a patch.
 */

import {
  coerceDraftRow,
  isDiagnosticKey,
  isRowKey,
  type DiagnosticValue,
  type DraftRow,
  type RowKey,
} from '@shared/schema/accounting-row';

export const PATCH_BLACKLIST: ReadonlySet<RowKey> = new Set<RowKey>(['expenseGroup', 'note', 'glAccount']);

export type MergeMode = 'fill_missing' | 'overwrite';

/** Values a fill-missing merge treats as empty. */
const EMPTY_CELL_VALUES: ReadonlySet<string> = new Set(['', '0', '0.00']);

export interface MergeResult {
  row: DraftRow;
  /** Keys written by the patch, in patch order */
  appliedKeys: string[];
}

function isBlankValue(value: DiagnosticValue | undefined): boolean {
  if (value === undefined) return true;
  if (Array.isArray(value)) return value.length === 0;
  return value.trim() === '';
}

function isEmptyForFill(value: DiagnosticValue | undefined): boolean {
  if (value === undefined) return true;
  if (Array.isArray(value)) return value.length === 0;
  return EMPTY_CELL_VALUES.has(value.trim());
}

/**
 * Keep only import columns and diagnostics with a non-blank value, minus the
 * blacklisted columns.
 */
export function sanitizePatch(patch: unknown): DraftRow {
  const coerced = coerceDraftRow(patch);
  const clean: DraftRow = {};

  for (const key of Object.keys(coerced)) {
    if (isRowKey(key)) {
      const value = coerced[key];
      if (!PATCH_BLACKLIST.has(key) && !isBlankValue(value)) clean[key] = value;
    } else if (isDiagnosticKey(key)) {
      const value = coerced[key];
      if (!isBlankValue(value)) clean[key] = value;
    }
  }
  return clean;
}

/**
 * Merge a sanitized patch into a copy of `base`.
 *
 * `fill_missing` writes only where the current value is empty, `"0"` or
 * `"0.00"`; `overwrite` writes every patch value. Keys in `protectedKeys`
 * are left alone in both modes.
 */
export function mergePatch(
  base: DraftRow,
  patch: DraftRow,
  mode: MergeMode = 'fill_missing',
  protectedKeys: ReadonlySet<string> = new Set()
): MergeResult {
  const row: DraftRow = { ...base };
  if (base.merchant) row.merchant = { ...base.merchant };
  const appliedKeys: string[] = [];

  for (const key of Object.keys(patch)) {
    if (protectedKeys.has(key)) continue;

    if (isRowKey(key)) {
      const value = patch[key];
      if (PATCH_BLACKLIST.has(key) || value === undefined || isBlankValue(value)) continue;
      if (mode === 'fill_missing' && !isEmptyForFill(row[key])) continue;
      row[key] = value;
      appliedKeys.push(key);
    } else if (isDiagnosticKey(key)) {
      const value = patch[key];
      if (isBlankValue(value)) continue;
      if (mode === 'fill_missing' && !isEmptyForFill(row[key])) continue;
      row[key] = value;
      appliedKeys.push(key);
    }
  }

  return { row, appliedKeys };
}
