import { describe, it, expect } from 'vitest';
import { appendDiagnostic, cellText, coerceDraftRow, isBlankCell, type DraftRow } from '../accounting-row';

describe('coerceDraftRow', () => {
  it('should rename column-letter keys and stringify scalars', () => {
    const row = coerceDraftRow({
      E_tax_id_13: '0105566214176',
      P_wht: 30,
      seq: null,
      unknown: 'dropped',
      _flags: ['a', 1],
      merchant: { sellerId: 253227155 },
      shop_name: 'Shop A',
      filename: 'x.pdf',
    });

    expect(row).toEqual({
      taxId: '0105566214176',
      whtAmount: '30',
      _flags: ['a', '1'],
      _source_file: 'x.pdf',
      merchant: { sellerId: '253227155', shopName: 'Shop A' },
    });
  });

  it('should let the column name win over its letter key', () => {
    expect(coerceDraftRow({ E_tax_id_13: 'A', taxId: 'B' }).taxId).toBe('B');
    expect(coerceDraftRow({ taxId: 'B', E_tax_id_13: 'A' }).taxId).toBe('B');
  });

  it('should drop keys named after object builtins', () => {
    expect(coerceDraftRow({ constructor: 'x', toString: 'y', valueOf: 1, taxId: '0105566214176' })).toEqual({
      taxId: '0105566214176',
    });
  });

  it('should return an empty draft for non-objects', () => {
    expect(coerceDraftRow('row')).toEqual({});
    expect(coerceDraftRow(undefined)).toEqual({});
  });
});

describe('row accessors', () => {
  it('should trim cells', () => {
    const row: DraftRow = { taxId: ' 123 ', branchCode: '  ' };
    expect(cellText(row, 'taxId')).toBe('123');
    expect(isBlankCell(row, 'branchCode')).toBe(true);
    expect(isBlankCell(row, 'docDate')).toBe(true);
  });

  it('should append to list diagnostics', () => {
    const row: DraftRow = { _single: 'x' };
    appendDiagnostic(row, '_errors', 'a');
    appendDiagnostic(row, '_errors', 'b');
    appendDiagnostic(row, '_single', 'c');
    expect(row._errors).toEqual(['a', 'b']);
    expect(row._single).toEqual(['x', 'c']);
  });
});
