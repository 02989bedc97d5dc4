import { describe, it, expect } from 'vitest';
import {
  VALIDATION_CODES,
  isValidBranchCode,
  isValidTaxId,
  isValidVatRate,
  isValidYyyymmdd,
  validateRow,
} from '../row-validation';

describe('field checks', () => {
  it('should accept only real calendar days', () => {
    expect(isValidYyyymmdd('20251203')).toBe(true);
    expect(isValidYyyymmdd('20240229')).toBe(true);
    expect(isValidYyyymmdd('20250229')).toBe(false);
    expect(isValidYyyymmdd('2025-12-03')).toBe(false);
  });

  it('should check branch and tax id lengths', () => {
    expect(isValidBranchCode('00000')).toBe(true);
    expect(isValidBranchCode('0')).toBe(false);
    expect(isValidTaxId('0105566214176')).toBe(true);
    expect(isValidTaxId('010556621417')).toBe(false);
  });

  it('should accept the VAT tokens in any case', () => {
    expect(isValidVatRate('7%')).toBe(true);
    expect(isValidVatRate('no')).toBe(true);
    expect(isValidVatRate('10%')).toBe(false);
  });
});

describe('validateRow', () => {
  it('should pass a well-formed row', () => {
    const issues = validateRow({
      docDate: '20251203',
      invoiceDate: '20251203',
      branchCode: '00000',
      taxId: '0105566214176',
      priceType: '1',
      vatRate: '7%',
    });
    expect(issues).toEqual([]);
  });

  it('should require a document date', () => {
    expect(validateRow({})).toEqual([
      { field: 'docDate', message: 'Document date must be YYYYMMDD', code: VALIDATION_CODES.INVALID_DATE },
    ]);
  });

  it('should let optional cells stay blank', () => {
    expect(validateRow({ docDate: '20251203', taxId: '', branchCode: ' ' })).toEqual([]);
  });

  it('should report every bad cell in column order', () => {
    const issues = validateRow({
      docDate: '20251203',
      taxId: '12345',
      branchCode: '1',
      priceType: '4',
      vatRate: '5%',
    });
    expect(issues.map((issue) => issue.code)).toEqual([
      VALIDATION_CODES.INVALID_BRANCH,
      VALIDATION_CODES.INVALID_TAX_ID,
      VALIDATION_CODES.INVALID_PRICE_TYPE,
      VALIDATION_CODES.INVALID_VAT_RATE,
    ]);
    expect(issues.map((issue) => issue.field)).toEqual(['branchCode', 'taxId', 'priceType', 'vatRate']);
  });
});
