import { describe, it, expect } from 'vitest';
import { parsePipelineOptions } from '@shared/schema/pipeline-config';
import type { PlatformRoute } from '@shared/constants';
import type { ExtractorInput } from '@shared/types/services';
import { EXTRACTION_METHODS, ExtractorRegistry } from '../extractors/extractor-registry';
import { extractGeneric, extractGenericDate } from '../extractors/generic-extractor';
import {
  TIKTOK_VENDOR_NAME,
  extractAmountSummary,
  extractTiktok,
  extractTiktokInvoiceDate,
  extractTiktokWithholding,
  extractVendorTaxId,
} from '../extractors/tiktok-extractor';

const RABBIT = '0105561071873';

function input(text: string, clientTaxId = '', platformHint: PlatformRoute = 'GENERIC'): ExtractorInput {
  return { text, filename: 'doc.pdf', clientTaxId, options: parsePipelineOptions({}), platformHint };
}

const TIKTOK_INVOICE = [
  'TikTok Shop (Thailand) Ltd.',
  'Shop ID: 253227155',
  'Tax Registration Number: 0105566214176',
  'Branch: 0',
  'Invoice Number: TTSTH20250008665805',
  'Invoice date: Dec 3, 2025',
  `Bill to: Buyer Co., Ltd. Tax ID ${RABBIT}`,
  'Subtotal (excluding VAT) 141,121.50',
  'Total VAT 7% 9,878.50',
  'Total amount (including VAT) 151,000.00',
  'The withheld tax at the rate of 3% amounting to ฿4,233.65',
].join('\n');

describe('extractTiktok', () => {
  it('should read a TikTok Shop tax invoice', () => {
    const row = extractTiktok(input(TIKTOK_INVOICE, RABBIT, 'TIKTOK'));

    expect(row).toEqual({
      vendorCode: 'Unknown',
      branchCode: '00000',
      priceType: '1',
      quantity: '1',
      unitPrice: '151000.00',
      vatRate: '7%',
      paidAmount: '151000.00',
      description: '',
      note: '',
      expenseGroup: 'Marketplace Expense',
      _vendor_name: TIKTOK_VENDOR_NAME,
      reference: 'TTSTH20250008665805',
      invoiceNo: 'TTSTH20250008665805',
      taxId: '0105566214176',
      docDate: '20251203',
      invoiceDate: '20251203',
      taxPurchaseDate: '20251203',
      _subtotal_ex_vat: '141121.50',
      whtAmount: '4233.65',
    });
  });

  it('should leave withholding to the finalizer when no footer is printed', () => {
    const row = extractTiktok(input('TTSTH20250000000001\nTotal amount (including VAT) 1,070.00'));
    expect(row.whtAmount).toBeUndefined();
    expect(row.paidAmount).toBe('1070.00');
  });

  it('should file advertising invoices under advertising', () => {
    const row = extractTiktok(input('TikTok Ads invoice TTSTH20250000000001'));
    expect(row.expenseGroup).toBe('Advertising Expense');
  });

  it('should return the defaults for empty text', () => {
    const row = extractTiktok(input(''));
    expect(row.paidAmount).toBe('0');
    expect(row.reference).toBeUndefined();
  });
});

describe('TikTok field helpers', () => {
  it('should read a numeric invoice date', () => {
    expect(extractTiktokInvoiceDate('Invoice date: 2025/12/03')).toBe('20251203');
  });

  it('should skip the client id when no vendor label is printed', () => {
    expect(extractVendorTaxId(`Buyer ${RABBIT} Seller 0105566214176`, RABBIT)).toBe('0105566214176');
  });

  it('should derive the total from subtotal and VAT', () => {
    expect(extractAmountSummary('Subtotal (excluding VAT) 100.00\nTotal VAT 7.00')).toEqual({
      subtotalExVat: '100.00',
      vatAmount: '7.00',
      totalInclVat: '107.00',
    });
  });

  it('should read a short withholding line', () => {
    expect(extractTiktokWithholding('WHT 3% THB 1,000.50')).toBe('1000.50');
    expect(extractTiktokWithholding('No withholding')).toBe('');
  });
});

describe('extractGeneric', () => {
  it('should read a Thai tax invoice', () => {
    const text = [
      'ร้านตัวอย่าง จำกัด สำนักงานใหญ่',
      `เลขประจำตัวผู้เสียภาษี ${RABBIT}`,
      'ผู้ขาย 0123456789012',
      'เลขที่ INV-2025-0042',
      'วันที่ 05/11/2568',
      'Subtotal 1,000.00',
      'VAT 7% 70.00',
      'Total 1,070.00',
    ].join('\n');

    expect(extractGeneric(input(text, RABBIT))).toEqual({
      quantity: '1',
      docDate: '20251105',
      invoiceDate: '20251105',
      taxPurchaseDate: '20251105',
      taxId: '0123456789012',
      branchCode: '00000',
      invoiceNo: 'INV-2025-0042',
      reference: 'INV-2025-0042',
      unitPrice: '1070.00',
      paidAmount: '1070.00',
      vatRate: '7%',
    });
  });

  it('should read a numbered branch', () => {
    expect(extractGeneric(input('สาขาที่ 3')).branchCode).toBe('00003');
  });

  it('should return only the quantity for empty text', () => {
    expect(extractGeneric(input('   '))).toEqual({ quantity: '1' });
  });
});

describe('extractGenericDate', () => {
  it('should prefer year-first dates', () => {
    expect(extractGenericDate('Issued 2025-12-03')).toBe('20251203');
  });

  it('should reject impossible months', () => {
    expect(extractGenericDate('31/13/2025')).toBe('');
  });
});

describe('ExtractorRegistry', () => {
  it('should ship the TikTok extractor', () => {
    const registry = ExtractorRegistry.withBuiltIns();
    expect(registry.isRegistered('TIKTOK')).toBe(true);
    expect(registry.getRegisteredRoutes()).toEqual(['TIKTOK']);
    expect(registry.get('TIKTOK')?.method).toBe(EXTRACTION_METHODS.TIKTOK);
    expect(registry.get('META')).toBeUndefined();
    expect(registry.fallback().method).toBe('generic');
  });

  it('should refuse a second extractor for the same route', () => {
    const registry = ExtractorRegistry.withBuiltIns();
    expect(() => registry.register('TIKTOK', 'other', () => ({}))).toThrow(
      "Extractor for 'TIKTOK' is already registered"
    );
  });
});
