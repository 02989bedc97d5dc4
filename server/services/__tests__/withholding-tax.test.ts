import { describe, it, expect } from 'vitest';
import type { DraftRow } from '@shared/schema/accounting-row';
import { parsePipelineOptions } from '@shared/schema/pipeline-config';
import { applyWithholdingPolicy, detectWithholdingFromText, parseVatRate } from '../withholding-tax';

const THAI_WHT_TEXT = 'หักภาษี ณ ที่จ่าย 3% จำนวน 4,414.88';

describe('parseVatRate', () => {
  it('should read percentages, fractions and no-VAT tokens', () => {
    expect(parseVatRate('7%')).toBe(0.07);
    expect(parseVatRate('NO')).toBe(0);
    expect(parseVatRate('7')).toBe(0.07);
    expect(parseVatRate('0.07')).toBe(0.07);
    expect(parseVatRate('exempt')).toBe(0);
    expect(parseVatRate(undefined)).toBe(0);
  });
});

describe('detectWithholdingFromText', () => {
  it('should read the Thai withholding phrase', () => {
    expect(detectWithholdingFromText(THAI_WHT_TEXT)).toEqual({ rate: 0.03, amount: 4414.88 });
  });

  it('should read the English phrase', () => {
    expect(detectWithholdingFromText('Withholding tax 3% amount 4,414.88')).toEqual({ rate: 0.03, amount: 4414.88 });
  });

  it('should read whole-baht and one-decimal amounts in full', () => {
    expect(detectWithholdingFromText('หักภาษี ณ ที่จ่าย 3% จำนวน 4,414 บาท')).toEqual({ rate: 0.03, amount: 4414 });
    expect(detectWithholdingFromText('Withholding tax 3% amount 4414.5')).toEqual({ rate: 0.03, amount: 4414.5 });
  });

  it('should fold Thai digits first', () => {
    expect(detectWithholdingFromText('หักภาษี ณ ที่จ่าย ๓% จำนวน ๑๐๐.๐๐')).toEqual({ rate: 0.03, amount: 100 });
  });

  it('should return undefined without a phrase', () => {
    expect(detectWithholdingFromText('Total 100.00')).toBeUndefined();
  });
});

describe('applyWithholdingPolicy', () => {
  it('should net a detected withholding amount out of the paid amount', () => {
    const row: DraftRow = { paidAmount: '151000.00' };
    const outcome = applyWithholdingPolicy(row, parsePipelineOptions({}), THAI_WHT_TEXT);

    expect(outcome).toEqual({ source: 'detected', whtAmount: 4414.88, gross: 151000, net: 146585.12 });
    expect(row.whtAmount).toBe('4414.88');
    expect(row.paidAmount).toBe('146585.12');
    expect(row.filingCode).toBe('53');
    expect(row._wht_detected_rate).toBe('0.0300');
    expect(row._wht_detected_amount).toBe('4414.88');
    expect(row._gross_amount_before_wht).toBe('151000.00');
  });

  it('should net a whole-baht detected amount', () => {
    const row: DraftRow = { paidAmount: '151000.00' };
    applyWithholdingPolicy(row, parsePipelineOptions({}), 'หักภาษี ณ ที่จ่าย 3% จำนวน 4,414 บาท');

    expect(row.whtAmount).toBe('4414.00');
    expect(row.paidAmount).toBe('146586.00');
  });

  it('should blank the withholding cell when calculation and detection are off', () => {
    const row: DraftRow = { paidAmount: '1000.00' };
    const options = parsePipelineOptions({ calculate_wht: false, auto_detect_wht: false });
    const outcome = applyWithholdingPolicy(row, options, THAI_WHT_TEXT);

    expect(outcome.source).toBe('none');
    expect(row.whtAmount).toBe('');
    expect(row.paidAmount).toBe('1000.00');
    expect(row.filingCode).toBe('53');
  });

  it('should calculate from the gross when enabled', () => {
    const row: DraftRow = { paidAmount: '1070.00', vatRate: '7%' };
    const options = parsePipelineOptions({ calculate_wht: 'yes', auto_detect_wht: false });
    applyWithholdingPolicy(row, options, '');

    expect(row.whtAmount).toBe('30.00');
    expect(row.paidAmount).toBe('1040.00');
    expect(row._wht_calc_rate).toBe('0.0300');
    expect(row._wht_calc_base_ex_vat).toBe('1000.00');
  });

  it('should prefer a known subtotal as the calculation base', () => {
    const row: DraftRow = { paidAmount: '1070.00', vatRate: '7%', _subtotal_ex_vat: '900.00' };
    applyWithholdingPolicy(row, parsePipelineOptions({ wht_enabled: '1', auto_detect_wht: '0' }), '');

    expect(row.whtAmount).toBe('27.00');
    expect(row.paidAmount).toBe('1043.00');
  });

  it('should use the configured rate and filing code', () => {
    const row: DraftRow = { unitPrice: '200.00', vatRate: 'NO' };
    const options = parsePipelineOptions({ calculate_wht: true, wht_rate: '0.02', pnd_when_wht: '3' });
    applyWithholdingPolicy(row, options, '');

    expect(row.whtAmount).toBe('4.00');
    expect(row.paidAmount).toBe('196.00');
    expect(row.filingCode).toBe('3');
  });

  it('should keep an extractor amount unless override is requested', () => {
    const text = 'หักภาษี ณ ที่จ่าย 5% จำนวน 50.00';

    const kept: DraftRow = { paidAmount: '1000.00', whtAmount: '30.00' };
    expect(applyWithholdingPolicy(kept, parsePipelineOptions({}), text).source).toBe('extractor');
    expect(kept.paidAmount).toBe('970.00');

    const overridden: DraftRow = { paidAmount: '1000.00', whtAmount: '30.00' };
    const options = parsePipelineOptions({ wht_override_existing: true });
    expect(applyWithholdingPolicy(overridden, options, text).source).toBe('detected');
    expect(overridden.whtAmount).toBe('50.00');
    expect(overridden.paidAmount).toBe('950.00');
  });

  it('should not overwrite an existing filing code', () => {
    const row: DraftRow = { paidAmount: '100.00', whtAmount: '3.00', filingCode: '3' };
    applyWithholdingPolicy(row, parsePipelineOptions({}), '');
    expect(row.filingCode).toBe('3');
  });

  it('should never emit a negative withholding or paid amount', () => {
    const negative: DraftRow = { paidAmount: '100.00', whtAmount: '-5' };
    applyWithholdingPolicy(negative, parsePipelineOptions({ auto_detect_wht: false }), '');
    expect(negative.whtAmount).toBe('');

    const oversized: DraftRow = { paidAmount: '10.00', whtAmount: '15.00' };
    applyWithholdingPolicy(oversized, parsePipelineOptions({}), '');
    expect(oversized.paidAmount).toBe('0.00');
  });

  it('should keep paid = gross - withholding rounded to two decimals', () => {
    const cases: ReadonlyArray<readonly [string, string, string]> = [
      ['100.00', '3.00', '97.00'],
      ['0.30', '0.10', '0.20'],
      ['1234.56', '37.04', '1197.52'],
      ['99999.99', '0.01', '99999.98'],
    ];
    for (const [gross, wht, paid] of cases) {
      const row: DraftRow = { paidAmount: gross, whtAmount: wht };
      applyWithholdingPolicy(row, parsePipelineOptions({ auto_detect_wht: false }), '');
      expect(row.paidAmount).toBe(paid);
    }
  });

  it('should skip diagnostics when asked', () => {
    const row: DraftRow = { paidAmount: '151000.00' };
    applyWithholdingPolicy(row, parsePipelineOptions({}), THAI_WHT_TEXT, false);
    expect(Object.keys(row).filter((key) => key.startsWith('_'))).toEqual([]);
  });
});
