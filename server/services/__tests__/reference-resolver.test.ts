import { describe, it, expect } from 'vitest';
import {
  extractReferenceCandidatesFromText,
  normalizeReferenceCore,
  pickBestReference,
  resolveReference,
  resolveSourceFilename,
  scoreReference,
} from '../reference-resolver';

const HASH = 'a1b2c3d4e5f6a1b2c3d4e5f6a1b2c3d4';

describe('normalizeReferenceCore', () => {
  it('should extract the TRS core from a Shopee file name', () => {
    expect(normalizeReferenceCore('Shopee-TIV-TRSPEMKP00-00000-251203-0012589.pdf')).toBe(
      'TRSPEMKP00-00000-251203-0012589'
    );
  });

  it('should remove whitespace before matching a TikTok number', () => {
    expect(normalizeReferenceCore(' TTSTH 2025 0008665805 ')).toBe('TTSTH20250008665805');
  });

  it('should strip noise prefixes and repeated extensions', () => {
    expect(normalizeReferenceCore('LAZ-ABC12345.pdf.pdf')).toBe('ABC12345');
    expect(normalizeReferenceCore('Shopee-TIR-12345.PNG')).toBe('12345');
  });

  it('should return an empty string for missing input', () => {
    expect(normalizeReferenceCore(undefined)).toBe('');
    expect(normalizeReferenceCore('   ')).toBe('');
  });
});

describe('extractReferenceCandidatesFromText', () => {
  it('should list labeled blocks before structural cores', () => {
    const text = 'Invoice No.: INV-2025-000123\nRef TTSTH20250008665805';
    expect(extractReferenceCandidatesFromText(text)).toEqual(['INV-2025-000123', 'TTSTH20250008665805']);
  });

  it('should put Lazada invoice numbers first', () => {
    const text = 'Receipt No. RCS1234567890AB Lazada THMPTI1234567890';
    expect(extractReferenceCandidatesFromText(text)).toEqual(['THMPTI1234567890', 'RCS1234567890AB']);
  });

  it('should return nothing for empty text', () => {
    expect(extractReferenceCandidatesFromText('')).toEqual([]);
  });
});

describe('scoreReference', () => {
  it('should rank structural shapes', () => {
    expect(scoreReference('SHOPEE', 'TRSPEMKP00-00000-251203-0012589')).toBe(100);
    expect(scoreReference('SPX', 'RCS1234567890')).toBe(95);
    expect(scoreReference('LAZADA', 'THMPTI1234567890')).toBe(90);
    expect(scoreReference('TIKTOK', 'TTSTH20250008665805')).toBe(85);
  });

  it('should only trust long TH tokens on Lazada documents', () => {
    expect(scoreReference('LAZADA', 'TH1234567890AB')).toBe(80);
    expect(scoreReference('SHOPEE', 'TH1234567890AB')).toBe(60);
  });

  it('should score hashes below everything else', () => {
    expect(scoreReference('UNKNOWN', HASH)).toBe(5);
    expect(scoreReference('UNKNOWN', 'ABC')).toBe(30);
    expect(scoreReference('UNKNOWN', '')).toBe(0);
  });
});

describe('pickBestReference', () => {
  it('should prefer a structural reference over a hash in either order', () => {
    expect(pickBestReference('TIKTOK', [HASH, 'TTSTH20250008665805'])).toBe('TTSTH20250008665805');
    expect(pickBestReference('TIKTOK', ['TTSTH20250008665805', HASH])).toBe('TTSTH20250008665805');
  });

  it('should never pick a hash when another shape is available', () => {
    const structural = ['TRSPEMKP00-00000-251203-0012589', 'RCS1234567890', 'THMPTI1234567890', 'INV-2025-000123'];
    for (const reference of structural) {
      expect(pickBestReference('SHOPEE', [HASH, reference])).toBe(reference);
      expect(pickBestReference('SHOPEE', [reference, HASH])).toBe(reference);
    }
  });

  it('should keep the earliest candidate on a tie', () => {
    expect(pickBestReference('UNKNOWN', ['ABCDEFGHIJ1', 'KLMNOPQRST2'])).toBe('ABCDEFGHIJ1');
  });

  it('should fall back to a hash only when nothing else exists', () => {
    expect(pickBestReference('UNKNOWN', [HASH, ''])).toBe(HASH);
    expect(pickBestReference('UNKNOWN', [])).toBe('');
  });
});

describe('resolveSourceFilename', () => {
  it('should take the base name of an explicit path', () => {
    expect(resolveSourceFilename('C:\\scans\\Shopee-TIV-x.pdf', {})).toBe('Shopee-TIV-x.pdf');
  });

  it('should fall back to the file name recorded on the row', () => {
    expect(resolveSourceFilename('', { _source_file: '/tmp/in/b.pdf' })).toBe('b.pdf');
    expect(resolveSourceFilename('', {})).toBe('');
  });
});

describe('resolveReference', () => {
  it('should use the file name when the text mentions no reference', () => {
    const reference = resolveReference({
      platform: 'SHOPEE',
      sourceFilename: 'Shopee-TIV-TRSPEMKP00-00000-251203-0012589.pdf',
      row: {},
      text: 'Thank you for selling with us',
    });
    expect(reference).toBe('TRSPEMKP00-00000-251203-0012589');
  });

  it('should let a structural file name beat a short extractor value', () => {
    const reference = resolveReference({
      platform: 'SHOPEE',
      sourceFilename: 'Shopee-TIV-TRSPEMKP00-00000-251203-0012589.pdf',
      row: { invoiceNo: 'INV-1' },
      text: '',
    });
    expect(reference).toBe('TRSPEMKP00-00000-251203-0012589');
  });

  it('should return its own output when run again', () => {
    const query = {
      platform: 'TIKTOK',
      sourceFilename: `${HASH}.pdf`,
      row: { reference: 'TikTok-TTSTH20250008665805' },
      text: 'Invoice No.: TTSTH20250008665805',
    };
    const first = resolveReference(query);
    const second = resolveReference({
      platform: 'TIKTOK',
      sourceFilename: '',
      row: { invoiceNo: first, reference: first },
      text: '',
    });
    expect(first).toBe('TTSTH20250008665805');
    expect(second).toBe(first);
  });
});
