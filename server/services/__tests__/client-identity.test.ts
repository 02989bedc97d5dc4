import { describe, it, expect } from 'vitest';
import { parsePipelineOptions } from '@shared/schema/pipeline-config';
import { loadConfig } from '../../config';
import { clientBucketOf, resolveClientTaxId, resolveCompanyName } from '../client-identity';

const RABBIT = '0105561071873';
const SHD = '0105563022918';
const TOPONE = '0105565027615';

describe('clientBucketOf', () => {
  it('should map company tax ids to their bucket', () => {
    expect(clientBucketOf(RABBIT)).toBe('RABBIT');
    expect(clientBucketOf('0-1055-63022-91-8')).toBe('SHD');
  });

  it('should return empty for unknown ids', () => {
    expect(clientBucketOf('')).toBe('');
    expect(clientBucketOf('1234567890123')).toBe('');
  });
});

describe('resolveClientTaxId', () => {
  it('should prefer the explicit argument', () => {
    const options = parsePipelineOptions({ client_tax_id: RABBIT });
    expect(resolveClientTaxId(` ${SHD} `, options)).toBe(SHD);
  });

  it('should fall back to client_tax_id', () => {
    expect(resolveClientTaxId('', parsePipelineOptions({ client_tax_id: RABBIT }))).toBe(RABBIT);
  });

  it('should take a single listed id', () => {
    expect(resolveClientTaxId('', parsePipelineOptions({ client_tax_ids: `["${TOPONE}"]` }))).toBe(TOPONE);
  });

  it('should pick the listed id named by a tag', () => {
    const options = parsePipelineOptions({ client_tax_ids: `${RABBIT},${SHD}`, client_tags: ['shd'] });
    expect(resolveClientTaxId('', options)).toBe(SHD);
  });

  it('should take the first listed id when no tag matches', () => {
    const options = parsePipelineOptions({ client_tax_ids: [RABBIT, SHD], client_tags: 'TOPONE' });
    expect(resolveClientTaxId('', options)).toBe(RABBIT);
  });

  it('should return empty when nothing is configured', () => {
    expect(resolveClientTaxId('', parsePipelineOptions({}))).toBe('');
  });
});

describe('resolveCompanyName', () => {
  it('should use the per-call name map first', () => {
    const options = parsePipelineOptions({ company_name_by_tax_id: { [RABBIT]: 'Rabbit Trading' } });
    expect(resolveCompanyName(RABBIT, options, loadConfig({ COMPANY_NAME_RABBIT: 'Env Rabbit' }))).toBe(
      'Rabbit Trading'
    );
  });

  it('should use the environment name, then the bucket', () => {
    const options = parsePipelineOptions({});
    expect(resolveCompanyName(SHD, options, loadConfig({ COMPANY_NAME_SHD: 'SHD Co., Ltd.' }))).toBe('SHD Co., Ltd.');
    expect(resolveCompanyName(TOPONE, options, loadConfig({}))).toBe('TOPONE');
  });

  it('should return empty for an unknown company', () => {
    expect(resolveCompanyName('1234567890123', parsePipelineOptions({}), loadConfig({}))).toBe('');
  });
});
