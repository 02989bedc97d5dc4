import { describe, it, expect } from 'vitest';
import { ERROR_CODES, isPipelineError } from '@shared/errors';
import { loadConfig } from '../index';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.NODE_ENV).toBe('development');
    expect(config.passes).toEqual({ enhance: false, enhanceFillMissing: true, repair: false });
    expect(config.diagnostics).toEqual({
      classifier: true,
      wht: true,
      wallet: true,
      vendor: true,
      collaboratorErrors: true,
    });
    expect(config.companyNames).toEqual({ RABBIT: '', SHD: '', TOPONE: '' });
  });

  it('should read switches and company overrides', () => {
    const config = loadConfig({
      ENHANCE_ENABLED: 'YES',
      ENHANCE_FILL_MISSING: '0',
      STORE_VENDOR_META: 'off',
      GL_CODE_TOPONE: ' 5100 ',
    });

    expect(config.passes.enhance).toBe(true);
    expect(config.passes.enhanceFillMissing).toBe(false);
    expect(config.diagnostics.vendor).toBe(false);
    expect(config.glCodes.TOPONE).toBe('5100');
  });

  it('should reject an unknown log level', () => {
    let thrown: unknown;
    try {
      loadConfig({ LOG_LEVEL: 'verbose' });
    } catch (error) {
      thrown = error;
    }
    expect(isPipelineError(thrown) && thrown.code).toBe(ERROR_CODES.INVALID_CONFIGURATION);
  });
});
