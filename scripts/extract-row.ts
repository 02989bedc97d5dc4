/**
 * Extract Row
 *
 * Runs one OCR text file through the pipeline with the built-in extractors
 * and prints { platform, row, errors } as JSON.
 *
 *   tsx scripts/extract-row.ts invoice.txt --platform tiktok --client-tax-id 0105561071873
 *   tsx scripts/extract-row.ts invoice.txt --config '{"calculate_wht": true}' --verbose
 */

import { readFileSync } from 'node:fs';
import { basename } from 'node:path';
import { parseArgs } from 'node:util';
import { getErrorMessage } from '@shared/errors';
import { safeParseJson, isObject } from '@shared/types/guards';
import { extractRow } from '../server/services/extraction-pipeline';
import { logger } from '../server/services/logger';

function main(): void {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      filename: { type: 'string' },
      platform: { type: 'string' },
      'client-tax-id': { type: 'string' },
      config: { type: 'string' },
      verbose: { type: 'boolean' },
    },
  });

  // stdout carries the JSON result
  logger.setLevel(values.verbose ? 'debug' : 'warn');

  const [textFile] = positionals;
  if (!textFile) {
    console.error('Usage: extract-row <text-file> [--filename name] [--platform label] [--client-tax-id id] [--config json] [--verbose]');
    process.exit(1);
  }

  const config = values.config
    ? safeParseJson<Record<string, unknown> | undefined>(values.config, isObject, undefined)
    : {};
  if (config === undefined) {
    console.error('❌ --config must be a JSON object');
    process.exit(1);
  }

  const text = readFileSync(textFile, 'utf8');
  const result = extractRow(text, {
    filename: values.filename ?? basename(textFile),
    platform: values.platform,
    clientTaxId: values['client-tax-id'],
    config,
  });

  console.log(JSON.stringify(result, null, 2));
}

try {
  main();
} catch (error) {
  console.error('❌ Error:', getErrorMessage(error));
  process.exit(1);
}
