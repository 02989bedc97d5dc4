/**
 * Client identity
 *
 * Works out which operating company a document belongs to and how that
 * company is named on the row. The company decides which wallet table and
 * which GL overrides apply.
 */

import {
  CLIENT_BUCKETS,
  CLIENT_TAX_IDS,
  CLIENT_TAX_ID_BY_TAG,
  type ClientBucket,
} from '@shared/constants';
import type { PipelineOptions } from '@shared/schema/pipeline-config';
import { config as processConfig, type Config } from '../config';
import { digitsOnly } from '../utils/text';

/**
 * Bucket of a company tax id (`RABBIT`, `SHD`, `TOPONE`), or `""` when the
 * id is not one of ours. Separators and Thai digits are ignored.
 */
export function clientBucketOf(clientTaxId: string): ClientBucket | '' {
  const digits = digitsOnly(clientTaxId);
  if (!digits) return '';
  return CLIENT_BUCKETS.find((bucket) => CLIENT_TAX_IDS[bucket] === digits) ?? '';
}

/**
 * Tax id of the operating company, first hit wins:
 * explicit argument, `client_tax_id`, a single `client_tax_ids` entry, a
 * `client_tags` entry whose tax id is listed, then the first listed id.
 * `""` when none of these is set; the pipeline may then ask a detector.
 */
export function resolveClientTaxId(explicit: string, options: PipelineOptions): string {
  const direct = explicit.trim();
  if (direct) return direct;

  if (options.clientTaxId) return options.clientTaxId;

  const ids = options.clientTaxIds;
  if (ids.length === 1) return ids[0];

  for (const tag of options.clientTags) {
    if (!Object.hasOwn(CLIENT_TAX_ID_BY_TAG, tag)) continue;
    const taxId = CLIENT_TAX_ID_BY_TAG[tag];
    if (ids.includes(taxId)) return taxId;
  }

  return ids.length > 0 ? ids[0] : '';
}

/**
 * Display name of the company: per-call map, then `COMPANY_NAME_<BUCKET>`,
 * then the bucket name itself.
 */
export function resolveCompanyName(
  clientTaxId: string,
  options: PipelineOptions,
  runtime: Config = processConfig
): string {
  if (Object.hasOwn(options.companyNameByTaxId, clientTaxId)) {
    const fromOptions = options.companyNameByTaxId[clientTaxId];
    if (fromOptions) return fromOptions;
  }

  const bucket = clientBucketOf(clientTaxId);
  if (!bucket) return '';

  return runtime.companyNames[bucket] || bucket;
}
