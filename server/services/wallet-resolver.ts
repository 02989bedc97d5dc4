/**
 * Wallet Resolver
 *
 * Maps a merchant identity to the payment wallet (`EWLxxx`) that funded the
 * transaction, per operating company. Order:
 *
 * 1. merchant id supplied by the extractor
 * 2. merchant id found in the document text (only when none was supplied)
 * 3. shop-name keyword, longest keyword first
 * 4. the same keywords against the whole document text
 *
 * Unresolved is a normal outcome: the row is left for review and nothing is
 * guessed. A platform name is never returned as a wallet.
 */

import { z } from 'zod';
import walletTablesJson from '../data/wallet-tables.json';
import type { ClientBucket } from '@shared/constants';
import { PipelineError } from '@shared/errors';
import { CODE_PATTERNS } from '../config/constants';
import { thaiDigitsToArabic, collapseWhitespace } from '../utils/text';
import { clientBucketOf } from './client-identity';

// ═══════════════════════════════════════════════════════════════════════════
// TABLES
// ═══════════════════════════════════════════════════════════════════════════

const walletCodeSchema = z.string().regex(CODE_PATTERNS.WALLET_CODE, 'Wallet codes look like EWL001');

/** `""` marks a keyword that must never match. */
const keywordCodeSchema = z.union([walletCodeSchema, z.literal('')]);

const clientWalletTableSchema = z.object({
  sellerIds: z.record(z.string(), walletCodeSchema),
  shopKeywords: z.record(z.string(), keywordCodeSchema),
});

const walletTablesSchema = z.object({
  RABBIT: clientWalletTableSchema,
  SHD: clientWalletTableSchema,
  TOPONE: clientWalletTableSchema,
});

export type WalletTablesInput = z.input<typeof walletTablesSchema>;

export interface ClientWalletTable {
  readonly byId: ReadonlyMap<string, string>;
  /** Sorted longest keyword first */
  readonly keywords: ReadonlyArray<readonly [keyword: string, code: string]>;
}

export type WalletTables = Readonly<Record<ClientBucket, ClientWalletTable>>;

/**
 * Validate raw tables and build the read-only lookup structures.
 *
 * @throws PipelineError (LOOKUP_TABLE_INVALID) on a malformed table
 */
export function buildWalletTables(input: unknown): WalletTables {
  const parsed = walletTablesSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw PipelineError.invalidLookupTable(`Invalid wallet tables: ${issues.join('; ')}`, { issues });
  }

  const build = (bucket: ClientBucket): ClientWalletTable => {
    const raw = parsed.data[bucket];
    const byId = new Map<string, string>();
    for (const [id, code] of Object.entries(raw.sellerIds)) {
      const key = normIdLoose(id);
      if (key) byId.set(key, code.toUpperCase());
    }
    const keywords = Object.entries(raw.shopKeywords)
      .map(([keyword, code]) => Object.freeze([normShopName(keyword), code.toUpperCase()] as const))
      .filter(([keyword]) => keyword.length > 0)
      .sort((a, b) => b[0].length - a[0].length);

    return Object.freeze({ byId, keywords: Object.freeze(keywords) });
  };

  const tables: Record<ClientBucket, ClientWalletTable> = {
    RABBIT: build('RABBIT'),
    SHD: build('SHD'),
    TOPONE: build('TOPONE'),
  };
  return Object.freeze(tables);
}

/** Process-wide tables, loaded once. */
export const WALLET_TABLES: WalletTables = buildWalletTables(walletTablesJson);

// ═══════════════════════════════════════════════════════════════════════════
// NORMALIZATION
// ═══════════════════════════════════════════════════════════════════════════

function normText(value: string): string {
  return collapseWhitespace(thaiDigitsToArabic(value));
}

/**
 * Normalize a merchant id: digits-only ids stay digits, anything else is
 * upper-cased; separators and punctuation are removed.
 */
export function normIdLoose(value: string): string {
  const stripped = normText(value).replace(/[^\p{L}\p{N}_]+/gu, '');
  if (!stripped) return '';
  return /^[0-9]+$/.test(stripped) ? stripped : stripped.toUpperCase();
}

/** Lower-case, quotes and brackets removed, whitespace collapsed. */
export function normShopName(value: string): string {
  const lowered = normText(value).toLowerCase();
  if (!lowered) return '';
  return collapseWhitespace(lowered.replace(/["'`“”‘’()[\]{}<>]+/g, ' '));
}

export function isValidWalletCode(code: string): boolean {
  return CODE_PATTERNS.WALLET_CODE.test(code.trim());
}

const LABELED_ID_RE = /\b(?:seller|shop|merchant|store)\s*(?:id)?\s*[:#=\-]?\s*([0-9๐-๙][0-9๐-๙\s,\-]{4,30})\b/i;
const TH_ID_RE = /\b(TH[0-9A-Z]{6,})\b/gi;

/**
 * Merchant id printed in document text: a labeled numeric id of at least 5
 * digits, else the first `TH…` code that contains a digit.
 */
export function extractSellerIdFromText(text: string): string {
  const normalized = normText(text);
  if (!normalized) return '';

  const labeled = LABELED_ID_RE.exec(normalized);
  if (labeled) {
    const id = normIdLoose(labeled[1]);
    if (/^[0-9]{5,}$/.test(id)) return id;
  }

  for (const match of normalized.matchAll(TH_ID_RE)) {
    if (/\d/.test(match[1])) return normIdLoose(match[1]);
  }
  return '';
}

function matchKeyword(haystack: string, table: ClientWalletTable): readonly [string, string] | undefined {
  if (!haystack) return undefined;
  return table.keywords.find(([keyword, code]) => isValidWalletCode(code) && haystack.includes(keyword));
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

export type WalletSource = 'seller_id' | 'text_id' | 'shop_keyword' | 'text_keyword';

export type WalletResolution =
  | { status: 'resolved'; code: string; source: WalletSource; matchedKey: string }
  | { status: 'unresolved'; reason: 'unknown_client' | 'no_match' };

export interface WalletQuery {
  clientTaxId: string;
  sellerId?: string;
  shopName?: string;
  text?: string;
}

export function resolveWallet(query: WalletQuery, tables: WalletTables = WALLET_TABLES): WalletResolution {
  const bucket = clientBucketOf(query.clientTaxId);
  if (!bucket) {
    return { status: 'unresolved', reason: 'unknown_client' };
  }
  const table = tables[bucket];
  const text = query.text ?? '';

  const sellerId = normIdLoose(query.sellerId ?? '');
  if (sellerId) {
    const code = table.byId.get(sellerId);
    if (code && isValidWalletCode(code)) {
      return { status: 'resolved', code, source: 'seller_id', matchedKey: sellerId };
    }
  } else if (text) {
    const textId = extractSellerIdFromText(text);
    const code = textId ? table.byId.get(textId) : undefined;
    if (code && isValidWalletCode(code)) {
      return { status: 'resolved', code, source: 'text_id', matchedKey: textId };
    }
  }

  const byShop = matchKeyword(normShopName(query.shopName ?? ''), table);
  if (byShop) {
    return { status: 'resolved', code: byShop[1], source: 'shop_keyword', matchedKey: byShop[0] };
  }

  const byText = matchKeyword(normShopName(text), table);
  if (byText) {
    return { status: 'resolved', code: byText[1], source: 'text_keyword', matchedKey: byText[0] };
  }

  return { status: 'unresolved', reason: 'no_match' };
}

/**
 * Wallet code for a merchant, `""` when unresolved.
 */
export function resolveWalletCode(query: WalletQuery, tables: WalletTables = WALLET_TABLES): string {
  const result = resolveWallet(query, tables);
  return result.status === 'resolved' ? result.code : '';
}
