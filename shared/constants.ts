/**
 * Shared Constants
 *
 * Platform routes, expense groups and operating-company identities used by
 * the extractors, the finalizer and the orchestrator.
 */

// ═══════════════════════════════════════════════════════════════════════════
// PLATFORMS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Routes an extractor can be registered under. `GENERIC` is the catch-all
 * route for documents the classifier could not place.
 */
export const PLATFORM_ROUTES = [
  'META',
  'GOOGLE',
  'SHOPEE',
  'LAZADA',
  'TIKTOK',
  'SPX',
  'THAI_TAX',
  'GENERIC',
] as const;

export type PlatformRoute = typeof PLATFORM_ROUTES[number];

/** Label reported to callers: same as the route, except `GENERIC` reads `UNKNOWN`. */
export type PlatformLabel = Exclude<PlatformRoute, 'GENERIC'> | 'UNKNOWN';

const PLATFORM_ROUTE_SET: ReadonlySet<string> = new Set(PLATFORM_ROUTES);

export function isPlatformRoute(value: string): value is PlatformRoute {
  return PLATFORM_ROUTE_SET.has(value);
}

/** Classifier spellings that map onto a known route. */
const PLATFORM_ALIASES: Readonly<Record<string, PlatformRoute>> = {
  FACEBOOK: 'META',
  FACEBOOK_ADS: 'META',
  FB: 'META',
  META_ADS: 'META',
  GOOGLE_ADS: 'GOOGLE',
  ADWORDS: 'GOOGLE',
  TIKTOK_SHOP: 'TIKTOK',
  LAZ: 'LAZADA',
  LZD: 'LAZADA',
  SHOPEE_EXPRESS: 'SPX',
  SPX_EXPRESS: 'SPX',
  THAI_TAX_INVOICE: 'THAI_TAX',
  TAX_INVOICE: 'THAI_TAX',
};

/**
 * Normalize a raw classifier label ("tiktok shop", "Meta-Ads", "") to a route.
 */
export function normalizePlatformRoute(raw: string | undefined): PlatformRoute {
  const key = (raw ?? '').trim().toUpperCase().replace(/[^A-Z0-9]+/g, '_').replace(/^_+|_+$/g, '');
  if (!key || key === 'UNKNOWN') return 'GENERIC';
  if (isPlatformRoute(key)) return key;
  return PLATFORM_ALIASES[key] ?? 'GENERIC';
}

export function platformLabelFor(route: PlatformRoute): PlatformLabel {
  return route === 'GENERIC' ? 'UNKNOWN' : route;
}

export const ADS_PLATFORMS: ReadonlySet<string> = new Set(['META', 'GOOGLE']);
export const MARKETPLACE_PLATFORMS: ReadonlySet<string> = new Set(['SHOPEE', 'LAZADA', 'TIKTOK', 'SPX']);

// ═══════════════════════════════════════════════════════════════════════════
// EXPENSE GROUPS & DESCRIPTIONS
// ═══════════════════════════════════════════════════════════════════════════

export const EXPENSE_GROUPS = {
  ADVERTISING: 'Advertising Expense',
  MARKETPLACE: 'Marketplace Expense',
  GENERAL: 'General Expense',
  OTHER: 'Other Expense',
} as const;

export const PLATFORM_GROUPS: Readonly<Record<string, string>> = {
  META: EXPENSE_GROUPS.ADVERTISING,
  GOOGLE: EXPENSE_GROUPS.ADVERTISING,
  SHOPEE: EXPENSE_GROUPS.MARKETPLACE,
  LAZADA: EXPENSE_GROUPS.MARKETPLACE,
  TIKTOK: EXPENSE_GROUPS.MARKETPLACE,
  SPX: EXPENSE_GROUPS.MARKETPLACE,
  THAI_TAX: EXPENSE_GROUPS.GENERAL,
  UNKNOWN: EXPENSE_GROUPS.OTHER,
  GENERIC: EXPENSE_GROUPS.OTHER,
};

export const PLATFORM_DESCRIPTIONS: Readonly<Record<string, string>> = {
  META: 'Meta Ads',
  GOOGLE: 'Google Ads',
  SHOPEE: 'Shopee Marketplace Fee',
  LAZADA: 'Lazada Marketplace Fee',
  TIKTOK: 'TikTok Shop Fee',
  SPX: 'Shopee Express',
  THAI_TAX: 'Tax Invoice',
};

/** Account buckets a per-company GL map may be split into. */
export type GlBucket = 'ADS' | 'MARKETPLACE' | 'DEFAULT';

export function glBucketFor(platform: string): GlBucket {
  const p = platform.trim().toUpperCase();
  if (ADS_PLATFORMS.has(p)) return 'ADS';
  if (MARKETPLACE_PLATFORMS.has(p)) return 'MARKETPLACE';
  return 'DEFAULT';
}

// ═══════════════════════════════════════════════════════════════════════════
// OPERATING COMPANIES
// ═══════════════════════════════════════════════════════════════════════════

export const CLIENT_BUCKETS = ['RABBIT', 'SHD', 'TOPONE'] as const;

export type ClientBucket = typeof CLIENT_BUCKETS[number];

/** 13-digit tax id of each operating company. */
export const CLIENT_TAX_IDS: Readonly<Record<ClientBucket, string>> = {
  RABBIT: '0105561071873',
  SHD: '0105563022918',
  TOPONE: '0105565027615',
};

/** Tag (as used in `client_tags`) → tax id. */
export const CLIENT_TAX_ID_BY_TAG: Readonly<Record<string, string>> = {
  RABBIT: CLIENT_TAX_IDS.RABBIT,
  SHD: CLIENT_TAX_IDS.SHD,
  TOPONE: CLIENT_TAX_IDS.TOPONE,
};

// ═══════════════════════════════════════════════════════════════════════════
// ROW DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════

export const VAT_RATE_TOKENS = {
  STANDARD: '7%',
  ZERO: '0%',
  NONE: 'NO',
} as const;

/** Price type codes: 1 = VAT inclusive, 2 = VAT exclusive, 3 = no VAT. */
export const PRICE_TYPES = {
  VAT_INCLUSIVE: '1',
  VAT_EXCLUSIVE: '2',
  NO_VAT: '3',
} as const;

/** Vendor code an extractor emits before the vendor lookup has run. */
export const UNKNOWN_VENDOR_CODE = 'Unknown';

// ═══════════════════════════════════════════════════════════════════════════
// WITHHOLDING TAX
// ═══════════════════════════════════════════════════════════════════════════

export const WHT_DEFAULTS = {
  /** Fallback withholding rate applied to the tax-exclusive base */
  RATE: 0.03,
  /** Filing code when withholding applies */
  FILING_CODE_WITH_WHT: '53',
  /** Filing code when no withholding applies */
  FILING_CODE_WITHOUT_WHT: '53',
} as const;
