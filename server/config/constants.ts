/**
 * Centralized Configuration Constants
 *
 * Scores, rounding and diagnostic limits used by the finalizer stages.
 */

// ===== REFERENCE SCORING =====

/**
 * Trust score per reference shape. Highest score wins, earliest candidate
 * breaks ties.
 */
export const REFERENCE_SCORES = {
  /** 32-hex file-content hash */
  HASH: 5,

  /** Shopee tax invoice core (TRS…) */
  TRS: 100,

  /** Shopee Express receipt core (RCS…) */
  RCS: 95,

  /** Lazada invoice number (THMPTI…) */
  LAZADA_INVOICE: 90,

  /** TikTok Shop invoice number (TTSTH…) */
  TTSTH: 85,

  /** Any TH… token of 12+ characters on a Lazada document */
  LAZADA_TH_TOKEN: 80,

  /** Alphanumeric token of 10+ characters */
  GENERIC_LONG: 60,

  OTHER: 30,
} as const;

// ===== MONEY =====

export const MONEY = {
  /** Bias added before two-decimal rounding so x.xx5 does not round down */
  ROUNDING_EPSILON: 1e-9,
} as const;

// ===== DIAGNOSTICS =====

export const DIAGNOSTICS = {
  /** Longest echo of the per-call options stored in `_cfg` */
  CONFIG_ECHO_LENGTH: 300,
} as const;

// ===== CODE FORMATS =====

export const CODE_PATTERNS = {
  /** Vendor master code, e.g. C00012 */
  VENDOR_CODE: /^C\d{4,}$/i,

  /** Payment wallet code, e.g. EWL003 */
  WALLET_CODE: /^EWL\d{3}$/i,
} as const;
