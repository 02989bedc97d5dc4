/**
 * Runtime type guards for values that cross a collaborator boundary
 * (extractor output, patch payloads, loose configuration objects).
 */

// ===== BASIC TYPE GUARDS =====

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !isNaN(value);
}

export function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean';
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Scalars an extractor may legitimately put in a cell: strings, finite numbers, booleans.
 */
export function isCellScalar(value: unknown): value is string | number | boolean {
  return isString(value) || (isNumber(value) && Number.isFinite(value)) || isBoolean(value);
}

// ===== SAFE PARSING UTILITIES =====

export function safeParseJson<T>(
  jsonString: string,
  guard: (value: unknown) => value is T,
  fallback: T
): T {
  try {
    const parsed: unknown = JSON.parse(jsonString);
    return guard(parsed) ? parsed : fallback;
  } catch {
    return fallback;
  }
}
