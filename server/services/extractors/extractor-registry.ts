/**
 * Extractor registry
 *
 * Platform route → extractor, with one fallback for routes that have none.
 * Every extractor takes the same `ExtractorInput`.
 */

import type { PlatformRoute } from '@shared/constants';
import type { Extractor, ExtractorLookup, ExtractorRegistration } from '@shared/types/services';
import { extractGeneric } from './generic-extractor';
import { extractTiktok } from './tiktok-extractor';

export const EXTRACTION_METHODS = {
  GENERIC: 'generic',
  TIKTOK: 'rule_based_tiktok',
} as const;

export class ExtractorRegistry implements ExtractorLookup {
  private extractors: Map<PlatformRoute, ExtractorRegistration> = new Map();
  private fallbackRegistration: ExtractorRegistration;

  constructor(fallback: Extractor = extractGeneric, fallbackMethod: string = EXTRACTION_METHODS.GENERIC) {
    this.fallbackRegistration = { route: 'GENERIC', method: fallbackMethod, extract: fallback };
  }

  /**
   * Registry with the extractors shipped in this package.
   */
  static withBuiltIns(): ExtractorRegistry {
    const registry = new ExtractorRegistry();
    registry.register('TIKTOK', EXTRACTION_METHODS.TIKTOK, extractTiktok);
    return registry;
  }

  /**
   * Register an extractor for a route
   */
  register(route: PlatformRoute, method: string, extract: Extractor): this {
    if (this.extractors.has(route)) {
      throw new Error(`Extractor for '${route}' is already registered`);
    }
    this.extractors.set(route, { route, method, extract });
    return this;
  }

  get(route: PlatformRoute): ExtractorRegistration | undefined {
    return this.extractors.get(route);
  }

  fallback(): ExtractorRegistration {
    return this.fallbackRegistration;
  }

  isRegistered(route: PlatformRoute): boolean {
    return this.extractors.has(route);
  }

  getRegisteredRoutes(): PlatformRoute[] {
    return [...this.extractors.keys()];
  }
}
