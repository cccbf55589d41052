/**
 * Extractor Registry
 *
 * Closed mapping from production category to extractor. Categories without a
 * registered extractor resolve to the generic extractor; lookups never throw.
 */

import type { ProductionCategory } from '../types';
import type { ExtractionStrategy, RecordExtractor } from './types';
import { genericExtractor } from './generic';
import { logger } from '../logger';

/**
 * Map of production categories to their extractors
 */
const extractorRegistry = new Map<ProductionCategory, RecordExtractor>();

/**
 * Register an extractor for its category.
 * Overwrites any existing extractor for that category.
 */
export function registerExtractor(extractor: RecordExtractor): void {
  extractorRegistry.set(extractor.category, extractor);

  logger.debug('Registered extractor', {
    category: extractor.category,
    extractor: extractor.name,
    strategy: extractor.strategy,
  });
}

/**
 * Get the extractor registered for a category, if any.
 */
export function getExtractor(category: ProductionCategory): RecordExtractor | undefined {
  return extractorRegistry.get(category);
}

/**
 * Resolve the extractor for a category, defaulting to the generic extractor.
 */
export function resolveExtractor(category: ProductionCategory): RecordExtractor {
  return extractorRegistry.get(category) ?? genericExtractor;
}

export function hasExtractor(category: ProductionCategory): boolean {
  return extractorRegistry.has(category);
}

/**
 * Get all registered categories.
 */
export function getRegisteredCategories(): ProductionCategory[] {
  return Array.from(extractorRegistry.keys());
}

/**
 * Clear all registered extractors.
 * Useful for testing.
 */
export function clearRegistry(): void {
  extractorRegistry.clear();
}

/**
 * Get registry statistics
 */
export function getRegistryStats(): {
  totalExtractors: number;
  byStrategy: Partial<Record<ExtractionStrategy, number>>;
  categories: ProductionCategory[];
} {
  const byStrategy: Partial<Record<ExtractionStrategy, number>> = {};

  for (const extractor of extractorRegistry.values()) {
    byStrategy[extractor.strategy] = (byStrategy[extractor.strategy] ?? 0) + 1;
  }

  return {
    totalExtractors: extractorRegistry.size,
    byStrategy,
    categories: getRegisteredCategories(),
  };
}
