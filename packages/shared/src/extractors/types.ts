/**
 * Record Extractor Types
 *
 * Defines interfaces for the modular extractor architecture. Each production
 * category gets its own extractor built from an ordered list of named
 * extraction steps; categories without one resolve to the generic extractor.
 */

import type { ItemBlock, ProductionCategory, RecordFields } from '../types';

/**
 * Extraction strategy:
 * - 'pattern': category-specific citation grammar
 * - 'generic': category-agnostic best-effort pass
 */
export type ExtractionStrategy = 'pattern' | 'generic';

/**
 * An item's text cut at its grammar boundaries.
 */
export interface CitationParts {
  /** Leading name block: the author list, or the supervised student */
  authorsText?: string;
  title?: string;
  /** Bibliographic tail; the whole text when no boundary was found */
  tail: string;
}

/**
 * One named sub-extraction. A step is skipped when its precondition does not
 * hold, and gives up by returning null. Either way its fields stay absent.
 */
export interface ExtractionStep {
  readonly name: string;
  readonly description: string;
  precondition?(parts: CitationParts, item: ItemBlock): boolean;
  run(parts: CitationParts, item: ItemBlock, found: Readonly<RecordFields>): Partial<RecordFields> | null;
}

/**
 * Metadata about an extraction operation
 */
export interface ExtractorMetadata {
  extractor: string;
  algorithmVersion: string;
  /** Steps that contributed at least one field */
  appliedSteps: string[];
  /** Steps whose precondition failed or that gave up */
  skippedSteps: string[];
}

/**
 * Result returned by an extractor
 */
export interface ExtractorResult {
  fields: RecordFields;
  /** Grammar problems noticed on the way; merged into the document warnings */
  warnings: string[];
  metadata: ExtractorMetadata;
}

/**
 * Interface for category-specific extractors.
 */
export interface RecordExtractor {
  /** The production category this extractor handles */
  readonly category: ProductionCategory;

  /** Stable name, recorded on every record the extractor produces */
  readonly name: string;

  /** Human-readable description of what this extractor does */
  readonly description: string;

  readonly strategy: ExtractionStrategy;

  /**
   * Recover typed fields from one item. Fields that cannot be recovered with
   * confidence are left out of the result.
   */
  extract(item: ItemBlock): ExtractorResult;
}
