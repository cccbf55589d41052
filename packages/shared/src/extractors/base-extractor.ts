/**
 * Base Record Extractor
 *
 * Abstract base class running an extractor's ordered steps over an item and
 * collecting the fields they recover.
 */

import { logger } from '../logger';
import { RECORD_FIELD_ORDER, type ItemBlock, type ProductionCategory, type RecordFields } from '../types';
import { ALGORITHM_VERSION, splitAuthors, takeTitle } from './citation';
import type {
  CitationParts,
  ExtractionStep,
  ExtractionStrategy,
  ExtractorResult,
  RecordExtractor,
} from './types';

function copyField<K extends keyof RecordFields>(
  target: RecordFields,
  source: Partial<RecordFields>,
  key: K
): boolean {
  const value = source[key];
  if (value === undefined || target[key] !== undefined) return false;
  target[key] = value;
  return true;
}

/**
 * Abstract base class for record extractors.
 * Steps run in declaration order; the first step to recover a field wins.
 */
export abstract class BaseExtractor implements RecordExtractor {
  abstract readonly category: ProductionCategory;
  abstract readonly name: string;
  abstract readonly description: string;
  readonly strategy: ExtractionStrategy = 'pattern';
  readonly algorithmVersion: string = ALGORITHM_VERSION;

  protected abstract readonly steps: readonly ExtractionStep[];

  extract(item: ItemBlock): ExtractorResult {
    const parts = this.splitCitation(item);
    const fields: RecordFields = {};
    const appliedSteps: string[] = [];
    const skippedSteps: string[] = [];

    for (const step of this.steps) {
      if (step.precondition && !step.precondition(parts, item)) {
        skippedSteps.push(step.name);
        continue;
      }

      const found = step.run(parts, item, fields);
      let contributed = false;
      if (found) {
        for (const key of RECORD_FIELD_ORDER) {
          if (copyField(fields, found, key)) contributed = true;
        }
      }
      (contributed ? appliedSteps : skippedSteps).push(step.name);
    }

    logger.debug('Item extracted', {
      extractor: this.name,
      position: item.position,
      applied_steps: appliedSteps,
      skipped_steps: skippedSteps,
    });

    return {
      fields,
      warnings: this.citationWarnings(parts),
      metadata: {
        extractor: this.name,
        algorithmVersion: this.algorithmVersion,
        appliedSteps,
        skippedSteps,
      },
    };
  }

  /**
   * Warnings about the item's shape. Citations are expected to carry an
   * author block.
   */
  protected citationWarnings(parts: CitationParts): string[] {
    return parts.authorsText === undefined ? ['author sentinel missing'] : [];
  }

  /**
   * Cut the item text into author block, title and tail. Without the " . "
   * sentinel nothing is split: authors and title stay absent.
   */
  protected splitCitation(item: ItemBlock): CitationParts {
    const { authorsText, remainder } = splitAuthors(item.rawText);
    if (authorsText === undefined) return { tail: item.rawText };

    const titled = takeTitle(remainder);
    if (!titled) return { authorsText, tail: remainder };
    return { authorsText, title: titled.title, tail: titled.tail };
  }
}
