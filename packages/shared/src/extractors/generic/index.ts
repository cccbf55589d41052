/**
 * Generic Extractor
 *
 * Category-agnostic fallback. Guarantees nothing beyond the raw text and
 * position the pipeline already holds, and adds a best-effort pass for
 * authors, title, year, month and DOI. Never throws.
 */

import type { ProductionCategory } from '../../types';
import { BaseExtractor } from '../base-extractor';
import { extractDoi, extractMonth, rightmostYear } from '../citation';
import { authorsStep } from '../steps';
import type { ExtractionStep, ExtractionStrategy } from '../types';

const MIN_TITLE_LENGTH = 10;

const titleStep: ExtractionStep = {
  name: 'title',
  description: 'First sentence after the author block, when long enough to be a title',
  precondition: (parts) => parts.title !== undefined,
  run: (parts) => (parts.title && parts.title.length > MIN_TITLE_LENGTH ? { title: parts.title } : null),
};

const yearStep: ExtractionStep = {
  name: 'rightmost-year',
  description: 'Rightmost plausible year anywhere in the text',
  run: (_parts, item) => {
    const year = rightmostYear(item.rawText);
    return year !== undefined ? { year } : null;
  },
};

const monthStep: ExtractionStep = {
  name: 'month',
  description: 'Month abbreviation directly followed by a year',
  run: (_parts, item) => {
    const month = extractMonth(item.rawText);
    return month ? { month } : null;
  },
};

const doiLinkStep: ExtractionStep = {
  name: 'doi-link',
  description: 'DOI from the link icon only',
  precondition: (_parts, item) => item.hints.doiHref !== undefined,
  run: (_parts, item) => {
    const doi = item.hints.doiHref ? extractDoi('', item.hints.doiHref) : undefined;
    return doi ? { doi } : null;
  },
};

export class GenericExtractor extends BaseExtractor {
  readonly category: ProductionCategory = 'other';
  readonly name = 'generic';
  readonly description = 'Best-effort fields for any production item';
  readonly strategy: ExtractionStrategy = 'generic';

  protected readonly steps: readonly ExtractionStep[] = [authorsStep, titleStep, yearStep, monthStep, doiLinkStep];

  /** Any shape is acceptable here. */
  protected citationWarnings(): string[] {
    return [];
  }
}

export const genericExtractor = new GenericExtractor();
