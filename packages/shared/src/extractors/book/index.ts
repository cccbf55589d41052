/**
 * Book Extractor
 *
 * Tail shape: Ned. CITY: PUBLISHER, YEAR. Np.
 * Year: the year right after the publisher, else the rightmost year.
 */

import type { ProductionCategory } from '../../types';
import { BaseExtractor } from '../base-extractor';
import { extractImprint, extractPageCount } from '../citation';
import {
  authorsStep,
  doiStep,
  editionStep,
  isbnStep,
  rightmostYearStep,
  titleStep,
} from '../steps';
import type { ExtractionStep } from '../types';

const imprintStep: ExtractionStep = {
  name: 'imprint',
  description: 'CITY: PUBLISHER, YEAR',
  run: (parts) => {
    const imprint = extractImprint(parts.tail);
    if (!imprint) return null;
    return { location: imprint.location, publisher: imprint.publisher, year: imprint.year };
  },
};

const pageCountStep: ExtractionStep = {
  name: 'page-count',
  description: 'Total page count as in "250p."',
  run: (parts) => {
    const pageCount = extractPageCount(parts.tail);
    return pageCount !== undefined ? { page_count: pageCount } : null;
  },
};

export class BookExtractor extends BaseExtractor {
  readonly category: ProductionCategory = 'book';
  readonly name = 'book';
  readonly description = 'Published or organized books';

  protected readonly steps: readonly ExtractionStep[] = [
    authorsStep,
    titleStep,
    editionStep,
    imprintStep,
    rightmostYearStep,
    pageCountStep,
    isbnStep,
    doiStep,
  ];
}

export const bookExtractor = new BookExtractor();
