/**
 * Journal Article Extractor
 *
 * Tail shape: VENUE, v. VOL, [n. N,] p. PAGES, [mon.] YEAR.
 * Year: the page's sort attribute when present, else the rightmost year.
 */

import type { ProductionCategory } from '../../types';
import { BaseExtractor } from '../base-extractor';
import { cleanValue, extractIssue, extractVolume } from '../citation';
import {
  authorsStep,
  doiStep,
  issnStep,
  monthStep,
  pagesStep,
  rightmostYearStep,
  titleStep,
} from '../steps';
import type { ExtractionStep } from '../types';

const VENUE_PATTERN =
  /^(.+?),\s*(?:v\.|n\.|p\.|(?:jan|fev|mar|abr|mai|jun|jul|ago|set|out|nov|dez)\.?\s|(?:19|20)\d{2}\b)/i;

const BARE_NUMBER = /^\d+$/;

const venueStep: ExtractionStep = {
  name: 'venue',
  description: 'Journal name up to the first volume, issue, page or year marker',
  precondition: (parts) => parts.title !== undefined,
  run: (parts) => {
    const venue = cleanValue(parts.tail.match(VENUE_PATTERN)?.[1]);
    return venue && !BARE_NUMBER.test(venue) ? { venue } : null;
  },
};

const volumeStep: ExtractionStep = {
  name: 'volume',
  description: 'Volume after "v."',
  run: (parts) => {
    const volume = extractVolume(parts.tail);
    return volume ? { volume } : null;
  },
};

const issueStep: ExtractionStep = {
  name: 'issue',
  description: 'Issue number after "n."',
  run: (parts) => {
    const issue = extractIssue(parts.tail);
    return issue ? { issue } : null;
  },
};

const sortYearStep: ExtractionStep = {
  name: 'sort-year',
  description: 'Year from the page sort attribute',
  precondition: (_parts, item) => item.hints.sortYear !== undefined,
  run: (_parts, item) => (item.hints.sortYear !== undefined ? { year: item.hints.sortYear } : null),
};

export class JournalArticleExtractor extends BaseExtractor {
  readonly category: ProductionCategory = 'journal_article';
  readonly name = 'journal-article';
  readonly description = 'Articles published in journals';

  protected readonly steps: readonly ExtractionStep[] = [
    authorsStep,
    titleStep,
    venueStep,
    volumeStep,
    issueStep,
    pagesStep,
    sortYearStep,
    rightmostYearStep,
    monthStep,
    doiStep,
    issnStep,
  ];
}

export const journalArticleExtractor = new JournalArticleExtractor();
