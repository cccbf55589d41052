/**
 * Press Text Extractor
 *
 * Tail shape: VENUE, LOCATION, p. PAGES, DD mon. YYYY.
 * Year: from the "mon. YYYY" date, else the rightmost year.
 */

import type { ProductionCategory } from '../../types';
import { BaseExtractor } from '../base-extractor';
import { cleanValue, extractMonth } from '../citation';
import { authorsStep, pagesStep, rightmostYearStep, titleStep } from '../steps';
import type { ExtractionStep } from '../types';

const VENUE_PATTERN = /^([^,]+)/;
const LOCATION_PATTERN = /^[^,]+,\s*([^,]+?),\s*p\./;
const DATE_PATTERN = /\b(?:jan|fev|mar|abr|mai|jun|jul|ago|set|out|nov|dez)\.?\s+((?:19|20)\d{2})\b/i;
const DATE_LIKE = /\d{4}|\b(?:jan|fev|mar|abr|mai|jun|jul|ago|set|out|nov|dez)\b/i;
const PAGE_MARKER = /^p\.?\s*\d/i;

/**
 * Venue and location candidates are rejected when they look like a date or a
 * page marker.
 */
function isPlainName(candidate: string): boolean {
  return !DATE_LIKE.test(candidate) && !PAGE_MARKER.test(candidate);
}

const venueStep: ExtractionStep = {
  name: 'venue',
  description: 'Newspaper or magazine name before the first comma',
  precondition: (parts) => parts.title !== undefined,
  run: (parts) => {
    const venue = cleanValue(parts.tail.match(VENUE_PATTERN)?.[1]);
    return venue && isPlainName(venue) ? { venue } : null;
  },
};

const locationStep: ExtractionStep = {
  name: 'location',
  description: 'City between the venue and the page marker',
  precondition: (parts) => parts.title !== undefined,
  run: (parts) => {
    const location = cleanValue(parts.tail.match(LOCATION_PATTERN)?.[1]);
    return location && isPlainName(location) ? { location } : null;
  },
};

const dateStep: ExtractionStep = {
  name: 'date',
  description: 'Month and year of the "DD mon. YYYY" publication date',
  run: (parts) => {
    const match = parts.tail.match(DATE_PATTERN);
    const month = extractMonth(parts.tail);
    if (!match || !month) return null;
    return { month, year: parseInt(match[1], 10) };
  },
};

export class PressTextExtractor extends BaseExtractor {
  readonly category: ProductionCategory = 'press_text';
  readonly name = 'press-text';
  readonly description = 'Texts published in newspapers and magazines';

  protected readonly steps: readonly ExtractionStep[] = [
    authorsStep,
    titleStep,
    venueStep,
    locationStep,
    pagesStep,
    dateStep,
    rightmostYearStep,
  ];
}

export const pressTextExtractor = new PressTextExtractor();
