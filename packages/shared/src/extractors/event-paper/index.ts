/**
 * Event Paper Extractor
 *
 * Tail shape: In: EVENT, YEAR, LOCATION. PROCEEDINGS. ...
 * Year: the year right after the event name, else the rightmost year.
 * Location is the text between that year and the next period.
 */

import { normalizeLabel } from '../../text/normalize';
import type { ItemBlock, ProceedingsType, ProductionCategory } from '../../types';
import { BaseExtractor } from '../base-extractor';
import { cleanValue, containerText, splitAuthors, titleBeforeContainer } from '../citation';
import { authorsStep, doiStep, isbnStep, pagesStep, rightmostYearStep, titleStep } from '../steps';
import type { CitationParts, ExtractionStep } from '../types';

const EVENT_PATTERN = /^(.+?),\s*((?:19|20)\d{2})\b/;
const LOCATION_PATTERN = /^.+?,\s*(?:19|20)\d{2}\s*,\s*([^.]+?)\s*\./;

const SECTION_PROCEEDINGS: ReadonlyArray<[RegExp, ProceedingsType]> = [
  [/resumos expandidos/, 'expanded_abstract'],
  [/resumos publicados/, 'abstract'],
  [/trabalhos completos/, 'full_paper'],
];

const TEXT_PROCEEDINGS: ReadonlyArray<[RegExp, ProceedingsType]> = [
  [/\bResumo expandido\b/i, 'expanded_abstract'],
  [/\bResumos?\b/i, 'abstract'],
  [/\bAnais\b|\bTrabalho completo\b/i, 'full_paper'],
];

/**
 * Proceedings type from the section title first, then from markers in the
 * item text.
 */
export function detectProceedingsType(sectionTitle: string, text: string): ProceedingsType | undefined {
  const label = normalizeLabel(sectionTitle);
  for (const [pattern, type] of SECTION_PROCEEDINGS) {
    if (pattern.test(label)) return type;
  }
  for (const [pattern, type] of TEXT_PROCEEDINGS) {
    if (pattern.test(text)) return type;
  }
  return undefined;
}

const eventStep: ExtractionStep = {
  name: 'event',
  description: 'Event name and year at the start of the container',
  precondition: (parts) => containerText(parts.tail) !== undefined,
  run: (parts) => {
    const match = (containerText(parts.tail) ?? '').match(EVENT_PATTERN);
    const eventName = cleanValue(match?.[1]);
    if (!match || !eventName) return null;
    return { event_name: eventName, year: parseInt(match[2], 10) };
  },
};

const locationStep: ExtractionStep = {
  name: 'location',
  description: 'City between the event year and the next period',
  precondition: (parts) => containerText(parts.tail) !== undefined,
  run: (parts) => {
    const location = cleanValue((containerText(parts.tail) ?? '').match(LOCATION_PATTERN)?.[1]);
    return location ? { location } : null;
  },
};

const proceedingsStep: ExtractionStep = {
  name: 'proceedings-type',
  description: 'Full paper, expanded abstract or abstract',
  run: (parts, item) => {
    const type = detectProceedingsType(item.section.title, parts.tail);
    return type ? { proceedings_type: type } : null;
  },
};

export class EventPaperExtractor extends BaseExtractor {
  readonly category: ProductionCategory = 'event_paper';
  readonly name = 'event-paper';
  readonly description = 'Papers and abstracts published in event proceedings';

  protected readonly steps: readonly ExtractionStep[] = [
    authorsStep,
    titleStep,
    eventStep,
    rightmostYearStep,
    locationStep,
    proceedingsStep,
    pagesStep,
    isbnStep,
    doiStep,
  ];

  protected splitCitation(item: ItemBlock): CitationParts {
    const { authorsText, remainder } = splitAuthors(item.rawText);
    if (authorsText !== undefined) {
      const contained = titleBeforeContainer(remainder);
      if (contained) return { authorsText, title: contained.title, tail: contained.tail };
    }
    return super.splitCitation(item);
  }
}

export const eventPaperExtractor = new EventPaperExtractor();
