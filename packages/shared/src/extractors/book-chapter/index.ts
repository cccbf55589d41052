/**
 * Book Chapter Extractor
 *
 * Tail shape: In: EDITORS (Org.). BOOK. Ned. CITY: PUBLISHER, YEAR, [v. V,]
 * p. PAGES.
 * Year: the year right after the publisher, else the rightmost year.
 */

import type { ItemBlock, ProductionCategory } from '../../types';
import { BaseExtractor } from '../base-extractor';
import {
  cleanValue,
  containerText,
  extractImprint,
  extractVolume,
  parseAuthorList,
  splitAuthors,
  titleBeforeContainer,
} from '../citation';
import {
  authorsStep,
  doiStep,
  editionStep,
  isbnStep,
  pagesStep,
  rightmostYearStep,
  titleStep,
} from '../steps';
import type { CitationParts, ExtractionStep } from '../types';

const EDITORS_PATTERN = /^(.+?)\s*\((?:Orgs?|Eds?|Coords?)\.?\)/i;
const BOOK_AFTER_EDITORS_PATTERN = /\((?:Orgs?|Eds?|Coords?)\.?\)\s*\.?\s*(.+?)\.(?=\s|\d|$)/i;
const BOOK_WITHOUT_EDITORS_PATTERN = /^([^.]+?)\.(?=\s|\d|$)/;

const editorsStep: ExtractionStep = {
  name: 'editors',
  description: 'Organizers before the "(Org.)" marker of the container',
  precondition: (parts) => containerText(parts.tail) !== undefined,
  run: (parts) => {
    const container = containerText(parts.tail) ?? '';
    const names = container.match(EDITORS_PATTERN)?.[1];
    const editors = names ? parseAuthorList(names) : undefined;
    return editors ? { editors } : null;
  },
};

const bookTitleStep: ExtractionStep = {
  name: 'book-title',
  description: 'Book title after the organizers, or the first sentence of the container',
  precondition: (parts) => containerText(parts.tail) !== undefined,
  run: (parts) => {
    const container = containerText(parts.tail) ?? '';
    const match = EDITORS_PATTERN.test(container)
      ? container.match(BOOK_AFTER_EDITORS_PATTERN)
      : container.match(BOOK_WITHOUT_EDITORS_PATTERN);
    const bookTitle = cleanValue(match?.[1]);
    return bookTitle ? { book_title: bookTitle } : null;
  },
};

const imprintStep: ExtractionStep = {
  name: 'imprint',
  description: 'CITY: PUBLISHER, YEAR inside the container',
  run: (parts) => {
    const imprint = extractImprint(containerText(parts.tail) ?? parts.tail);
    if (!imprint) return null;
    return { location: imprint.location, publisher: imprint.publisher, year: imprint.year };
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

export class BookChapterExtractor extends BaseExtractor {
  readonly category: ProductionCategory = 'book_chapter';
  readonly name = 'book-chapter';
  readonly description = 'Chapters published in books';

  protected readonly steps: readonly ExtractionStep[] = [
    authorsStep,
    titleStep,
    editorsStep,
    bookTitleStep,
    editionStep,
    imprintStep,
    rightmostYearStep,
    volumeStep,
    pagesStep,
    isbnStep,
    doiStep,
  ];

  /**
   * Chapter titles may contain periods; they end at ". In:".
   */
  protected splitCitation(item: ItemBlock): CitationParts {
    const { authorsText, remainder } = splitAuthors(item.rawText);
    if (authorsText !== undefined) {
      const contained = titleBeforeContainer(remainder);
      if (contained) return { authorsText, title: contained.title, tail: contained.tail };
    }
    return super.splitCitation(item);
  }
}

export const bookChapterExtractor = new BookChapterExtractor();
