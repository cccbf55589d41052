/**
 * Extraction steps shared by several extractors.
 */

import {
  extractDoi,
  extractEdition,
  extractIsbn,
  extractIssn,
  extractMonth,
  extractPages,
  parseAuthorList,
  rightmostYear,
} from './citation';
import type { ExtractionStep } from './types';

export const authorsStep: ExtractionStep = {
  name: 'authors',
  description: 'Author list from the block before the " . " sentinel',
  precondition: (parts) => parts.authorsText !== undefined,
  run: (parts) => {
    const authors = parts.authorsText ? parseAuthorList(parts.authorsText) : undefined;
    return authors ? { authors } : null;
  },
};

export const titleStep: ExtractionStep = {
  name: 'title',
  description: 'Title between the author block and the bibliographic tail',
  precondition: (parts) => parts.title !== undefined,
  run: (parts) => (parts.title ? { title: parts.title } : null),
};

export const rightmostYearStep: ExtractionStep = {
  name: 'rightmost-year',
  description: 'Rightmost plausible year in the tail',
  run: (parts) => {
    const year = rightmostYear(parts.tail);
    return year !== undefined ? { year } : null;
  },
};

export const monthStep: ExtractionStep = {
  name: 'month',
  description: 'Month abbreviation directly followed by a year',
  run: (parts) => {
    const month = extractMonth(parts.tail);
    return month ? { month } : null;
  },
};

export const pagesStep: ExtractionStep = {
  name: 'pages',
  description: 'Page range after "p."',
  run: (parts) => {
    const pages = extractPages(parts.tail);
    return pages ? { pages } : null;
  },
};

export const doiStep: ExtractionStep = {
  name: 'doi',
  description: 'DOI from the link icon, then from the text',
  run: (parts, item) => {
    const doi = extractDoi(parts.tail, item.hints.doiHref);
    return doi ? { doi } : null;
  },
};

export const isbnStep: ExtractionStep = {
  name: 'isbn',
  description: 'ISBN label in the text',
  run: (_parts, item) => {
    const isbn = extractIsbn(item.rawText);
    return isbn ? { isbn } : null;
  },
};

export const issnStep: ExtractionStep = {
  name: 'issn',
  description: 'ISSN label in the text',
  run: (_parts, item) => {
    const issn = extractIssn(item.rawText);
    return issn ? { issn } : null;
  },
};

export const editionStep: ExtractionStep = {
  name: 'edition',
  description: 'Edition number before "ed."',
  run: (parts) => {
    const edition = extractEdition(parts.tail);
    return edition ? { edition } : null;
  },
};
