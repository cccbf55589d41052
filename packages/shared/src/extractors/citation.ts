/**
 * Citation Patterns
 *
 * Sub-extraction helpers shared by the record extractors. Item text follows a
 * small punctuation grammar:
 *
 *   AUTHORS . TITLE. BIBLIOGRAPHIC TAIL
 *
 * where the author block ends at a full " . " sentinel. Initials inside the
 * author block ("SILVA, A. B.") never contain that sentinel.
 *
 * Every helper returns undefined when its pattern does not match; callers
 * leave the field absent.
 */

export const ALGORITHM_VERSION = '2.0.0';

export const AUTHOR_SENTINEL = ' . ';

const MONTHS = ['jan', 'fev', 'mar', 'abr', 'mai', 'jun', 'jul', 'ago', 'set', 'out', 'nov', 'dez'] as const;

export type MonthAbbreviation = (typeof MONTHS)[number];

const YEAR_TOKEN = /\b(?:19|20)\d{2}\b/g;
const IDENTIFIER_TEXT = /\b(?:DOI|ISBN|ISSN)\s*:?\s*\S+/gi;
const GLUED_YEAR = /([A-ZÀ-Ú]\.)\s*(?:19|20)\d{2}\b/g;
const TITLE_PATTERN = /^(.+?)(?:\.(?:\s+|$)|(?<=[?!])\s+)/;
const MONTH_PATTERN = /\b(jan|fev|mar|abr|mai|jun|jul|ago|set|out|nov|dez)\.?\s+(?:19|20)\d{2}\b/i;
const DOI_PATTERN = /\b(10\.\d{4,9}\/[^\s"<>]+)/;
const ISBN_PATTERN = /\bISBN\s*:?\s*([\dXx][\dXx-]{8,16}[\dXx])/i;
const ISSN_PATTERN = /\bISSN\s*:?\s*(\d{4}-?\d{3}[\dXx])\b/i;
const PAGES_PATTERN = /\bp\.\s*(\d+(?:\s*[-–—]\s*\d+)?)/;
const PAGE_COUNT_PATTERN = /\b(\d+)\s*p\s*\.(?=\s|$)/;
const EDITION_PATTERN = /\b(\d+)\s*\.?\s*ed\./i;
const IMPRINT_PATTERN = /([^.:]+?):\s*([^,:]+?),\s*((?:19|20)\d{2})\b/;
const VOLUME_PATTERN = /\bv\.\s*([^,\s]+)/;
const ISSUE_PATTERN = /\bn\.\s*([^,\s]+)/;

export interface AuthorSplit {
  authorsText?: string;
  remainder: string;
}

/**
 * Split the author block at the first full " . " sentinel. Without the
 * sentinel the text is returned unsplit.
 */
export function splitAuthors(text: string): AuthorSplit {
  const index = text.indexOf(AUTHOR_SENTINEL);
  if (index <= 0) return { remainder: text };

  const authorsText = text.slice(0, index).trim();
  const remainder = text.slice(index + AUTHOR_SENTINEL.length).trim();
  if (!authorsText) return { remainder: text };
  return { authorsText, remainder };
}

/**
 * Author names separated by ";". Years glued to a trailing initial
 * ("SILVA, A.2020") are stripped; fragments of two characters or less and
 * bare numbers are dropped.
 */
export function parseAuthorList(authorsText: string): string[] | undefined {
  const authors = authorsText
    .replace(GLUED_YEAR, '$1')
    .split(';')
    .map((name) => name.replace(/\s+/g, ' ').trim())
    .filter((name) => name.length > 2 && !/^\d+$/.test(name));

  return authors.length > 0 ? authors : undefined;
}

/**
 * Title is the text up to the first ". " (or the final period), or up to a
 * "?" or "!" followed by a space, which stays in the title. The rest of the
 * text is the bibliographic tail.
 */
export function takeTitle(remainder: string): { title: string; tail: string } | undefined {
  const match = remainder.match(TITLE_PATTERN);
  if (!match) return undefined;

  const title = cleanValue(match[1]);
  if (!title) return undefined;
  return { title, tail: remainder.slice(match[0].length).trim() };
}

/**
 * Four-digit years in 1900-2099, left to right. Identifier text (DOI, ISBN,
 * ISSN) is ignored, since those often embed year-like digit runs.
 */
export function findYears(text: string): number[] {
  const stripped = text.replace(IDENTIFIER_TEXT, ' ');
  return Array.from(stripped.matchAll(YEAR_TOKEN), (match) => parseInt(match[0], 10));
}

export function rightmostYear(text: string): number | undefined {
  const years = findYears(text);
  return years.length > 0 ? years[years.length - 1] : undefined;
}

/**
 * Month abbreviation, only when directly followed by a year ("mar. 2024").
 */
export function extractMonth(text: string): MonthAbbreviation | undefined {
  const match = text.match(MONTH_PATTERN);
  if (!match) return undefined;
  const month = match[1].toLowerCase();
  return MONTHS.find((candidate) => candidate === month);
}

/**
 * DOI from the item's DOI link first, then from the text.
 */
export function extractDoi(text: string, href?: string): string | undefined {
  for (const source of [href, text]) {
    if (!source) continue;
    const match = source.match(DOI_PATTERN);
    if (match) return match[1].replace(/[.,;]+$/, '');
  }
  return undefined;
}

export function extractIsbn(text: string): string | undefined {
  return text.match(ISBN_PATTERN)?.[1];
}

export function extractIssn(text: string): string | undefined {
  const match = text.match(ISSN_PATTERN);
  if (!match) return undefined;
  const digits = match[1].replace('-', '').toUpperCase();
  return `${digits.slice(0, 4)}-${digits.slice(4)}`;
}

/**
 * Page range after "p.", with dashes normalized to "-".
 */
export function extractPages(text: string): string | undefined {
  const match = text.match(PAGES_PATTERN);
  if (!match) return undefined;
  return match[1].replace(/\s*[-–—]\s*/, '-');
}

/**
 * Total page count, as in "250p." or "250 p ."
 */
export function extractPageCount(text: string): number | undefined {
  const match = text.match(PAGE_COUNT_PATTERN);
  if (!match) return undefined;
  const count = parseInt(match[1], 10);
  return count > 0 ? count : undefined;
}

export function extractEdition(text: string): string | undefined {
  return text.match(EDITION_PATTERN)?.[1];
}

export interface Imprint {
  location: string;
  publisher: string;
  year: number;
}

/**
 * "CITY: PUBLISHER, YEAR" imprint. The city never crosses a period, so
 * edition markers such as "2ed." stay out of it.
 */
export function extractImprint(text: string): Imprint | undefined {
  const match = text.match(IMPRINT_PATTERN);
  if (!match) return undefined;

  const location = cleanValue(match[1]);
  const publisher = cleanValue(match[2]);
  if (!location || !publisher) return undefined;
  return { location, publisher, year: parseInt(match[3], 10) };
}

export function extractVolume(text: string): string | undefined {
  return cleanValue(text.match(VOLUME_PATTERN)?.[1]);
}

export function extractIssue(text: string): string | undefined {
  return cleanValue(text.match(ISSUE_PATTERN)?.[1]);
}

/**
 * Trim whitespace and trailing separators; empty results become undefined.
 */
export function cleanValue(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const cleaned = value.replace(/\s+/g, ' ').replace(/[\s.,;:]+$/, '').trim();
  return cleaned || undefined;
}

const CONTAINER_MARKER = /\bIn\s*:\s*/;
const TITLE_BEFORE_CONTAINER = /^(.+?)\.\s+In\s*:\s*/;

/**
 * Text after the "In:" marker that introduces a book or event container.
 */
export function containerText(text: string): string | undefined {
  const match = CONTAINER_MARKER.exec(text);
  if (!match) return undefined;
  return text.slice(match.index + match[0].length).trim() || undefined;
}

/**
 * Title of a contained work: everything before ". In:", periods included.
 */
export function titleBeforeContainer(remainder: string): { title: string; tail: string } | undefined {
  const match = remainder.match(TITLE_BEFORE_CONTAINER);
  if (!match) return undefined;

  const title = cleanValue(match[1]);
  if (!title) return undefined;
  // Keep the marker on the tail so container steps can find it.
  return { title, tail: remainder.slice(match[1].length + 1).trim() };
}
