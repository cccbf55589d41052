/**
 * Subject metadata from a full-profile page.
 */

import type { CheerioAPI } from 'cheerio';
import { normalizeText, slugify } from '../text/normalize';
import type { SubjectInfo } from '../types';

export const UNKNOWN_SUBJECT_ID = 'unknown';
export const UNKNOWN_SUBJECT_NAME = 'Unknown Researcher';

const FILENAME_ID_PATTERN = /^(\d+)__/;
const PROFILE_URL_PATTERN = /lattes\.cnpq\.br\/(\d{16})/;
const LAST_UPDATE_PATTERN = /atualização do currículo em (\d{2})\/(\d{2})\/(\d{4})/i;

/**
 * Subject identifier: the `<digits>__` filename prefix first, then the
 * profile URL printed in the page.
 */
export function extractSubjectId(filename: string, html: string): string {
  const fromFilename = filename.match(FILENAME_ID_PATTERN);
  if (fromFilename) return fromFilename[1];

  const fromUrl = html.match(PROFILE_URL_PATTERN);
  if (fromUrl) return fromUrl[1];

  return UNKNOWN_SUBJECT_ID;
}

/**
 * Full name from `h2.nome`, ignoring nested captions such as the
 * productivity-grant line.
 */
export function extractFullName($: CheerioAPI): string | undefined {
  const heading = $('h2.nome').first();
  if (heading.length === 0) return undefined;

  const ownText = normalizeText(heading.clone().children().remove().end().text());
  if (!ownText || ownText.startsWith('Bolsista')) return undefined;
  return ownText;
}

/**
 * Last update of the curriculum as an ISO date (YYYY-MM-DD).
 */
export function extractLastUpdate(text: string): string | undefined {
  const match = text.match(LAST_UPDATE_PATTERN);
  if (!match) return undefined;
  const [, day, month, year] = match;
  return `${year}-${month}-${day}`;
}

export function extractSubject($: CheerioAPI, html: string, sourceFile: string): SubjectInfo {
  const fullName = extractFullName($) ?? UNKNOWN_SUBJECT_NAME;
  const subject: SubjectInfo = {
    id: extractSubjectId(sourceFile, html),
    full_name: fullName,
    slug: slugify(fullName) || slugify(UNKNOWN_SUBJECT_NAME),
  };

  const lastUpdate = extractLastUpdate(normalizeText($.root().text()));
  if (lastUpdate) subject.last_update = lastUpdate;

  return subject;
}
