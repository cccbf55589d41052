/**
 * Section categorization
 *
 * Maps a section heading (or a fixture filename) to one of the closed
 * production categories. Patterns are matched in order against the
 * accent-free, lower-case label; the first match wins.
 */

import path from 'path';
import { normalizeLabel } from '../text/normalize';
import type { ProductionCategory } from '../types';

interface CategoryPattern {
  category: ProductionCategory;
  pattern: RegExp;
}

const CATEGORY_PATTERNS: readonly CategoryPattern[] = [
  { category: 'press_text', pattern: /textos em jornais/ },
  {
    category: 'journal_article',
    pattern: /artigos completos publicados em periodicos|artigos aceitos para publicacao/,
  },
  { category: 'book_chapter', pattern: /capitulos de livros/ },
  { category: 'book', pattern: /livros publicados|livros organizados/ },
  {
    category: 'event_paper',
    pattern: /publicados em anais|anais de congressos|resumos expandidos/,
  },
  {
    category: 'supervision',
    pattern:
      /orientac|supervis|dissertacao de mestrado|tese de doutorado|trabalho de conclusao de curso|iniciacao cientifica|monografia de conclusao/,
  },
];

/**
 * Categorize a section from its heading, falling back to the heading of the
 * group it belongs to.
 */
export function categorizeSection(title: string, group?: string): ProductionCategory {
  for (const label of [title, group]) {
    if (!label) continue;
    const normalized = normalizeLabel(label);
    const match = CATEGORY_PATTERNS.find(({ pattern }) => pattern.test(normalized));
    if (match) return match.category;
  }
  return 'other';
}

/**
 * Section title for a single-category fixture, taken from its filename.
 *
 * Example: "Capitulos_de_livros_publicados.html" -> "Capitulos de livros publicados"
 */
export function sectionTitleFromFilename(filename: string): string {
  const stem = path.basename(filename, path.extname(filename));
  return stem.replace(/[_:]+/g, ' ').replace(/\s+/g, ' ').trim();
}
