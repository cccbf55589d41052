/**
 * Record Extractors Module
 *
 * Modular extractor architecture where each production category has its own
 * extractor built from ordered, named steps.
 *
 * Strategies:
 * - 'pattern': category-specific citation grammar (articles, chapters, books,
 *   event papers, press texts, supervisions)
 * - 'generic': best-effort fallback for everything else
 */

// Core types and interfaces
export type {
  RecordExtractor,
  ExtractionStrategy,
  ExtractionStep,
  CitationParts,
  ExtractorResult,
  ExtractorMetadata,
} from './types';

// Base class
export { BaseExtractor } from './base-extractor';

// Registry
export {
  registerExtractor,
  getExtractor,
  resolveExtractor,
  hasExtractor,
  getRegisteredCategories,
  clearRegistry,
  getRegistryStats,
} from './registry';

// Category detection
export { categorizeSection, sectionTitleFromFilename } from './categories';

// Citation patterns
export {
  ALGORITHM_VERSION,
  AUTHOR_SENTINEL,
  splitAuthors,
  parseAuthorList,
  takeTitle,
  findYears,
  rightmostYear,
  extractMonth,
  extractDoi,
  extractIsbn,
  extractIssn,
  extractPages,
  extractPageCount,
  extractEdition,
  extractImprint,
  containerText,
  titleBeforeContainer,
  type AuthorSplit,
  type Imprint,
} from './citation';

// Individual extractors
export { JournalArticleExtractor, journalArticleExtractor } from './journal-article';
export { BookChapterExtractor, bookChapterExtractor } from './book-chapter';
export { BookExtractor, bookExtractor } from './book';
export { EventPaperExtractor, eventPaperExtractor, detectProceedingsType } from './event-paper';
export { PressTextExtractor, pressTextExtractor } from './press-text';
export { SupervisionExtractor, supervisionExtractor, detectSupervisionStatus } from './supervision';
export { GenericExtractor, genericExtractor } from './generic';

// Import for registration
import { registerExtractor } from './registry';
import { journalArticleExtractor } from './journal-article';
import { bookChapterExtractor } from './book-chapter';
import { bookExtractor } from './book';
import { eventPaperExtractor } from './event-paper';
import { pressTextExtractor } from './press-text';
import { supervisionExtractor } from './supervision';
import { genericExtractor } from './generic';

/**
 * Register all built-in extractors.
 * Call this at application startup.
 */
export function registerAllExtractors(): void {
  registerExtractor(journalArticleExtractor);
  registerExtractor(bookChapterExtractor);
  registerExtractor(bookExtractor);
  registerExtractor(eventPaperExtractor);
  registerExtractor(pressTextExtractor);
  registerExtractor(supervisionExtractor);
  registerExtractor(genericExtractor);
}

// Auto-register all extractors on module load
registerAllExtractors();
