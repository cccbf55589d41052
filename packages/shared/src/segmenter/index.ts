/**
 * Section Segmenter
 *
 * Splits one exported page into production sections and per-item text
 * blocks, in source order. Two layouts are recognized:
 * - full profiles, with one `div.title-wrapper` per profile section;
 * - single-category fixtures holding only item cells, whose category comes
 *   from the filename.
 */

import * as cheerio from 'cheerio';
import { SegmentationError } from '../errors';
import { categorizeSection, sectionTitleFromFilename } from '../extractors/categories';
import { logger } from '../logger';
import type { SectionInfo, SegmentedDocument, SegmentedSection } from '../types';
import { extractSectionItems } from './items';
import { extractSubject } from './profile';
import { collectProfileSections, type RawSection } from './sections';

export function segmentDocument(html: string, sourceFile: string): SegmentedDocument {
  if (!html.trim()) {
    throw new SegmentationError('Document is empty', sourceFile);
  }

  const $ = cheerio.load(html);
  const subject = extractSubject($, html, sourceFile);

  let rawSections: RawSection[];
  if ($('div.title-wrapper').length > 0) {
    rawSections = collectProfileSections($);
  } else if ($('div.layout-cell-1').length > 0) {
    rawSections = [{ title: sectionTitleFromFilename(sourceFile), fragment: html }];
  } else {
    throw new SegmentationError('No profile sections or item cells found', sourceFile);
  }

  const warnings: string[] = [];
  const sections: SegmentedSection[] = rawSections.map((raw) => {
    const info: SectionInfo = {
      title: raw.title,
      category: categorizeSection(raw.title, raw.group),
    };
    if (raw.group) info.group = raw.group;

    const { declaredItemCount, items, warnings: itemWarnings } = extractSectionItems(raw.fragment, info);
    warnings.push(...itemWarnings);

    return { ...info, declaredItemCount, items };
  });

  logger.debug('Document segmented', {
    subject_id: subject.id,
    section_count: sections.length,
    item_count: sections.reduce((sum, section) => sum + section.items.length, 0),
  });

  return { sourceFile, subject, sections, warnings };
}

export { extractSectionItems } from './items';
export { extractSubject, extractSubjectId, extractLastUpdate } from './profile';
export { collectProfileSections, isNonProductionSection } from './sections';
