/**
 * Document Pipeline
 *
 * Turns one segmented document into a validated researcher document:
 * extraction through the registry, year filter, renumbering, provenance and
 * schema validation. Pure apart from logging; no file access.
 */

import { runWithChildContext } from '../context';
import { SchemaViolationError } from '../errors';
import { genericExtractor } from '../extractors/generic';
import { resolveExtractor } from '../extractors/registry';
import type { ExtractorResult } from '../extractors/types';
import { logger } from '../logger';
import type { DocumentValidator } from '../schemas';
import { fingerprint } from '../text/fingerprint';
import {
  emptyCategoryCounts,
  orderRecordFields,
  SCHEMA_VERSION,
  type ExtractedRecord,
  type FilterDescriptor,
  type ItemBlock,
  type OutputSection,
  type ProductionCategory,
  type ProductionRecord,
  type RecordProvenance,
  type ResearcherDocument,
  type SegmentedDocument,
  type YearFilter,
} from '../types';
import { applyYearFilter } from './year-filter';

export interface PipelineOptions {
  filter: YearFilter;
  filters: FilterDescriptor;
  /** Document-level extraction timestamp (ISO 8601) */
  extractedAt: string;
  validate: DocumentValidator;
}

export interface ItemExtraction {
  record: ExtractedRecord;
  /** The category's extractor threw and generic fields were used instead */
  fellBack: boolean;
  /** Extractor and fallback warnings, prefixed with the item location */
  warnings: string[];
}

export interface DocumentBuild {
  document: ResearcherDocument;
  /** Every record created by extraction, before filtering */
  extracted: ExtractedRecord[];
  /** Categories of the items that fell back to generic extraction */
  fallbacks: ProductionCategory[];
}

function frozenNames(names: readonly string[] | undefined): readonly string[] | undefined {
  return names ? Object.freeze([...names]) : undefined;
}

/**
 * Create the immutable record for one item. The fingerprint depends on the
 * raw text only.
 */
export function buildRecord(item: ItemBlock, result: ExtractorResult): ExtractedRecord {
  const fields = orderRecordFields(result.fields);
  const authors = frozenNames(fields.authors);
  const editors = frozenNames(fields.editors);
  if (authors) fields.authors = authors;
  if (editors) fields.editors = editors;

  return Object.freeze({
    source_position: item.position,
    category: item.section.category,
    raw_text: item.rawText,
    fingerprint: fingerprint(item.rawText),
    extractor: result.metadata.extractor,
    ...fields,
  });
}

function locate(item: ItemBlock, warnings: readonly string[]): string[] {
  return warnings.map((warning) => `${item.section.title} #${item.position}: ${warning}`);
}

/**
 * Route one item through the registry. An extractor failure degrades to
 * generic extraction for that item only.
 */
export function extractItem(item: ItemBlock): ItemExtraction {
  const extractor = resolveExtractor(item.section.category);
  try {
    const result = extractor.extract(item);
    return { record: buildRecord(item, result), fellBack: false, warnings: locate(item, result.warnings) };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn('Extractor failed, falling back to generic extraction', {
      extractor: extractor.name,
      position: item.position,
      error: reason,
    });
    const fallback = genericExtractor.extract(item);
    return {
      record: buildRecord(item, fallback),
      fellBack: true,
      warnings: locate(item, [`${extractor.name} extractor failed (${reason}); generic fields used`, ...fallback.warnings]),
    };
  }
}

function finalizeRecord(record: ExtractedRecord, ordinal: number, provenance: RecordProvenance): ProductionRecord {
  const { source_position, category, raw_text, fingerprint: print, extractor, ...fields } = record;
  return {
    ordinal,
    source_position,
    category,
    raw_text,
    fingerprint: print,
    extractor,
    ...orderRecordFields(fields),
    provenance,
  };
}

/**
 * Build and validate the researcher document.
 *
 * @throws SchemaViolationError when the assembled document breaks the schema
 */
export function buildResearcherDocument(segmented: SegmentedDocument, options: PipelineOptions): DocumentBuild {
  const { subject, sourceFile } = segmented;
  const warnings = [...segmented.warnings];
  const perCategory = emptyCategoryCounts();
  const extracted: ExtractedRecord[] = [];
  const fallbacks: ProductionCategory[] = [];
  const seenFingerprints = new Map<string, string>();
  // Items the segmenter could not cut count as errors alongside extractor failures
  let errorCount = segmented.warnings.length;
  let excludedByFilter = 0;
  let missingYear = 0;

  const sections: OutputSection[] = segmented.sections.map((section) => {
    const sectionRecords: ExtractedRecord[] = [];

    for (const item of section.items) {
      const extraction = runWithChildContext({ section: section.title }, () => extractItem(item));
      if (extraction.fellBack) {
        errorCount++;
        fallbacks.push(section.category);
      }
      warnings.push(...extraction.warnings);

      const location = `${section.title} #${item.position}`;
      const firstSeen = seenFingerprints.get(extraction.record.fingerprint);
      if (firstSeen) {
        warnings.push(`${location}: duplicate of ${firstSeen}`);
      } else {
        seenFingerprints.set(extraction.record.fingerprint, location);
      }

      sectionRecords.push(extraction.record);
    }
    extracted.push(...sectionRecords);

    const filtered = applyYearFilter(sectionRecords, options.filter);
    excludedByFilter += filtered.excludedByFilter;
    missingYear += filtered.missingYear;
    if (filtered.excludedByFilter > 0 || filtered.missingYear > 0) {
      logger.debug('Records dropped by year filter', {
        section: section.title,
        excluded_by_filter: filtered.excludedByFilter,
        missing_year: filtered.missingYear,
      });
    }

    const records = filtered.kept.map((record, index) =>
      finalizeRecord(record, index + 1, {
        source_file: sourceFile,
        subject_id: subject.id,
        section: section.title,
        category: section.category,
        extracted_at: options.extractedAt,
        filters: options.filters,
      })
    );
    perCategory[section.category] += records.length;

    const heading = section.group ? { title: section.title, group: section.group } : { title: section.title };
    return {
      ...heading,
      category: section.category,
      declared_item_count: section.declaredItemCount,
      item_count: records.length,
      records,
    };
  });

  const recordCount = sections.reduce((sum, section) => sum + section.item_count, 0);

  const document: ResearcherDocument = {
    schema_version: SCHEMA_VERSION,
    subject,
    provenance: {
      source_file: sourceFile,
      extracted_at: options.extractedAt,
      filters: options.filters,
    },
    record_count: recordCount,
    sections,
    parse_metadata: {
      item_count: extracted.length,
      error_count: errorCount,
      fallback_count: fallbacks.length,
      excluded_by_filter: excludedByFilter,
      missing_year: missingYear,
      per_category: perCategory,
      warnings,
    },
  };

  const result = options.validate(document);
  if (!result.valid) {
    throw new SchemaViolationError(result.violations);
  }

  return { document, extracted, fallbacks };
}
