/**
 * Batch Orchestrator
 *
 * Processes every HTML document of an input directory, one at a time in
 * sorted order:
 *
 *   discovered -> segmented -> extracted -> filtered -> validated -> written
 *   discovered -> ... -> failed(parse_error | schema_error | write_error)
 *
 * A failed document is recorded and the batch moves on. summary.json and
 * errors.json are always written, even when every document fails.
 */

import fs from 'fs';
import path from 'path';
import { describeFilter } from '../config';
import { runWithChildContext } from '../context';
import { ConfigurationError, SchemaViolationError, SegmentationError, formatViolation } from '../errors';
import { logger } from '../logger';
import {
  batchDurationHistogram,
  documentDurationHistogram,
  documentsProcessedCounter,
  extractorFallbacksCounter,
  filterDropsCounter,
  recordsExtractedCounter,
} from '../metrics';
import { createDocumentValidator, type DocumentValidator } from '../schemas';
import { segmentDocument } from '../segmenter';
import { UNKNOWN_SUBJECT_ID } from '../segmenter/profile';
import { decodeHtmlBytes, slugify } from '../text/normalize';
import {
  emptyCategoryCounts,
  PRODUCTION_CATEGORIES,
  type BatchReport,
  type BatchSummary,
  type DocumentFailure,
  type DocumentReportLine,
  type DocumentStage,
  type FailureReason,
  type FilterDescriptor,
  type ResearcherDocument,
  type YearFilter,
} from '../types';
import { buildResearcherDocument } from './document-pipeline';

export const RESEARCHERS_DIR = 'researchers';
export const SUMMARY_FILE = 'summary.json';
export const ERRORS_FILE = 'errors.json';

export interface BatchOptions {
  inputDir: string;
  outputDir: string;
  schemaPath: string;
  filter: YearFilter;
  /** Clock for extraction timestamps; fix it for reproducible output */
  now?: () => Date;
}

type DocumentOutcome =
  | { status: 'written'; document: ResearcherDocument; outputFile: string }
  | { status: 'failed'; failure: DocumentFailure };

class WriteError extends Error {
  readonly reason: FailureReason = 'write_error';

  constructor(message: string) {
    super(message);
    this.name = 'WriteError';
  }
}

/**
 * HTML files of the input directory, sorted by name. AppleDouble files
 * ("._name.html") are skipped.
 */
export function discoverDocuments(inputDir: string): string[] {
  if (!fs.existsSync(inputDir) || !fs.statSync(inputDir).isDirectory()) {
    throw new ConfigurationError(`Input directory not found: ${inputDir}`);
  }

  return fs
    .readdirSync(inputDir)
    .filter((name) => name.toLowerCase().endsWith('.html') && !name.startsWith('._'))
    .sort();
}

/**
 * Serialize a JSON artifact: two-space indentation and a trailing newline.
 */
export function serializeJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

/**
 * Output file name: "<id>__<slug>.json", or the slugified source stem when
 * the subject id is unknown or the name is already taken in this batch.
 */
export function outputFileName(document: ResearcherDocument, usedNames: Set<string>): string {
  const { id, slug } = document.subject;
  const preferred = `${id}__${slug}.json`;
  if (id !== UNKNOWN_SUBJECT_ID && !usedNames.has(preferred)) return preferred;

  const sourceFile = document.provenance.source_file;
  const stem = slugify(path.basename(sourceFile, path.extname(sourceFile))) || 'document';
  let candidate = `${stem}.json`;
  for (let suffix = 2; usedNames.has(candidate); suffix++) {
    candidate = `${stem}-${suffix}.json`;
  }
  return candidate;
}

function failureReason(error: unknown, stage: DocumentStage): FailureReason {
  if (error instanceof SegmentationError || error instanceof SchemaViolationError || error instanceof WriteError) {
    return error.reason;
  }
  return stage === 'validated' ? 'write_error' : 'parse_error';
}

function failureDetails(error: unknown): string[] {
  if (error instanceof SchemaViolationError) return error.violations.map(formatViolation);
  return [];
}

function processDocument(
  sourceFile: string,
  options: BatchOptions,
  context: { validate: DocumentValidator; filters: FilterDescriptor; clock: () => Date; usedNames: Set<string> }
): DocumentOutcome {
  let stage: DocumentStage = 'discovered';

  try {
    const html = decodeHtmlBytes(fs.readFileSync(path.join(options.inputDir, sourceFile)));
    const segmented = segmentDocument(html, sourceFile);
    stage = 'segmented';

    const { document, extracted, fallbacks } = buildResearcherDocument(segmented, {
      filter: options.filter,
      filters: context.filters,
      extractedAt: context.clock().toISOString(),
      validate: context.validate,
    });
    stage = 'validated';

    for (const record of extracted) {
      recordsExtractedCounter.inc({ category: record.category, extractor: record.extractor });
    }
    for (const category of fallbacks) {
      extractorFallbacksCounter.inc({ category });
    }
    filterDropsCounter.inc({ reason: 'excluded_by_filter' }, document.parse_metadata.excluded_by_filter);
    filterDropsCounter.inc({ reason: 'missing_year' }, document.parse_metadata.missing_year);

    const outputFile = outputFileName(document, context.usedNames);
    try {
      fs.writeFileSync(path.join(options.outputDir, RESEARCHERS_DIR, outputFile), serializeJson(document), 'utf-8');
    } catch (error) {
      throw new WriteError(error instanceof Error ? error.message : String(error));
    }
    context.usedNames.add(outputFile);

    logger.info('Document written', {
      subject_id: document.subject.id,
      output_file: outputFile,
      record_count: document.record_count,
      excluded_by_filter: document.parse_metadata.excluded_by_filter,
      missing_year: document.parse_metadata.missing_year,
    });

    return { status: 'written', document, outputFile };
  } catch (error) {
    if (error instanceof SchemaViolationError) stage = 'filtered';
    const failure: DocumentFailure = {
      source_file: sourceFile,
      stage,
      reason: failureReason(error, stage),
      message: error instanceof Error ? error.message : String(error),
      details: failureDetails(error),
    };
    logger.warn('Document failed', {
      stage: failure.stage,
      reason: failure.reason,
      message: failure.message,
      details: failure.details,
    });
    return { status: 'failed', failure };
  }
}

/**
 * Run the batch over every document of the input directory.
 *
 * @throws ConfigurationError when the schema or the input directory cannot be
 * used; nothing is written in that case
 */
export function runBatch(options: BatchOptions): BatchReport {
  const endBatchTimer = batchDurationHistogram.startTimer();
  const clock = options.now ?? (() => new Date());
  const validate = createDocumentValidator(options.schemaPath);
  const sourceFiles = discoverDocuments(options.inputDir);
  const filters = describeFilter(options.filter);

  fs.mkdirSync(path.join(options.outputDir, RESEARCHERS_DIR), { recursive: true });

  const summary: BatchSummary = {
    generated_at: clock().toISOString(),
    input_dir: path.basename(options.inputDir),
    filters,
    total_documents: sourceFiles.length,
    succeeded: 0,
    failed: 0,
    total_records: 0,
    excluded_by_filter: 0,
    missing_year: 0,
    per_category: emptyCategoryCounts(),
  };
  const documents: DocumentReportLine[] = [];
  const errors: DocumentFailure[] = [];
  const usedNames = new Set<string>();

  logger.info('Batch started', { document_count: sourceFiles.length, filters: filters.years });

  for (const sourceFile of sourceFiles) {
    const endDocumentTimer = documentDurationHistogram.startTimer();
    const outcome = runWithChildContext({ sourceFile }, () =>
      processDocument(sourceFile, options, { validate, filters, clock, usedNames })
    );
    endDocumentTimer({ status: outcome.status });

    if (outcome.status === 'written') {
      const { document } = outcome;
      summary.succeeded++;
      summary.total_records += document.record_count;
      summary.excluded_by_filter += document.parse_metadata.excluded_by_filter;
      summary.missing_year += document.parse_metadata.missing_year;
      for (const category of PRODUCTION_CATEGORIES) {
        summary.per_category[category] += document.parse_metadata.per_category[category];
      }
      documents.push({
        source_file: sourceFile,
        subject_id: document.subject.id,
        full_name: document.subject.full_name,
        status: 'written',
        record_count: document.record_count,
        output_file: `${RESEARCHERS_DIR}/${outcome.outputFile}`,
      });
      documentsProcessedCounter.inc({ status: 'written', reason: 'none' });
    } else {
      summary.failed++;
      errors.push(outcome.failure);
      documents.push({ source_file: sourceFile, status: 'failed', record_count: 0 });
      documentsProcessedCounter.inc({ status: 'failed', reason: outcome.failure.reason });
    }
  }

  const report: BatchReport = { summary, documents, errors };
  fs.writeFileSync(path.join(options.outputDir, SUMMARY_FILE), serializeJson({ summary, documents }), 'utf-8');
  fs.writeFileSync(path.join(options.outputDir, ERRORS_FILE), serializeJson(errors), 'utf-8');

  endBatchTimer();
  logger.info('Batch complete', {
    total_documents: summary.total_documents,
    succeeded: summary.succeeded,
    failed: summary.failed,
    total_records: summary.total_records,
  });

  return report;
}
