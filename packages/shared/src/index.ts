/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithChildContext,
  runWithContextAsync,
  asyncLocalStorage,
  type BatchContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export {
  loadConfig,
  parseAllowedYears,
  describeFilter,
  DEFAULT_ALLOWED_YEARS,
  DEFAULT_SCHEMA_PATH,
  type Config,
} from './config';

// Errors
export {
  ConfigurationError,
  SegmentationError,
  SchemaViolationError,
  formatViolation,
  type SchemaViolation,
} from './errors';

// Types
export * from './types';

// Text normalization and fingerprinting
export {
  normalizeText,
  normalizeLabel,
  repairMojibake,
  decodeBytes,
  decodeHtmlBytes,
  slugify,
  fingerprint,
  FINGERPRINT_PATTERN,
} from './text';

// Metrics
export {
  register,
  documentsProcessedCounter,
  documentDurationHistogram,
  recordsExtractedCounter,
  filterDropsCounter,
  extractorFallbacksCounter,
  batchDurationHistogram,
  getMetrics,
} from './metrics';

// Schemas
export {
  createAjv,
  createDocumentValidator,
  loadSchema,
  type DocumentValidator,
  type ValidationResult,
} from './schemas';

// Section segmentation
export {
  segmentDocument,
  extractSectionItems,
  extractSubject,
  extractSubjectId,
  extractLastUpdate,
  collectProfileSections,
  isNonProductionSection,
} from './segmenter';
export { UNKNOWN_SUBJECT_ID, UNKNOWN_SUBJECT_NAME } from './segmenter/profile';

// Record extractors (registers the built-in extractors on load)
export * from './extractors';

// Batch processing
export {
  effectiveYear,
  classifyYear,
  applyYearFilter,
  type FilterOutcome,
  type FilterResult,
} from './batch/year-filter';
export {
  buildRecord,
  extractItem,
  buildResearcherDocument,
  type PipelineOptions,
  type ItemExtraction,
  type DocumentBuild,
} from './batch/document-pipeline';
export {
  runBatch,
  discoverDocuments,
  outputFileName,
  serializeJson,
  RESEARCHERS_DIR,
  SUMMARY_FILE,
  ERRORS_FILE,
  type BatchOptions,
} from './batch/orchestrator';

// Review reconciliation
export {
  parseReviewFile,
  reconcileReviewDecisions,
  type ReviewDecision,
  type ReviewFile,
  type ReconciledRecord,
  type ReconciliationStats,
  type ReconciliationResult,
} from './review/reconcile';
