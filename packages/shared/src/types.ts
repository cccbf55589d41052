/**
 * Shared TypeScript Types
 *
 * Types for the curriculum extraction pipeline, matching the JSON schema in
 * docs/contracts/researcher_output.schema.json
 */

// ============================================================================
// Production Categories
// ============================================================================

export const PRODUCTION_CATEGORIES = [
  'journal_article',
  'book_chapter',
  'book',
  'event_paper',
  'press_text',
  'supervision',
  'other',
] as const;

export type ProductionCategory = (typeof PRODUCTION_CATEGORIES)[number];

export const SCHEMA_VERSION = '2.0.0';

// ============================================================================
// Record Fields
// ============================================================================

export type SupervisionStatus = 'completed' | 'in_progress' | 'unknown';

export type ProceedingsType = 'full_paper' | 'expanded_abstract' | 'abstract';

/**
 * Typed fields an extractor may recover. Every field is optional: a field
 * that cannot be recovered with confidence is left out entirely.
 */
export interface RecordFields {
  authors?: readonly string[];
  title?: string;
  venue?: string;
  volume?: string;
  issue?: string;
  pages?: string;
  year?: number;
  month?: string;
  doi?: string;
  isbn?: string;
  issn?: string;
  book_title?: string;
  editors?: readonly string[];
  publisher?: string;
  edition?: string;
  page_count?: number;
  event_name?: string;
  location?: string;
  proceedings_type?: ProceedingsType;
  work_type?: string;
  degree_level?: string;
  institution?: string;
  student?: string;
  status?: SupervisionStatus;
}

/** Serialization order of the optional fields in output records. */
export const RECORD_FIELD_ORDER = [
  'authors',
  'title',
  'venue',
  'volume',
  'issue',
  'pages',
  'year',
  'month',
  'doi',
  'isbn',
  'issn',
  'book_title',
  'editors',
  'publisher',
  'edition',
  'page_count',
  'event_name',
  'location',
  'proceedings_type',
  'work_type',
  'degree_level',
  'institution',
  'student',
  'status',
] as const satisfies ReadonlyArray<keyof RecordFields>;

// ============================================================================
// Segmentation
// ============================================================================

/**
 * Hints isolated from the markup around an item, independent of its text.
 */
export interface StructuralHints {
  /** Target of the item's DOI link icon */
  doiHref?: string;
  /** Year published in the page's sort attribute */
  sortYear?: number;
}

export interface SectionInfo {
  title: string;
  /** Heading grouping several sections (e.g. "Orientações e supervisões concluídas") */
  group?: string;
  category: ProductionCategory;
}

/**
 * One item cut out of a section, before any field extraction.
 */
export interface ItemBlock {
  /** 1-based position within the section, in source order */
  position: number;
  rawText: string;
  hints: StructuralHints;
  section: SectionInfo;
}

export interface SegmentedSection extends SectionInfo {
  /** Number of numbered item cells found in the source markup */
  declaredItemCount: number;
  items: ItemBlock[];
}

export interface SubjectInfo {
  id: string;
  full_name: string;
  slug: string;
  last_update?: string;
}

export interface SegmentedDocument {
  sourceFile: string;
  subject: SubjectInfo;
  sections: SegmentedSection[];
  warnings: string[];
}

// ============================================================================
// Output Document
// ============================================================================

export type YearFilter = { kind: 'all' } | { kind: 'years'; years: number[] };

export interface FilterDescriptor {
  years: number[] | 'all';
}

export interface RecordProvenance {
  source_file: string;
  subject_id: string;
  section: string;
  category: ProductionCategory;
  extracted_at: string;
  filters: FilterDescriptor;
}

/**
 * A production record as it is created by extraction, before filtering.
 */
export interface ExtractedRecord extends RecordFields {
  source_position: number;
  category: ProductionCategory;
  raw_text: string;
  fingerprint: string;
  extractor: string;
}

export interface ProductionRecord extends ExtractedRecord {
  ordinal: number;
  provenance: RecordProvenance;
}

export interface OutputSection {
  title: string;
  group?: string;
  category: ProductionCategory;
  declared_item_count: number;
  item_count: number;
  records: ProductionRecord[];
}

export type CategoryCounts = Record<ProductionCategory, number>;

export interface ParseMetadata {
  item_count: number;
  error_count: number;
  fallback_count: number;
  excluded_by_filter: number;
  missing_year: number;
  per_category: CategoryCounts;
  warnings: string[];
}

export interface ResearcherDocument {
  schema_version: string;
  subject: SubjectInfo;
  provenance: {
    source_file: string;
    extracted_at: string;
    filters: FilterDescriptor;
  };
  record_count: number;
  sections: OutputSection[];
  parse_metadata: ParseMetadata;
}

// ============================================================================
// Batch Processing
// ============================================================================

export type DocumentStage =
  | 'discovered'
  | 'segmented'
  | 'extracted'
  | 'filtered'
  | 'validated'
  | 'written'
  | 'failed';

export type FailureReason = 'parse_error' | 'schema_error' | 'write_error';

export interface DocumentFailure {
  source_file: string;
  /** Last stage the document reached before failing */
  stage: DocumentStage;
  reason: FailureReason;
  message: string;
  details: string[];
}

export interface DocumentReportLine {
  source_file: string;
  subject_id?: string;
  full_name?: string;
  status: 'written' | 'failed';
  record_count: number;
  output_file?: string;
}

export interface BatchSummary {
  generated_at: string;
  input_dir: string;
  filters: FilterDescriptor;
  total_documents: number;
  succeeded: number;
  failed: number;
  total_records: number;
  excluded_by_filter: number;
  missing_year: number;
  per_category: CategoryCounts;
}

export interface BatchReport {
  summary: BatchSummary;
  documents: DocumentReportLine[];
  errors: DocumentFailure[];
}

export function emptyCategoryCounts(): CategoryCounts {
  return {
    journal_article: 0,
    book_chapter: 0,
    book: 0,
    event_paper: 0,
    press_text: 0,
    supervision: 0,
    other: 0,
  };
}

function assignField<K extends keyof RecordFields>(
  target: RecordFields,
  source: RecordFields,
  key: K
): void {
  const value = source[key];
  if (value !== undefined) target[key] = value;
}

/**
 * Copy of the defined fields, in serialization order.
 */
export function orderRecordFields(fields: RecordFields): RecordFields {
  const ordered: RecordFields = {};
  for (const key of RECORD_FIELD_ORDER) assignField(ordered, fields, key);
  return ordered;
}
