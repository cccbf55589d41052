/**
 * Review reconciliation
 *
 * Merges human review decisions, exported by the external review tool, back
 * onto a researcher document. Decisions attach to records by fingerprint
 * only: ordinals and positions shift between extractions, fingerprints do
 * not.
 */

import type { ValidateFunction } from 'ajv';
import { createAjv } from '../schemas';
import { SchemaViolationError, type SchemaViolation } from '../errors';
import type { ProductionRecord, ResearcherDocument } from '../types';

export interface ReviewDecision {
  fingerprint: string;
  /** true: the record belongs to the reviewed set; false: it does not; null: undecided */
  selected?: boolean | null;
  note?: string;
  /** Field corrections proposed by the reviewer, passed through untouched */
  edits?: Record<string, unknown>;
}

export interface ReviewFile {
  items: ReviewDecision[];
}

export interface ReconciledRecord {
  record: ProductionRecord;
  decision: ReviewDecision;
}

export interface ReconciliationStats {
  total_records: number;
  matched: number;
  selected: number;
  rejected: number;
  undecided: number;
  unmatched_decisions: number;
}

export interface ReconciliationResult {
  matched: ReconciledRecord[];
  /** Decisions whose fingerprint no longer exists in the document */
  unmatchedDecisions: ReviewDecision[];
  /** Records without any decision */
  unreviewed: ProductionRecord[];
  stats: ReconciliationStats;
}

const REVIEW_FILE_SCHEMA = {
  type: 'object',
  required: ['items'],
  properties: {
    items: {
      type: 'array',
      items: {
        type: 'object',
        required: ['fingerprint'],
        additionalProperties: false,
        properties: {
          fingerprint: { type: 'string', pattern: '^[0-9a-f]{40}$' },
          selected: { type: ['boolean', 'null'] },
          note: { type: 'string' },
          edits: { type: 'object' },
        },
      },
    },
  },
};

let reviewFileValidator: ValidateFunction<ReviewFile> | null = null;

function getReviewFileValidator(): ValidateFunction<ReviewFile> {
  if (!reviewFileValidator) {
    reviewFileValidator = createAjv().compile<ReviewFile>(REVIEW_FILE_SCHEMA);
  }
  return reviewFileValidator;
}

/**
 * Check an exported review file and return its decisions.
 *
 * @throws SchemaViolationError when the file does not have the expected shape
 */
export function parseReviewFile(data: unknown): ReviewDecision[] {
  const validate = getReviewFileValidator();
  if (validate(data)) return data.items;

  const violations: SchemaViolation[] = (validate.errors ?? []).map((error) => ({
    path: error.instancePath || '/',
    field: error.instancePath.split('/').filter(Boolean).pop() ?? '(file)',
    constraint: error.keyword,
    message: error.message ?? 'is invalid',
  }));
  throw new SchemaViolationError(violations);
}

/**
 * Attach decisions to the document's records by fingerprint. When a file
 * holds several decisions for one fingerprint, the last one wins.
 */
export function reconcileReviewDecisions(
  document: ResearcherDocument,
  decisions: readonly ReviewDecision[]
): ReconciliationResult {
  const byFingerprint = new Map<string, ReviewDecision>();
  for (const decision of decisions) {
    byFingerprint.set(decision.fingerprint, decision);
  }

  const matched: ReconciledRecord[] = [];
  const unreviewed: ProductionRecord[] = [];
  const matchedFingerprints = new Set<string>();

  for (const section of document.sections) {
    for (const record of section.records) {
      const decision = byFingerprint.get(record.fingerprint);
      if (decision) {
        matched.push({ record, decision });
        matchedFingerprints.add(record.fingerprint);
      } else {
        unreviewed.push(record);
      }
    }
  }

  const unmatchedDecisions = Array.from(byFingerprint.values()).filter(
    (decision) => !matchedFingerprints.has(decision.fingerprint)
  );

  return {
    matched,
    unmatchedDecisions,
    unreviewed,
    stats: {
      total_records: matched.length + unreviewed.length,
      matched: matched.length,
      selected: matched.filter(({ decision }) => decision.selected === true).length,
      rejected: matched.filter(({ decision }) => decision.selected === false).length,
      undecided: matched.filter(({ decision }) => decision.selected === undefined || decision.selected === null)
        .length,
      unmatched_decisions: unmatchedDecisions.length,
    },
  };
}
