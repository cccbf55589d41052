/**
 * Year filter
 *
 * Records without a year field fall back to the rightmost year in their raw
 * text. Records with no year at all are counted apart from records outside
 * the allowed years; both are expected outcomes, not errors.
 */

import { rightmostYear } from '../extractors/citation';
import type { ExtractedRecord, YearFilter } from '../types';

export type FilterOutcome = 'kept' | 'excluded_by_filter' | 'missing_year';

export interface FilterResult {
  kept: ExtractedRecord[];
  excludedByFilter: number;
  missingYear: number;
}

/**
 * Year used for filtering. The fallback year is not written into the record.
 */
export function effectiveYear(record: Pick<ExtractedRecord, 'year' | 'raw_text'>): number | undefined {
  return record.year ?? rightmostYear(record.raw_text);
}

export function classifyYear(year: number | undefined, filter: YearFilter): FilterOutcome {
  if (filter.kind === 'all') return 'kept';
  if (year === undefined) return 'missing_year';
  return filter.years.includes(year) ? 'kept' : 'excluded_by_filter';
}

/**
 * Apply the filter, keeping the source order of the surviving records.
 * With the "all" filter every record is kept, including those without a year.
 */
export function applyYearFilter(records: readonly ExtractedRecord[], filter: YearFilter): FilterResult {
  const result: FilterResult = { kept: [], excludedByFilter: 0, missingYear: 0 };

  for (const record of records) {
    switch (classifyYear(effectiveYear(record), filter)) {
      case 'kept':
        result.kept.push(record);
        break;
      case 'excluded_by_filter':
        result.excludedByFilter++;
        break;
      case 'missing_year':
        result.missingYear++;
        break;
    }
  }

  return result;
}
