/**
 * Supervision Extractor
 *
 * Item shape: STUDENT. TITLE. [Início: ]YEAR. TYPE (LEVEL) - INSTITUTION. [STATUS]
 *
 * Supervision records carry no " . " sentinel. The head before the year is
 * split into student and title only when it holds exactly one ". "
 * separator; otherwise both stay absent.
 *
 * Status is never defaulted: without a marker in the text or the section
 * heading it is the explicit value 'unknown'.
 */

import { normalizeLabel } from '../../text/normalize';
import type { ItemBlock, ProductionCategory, SupervisionStatus } from '../../types';
import { BaseExtractor } from '../base-extractor';
import { cleanValue } from '../citation';
import { rightmostYearStep } from '../steps';
import type { CitationParts, ExtractionStep } from '../types';

const TAIL_START = /\.\s+((?:In[íi]cio\s*:\s*)?(?:19|20)\d{2}\.\s)/i;
const TAIL_YEAR = /^(?:In[íi]cio\s*:\s*)?((?:19|20)\d{2})\b/i;
const WORK_TYPE_PATTERN = /^(?:In[íi]cio\s*:\s*)?(?:19|20)\d{2}\.\s+([^.()]+?)\s*\(([^)]+)\)/i;
const INSTITUTION_PATTERN = /\)\s*-\s*([^.,]+)/;
const LEVEL_QUALIFIER = /\s+(?:em|na|no|de)\s+.*$/i;

const COMPLETED_MARKER = /\bConclu[íi]d[ao]s?\b/i;
const IN_PROGRESS_MARKER = /\bEm andamento\b|\bIn[íi]cio\s*:/i;

/**
 * Status from explicit markers in the info tail first, then from the section
 * group or title ("... concluídas", "... em andamento"). The tail starts at
 * the year, so words in the work title never count as markers.
 */
export function detectSupervisionStatus(tail: string, sectionTitle: string, group?: string): SupervisionStatus {
  if (IN_PROGRESS_MARKER.test(tail)) return 'in_progress';
  if (COMPLETED_MARKER.test(tail)) return 'completed';

  const heading = normalizeLabel(`${group ?? ''} ${sectionTitle}`);
  if (/conclu/.test(heading)) return 'completed';
  if (/em andamento/.test(heading)) return 'in_progress';
  return 'unknown';
}

const studentStep: ExtractionStep = {
  name: 'student',
  description: 'Supervised student from a two-segment head',
  precondition: (parts) => parts.authorsText !== undefined,
  run: (parts) => {
    const student = cleanValue(parts.authorsText);
    return student ? { student } : null;
  },
};

const titleStep: ExtractionStep = {
  name: 'title',
  description: 'Work title from a two-segment head',
  precondition: (parts) => parts.title !== undefined,
  run: (parts) => (parts.title ? { title: parts.title } : null),
};

const tailYearStep: ExtractionStep = {
  name: 'tail-year',
  description: 'Year opening the tail (defense or start year)',
  run: (parts) => {
    const match = parts.tail.match(TAIL_YEAR);
    return match ? { year: parseInt(match[1], 10) } : null;
  },
};

const workTypeStep: ExtractionStep = {
  name: 'work-type',
  description: 'Work type and degree level from "TYPE (LEVEL)"',
  run: (parts) => {
    const match = parts.tail.match(WORK_TYPE_PATTERN);
    if (!match) return null;
    const workType = cleanValue(match[1]);
    const degreeLevel = cleanValue(match[2].replace(LEVEL_QUALIFIER, ''));
    if (!workType) return null;
    return degreeLevel ? { work_type: workType, degree_level: degreeLevel } : { work_type: workType };
  },
};

const institutionStep: ExtractionStep = {
  name: 'institution',
  description: 'Institution after "(LEVEL) -"',
  run: (parts) => {
    const institution = cleanValue(parts.tail.match(INSTITUTION_PATTERN)?.[1]);
    return institution ? { institution } : null;
  },
};

const statusStep: ExtractionStep = {
  name: 'status',
  description: 'Completed, in progress or explicitly unknown',
  run: (parts, item) => ({
    status: detectSupervisionStatus(parts.tail, item.section.title, item.section.group),
  }),
};

export class SupervisionExtractor extends BaseExtractor {
  readonly category: ProductionCategory = 'supervision';
  readonly name = 'supervision';
  readonly description = 'Completed and ongoing supervisions';

  protected readonly steps: readonly ExtractionStep[] = [
    studentStep,
    titleStep,
    tailYearStep,
    rightmostYearStep,
    workTypeStep,
    institutionStep,
    statusStep,
  ];

  protected citationWarnings(parts: CitationParts): string[] {
    return parts.authorsText === undefined ? ['student and title not separated'] : [];
  }

  protected splitCitation(item: ItemBlock): CitationParts {
    const text = item.rawText;
    const match = TAIL_START.exec(text);
    if (!match) return { tail: text };

    const head = text.slice(0, match.index);
    const tail = text.slice(match.index + match[0].length - match[1].length).trim();
    const segments = head.split('. ');
    if (segments.length !== 2) return { tail };

    const student = cleanValue(segments[0]);
    const title = cleanValue(segments[1]);
    if (!student || !title) return { tail };
    return { authorsText: student, title, tail };
  }
}

export const supervisionExtractor = new SupervisionExtractor();
