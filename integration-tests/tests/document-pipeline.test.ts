/**
 * Document pipeline tests: extraction, filtering, renumbering and validation
 * of a single document.
 */

import {
  buildResearcherDocument,
  createDocumentValidator,
  describeFilter,
  fingerprint,
  SchemaViolationError,
  segmentDocument,
  type PipelineOptions,
  type YearFilter,
} from '@curriculo/shared';
import { ARTICLE_TEXT, CHAPTER_TEXT, FIXED_TIME, MALFORMED_TEXT, SCHEMA_PATH, itemCells, sampleProfilePage } from './helpers';

const SOURCE_FILE = '1234567890123456__ana-lucia-ferreira.html';

function options(filter: YearFilter): PipelineOptions {
  return {
    filter,
    filters: describeFilter(filter),
    extractedAt: FIXED_TIME,
    validate: createDocumentValidator(SCHEMA_PATH),
  };
}

describe('Document Pipeline', () => {
  const segmented = segmentDocument(sampleProfilePage(), SOURCE_FILE);

  it('should build a valid document with provenance on every record', () => {
    const { document, extracted, fallbacks } = buildResearcherDocument(
      segmented,
      options({ kind: 'years', years: [2024, 2025] })
    );

    expect(extracted).toHaveLength(3);
    expect(fallbacks).toEqual([]);
    expect(document.schema_version).toBe('2.0.0');
    expect(document.record_count).toBe(3);
    expect(document.provenance).toEqual({
      source_file: SOURCE_FILE,
      extracted_at: FIXED_TIME,
      filters: { years: [2024, 2025] },
    });

    const [first, second] = document.sections[0].records;
    expect(first).toEqual({
      ordinal: 1,
      source_position: 1,
      category: 'journal_article',
      raw_text: ARTICLE_TEXT,
      fingerprint: fingerprint(ARTICLE_TEXT),
      extractor: 'journal-article',
      authors: ['FERREIRA, A. L.', 'SOUZA, C.'],
      title: 'Leitura e escrita na escola',
      venue: 'Revista Brasileira de Testes',
      volume: '12',
      issue: '3',
      pages: '45-67',
      year: 2024,
      doi: '10.1234/rbt.2024.001',
      provenance: {
        source_file: SOURCE_FILE,
        subject_id: '1234567890123456',
        section: 'Artigos completos publicados em periódicos',
        category: 'journal_article',
        extracted_at: FIXED_TIME,
        filters: { years: [2024, 2025] },
      },
    });
    expect(Object.keys(first)).toEqual([
      'ordinal',
      'source_position',
      'category',
      'raw_text',
      'fingerprint',
      'extractor',
      'authors',
      'title',
      'venue',
      'volume',
      'issue',
      'pages',
      'year',
      'doi',
      'provenance',
    ]);
    expect(second.raw_text).toBe(MALFORMED_TEXT);
    expect(second.year).toBe(2025);
    expect(second.title).toBeUndefined();
  });

  it('should retain empty sections and count records per category', () => {
    const { document } = buildResearcherDocument(segmented, options({ kind: 'years', years: [2024, 2025] }));

    expect(document.sections[2]).toEqual({
      title: 'Textos em jornais de notícias/revistas',
      group: 'Produção bibliográfica',
      category: 'press_text',
      declared_item_count: 0,
      item_count: 0,
      records: [],
    });
    expect(document.sections[1].records[0].raw_text).toBe(CHAPTER_TEXT);
    expect(document.parse_metadata).toEqual({
      item_count: 3,
      error_count: 0,
      fallback_count: 0,
      excluded_by_filter: 0,
      missing_year: 0,
      per_category: {
        journal_article: 2,
        book_chapter: 1,
        book: 0,
        event_paper: 0,
        press_text: 0,
        supervision: 0,
        other: 0,
      },
      warnings: ['Artigos completos publicados em periódicos #2: author sentinel missing'],
    });
  });

  it('should serialize section keys with the group after the title', () => {
    const { document } = buildResearcherDocument(segmented, options({ kind: 'all' }));

    expect(Object.keys(document.sections[0])).toEqual([
      'title',
      'group',
      'category',
      'declared_item_count',
      'item_count',
      'records',
    ]);
  });

  it('should renumber ordinals after filtering and keep source positions', () => {
    const { document } = buildResearcherDocument(segmented, options({ kind: 'years', years: [2025] }));

    expect(document.record_count).toBe(1);
    expect(document.sections[0].records.map((r) => [r.ordinal, r.source_position])).toEqual([[1, 2]]);
    expect(document.sections[0].declared_item_count).toBe(2);
    expect(document.sections[0].item_count).toBe(1);
    expect(document.sections[1].records).toEqual([]);
    expect(document.parse_metadata.item_count).toBe(3);
    expect(document.parse_metadata.excluded_by_filter).toBe(2);
  });

  it('should count undated records apart and warn about duplicates', () => {
    const press = segmentDocument(
      itemCells([
        { text: 'SILVA, B. . Nota sem data. Diário.' },
        { text: 'SILVA, B. . Nota breve. Diário, 2024.' },
        { text: 'SILVA, B. . Nota breve. Diário, 2024.' },
      ]),
      'Textos_em_jornais.html'
    );

    const filtered = buildResearcherDocument(press, options({ kind: 'years', years: [2024, 2025] })).document;
    expect(filtered.record_count).toBe(2);
    expect(filtered.parse_metadata.missing_year).toBe(1);
    expect(filtered.parse_metadata.warnings).toEqual(['Textos em jornais #3: duplicate of Textos em jornais #2']);
    expect(filtered.sections[0].records.map((r) => [r.ordinal, r.source_position])).toEqual([
      [1, 2],
      [2, 3],
    ]);
    expect(filtered.sections[0].records[0].fingerprint).toBe(filtered.sections[0].records[1].fingerprint);

    const all = buildResearcherDocument(press, options({ kind: 'all' })).document;
    expect(all.record_count).toBe(3);
    expect(all.parse_metadata.missing_year).toBe(0);
    expect(all.provenance.filters).toEqual({ years: 'all' });
  });

  it('should reject documents the validator refuses', () => {
    const violation = { path: '/record_count', field: 'record_count', constraint: 'minimum', message: 'must be >= 0' };
    const refuse: PipelineOptions = {
      ...options({ kind: 'all' }),
      validate: () => ({ valid: false, violations: [violation] }),
    };

    expect(() => buildResearcherDocument(segmented, refuse)).toThrow(SchemaViolationError);
    expect(() => buildResearcherDocument(segmented, refuse)).toThrow('Schema validation failed (1 violation)');
  });
});
