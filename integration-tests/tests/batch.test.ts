/**
 * Batch orchestration tests
 *
 * Runs whole batches over temporary input directories and checks the
 * written artifacts.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  ConfigurationError,
  runBatch,
  serializeJson,
  type BatchSummary,
  type DocumentFailure,
  type DocumentReportLine,
  type ResearcherDocument,
} from '@curriculo/shared';
import { FIXED_TIME, SCHEMA_PATH, fixedClock, itemCells, makeTempDir, removeDir, sampleProfilePage } from './helpers';

const PROFILE_FILE = '1234567890123456__ana-lucia-ferreira.html';
const PRESS_FILE = 'Textos_em_jornais.html';
const BROKEN_FILE = 'broken.html';
const PRESS_TEXT = 'SILVA, B. . Nota breve sobre leitura. Diário, Recife, p. 4, 12 mar. 2024.';

interface SummaryFile {
  summary: BatchSummary;
  documents: DocumentReportLine[];
}

function readSummary(outputDir: string): SummaryFile {
  return JSON.parse(fs.readFileSync(path.join(outputDir, 'summary.json'), 'utf-8'));
}

function readErrors(outputDir: string): DocumentFailure[] {
  return JSON.parse(fs.readFileSync(path.join(outputDir, 'errors.json'), 'utf-8'));
}

function readDocument(outputDir: string, name: string): ResearcherDocument {
  return JSON.parse(fs.readFileSync(path.join(outputDir, 'researchers', name), 'utf-8'));
}

function listOutputs(outputDir: string): string[] {
  const documents = fs.readdirSync(path.join(outputDir, 'researchers')).sort();
  return ['summary.json', 'errors.json', ...documents.map((name) => `researchers/${name}`)];
}

describe('Batch Orchestrator', () => {
  let inputDir: string;
  let outputDir: string;
  let scratchDir: string;

  beforeEach(() => {
    inputDir = makeTempDir('input');
    outputDir = makeTempDir('output');
    scratchDir = makeTempDir('scratch');
  });

  afterEach(() => {
    removeDir(inputDir);
    removeDir(outputDir);
    removeDir(scratchDir);
  });

  function writeInput(name: string, content: string): void {
    fs.writeFileSync(path.join(inputDir, name), content, 'utf-8');
  }

  function writeStandardInputs(): void {
    writeInput(PROFILE_FILE, sampleProfilePage());
    writeInput(PRESS_FILE, itemCells([{ text: PRESS_TEXT }]));
    writeInput(BROKEN_FILE, '<html><body><p>Nada</p></body></html>');
    writeInput('._' + PROFILE_FILE, 'resource fork');
    writeInput('notes.txt', 'not a document');
  }

  it('should write one document per profile and isolate failures', () => {
    writeStandardInputs();

    const report = runBatch({
      inputDir,
      outputDir,
      schemaPath: SCHEMA_PATH,
      filter: { kind: 'years', years: [2024, 2025] },
      now: fixedClock,
    });

    expect(report.summary).toEqual({
      generated_at: FIXED_TIME,
      input_dir: path.basename(inputDir),
      filters: { years: [2024, 2025] },
      total_documents: 3,
      succeeded: 2,
      failed: 1,
      total_records: 4,
      excluded_by_filter: 0,
      missing_year: 0,
      per_category: {
        journal_article: 2,
        book_chapter: 1,
        book: 0,
        event_paper: 0,
        press_text: 1,
        supervision: 0,
        other: 0,
      },
    });
    expect(readSummary(outputDir)).toEqual({ summary: report.summary, documents: report.documents });
    expect(report.documents).toEqual([
      {
        source_file: PROFILE_FILE,
        subject_id: '1234567890123456',
        full_name: 'Ana Lúcia Ferreira',
        status: 'written',
        record_count: 3,
        output_file: 'researchers/1234567890123456__ana-lucia-ferreira.json',
      },
      {
        source_file: PRESS_FILE,
        subject_id: 'unknown',
        full_name: 'Unknown Researcher',
        status: 'written',
        record_count: 1,
        output_file: 'researchers/textos-em-jornais.json',
      },
      { source_file: BROKEN_FILE, status: 'failed', record_count: 0 },
    ]);
    expect(readErrors(outputDir)).toEqual([
      {
        source_file: BROKEN_FILE,
        stage: 'discovered',
        reason: 'parse_error',
        message: 'No profile sections or item cells found',
        details: [],
      },
    ]);

    const press = readDocument(outputDir, 'textos-em-jornais.json');
    expect(press.sections[0].title).toBe('Textos em jornais');
    expect(press.sections[0].records[0]).toMatchObject({
      ordinal: 1,
      category: 'press_text',
      extractor: 'press-text',
      venue: 'Diário',
      location: 'Recife',
      pages: '4',
      year: 2024,
      month: 'mar',
    });
  });

  it('should serialize documents with two-space indentation and a trailing newline', () => {
    writeStandardInputs();
    runBatch({ inputDir, outputDir, schemaPath: SCHEMA_PATH, filter: { kind: 'all' }, now: fixedClock });

    const file = path.join(outputDir, 'researchers', '1234567890123456__ana-lucia-ferreira.json');
    const content = fs.readFileSync(file, 'utf-8');
    expect(content).toBe(serializeJson(JSON.parse(content)));
    expect(content.startsWith('{\n  "schema_version": "2.0.0",\n  "subject": {\n')).toBe(true);
  });

  it('should produce identical artifacts for identical runs', () => {
    writeStandardInputs();
    const secondOutput = path.join(scratchDir, 'second');
    const options = {
      inputDir,
      schemaPath: SCHEMA_PATH,
      filter: { kind: 'years' as const, years: [2024, 2025] },
      now: fixedClock,
    };

    runBatch({ ...options, outputDir });
    runBatch({ ...options, outputDir: secondOutput });

    const first = listOutputs(outputDir);
    expect(listOutputs(secondOutput)).toEqual(first);
    for (const name of first) {
      expect(fs.readFileSync(path.join(secondOutput, name), 'utf-8')).toBe(
        fs.readFileSync(path.join(outputDir, name), 'utf-8')
      );
    }
  });

  it('should record schema violations and keep going', () => {
    writeInput(PROFILE_FILE, sampleProfilePage());
    writeInput(PRESS_FILE, itemCells([{ text: PRESS_TEXT }]));

    const schema = JSON.parse(fs.readFileSync(SCHEMA_PATH, 'utf-8'));
    schema.$defs.record.properties.venue = { type: 'string', maxLength: 10 };
    const strictSchemaPath = path.join(scratchDir, 'strict.schema.json');
    fs.writeFileSync(strictSchemaPath, JSON.stringify(schema), 'utf-8');

    const report = runBatch({
      inputDir,
      outputDir,
      schemaPath: strictSchemaPath,
      filter: { kind: 'years', years: [2024, 2025] },
      now: fixedClock,
    });

    expect(report.summary.succeeded).toBe(1);
    expect(report.summary.failed).toBe(1);
    expect(report.summary.total_records).toBe(1);
    expect(readErrors(outputDir)).toEqual([
      {
        source_file: PROFILE_FILE,
        stage: 'filtered',
        reason: 'schema_error',
        message: 'Schema validation failed (1 violation)',
        details: ['/sections/0/records/0/venue: venue must NOT have more than 10 characters [maxLength]'],
      },
    ]);
    expect(fs.readdirSync(path.join(outputDir, 'researchers'))).toEqual(['textos-em-jornais.json']);
  });

  it('should write the summary and error report when every document fails', () => {
    writeInput(BROKEN_FILE, '');

    const report = runBatch({ inputDir, outputDir, schemaPath: SCHEMA_PATH, filter: { kind: 'all' }, now: fixedClock });

    expect(report.summary.succeeded).toBe(0);
    expect(report.summary.failed).toBe(1);
    expect(readSummary(outputDir).summary.total_records).toBe(0);
    expect(readErrors(outputDir)).toEqual([
      {
        source_file: BROKEN_FILE,
        stage: 'discovered',
        reason: 'parse_error',
        message: 'Document is empty',
        details: [],
      },
    ]);
    expect(fs.readdirSync(path.join(outputDir, 'researchers'))).toEqual([]);
  });

  it('should stop before processing when the schema is missing', () => {
    writeStandardInputs();

    expect(() =>
      runBatch({
        inputDir,
        outputDir,
        schemaPath: path.join(scratchDir, 'missing.schema.json'),
        filter: { kind: 'all' },
        now: fixedClock,
      })
    ).toThrow(ConfigurationError);
    expect(fs.existsSync(path.join(outputDir, 'summary.json'))).toBe(false);
  });

  it('should reject a missing input directory', () => {
    expect(() =>
      runBatch({
        inputDir: path.join(scratchDir, 'absent'),
        outputDir,
        schemaPath: SCHEMA_PATH,
        filter: { kind: 'all' },
      })
    ).toThrow(ConfigurationError);
  });
});
