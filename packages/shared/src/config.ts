/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

import path from 'path';
import { ConfigurationError } from './errors';
import type { YearFilter, FilterDescriptor } from './types';

export const DEFAULT_ALLOWED_YEARS = [2024, 2025];

export const DEFAULT_SCHEMA_PATH = path.resolve(
  __dirname,
  '../../../docs/contracts/researcher_output.schema.json'
);

export interface Config {
  // Batch input/output
  inputDir: string;
  outputDir: string;

  // Canonical schema
  schemaPath: string;

  // Year filter ("2024,2025", "2020-2024" or "all")
  allowedYears: YearFilter;

  // Fixed ISO timestamp for reproducible runs (defaults to the wall clock)
  batchTimestamp?: string;

  // Prometheus text exposition written after the batch
  metricsFile?: string;
}

/**
 * Parse the year filter setting.
 * Accepts a comma-separated list of years and/or inclusive ranges, or "all".
 */
export function parseAllowedYears(value: string | undefined): YearFilter {
  if (value === undefined || value.trim() === '') {
    return { kind: 'years', years: [...DEFAULT_ALLOWED_YEARS] };
  }
  if (value.trim().toLowerCase() === 'all') {
    return { kind: 'all' };
  }

  const years = new Set<number>();
  for (const part of value.split(',')) {
    const token = part.trim();
    if (!token) continue;

    const range = token.match(/^(\d{4})\s*-\s*(\d{4})$/);
    if (range) {
      const start = parseInt(range[1], 10);
      const end = parseInt(range[2], 10);
      if (end < start) {
        throw new ConfigurationError(`Invalid year range: ${token}`);
      }
      for (let year = start; year <= end; year++) years.add(year);
      continue;
    }

    if (!/^\d{4}$/.test(token)) {
      throw new ConfigurationError(`Invalid year filter entry: ${token}`);
    }
    years.add(parseInt(token, 10));
  }

  if (years.size === 0) {
    throw new ConfigurationError('Year filter must list at least one year, or "all"');
  }

  return { kind: 'years', years: [...years].sort((a, b) => a - b) };
}

export function describeFilter(filter: YearFilter): FilterDescriptor {
  return { years: filter.kind === 'all' ? 'all' : [...filter.years] };
}

/**
 * Build the configuration from environment variables.
 *
 * @throws ConfigurationError on malformed values
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const batchTimestamp = env.BATCH_TIMESTAMP || undefined;
  if (batchTimestamp && Number.isNaN(Date.parse(batchTimestamp))) {
    throw new ConfigurationError(`Invalid BATCH_TIMESTAMP: ${batchTimestamp}`);
  }

  return {
    inputDir: path.resolve(env.INPUT_DIR || 'data/full_profiles'),
    outputDir: path.resolve(env.OUTPUT_DIR || 'outputs/batch'),
    schemaPath: env.SCHEMA_PATH ? path.resolve(env.SCHEMA_PATH) : DEFAULT_SCHEMA_PATH,
    allowedYears: parseAllowedYears(env.ALLOWED_YEARS),
    batchTimestamp,
    metricsFile: env.METRICS_FILE ? path.resolve(env.METRICS_FILE) : undefined,
  };
}
