/**
 * Batch Runner
 *
 * Runs one extraction batch over INPUT_DIR and writes researcher documents,
 * summary.json and errors.json to OUTPUT_DIR. Exits non-zero on a
 * configuration error or when any document failed.
 */

import fs from 'fs';
import path from 'path';
import { ulid } from 'ulid';
import {
  logger,
  loadConfig,
  runBatch,
  runWithContextAsync,
  getMetrics,
  ConfigurationError,
} from '@curriculo/shared';

async function main(): Promise<number> {
  const correlationId = ulid();

  return runWithContextAsync({ correlationId }, async () => {
    let exitCode = 0;

    try {
      const config = loadConfig();
      const fixedTime = config.batchTimestamp ? new Date(config.batchTimestamp) : undefined;

      logger.info('Starting batch', {
        input_dir: config.inputDir,
        output_dir: config.outputDir,
        schema_path: config.schemaPath,
        allowed_years: config.allowedYears.kind === 'all' ? 'all' : config.allowedYears.years,
      });

      const report = runBatch({
        inputDir: config.inputDir,
        outputDir: config.outputDir,
        schemaPath: config.schemaPath,
        filter: config.allowedYears,
        now: fixedTime ? () => fixedTime : undefined,
      });

      if (report.summary.failed > 0) exitCode = 1;

      if (config.metricsFile) {
        fs.mkdirSync(path.dirname(config.metricsFile), { recursive: true });
        fs.writeFileSync(config.metricsFile, await getMetrics(), 'utf-8');
        logger.info('Metrics written', { metrics_file: config.metricsFile });
      }
    } catch (error) {
      if (error instanceof ConfigurationError) {
        logger.error('Invalid configuration', error);
        return 2;
      }
      throw error;
    }

    return exitCode;
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.error('Batch runner crashed', error);
    process.exitCode = 1;
  });
