/**
 * Scanner throughput benchmark over the generated datasets.
 *
 *   npm run bench
 */

import { builtinLanguage } from '../languages/language-file.js';
import { logger } from '../logger.js';
import { createScanner } from '../scanner/scanner.js';
import { createDatasets } from './datasets.js';
import { measureMedian } from './measure.js';

const scanner = createScanner(builtinLanguage('lua'));

logger.info(`Node ${process.version} on ${process.platform} ${process.arch}`);

for (const dataset of createDatasets()) {
  const metrics = measureMedian(scanner, dataset.content, 5);
  if (!metrics.ok) {
    logger.error(`${dataset.name}: scan failed after ${metrics.tokenCount} tokens`);
    process.exitCode = 1;
    continue;
  }
  logger.success(
    `${dataset.name} (${Math.round(metrics.charCount / 1024)}K chars): ` +
    `${metrics.scanTimeMs.toFixed(2)}ms, ${(metrics.throughputCharsPerSecond / 1000).toFixed(0)}k chars/sec, ` +
    `${metrics.tokenCount} tokens`,
  );
}
