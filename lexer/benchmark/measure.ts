import { performance } from 'node:perf_hooks';

import type { Scanner } from '../scanner/scanner.js';

export interface BenchmarkMetrics {
  scanTimeMs: number;
  /** Source length in code points, the unit of every offset the scanner reports. */
  charCount: number;
  throughputCharsPerSecond: number;
  tokenCount: number;
  ok: boolean;
}

/**
 * Measure a single scan of `content`
 */
export function measureScan(scanner: Scanner, content: string): BenchmarkMetrics {
  const startTime = performance.now();
  const result = scanner.run(content);
  const scanTimeMs = performance.now() - startTime;
  const charCount = result.buffer.chars.length;

  return {
    scanTimeMs,
    charCount,
    throughputCharsPerSecond: scanTimeMs > 0 ? charCount / (scanTimeMs / 1000) : 0,
    tokenCount: result.buffer.count,
    ok: result.ok,
  };
}

/**
 * Run several iterations and return the median by scan time
 */
export function measureMedian(scanner: Scanner, content: string, iterations = 5): BenchmarkMetrics {
  if (iterations < 1)
    throw new RangeError('measureMedian: iterations must be at least 1');

  const results: BenchmarkMetrics[] = [];
  for (let i = 0; i < iterations; i++) {
    results.push(measureScan(scanner, content));
  }

  results.sort((a, b) => a.scanTimeMs - b.scanTimeMs);
  return results[Math.floor(results.length / 2)];
}
