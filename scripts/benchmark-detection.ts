#!/usr/bin/env ts-node
/**
 * Compares the base pipeline with the enhanced one (spike suppression +
 * hysteresis) on sample datasets: processor / detector timings and event counts.
 *
 * Usage:
 *   npm run benchmark
 *   npm run benchmark -- --file data/sample_input_slow_rise_windy.json
 *   npm run benchmark -- --file readings.csv --file other.json
 */

import path from 'path';
import { performance } from 'perf_hooks';
import { createDetectionConfig, detectionConfig } from '@/config';
import { processReadings } from '@/services/signal-processor.service';
import { scoreSeries } from '@/services/anomaly-scorer.service';
import { summarize } from '@/services/detection.service';
import { loadReadingsFile } from '@/services/reading-loader.service';
import { DetectionConfig, SensorReading } from '@/types/detection.types';

const DEFAULT_DATASETS = [
  'data/sample_input_flat_rise_twice.json',
  'data/sample_input_slow_rise_windy.json',
];

interface BenchmarkResult {
  processor_ms: number;
  detector_ms: number;
  total_ms: number;
  events: number;
}

function parseArgs(): string[] {
  const args = process.argv.slice(2);
  const files: string[] = [];

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--file' && args[i + 1]) {
      files.push(args[++i]);
    }
  }

  return files.length > 0 ? files : DEFAULT_DATASETS;
}

function benchmark(readings: SensorReading[], config: DetectionConfig): BenchmarkResult {
  const t0 = performance.now();
  const processed = processReadings(readings, config);
  const t1 = performance.now();
  const { points } = scoreSeries(processed, config);
  const t2 = performance.now();

  return {
    processor_ms: t1 - t0,
    detector_ms: t2 - t1,
    total_ms: t2 - t0,
    events: summarize(points).count
  };
}

function printResult(label: string, result: BenchmarkResult, baseline?: BenchmarkResult) {
  const delta = baseline && baseline.total_ms > 0
    ? ` (${(((result.total_ms - baseline.total_ms) / baseline.total_ms) * 100).toFixed(2)}% vs base)`
    : '';

  console.log(`${label}:`);
  console.log(`  Processor time : ${result.processor_ms.toFixed(3)} ms`);
  console.log(`  Detector time  : ${result.detector_ms.toFixed(3)} ms`);
  console.log(`  Total time     : ${result.total_ms.toFixed(3)} ms${delta}`);
  console.log(`  Events detected: ${result.events}`);
}

async function main() {
  const files = parseArgs();
  const enhanced = createDetectionConfig({
    ...detectionConfig,
    spike_suppression: { ...detectionConfig.spike_suppression, enabled: true },
    hysteresis: { ...detectionConfig.hysteresis, enabled: true }
  });

  for (const file of files) {
    const loaded = await loadReadingsFile(path.resolve(file));
    if (loaded.readings.length === 0) {
      console.error(`\n✗ ${file}: no usable readings`, loaded.errors);
      process.exitCode = 1;
      continue;
    }

    const base = benchmark(loaded.readings, detectionConfig);
    const v2 = benchmark(loaded.readings, enhanced);

    console.log(`\n=== Benchmark Results (${path.basename(file)}, ${loaded.readings.length} readings) ===`);
    printResult('Base pipeline', base);
    console.log();
    printResult('Spike suppression + hysteresis', v2, base);
  }
}

main().catch((error) => {
  console.error('Benchmark failed:', error);
  process.exit(1);
});
