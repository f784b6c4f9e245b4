import { DetectionConfig, SensorReading } from '@/types/detection.types';
import { savitzkyGolayFilter } from '@/utils/savitzky-golay.utils';
import { clamp } from '@/utils/statistics.utils';
import { sortChronologically } from '@/utils/time.utils';
import { logger } from '@/utils/logger';

export interface ExtractedSignals {
  temperatures: number[];
  smokes: number[];
}

export const extractSignals = (readings: SensorReading[]): ExtractedSignals => ({
  temperatures: readings.map(r => r.temperature),
  smokes: readings.map(r => r.smoke),
});

/**
 * Suppress isolated single-sample spikes (both peaks and dips).
 *
 * A sample is a spike when it sits more than `threshold` above both neighbours,
 * or more than `threshold` below both; it is replaced by the neighbours' mean.
 * The scan runs left to right over the progressively fixed signal. Edge samples
 * are left alone: with one neighbour, sensor noise and a real change look alike.
 */
export const suppressSpikes = (signal: number[], threshold: number): number[] => {
  if (signal.length < 3) {
    return [...signal];
  }

  const fixed = [...signal];

  for (let i = 1; i < fixed.length - 1; i++) {
    const prev = fixed[i - 1];
    const curr = fixed[i];
    const next = fixed[i + 1];

    const isPeak = curr - prev > threshold && curr - next > threshold;
    const isDip = prev - curr > threshold && next - curr > threshold;

    if (isPeak || isDip) {
      fixed[i] = (prev + next) / 2;
    }
  }

  return fixed;
};

export const smoothSignal = (signal: number[], config: DetectionConfig['smoothing']): number[] =>
  savitzkyGolayFilter(signal, config.window_length, config.polyorder);

const logComparison = (before: SensorReading[], after: SensorReading[]): void => {
  if (!logger.isDebugEnabled()) {
    return;
  }

  const divider = '+----+---------------------------+-----------+-----------+-----------+-----------+';
  const rows = after.map((a, idx) => {
    const b = before[idx];
    return `| ${String(idx + 1).padStart(2, '0')} | ${a.timestamp.padEnd(25)} | ${b.temperature.toFixed(2).padStart(9)} | ${a.temperature.toFixed(2).padStart(9)} | ${b.smoke.toFixed(4).padStart(9)} | ${a.smoke.toFixed(4).padStart(9)} |`;
  });

  logger.debug([
    'Signal processing comparison (before vs after)',
    divider,
    '| #  | Timestamp                 | Temp Raw  | Temp Sm.  | Smoke Raw | Smoke Sm. |',
    divider,
    ...rows,
    divider
  ].join('\n'));
};

/**
 * Orders the batch and smooths temperature and smoke:
 * sort → (spike suppression) → Savitzky-Golay → clamp smoke to [0, 1].
 * Wind is copied through untouched.
 */
export const processReadings = (readings: SensorReading[], config: DetectionConfig): SensorReading[] => {
  if (readings.length === 0) {
    return [];
  }

  const sorted = sortChronologically(readings);
  let { temperatures, smokes } = extractSignals(sorted);

  if (config.spike_suppression.enabled) {
    temperatures = suppressSpikes(temperatures, config.spike_suppression.temperature_threshold);
    smokes = suppressSpikes(smokes, config.spike_suppression.smoke_threshold);
  }

  const smoothedTemperatures = smoothSignal(temperatures, config.smoothing);
  // Smoothing can overshoot the physical bounds next to a spike
  const smoothedSmokes = smoothSignal(smokes, config.smoothing).map(s => clamp(s, 0, 1));

  const processed = sorted.map((reading, i) => ({
    timestamp: reading.timestamp,
    temperature: smoothedTemperatures[i],
    smoke: smoothedSmokes[i],
    wind: reading.wind,
  }));

  logComparison(sorted, processed);

  return processed;
};
