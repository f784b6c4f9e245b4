import { DetectionConfig, DetectionSummary, ScoredPoint, SensorReading } from '@/types/detection.types';
import { detectionConfig } from '@/config';
import { processReadings } from '@/services/signal-processor.service';
import { scoreSeries } from '@/services/anomaly-scorer.service';
import { validateReadingBatch } from '@/services/reading-validation.service';
import { ValidationError } from '@/utils/errors';
import { logger } from '@/utils/logger';

export const summarize = (points: ScoredPoint[]): Pick<DetectionSummary, 'events' | 'count' | 'max_score'> => {
  const events = points.filter(p => p.is_event);
  const max_score = points.reduce((max, p) => Math.max(max, p.risk_score), 0);
  return { events, count: events.length, max_score };
};

const logScoreBreakdown = (summary: DetectionSummary): void => {
  if (!logger.isDebugEnabled()) {
    return;
  }

  const { temperature, smoke } = summary.statistics;
  const lines = summary.points.map((p, idx) =>
    `${String(idx + 1).padStart(3, '0')} | ${p.timestamp.padEnd(25)} | ` +
    `t ${p.components.temperature.toFixed(3).padStart(6)} | ` +
    `s ${p.components.smoke.toFixed(3).padStart(6)} | ` +
    `w ${p.components.wind.toFixed(3).padStart(6)} | ` +
    `risk ${p.risk_score.toFixed(1).padStart(5)} ${p.is_event ? 'ALERT' : ''}`
  );

  logger.debug([
    `Anomaly breakdown: std_temp=${temperature.std.toFixed(4)} std_smoke=${smoke.std.toFixed(6)}`,
    ...lines
  ].join('\n'));
};

/**
 * Full detection pipeline over one batch:
 * 1. Validate (empty batches and non-finite values are rejected outright)
 * 2. Order and smooth
 * 3. Score every point
 * 4. Aggregate the flagged events
 */
export const scoreBatch = (readings: SensorReading[], config: DetectionConfig = detectionConfig): DetectionSummary => {
  const validation = validateReadingBatch(readings);
  if (!validation.valid) {
    throw new ValidationError(validation.error ?? 'Invalid reading batch', validation.details);
  }

  const processed = processReadings(readings, config);
  const { points, statistics } = scoreSeries(processed, config);
  const summary: DetectionSummary = { points, statistics, ...summarize(points) };

  logScoreBreakdown(summary);
  logger.info(`Scored ${points.length} readings`, {
    event_count: summary.count,
    max_score: summary.max_score,
  });

  if (summary.count > 0) {
    logger.notify(
      `${summary.count} suspicious event(s) detected (max risk ${summary.max_score.toFixed(1)}): ${summary.events.map(e => e.timestamp).join(', ')}`
    );
  }

  return summary;
};

export const health = (): boolean => true;
