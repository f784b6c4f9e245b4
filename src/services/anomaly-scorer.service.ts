import {
  ChannelStatistics,
  DetectionConfig,
  LogisticCurve,
  RiskComponents,
  RiskWeights,
  ScoredPoint,
  ScoredSeries,
  SensorReading
} from '@/types/detection.types';
import { RISK_SCORE_BOUNDS } from '@/config/constants';
import { clamp, computeChannelStatistics, logistic, normalCdf } from '@/utils/statistics.utils';

/**
 * One-sided z-score: only deviations above the mean count. A channel with no
 * variance has no anomalies.
 */
export const positiveZScore = (value: number, stats: ChannelStatistics): number => {
  if (stats.std <= 0) {
    return 0;
  }
  return Math.max(0, (value - stats.mean) / stats.std);
};

/**
 * Probability mass between the mean and `z`, doubled: 0 at z = 0, rising
 * towards 1 as z grows.
 */
export const severityFromZScore = (z: number): number => {
  if (z <= 0) {
    return 0;
  }
  return 2 * (normalCdf(z) - 0.5);
};

// Near 0 for near-constant channels, near 1 once std is well past the pivot
export const dampingFactor = (std: number, curve: LogisticCurve): number => logistic(std, curve);

// Contextual amplifier, independent of the batch statistics
export const windScore = (wind: number, curve: LogisticCurve): number => logistic(wind, curve);

export const composeRisk = (components: RiskComponents, weights: RiskWeights): number =>
  clamp(
    weights.temperature * components.temperature +
      weights.smoke * components.smoke +
      weights.wind * components.wind,
    RISK_SCORE_BOUNDS.MIN,
    RISK_SCORE_BOUNDS.MAX
  );

interface AlertState {
  armed: boolean;
  points: ScoredPoint[];
}

/**
 * Hysteresis fold over time-ordered points: an armed point above the threshold
 * fires and disarms; while disarmed nothing fires, and a point below the reset
 * threshold re-arms for the next one.
 */
export const applyHysteresis = (
  points: Array<Omit<ScoredPoint, 'is_event'>>,
  alertThreshold: number,
  resetThreshold: number
): ScoredPoint[] => {
  // The accumulator array is owned by this call, so appending keeps the fold linear
  const initial: AlertState = { armed: true, points: [] };

  return points.reduce<AlertState>((state, point) => {
    const fires = state.armed && point.risk_score > alertThreshold;
    state.points.push({ ...point, is_event: fires });
    return {
      armed: state.armed ? !fires : point.risk_score < resetThreshold,
      points: state.points,
    };
  }, initial).points;
};

/**
 * Scores a smoothed, time-ordered series. Statistics are computed once over
 * the whole series; each point is then scored independently, except for the
 * optional hysteresis pass.
 */
export const scoreSeries = (series: SensorReading[], config: DetectionConfig): ScoredSeries => {
  const temperature = computeChannelStatistics(series.map(r => r.temperature));
  const smoke = computeChannelStatistics(series.map(r => r.smoke));

  const temperatureDamping = dampingFactor(temperature.std, config.damping.temperature);
  const smokeDamping = dampingFactor(smoke.std, config.damping.smoke);

  const scored = series.map(reading => {
    const components: RiskComponents = {
      temperature: severityFromZScore(positiveZScore(reading.temperature, temperature)) * temperatureDamping,
      smoke: severityFromZScore(positiveZScore(reading.smoke, smoke)) * smokeDamping,
      wind: windScore(reading.wind, config.wind),
    };
    return {
      timestamp: reading.timestamp,
      risk_score: composeRisk(components, config.weights),
      components,
    };
  });

  const points = config.hysteresis.enabled
    ? applyHysteresis(scored, config.alert_threshold, config.hysteresis.reset_threshold)
    : scored.map(point => ({ ...point, is_event: point.risk_score > config.alert_threshold }));

  return { points, statistics: { temperature, smoke } };
};
