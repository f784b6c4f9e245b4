import { ChannelStatistics, LogisticCurve } from '@/types/detection.types';
import { ZERO_VARIANCE_TOLERANCE } from '@/config/constants';

export const mean = (values: number[]): number => {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, v) => sum + v, 0) / values.length;
};

/**
 * Sample standard deviation (divisor n - 1). Undefined for fewer than two
 * values, reported as 0.
 */
export const sampleStandardDeviation = (values: number[], center: number = mean(values)): number => {
  if (values.length < 2) {
    return 0;
  }
  const sumOfSquares = values.reduce((sum, v) => sum + (v - center) ** 2, 0);
  return Math.sqrt(sumOfSquares / (values.length - 1));
};

export const computeChannelStatistics = (values: number[]): ChannelStatistics => {
  const avg = mean(values);
  const std = sampleStandardDeviation(values, avg);

  if (std <= ZERO_VARIANCE_TOLERANCE * Math.max(1, Math.abs(avg))) {
    return { mean: avg, std: 0 };
  }
  return { mean: avg, std };
};

/**
 * Abramowitz & Stegun 7.1.26, absolute error below 1.5e-7.
 */
export const erf = (x: number): number => {
  const sign = x < 0 ? -1 : 1;
  const ax = Math.abs(x);

  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;

  const t = 1 / (1 + p * ax);
  const poly = ((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t;
  return sign * (1 - poly * Math.exp(-ax * ax));
};

export const normalCdf = (z: number): number => 0.5 * (1 + erf(z / Math.SQRT2));

/**
 * Rising logistic curve centred on `pivot`: 0.5 at the pivot, approaching 1
 * above it and 0 below it.
 */
export const logistic = (x: number, curve: LogisticCurve): number =>
  1 / (1 + Math.exp(curve.steepness * (curve.pivot - x)));

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

export const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};
