import dotenv from 'dotenv';
import {
  ALERT_DEFAULTS,
  DAMPING_DEFAULTS,
  RISK_SCORE_BOUNDS,
  RISK_WEIGHT_DEFAULTS,
  SMOOTHING_DEFAULTS,
  SPIKE_SUPPRESSION_DEFAULTS,
  WIND_DEFAULTS
} from './constants';
import { DetectionConfig, LogisticCurve } from '@/types/detection.types';
import { ConfigurationError } from '@/utils/errors';
import {
  Env,
  validateBooleanEnvironmentVariable,
  validateNumericEnvironmentVariable
} from '@/utils/env.utils';

dotenv.config();

export const DEFAULT_DETECTION_CONFIG: DetectionConfig = {
  smoothing: {
    window_length: SMOOTHING_DEFAULTS.WINDOW_LENGTH,
    polyorder: SMOOTHING_DEFAULTS.POLYORDER,
  },
  spike_suppression: {
    enabled: SPIKE_SUPPRESSION_DEFAULTS.ENABLED,
    temperature_threshold: SPIKE_SUPPRESSION_DEFAULTS.TEMPERATURE_THRESHOLD,
    smoke_threshold: SPIKE_SUPPRESSION_DEFAULTS.SMOKE_THRESHOLD,
  },
  damping: {
    temperature: { pivot: DAMPING_DEFAULTS.TEMPERATURE.PIVOT, steepness: DAMPING_DEFAULTS.TEMPERATURE.STEEPNESS },
    smoke: { pivot: DAMPING_DEFAULTS.SMOKE.PIVOT, steepness: DAMPING_DEFAULTS.SMOKE.STEEPNESS },
  },
  wind: { pivot: WIND_DEFAULTS.PIVOT, steepness: WIND_DEFAULTS.STEEPNESS },
  weights: {
    temperature: RISK_WEIGHT_DEFAULTS.TEMPERATURE,
    smoke: RISK_WEIGHT_DEFAULTS.SMOKE,
    wind: RISK_WEIGHT_DEFAULTS.WIND,
  },
  alert_threshold: ALERT_DEFAULTS.THRESHOLD,
  hysteresis: {
    enabled: ALERT_DEFAULTS.HYSTERESIS_ENABLED,
    reset_threshold: ALERT_DEFAULTS.HYSTERESIS_RESET_THRESHOLD,
  },
};

function validateCurve(name: string, curve: LogisticCurve, errors: string[]): void {
  if (!Number.isFinite(curve.pivot)) {
    errors.push(`${name} pivot must be finite`);
  }
  if (!Number.isFinite(curve.steepness) || curve.steepness <= 0) {
    errors.push(`${name} steepness must be a positive number`);
  }
}

/**
 * Checks the structural constraints of the filter and the alerting invariant:
 * no single weight may reach past the alert threshold on its own, so a lone
 * indicator at full severity and full damping never raises an event.
 */
export function validateDetectionConfig(config: DetectionConfig): void {
  const errors: string[] = [];
  const { smoothing, spike_suppression, weights, alert_threshold, hysteresis } = config;

  if (!Number.isInteger(smoothing.window_length) || smoothing.window_length < 3 || smoothing.window_length % 2 === 0) {
    errors.push(`smoothing window must be an odd integer >= 3, got: ${smoothing.window_length}`);
  }
  if (!Number.isInteger(smoothing.polyorder) || smoothing.polyorder < 0) {
    errors.push(`smoothing polyorder must be a non-negative integer, got: ${smoothing.polyorder}`);
  } else if (smoothing.polyorder >= smoothing.window_length) {
    errors.push(`smoothing polyorder (${smoothing.polyorder}) must be less than the window (${smoothing.window_length})`);
  }

  if (spike_suppression.temperature_threshold < 0 || !Number.isFinite(spike_suppression.temperature_threshold)) {
    errors.push('temperature spike threshold must be a non-negative number');
  }
  if (spike_suppression.smoke_threshold < 0 || !Number.isFinite(spike_suppression.smoke_threshold)) {
    errors.push('smoke spike threshold must be a non-negative number');
  }

  validateCurve('temperature damping', config.damping.temperature, errors);
  validateCurve('smoke damping', config.damping.smoke, errors);
  validateCurve('wind', config.wind, errors);

  if (!(alert_threshold > RISK_SCORE_BOUNDS.MIN && alert_threshold < RISK_SCORE_BOUNDS.MAX)) {
    errors.push(`alert threshold must lie strictly between ${RISK_SCORE_BOUNDS.MIN} and ${RISK_SCORE_BOUNDS.MAX}, got: ${alert_threshold}`);
  }

  for (const [channel, weight] of Object.entries(weights)) {
    if (!Number.isFinite(weight) || weight < 0) {
      errors.push(`${channel} weight must be a non-negative number, got: ${weight}`);
    } else if (weight > alert_threshold) {
      errors.push(`${channel} weight (${weight}) exceeds the alert threshold (${alert_threshold}); a single indicator could raise an event`);
    }
  }

  if (!(hysteresis.reset_threshold < alert_threshold) || !Number.isFinite(hysteresis.reset_threshold)) {
    errors.push(`hysteresis reset threshold (${hysteresis.reset_threshold}) must be below the alert threshold (${alert_threshold})`);
  }

  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid detection configuration:\n- ${errors.join('\n- ')}`);
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const nestedValues: unknown[] = Object.values(value);
  for (const nested of nestedValues) {
    if (nested !== null && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Builds a detection config from defaults overlaid with an override, validates it,
 * and freezes it.
 */
export function createDetectionConfig(overrides: DetectionConfigOverrides = {}): DetectionConfig {
  const base = DEFAULT_DETECTION_CONFIG;
  const config: DetectionConfig = {
    smoothing: { ...base.smoothing, ...overrides.smoothing },
    spike_suppression: { ...base.spike_suppression, ...overrides.spike_suppression },
    damping: {
      temperature: { ...base.damping.temperature, ...overrides.damping?.temperature },
      smoke: { ...base.damping.smoke, ...overrides.damping?.smoke },
    },
    wind: { ...base.wind, ...overrides.wind },
    weights: { ...base.weights, ...overrides.weights },
    alert_threshold: overrides.alert_threshold ?? base.alert_threshold,
    hysteresis: { ...base.hysteresis, ...overrides.hysteresis },
  };

  validateDetectionConfig(config);
  return deepFreeze(config);
}

export interface DetectionConfigOverrides {
  smoothing?: Partial<DetectionConfig['smoothing']>;
  spike_suppression?: Partial<DetectionConfig['spike_suppression']>;
  damping?: {
    temperature?: Partial<LogisticCurve>;
    smoke?: Partial<LogisticCurve>;
  };
  wind?: Partial<LogisticCurve>;
  weights?: Partial<DetectionConfig['weights']>;
  alert_threshold?: number;
  hysteresis?: Partial<DetectionConfig['hysteresis']>;
}

export function loadDetectionConfig(env: Env = process.env): DetectionConfig {
  const base = DEFAULT_DETECTION_CONFIG;

  return createDetectionConfig({
    smoothing: {
      window_length: validateNumericEnvironmentVariable('SMOOTHING_WINDOW', env.SMOOTHING_WINDOW, base.smoothing.window_length),
      polyorder: validateNumericEnvironmentVariable('SMOOTHING_POLYORDER', env.SMOOTHING_POLYORDER, base.smoothing.polyorder),
    },
    spike_suppression: {
      enabled: validateBooleanEnvironmentVariable('SPIKE_SUPPRESSION_ENABLED', env.SPIKE_SUPPRESSION_ENABLED, base.spike_suppression.enabled),
      temperature_threshold: validateNumericEnvironmentVariable('TEMP_SPIKE_THRESHOLD', env.TEMP_SPIKE_THRESHOLD, base.spike_suppression.temperature_threshold),
      smoke_threshold: validateNumericEnvironmentVariable('SMOKE_SPIKE_THRESHOLD', env.SMOKE_SPIKE_THRESHOLD, base.spike_suppression.smoke_threshold),
    },
    damping: {
      temperature: {
        pivot: validateNumericEnvironmentVariable('TEMP_PIVOT', env.TEMP_PIVOT, base.damping.temperature.pivot),
        steepness: validateNumericEnvironmentVariable('TEMP_STEEPNESS', env.TEMP_STEEPNESS, base.damping.temperature.steepness),
      },
      smoke: {
        pivot: validateNumericEnvironmentVariable('SMOKE_PIVOT', env.SMOKE_PIVOT, base.damping.smoke.pivot),
        steepness: validateNumericEnvironmentVariable('SMOKE_STEEPNESS', env.SMOKE_STEEPNESS, base.damping.smoke.steepness),
      },
    },
    wind: {
      pivot: validateNumericEnvironmentVariable('WIND_PIVOT', env.WIND_PIVOT, base.wind.pivot),
      steepness: validateNumericEnvironmentVariable('WIND_STEEPNESS', env.WIND_STEEPNESS, base.wind.steepness),
    },
    weights: {
      temperature: validateNumericEnvironmentVariable('TEMP_WEIGHT', env.TEMP_WEIGHT, base.weights.temperature),
      smoke: validateNumericEnvironmentVariable('SMOKE_WEIGHT', env.SMOKE_WEIGHT, base.weights.smoke),
      wind: validateNumericEnvironmentVariable('WIND_BASE_WEIGHT', env.WIND_BASE_WEIGHT, base.weights.wind),
    },
    alert_threshold: validateNumericEnvironmentVariable('ALERT_THRESHOLD', env.ALERT_THRESHOLD, base.alert_threshold),
    hysteresis: {
      enabled: validateBooleanEnvironmentVariable('HYSTERESIS_ENABLED', env.HYSTERESIS_ENABLED, base.hysteresis.enabled),
      reset_threshold: validateNumericEnvironmentVariable('HYSTERESIS_RESET_THRESHOLD', env.HYSTERESIS_RESET_THRESHOLD, base.hysteresis.reset_threshold),
    },
  });
}

// Process-wide configuration, loaded once at startup and never mutated
export const detectionConfig: DetectionConfig = loadDetectionConfig();
