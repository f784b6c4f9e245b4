// Savitzky-Golay filter parameters
export const SMOOTHING_DEFAULTS = {
  WINDOW_LENGTH: 13,   // Must be odd and greater than polyorder
  POLYORDER: 2,
} as const;

// Isolated single-sample spike suppression, applied before smoothing
export const SPIKE_SUPPRESSION_DEFAULTS = {
  ENABLED: false,
  TEMPERATURE_THRESHOLD: 10.0,
  SMOKE_THRESHOLD: 0.6,
} as const;

export const DAMPING_DEFAULTS = {
  TEMPERATURE: { PIVOT: 4.0, STEEPNESS: 3.0 },   // °C
  SMOKE: { PIVOT: 0.02, STEEPNESS: 20.0 },       // tuned to typical smoke std
} as const;

export const WIND_DEFAULTS = {
  PIVOT: 6.0,          // m/s
  STEEPNESS: 0.8,
} as const;

export const RISK_WEIGHT_DEFAULTS = {
  TEMPERATURE: 60,
  SMOKE: 60,
  WIND: 15,
} as const;

export const ALERT_DEFAULTS = {
  THRESHOLD: 70,
  HYSTERESIS_ENABLED: false,
  HYSTERESIS_RESET_THRESHOLD: 65,   // re-arm alerting once risk falls below this
} as const;

export const RISK_SCORE_BOUNDS = {
  MIN: 0,
  MAX: 100,
} as const;

// A channel std this close to zero (relative to its mean) is floating-point
// noise from smoothing a constant signal, and is treated as zero variance
export const ZERO_VARIANCE_TOLERANCE = 1e-9;
