export interface SensorReading {
  timestamp: string;                // ISO-8601, e.g. "2025-08-01T10:00:00Z"
  temperature: number;              // °C
  smoke: number;                    // normalised density, 0..1
  wind: number;                     // m/s
}

export type SignalChannel = 'temperature' | 'smoke';

export interface ChannelStatistics {
  mean: number;
  std: number;
}

export interface SeriesStatistics {
  temperature: ChannelStatistics;
  smoke: ChannelStatistics;
}

// Per-point contributions before weighting, each in [0, 1]
export interface RiskComponents {
  temperature: number;
  smoke: number;
  wind: number;
}

export interface ScoredPoint {
  timestamp: string;
  risk_score: number;
  is_event: boolean;
  components: RiskComponents;
}

export interface ScoredSeries {
  points: ScoredPoint[];
  statistics: SeriesStatistics;
}

export interface DetectionSummary {
  points: ScoredPoint[];
  events: ScoredPoint[];
  count: number;
  max_score: number;
  statistics: SeriesStatistics;
}

// Detection configuration

export interface SmoothingConfig {
  window_length: number;
  polyorder: number;
}

export interface SpikeSuppressionConfig {
  enabled: boolean;
  temperature_threshold: number;
  smoke_threshold: number;
}

export interface LogisticCurve {
  pivot: number;
  steepness: number;
}

export interface RiskWeights {
  temperature: number;
  smoke: number;
  wind: number;
}

export interface HysteresisConfig {
  enabled: boolean;
  reset_threshold: number;
}

export interface DetectionConfig {
  smoothing: SmoothingConfig;
  spike_suppression: SpikeSuppressionConfig;
  damping: Record<SignalChannel, LogisticCurve>;
  wind: LogisticCurve;
  weights: RiskWeights;
  alert_threshold: number;
  hysteresis: HysteresisConfig;
}

// HTTP response payloads

export interface DetectionEvent {
  timestamp: string;
  score: number;
}

export interface DetectionResponse {
  run_id: string;
  events: DetectionEvent[];
  event_count: number;
  max_score: number;
  scores: Array<Pick<ScoredPoint, 'timestamp' | 'risk_score' | 'is_event'>>;
}

export interface ValidationIssue {
  field: string;
  message: string;
}

export interface ValidationResult<T = undefined> {
  valid: boolean;
  data?: T;
  error?: string;
  details?: ValidationIssue[];
}
