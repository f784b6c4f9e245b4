import { z } from 'zod';
import { SensorReading, ValidationIssue, ValidationResult } from '@/types/detection.types';
import { isValidTimestamp } from '@/utils/time.utils';

const TIMESTAMP_MESSAGE = 'timestamp must be a valid ISO-8601 format string (e.g., "2025-08-01T10:00:00Z")';

// Physical ranges enforced at the HTTP boundary
export const SensorReadingSchema = z.object({
  timestamp: z.string({ required_error: 'timestamp is required' })
    .refine(isValidTimestamp, { message: TIMESTAMP_MESSAGE }),
  temperature: z.number({ required_error: 'temperature is required' }).finite().min(-50).max(100),
  smoke: z.number({ required_error: 'smoke is required' }).finite().min(0).max(1),
  wind: z.number({ required_error: 'wind is required' }).finite().min(0),
});

export const DetectionRequestSchema = z
  .array(SensorReadingSchema)
  .min(1, { message: 'Input data cannot be empty. Please provide at least one data point.' });

const formatPath = (path: Array<string | number>): string =>
  path.length === 0
    ? 'body'
    : path.map((segment, i) => (typeof segment === 'number' ? `[${segment}]` : i === 0 ? segment : `.${segment}`)).join('');

export const toValidationIssues = (error: z.ZodError): ValidationIssue[] =>
  error.issues.map(issue => ({ field: formatPath(issue.path), message: issue.message }));

/**
 * Validates a raw request body against the reading schema.
 */
export const parseDetectionRequest = (body: unknown): ValidationResult<SensorReading[]> => {
  const result = DetectionRequestSchema.safeParse(body);

  if (!result.success) {
    const details = toValidationIssues(result.error);
    return { valid: false, error: details[0]?.message ?? 'Invalid request body', details };
  }

  return { valid: true, data: result.data };
};

/**
 * Guards the scoring pipeline: the batch must be non-empty, every number finite
 * and every timestamp ISO-8601. A single NaN would poison the channel means and
 * with them every score in the batch, so nothing is coerced.
 */
export const validateReadingBatch = (readings: SensorReading[]): ValidationResult => {
  if (readings.length === 0) {
    return { valid: false, error: 'Reading batch cannot be empty', details: [{ field: 'body', message: 'Reading batch cannot be empty' }] };
  }

  const details: ValidationIssue[] = [];

  readings.forEach((reading, index) => {
    if (typeof reading.timestamp !== 'string' || !isValidTimestamp(reading.timestamp)) {
      details.push({ field: `[${index}].timestamp`, message: TIMESTAMP_MESSAGE });
    }
    for (const field of ['temperature', 'smoke', 'wind'] as const) {
      if (typeof reading[field] !== 'number' || !Number.isFinite(reading[field])) {
        details.push({ field: `[${index}].${field}`, message: `${field} must be a finite number` });
      }
    }
  });

  if (details.length > 0) {
    return { valid: false, error: `Invalid reading batch: ${details[0].message} (at ${details[0].field})`, details };
  }

  return { valid: true };
};
