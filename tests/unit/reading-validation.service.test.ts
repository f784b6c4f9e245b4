import { parseDetectionRequest, validateReadingBatch } from '@/services/reading-validation.service';
import { SensorReading } from '@/types/detection.types';
import { constantBatch } from '../helpers';

describe('Reading Validation Service', () => {
  describe('parseDetectionRequest', () => {
    it('should accept a well-formed batch', () => {
      const body = [{ timestamp: '2025-08-01T10:00:00Z', temperature: 22.5, smoke: 0.01, wind: 2.0 }];

      const result = parseDetectionRequest(body);

      expect(result.valid).toBe(true);
      expect(result.data).toEqual(body);
    });

    it('should strip unknown fields', () => {
      const result = parseDetectionRequest([
        { timestamp: '2025-08-01T10:00:00Z', temperature: 22.5, smoke: 0.01, wind: 2.0, humidity: 40 }
      ]);

      expect(result.data).toEqual([{ timestamp: '2025-08-01T10:00:00Z', temperature: 22.5, smoke: 0.01, wind: 2.0 }]);
    });

    it('should reject an empty array with a friendly message', () => {
      const result = parseDetectionRequest([]);

      expect(result.valid).toBe(false);
      expect(result.error).toBe('Input data cannot be empty. Please provide at least one data point.');
      expect(result.details).toEqual([
        { field: 'body', message: 'Input data cannot be empty. Please provide at least one data point.' }
      ]);
    });

    it('should reject a body that is not an array', () => {
      const result = parseDetectionRequest({ timestamp: '2025-08-01T10:00:00Z' });

      expect(result.valid).toBe(false);
      expect(result.details?.[0].field).toBe('body');
    });

    it('should report missing fields by position', () => {
      const result = parseDetectionRequest([
        { timestamp: '2025-08-01T10:00:00Z', temperature: 22.5, smoke: 0.01, wind: 2.0 },
        { timestamp: '2025-08-01T10:01:00Z', temperature: 22.5 }
      ]);

      expect(result.valid).toBe(false);
      expect(result.details).toEqual([
        { field: '[1].smoke', message: 'smoke is required' },
        { field: '[1].wind', message: 'wind is required' }
      ]);
    });

    it('should enforce physical ranges', () => {
      const result = parseDetectionRequest([
        { timestamp: '2025-08-01T10:00:00Z', temperature: 120, smoke: 1.5, wind: -1 }
      ]);

      expect(result.details?.map(d => d.field)).toEqual(['[0].temperature', '[0].smoke', '[0].wind']);
    });

    it('should reject a non-ISO timestamp', () => {
      const result = parseDetectionRequest([
        { timestamp: 'yesterday at noon', temperature: 20, smoke: 0.01, wind: 1 }
      ]);

      expect(result.details).toEqual([
        {
          field: '[0].timestamp',
          message: 'timestamp must be a valid ISO-8601 format string (e.g., "2025-08-01T10:00:00Z")'
        }
      ]);
    });
  });

  describe('validateReadingBatch', () => {
    it('should accept finite readings', () => {
      expect(validateReadingBatch(constantBatch(3))).toEqual({ valid: true });
    });

    it('should reject an empty batch', () => {
      const result = validateReadingBatch([]);

      expect(result.valid).toBe(false);
      expect(result.error).toBe('Reading batch cannot be empty');
    });

    it('should list every non-finite value', () => {
      const batch: SensorReading[] = constantBatch(2);
      batch[0] = { ...batch[0], temperature: Number.POSITIVE_INFINITY };
      batch[1] = { ...batch[1], wind: Number.NaN };

      const result = validateReadingBatch(batch);

      expect(result.details).toEqual([
        { field: '[0].temperature', message: 'temperature must be a finite number' },
        { field: '[1].wind', message: 'wind must be a finite number' }
      ]);
      expect(result.error).toBe('Invalid reading batch: temperature must be a finite number (at [0].temperature)');
    });
  });
});
