import request from 'supertest';
import { createApp } from '@/app';
import { createDetectionConfig } from '@/config';
import { constantBatch, minuteTimestamp, singleSpikeBatch } from '../helpers';

describe('Detection API', () => {
  const app = createApp(createDetectionConfig());

  describe('GET /health', () => {
    test('should report ok', async () => {
      const response = await request(app).get('/health').expect(200);

      expect(response.body.status).toBe('ok');
      expect(typeof response.body.timestamp).toBe('string');
    });
  });

  describe('POST /api/v1/detect', () => {
    test('should score a single reading', async () => {
      const response = await request(app)
        .post('/api/v1/detect')
        .send([{ timestamp: '2025-08-01T10:00:00Z', temperature: 30, smoke: 0.05, wind: 3 }])
        .expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.data.event_count).toBe(0);
      expect(response.body.data.events).toEqual([]);
      expect(response.body.data.max_score).toBe(1.2);
      expect(response.body.data.scores).toEqual([
        { timestamp: '2025-08-01T10:00:00Z', risk_score: 1.2, is_event: false }
      ]);
    });

    // Smoothing spreads the spike, so its neighbours cross the threshold too
    test('should report the spike and its smoothed neighbours as events', async () => {
      const response = await request(app)
        .post('/api/v1/detect')
        .send(singleSpikeBatch())
        .expect(200);

      const { data } = response.body;
      expect(data.event_count).toBe(3);
      expect(data.max_score).toBe(80.1);
      expect(data.events).toEqual([
        { timestamp: minuteTimestamp(9), score: 77.9 },
        { timestamp: minuteTimestamp(10), score: 80.1 },
        { timestamp: minuteTimestamp(11), score: 77.9 }
      ]);
      expect(data.scores).toHaveLength(20);
    });

    test('should return nothing suspicious for constant readings', async () => {
      const response = await request(app)
        .post('/api/v1/detect')
        .send(constantBatch(20))
        .expect(200);

      expect(response.body.data.event_count).toBe(0);
      expect(response.body.data.max_score).toBe(4.7);
    });

    test('should use the caller request id as run id', async () => {
      const response = await request(app)
        .post('/api/v1/detect')
        .set('X-Request-Id', 'run-42')
        .send(constantBatch(3))
        .expect(200);

      expect(response.headers['x-request-id']).toBe('run-42');
      expect(response.body.data.run_id).toBe('run-42');
    });

    test('should generate a run id when none is supplied', async () => {
      const response = await request(app)
        .post('/api/v1/detect')
        .send(constantBatch(3))
        .expect(200);

      expect(response.body.data.run_id).toMatch(/^[0-9a-f-]{36}$/);
      expect(response.headers['x-request-id']).toBe(response.body.data.run_id);
    });

    test('should return 422 for an empty batch', async () => {
      const response = await request(app)
        .post('/api/v1/detect')
        .send([])
        .expect(422);

      expect(response.body).toEqual({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Input data cannot be empty. Please provide at least one data point.',
          details: [{ field: 'body', message: 'Input data cannot be empty. Please provide at least one data point.' }]
        }
      });
    });

    test('should return 422 with the offending field for missing values', async () => {
      const response = await request(app)
        .post('/api/v1/detect')
        .send([{ timestamp: '2025-08-01T10:00:00Z', temperature: 22, wind: 2 }])
        .expect(422);

      expect(response.body.error.details).toEqual([{ field: '[0].smoke', message: 'smoke is required' }]);
    });

    test('should return 422 for out-of-range readings', async () => {
      const response = await request(app)
        .post('/api/v1/detect')
        .send([{ timestamp: '2025-08-01T10:00:00Z', temperature: 22, smoke: 1.5, wind: 2 }])
        .expect(422);

      expect(response.body.error.details[0].field).toBe('[0].smoke');
    });

    test('should return 400 for malformed JSON', async () => {
      const response = await request(app)
        .post('/api/v1/detect')
        .set('Content-Type', 'application/json')
        .send('[{"timestamp": ')
        .expect(400);

      expect(response.body).toEqual({
        success: false,
        error: { code: 'INVALID_JSON', message: 'Request body is not valid JSON' }
      });
    });
  });

  describe('GET /api/v1/config/detection', () => {
    test('should expose the active configuration', async () => {
      const response = await request(app).get('/api/v1/config/detection').expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.data.alert_threshold).toBe(70);
      expect(response.body.data.smoothing).toEqual({ window_length: 13, polyorder: 2 });
    });

    test('should reflect the config the app was built with', async () => {
      const tuned = createApp(createDetectionConfig({ alert_threshold: 80, hysteresis: { enabled: true } }));

      const response = await request(tuned).get('/api/v1/config/detection').expect(200);

      expect(response.body.data.alert_threshold).toBe(80);
      expect(response.body.data.hysteresis).toEqual({ enabled: true, reset_threshold: 65 });
    });
  });
});
