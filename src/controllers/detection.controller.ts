/// <reference path="../types/express.d.ts" />
import { Request, Response, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { scoreBatch, health } from '@/services/detection.service';
import { parseDetectionRequest } from '@/services/reading-validation.service';
import { DetectionConfig, DetectionResponse, DetectionSummary } from '@/types/detection.types';
import { ValidationError } from '@/utils/errors';
import { roundTo } from '@/utils/statistics.utils';
import { logger } from '@/utils/logger';

export const toDetectionResponse = (runId: string, summary: DetectionSummary): DetectionResponse => ({
  run_id: runId,
  events: summary.events.map(e => ({ timestamp: e.timestamp, score: roundTo(e.risk_score, 1) })),
  event_count: summary.count,
  max_score: roundTo(summary.max_score, 1),
  scores: summary.points.map(p => ({
    timestamp: p.timestamp,
    risk_score: roundTo(p.risk_score, 1),
    is_event: p.is_event
  }))
});

export const detectEvents = (config: DetectionConfig): RequestHandler => (req: Request, res: Response): void => {
  const runId = req.requestId ?? uuidv4();
  const parsed = parseDetectionRequest(req.body);

  if (!parsed.valid || !parsed.data) {
    logger.warn('Rejected detection request', { run_id: runId, error: parsed.error });
    res.status(422).json({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: parsed.error,
        details: parsed.details
      }
    });
    return;
  }

  try {
    const summary = scoreBatch(parsed.data, config);

    res.status(200).json({
      success: true,
      data: toDetectionResponse(runId, summary)
    });
  } catch (error) {
    if (error instanceof ValidationError) {
      res.status(error.statusCode).json({
        success: false,
        error: { code: error.code, message: error.message, details: error.details }
      });
      return;
    }

    logger.error('Detection error:', { run_id: runId, error: error instanceof Error ? error.message : error });
    res.status(500).json({
      success: false,
      error: { code: 'SERVER_ERROR', message: 'Server error' }
    });
  }
};

export const getHealth = (req: Request, res: Response): void => {
  res.status(200).json({
    status: health() ? 'ok' : 'unavailable',
    timestamp: new Date().toISOString(),
  });
};

export const getDetectionConfig = (config: DetectionConfig): RequestHandler => (req: Request, res: Response): void => {
  res.status(200).json({
    success: true,
    data: config
  });
};
