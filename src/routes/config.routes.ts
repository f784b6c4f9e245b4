import { Router } from 'express';
import { getDetectionConfig } from '@/controllers/detection.controller';
import { DetectionConfig } from '@/types/detection.types';

export const createConfigRoutes = (config: DetectionConfig): Router => {
  const router = Router();

  // Active tunables: smoothing, damping, weights, thresholds
  router.get('/detection', getDetectionConfig(config));

  return router;
};
