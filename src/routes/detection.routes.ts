import { Router } from 'express';
import { detectEvents } from '@/controllers/detection.controller';
import { DetectionConfig } from '@/types/detection.types';

export const createDetectionRoutes = (config: DetectionConfig): Router => {
  const router = Router();

  router.post('/detect', detectEvents(config));

  return router;
};
