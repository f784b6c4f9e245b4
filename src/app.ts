import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import Config from '@/core/config';
import { detectionConfig } from '@/config';
import { DetectionConfig } from '@/types/detection.types';
import { errorHandler } from '@/middleware/errorHandler';
import { requestId } from '@/middleware/requestId';
import { getHealth } from '@/controllers/detection.controller';
import { createDetectionRoutes } from '@/routes/detection.routes';
import { createConfigRoutes } from '@/routes/config.routes';

export const createApp = (config: DetectionConfig = detectionConfig): Express => {
  const app = express();

  // Middleware
  app.use(requestId);
  app.use(express.json({ limit: Config.JSON_BODY_LIMIT }));
  app.use(helmet());
  app.use(cors(Config.ALLOWED_ORIGINS.length > 0 ? { origin: Config.ALLOWED_ORIGINS } : undefined));

  // Routes
  app.use('/api/v1', createDetectionRoutes(config));
  app.use('/api/v1/config', createConfigRoutes(config));

  // Health check
  app.get('/health', getHealth);

  // Error Handler
  app.use(errorHandler);

  return app;
};

const app = createApp();

export default app;
