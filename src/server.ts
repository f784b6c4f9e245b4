import app from './app';
import Config from '@/core/config';
import { detectionConfig } from '@/config';
import { logger } from '@/utils/logger';

function startServer() {
  try {
    const { smoothing, spike_suppression, hysteresis, alert_threshold } = detectionConfig;
    logger.info('✓ Detection config loaded', {
      window: smoothing.window_length,
      polyorder: smoothing.polyorder,
      spike_suppression: spike_suppression.enabled,
      hysteresis: hysteresis.enabled,
      alert_threshold
    });

    const server = app.listen(Config.PORT, () => {
      logger.info(`✓ Server running on port ${Config.PORT}`);
    });

    // Graceful shutdown
    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully...`);
      server.close(() => {
        process.exit(0);
      });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

startServer();
