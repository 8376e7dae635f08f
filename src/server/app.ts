import express, { type Express } from 'express';
import { createHealthRouter, type HealthDependencies } from './routes/health';

export interface AppDependencies {
  corsOrigin: string;
  health: HealthDependencies;
}

/**
 * HTTP surface next to the WebSocket endpoint: CORS headers, the health
 * check and a JSON 404.
 */
export const createApp = (deps: AppDependencies): Express => {
  const app = express();

  app.disable('x-powered-by');
  app.use((_req, res, next) => {
    res.setHeader('Access-Control-Allow-Origin', deps.corsOrigin);
    next();
  });

  app.use(createHealthRouter(deps.health));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({
      success: false,
      error: {
        message: 'Route not found',
        code: 'NOT_FOUND',
        timestamp: new Date(),
      },
    });
  });

  return app;
};
