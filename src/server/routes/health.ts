import { Router } from 'express';

export interface HealthDependencies {
  /** Null when the server runs without a database. */
  checkDatabase: (() => Promise<boolean>) | null;
  activeGames: () => number;
  connections: () => number;
}

export interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  dependencies: {
    database: 'up' | 'down' | 'not_configured';
  };
  activeGames: number;
  connections: number;
}

/**
 * Liveness endpoint. Returns 503 when a configured database is
 * unreachable.
 */
export const createHealthRouter = (deps: HealthDependencies): Router => {
  const router = Router();

  router.get('/health', async (_req, res) => {
    let database: HealthStatus['dependencies']['database'] = 'not_configured';
    if (deps.checkDatabase) {
      database = (await deps.checkDatabase()) ? 'up' : 'down';
    }

    const body: HealthStatus = {
      status: database === 'down' ? 'unhealthy' : 'healthy',
      timestamp: new Date().toISOString(),
      dependencies: { database },
      activeGames: deps.activeGames(),
      connections: deps.connections(),
    };

    res.status(body.status === 'healthy' ? 200 : 503).json(body);
  });

  return router;
};
