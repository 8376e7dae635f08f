import request from 'supertest';
import { createApp } from '../../src/server/app';
import type { HealthDependencies } from '../../src/server/routes/health';

const createHealth = (overrides: Partial<HealthDependencies> = {}): HealthDependencies => ({
  checkDatabase: null,
  activeGames: () => 3,
  connections: () => 7,
  ...overrides,
});

describe('HTTP surface', () => {
  describe('GET /health', () => {
    it('should report healthy without a configured database', async () => {
      const app = createApp({ corsOrigin: '*', health: createHealth() });

      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        status: 'healthy',
        timestamp: expect.any(String),
        dependencies: { database: 'not_configured' },
        activeGames: 3,
        connections: 7,
      });
    });

    it('should report the database as up when the check passes', async () => {
      const app = createApp({ corsOrigin: '*', health: createHealth({ checkDatabase: async () => true }) });

      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body.dependencies).toEqual({ database: 'up' });
    });

    it('should return 503 when the database is unreachable', async () => {
      const app = createApp({ corsOrigin: '*', health: createHealth({ checkDatabase: async () => false }) });

      const res = await request(app).get('/health');

      expect(res.status).toBe(503);
      expect(res.body.status).toBe('unhealthy');
      expect(res.body.dependencies).toEqual({ database: 'down' });
    });
  });

  it('should set the configured CORS origin and hide the framework header', async () => {
    const app = createApp({ corsOrigin: 'https://play.example.com', health: createHealth() });

    const res = await request(app).get('/health');

    expect(res.headers['access-control-allow-origin']).toBe('https://play.example.com');
    expect(res.headers['x-powered-by']).toBeUndefined();
  });

  it('should answer unknown routes with a JSON 404', async () => {
    const app = createApp({ corsOrigin: '*', health: createHealth() });

    const res = await request(app).get('/nope');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      success: false,
      error: { message: 'Route not found', code: 'NOT_FOUND', timestamp: expect.any(String) },
    });
  });
});
