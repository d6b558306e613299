import { describe, it, expect, vi } from 'vitest';
import express from 'express';
import request from 'supertest';
import { createJwksRouter, DEFAULT_JWKS_CACHE_CONTROL } from './jwks-router.js';
import { JwksService } from '../../core/jwks-service.js';
import { JwkService } from '../../core/jwk-service.js';
import { InMemoryStore } from '../../stores/in-memory-store.js';
import { noopLogger } from '../../utils/logger.js';
import { TEST_KEY_PREFIX } from '../../test/constants.js';

function createApp(router: express.Router): express.Express {
  const app = express();
  app.use(router);
  return app;
}

describe('createJwksRouter', () => {
  it('should serve the public JWKS at the well-known path', async () => {
    const service = new JwksService(new InMemoryStore(), new JwkService(), {
      keyPrefix: TEST_KEY_PREFIX,
      logger: noopLogger,
    });
    const signing = await service.generateSigningCredentials();
    const app = createApp(createJwksRouter(service, { logger: noopLogger }));

    const response = await request(app).get('/.well-known/jwks.json');

    expect(response.status).toBe(200);
    expect(response.headers['cache-control']).toBe(DEFAULT_JWKS_CACHE_CONTROL);
    expect(response.headers['content-type']).toMatch(/application\/json/);
    expect(response.body.keys).toHaveLength(1);
    expect(response.body.keys[0].kid).toBe(signing.kid);
    expect(response.body.keys[0].d).toBeUndefined();
  });

  it('should serve an empty key set before any key exists', async () => {
    const source = { getPublicJwks: vi.fn().mockResolvedValue({ keys: [] }) };
    const app = createApp(createJwksRouter(source, { logger: noopLogger }));

    const response = await request(app).get('/.well-known/jwks.json');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ keys: [] });
  });

  it('should honour a custom path and Cache-Control', async () => {
    const source = { getPublicJwks: vi.fn().mockResolvedValue({ keys: [] }) };
    const app = createApp(
      createJwksRouter(source, { path: '/keys', cacheControl: 'no-store', logger: noopLogger })
    );

    const response = await request(app).get('/keys');
    const defaultPath = await request(app).get('/.well-known/jwks.json');

    expect(response.status).toBe(200);
    expect(response.headers['cache-control']).toBe('no-store');
    expect(defaultPath.status).toBe(404);
  });

  it('should answer 500 and log when the keys cannot be loaded', async () => {
    const failure = new Error('store offline');
    const source = { getPublicJwks: vi.fn().mockRejectedValue(failure) };
    const logger = { ...noopLogger, error: vi.fn() };
    const app = createApp(createJwksRouter(source, { logger }));

    const response = await request(app).get('/.well-known/jwks.json');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: 'server_error' });
    expect(response.headers['cache-control']).toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith('Failed to load JWKS', failure);
  });
});
