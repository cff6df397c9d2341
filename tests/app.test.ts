/**
 * Basic integration tests for the Express app.
 *
 * This verifies that the healthcheck endpoint is wired correctly
 * and that our Express app can be instantiated without errors.
 */
import request from 'supertest';
import { createApp } from '../src/app';
import { logger, requestLogger } from '../src/shared/logging/Logger';

describe('parameter validation service app', () => {
  const app = createApp();

  it('should respond to GET /health with status 200 and JSON body', async () => {
    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toMatch(/application\/json/);
    expect(response.body).toHaveProperty('status', 'ok');
    expect(response.body).toHaveProperty('service', 'param-validation-service');
    expect(typeof response.body.timestamp).toBe('string');
  });

  it('should answer unknown routes with a 404 envelope naming the method and path', async () => {
    const response = await request(app)
      .delete('/v1/unknown')
      .set('x-correlation-id', 'corr-404');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      error: {
        code: 'NOT_FOUND',
        message: 'No route matches DELETE /v1/unknown',
        correlationId: 'corr-404',
      },
    });
  });

  it('should load the request context module at runtime without extra packages', () => {
    expect(() => jest.requireActual('../src/http/requestContext')).not.toThrow();
  });
});

describe('requestLogger', () => {
  it('binds the correlationId to a child logger', () => {
    expect(requestLogger('corr-1').bindings()).toEqual(
      expect.objectContaining({ correlationId: 'corr-1' }),
    );
  });

  it('falls back to the root logger without a correlationId', () => {
    expect(requestLogger(undefined)).toBe(logger);
  });
});
