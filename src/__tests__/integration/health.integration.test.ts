/**
 * Integration Tests — Health Endpoint
 *
 * `GET /api/v1/health` through the full middleware chain (helmet, cors,
 * compression, JSON parser, request logger) using Supertest, which talks to
 * the Express app in memory without binding a port.
 *
 * The endpoint never touches the data directory, so no container overrides
 * are needed here.
 */
import { createApp } from '@interfaces/http/app';
import request from 'supertest';

describe('GET /api/v1/health', () => {
  const app = createApp();

  it('should return 200 with status "ok"', async () => {
    const res = await request(app).get('/api/v1/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });

  it('should include the process uptime in seconds', async () => {
    const res = await request(app).get('/api/v1/health');

    expect(typeof res.body.uptime).toBe('number');
    expect(res.body.uptime).toBeGreaterThanOrEqual(0);
  });

  it('should include a valid ISO 8601 timestamp', async () => {
    const res = await request(app).get('/api/v1/health');

    expect(new Date(res.body.timestamp).toISOString()).toBe(res.body.timestamp);
  });

  it('should answer unknown routes with 404', async () => {
    const res = await request(app).get('/api/v1/nothing-here');

    expect(res.status).toBe(404);
  });
});
