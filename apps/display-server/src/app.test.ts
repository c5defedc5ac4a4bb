import { describe, expect, it } from 'vitest';
import { buildApp } from './app.js';
import { testConfig } from './testSupport.js';

describe('app', () => {
  it('GET /health returns ok', async () => {
    const app = await buildApp({ config: testConfig(), logger: false });
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toContain('application/json');
    expect(res.json()).toEqual({ ok: true });
    await app.close();
  });

  it('GET /status reports mode, devices and pending work', async () => {
    const app = await buildApp({ config: testConfig({ initialMode: 'KDS' }), logger: false });
    const res = await app.inject({ method: 'GET', url: '/status' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ok: true,
      port: null,
      lanAddress: expect.any(String),
      mode: 'KDS',
      payment: 'idle',
      devices: [],
      pendingDeliveries: 0,
      transactions: [],
    });
    await app.close();
  });
});
