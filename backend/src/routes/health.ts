import { Hono } from 'hono';
import type { Backend } from '../services/backend';
import { unwrap } from '../lib/http';

export function createHealthRoute(backend: Backend) {
  return new Hono()
    .get('/', (c) => {
      return c.json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
      });
    })
    .get('/engine', async (c) => {
      const info = unwrap(await backend.getEngineInfo());
      return c.json(info);
    });
}
