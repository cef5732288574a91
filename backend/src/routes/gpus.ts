import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { Backend } from '../services/backend';
import { unwrap } from '../lib/http';
import { booleanQueryFlag } from '../lib/validation';

const gpuQuerySchema = z.object({
  refresh: booleanQueryFlag,
});

export function createGpusRoute(backend: Backend) {
  return new Hono().get('/', zValidator('query', gpuQuerySchema), async (c) => {
    const { refresh } = c.req.valid('query');
    const gpus = unwrap(await backend.listGPUs({ refresh }));
    return c.json({ gpus });
  });
}
