import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { Backend } from '../services/backend';
import { unwrap } from '../lib/http';
import { modelIdParamsSchema, modelSearchQuerySchema } from '../lib/validation';

export function createModelsRoute(backend: Backend) {
  return new Hono()
    .get('/', zValidator('query', modelSearchQuerySchema), async (c) => {
      const { q } = c.req.valid('query');
      return c.json(unwrap(await backend.listModels(q)));
    })
    .post('/refresh', async (c) => {
      const snapshot = unwrap(await backend.refreshCatalog());
      return c.json({
        message: `Catalog refreshed with ${snapshot.models.length} models`,
        fetchedAt: snapshot.fetchedAt,
        count: snapshot.models.length,
        warnings: snapshot.warnings,
      });
    })
    .get('/:id', zValidator('param', modelIdParamsSchema), async (c) => {
      const { id } = c.req.valid('param');
      return c.json(unwrap(await backend.getModel(id)));
    })
    .get('/:id/status', zValidator('param', modelIdParamsSchema), async (c) => {
      const { id } = c.req.valid('param');
      return c.json(unwrap(await backend.getModelStatus(id)));
    })
    .post('/:id/pull', zValidator('param', modelIdParamsSchema), async (c) => {
      const { id } = c.req.valid('param');
      return c.json(unwrap(await backend.pullOrUpdate(id)));
    })
    .delete('/:id/image', zValidator('param', modelIdParamsSchema), async (c) => {
      const { id } = c.req.valid('param');
      const status = unwrap(await backend.removeLocalImage(id));
      return c.json({ message: `Image ${status.image} removed`, status });
    });
}
