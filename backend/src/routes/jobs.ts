import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { JobEvent } from '@medrun/shared';
import type { Backend } from '../services/backend';
import { Broadcast } from '../lib/broadcast';
import { assertExecutableOverrideAllowed, unwrap } from '../lib/http';
import logger from '../lib/logger';
import { booleanQueryFlag, jobIdParamsSchema, runRequestSchema } from '../lib/validation';

const logStreamQuerySchema = z.object({
  replay: booleanQueryFlag,
});

export interface JobsRouteOptions {
  allowExecutableOverrides?: boolean;
}

export function createJobsRoute(backend: Backend, options: JobsRouteOptions = {}) {
  return new Hono()
    .get('/', async (c) => {
      return c.json({ jobs: unwrap(await backend.listJobs()) });
    })
    .post('/', zValidator('json', runRequestSchema), async (c) => {
      const request = c.req.valid('json');
      assertExecutableOverrideAllowed(
        options.allowExecutableOverrides ?? false,
        'engineExecutable',
        request.engineExecutable !== undefined
      );
      const { id } = unwrap(await backend.submit(request));
      return c.json({ id }, 202);
    })
    .post('/kill-all', async (c) => {
      return c.json(unwrap(await backend.killAll()));
    })
    .delete('/', async (c) => {
      const { cleared } = unwrap(await backend.clearJobs());
      return c.json({ message: `Cleared ${cleared} finished job(s)`, cleared });
    })
    .get('/events', (c) => {
      return streamSSE(c, async (stream) => {
        const events = new Broadcast<JobEvent>({ maxRetained: 1000 });
        const unsubscribe = unwrap(backend.subscribeJobEvents((event) => events.push(event)));
        stream.onAbort(() => {
          unsubscribe();
          events.close();
        });

        for await (const event of events.subscribe({ from: 0 })) {
          await stream.writeSSE({ event: event.type, data: JSON.stringify(event) });
        }
      });
    })
    .get('/:id', zValidator('param', jobIdParamsSchema), async (c) => {
      const { id } = c.req.valid('param');
      return c.json(unwrap(await backend.getJob(id)));
    })
    .delete('/:id', zValidator('param', jobIdParamsSchema), async (c) => {
      const { id } = c.req.valid('param');
      const job = unwrap(await backend.clearJob(id));
      return c.json({ message: `Job ${job.id} cleared`, job });
    })
    .get('/:id/logs', zValidator('param', jobIdParamsSchema), async (c) => {
      const { id } = c.req.valid('param');
      return c.json(unwrap(await backend.getLogs(id)));
    })
    .get(
      '/:id/logs/stream',
      zValidator('param', jobIdParamsSchema),
      zValidator('query', logStreamQuerySchema),
      async (c) => {
        const { id } = c.req.valid('param');
        const { replay } = c.req.valid('query');

        // Resolve the subscription first so an unknown job is a plain 404
        const controller = new AbortController();
        const lines = unwrap(await backend.subscribeLogs(id, { replay, signal: controller.signal }));

        return streamSSE(c, async (stream) => {
          stream.onAbort(() => controller.abort());

          for await (const line of lines) {
            await stream.writeSSE({ event: 'log', data: line });
          }

          const job = await backend.getJob(id);
          if (job.success) {
            await stream.writeSSE({
              event: 'state',
              data: JSON.stringify({
                jobId: id,
                state: job.data.state,
                exitCode: job.data.exitCode,
                failureReason: job.data.failureReason ?? null,
              }),
            });
          } else {
            logger.debug({ jobId: id }, 'Job cleared before its log stream finished');
          }
        });
      }
    )
    .post('/:id/cancel', zValidator('param', jobIdParamsSchema), async (c) => {
      const { id } = c.req.valid('param');
      return c.json(unwrap(await backend.cancel(id)));
    });
}
