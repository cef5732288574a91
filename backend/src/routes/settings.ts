import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { Backend } from '../services/backend';
import { updateSettingsSchema } from '../services/config';
import { assertExecutableOverrideAllowed, unwrap } from '../lib/http';

export interface SettingsRouteOptions {
  allowExecutableOverrides?: boolean;
}

export function createSettingsRoute(backend: Backend, options: SettingsRouteOptions = {}) {
  return new Hono()
    .get('/', (c) => {
      return c.json(unwrap(backend.getConfig()));
    })
    .put('/', zValidator('json', updateSettingsSchema), async (c) => {
      const data = c.req.valid('json');
      assertExecutableOverrideAllowed(
        options.allowExecutableOverrides ?? false,
        'executables',
        Object.keys(data.executables ?? {}).length > 0
      );
      const settings = unwrap(await backend.updateConfig(data));

      return c.json({
        message: 'Settings updated successfully',
        ...settings,
      });
    });
}
